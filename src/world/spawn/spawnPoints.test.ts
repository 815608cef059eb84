import { describe, it, expect } from 'vitest';
import { DEFAULT_ROUND_RULES } from '../../config/roundRules.ts';
import type { UnitTypeTag } from '../../data/unitCatalog.ts';
import {
  computeSpawnPointCount,
  generateSpawnPositions,
  partitionWave
} from './spawnPoints.ts';

const spawnRules = DEFAULT_ROUND_RULES.spawn;

describe('computeSpawnPointCount', () => {
  it('adds a point every five rounds', () => {
    for (let round = 1; round <= 5; round += 1) {
      expect(computeSpawnPointCount(round)).toBe(1);
    }
    for (let round = 6; round <= 10; round += 1) {
      expect(computeSpawnPointCount(round)).toBe(2);
    }
    for (let round = 11; round <= 15; round += 1) {
      expect(computeSpawnPointCount(round)).toBe(3);
    }
  });

  it('rejects invalid rounds', () => {
    expect(() => computeSpawnPointCount(0)).toThrow(RangeError);
  });
});

describe('generateSpawnPositions', () => {
  it('spaces points evenly on the spawn circle from the anchor angle', () => {
    const points = generateSpawnPositions(6, 0, spawnRules);
    expect(points).toHaveLength(2);
    expect(points[0].position.x).toBeCloseTo(18);
    expect(points[0].position.y).toBeCloseTo(0);
    expect(points[1].position.x).toBeCloseTo(-18);
    expect(points[1].position.y).toBeCloseTo(0);
    expect(points.map((point) => point.index)).toEqual([0, 1]);
    expect(points.every((point) => point.localSpawnRadius === 8)).toBe(true);
  });

  it('offsets the circle by its center', () => {
    const [point] = generateSpawnPositions(1, Math.PI / 2, {
      ...spawnRules,
      circleCenter: { x: 5, y: -3 }
    });
    expect(point.position.x).toBeCloseTo(5);
    expect(point.position.y).toBeCloseTo(15);
  });
});

describe('partitionWave', () => {
  const allocation: UnitTypeTag[] = ['boss', 'regular', 'fast', 'regular', 'attack', 'fast', 'regular'];

  it('splits contiguously with the remainder on the first points', () => {
    const points = generateSpawnPositions(11, 0, spawnRules);
    const assignments = partitionWave(allocation, points);
    expect(assignments.map((assignment) => assignment.point.assignedCount)).toEqual([3, 2, 2]);
    expect(assignments.map((assignment) => assignment.units)).toEqual([
      ['boss', 'regular', 'fast'],
      ['regular', 'attack'],
      ['fast', 'regular']
    ]);
    expect(points[0].assignedCount).toBe(0);
  });

  it('conserves units and stays balanced for every size', () => {
    for (let round = 1; round <= 30; round += 1) {
      const points = generateSpawnPositions(round, 1.2, spawnRules);
      for (let size = 0; size <= 25; size += 1) {
        const wave: UnitTypeTag[] = Array(size).fill('regular');
        const counts = partitionWave(wave, points).map((assignment) => assignment.point.assignedCount);
        expect(counts.reduce((sum, count) => sum + count, 0)).toBe(size);
        expect(Math.max(...counts) - Math.min(...counts)).toBeLessThanOrEqual(1);
      }
    }
  });

  it('refuses to partition across zero points', () => {
    expect(() => partitionWave(allocation, [])).toThrow(
      'Cannot partition a wave across zero spawn points'
    );
  });
});
