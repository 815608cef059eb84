import type { SpawnRules } from '../../config/roundRules.ts';
import type { UnitTypeTag } from '../../data/unitCatalog.ts';
import { add, fromPolar, type Vec2 } from '../../lib/vec2.ts';

export interface SpawnPoint {
  readonly index: number;
  readonly position: Vec2;
  /** Scatter radius for instantiation jitter, taken from the spawner occupying the point. */
  readonly localSpawnRadius: number;
  readonly assignedCount: number;
}

export interface SpawnPointAssignment {
  readonly point: SpawnPoint;
  readonly units: readonly UnitTypeTag[];
}

/** One point for rounds 1–5, two for 6–10, three for 11–15, and so on. */
export function computeSpawnPointCount(round: number, interval = 5): number {
  if (!Number.isInteger(round) || round < 1) {
    throw new RangeError(`Round number must be a positive integer, received ${round}`);
  }
  return Math.max(1, Math.floor((round - 1) / interval) + 1);
}

/**
 * Points sit evenly on the spawn circle starting at `anchorAngle` (radians), so
 * the first one lines up with the marker the player already sees.
 */
export function generateSpawnPositions(
  round: number,
  anchorAngle: number,
  rules: Pick<SpawnRules, 'circleRadius' | 'circleCenter' | 'pointInterval' | 'defaultScatterRadius'>
): SpawnPoint[] {
  const count = computeSpawnPointCount(round, rules.pointInterval);
  const step = (Math.PI * 2) / count;
  const points: SpawnPoint[] = [];
  for (let index = 0; index < count; index += 1) {
    points.push({
      index,
      position: add(rules.circleCenter, fromPolar(anchorAngle + step * index, rules.circleRadius)),
      localSpawnRadius: rules.defaultScatterRadius,
      assignedCount: 0
    });
  }
  return points;
}

/**
 * Balanced contiguous split: every point gets `total / count` entries and the
 * first `total % count` points take one extra.
 */
export function partitionWave(
  allocation: readonly UnitTypeTag[],
  points: readonly SpawnPoint[]
): SpawnPointAssignment[] {
  if (points.length === 0) {
    throw new RangeError('Cannot partition a wave across zero spawn points');
  }
  const total = allocation.length;
  const base = Math.floor(total / points.length);
  const remainder = total % points.length;
  const assignments: SpawnPointAssignment[] = [];
  let cursor = 0;
  points.forEach((point, index) => {
    const size = base + (index < remainder ? 1 : 0);
    const units = Object.freeze(allocation.slice(cursor, cursor + size));
    cursor += size;
    assignments.push({ point: { ...point, assignedCount: size }, units });
  });
  return assignments;
}
