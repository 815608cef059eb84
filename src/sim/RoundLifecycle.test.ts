import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GamePhase, GameStatus, UnitResolution } from '../core/phases.ts';
import { getDefaultUnitCatalog, UnitCatalog } from '../data/unitCatalog.ts';
import { EventBus } from '../events/EventBus.ts';
import type { PhaseChangedPayload, RoundEvents } from '../events/types.ts';
import type { Vec2 } from '../lib/vec2.ts';
import type { StorageLike } from '../logging/logStore.ts';
import { selectRoundSummaries } from '../state/telemetry/roundTelemetry.ts';
import type { SpawnerHandle, UnitHandle, UnitSpawnRequest } from './collaborators.ts';
import { RoundLifecycle, type RoundLifecycleOptions } from './RoundLifecycle.ts';

function createHarness(options: Partial<RoundLifecycleOptions> = {}) {
  let nextId = 0;
  const handles: UnitHandle[] = [];
  const units = {
    provisionSpawner: vi.fn((_position: Vec2): SpawnerHandle | null => ({})),
    releaseSpawner: vi.fn((_spawner: SpawnerHandle) => {}),
    spawnUnit: vi.fn((_request: UnitSpawnRequest): UnitHandle | null => {
      nextId += 1;
      const handle = { id: `unit-${nextId}` };
      handles.push(handle);
      return handle;
    })
  };
  const rewards = {
    grantRoundCompletionReward: vi.fn((_round: number) => {}),
    grantKillReward: vi.fn((_tag: string, _reward: number) => {})
  };
  const events = new EventBus<RoundEvents>();
  const phases: PhaseChangedPayload[] = [];
  events.on('phase:changed', (payload) => phases.push(payload));
  const lifecycle = new RoundLifecycle({
    units,
    rewards,
    events,
    random: () => 0,
    telemetry: false,
    ...options
  });
  return { lifecycle, units, rewards, events, phases, handles };
}

/** Start a game and wait out the building phase. */
function startFirstRound(harness: ReturnType<typeof createHarness>) {
  harness.lifecycle.startNewGame();
  harness.lifecycle.update(5);
  return harness.lifecycle.requestStartDefense();
}

describe('RoundLifecycle', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('new game', () => {
    it('enters the building phase with spawn points staged for round 1', () => {
      const { lifecycle, units, phases } = createHarness();
      expect(lifecycle.getStatus()).toBe(GameStatus.NOT_STARTED);

      expect(lifecycle.startNewGame()).toBe(true);

      expect(lifecycle.getStatus()).toBe(GameStatus.PLAYING);
      expect(lifecycle.getPhase()).toBe(GamePhase.BUILDING);
      expect(lifecycle.getCompletedRounds()).toBe(0);
      expect(units.provisionSpawner).toHaveBeenCalledTimes(1);
      expect(units.provisionSpawner).toHaveBeenCalledWith({ x: 18, y: 0 });
      expect(lifecycle.getSnapshot().stagedSpawnPoints).toEqual([
        { index: 0, position: { x: 18, y: 0 }, localSpawnRadius: 8, assignedCount: 0 }
      ]);
      expect(phases).toEqual([{ phase: GamePhase.BUILDING, round: 1 }]);
    });

    it('refuses to start over a game in progress', () => {
      const { lifecycle, events } = createHarness();
      const started = vi.fn();
      events.on('game:started', started);
      lifecycle.startNewGame();

      expect(lifecycle.startNewGame()).toBe(false);
      expect(started).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith('RoundLifecycle: Game already in progress', {});
    });

    it('uses the spawner scatter radius when one is reported', () => {
      const { lifecycle, units } = createHarness();
      units.provisionSpawner.mockReturnValue({ scatterRadius: 3 });
      lifecycle.startNewGame();
      expect(lifecycle.getSnapshot().stagedSpawnPoints[0].localSpawnRadius).toBe(3);
    });
  });

  describe('requestStartDefense', () => {
    it('rejects the request before a game starts', () => {
      const { lifecycle } = createHarness();
      expect(lifecycle.requestStartDefense()).toEqual({
        ok: false,
        reason: 'not-playing',
        remainingSeconds: 0
      });
    });

    it('holds the building phase for the minimum duration', () => {
      const { lifecycle, events } = createHarness();
      const rejected = vi.fn();
      events.on('round:start-rejected', rejected);
      lifecycle.startNewGame();
      lifecycle.update(3);

      expect(lifecycle.getSnapshot().buildingElapsedSeconds).toBe(3);
      expect(lifecycle.requestStartDefense()).toEqual({
        ok: false,
        reason: 'too-early',
        remainingSeconds: 2
      });
      expect(rejected).toHaveBeenCalledWith({ reason: 'too-early', round: 1, remainingSeconds: 2 });
      expect(lifecycle.getPhase()).toBe(GamePhase.BUILDING);
    });

    it('composes the round and reports its context', () => {
      const harness = createHarness();
      const result = startFirstRound(harness);

      expect(result).toEqual({
        ok: true,
        round: 1,
        context: { roundNumber: 1, threatBudget: 60, populationCap: 10, bossQuota: 0 },
        allocation: Array(6).fill('regular')
      });
      const snapshot = harness.lifecycle.getSnapshot();
      expect(snapshot.phase).toBe(GamePhase.DEFENSE);
      expect(snapshot.activeRound).toBe(1);
      expect(snapshot.populationInFlight).toBe(6);
      expect(snapshot.spawnPoints.map((point) => point.assignedCount)).toEqual([6]);
      expect(harness.phases.at(-1)).toEqual({ phase: GamePhase.DEFENSE, round: 1 });
    });

    it('rejects a second request during defense', () => {
      const harness = createHarness();
      startFirstRound(harness);
      expect(harness.lifecycle.requestStartDefense()).toEqual({
        ok: false,
        reason: 'not-building',
        remainingSeconds: 0
      });
    });

    it('aborts while a spawner cannot be provisioned and succeeds on retry', () => {
      const harness = createHarness();
      harness.units.provisionSpawner.mockReturnValue(null);
      harness.lifecycle.startNewGame();
      harness.lifecycle.update(5);

      expect(harness.lifecycle.requestStartDefense()).toEqual({
        ok: false,
        reason: 'spawner-unavailable',
        remainingSeconds: 0
      });
      expect(harness.lifecycle.getPhase()).toBe(GamePhase.BUILDING);
      expect(harness.units.provisionSpawner).toHaveBeenCalledTimes(2);
      expect(harness.units.spawnUnit).not.toHaveBeenCalled();

      harness.units.provisionSpawner.mockReturnValue({ scatterRadius: 3 });
      const retry = harness.lifecycle.requestStartDefense();
      expect(retry.ok).toBe(true);
      expect(harness.lifecycle.getSnapshot().spawnPoints[0].localSpawnRadius).toBe(3);
    });
  });

  describe('spawning', () => {
    it('releases the first unit at once and the rest one after another', () => {
      const harness = createHarness();
      startFirstRound(harness);

      expect(harness.units.spawnUnit).toHaveBeenCalledTimes(1);
      expect(harness.units.spawnUnit).toHaveBeenCalledWith({
        tag: 'regular',
        spec: getDefaultUnitCatalog().get('regular'),
        position: { x: 18, y: 0 },
        target: { x: 0, y: 0 },
        round: 1,
        spawnPointIndex: 0
      });
      expect(harness.lifecycle.getPendingActions()).toBe(5);

      harness.lifecycle.update(0.8);
      expect(harness.units.spawnUnit).toHaveBeenCalledTimes(2);

      harness.lifecycle.update(10);
      expect(harness.units.spawnUnit).toHaveBeenCalledTimes(6);
      expect(harness.lifecycle.getPendingActions()).toBe(0);
    });

    it('aims units at the nearest defended structure', () => {
      const getNearestDefendedStructure = vi.fn((_position: Vec2): Vec2 | null => ({ x: 2, y: 3 }));
      const harness = createHarness({ structures: { getNearestDefendedStructure } });
      startFirstRound(harness);

      expect(getNearestDefendedStructure).toHaveBeenCalledWith({ x: 18, y: 0 });
      expect(harness.units.spawnUnit.mock.calls[0][0].target).toEqual({ x: 2, y: 3 });
    });

    it('falls back to the origin when the structure lookup throws', () => {
      let lookups = 0;
      const getNearestDefendedStructure = vi.fn((_position: Vec2): Vec2 | null => {
        lookups += 1;
        if (lookups === 2) {
          throw new Error('structure lookup failed');
        }
        return { x: 2, y: 3 };
      });
      const harness = createHarness({ structures: { getNearestDefendedStructure } });
      startFirstRound(harness);
      harness.lifecycle.update(10);

      expect(harness.handles).toHaveLength(6);
      expect(harness.units.spawnUnit.mock.calls[1][0].target).toEqual({ x: 0, y: 0 });
      expect(harness.units.spawnUnit.mock.calls[2][0].target).toEqual({ x: 2, y: 3 });
      expect(console.warn).toHaveBeenCalledWith(
        'RoundLifecycle: Structure lookup failed; regular targets the origin',
        { round: 1, unitTag: 'regular', error: 'structure lookup failed' }
      );

      for (const handle of harness.handles) {
        harness.lifecycle.reportUnitResolved(handle, UnitResolution.ARRIVED);
      }
      harness.lifecycle.update(2);
      expect(harness.lifecycle.getCompletedRounds()).toBe(1);
      expect(harness.lifecycle.getPhase()).toBe(GamePhase.BUILDING);
    });

    it('counts units that cannot be created as resolved', () => {
      const harness = createHarness();
      harness.units.spawnUnit.mockReturnValue(null);
      const resolved = vi.fn();
      harness.events.on('unit:resolved', resolved);
      startFirstRound(harness);

      expect(harness.lifecycle.getPopulationInFlight()).toBe(5);
      harness.lifecycle.update(10);

      expect(resolved).toHaveBeenCalledTimes(6);
      expect(resolved).toHaveBeenLastCalledWith({
        handle: null,
        tag: 'regular',
        resolution: UnitResolution.SKIPPED,
        round: 1,
        populationInFlight: 0
      });
      expect(harness.lifecycle.getCompletedRounds()).toBe(1);
      expect(console.warn).toHaveBeenCalledWith('RoundLifecycle: Spawner at point 0 could not create regular', {
        round: 1,
        unitTag: 'regular'
      });
    });

    it('survives a spawner that throws', () => {
      const harness = createHarness();
      harness.units.spawnUnit.mockImplementation(() => {
        throw new Error('prefab missing');
      });
      startFirstRound(harness);
      harness.lifecycle.update(10);

      expect(harness.lifecycle.getCompletedRounds()).toBe(1);
      expect(console.warn).toHaveBeenCalledWith('RoundLifecycle: Spawner at point 0 failed to create regular', {
        round: 1,
        unitTag: 'regular',
        error: 'prefab missing'
      });
    });
  });

  describe('round resolution', () => {
    it('completes the round once every unit resolves and returns to building after the delay', () => {
      const harness = createHarness();
      const completed = vi.fn();
      harness.events.on('round:completed', completed);
      startFirstRound(harness);
      harness.lifecycle.update(10);

      const [first, ...rest] = harness.handles;
      expect(harness.lifecycle.reportUnitResolved(first, UnitResolution.KILLED)).toBe(true);
      expect(harness.lifecycle.reportUnitResolved(first, UnitResolution.KILLED)).toBe(false);
      for (const handle of rest) {
        harness.lifecycle.reportUnitResolved(handle, UnitResolution.ARRIVED);
      }

      expect(harness.rewards.grantKillReward).toHaveBeenCalledTimes(1);
      expect(harness.rewards.grantKillReward).toHaveBeenCalledWith('regular', 10);
      expect(harness.rewards.grantRoundCompletionReward).toHaveBeenCalledWith(1);
      expect(completed).toHaveBeenCalledWith({ round: 1 });
      expect(harness.lifecycle.getCompletedRounds()).toBe(1);
      expect(harness.lifecycle.getPhase()).toBe(GamePhase.DEFENSE);

      harness.lifecycle.update(2);

      expect(harness.lifecycle.getPhase()).toBe(GamePhase.BUILDING);
      expect(harness.lifecycle.getActiveRound()).toBeNull();
      expect(harness.units.releaseSpawner).toHaveBeenCalledTimes(1);
      expect(harness.units.provisionSpawner).toHaveBeenCalledTimes(2);
      expect(harness.phases).toEqual([
        { phase: GamePhase.BUILDING, round: 1 },
        { phase: GamePhase.DEFENSE, round: 1 },
        { phase: GamePhase.BUILDING, round: 2 }
      ]);
      expect(harness.lifecycle.requestStartDefense()).toEqual({
        ok: false,
        reason: 'too-early',
        remainingSeconds: 5
      });
    });

    it('returns to building even when the reward collaborator throws', () => {
      const harness = createHarness();
      const walletOffline = () => {
        throw new Error('wallet offline');
      };
      harness.rewards.grantKillReward.mockImplementation(walletOffline);
      harness.rewards.grantRoundCompletionReward.mockImplementation(walletOffline);
      const completed = vi.fn();
      harness.events.on('round:completed', completed);
      startFirstRound(harness);
      harness.lifecycle.update(10);

      const [first, ...rest] = harness.handles;
      expect(harness.lifecycle.reportUnitResolved(first, UnitResolution.KILLED)).toBe(true);
      for (const handle of rest) {
        harness.lifecycle.reportUnitResolved(handle, UnitResolution.ARRIVED);
      }

      expect(harness.lifecycle.getPopulationInFlight()).toBe(0);
      expect(completed).toHaveBeenCalledWith({ round: 1 });
      expect(console.warn).toHaveBeenCalledWith('RoundLifecycle: Kill reward for regular failed', {
        round: 1,
        unitTag: 'regular',
        error: 'wallet offline'
      });
      expect(console.warn).toHaveBeenCalledWith('RoundLifecycle: Round 1 reward failed', {
        round: 1,
        error: 'wallet offline'
      });

      harness.lifecycle.update(2);
      expect(harness.lifecycle.getPhase()).toBe(GamePhase.BUILDING);
      expect(harness.lifecycle.getCompletedRounds()).toBe(1);
    });

    it('ignores handles it never spawned', () => {
      const harness = createHarness();
      startFirstRound(harness);
      expect(harness.lifecycle.reportUnitResolved({ id: 'stranger' }, UnitResolution.KILLED)).toBe(false);
      expect(harness.lifecycle.getPopulationInFlight()).toBe(6);
    });

    it('completes an empty wave immediately', () => {
      const catalog = new UnitCatalog(
        [{ tag: 'regular', label: 'Regular', threatCost: 1000, unlockRound: 1 }],
        'regular'
      );
      const harness = createHarness({ catalog });
      const result = startFirstRound(harness);

      expect(result.ok && result.allocation).toEqual([]);
      expect(harness.units.spawnUnit).not.toHaveBeenCalled();
      expect(harness.lifecycle.getCompletedRounds()).toBe(1);
      harness.lifecycle.update(2);
      expect(harness.lifecycle.getPhase()).toBe(GamePhase.BUILDING);
    });

    it('logs the round start', () => {
      const harness = createHarness();
      startFirstRound(harness);
      const messages = harness.lifecycle.log.getHistory().map((entry) => entry.message);
      expect(messages).toContain('Round 1 started with 6 hostiles');
    });
  });

  describe('game over and restart', () => {
    it('cancels pending spawns and ignores later resolutions', () => {
      const harness = createHarness();
      const over = vi.fn();
      harness.events.on('game:over', over);
      startFirstRound(harness);

      harness.lifecycle.onAllStructuresDestroyed();

      expect(harness.lifecycle.getStatus()).toBe(GameStatus.GAME_OVER);
      expect(over).toHaveBeenCalledWith({ completedRounds: 0, activeRound: 1 });
      expect(harness.lifecycle.getPendingActions()).toBe(0);
      expect(harness.lifecycle.reportUnitResolved(harness.handles[0], UnitResolution.KILLED)).toBe(false);
      harness.lifecycle.update(10);
      expect(harness.units.spawnUnit).toHaveBeenCalledTimes(1);
      expect(harness.lifecycle.getPopulationInFlight()).toBe(6);
      expect(harness.rewards.grantKillReward).not.toHaveBeenCalled();
    });

    it('starts a fresh game after game over', () => {
      const harness = createHarness();
      startFirstRound(harness);
      harness.lifecycle.onAllStructuresDestroyed();

      expect(harness.lifecycle.startNewGame()).toBe(true);
      const snapshot = harness.lifecycle.getSnapshot();
      expect(snapshot.status).toBe(GameStatus.PLAYING);
      expect(snapshot.completedRounds).toBe(0);
      expect(snapshot.populationInFlight).toBe(0);
      expect(snapshot.allocation).toEqual([]);
      expect(harness.units.releaseSpawner).toHaveBeenCalledTimes(1);
    });

    it('restarts mid-round without letting the old round fire', () => {
      const harness = createHarness();
      startFirstRound(harness);

      harness.lifecycle.restartGame();

      const snapshot = harness.lifecycle.getSnapshot();
      expect(snapshot.phase).toBe(GamePhase.BUILDING);
      expect(snapshot.activeRound).toBeNull();
      expect(snapshot.simulationSeconds).toBe(0);
      expect(harness.lifecycle.getPendingActions()).toBe(0);
      harness.lifecycle.update(10);
      expect(harness.units.spawnUnit).toHaveBeenCalledTimes(1);
      expect(harness.lifecycle.reportUnitResolved(harness.handles[0], UnitResolution.ARRIVED)).toBe(false);
    });
  });

  it('records a composition summary per round when telemetry is on', () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    const data = new Map<string, string>();
    const storage: StorageLike = {
      getItem: (key) => data.get(key) ?? null,
      setItem: (key, value) => {
        data.set(key, value);
      }
    };
    const harness = createHarness({ telemetry: { storage, now: () => 42 } });
    startFirstRound(harness);

    const [summary] = selectRoundSummaries(storage);
    expect(summary).toMatchObject({ timestamp: 42, round: 1, unitCount: 6, spawnPointCount: 1 });
  });
});
