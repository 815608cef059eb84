import type { RoundRulesOverrides } from '../config/roundRules.ts';
import { GamePhase, GameStatus, UnitResolution } from '../core/phases.ts';
import { getDefaultUnitCatalog, type UnitCatalog } from '../data/unitCatalog.ts';
import { createRoundEngine } from '../game/createRoundEngine.ts';
import { createSeededRandom } from '../lib/random.ts';
import type { GameStatsSummary } from '../progression/gameStats.ts';
import type { UnitHandle } from './collaborators.ts';

export interface RoundSimulationOptions {
  readonly seed: number;
  readonly rounds: number;
  readonly rules?: RoundRulesOverrides;
  readonly catalog?: UnitCatalog;
  /** Share of spawned units that die before reaching their target. */
  readonly killRatio?: number;
  /** Simulated seconds between a unit spawning and its resolution. */
  readonly unitLifetimeSeconds?: number;
  readonly stepSeconds?: number;
  readonly maxStepsPerRound?: number;
}

export interface RoundSimulationRow {
  readonly seed: number;
  readonly round: number;
  readonly threatBudget: number;
  readonly budgetSpent: number;
  readonly populationCap: number;
  readonly bossQuota: number;
  readonly unitCount: number;
  readonly bossCount: number;
  readonly spawnPoints: number;
  readonly kills: number;
  readonly tritium: number;
  readonly durationSeconds: number;
}

export interface RoundSimulationResult {
  readonly rows: RoundSimulationRow[];
  readonly summary: GameStatsSummary;
}

type RoundStart = Omit<RoundSimulationRow, 'seed' | 'kills' | 'tritium' | 'durationSeconds'>;

interface PendingUnit {
  readonly handle: UnitHandle;
  readonly resolveAt: number;
}

const KILL_STREAM_SALT = 0x9e3779b9;

/**
 * Plays `rounds` rounds headlessly. Every spawned unit resolves after a fixed
 * lifetime; whether it dies or arrives is drawn from a stream separate from
 * the engine's so compositions match a live game with the same seed.
 */
export function runRoundSimulation(options: RoundSimulationOptions): RoundSimulationResult {
  const catalog = options.catalog ?? getDefaultUnitCatalog();
  const stepSeconds = options.stepSeconds ?? 0.1;
  const lifetime = Math.max(0, options.unitLifetimeSeconds ?? 3);
  const killRatio = Math.min(1, Math.max(0, options.killRatio ?? 1));
  const maxSteps = options.maxStepsPerRound ?? 100_000;
  const killRandom = createSeededRandom((options.seed ^ KILL_STREAM_SALT) >>> 0);

  const pending: PendingUnit[] = [];
  let nextUnitId = 0;
  let now = 0;

  const engine = createRoundEngine({
    seed: options.seed,
    rules: options.rules,
    catalog,
    storage: null,
    telemetry: false,
    stepSeconds,
    units: {
      provisionSpawner: () => ({}),
      spawnUnit: () => {
        nextUnitId += 1;
        const handle: UnitHandle = { id: `sim-${options.seed}-${nextUnitId}` };
        pending.push({
          handle,
          resolveAt: engine.lifecycle.getSnapshot().simulationSeconds + lifetime
        });
        return handle;
      }
    }
  });
  const { lifecycle, clock, playerStats, rules, events } = engine;

  const rows: RoundSimulationRow[] = [];
  let roundStartedAt = 0;
  let roundKills = 0;
  let started: RoundStart | null = null;

  events.on('round:started', ({ round, context, allocation, spawnPoints }) => {
    roundStartedAt = now;
    roundKills = 0;
    started = {
      round,
      threatBudget: context.threatBudget,
      populationCap: context.populationCap,
      bossQuota: context.bossQuota,
      budgetSpent: allocation
        .filter((tag) => tag !== rules.boss.tag)
        .reduce((sum, tag) => sum + catalog.costOf(tag), 0),
      unitCount: allocation.length,
      bossCount: allocation.filter((tag) => tag === rules.boss.tag).length,
      spawnPoints: spawnPoints.length
    };
  });
  events.on('unit:resolved', ({ resolution }) => {
    if (resolution === UnitResolution.KILLED) {
      roundKills += 1;
    }
  });
  events.on('round:completed', ({ round }) => {
    if (!started || started.round !== round) {
      return;
    }
    rows.push({
      seed: options.seed,
      ...started,
      kills: roundKills,
      tritium: playerStats.getTritium(),
      durationSeconds: now - roundStartedAt
    });
  });

  const step = (): void => {
    clock.advance(stepSeconds);
    now = lifecycle.getSnapshot().simulationSeconds;
    const due = pending.filter((unit) => unit.resolveAt <= now);
    for (const unit of due) {
      pending.splice(pending.indexOf(unit), 1);
      const resolution = killRandom() < killRatio ? UnitResolution.KILLED : UnitResolution.ARRIVED;
      lifecycle.reportUnitResolved(unit.handle, resolution);
    }
  };

  try {
    lifecycle.startNewGame();
    for (let index = 0; index < options.rounds; index += 1) {
      let steps = 0;
      while (lifecycle.getSnapshot().buildingElapsedSeconds < rules.phases.minimumBuildingSeconds) {
        step();
        steps += 1;
        if (steps > maxSteps) {
          throw new Error(`Building phase did not elapse within ${maxSteps} steps`);
        }
      }
      const result = lifecycle.requestStartDefense();
      if (!result.ok) {
        throw new Error(`Round ${lifecycle.getCompletedRounds() + 1} could not start: ${result.reason}`);
      }
      while (lifecycle.getPhase() === GamePhase.DEFENSE && lifecycle.getStatus() === GameStatus.PLAYING) {
        step();
        steps += 1;
        if (steps > maxSteps) {
          throw new Error(`Round ${result.round} did not resolve within ${maxSteps} steps`);
        }
      }
    }
    lifecycle.onAllStructuresDestroyed();
    return { rows, summary: engine.gameStats.getSummary() };
  } finally {
    engine.dispose();
  }
}
