import { resolveRoundRules, type RoundRules, type RoundRulesOverrides } from '../config/roundRules.ts';
import { SimulationClock } from '../core/SimulationClock.ts';
import { getDefaultUnitCatalog, type UnitCatalog } from '../data/unitCatalog.ts';
import { PlayerStats } from '../economy/PlayerStats.ts';
import { EventBus } from '../events/EventBus.ts';
import type { RoundEvents } from '../events/types.ts';
import { createRandomSeed, createSeededRandom, type RandomSource } from '../lib/random.ts';
import { LogStore, type StorageLike } from '../logging/logStore.ts';
import { GameStats } from '../progression/gameStats.ts';
import type { StructureCollaborator, UnitSpawningCollaborator } from '../sim/collaborators.ts';
import { RoundLifecycle } from '../sim/RoundLifecycle.ts';
import type { RoundTelemetryOptions } from '../state/telemetry/roundTelemetry.ts';

export interface RoundEngineOptions {
  readonly units: UnitSpawningCollaborator;
  readonly structures?: StructureCollaborator;
  readonly rules?: RoundRulesOverrides;
  readonly catalog?: UnitCatalog;
  /** Seed for the engine's random source; ignored when `random` is given. */
  readonly seed?: number;
  readonly random?: RandomSource;
  /** Backing store for log history and game stats. `null` keeps everything in memory. */
  readonly storage?: StorageLike | null;
  readonly telemetry?: RoundTelemetryOptions | false;
  /** Simulated seconds per clock step. */
  readonly stepSeconds?: number;
}

export interface RoundEngine {
  readonly rules: RoundRules;
  readonly seed: number | null;
  readonly events: EventBus<RoundEvents>;
  readonly log: LogStore;
  readonly lifecycle: RoundLifecycle;
  readonly playerStats: PlayerStats;
  readonly gameStats: GameStats;
  readonly clock: SimulationClock;
  dispose(): void;
}

const DEFAULT_STEP_SECONDS = 0.1;

export function createRoundEngine(options: RoundEngineOptions): RoundEngine {
  const rules = resolveRoundRules(options.rules ?? {});
  const catalog = options.catalog ?? getDefaultUnitCatalog();
  const seed = options.random ? null : options.seed ?? createRandomSeed();
  const random = options.random ?? createSeededRandom(seed ?? 0);
  const events = new EventBus<RoundEvents>();
  const log = new LogStore({ storage: options.storage });
  const playerStats = new PlayerStats({ economy: rules.economy, events, log });
  const gameStats = new GameStats(options.storage);

  const lifecycle = new RoundLifecycle({
    units: options.units,
    rewards: playerStats,
    structures: options.structures,
    rules,
    catalog,
    random,
    events,
    log,
    telemetry:
      options.telemetry === false
        ? false
        : { storage: options.storage, ...(options.telemetry ?? {}) }
  });

  const clock = new SimulationClock({
    stepSeconds: options.stepSeconds ?? DEFAULT_STEP_SECONDS,
    onStep: (dt) => lifecycle.update(dt),
    onError: (error) =>
      log.emit({
        type: 'system',
        level: 'warn',
        message: 'Simulation clock stopped after a failed step',
        metadata: { error: error instanceof Error ? error.message : String(error) }
      })
  });

  // A timer-driven game halted by game over picks the timer back up on the next game.
  let resumeOnNextGame = false;

  const unsubscribers = [
    events.on('game:started', () => {
      playerStats.initializeNewGame();
      gameStats.reset();
      if (resumeOnNextGame) {
        resumeOnNextGame = false;
        clock.start();
      }
    }),
    events.on('game:over', ({ completedRounds }) => {
      resumeOnNextGame = clock.isRunning();
      clock.stop();
      const summary = gameStats.recordGameOver(completedRounds, playerStats.getEnemiesKilled());
      log.emit({
        type: 'system',
        message: `Game over after ${summary.finalRound} round(s)`,
        metadata: { ...summary }
      });
    })
  ];

  return {
    rules,
    seed,
    events,
    log,
    lifecycle,
    playerStats,
    gameStats,
    clock,
    dispose() {
      resumeOnNextGame = false;
      clock.stop();
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
      events.clear();
    }
  };
}
