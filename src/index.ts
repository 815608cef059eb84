export {
  DEFAULT_ROUND_RULES,
  parseRoundRules,
  resolveRoundRules
} from './config/roundRules.ts';
export type {
  BossRules,
  BudgetRules,
  EconomyRules,
  PhaseRules,
  PopulationRules,
  RoundRules,
  RoundRulesOverrides,
  SpawnRules
} from './config/roundRules.ts';
export { GamePhase, GameStatus, UnitResolution } from './core/phases.ts';
export {
  SimulationClock,
  type SimulationClockOptions,
  type StepCallback
} from './core/SimulationClock.ts';
export { computeBossQuota, computePopulationCap, computeThreatBudget } from './data/budgetCurves.ts';
export {
  UNIT_TYPE_TAGS,
  UnitCatalog,
  getDefaultUnitCatalog,
  isUnitTypeTag,
  parseUnitCatalog
} from './data/unitCatalog.ts';
export type { UnitTypeSpec, UnitTypeTag } from './data/unitCatalog.ts';
export { PlayerStats, type PlayerStatsOptions } from './economy/PlayerStats.ts';
export { EventBus, type Listener } from './events/EventBus.ts';
export { DeferredActionQueue } from './events/deferredActions.ts';
export type * from './events/types.ts';
export { createRoundEngine } from './game/createRoundEngine.ts';
export type { RoundEngine, RoundEngineOptions } from './game/createRoundEngine.ts';
export { createRandomSeed, createSeededRandom, pickUniform, type RandomSource } from './lib/random.ts';
export type { Vec2 } from './lib/vec2.ts';
export { LogStore } from './logging/logStore.ts';
export type { LogEntry, LogEventType, StorageLike } from './logging/logStore.ts';
export { GameStats, type GameStatsSummary } from './progression/gameStats.ts';
export type * from './sim/collaborators.ts';
export { PhaseGate, canStartDefense } from './sim/PhaseGate.ts';
export { RoundLifecycle } from './sim/RoundLifecycle.ts';
export type {
  DefenseRequestResult,
  RoundLifecycleOptions,
  RoundLifecycleSnapshot,
  StagedSpawnPoint
} from './sim/RoundLifecycle.ts';
export { createRoundContext, type RoundContext } from './sim/roundContext.ts';
export { runRoundSimulation } from './sim/roundSimulation.ts';
export type { RoundSimulationOptions, RoundSimulationRow } from './sim/roundSimulation.ts';
export { composeWave } from './sim/WaveComposer.ts';
export type { WaveComposition, WaveCompositionRequest, WaveStopReason } from './sim/WaveComposer.ts';
export { recordRoundTelemetry, selectRoundSummaries } from './state/telemetry/roundTelemetry.ts';
export type { RoundCompositionSummary } from './state/telemetry/roundTelemetry.ts';
export {
  computeSpawnPointCount,
  generateSpawnPositions,
  partitionWave
} from './world/spawn/spawnPoints.ts';
export type { SpawnPoint, SpawnPointAssignment } from './world/spawn/spawnPoints.ts';
