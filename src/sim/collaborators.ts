import type { UnitTypeSpec, UnitTypeTag } from '../data/unitCatalog.ts';
import type { Vec2 } from '../lib/vec2.ts';

/** Opaque reference to a unit owned by the spawning side. */
export interface UnitHandle {
  readonly id: string;
}

export interface SpawnerHandle {
  /** Scatter radius used around the spawner; the rules' default applies when absent. */
  readonly scatterRadius?: number;
}

export interface UnitSpawnRequest {
  readonly tag: UnitTypeTag;
  readonly spec: UnitTypeSpec;
  readonly position: Vec2;
  readonly target: Vec2;
  readonly round: number;
  readonly spawnPointIndex: number;
}

export interface UnitSpawningCollaborator {
  /** Place a spawner at a spawn point. `null` means it cannot be produced (e.g. missing configuration). */
  provisionSpawner(position: Vec2): SpawnerHandle | null;
  releaseSpawner?(spawner: SpawnerHandle): void;
  spawnUnit(request: UnitSpawnRequest): UnitHandle | null;
}

export interface RewardCollaborator {
  grantRoundCompletionReward(round: number): void;
  grantKillReward?(tag: UnitTypeTag, reward: number): void;
}

export interface StructureCollaborator {
  getNearestDefendedStructure(position: Vec2): Vec2 | null;
}
