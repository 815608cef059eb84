import type { GamePhase, UnitResolution } from '../core/phases.ts';
import type { UnitTypeTag } from '../data/unitCatalog.ts';
import type { Vec2 } from '../lib/vec2.ts';
import type { RoundContext } from '../sim/roundContext.ts';
import type { UnitHandle } from '../sim/collaborators.ts';
import type { SpawnPoint } from '../world/spawn/spawnPoints.ts';

export interface GameStartedPayload {
  completedRounds: number;
}

export interface GameOverPayload {
  completedRounds: number;
  activeRound: number | null;
}

export interface PhaseChangedPayload {
  phase: GamePhase;
  round: number;
}

export interface RoundStartedPayload {
  round: number;
  context: RoundContext;
  allocation: readonly UnitTypeTag[];
  spawnPoints: readonly SpawnPoint[];
}

export interface RoundCompletedPayload {
  round: number;
}

export type DefenseRejectionReason =
  | 'not-playing'
  | 'not-building'
  | 'too-early'
  | 'spawner-unavailable';

export interface RoundStartRejectedPayload {
  reason: DefenseRejectionReason;
  round: number;
  remainingSeconds: number;
}

export interface SpawnPointsStagedPayload {
  round: number;
  anchorAngle: number;
  points: readonly SpawnPoint[];
  missingSpawners: number;
}

export interface UnitSpawnedPayload {
  handle: UnitHandle;
  tag: UnitTypeTag;
  round: number;
  position: Vec2;
  target: Vec2;
  spawnPointIndex: number;
}

export interface UnitResolvedPayload {
  handle: UnitHandle | null;
  tag: UnitTypeTag;
  resolution: UnitResolution;
  round: number;
  populationInFlight: number;
}

export interface TritiumChangedPayload {
  amount: number;
  delta: number;
  source: 'new-game' | 'round-reward' | 'kill-reward' | 'spend' | 'grant';
}

export type RoundEvents = {
  'game:started': GameStartedPayload;
  'game:over': GameOverPayload;
  'phase:changed': PhaseChangedPayload;
  'round:started': RoundStartedPayload;
  'round:completed': RoundCompletedPayload;
  'round:start-rejected': RoundStartRejectedPayload;
  'spawn-points:staged': SpawnPointsStagedPayload;
  'unit:spawned': UnitSpawnedPayload;
  'unit:resolved': UnitResolvedPayload;
  'economy:tritium-changed': TritiumChangedPayload;
};
