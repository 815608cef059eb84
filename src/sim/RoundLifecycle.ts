import { DEFAULT_ROUND_RULES, type RoundRules } from '../config/roundRules.ts';
import { GamePhase, GameStatus, UnitResolution } from '../core/phases.ts';
import { getDefaultUnitCatalog, type UnitCatalog, type UnitTypeTag } from '../data/unitCatalog.ts';
import { DeferredActionQueue } from '../events/deferredActions.ts';
import { EventBus } from '../events/EventBus.ts';
import type { DefenseRejectionReason, RoundEvents } from '../events/types.ts';
import { randomRange, type RandomSource } from '../lib/random.ts';
import { add, ORIGIN, randomInsideCircle, type Vec2 } from '../lib/vec2.ts';
import { LogStore, type LogEventMetadata } from '../logging/logStore.ts';
import { recordRoundTelemetry, type RoundTelemetryOptions } from '../state/telemetry/roundTelemetry.ts';
import {
  generateSpawnPositions,
  partitionWave,
  type SpawnPoint,
  type SpawnPointAssignment
} from '../world/spawn/spawnPoints.ts';
import type {
  RewardCollaborator,
  SpawnerHandle,
  StructureCollaborator,
  UnitHandle,
  UnitSpawningCollaborator
} from './collaborators.ts';
import { PhaseGate } from './PhaseGate.ts';
import { createRoundContext, type RoundContext } from './roundContext.ts';
import { composeWave, type WaveComposition } from './WaveComposer.ts';

export interface RoundLifecycleOptions {
  readonly units: UnitSpawningCollaborator;
  readonly rewards?: RewardCollaborator;
  readonly structures?: StructureCollaborator;
  readonly rules?: RoundRules;
  readonly catalog?: UnitCatalog;
  readonly random: RandomSource;
  readonly events?: EventBus<RoundEvents>;
  readonly log?: LogStore;
  /** Pass `false` to skip round composition telemetry. */
  readonly telemetry?: RoundTelemetryOptions | false;
}

export type DefenseRequestResult =
  | {
      readonly ok: true;
      readonly round: number;
      readonly context: RoundContext;
      readonly allocation: readonly UnitTypeTag[];
    }
  | {
      readonly ok: false;
      readonly reason: DefenseRejectionReason;
      readonly remainingSeconds: number;
    };

export interface StagedSpawnPoint {
  readonly point: SpawnPoint;
  readonly spawner: SpawnerHandle | null;
}

export interface RoundLifecycleSnapshot {
  readonly status: GameStatus;
  readonly phase: GamePhase;
  readonly completedRounds: number;
  readonly activeRound: number | null;
  readonly populationInFlight: number;
  readonly buildingElapsedSeconds: number;
  readonly simulationSeconds: number;
  readonly context: RoundContext | null;
  readonly allocation: readonly UnitTypeTag[];
  readonly spawnPoints: readonly SpawnPoint[];
  readonly stagedSpawnPoints: readonly SpawnPoint[];
}

interface LiveUnit {
  readonly handle: UnitHandle;
  readonly tag: UnitTypeTag;
  readonly round: number;
}

const RETURN_TO_BUILDING = 'return-to-building';
const SPAWN_PREFIX = 'spawn:';

/**
 * Owns the round counter, the phase machine and the population of the
 * active round. All mutation happens on the simulation tick: collaborators
 * report back synchronously and delays run through {@link update}.
 */
export class RoundLifecycle {
  readonly events: EventBus<RoundEvents>;
  readonly log: LogStore;

  private readonly rules: RoundRules;
  private readonly catalog: UnitCatalog;
  private readonly random: RandomSource;
  private readonly units: UnitSpawningCollaborator;
  private readonly rewards: RewardCollaborator | null;
  private readonly structures: StructureCollaborator | null;
  private readonly telemetry: RoundTelemetryOptions | null;
  private readonly deferred = new DeferredActionQueue();
  private readonly gate: PhaseGate;

  private status = GameStatus.NOT_STARTED;
  private phase = GamePhase.BUILDING;
  private completedRounds = 0;
  private activeRound: number | null = null;
  private populationInFlight = 0;
  private roundResolved = false;
  private context: RoundContext | null = null;
  private composition: WaveComposition | null = null;
  private assignments: SpawnPointAssignment[] = [];
  private staged: StagedSpawnPoint[] = [];
  private stagedRound: number | null = null;
  private readonly liveUnits = new Map<string, LiveUnit>();

  constructor(options: RoundLifecycleOptions) {
    this.rules = options.rules ?? DEFAULT_ROUND_RULES;
    this.catalog = options.catalog ?? getDefaultUnitCatalog();
    this.random = options.random;
    this.units = options.units;
    this.rewards = options.rewards ?? null;
    this.structures = options.structures ?? null;
    this.events = options.events ?? new EventBus<RoundEvents>();
    this.log = options.log ?? new LogStore({ storage: null });
    this.telemetry = options.telemetry === false ? null : options.telemetry ?? {};
    this.gate = new PhaseGate(this.rules.phases.minimumBuildingSeconds);
  }

  getStatus(): GameStatus {
    return this.status;
  }

  getPhase(): GamePhase {
    return this.phase;
  }

  getCompletedRounds(): number {
    return this.completedRounds;
  }

  getActiveRound(): number | null {
    return this.activeRound;
  }

  getPopulationInFlight(): number {
    return this.populationInFlight;
  }

  getRoundContext(): RoundContext | null {
    return this.context;
  }

  getStagedSpawnPoints(): readonly StagedSpawnPoint[] {
    return this.staged;
  }

  /** Pending deferred actions, spawns included. */
  getPendingActions(): number {
    return this.deferred.pending();
  }

  getSnapshot(): RoundLifecycleSnapshot {
    return {
      status: this.status,
      phase: this.phase,
      completedRounds: this.completedRounds,
      activeRound: this.activeRound,
      populationInFlight: this.populationInFlight,
      buildingElapsedSeconds:
        this.status === GameStatus.PLAYING && this.phase === GamePhase.BUILDING
          ? this.gate.elapsed(this.deferred.now())
          : 0,
      simulationSeconds: this.deferred.now(),
      context: this.context,
      allocation: this.composition?.allocation ?? [],
      spawnPoints: this.assignments.map((assignment) => assignment.point),
      stagedSpawnPoints: this.staged.map((staged) => staged.point)
    } satisfies RoundLifecycleSnapshot;
  }

  startNewGame(): boolean {
    if (this.status === GameStatus.PLAYING) {
      this.warn('system', 'Game already in progress');
      return false;
    }
    this.resetState();
    this.status = GameStatus.PLAYING;
    this.phase = GamePhase.BUILDING;
    this.gate.openBuildingPhase(this.deferred.now());
    this.stageSpawnPoints();
    this.log.emit({ type: 'system', message: 'New game started' });
    this.events.emit('game:started', { completedRounds: this.completedRounds });
    this.events.emit('phase:changed', { phase: this.phase, round: this.completedRounds + 1 });
    return true;
  }

  /** Abandon whatever is running, cancelling every pending action, and start over. */
  restartGame(): void {
    this.resetState();
    this.status = GameStatus.NOT_STARTED;
    this.startNewGame();
  }

  requestStartDefense(): DefenseRequestResult {
    if (this.status !== GameStatus.PLAYING) {
      return this.rejectDefense('not-playing', 'Cannot start defense phase - game not playing');
    }
    if (this.phase !== GamePhase.BUILDING) {
      return this.rejectDefense('not-building', 'Cannot start defense phase - not in building phase');
    }
    const gate = this.gate.evaluate(this.deferred.now());
    if (!gate.allowed) {
      return this.rejectDefense(
        'too-early',
        `Must wait ${gate.remainingSeconds.toFixed(1)} more seconds before starting defense phase`,
        gate.remainingSeconds
      );
    }

    const round = this.completedRounds + 1;
    if (this.stagedRound !== round || this.staged.length === 0) {
      this.stageSpawnPoints();
    } else {
      this.staged = this.staged.map((staged) =>
        staged.spawner ? staged : this.provisionSpawnPoint(staged.point)
      );
    }
    const missing = this.staged.filter((staged) => staged.spawner === null).length;
    if (missing > 0) {
      this.warn('config', `Failed to create ${missing} spawner(s); cannot start round ${round}`, {
        round,
        missing
      });
      return this.rejectDefense('spawner-unavailable', `Round ${round} could not start`);
    }

    return this.startDefense(round);
  }

  /**
   * Called by the combat side when a spawned unit reaches its objective or is
   * destroyed. Each live handle counts once; anything else is ignored.
   */
  reportUnitResolved(
    handle: UnitHandle,
    resolution: UnitResolution.ARRIVED | UnitResolution.KILLED
  ): boolean {
    if (this.status !== GameStatus.PLAYING || this.phase !== GamePhase.DEFENSE) {
      return false;
    }
    const live = this.liveUnits.get(handle.id);
    if (!live) {
      return false;
    }
    this.liveUnits.delete(handle.id);
    if (resolution === UnitResolution.KILLED) {
      const reward = this.catalog.costOf(live.tag);
      this.grantReward(`Kill reward for ${live.tag}`, { round: live.round, unitTag: live.tag }, () =>
        this.rewards?.grantKillReward?.(live.tag, reward)
      );
    }
    this.resolvePopulation(live.handle, live.tag, resolution);
    return true;
  }

  onAllStructuresDestroyed(): void {
    if (this.status !== GameStatus.PLAYING) {
      return;
    }
    this.status = GameStatus.GAME_OVER;
    this.deferred.cancelAll();
    this.liveUnits.clear();
    this.log.emit({
      type: 'system',
      message: 'All defended structures destroyed - game over',
      metadata: { completedRounds: this.completedRounds, activeRound: this.activeRound }
    });
    this.events.emit('game:over', {
      completedRounds: this.completedRounds,
      activeRound: this.activeRound
    });
  }

  /** Advance simulation time, running due spawns and the return to the building phase. */
  update(dtSeconds: number): void {
    if (this.status !== GameStatus.PLAYING) {
      return;
    }
    if (!Number.isFinite(dtSeconds) || dtSeconds <= 0) {
      return;
    }
    this.deferred.advance(dtSeconds);
  }

  private resetState(): void {
    this.deferred.reset();
    this.releaseStagedSpawners();
    this.liveUnits.clear();
    this.completedRounds = 0;
    this.activeRound = null;
    this.populationInFlight = 0;
    this.roundResolved = false;
    this.context = null;
    this.composition = null;
    this.assignments = [];
    this.phase = GamePhase.BUILDING;
  }

  private rejectDefense(
    reason: DefenseRejectionReason,
    message: string,
    remainingSeconds = 0
  ): DefenseRequestResult {
    const round = this.completedRounds + 1;
    this.warn('phase', message, { reason, round, remainingSeconds });
    this.events.emit('round:start-rejected', { reason, round, remainingSeconds });
    return { ok: false, reason, remainingSeconds };
  }

  private startDefense(round: number): DefenseRequestResult {
    const { context, bossAvailable } = createRoundContext(round, this.rules, this.catalog);
    if (!bossAvailable && round % this.rules.boss.interval === 0) {
      this.warn('config', `Boss type ${this.rules.boss.tag} is missing from the unit catalog`, {
        round
      });
    }
    const composition = composeWave(
      {
        round,
        budget: context.threatBudget,
        cap: context.populationCap,
        bossQuota: context.bossQuota,
        bossTag: this.rules.boss.tag,
        catalog: this.catalog
      },
      this.random
    );
    const staged = this.staged;
    const assignments = partitionWave(
      composition.allocation,
      staged.map((entry) => entry.point)
    );

    this.context = context;
    this.composition = composition;
    this.assignments = assignments;
    this.activeRound = round;
    this.populationInFlight = composition.allocation.length;
    this.roundResolved = false;
    this.phase = GamePhase.DEFENSE;

    this.log.emit({
      type: 'round',
      message: `Round ${round} started with ${composition.allocation.length} hostiles`,
      metadata: {
        round,
        threatBudget: context.threatBudget,
        budgetSpent: composition.budgetSpent,
        populationCap: context.populationCap,
        bossQuota: context.bossQuota
      }
    });
    if (this.telemetry) {
      recordRoundTelemetry(context, composition, assignments.length, this.telemetry);
    }
    this.events.emit('phase:changed', { phase: this.phase, round });
    this.events.emit('round:started', {
      round,
      context,
      allocation: composition.allocation,
      spawnPoints: assignments.map((assignment) => assignment.point)
    });

    if (composition.allocation.length === 0) {
      this.completeRound();
    } else {
      this.scheduleSpawns(round, assignments, staged);
    }

    return { ok: true, round, context, allocation: composition.allocation };
  }

  /**
   * Each point releases its first unit at once and the rest one by one after
   * a random delay, the way a single spawner trickles its share onto the field.
   */
  private scheduleSpawns(
    round: number,
    assignments: readonly SpawnPointAssignment[],
    staged: readonly StagedSpawnPoint[]
  ): void {
    const { minSpawnDelay, maxSpawnDelay } = this.rules.spawn;
    const label = `${SPAWN_PREFIX}${round}`;
    assignments.forEach((assignment, pointIndex) => {
      const spawner = staged[pointIndex]?.spawner ?? null;
      let delay = 0;
      assignment.units.forEach((tag, unitIndex) => {
        if (unitIndex === 0) {
          this.spawnUnit(round, tag, assignment.point, spawner);
          return;
        }
        delay += randomRange(minSpawnDelay, maxSpawnDelay, this.random);
        this.deferred.schedule(delay, label, () =>
          this.spawnUnit(round, tag, assignment.point, spawner)
        );
      });
    });
  }

  private spawnUnit(
    round: number,
    tag: UnitTypeTag,
    point: SpawnPoint,
    spawner: SpawnerHandle | null
  ): void {
    if (this.status !== GameStatus.PLAYING || this.activeRound !== round || this.roundResolved) {
      return;
    }
    const spec = this.catalog.get(tag);
    if (!spec) {
      this.warn('config', `No unit type mapping for ${tag}; skipping`, { round, unitTag: tag });
      this.resolvePopulation(null, tag, UnitResolution.SKIPPED);
      return;
    }
    const position = add(point.position, randomInsideCircle(point.localSpawnRadius, this.random));
    const target = this.findTarget(position, round, tag);

    let handle: UnitHandle | null;
    try {
      handle = this.units.spawnUnit({
        tag,
        spec,
        position,
        target,
        round,
        spawnPointIndex: point.index
      });
    } catch (error) {
      this.warn('config', `Spawner at point ${point.index} failed to create ${tag}`, {
        round,
        unitTag: tag,
        error: error instanceof Error ? error.message : String(error)
      });
      this.resolvePopulation(null, tag, UnitResolution.SKIPPED);
      return;
    }
    if (!handle) {
      this.warn('config', `Spawner at point ${point.index} could not create ${tag}`, {
        round,
        unitTag: tag
      });
      this.resolvePopulation(null, tag, UnitResolution.SKIPPED);
      return;
    }

    this.liveUnits.set(handle.id, { handle, tag, round });
    this.log.emit({
      type: 'spawn',
      message: `Round ${round}: ${spec.label} entered from spawn point ${point.index + 1}`,
      metadata: { round, unitId: handle.id, unitTag: tag, spawnerAttached: spawner !== null }
    });
    this.events.emit('unit:spawned', {
      handle,
      tag,
      round,
      position,
      target,
      spawnPointIndex: point.index
    });
  }

  /** Units head for the origin when no structure lookup is available or it fails. */
  private findTarget(position: Vec2, round: number, tag: UnitTypeTag): Vec2 {
    try {
      return this.structures?.getNearestDefendedStructure(position) ?? ORIGIN;
    } catch (error) {
      this.warn('config', `Structure lookup failed; ${tag} targets the origin`, {
        round,
        unitTag: tag,
        error: error instanceof Error ? error.message : String(error)
      });
      return ORIGIN;
    }
  }

  private grantReward(description: string, metadata: LogEventMetadata, grant: () => void): void {
    try {
      grant();
    } catch (error) {
      this.warn('economy', `${description} failed`, {
        ...metadata,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private resolvePopulation(
    handle: UnitHandle | null,
    tag: UnitTypeTag,
    resolution: UnitResolution
  ): void {
    const round = this.activeRound ?? this.completedRounds;
    this.populationInFlight = Math.max(0, this.populationInFlight - 1);
    this.events.emit('unit:resolved', {
      handle,
      tag,
      resolution,
      round,
      populationInFlight: this.populationInFlight
    });
    if (this.populationInFlight === 0 && this.status === GameStatus.PLAYING) {
      this.completeRound();
    }
  }

  private completeRound(): void {
    if (this.roundResolved || this.activeRound === null) {
      return;
    }
    this.roundResolved = true;
    const round = this.activeRound;
    this.completedRounds = round;
    this.grantReward(`Round ${round} reward`, { round }, () =>
      this.rewards?.grantRoundCompletionReward(round)
    );
    this.log.emit({ type: 'round', message: `Round ${round} defeated`, metadata: { round } });
    this.events.emit('round:completed', { round });
    this.deferred.schedule(this.rules.phases.defenseEndDelaySeconds, RETURN_TO_BUILDING, () =>
      this.returnToBuilding()
    );
  }

  private returnToBuilding(): void {
    if (this.status !== GameStatus.PLAYING) {
      return;
    }
    this.phase = GamePhase.BUILDING;
    this.activeRound = null;
    this.gate.openBuildingPhase(this.deferred.now());
    this.stageSpawnPoints();
    this.log.emit({
      type: 'phase',
      message: 'Returning to building phase',
      metadata: { nextRound: this.completedRounds + 1 }
    });
    this.events.emit('phase:changed', { phase: this.phase, round: this.completedRounds + 1 });
  }

  /** Lay out the next round's spawn points so players can see them while building. */
  private stageSpawnPoints(): void {
    const round = this.completedRounds + 1;
    const anchorAngle = this.random() * Math.PI * 2;
    this.releaseStagedSpawners();
    const positions = generateSpawnPositions(round, anchorAngle, this.rules.spawn);
    this.staged = positions.map((point) => this.provisionSpawnPoint(point));
    this.stagedRound = round;
    const missingSpawners = this.staged.filter((staged) => staged.spawner === null).length;
    if (missingSpawners > 0) {
      this.warn('config', `No spawner available for ${missingSpawners} spawn point(s)`, {
        round,
        missingSpawners
      });
    }
    this.events.emit('spawn-points:staged', {
      round,
      anchorAngle,
      points: this.staged.map((staged) => staged.point),
      missingSpawners
    });
  }

  private provisionSpawnPoint(point: SpawnPoint): StagedSpawnPoint {
    let spawner: SpawnerHandle | null = null;
    try {
      spawner = this.units.provisionSpawner(point.position);
    } catch (error) {
      this.warn('config', `Spawner provisioning failed at point ${point.index}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
    const scatter = spawner?.scatterRadius;
    const localSpawnRadius =
      typeof scatter === 'number' && Number.isFinite(scatter) && scatter >= 0
        ? scatter
        : this.rules.spawn.defaultScatterRadius;
    return { point: { ...point, localSpawnRadius }, spawner };
  }

  private releaseStagedSpawners(): void {
    for (const staged of this.staged) {
      if (staged.spawner) {
        this.units.releaseSpawner?.(staged.spawner);
      }
    }
    this.staged = [];
    this.stagedRound = null;
  }

  private warn(
    type: 'system' | 'phase' | 'config' | 'economy',
    message: string,
    metadata?: LogEventMetadata
  ): void {
    this.log.emit({ type, level: 'warn', message: `RoundLifecycle: ${message}`, metadata });
  }
}
