import type { UnitTypeTag } from '../../data/unitCatalog.ts';
import type { StorageLike } from '../../logging/logStore.ts';
import type { RoundContext } from '../../sim/roundContext.ts';
import type { WaveComposition } from '../../sim/WaveComposer.ts';
import {
  emitStructuredTelemetry,
  loadStructuredTelemetry,
  persistStructuredTelemetry
} from './structured.ts';

export const ROUND_TELEMETRY_KEY = 'telemetry:round-composition:summaries';
const ROUND_TELEMETRY_EVENT = 'round-composition';

export interface RoundCompositionSummary {
  readonly timestamp: number;
  readonly round: number;
  readonly threatBudget: number;
  readonly budgetSpent: number;
  readonly budgetRemaining: number;
  readonly populationCap: number;
  readonly bossQuota: number;
  readonly unitCount: number;
  readonly unitCounts: Readonly<Record<string, number>>;
  readonly spawnPointCount: number;
  readonly upgrades: number;
  readonly stopReason: string;
}

export interface RoundTelemetryOptions {
  readonly storage?: StorageLike | null;
  readonly limit?: number;
  readonly now?: () => number;
}

export function countUnitTags(allocation: readonly UnitTypeTag[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const tag of allocation) {
    counts[tag] = (counts[tag] ?? 0) + 1;
  }
  return counts;
}

export function recordRoundTelemetry(
  context: RoundContext,
  composition: WaveComposition,
  spawnPointCount: number,
  options: RoundTelemetryOptions = {}
): void {
  const payload = {
    round: context.roundNumber,
    threatBudget: context.threatBudget,
    budgetSpent: composition.budgetSpent,
    budgetRemaining: composition.budgetRemaining,
    populationCap: context.populationCap,
    bossQuota: context.bossQuota,
    unitCount: composition.allocation.length,
    unitCounts: countUnitTags(composition.allocation),
    spawnPointCount,
    upgrades: composition.upgrades,
    stopReason: composition.stopReason
  };
  const entry = emitStructuredTelemetry(ROUND_TELEMETRY_EVENT, payload, options.now);
  persistStructuredTelemetry(ROUND_TELEMETRY_KEY, entry, {
    limit: options.limit ?? 24,
    storage: options.storage
  });
}

function readNumber(payload: Record<string, unknown>, key: string): number | null {
  const value = payload[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readCounts(value: unknown): Record<string, number> {
  const counts: Record<string, number> = {};
  if (typeof value !== 'object' || value === null) {
    return counts;
  }
  for (const [tag, count] of Object.entries(value)) {
    if (typeof count === 'number' && Number.isFinite(count)) {
      counts[tag] = count;
    }
  }
  return counts;
}

/** Persisted round summaries, newest first. Entries with a missing round or budget are skipped. */
export function selectRoundSummaries(
  storage?: StorageLike | null
): RoundCompositionSummary[] {
  const entries = loadStructuredTelemetry(ROUND_TELEMETRY_KEY, storage);
  const summaries: RoundCompositionSummary[] = [];
  for (const entry of entries) {
    if (entry.event !== ROUND_TELEMETRY_EVENT) {
      continue;
    }
    const payload = entry.payload;
    const round = readNumber(payload, 'round');
    const threatBudget = readNumber(payload, 'threatBudget');
    if (round === null || threatBudget === null) {
      continue;
    }
    summaries.push({
      timestamp: entry.timestamp,
      round,
      threatBudget,
      budgetSpent: readNumber(payload, 'budgetSpent') ?? 0,
      budgetRemaining: readNumber(payload, 'budgetRemaining') ?? 0,
      populationCap: readNumber(payload, 'populationCap') ?? 0,
      bossQuota: readNumber(payload, 'bossQuota') ?? 0,
      unitCount: readNumber(payload, 'unitCount') ?? 0,
      unitCounts: readCounts(payload.unitCounts),
      spawnPointCount: readNumber(payload, 'spawnPointCount') ?? 0,
      upgrades: readNumber(payload, 'upgrades') ?? 0,
      stopReason: typeof payload.stopReason === 'string' ? payload.stopReason : 'unknown'
    });
  }
  summaries.sort((a, b) => b.timestamp - a.timestamp || b.round - a.round);
  return summaries;
}
