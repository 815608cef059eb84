import type { UnitCatalog, UnitTypeSpec, UnitTypeTag } from '../data/unitCatalog.ts';
import { pickUniform, type RandomSource } from '../lib/random.ts';

export interface WaveCompositionRequest {
  readonly round: number;
  readonly budget: number;
  readonly cap: number;
  readonly bossQuota: number;
  readonly bossTag: UnitTypeTag;
  readonly catalog: UnitCatalog;
}

export type WaveStopReason = 'budget-exhausted' | 'nothing-affordable' | 'cap-reached';

export interface WaveComposition {
  /** Bosses first, then budget-filled types (upgrades replace entries in place). */
  readonly allocation: readonly UnitTypeTag[];
  readonly bossCount: number;
  /** Budget consumed by non-boss entries; bosses are free. */
  readonly budgetSpent: number;
  readonly budgetRemaining: number;
  readonly upgrades: number;
  readonly stopReason: WaveStopReason;
}

function findWeakestIndex(
  allocation: readonly UnitTypeTag[],
  bossTag: UnitTypeTag,
  catalog: UnitCatalog
): number {
  let weakestIndex = -1;
  let weakestCost = Infinity;
  allocation.forEach((tag, index) => {
    if (tag === bossTag) {
      return;
    }
    const cost = catalog.costOf(tag);
    if (cost < weakestCost) {
      weakestCost = cost;
      weakestIndex = index;
    }
  });
  return weakestIndex;
}

/**
 * Greedy exchange: keep swapping the cheapest non-boss entry for the most
 * expensive type whose extra cost still fits. Stops at the first state where
 * no swap fits, which is a local optimum rather than the best possible spend.
 */
function applyUpgrades(
  allocation: UnitTypeTag[],
  unlocked: readonly UnitTypeSpec[],
  remainingBudget: number,
  request: WaveCompositionRequest
): { remaining: number; upgrades: number } {
  const strongestFirst = [...unlocked].sort((a, b) => b.threatCost - a.threatCost);
  let remaining = remainingBudget;
  let upgrades = 0;
  while (remaining > 0) {
    const weakestIndex = findWeakestIndex(allocation, request.bossTag, request.catalog);
    if (weakestIndex === -1) {
      break;
    }
    const weakestCost = request.catalog.costOf(allocation[weakestIndex]);
    const replacement = strongestFirst.find((spec) => {
      const delta = spec.threatCost - weakestCost;
      return delta > 0 && delta <= remaining;
    });
    if (!replacement) {
      break;
    }
    allocation[weakestIndex] = replacement.tag;
    remaining -= replacement.threatCost - weakestCost;
    upgrades += 1;
  }
  return { remaining, upgrades };
}

export function composeWave(request: WaveCompositionRequest, random: RandomSource): WaveComposition {
  const cap = Math.max(0, Math.floor(request.cap));
  const allocation: UnitTypeTag[] = [];

  const bossCount = Math.min(cap, Math.max(0, Math.floor(request.bossQuota)));
  for (let index = 0; index < bossCount; index += 1) {
    allocation.push(request.bossTag);
  }

  const unlocked = request.catalog.unlockedFor(request.round, request.bossTag);
  const initialBudget = Math.max(0, request.budget);
  let remaining = initialBudget;
  let stopReason: WaveStopReason = 'budget-exhausted';

  while (remaining > 0) {
    if (allocation.length >= cap) {
      stopReason = 'cap-reached';
      break;
    }
    const affordable = unlocked.filter((spec) => spec.threatCost <= remaining);
    if (affordable.length === 0) {
      stopReason = 'nothing-affordable';
      break;
    }
    // Uniform rather than cost-weighted: cheap types stay affordable longest and dominate late picks.
    const pick = pickUniform(affordable, random);
    allocation.push(pick.tag);
    remaining -= pick.threatCost;
  }

  let upgrades = 0;
  if (stopReason === 'cap-reached') {
    const result = applyUpgrades(allocation, unlocked, remaining, request);
    remaining = result.remaining;
    upgrades = result.upgrades;
  }

  return {
    allocation: Object.freeze(allocation),
    bossCount,
    budgetSpent: initialBudget - remaining,
    budgetRemaining: remaining,
    upgrades,
    stopReason
  } satisfies WaveComposition;
}
