import type { BossRules, BudgetRules, PopulationRules } from '../config/roundRules.ts';

function assertRound(round: number): void {
  if (!Number.isInteger(round) || round < 1) {
    throw new RangeError(`Round number must be a positive integer, received ${round}`);
  }
}

/** `initialBudget + incrementFactor * round² / 2`, truncated. */
export function computeThreatBudget(round: number, rules: BudgetRules): number {
  assertRound(round);
  return rules.initialBudget + Math.trunc((rules.incrementFactor * round * round) / 2);
}

/** Cap scales linearly (reaching `basePerRoundCap` at round 20) and never drops below the floor. */
export function computePopulationCap(round: number, rules: PopulationRules): number {
  assertRound(round);
  return Math.max(rules.floorBaseline, Math.round((rules.basePerRoundCap * round) / 20));
}

/**
 * Bosses are owed on every `interval`-th round, but only once the boss type
 * has unlocked: round 5 with an unlock round of 7 owes none.
 */
export function computeBossQuota(
  round: number,
  rules: Pick<BossRules, 'interval'>,
  bossUnlockRound: number
): number {
  assertRound(round);
  if (round % rules.interval !== 0 || round < bossUnlockRound) {
    return 0;
  }
  return Math.floor(round / rules.interval);
}
