import type { RoundRules } from '../config/roundRules.ts';
import {
  computeBossQuota,
  computePopulationCap,
  computeThreatBudget
} from '../data/budgetCurves.ts';
import type { UnitCatalog } from '../data/unitCatalog.ts';

export interface RoundContext {
  readonly roundNumber: number;
  readonly threatBudget: number;
  readonly populationCap: number;
  readonly bossQuota: number;
}

export interface RoundContextResult {
  readonly context: RoundContext;
  /** False when the configured boss tag has no catalog entry; the quota is then forced to 0. */
  readonly bossAvailable: boolean;
}

export function createRoundContext(
  roundNumber: number,
  rules: RoundRules,
  catalog: UnitCatalog
): RoundContextResult {
  const boss = catalog.get(rules.boss.tag);
  const bossQuota = boss ? computeBossQuota(roundNumber, rules.boss, boss.unlockRound) : 0;
  const context: RoundContext = Object.freeze({
    roundNumber,
    threatBudget: computeThreatBudget(roundNumber, rules.budget),
    populationCap: computePopulationCap(roundNumber, rules.population),
    bossQuota
  });
  return { context, bossAvailable: boss !== null };
}
