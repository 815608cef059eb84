import rulesData from '../content/rules.json';
import { isUnitTypeTag, type UnitTypeTag } from '../data/unitCatalog.ts';
import type { Vec2 } from '../lib/vec2.ts';

export interface BudgetRules {
  readonly initialBudget: number;
  readonly incrementFactor: number;
}

export interface PopulationRules {
  /** Smallest cap any round may have. */
  readonly floorBaseline: number;
  /** Cap reached at round 20; the cap grows linearly towards it. */
  readonly basePerRoundCap: number;
}

export interface BossRules {
  readonly tag: UnitTypeTag;
  /** Bosses appear on rounds divisible by this value. */
  readonly interval: number;
}

export interface SpawnRules {
  readonly circleRadius: number;
  readonly circleCenter: Vec2;
  /** Rounds between each additional spawn point. */
  readonly pointInterval: number;
  readonly defaultScatterRadius: number;
  readonly minSpawnDelay: number;
  readonly maxSpawnDelay: number;
}

export interface PhaseRules {
  readonly minimumBuildingSeconds: number;
  readonly defenseEndDelaySeconds: number;
}

export interface EconomyRules {
  readonly startingTritium: number;
  readonly roundCompletionReward: number;
}

export interface RoundRules {
  readonly budget: BudgetRules;
  readonly population: PopulationRules;
  readonly boss: BossRules;
  readonly spawn: SpawnRules;
  readonly phases: PhaseRules;
  readonly economy: EconomyRules;
}

export type RoundRulesOverrides = {
  readonly [K in keyof RoundRules]?: Partial<RoundRules[K]>;
};

interface NumberRule {
  readonly min: number;
  readonly max?: number;
  readonly integer?: boolean;
}

const NON_NEGATIVE: NumberRule = { min: 0 };
const NON_NEGATIVE_INT: NumberRule = { min: 0, integer: true };
const POSITIVE_INT: NumberRule = { min: 1, integer: true };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function requireNumber(value: unknown, rule: NumberRule, context: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Expected number at ${context}`);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new Error(`Expected integer at ${context}`);
  }
  if (value < rule.min || (rule.max !== undefined && value > rule.max)) {
    throw new Error(`Value out of range at ${context}: ${value}`);
  }
  return value;
}

function requireSection(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = data[key];
  if (!isRecord(section)) {
    throw new Error(`Expected object at rules.${key}`);
  }
  return section;
}

function requireVec2(value: unknown, context: string): Vec2 {
  if (!isRecord(value)) {
    throw new Error(`Expected point at ${context}`);
  }
  return Object.freeze({
    x: requireNumber(value.x, { min: -Infinity }, `${context}.x`),
    y: requireNumber(value.y, { min: -Infinity }, `${context}.y`)
  });
}

export function parseRoundRules(data: unknown): RoundRules {
  if (!isRecord(data)) {
    throw new Error('Expected object at rules');
  }
  const budget = requireSection(data, 'budget');
  const population = requireSection(data, 'population');
  const boss = requireSection(data, 'boss');
  const spawn = requireSection(data, 'spawn');
  const phases = requireSection(data, 'phases');
  const economy = requireSection(data, 'economy');
  if (!isUnitTypeTag(boss.tag)) {
    throw new Error(`Unknown unit type tag at rules.boss.tag: ${String(boss.tag)}`);
  }
  const minSpawnDelay = requireNumber(spawn.minSpawnDelay, NON_NEGATIVE, 'rules.spawn.minSpawnDelay');
  const rules: RoundRules = {
    budget: {
      initialBudget: requireNumber(budget.initialBudget, NON_NEGATIVE_INT, 'rules.budget.initialBudget'),
      incrementFactor: requireNumber(budget.incrementFactor, NON_NEGATIVE, 'rules.budget.incrementFactor')
    },
    population: {
      floorBaseline: requireNumber(population.floorBaseline, POSITIVE_INT, 'rules.population.floorBaseline'),
      basePerRoundCap: requireNumber(population.basePerRoundCap, NON_NEGATIVE, 'rules.population.basePerRoundCap')
    },
    boss: {
      tag: boss.tag,
      interval: requireNumber(boss.interval, POSITIVE_INT, 'rules.boss.interval')
    },
    spawn: {
      circleRadius: requireNumber(spawn.circleRadius, NON_NEGATIVE, 'rules.spawn.circleRadius'),
      circleCenter: requireVec2(spawn.circleCenter, 'rules.spawn.circleCenter'),
      pointInterval: requireNumber(spawn.pointInterval, POSITIVE_INT, 'rules.spawn.pointInterval'),
      defaultScatterRadius: requireNumber(
        spawn.defaultScatterRadius,
        NON_NEGATIVE,
        'rules.spawn.defaultScatterRadius'
      ),
      minSpawnDelay,
      maxSpawnDelay: requireNumber(
        spawn.maxSpawnDelay,
        { min: minSpawnDelay },
        'rules.spawn.maxSpawnDelay'
      )
    },
    phases: {
      minimumBuildingSeconds: requireNumber(
        phases.minimumBuildingSeconds,
        NON_NEGATIVE,
        'rules.phases.minimumBuildingSeconds'
      ),
      defenseEndDelaySeconds: requireNumber(
        phases.defenseEndDelaySeconds,
        NON_NEGATIVE,
        'rules.phases.defenseEndDelaySeconds'
      )
    },
    economy: {
      startingTritium: requireNumber(economy.startingTritium, NON_NEGATIVE_INT, 'rules.economy.startingTritium'),
      roundCompletionReward: requireNumber(
        economy.roundCompletionReward,
        NON_NEGATIVE_INT,
        'rules.economy.roundCompletionReward'
      )
    }
  };
  return freezeRules(rules);
}

function freezeRules(rules: RoundRules): RoundRules {
  return Object.freeze({
    budget: Object.freeze({ ...rules.budget }),
    population: Object.freeze({ ...rules.population }),
    boss: Object.freeze({ ...rules.boss }),
    spawn: Object.freeze({ ...rules.spawn, circleCenter: Object.freeze({ ...rules.spawn.circleCenter }) }),
    phases: Object.freeze({ ...rules.phases }),
    economy: Object.freeze({ ...rules.economy })
  });
}

export const DEFAULT_ROUND_RULES: RoundRules = parseRoundRules(rulesData);

function sanitizeNumber(value: unknown, fallback: number, rule: NumberRule, context: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    console.warn(`Round rules: ignoring invalid ${context} (${String(value)}), keeping ${fallback}.`);
    return fallback;
  }
  const numeric = rule.integer ? Math.trunc(value) : value;
  const upper = rule.max ?? Infinity;
  const clamped = Math.min(upper, Math.max(rule.min, numeric));
  if (clamped !== value) {
    console.warn(`Round rules: ${context} adjusted from ${value} to ${clamped}.`);
  }
  return clamped;
}

function sanitizeVec2(value: Vec2 | undefined, fallback: Vec2, context: string): Vec2 {
  if (value === undefined) {
    return fallback;
  }
  return {
    x: sanitizeNumber(value.x, fallback.x, { min: -Infinity }, `${context}.x`),
    y: sanitizeNumber(value.y, fallback.y, { min: -Infinity }, `${context}.y`)
  };
}

/**
 * Merge partial overrides over `base`. Invalid values fall back to the base
 * value and out-of-range values are clamped; both are reported with a warning.
 */
export function resolveRoundRules(
  overrides: RoundRulesOverrides = {},
  base: RoundRules = DEFAULT_ROUND_RULES
): RoundRules {
  const budget = overrides.budget ?? {};
  const population = overrides.population ?? {};
  const boss = overrides.boss ?? {};
  const spawn = overrides.spawn ?? {};
  const phases = overrides.phases ?? {};
  const economy = overrides.economy ?? {};

  let bossTag = base.boss.tag;
  if (boss.tag !== undefined) {
    if (isUnitTypeTag(boss.tag)) {
      bossTag = boss.tag;
    } else {
      console.warn(`Round rules: ignoring unknown boss tag ${String(boss.tag)}.`);
    }
  }

  const minSpawnDelay = sanitizeNumber(
    spawn.minSpawnDelay,
    base.spawn.minSpawnDelay,
    NON_NEGATIVE,
    'spawn.minSpawnDelay'
  );
  const maxSpawnDelay = sanitizeNumber(
    spawn.maxSpawnDelay,
    Math.max(minSpawnDelay, base.spawn.maxSpawnDelay),
    { min: minSpawnDelay },
    'spawn.maxSpawnDelay'
  );

  return freezeRules({
    budget: {
      initialBudget: sanitizeNumber(
        budget.initialBudget,
        base.budget.initialBudget,
        NON_NEGATIVE_INT,
        'budget.initialBudget'
      ),
      incrementFactor: sanitizeNumber(
        budget.incrementFactor,
        base.budget.incrementFactor,
        NON_NEGATIVE,
        'budget.incrementFactor'
      )
    },
    population: {
      floorBaseline: sanitizeNumber(
        population.floorBaseline,
        base.population.floorBaseline,
        POSITIVE_INT,
        'population.floorBaseline'
      ),
      basePerRoundCap: sanitizeNumber(
        population.basePerRoundCap,
        base.population.basePerRoundCap,
        NON_NEGATIVE,
        'population.basePerRoundCap'
      )
    },
    boss: {
      tag: bossTag,
      interval: sanitizeNumber(boss.interval, base.boss.interval, POSITIVE_INT, 'boss.interval')
    },
    spawn: {
      circleRadius: sanitizeNumber(
        spawn.circleRadius,
        base.spawn.circleRadius,
        NON_NEGATIVE,
        'spawn.circleRadius'
      ),
      circleCenter: sanitizeVec2(spawn.circleCenter, base.spawn.circleCenter, 'spawn.circleCenter'),
      pointInterval: sanitizeNumber(
        spawn.pointInterval,
        base.spawn.pointInterval,
        POSITIVE_INT,
        'spawn.pointInterval'
      ),
      defaultScatterRadius: sanitizeNumber(
        spawn.defaultScatterRadius,
        base.spawn.defaultScatterRadius,
        NON_NEGATIVE,
        'spawn.defaultScatterRadius'
      ),
      minSpawnDelay,
      maxSpawnDelay
    },
    phases: {
      minimumBuildingSeconds: sanitizeNumber(
        phases.minimumBuildingSeconds,
        base.phases.minimumBuildingSeconds,
        NON_NEGATIVE,
        'phases.minimumBuildingSeconds'
      ),
      defenseEndDelaySeconds: sanitizeNumber(
        phases.defenseEndDelaySeconds,
        base.phases.defenseEndDelaySeconds,
        NON_NEGATIVE,
        'phases.defenseEndDelaySeconds'
      )
    },
    economy: {
      startingTritium: sanitizeNumber(
        economy.startingTritium,
        base.economy.startingTritium,
        NON_NEGATIVE_INT,
        'economy.startingTritium'
      ),
      roundCompletionReward: sanitizeNumber(
        economy.roundCompletionReward,
        base.economy.roundCompletionReward,
        NON_NEGATIVE_INT,
        'economy.roundCompletionReward'
      )
    }
  });
}
