import defaultCatalogData from '../content/units.json';

export const UNIT_TYPE_TAGS = [
  'regular',
  'fast',
  'attack',
  'armored',
  'exploder',
  'teleporter',
  'boss'
] as const;

export type UnitTypeTag = (typeof UNIT_TYPE_TAGS)[number];

export interface UnitTypeSpec {
  readonly tag: UnitTypeTag;
  readonly label: string;
  /** Price in threat budget; also the reward granted when a unit of this type is killed. */
  readonly threatCost: number;
  /** First round (inclusive) in which the type may appear. */
  readonly unlockRound: number;
}

export function isUnitTypeTag(value: unknown): value is UnitTypeTag {
  return UNIT_TYPE_TAGS.some((tag) => tag === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toPositiveInteger(value: unknown, context: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`Expected positive integer at ${context}`);
  }
  return value;
}

function toTag(value: unknown, context: string): UnitTypeTag {
  if (!isUnitTypeTag(value)) {
    throw new Error(`Unknown unit type tag at ${context}: ${String(value)}`);
  }
  return value;
}

function parseUnitTypeSpec(value: unknown, context: string): UnitTypeSpec {
  if (!isRecord(value)) {
    throw new Error(`Expected object at ${context}`);
  }
  const tag = toTag(value.tag, `${context}.tag`);
  const label =
    typeof value.label === 'string' && value.label.trim().length > 0 ? value.label.trim() : tag;
  const threatCost = toPositiveInteger(value.threatCost, `${context}.threatCost`);
  const unlockRound = toPositiveInteger(value.unlockRound, `${context}.unlockRound`);
  return Object.freeze({ tag, label, threatCost, unlockRound });
}

/**
 * Immutable registry of the hostile unit types a wave may contain, kept in
 * declaration order so composition draws are reproducible.
 */
export class UnitCatalog {
  private readonly byTag: ReadonlyMap<UnitTypeTag, UnitTypeSpec>;

  constructor(
    private readonly specs: readonly UnitTypeSpec[],
    readonly basicTag: UnitTypeTag
  ) {
    const map = new Map<UnitTypeTag, UnitTypeSpec>();
    for (const spec of specs) {
      if (map.has(spec.tag)) {
        throw new Error(`Duplicate unit type tag: ${spec.tag}`);
      }
      map.set(spec.tag, spec);
    }
    const basic = map.get(basicTag);
    if (!basic) {
      throw new Error(`Unit catalog is missing its basic type: ${basicTag}`);
    }
    if (basic.unlockRound !== 1) {
      throw new Error(`Basic unit type ${basicTag} must unlock in round 1`);
    }
    this.byTag = map;
  }

  get(tag: UnitTypeTag): UnitTypeSpec | null {
    return this.byTag.get(tag) ?? null;
  }

  has(tag: UnitTypeTag): boolean {
    return this.byTag.has(tag);
  }

  list(): readonly UnitTypeSpec[] {
    return this.specs;
  }

  /** Types available in `round`, optionally leaving one tag out. */
  unlockedFor(round: number, exclude?: UnitTypeTag): UnitTypeSpec[] {
    return this.specs.filter((spec) => spec.unlockRound <= round && spec.tag !== exclude);
  }

  costOf(tag: UnitTypeTag): number {
    return this.byTag.get(tag)?.threatCost ?? 0;
  }
}

export function parseUnitCatalog(data: unknown, context = 'units.json'): UnitCatalog {
  if (!isRecord(data)) {
    throw new Error(`Expected object at ${context}`);
  }
  const basicTag = toTag(data.basicTag, `${context}.basicTag`);
  if (!Array.isArray(data.units) || data.units.length === 0) {
    throw new Error(`Expected non-empty units array at ${context}.units`);
  }
  const specs = data.units.map((entry, index) =>
    parseUnitTypeSpec(entry, `${context}.units[${index}]`)
  );
  return new UnitCatalog(Object.freeze(specs), basicTag);
}

let defaultCatalog: UnitCatalog | null = null;

export function getDefaultUnitCatalog(): UnitCatalog {
  if (!defaultCatalog) {
    defaultCatalog = parseUnitCatalog(defaultCatalogData);
  }
  return defaultCatalog;
}
