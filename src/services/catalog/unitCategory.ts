export type UnitCategory = 'WEIGHT' | 'VOLUME' | 'UNIT';

// Grams / millilitres per unit
const WEIGHT: Record<string, number> = { kg: 1000, g: 1 };
const VOLUME: Record<string, number> = { l: 1000, ml: 1 };

const SYNONYMS: Record<string, string> = {
  kgs: 'kg',
  kilo: 'kg',
  kilos: 'kg',
  kilogram: 'kg',
  kilograms: 'kg',
  gr: 'g',
  gm: 'g',
  gram: 'g',
  grams: 'g',
  lt: 'l',
  ltr: 'l',
  litre: 'l',
  litres: 'l',
  liter: 'l',
  liters: 'l',
  millilitre: 'ml',
  millilitres: 'ml',
  milliliter: 'ml',
  milliliters: 'ml',
  ea: 'each',
  pc: 'piece',
  pcs: 'piece',
  pieces: 'piece',
  pk: 'packet',
  pkt: 'packet',
  pckt: 'packet',
  pkts: 'packet',
  packets: 'packet',
  bags: 'bag',
  boxes: 'box',
  bunches: 'bunch',
  heads: 'head',
  punnets: 'punnet',
  trays: 'tray',
  crates: 'crate',
  bundles: 'bundle',
};

// Units that can stand in for each other when filtering / scoring (not converted)
const COMPATIBLE_GROUPS: ReadonlyArray<ReadonlySet<string>> = [
  new Set(['kg', 'g']),
  new Set(['l', 'ml']),
  new Set(['piece', 'each']),
  new Set(['bag', 'packet', 'pack']),
  new Set(['box', 'tray']),
];

/** Lower-cases a unit label and maps abbreviations / plurals onto one spelling. */
export function canonicalizeUnit(raw: string | null | undefined): string | null {
  const v = (raw ?? '').trim().toLowerCase().replace(/\.$/, '');
  if (!v) return null;
  return SYNONYMS[v] ?? v;
}

export function mapUnitCategory(unit: string | null | undefined): UnitCategory {
  const u = canonicalizeUnit(unit);
  if (!u) return 'UNIT';
  if (u in WEIGHT) return 'WEIGHT';
  if (u in VOLUME) return 'VOLUME';
  return 'UNIT';
}

export function isMeasureUnit(unit: string | null | undefined): boolean {
  return mapUnitCategory(unit) !== 'UNIT';
}

export function areUnitsCompatible(a: string | null | undefined, b: string | null | undefined): boolean {
  const ua = canonicalizeUnit(a);
  const ub = canonicalizeUnit(b);
  if (!ua || !ub) return false;
  if (ua === ub) return true;
  return COMPATIBLE_GROUPS.some((group) => group.has(ua) && group.has(ub));
}

/**
 * Converts a quantity between units of the same measure (kg <-> g, l <-> ml).
 * Returns null when the units cannot be converted; count units only convert to themselves.
 */
export function convertQuantity(quantity: number, from: string, to: string): number | null {
  const f = canonicalizeUnit(from);
  const t = canonicalizeUnit(to);
  if (!f || !t) return null;
  if (f === t) return quantity;

  const table = f in WEIGHT && t in WEIGHT ? WEIGHT : f in VOLUME && t in VOLUME ? VOLUME : null;
  if (!table) return null;
  return roundQuantity((quantity * table[f]) / table[t]);
}

/** Quantities are tracked to three decimals (grams of a kg, ml of a litre). */
export function roundQuantity(n: number): number {
  return Math.round(n * 1000) / 1000;
}
