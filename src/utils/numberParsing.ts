export type MoneyKind = 'UNIT_PRICE' | 'LINE_TOTAL';

export type ParsedMoney = {
  value: number | null;
  confidence: 'HIGH' | 'MEDIUM' | 'LOW';
  reason?: 'AMBIGUOUS_DECIMAL_SEPARATOR' | 'INVALID_FORMAT';
};

// "1.234" as a unit price is read as 1.234 only up to this value; above it, it may be a thousands group
export const UNIT_PRICE_MAX_REASONABLE_FOR_3DP = 100;

const invalid: ParsedMoney = { value: null, confidence: 'LOW', reason: 'INVALID_FORMAT' };
const ambiguous: ParsedMoney = { value: null, confidence: 'LOW', reason: 'AMBIGUOUS_DECIMAL_SEPARATOR' };

function maxDecimalsFor(kind: MoneyKind): number {
  return kind === 'UNIT_PRICE' ? 4 : 2;
}

function finalize(normalized: string, kind: MoneyKind, confidence: 'HIGH' | 'MEDIUM'): ParsedMoney {
  const n = Number(normalized);
  if (!Number.isFinite(n)) return invalid;

  const fraction = normalized.match(/\.(\d+)$/);
  if ((fraction?.[1].length ?? 0) > maxDecimalsFor(kind)) return invalid;

  // Unit prices keep their precision; totals are money
  const value = kind === 'UNIT_PRICE' ? n : Math.round(n * 100) / 100;
  return { value, confidence };
}

function parseCommaOnly(cleaned: string, kind: MoneyKind): ParsedMoney {
  const parts = cleaned.split(',');
  if (parts.length > 2) {
    return /^-?\d{1,3}(?:,\d{3})+$/.test(cleaned) ? finalize(cleaned.replace(/,/g, ''), kind, 'HIGH') : ambiguous;
  }

  const [lhs, rhs] = parts;
  // 27,50 -> decimal comma
  if (rhs.length <= 2) return finalize(`${lhs}.${rhs}`, kind, 'MEDIUM');
  // 1,234 -> thousands comma
  if (rhs.length === 3 && /^\d{1,3}$/.test(lhs.replace(/^-/, ''))) return finalize(`${lhs}${rhs}`, kind, 'HIGH');
  return ambiguous;
}

function parseDotOnly(cleaned: string, kind: MoneyKind, confidence: 'HIGH' | 'MEDIUM'): ParsedMoney {
  const parts = cleaned.split('.');
  if (parts.length !== 2) return invalid;
  const fraction = parts[1];

  if (fraction.length === 3) {
    if (kind !== 'UNIT_PRICE') return ambiguous;
    return Math.abs(Number(cleaned)) <= UNIT_PRICE_MAX_REASONABLE_FOR_3DP ? finalize(cleaned, kind, confidence) : ambiguous;
  }
  return finalize(cleaned, kind, confidence);
}

/**
 * Locale-tolerant money parser for OCR-extracted invoice amounts ("R27.00", "1 234,50", "(79,10)").
 *
 * Thousands separators are accepted only in unambiguous positions: for totals "1.234" is ambiguous
 * rather than 1234, and unit prices take up to 4 decimals.
 */
export function parseMoneyLike(input: unknown, kind: MoneyKind): ParsedMoney {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? finalize(String(input), kind, 'HIGH') : invalid;
  }
  if (typeof input !== 'string') return invalid;

  let raw = input.replace(/\u00A0/g, ' ').trim();
  let normalizedShape = false;
  // (79,10) -> -79,10
  if (/^\(.*\d.*\)$/.test(raw)) {
    raw = `-${raw.slice(1, -1)}`;
    normalizedShape = true;
  }

  const cleaned = raw
    .replace(/[A-Za-z]/g, '')
    .replace(/[$€£¥]/g, '')
    .replace(/\s+/g, '')
    .replace(/(?!^)-/g, '');

  if (!/^-?[0-9.,]+$/.test(cleaned) || !/\d/.test(cleaned)) return invalid;

  const confidence = normalizedShape || cleaned !== raw ? 'MEDIUM' : 'HIGH';
  const hasDot = cleaned.includes('.');
  const hasComma = cleaned.includes(',');

  if (hasDot && hasComma) {
    // The rightmost separator is the decimal one
    const decimalIsDot = cleaned.lastIndexOf('.') > cleaned.lastIndexOf(',');
    const valid = decimalIsDot
      ? /^-?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/.test(cleaned)
      : /^-?\d{1,3}(?:\.\d{3})+(?:,\d+)?$/.test(cleaned);
    if (!valid) return ambiguous;
    const normalized = decimalIsDot ? cleaned.replace(/,/g, '') : cleaned.replace(/\./g, '').replace(',', '.');
    return finalize(normalized, kind, 'HIGH');
  }

  if (hasComma) return parseCommaOnly(cleaned, kind);
  if (hasDot) return parseDotOnly(cleaned, kind, confidence);
  return finalize(cleaned, kind, confidence);
}
