/**
 * Lenient numeric field parsing. Malformed input means "absent", never an error.
 */

const MISSING_TOKENS = new Set(['', '.', '-', 'na', 'nan', 'null', 'none']);

function isMissing(text: string): boolean {
  return MISSING_TOKENS.has(text.trim().toLowerCase());
}

/**
 * Positive integer or null (zero, negatives, decimals and junk are all null)
 */
export function parsePositiveInteger(text: string | number | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  if (typeof text === 'number') {
    return Number.isSafeInteger(text) && text > 0 ? text : null;
  }
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/**
 * Finite number or null. `0` is a value, not an absence.
 */
export function parseFiniteNumber(text: string | number | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  if (typeof text === 'number') {
    return Number.isFinite(text) ? text : null;
  }
  if (isMissing(text)) return null;

  const value = Number(text.trim());
  return Number.isFinite(value) ? value : null;
}

/**
 * Trimmed text, or null for the placeholder tokens sources use for "no value"
 */
export function parseOptionalText(text: string | null | undefined): string | null {
  if (text === null || text === undefined || isMissing(text)) return null;
  return text.trim();
}
