/**
 * Loss-of-function classification and nonsense-mediated decay (NMD) escape
 */

export const LOF_TYPES = ['nonsense', 'frameshift', 'splice_donor', 'splice_acceptor'] as const;
export type LofType = (typeof LOF_TYPES)[number];

export type LofteeConfidence = 'HC' | 'LC';

/** Consequence substrings checked in order when the protein change is not decisive */
const CONSEQUENCE_RULES: ReadonlyArray<readonly [string, LofType]> = [
  ['splice_donor', 'splice_donor'],
  ['splice_acceptor', 'splice_acceptor'],
  ['stop_gained', 'nonsense'],
  ['frameshift', 'frameshift'],
];

/** Truncation past this fraction of the protein escapes NMD */
export const NMD_ESCAPE_FRACTION = 0.9;

/**
 * Protein change first (stop marker without frameshift -> nonsense, frameshift
 * marker -> frameshift), then the consequence tag. `hgvsC` is accepted for
 * call-site symmetry; the coding change alone does not decide the type.
 */
export function classifyLofType(
  hgvsC: string | null | undefined,
  hgvsP: string | null | undefined,
  consequence: string | null | undefined
): LofType | null {
  if (hgvsP) {
    if (hgvsP.includes('Ter') && !hgvsP.includes('fs')) {
      return 'nonsense';
    }
    if (hgvsP.includes('fs')) {
      return 'frameshift';
    }
  }

  if (consequence) {
    for (const [marker, type] of CONSEQUENCE_RULES) {
      if (consequence.includes(marker)) {
        return type;
      }
    }
  }

  return null;
}

/**
 * Position / length, clamped to [0, 1]. A non-positive length yields 0.
 */
export function truncationFraction(position: number, proteinLength: number): number {
  if (proteinLength <= 0) {
    return 0.0;
  }
  return Math.min(1, Math.max(0, position / proteinLength));
}

/**
 * Either condition alone is sufficient: last exon, or truncation past 90%.
 */
export function predictNmdEscape(fraction: number, isLastExon: boolean): boolean {
  return isLastExon || fraction > NMD_ESCAPE_FRACTION;
}

export function normalizeLofteeConfidence(value: string | null | undefined): LofteeConfidence | null {
  const upper = value?.trim().toUpperCase();
  return upper === 'HC' || upper === 'LC' ? upper : null;
}
