import { predictNmdEscape, truncationFraction } from '@allelebase/classify';
import type { GeneReferenceEntry } from '@allelebase/config';
import type { LofFeatures } from '@allelebase/db';
import { parsePositiveInteger } from '@allelebase/identity';

const PROTEIN_POSITION = /^p\.\(?[A-Z][a-z]{2}(\d+)/;

/**
 * Residue position of a protein change, including frameshifts
 * (`p.Arg534Ter` -> 534, `p.Leu152fs` -> 152)
 */
export function proteinPosition(hgvsP: string | null | undefined): number | null {
  if (!hgvsP) return null;
  const match = PROTEIN_POSITION.exec(hgvsP.trim());
  return match ? parsePositiveInteger(match[1]) : null;
}

/**
 * Truncation fraction, last-exon flag and NMD escape. Empty when the position
 * or protein length is unknown. Without `lastExonStartAa` the last-exon flag
 * is left out and `nmdEscape` is written only when the fraction alone predicts
 * escape.
 */
export function truncationFeatures(
  hgvsP: string | null | undefined,
  reference: GeneReferenceEntry
): Pick<LofFeatures, 'truncationPosition' | 'isLastExon' | 'nmdEscape'> {
  const position = proteinPosition(hgvsP);
  if (position === null || reference.proteinLength === undefined) {
    return {};
  }

  const fraction = truncationFraction(position, reference.proteinLength);
  if (reference.lastExonStartAa === undefined) {
    return predictNmdEscape(fraction, false)
      ? { truncationPosition: fraction, nmdEscape: true }
      : { truncationPosition: fraction };
  }

  const isLastExon = position >= reference.lastExonStartAa;
  return { truncationPosition: fraction, isLastExon, nmdEscape: predictNmdEscape(fraction, isLastExon) };
}
