import { parsePositiveInteger } from './fields.js';

export interface GenomicCoordinates {
  chromosome: string;
  position: number;
  ref: string;
  alt: string;
  genomeBuild: string;
}

export type PartialCoordinates = {
  [K in keyof GenomicCoordinates]?: GenomicCoordinates[K] | null;
};

const ALLELE = /^[ACGTN]+$/;

/**
 * `chr7` / `CHR7` / `7` -> `7`; `chrM` -> `MT`
 */
export function normalizeChromosome(chromosome: string): string {
  const bare = chromosome.trim().replace(/^chr/i, '').toUpperCase();
  return bare === 'M' ? 'MT' : bare;
}

export function normalizeAllele(allele: string): string | null {
  const upper = allele.trim().toUpperCase();
  return ALLELE.test(upper) ? upper : null;
}

export function createCoordinates(
  chromosome: string | null | undefined,
  position: string | number | null | undefined,
  ref: string | null | undefined,
  alt: string | null | undefined,
  genomeBuild: string
): GenomicCoordinates | null {
  if (!chromosome || !ref || !alt) return null;

  const parsedPosition = parsePositiveInteger(position);
  const parsedRef = normalizeAllele(ref);
  const parsedAlt = normalizeAllele(alt);
  const parsedChromosome = normalizeChromosome(chromosome);
  if (parsedPosition === null || parsedRef === null || parsedAlt === null || parsedChromosome === '') {
    return null;
  }

  return {
    chromosome: parsedChromosome,
    position: parsedPosition,
    ref: parsedRef,
    alt: parsedAlt,
    genomeBuild,
  };
}

/**
 * gnomAD-style `7-150945368-A-C`
 */
export function parseVariantId(variantId: string, genomeBuild: string): GenomicCoordinates | null {
  const parts = variantId.trim().split('-');
  if (parts.length !== 4) return null;
  return createCoordinates(parts[0], parts[1], parts[2], parts[3], genomeBuild);
}

export function formatVariantId(coordinates: GenomicCoordinates): string {
  return `${coordinates.chromosome}-${coordinates.position}-${coordinates.ref}-${coordinates.alt}`;
}

export function isCompleteCoordinates(value: PartialCoordinates): value is GenomicCoordinates {
  return (
    typeof value.chromosome === 'string' &&
    typeof value.position === 'number' &&
    typeof value.ref === 'string' &&
    typeof value.alt === 'string' &&
    typeof value.genomeBuild === 'string'
  );
}
