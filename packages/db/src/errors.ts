import type { GenomicCoordinates } from '@allelebase/identity';
import type { VariantTable } from './schema.js';

/**
 * Two different identities claim the same genomic coordinates.
 * Never merged; the caller records it and moves on.
 */
export class IdentityConflictError extends Error {
  readonly table: VariantTable;
  readonly gene: string;
  readonly identity: string;
  readonly existingGene: string;
  readonly existingIdentity: string;
  readonly existingId: number;
  readonly coordinates: GenomicCoordinates;

  constructor(params: {
    table: VariantTable;
    gene: string;
    identity: string;
    existingGene: string;
    existingIdentity: string;
    existingId: number;
    coordinates: GenomicCoordinates;
  }) {
    const { chromosome, position, ref, alt, genomeBuild } = params.coordinates;
    super(
      `Identity conflict in ${params.table}: ${params.gene} ${params.identity} claims ` +
        `${chromosome}-${position}-${ref}-${alt} (${genomeBuild}) held by ` +
        `${params.existingGene} ${params.existingIdentity} (id ${params.existingId})`
    );
    this.name = 'IdentityConflictError';
    this.table = params.table;
    this.gene = params.gene;
    this.identity = params.identity;
    this.existingGene = params.existingGene;
    this.existingIdentity = params.existingIdentity;
    this.existingId = params.existingId;
    this.coordinates = params.coordinates;
  }
}

export class VariantNotFoundError extends Error {
  readonly table: VariantTable;
  readonly variantId: number;

  constructor(table: VariantTable, variantId: number) {
    super(`No ${table} variant with id ${variantId}`);
    this.name = 'VariantNotFoundError';
    this.table = table;
    this.variantId = variantId;
  }
}

export function isUniqueConstraintError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
