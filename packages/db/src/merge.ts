/**
 * Merge / upsert engine
 *
 * Every source funnels its records through `MergeEngine.apply`. A write names
 * a table, a gene, an identity and the feature columns the source owns. The
 * engine resolves the existing row, writes only those columns and refuses to
 * let two identities share one coordinate tuple.
 *
 * The engine is idempotent and commutative for writes with disjoint column
 * sets. Two sources writing the same column are last-write-wins.
 *
 * Several alleles can encode one protein change. Once a row holds complete
 * coordinates, a write for the same identity naming a different allele keeps
 * the stored coordinates and drops the write's `alleleColumns`.
 */

import type { GenomicCoordinates } from '@allelebase/identity';
import { formatVariantId, isCompleteCoordinates, splitProteinChange } from '@allelebase/identity';
import type { Logger } from '@allelebase/config';
import type Database from 'better-sqlite3';
import type { LofRow, MissenseRow, VariantTable } from './schema.js';
import {
  changedColumns,
  omitColumns,
  planMerge,
  type ConstraintSnapshot,
  type LofColumn,
  type LofFeatures,
  type MissenseColumn,
  type MissenseFeatures,
} from './patch.js';
import { IdentityConflictError, isUniqueConstraintError } from './errors.js';
import type { GeneRepository, LofRepository, MissenseRepository } from './repositories.js';

const DEFAULT_GENOME_BUILD = 'GRCh38';

export interface CoordinateIdentity {
  coordinates: GenomicCoordinates;
}

export type MissenseIdentity = { hgvsP: string } | CoordinateIdentity;
export type LofIdentity = { hgvsC: string } | CoordinateIdentity;

/** Reference and alternate residues (three-letter codes) a coordinate-keyed source expects */
export interface ExpectedSubstitution {
  ref: string;
  alt: string;
}

export interface MissenseWrite {
  table: 'missense';
  gene: string;
  identity: MissenseIdentity;
  features: MissenseFeatures;
  keepExistingWhenNull?: readonly MissenseColumn[];
  /** Columns that describe the write's allele rather than its protein change */
  alleleColumns?: readonly MissenseColumn[];
  expectedSubstitution?: ExpectedSubstitution;
}

export interface LofWrite {
  table: 'lof';
  gene: string;
  identity: LofIdentity;
  features: LofFeatures;
  keepExistingWhenNull?: readonly LofColumn[];
  alleleColumns?: readonly LofColumn[];
}

export type VariantWrite = MissenseWrite | LofWrite;

export type UnresolvedReason = 'no_matching_row' | 'gene_mismatch' | 'substitution_mismatch' | 'allele_mismatch';

export type MergeOutcome =
  | { status: 'created'; table: VariantTable; id: number }
  | { status: 'updated'; table: VariantTable; id: number; changedColumns: string[]; alleleMismatch?: boolean }
  | { status: 'unresolved'; table: VariantTable; reason: UnresolvedReason };

interface CoordinateColumns {
  chromosome?: string | null;
  position?: number | null;
  ref?: string | null;
  alt?: string | null;
  genomeBuild?: string | null;
}

const COORDINATE_COLUMNS = ['chromosome', 'position', 'ref', 'alt', 'genomeBuild'] as const;

function completeCoordinates(columns: CoordinateColumns): GenomicCoordinates | null {
  const candidate = {
    chromosome: columns.chromosome,
    position: columns.position,
    ref: columns.ref,
    alt: columns.alt,
    genomeBuild: columns.genomeBuild ?? DEFAULT_GENOME_BUILD,
  };
  return isCompleteCoordinates(candidate) ? candidate : null;
}

/**
 * Stored and incoming coordinates are both complete and name different alleles
 */
function isOtherAllele(existing: CoordinateColumns, planned: CoordinateColumns): boolean {
  const stored = completeCoordinates(existing);
  const incoming = completeCoordinates(planned);
  if (stored === null || incoming === null) return false;
  return COORDINATE_COLUMNS.some((column) => stored[column] !== incoming[column]);
}

/**
 * Coordinates a row will hold after `planned` is written over `existing`
 */
function resultingCoordinates(
  existing: CoordinateColumns | undefined,
  planned: CoordinateColumns
): GenomicCoordinates | null {
  const pick = <K extends keyof CoordinateColumns>(key: K): CoordinateColumns[K] =>
    planned[key] !== undefined ? planned[key] : existing?.[key];

  const candidate = {
    chromosome: pick('chromosome'),
    position: pick('position'),
    ref: pick('ref'),
    alt: pick('alt'),
    genomeBuild: pick('genomeBuild') ?? DEFAULT_GENOME_BUILD,
  };
  return isCompleteCoordinates(candidate) ? candidate : null;
}

export function describeIdentity(identity: MissenseIdentity | LofIdentity): string {
  if ('coordinates' in identity) {
    const { chromosome, position, ref, alt } = identity.coordinates;
    return `${chromosome}-${position}-${ref}-${alt}`;
  }
  return 'hgvsP' in identity ? identity.hgvsP : identity.hgvsC;
}

export class MergeEngine {
  constructor(
    private readonly sqlite: Database.Database,
    private readonly genes: GeneRepository,
    private readonly missense: MissenseRepository,
    private readonly lof: LofRepository,
    private readonly logger: Logger
  ) {}

  /**
   * Apply one write in its own transaction (a savepoint inside a batch).
   * @throws IdentityConflictError when the row's coordinates belong to another identity
   */
  apply(write: VariantWrite): MergeOutcome {
    return this.sqlite.transaction((): MergeOutcome => {
      this.genes.ensure(write.gene);
      return write.table === 'missense' ? this.applyMissense(write) : this.applyLof(write);
    })();
  }

  private applyMissense(write: MissenseWrite): MergeOutcome {
    let planned = planMerge<MissenseFeatures>(write.features, {
      keepExistingWhenNull: write.keepExistingWhenNull,
    });

    let existing: MissenseRow | undefined;
    if ('coordinates' in write.identity) {
      existing = this.missense.findByCoordinates(write.identity.coordinates);
      if (!existing) {
        return this.unresolved('missense', write, 'no_matching_row');
      }
      if (existing.gene !== write.gene) {
        return this.unresolved('missense', write, 'gene_mismatch');
      }
      if (write.expectedSubstitution && !matchesSubstitution(existing.hgvsP, write.expectedSubstitution)) {
        return this.unresolved('missense', write, 'substitution_mismatch');
      }
    } else {
      existing = this.missense.findByIdentity(write.gene, write.identity.hgvsP);
    }

    let alleleMismatch = false;
    if (existing && isOtherAllele(existing, planned)) {
      this.logAlleleMismatch(write, existing, planned);
      alleleMismatch = true;
      planned = omitColumns(planned, new Set<MissenseColumn>([...COORDINATE_COLUMNS, ...(write.alleleColumns ?? [])]));
      if (Object.keys(planned).length === 0) {
        return this.unresolved('missense', write, 'allele_mismatch');
      }
    }

    const identity = existing ? existing.hgvsP : describeIdentity(write.identity);
    this.assertCoordinatesFree('missense', write.gene, identity, existing?.id, resultingCoordinates(existing, planned));

    if (existing) {
      const changed = changedColumns(existing, planned);
      const id = existing.id;
      const update = planned;
      this.guardUnique('missense', write.gene, identity, id, update, () => this.missense.update(id, update));
      return alleleMismatch
        ? { status: 'updated', table: 'missense', id, changedColumns: changed, alleleMismatch }
        : { status: 'updated', table: 'missense', id, changedColumns: changed };
    }

    if ('coordinates' in write.identity) {
      return this.unresolved('missense', write, 'no_matching_row');
    }
    const hgvsP = write.identity.hgvsP;
    const insert = planned;
    const row = this.guardUnique('missense', write.gene, hgvsP, undefined, insert, () =>
      this.missense.insert(write.gene, hgvsP, { ...structuralColumns(hgvsP), ...insert })
    );
    return { status: 'created', table: 'missense', id: row.id };
  }

  private applyLof(write: LofWrite): MergeOutcome {
    let features = planMerge<LofFeatures>(write.features, { keepExistingWhenNull: write.keepExistingWhenNull });

    let existing: LofRow | undefined;
    if ('coordinates' in write.identity) {
      existing = this.lof.findByCoordinates(write.identity.coordinates);
      if (!existing) {
        return this.unresolved('lof', write, 'no_matching_row');
      }
      if (existing.gene !== write.gene) {
        return this.unresolved('lof', write, 'gene_mismatch');
      }
    } else {
      existing = this.lof.findByIdentity(write.gene, write.identity.hgvsC);
    }

    let alleleMismatch = false;
    if (existing && isOtherAllele(existing, features)) {
      this.logAlleleMismatch(write, existing, features);
      alleleMismatch = true;
      features = omitColumns(features, new Set<LofColumn>([...COORDINATE_COLUMNS, ...(write.alleleColumns ?? [])]));
      if (Object.keys(features).length === 0) {
        return this.unresolved('lof', write, 'allele_mismatch');
      }
    }

    const planned: LofFeatures & ConstraintSnapshot = { ...features, ...this.constraintSnapshot(write.gene) };
    const identity = existing ? existing.hgvsC : describeIdentity(write.identity);
    this.assertCoordinatesFree('lof', write.gene, identity, existing?.id, resultingCoordinates(existing, planned));

    if (existing) {
      const changed = changedColumns(existing, planned);
      const id = existing.id;
      this.guardUnique('lof', write.gene, identity, id, planned, () => this.lof.update(id, planned));
      return alleleMismatch
        ? { status: 'updated', table: 'lof', id, changedColumns: changed, alleleMismatch }
        : { status: 'updated', table: 'lof', id, changedColumns: changed };
    }

    if ('coordinates' in write.identity) {
      return this.unresolved('lof', write, 'no_matching_row');
    }
    const hgvsC = write.identity.hgvsC;
    const row = this.guardUnique('lof', write.gene, hgvsC, undefined, planned, () =>
      this.lof.insert(write.gene, hgvsC, planned)
    );
    return { status: 'created', table: 'lof', id: row.id };
  }

  private constraintSnapshot(gene: string): ConstraintSnapshot {
    const row = this.genes.get(gene);
    if (!row || (row.pli === null && row.oeLof === null && row.oeLofUpper === null)) {
      return {};
    }
    return { genePli: row.pli, geneOeLof: row.oeLof, geneOeLofUpper: row.oeLofUpper };
  }

  private findByCoordinates(table: VariantTable, coordinates: GenomicCoordinates): { id: number; gene: string; identity: string } | undefined {
    if (table === 'missense') {
      const row = this.missense.findByCoordinates(coordinates);
      return row && { id: row.id, gene: row.gene, identity: row.hgvsP };
    }
    const row = this.lof.findByCoordinates(coordinates);
    return row && { id: row.id, gene: row.gene, identity: row.hgvsC };
  }

  private assertCoordinatesFree(
    table: VariantTable,
    gene: string,
    identity: string,
    ownId: number | undefined,
    coordinates: GenomicCoordinates | null
  ): void {
    if (!coordinates) return;

    const holder = this.findByCoordinates(table, coordinates);
    if (holder && holder.id !== ownId) {
      const error = new IdentityConflictError({
        table,
        gene,
        identity,
        existingGene: holder.gene,
        existingIdentity: holder.identity,
        existingId: holder.id,
        coordinates,
      });
      this.logger.error(
        {
          event: 'store.merge.conflict',
          table,
          gene,
          identity,
          existingGene: holder.gene,
          existingIdentity: holder.identity,
        },
        error.message
      );
      throw error;
    }
  }

  /**
   * Run a write; a raw unique-constraint failure on the coordinate index is
   * reported as an identity conflict.
   */
  private guardUnique<T>(
    table: VariantTable,
    gene: string,
    identity: string,
    ownId: number | undefined,
    planned: CoordinateColumns,
    run: () => T
  ): T {
    try {
      return run();
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        const existing = ownId === undefined ? undefined : this.findById(table, ownId);
        this.assertCoordinatesFree(table, gene, identity, ownId, resultingCoordinates(existing, planned));
      }
      throw error;
    }
  }

  private findById(table: VariantTable, id: number): CoordinateColumns | undefined {
    return table === 'missense' ? this.missense.findById(id) : this.lof.findById(id);
  }

  private logAlleleMismatch(write: VariantWrite, existing: CoordinateColumns, planned: CoordinateColumns): void {
    const stored = completeCoordinates(existing);
    const incoming = completeCoordinates(planned);
    this.logger.warn(
      {
        event: 'store.merge.allele_mismatch',
        table: write.table,
        gene: write.gene,
        identity: describeIdentity(write.identity),
        stored: stored && formatVariantId(stored),
        incoming: incoming && formatVariantId(incoming),
      },
      'Write names another allele of a stored variant; keeping stored coordinates'
    );
  }

  private unresolved(table: VariantTable, write: VariantWrite, reason: UnresolvedReason): MergeOutcome {
    this.logger.debug(
      { event: 'store.merge.unresolved', table, gene: write.gene, identity: describeIdentity(write.identity), reason },
      'Write did not resolve to a stored variant'
    );
    return { status: 'unresolved', table, reason };
  }
}

function matchesSubstitution(hgvsP: string, expected: ExpectedSubstitution): boolean {
  const parts = splitProteinChange(hgvsP);
  return parts !== null && parts.ref === expected.ref && parts.alt === expected.alt;
}

/**
 * Residue columns implied by a canonical protein change
 */
function structuralColumns(hgvsP: string): MissenseFeatures {
  const parts = splitProteinChange(hgvsP);
  return parts ? { aaPosition: parts.position, aaRef: parts.ref, aaAlt: parts.alt } : {};
}
