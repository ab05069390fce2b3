/**
 * Per-entity repositories over the canonical tables
 *
 * Each repository knows its own column set statically; nothing here builds
 * SQL from caller-supplied column names. All calls are synchronous
 * (better-sqlite3) so they compose inside a single store transaction.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { GenomicCoordinates } from '@allelebase/identity';
import * as schema from './schema.js';
import { genes, lofVariants, missenseVariants, penetranceEstimates } from './schema.js';
import type {
  GeneRow,
  LofInsert,
  LofRow,
  MissenseInsert,
  MissenseRow,
  PenetranceRow,
  VariantTable,
} from './schema.js';
import type {
  ConstraintSnapshot,
  GeneFeatures,
  LofFeatures,
  MissenseFeatures,
  PenetranceFeatures,
} from './patch.js';
import { type Clock, timestamp } from './clock.js';
import { VariantNotFoundError } from './errors.js';

export type StoreDatabase = BetterSQLite3Database<typeof schema>;

export interface GeneConstraints {
  pli: number | null;
  oeLof: number | null;
  oeLofLower: number | null;
  oeLofUpper: number | null;
}

export type GeneIdentifiers = Partial<Pick<GeneRow, 'uniprotId' | 'ensemblGeneId' | 'canonicalTranscript'>>;

export class GeneRepository {
  constructor(
    private readonly db: StoreDatabase,
    private readonly clock: Clock
  ) {}

  get(symbol: string): GeneRow | undefined {
    return this.db.select().from(genes).where(eq(genes.symbol, symbol)).get();
  }

  list(): GeneRow[] {
    return this.db.select().from(genes).orderBy(asc(genes.symbol)).all();
  }

  /**
   * Row for `symbol`, created on first use. Identifiers only fill columns
   * that are still empty.
   */
  ensure(symbol: string, identifiers: GeneIdentifiers = {}): GeneRow {
    const existing = this.get(symbol);
    if (!existing) {
      const now = timestamp(this.clock);
      return this.db
        .insert(genes)
        .values({ ...identifiers, symbol, createdAt: now, updatedAt: now })
        .returning()
        .get();
    }

    const fill: GeneFeatures = {};
    if (existing.uniprotId === null && identifiers.uniprotId) fill.uniprotId = identifiers.uniprotId;
    if (existing.ensemblGeneId === null && identifiers.ensemblGeneId) fill.ensemblGeneId = identifiers.ensemblGeneId;
    if (existing.canonicalTranscript === null && identifiers.canonicalTranscript) {
      fill.canonicalTranscript = identifiers.canonicalTranscript;
    }
    if (Object.keys(fill).length === 0) {
      return existing;
    }
    return this.db
      .update(genes)
      .set({ ...fill, updatedAt: timestamp(this.clock) })
      .where(eq(genes.id, existing.id))
      .returning()
      .get();
  }

  upsertConstraints(symbol: string, constraints: Partial<GeneConstraints>): GeneRow {
    const row = this.ensure(symbol);
    return this.db
      .update(genes)
      .set({ ...constraints, updatedAt: timestamp(this.clock) })
      .where(eq(genes.id, row.id))
      .returning()
      .get();
  }
}

export class MissenseRepository {
  readonly table = 'missense' as const;

  constructor(
    private readonly db: StoreDatabase,
    private readonly clock: Clock
  ) {}

  findById(id: number): MissenseRow | undefined {
    return this.db.select().from(missenseVariants).where(eq(missenseVariants.id, id)).get();
  }

  findByIdentity(gene: string, hgvsP: string): MissenseRow | undefined {
    return this.db
      .select()
      .from(missenseVariants)
      .where(and(eq(missenseVariants.gene, gene), eq(missenseVariants.hgvsP, hgvsP)))
      .get();
  }

  findByCoordinates(coordinates: GenomicCoordinates): MissenseRow | undefined {
    return this.db
      .select()
      .from(missenseVariants)
      .where(
        and(
          eq(missenseVariants.chromosome, coordinates.chromosome),
          eq(missenseVariants.position, coordinates.position),
          eq(missenseVariants.ref, coordinates.ref),
          eq(missenseVariants.alt, coordinates.alt),
          eq(missenseVariants.genomeBuild, coordinates.genomeBuild)
        )
      )
      .get();
  }

  listByGene(gene: string): MissenseRow[] {
    return this.db
      .select()
      .from(missenseVariants)
      .where(eq(missenseVariants.gene, gene))
      .orderBy(asc(missenseVariants.id))
      .all();
  }

  insert(gene: string, hgvsP: string, features: MissenseFeatures): MissenseRow {
    const now = timestamp(this.clock);
    const values: MissenseInsert = { ...features, gene, hgvsP, createdAt: now, updatedAt: now };
    return this.db.insert(missenseVariants).values(values).returning().get();
  }

  /** Writes `features` and refreshes `updated_at`, even when `features` is empty */
  update(id: number, features: MissenseFeatures): MissenseRow {
    return this.db
      .update(missenseVariants)
      .set({ ...features, updatedAt: timestamp(this.clock) })
      .where(eq(missenseVariants.id, id))
      .returning()
      .get();
  }
}

export class LofRepository {
  readonly table = 'lof' as const;

  constructor(
    private readonly db: StoreDatabase,
    private readonly clock: Clock
  ) {}

  findById(id: number): LofRow | undefined {
    return this.db.select().from(lofVariants).where(eq(lofVariants.id, id)).get();
  }

  findByIdentity(gene: string, hgvsC: string): LofRow | undefined {
    return this.db
      .select()
      .from(lofVariants)
      .where(and(eq(lofVariants.gene, gene), eq(lofVariants.hgvsC, hgvsC)))
      .get();
  }

  findByCoordinates(coordinates: GenomicCoordinates): LofRow | undefined {
    return this.db
      .select()
      .from(lofVariants)
      .where(
        and(
          eq(lofVariants.chromosome, coordinates.chromosome),
          eq(lofVariants.position, coordinates.position),
          eq(lofVariants.ref, coordinates.ref),
          eq(lofVariants.alt, coordinates.alt),
          eq(lofVariants.genomeBuild, coordinates.genomeBuild)
        )
      )
      .get();
  }

  listByGene(gene: string): LofRow[] {
    return this.db
      .select()
      .from(lofVariants)
      .where(eq(lofVariants.gene, gene))
      .orderBy(asc(lofVariants.id))
      .all();
  }

  insert(gene: string, hgvsC: string, features: LofFeatures & ConstraintSnapshot): LofRow {
    const now = timestamp(this.clock);
    const values: LofInsert = { ...features, gene, hgvsC, createdAt: now, updatedAt: now };
    return this.db.insert(lofVariants).values(values).returning().get();
  }

  update(id: number, features: LofFeatures & ConstraintSnapshot): LofRow {
    return this.db
      .update(lofVariants)
      .set({ ...features, updatedAt: timestamp(this.clock) })
      .where(eq(lofVariants.id, id))
      .returning()
      .get();
  }
}

export class PenetranceRepository {
  constructor(
    private readonly db: StoreDatabase,
    private readonly clock: Clock,
    private readonly missense: MissenseRepository,
    private readonly lof: LofRepository
  ) {}

  get(category: VariantTable, variantId: number): PenetranceRow | undefined {
    return this.db
      .select()
      .from(penetranceEstimates)
      .where(and(eq(penetranceEstimates.variantCategory, category), eq(penetranceEstimates.variantId, variantId)))
      .get();
  }

  /**
   * One estimate per variant; a second call replaces the supplied columns.
   * @throws VariantNotFoundError when the referenced variant row is missing
   */
  upsert(category: VariantTable, variantId: number, estimate: PenetranceFeatures): PenetranceRow {
    const variant = category === 'missense' ? this.missense.findById(variantId) : this.lof.findById(variantId);
    if (!variant) {
      throw new VariantNotFoundError(category, variantId);
    }

    const now = timestamp(this.clock);
    return this.db
      .insert(penetranceEstimates)
      .values({ ...estimate, variantCategory: category, variantId, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [penetranceEstimates.variantCategory, penetranceEstimates.variantId],
        set: { ...estimate, updatedAt: now },
      })
      .returning()
      .get();
  }
}
