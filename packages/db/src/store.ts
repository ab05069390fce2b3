import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { asc, count, eq } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger, type Logger } from '@allelebase/config';
import {
  isCompleteCoordinates,
  type GenomicCoordinates,
  type PartialCoordinates,
} from '@allelebase/identity';
import * as schema from './schema.js';
import { lofVariants, missenseVariants, penetranceEstimates, type VariantTable } from './schema.js';
import { migrate } from './migrations.js';
import { type Clock, systemClock } from './clock.js';
import { MergeEngine } from './merge.js';
import {
  GeneRepository,
  LofRepository,
  MissenseRepository,
  PenetranceRepository,
  type StoreDatabase,
} from './repositories.js';

export const IN_MEMORY = ':memory:';

export interface OpenStoreOptions {
  /** File path, or `:memory:` */
  path: string;
  clock?: Clock;
  logger?: Logger;
}

export interface StoredCoordinates {
  table: VariantTable;
  coordinates: GenomicCoordinates;
}

export interface MissenseSummary {
  total: number;
  withClinvar: number;
  withAlphamissense: number;
  withRevel: number;
  withCadd: number;
  withGnomad: number;
}

export interface LofSummary {
  total: number;
  withClinvar: number;
  withGnomad: number;
  withCadd: number;
  highConfidence: number;
  nmdEscape: number;
}

export interface GeneSummary {
  gene: string;
  missense: MissenseSummary;
  lof: LofSummary;
  penetrance: number;
}

export class VariantStore {
  readonly db: StoreDatabase;
  readonly genes: GeneRepository;
  readonly missense: MissenseRepository;
  readonly lof: LofRepository;
  readonly penetrance: PenetranceRepository;
  readonly engine: MergeEngine;

  constructor(
    private readonly sqlite: Database.Database,
    clock: Clock,
    private readonly logger: Logger
  ) {
    this.db = drizzle(sqlite, { schema });
    this.genes = new GeneRepository(this.db, clock);
    this.missense = new MissenseRepository(this.db, clock);
    this.lof = new LofRepository(this.db, clock);
    this.penetrance = new PenetranceRepository(this.db, clock, this.missense, this.lof);
    this.engine = new MergeEngine(sqlite, this.genes, this.missense, this.lof, logger);
  }

  /**
   * Run `fn` in one transaction. Nested calls become savepoints; an error
   * rolls back only the innermost level and is rethrown.
   */
  transaction<T>(fn: () => T): T {
    return this.sqlite.transaction(fn)();
  }

  /**
   * Complete coordinates stored for `gene`, one entry per variant row
   */
  listCoordinates(gene: string): StoredCoordinates[] {
    const missense = this.db
      .select({
        chromosome: missenseVariants.chromosome,
        position: missenseVariants.position,
        ref: missenseVariants.ref,
        alt: missenseVariants.alt,
        genomeBuild: missenseVariants.genomeBuild,
      })
      .from(missenseVariants)
      .where(eq(missenseVariants.gene, gene))
      .orderBy(asc(missenseVariants.id))
      .all();
    const lof = this.db
      .select({
        chromosome: lofVariants.chromosome,
        position: lofVariants.position,
        ref: lofVariants.ref,
        alt: lofVariants.alt,
        genomeBuild: lofVariants.genomeBuild,
      })
      .from(lofVariants)
      .where(eq(lofVariants.gene, gene))
      .orderBy(asc(lofVariants.id))
      .all();

    const stored: StoredCoordinates[] = [];
    const collect = (table: VariantTable, rows: PartialCoordinates[]) => {
      for (const row of rows) {
        if (isCompleteCoordinates(row)) {
          const { chromosome, position, ref, alt, genomeBuild } = row;
          stored.push({ table, coordinates: { chromosome, position, ref, alt, genomeBuild } });
        }
      }
    };
    collect('missense', missense);
    collect('lof', lof);
    return stored;
  }

  summarize(gene: string): GeneSummary {
    const missense = this.db
      .select({
        total: count(),
        withClinvar: count(missenseVariants.clinvarSignificance),
        withAlphamissense: count(missenseVariants.alphamissenseScore),
        withRevel: count(missenseVariants.revelScore),
        withCadd: count(missenseVariants.caddPhred),
        withGnomad: count(missenseVariants.gnomadAf),
      })
      .from(missenseVariants)
      .where(eq(missenseVariants.gene, gene))
      .get();

    const lof = this.db
      .select({
        total: count(),
        withClinvar: count(lofVariants.clinvarSignificance),
        withGnomad: count(lofVariants.gnomadAf),
        withCadd: count(lofVariants.caddPhred),
      })
      .from(lofVariants)
      .where(eq(lofVariants.gene, gene))
      .get();

    const lofRows = this.lof.listByGene(gene);
    const missenseIds = new Set(this.missense.listByGene(gene).map((row) => row.id));
    const lofIds = new Set(lofRows.map((row) => row.id));
    const penetrance = this.db
      .select({ variantCategory: penetranceEstimates.variantCategory, variantId: penetranceEstimates.variantId })
      .from(penetranceEstimates)
      .all()
      .filter((row) => (row.variantCategory === 'missense' ? missenseIds : lofIds).has(row.variantId)).length;

    return {
      gene,
      missense: {
        total: missense?.total ?? 0,
        withClinvar: missense?.withClinvar ?? 0,
        withAlphamissense: missense?.withAlphamissense ?? 0,
        withRevel: missense?.withRevel ?? 0,
        withCadd: missense?.withCadd ?? 0,
        withGnomad: missense?.withGnomad ?? 0,
      },
      lof: {
        total: lof?.total ?? 0,
        withClinvar: lof?.withClinvar ?? 0,
        withGnomad: lof?.withGnomad ?? 0,
        withCadd: lof?.withCadd ?? 0,
        highConfidence: lofRows.filter((row) => row.lofteeConfidence === 'HC').length,
        nmdEscape: lofRows.filter((row) => row.nmdEscape === true).length,
      },
      penetrance,
    };
  }

  close(): void {
    this.sqlite.close();
    this.logger.info({ event: 'store.close' }, 'Variant store closed');
  }
}

/**
 * Open (creating if needed) and migrate the variant store
 */
export function openStore(options: OpenStoreOptions): VariantStore {
  const logger = options.logger ?? createLogger('db');
  const inMemory = options.path === IN_MEMORY;

  if (!inMemory) {
    mkdirSync(dirname(options.path), { recursive: true });
  }

  const sqlite = new Database(options.path);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }

  const applied = migrate(sqlite);
  logger.info(
    { event: 'store.open', path: options.path, migrationsApplied: applied },
    'Variant store ready'
  );

  return new VariantStore(sqlite, options.clock ?? systemClock, logger);
}
