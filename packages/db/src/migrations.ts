/**
 * Schema DDL and versioned migrations
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

const VARIANT_COMMON_COLUMNS = `
    chromosome TEXT,
    position INTEGER CHECK (position IS NULL OR position > 0),
    ref TEXT,
    alt TEXT,
    genome_build TEXT NOT NULL DEFAULT 'GRCh38',
    transcript_id TEXT,
    cadd_phred REAL,
    cadd_raw REAL,
    clinvar_id INTEGER,
    clinvar_significance TEXT,
    clinvar_review_status TEXT,
    clinvar_stars INTEGER CHECK (clinvar_stars IS NULL OR clinvar_stars BETWEEN 0 AND 4),
    clinvar_last_evaluated TEXT,
    gnomad_af REAL,
    gnomad_af_popmax REAL,
    gnomad_homozygotes INTEGER,
    gnomad_an INTEGER,
    gnomad_version TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL`;

const MIGRATIONS: ReadonlyArray<{ version: number; description: string; sql: string }> = [
  {
    version: 1,
    description: 'genes, missense_variants, lof_variants, penetrance_estimates',
    sql: `
  CREATE TABLE IF NOT EXISTS genes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    symbol TEXT NOT NULL,
    pli REAL,
    oe_lof REAL,
    oe_lof_lower REAL,
    oe_lof_upper REAL,
    uniprot_id TEXT,
    ensembl_gene_id TEXT,
    canonical_transcript TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_genes_symbol ON genes(symbol);

  CREATE TABLE IF NOT EXISTS missense_variants (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    gene TEXT NOT NULL,
    hgvs_p TEXT NOT NULL,
    hgvs_c TEXT,
    aa_position INTEGER,
    aa_ref TEXT,
    aa_alt TEXT,
    protein_domain TEXT,
    alphamissense_score REAL,
    alphamissense_class TEXT,
    revel_score REAL,${VARIANT_COMMON_COLUMNS}
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_missense_identity ON missense_variants(gene, hgvs_p);
  CREATE UNIQUE INDEX IF NOT EXISTS ux_missense_coordinates
    ON missense_variants(chromosome, position, ref, alt, genome_build);
  CREATE INDEX IF NOT EXISTS idx_missense_gene ON missense_variants(gene);
  CREATE INDEX IF NOT EXISTS idx_missense_clinvar ON missense_variants(clinvar_significance);

  CREATE TABLE IF NOT EXISTS lof_variants (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    gene TEXT NOT NULL,
    hgvs_c TEXT NOT NULL,
    hgvs_p TEXT,
    lof_type TEXT CHECK (lof_type IS NULL OR lof_type IN ('nonsense', 'frameshift', 'splice_donor', 'splice_acceptor')),
    loftee_confidence TEXT CHECK (loftee_confidence IS NULL OR loftee_confidence IN ('HC', 'LC')),
    loftee_filter TEXT,
    loftee_flags TEXT,
    nmd_escape INTEGER,
    truncation_position REAL CHECK (truncation_position IS NULL OR truncation_position BETWEEN 0 AND 1),
    is_last_exon INTEGER,
    gene_pli REAL,
    gene_oe_lof REAL,
    gene_oe_lof_upper REAL,${VARIANT_COMMON_COLUMNS}
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_lof_identity ON lof_variants(gene, hgvs_c);
  CREATE UNIQUE INDEX IF NOT EXISTS ux_lof_coordinates
    ON lof_variants(chromosome, position, ref, alt, genome_build);
  CREATE INDEX IF NOT EXISTS idx_lof_gene ON lof_variants(gene);

  CREATE TABLE IF NOT EXISTS penetrance_estimates (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    variant_category TEXT NOT NULL CHECK (variant_category IN ('missense', 'lof')),
    variant_id INTEGER NOT NULL,
    penetrance_mean REAL,
    penetrance_median REAL,
    ci_lower REAL,
    ci_upper REAL,
    model_version TEXT,
    n_carriers INTEGER,
    n_affected INTEGER,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS ux_penetrance_variant
    ON penetrance_estimates(variant_category, variant_id);
`,
  },
];

/**
 * Apply pending migrations. Safe to call on every open.
 * @returns versions applied by this call
 */
export function migrate(sqlite: Database.Database): number[] {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS schema_versions (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now')),
      description TEXT
    );
  `);

  const appliedRows = sqlite.prepare('SELECT version FROM schema_versions').all();
  const applied = new Set<number>();
  for (const row of appliedRows) {
    if (typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'number') {
      applied.add(row.version);
    }
  }

  const record = sqlite.prepare('INSERT INTO schema_versions (version, description) VALUES (?, ?)');
  const newlyApplied: number[] = [];

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.version)) continue;
    sqlite.transaction(() => {
      sqlite.exec(migration.sql);
      record.run(migration.version, migration.description);
    })();
    newlyApplied.push(migration.version);
  }

  return newlyApplied;
}
