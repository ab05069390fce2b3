/**
 * Canonical store schema (drizzle, SQLite)
 *
 * Timestamps are ISO-8601 text. `created_at` is written once; `updated_at`
 * on every merge. The DDL that creates these tables lives in migrations.ts and
 * must be kept in step with the definitions here.
 */

import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

export const genes = sqliteTable(
  'genes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    symbol: text('symbol').notNull(),
    pli: real('pli'),
    oeLof: real('oe_lof'),
    oeLofLower: real('oe_lof_lower'),
    oeLofUpper: real('oe_lof_upper'),
    uniprotId: text('uniprot_id'),
    ensemblGeneId: text('ensembl_gene_id'),
    canonicalTranscript: text('canonical_transcript'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    symbolIdx: uniqueIndex('ux_genes_symbol').on(table.symbol),
  })
);

export const missenseVariants = sqliteTable(
  'missense_variants',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    gene: text('gene').notNull(),
    hgvsP: text('hgvs_p').notNull(),
    hgvsC: text('hgvs_c'),

    // Coordinates
    chromosome: text('chromosome'),
    position: integer('position'),
    ref: text('ref'),
    alt: text('alt'),
    genomeBuild: text('genome_build').notNull().default('GRCh38'),
    transcriptId: text('transcript_id'),

    // Structural
    aaPosition: integer('aa_position'),
    aaRef: text('aa_ref'),
    aaAlt: text('aa_alt'),
    proteinDomain: text('protein_domain'),

    // Pathogenicity scores
    alphamissenseScore: real('alphamissense_score'),
    alphamissenseClass: text('alphamissense_class'),
    revelScore: real('revel_score'),
    caddPhred: real('cadd_phred'),
    caddRaw: real('cadd_raw'),

    // ClinVar
    clinvarId: integer('clinvar_id'),
    clinvarSignificance: text('clinvar_significance'),
    clinvarReviewStatus: text('clinvar_review_status'),
    clinvarStars: integer('clinvar_stars'),
    clinvarLastEvaluated: text('clinvar_last_evaluated'),

    // gnomAD
    gnomadAf: real('gnomad_af'),
    gnomadAfPopmax: real('gnomad_af_popmax'),
    gnomadHomozygotes: integer('gnomad_homozygotes'),
    gnomadAn: integer('gnomad_an'),
    gnomadVersion: text('gnomad_version'),

    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    identityIdx: uniqueIndex('ux_missense_identity').on(table.gene, table.hgvsP),
    coordinatesIdx: uniqueIndex('ux_missense_coordinates').on(
      table.chromosome,
      table.position,
      table.ref,
      table.alt,
      table.genomeBuild
    ),
    geneIdx: index('idx_missense_gene').on(table.gene),
    clinvarIdx: index('idx_missense_clinvar').on(table.clinvarSignificance),
  })
);

export const lofVariants = sqliteTable(
  'lof_variants',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    gene: text('gene').notNull(),
    hgvsC: text('hgvs_c').notNull(),
    hgvsP: text('hgvs_p'),

    chromosome: text('chromosome'),
    position: integer('position'),
    ref: text('ref'),
    alt: text('alt'),
    genomeBuild: text('genome_build').notNull().default('GRCh38'),
    transcriptId: text('transcript_id'),

    // LOF annotation
    lofType: text('lof_type', { enum: ['nonsense', 'frameshift', 'splice_donor', 'splice_acceptor'] }),
    lofteeConfidence: text('loftee_confidence', { enum: ['HC', 'LC'] }),
    lofteeFilter: text('loftee_filter'),
    lofteeFlags: text('loftee_flags'),
    nmdEscape: integer('nmd_escape', { mode: 'boolean' }),
    truncationPosition: real('truncation_position'),
    isLastExon: integer('is_last_exon', { mode: 'boolean' }),

    caddPhred: real('cadd_phred'),
    caddRaw: real('cadd_raw'),

    clinvarId: integer('clinvar_id'),
    clinvarSignificance: text('clinvar_significance'),
    clinvarReviewStatus: text('clinvar_review_status'),
    clinvarStars: integer('clinvar_stars'),
    clinvarLastEvaluated: text('clinvar_last_evaluated'),

    gnomadAf: real('gnomad_af'),
    gnomadAfPopmax: real('gnomad_af_popmax'),
    gnomadHomozygotes: integer('gnomad_homozygotes'),
    gnomadAn: integer('gnomad_an'),
    gnomadVersion: text('gnomad_version'),

    // Gene constraint copied at write time
    genePli: real('gene_pli'),
    geneOeLof: real('gene_oe_lof'),
    geneOeLofUpper: real('gene_oe_lof_upper'),

    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    identityIdx: uniqueIndex('ux_lof_identity').on(table.gene, table.hgvsC),
    coordinatesIdx: uniqueIndex('ux_lof_coordinates').on(
      table.chromosome,
      table.position,
      table.ref,
      table.alt,
      table.genomeBuild
    ),
    geneIdx: index('idx_lof_gene').on(table.gene),
  })
);

export const penetranceEstimates = sqliteTable(
  'penetrance_estimates',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    variantCategory: text('variant_category', { enum: ['missense', 'lof'] }).notNull(),
    variantId: integer('variant_id').notNull(),
    penetranceMean: real('penetrance_mean'),
    penetranceMedian: real('penetrance_median'),
    ciLower: real('ci_lower'),
    ciUpper: real('ci_upper'),
    modelVersion: text('model_version'),
    nCarriers: integer('n_carriers'),
    nAffected: integer('n_affected'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    variantIdx: uniqueIndex('ux_penetrance_variant').on(table.variantCategory, table.variantId),
  })
);

export type GeneRow = typeof genes.$inferSelect;
export type MissenseRow = typeof missenseVariants.$inferSelect;
export type MissenseInsert = typeof missenseVariants.$inferInsert;
export type LofRow = typeof lofVariants.$inferSelect;
export type LofInsert = typeof lofVariants.$inferInsert;
export type PenetranceRow = typeof penetranceEstimates.$inferSelect;
export type PenetranceInsert = typeof penetranceEstimates.$inferInsert;

export type VariantTable = 'missense' | 'lof';
