/**
 * Typed runtime settings parsed from the environment
 */

import { isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { findRepoRoot } from './env.js';

export const GENOME_BUILDS = ['GRCh38', 'GRCh37'] as const;
export type GenomeBuild = (typeof GENOME_BUILDS)[number];

const optionalPath = z
  .string()
  .trim()
  .min(1)
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  DATABASE_PATH: optionalPath,
  DATA_DIR: optionalPath,
  CLINVAR_FILE: optionalPath,
  ALPHAMISSENSE_FILE: optionalPath,
  REVEL_FILE: optionalPath,
  GENE_REFERENCE_FILE: optionalPath,
  GENOME_BUILD: z.enum(GENOME_BUILDS).default('GRCh38'),
  GNOMAD_API_URL: z.string().url().default('https://gnomad.broadinstitute.org/api'),
  GNOMAD_DATASET: z.string().trim().min(1).default('gnomad_r4'),
  CADD_API_URL: z.string().url().default('https://cadd.gs.washington.edu/api/v1.0'),
  CADD_VERSION: z.string().trim().min(1).default('GRCh38-v1.6'),
  REQUEST_DELAY_MS: nonNegativeInt(200),
  REQUEST_TIMEOUT_MS: positiveInt(30000),
  REQUEST_MAX_RETRIES: nonNegativeInt(3),
  BATCH_SIZE: positiveInt(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/** Every environment key `loadSettings` reads */
export const SETTINGS_KEYS: readonly string[] = Object.keys(EnvSchema.shape);

export interface Settings {
  repoRoot: string;
  databasePath: string;
  dataDir: string;
  clinvarFile: string;
  alphamissenseFile: string;
  revelFile: string;
  geneReferenceFile: string;
  genomeBuild: GenomeBuild;
  gnomad: { apiUrl: string; dataset: string };
  cadd: { apiUrl: string; version: string };
  http: { delayMs: number; timeoutMs: number; maxRetries: number };
  batchSize: number;
  logLevel: string;
}

/**
 * Parse settings from `env`. Relative paths resolve against the repo root.
 * @throws Error listing every invalid key
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  repoRoot: string = findRepoRoot()
): Settings {
  // Blank values behave like unset ones so `.env` placeholders fall back to defaults
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      present[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }

  const values = parsed.data;
  const fromRoot = (path: string) => (isAbsolute(path) ? path : resolve(repoRoot, path));
  const dataDir = fromRoot(values.DATA_DIR ?? 'data');
  const fromData = (path: string | undefined, fallback: string) =>
    path ? fromRoot(path) : join(dataDir, fallback);

  return {
    repoRoot,
    databasePath: values.DATABASE_PATH ? fromRoot(values.DATABASE_PATH) : join(dataDir, 'variants.db'),
    dataDir,
    clinvarFile: fromData(values.CLINVAR_FILE, 'variant_summary.txt.gz'),
    alphamissenseFile: fromData(
      values.ALPHAMISSENSE_FILE,
      join('alphamissense', 'AlphaMissense_aa_substitutions.tsv.gz')
    ),
    revelFile: fromData(values.REVEL_FILE, join('revel', 'revel_with_transcript_ids')),
    geneReferenceFile: values.GENE_REFERENCE_FILE
      ? fromRoot(values.GENE_REFERENCE_FILE)
      : join(repoRoot, 'config', 'genes.json'),
    genomeBuild: values.GENOME_BUILD,
    gnomad: { apiUrl: values.GNOMAD_API_URL, dataset: values.GNOMAD_DATASET },
    cadd: { apiUrl: values.CADD_API_URL, version: values.CADD_VERSION },
    http: {
      delayMs: values.REQUEST_DELAY_MS,
      timeoutMs: values.REQUEST_TIMEOUT_MS,
      maxRetries: values.REQUEST_MAX_RETRIES,
    },
    batchSize: values.BATCH_SIZE,
    logLevel: values.LOG_LEVEL,
  };
}
