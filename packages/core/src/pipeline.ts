/**
 * Build pipeline
 *
 * Runs each adapter over each gene, in order. Records are buffered and
 * committed every `batchSize` writes (and at the end of each gene) inside one
 * store transaction. Every record is its own savepoint, so a rejected record
 * never undoes the rest of its batch.
 *
 * Adapters are async and a better-sqlite3 transaction cannot span an
 * `await`, so batches are collected first and flushed synchronously.
 */

import {
  createLogger,
  resolveGene,
  type GeneReference,
  type GeneReferenceEntry,
  type Logger,
} from '@allelebase/config';
import {
  IdentityConflictError,
  describeIdentity,
  type GeneIdentifiers,
  type MergeOutcome,
  type VariantStore,
  type VariantTable,
  type VariantWrite,
} from '@allelebase/db';
import { normalizeGeneSymbol } from '@allelebase/identity';
import { MissingDataError, type SkipReason, type SourceAdapter, type SourceName } from '@allelebase/sources';

export type GeneRunStatus = 'ok' | 'failed' | 'aborted';

export interface GeneRunResult {
  source: SourceName;
  gene: string;
  status: GeneRunStatus;
  created: number;
  updated: number;
  unresolved: number;
  conflicts: number;
  /** Writes that named another allele of a stored variant */
  alleleMismatches: number;
  writeErrors: number;
  skipped: Partial<Record<SkipReason, number>>;
  error?: string;
  durationMs: number;
}

export interface ConflictRecord {
  source: SourceName;
  gene: string;
  table: IdentityConflictError['table'];
  identity: string;
  existingGene: string;
  existingIdentity: string;
  existingId: number;
  coordinates: IdentityConflictError['coordinates'];
  message: string;
}

export interface WriteErrorRecord {
  source: SourceName;
  gene: string;
  table: VariantTable;
  identity: string;
  message: string;
}

export interface FatalRecord {
  source: SourceName;
  gene: string;
  message: string;
  path?: string;
}

export interface BuildReport {
  startedAt: string;
  finishedAt: string;
  genes: string[];
  sources: SourceName[];
  results: GeneRunResult[];
  conflicts: ConflictRecord[];
  writeErrors: WriteErrorRecord[];
  fatal: FatalRecord[];
}

export interface BuildOptions {
  store: VariantStore;
  adapters: readonly SourceAdapter[];
  genes: readonly string[];
  geneReference: GeneReference;
  batchSize: number;
  logger?: Logger;
  now?: () => Date;
}

function emptyResult(source: SourceName, gene: string): GeneRunResult {
  return {
    source,
    gene,
    status: 'ok',
    created: 0,
    updated: 0,
    unresolved: 0,
    conflicts: 0,
    alleleMismatches: 0,
    writeErrors: 0,
    skipped: {},
    durationMs: 0,
  };
}

function geneIdentifiers(entry: GeneReferenceEntry): GeneIdentifiers {
  const identifiers: GeneIdentifiers = {};
  if (entry.uniprotId) identifiers.uniprotId = entry.uniprotId;
  if (entry.ensemblGeneId) identifiers.ensemblGeneId = entry.ensemblGeneId;
  const transcript = entry.canonicalTranscript ?? entry.transcripts[0];
  if (transcript) identifiers.canonicalTranscript = transcript;
  return identifiers;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type FlushEntry =
  | { kind: 'outcome'; outcome: MergeOutcome }
  | { kind: 'conflict'; error: IdentityConflictError }
  | { kind: 'error'; write: VariantWrite; message: string };

export async function runBuild(options: BuildOptions): Promise<BuildReport> {
  const { store, adapters, geneReference } = options;
  const logger = options.logger ?? createLogger('core.pipeline');
  const now = options.now ?? (() => new Date());
  const batchSize = Math.max(1, Math.floor(options.batchSize));
  const genes = [...new Set(options.genes.map(normalizeGeneSymbol))].filter((gene) => gene.length > 0);

  const report: BuildReport = {
    startedAt: now().toISOString(),
    finishedAt: '',
    genes,
    sources: adapters.map((adapter) => adapter.name),
    results: [],
    conflicts: [],
    writeErrors: [],
    fatal: [],
  };

  logger.info({ event: 'build.start', genes, sources: report.sources, batchSize }, 'Build started');

  store.transaction(() => {
    for (const gene of genes) {
      store.genes.ensure(gene, geneIdentifiers(resolveGene(geneReference, gene)));
    }
  });

  /**
   * Commit buffered writes. A record that fails is rolled back to its own
   * savepoint and recorded; the rest of the batch commits.
   */
  function flush(source: SourceName, gene: string, buffer: VariantWrite[], result: GeneRunResult): void {
    const pending = buffer.splice(0);
    if (pending.length === 0) return;

    const entries = store.transaction((): FlushEntry[] =>
      pending.map((write): FlushEntry => {
        try {
          return { kind: 'outcome', outcome: store.engine.apply(write) };
        } catch (error) {
          if (error instanceof IdentityConflictError) {
            return { kind: 'conflict', error };
          }
          return { kind: 'error', write, message: errorMessage(error) };
        }
      })
    );

    for (const entry of entries) {
      if (entry.kind === 'conflict') {
        result.conflicts++;
        report.conflicts.push({
          source,
          gene,
          table: entry.error.table,
          identity: entry.error.identity,
          existingGene: entry.error.existingGene,
          existingIdentity: entry.error.existingIdentity,
          existingId: entry.error.existingId,
          coordinates: entry.error.coordinates,
          message: entry.error.message,
        });
        continue;
      }
      if (entry.kind === 'error') {
        const identity = describeIdentity(entry.write.identity);
        result.writeErrors++;
        report.writeErrors.push({ source, gene, table: entry.write.table, identity, message: entry.message });
        logger.error(
          { event: 'build.write.failed', source, gene, table: entry.write.table, identity, error: entry.message },
          'Write failed'
        );
        continue;
      }
      const { outcome } = entry;
      result[outcome.status]++;
      if (
        (outcome.status === 'updated' && outcome.alleleMismatch) ||
        (outcome.status === 'unresolved' && outcome.reason === 'allele_mismatch')
      ) {
        result.alleleMismatches++;
      }
    }
  }

  for (const adapter of adapters) {
    let abortedBy: MissingDataError | null = null;

    for (const gene of genes) {
      const result = emptyResult(adapter.name, gene);
      report.results.push(result);

      if (abortedBy) {
        result.status = 'aborted';
        result.error = abortedBy.message;
        continue;
      }

      const started = Date.now();
      const buffer: VariantWrite[] = [];
      try {
        for await (const item of adapter.fetch({ symbol: gene, reference: resolveGene(geneReference, gene) })) {
          if (item.type === 'skip') {
            result.skipped[item.reason] = (result.skipped[item.reason] ?? 0) + 1;
            continue;
          }
          buffer.push(item.write);
          if (buffer.length >= batchSize) {
            flush(adapter.name, gene, buffer, result);
          }
        }
        flush(adapter.name, gene, buffer, result);
      } catch (error) {
        // Commit what the adapter produced before it failed
        try {
          flush(adapter.name, gene, buffer, result);
        } catch (flushError) {
          logger.error(
            { event: 'build.flush.failed', source: adapter.name, gene, error: errorMessage(flushError) },
            'Could not commit buffered writes'
          );
        }

        result.error = errorMessage(error);
        if (error instanceof MissingDataError) {
          abortedBy = error;
          result.status = 'aborted';
          report.fatal.push({ source: adapter.name, gene, message: error.message, path: error.path });
          logger.error(
            { event: 'source.aborted', source: adapter.name, gene, path: error.path },
            error.message
          );
        } else {
          result.status = 'failed';
          logger.warn({ event: 'source.gene.failed', source: adapter.name, gene, error: result.error }, 'Gene failed');
        }
      }
      result.durationMs = Date.now() - started;

      logger.info(
        {
          event: 'build.gene.done',
          source: adapter.name,
          gene,
          status: result.status,
          created: result.created,
          updated: result.updated,
          unresolved: result.unresolved,
          conflicts: result.conflicts,
          alleleMismatches: result.alleleMismatches,
          writeErrors: result.writeErrors,
          skipped: result.skipped,
          durationMs: result.durationMs,
        },
        `${adapter.name} ${gene}: ${result.status}`
      );
    }
  }

  report.finishedAt = now().toISOString();
  logger.info(
    {
      event: 'build.done',
      conflicts: report.conflicts.length,
      writeErrors: report.writeErrors.length,
      fatal: report.fatal.length,
    },
    'Build finished'
  );
  return report;
}

/**
 * Genes that failed or were aborted, per source
 */
export function failedGenesBySource(report: BuildReport): Partial<Record<SourceName, string[]>> {
  const failed: Partial<Record<SourceName, string[]>> = {};
  for (const result of report.results) {
    if (result.status === 'ok') continue;
    (failed[result.source] ??= []).push(result.gene);
  }
  return failed;
}

/** A build that hit a missing data file, an identity conflict or a failed write */
export function hasFatalProblems(report: BuildReport): boolean {
  return report.fatal.length > 0 || report.conflicts.length > 0 || report.writeErrors.length > 0;
}
