import type { SourceName } from './types.js';

/**
 * A local data file the adapter depends on is missing. Fatal for that adapter.
 */
export class MissingDataError extends Error {
  readonly source: SourceName;
  readonly path: string;

  constructor(source: SourceName, path: string, hint?: string) {
    super(`${source} data file not found: ${path}${hint ? ` (${hint})` : ''}`);
    this.name = 'MissingDataError';
    this.source = source;
    this.path = path;
  }
}

/**
 * A remote source failed for one gene. The run continues with the next gene.
 */
export class SourceUnavailableError extends Error {
  readonly source: SourceName;
  readonly gene: string;
  readonly statusCode?: number;
  readonly responseBody?: string;

  constructor(params: {
    source: SourceName;
    gene: string;
    message: string;
    statusCode?: number;
    responseBody?: string;
    cause?: unknown;
  }) {
    super(`${params.source} unavailable for ${params.gene}: ${params.message}`, { cause: params.cause });
    this.name = 'SourceUnavailableError';
    this.source = params.source;
    this.gene = params.gene;
    this.statusCode = params.statusCode;
    this.responseBody = params.responseBody;
  }
}

/**
 * The gene reference has no identifier this source needs (accession, transcripts)
 */
export class GeneReferenceError extends Error {
  readonly source: SourceName;
  readonly gene: string;
  readonly field: string;

  constructor(source: SourceName, gene: string, field: string) {
    super(`${source}: gene reference for ${gene} has no ${field}`);
    this.name = 'GeneReferenceError';
    this.source = source;
    this.gene = gene;
    this.field = field;
  }
}
