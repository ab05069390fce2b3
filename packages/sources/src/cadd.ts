/**
 * CADD adapter (REST API, one request per stored coordinate)
 *
 * CADD is keyed by position only, so it annotates rows that earlier sources
 * created with coordinates. The API answers a range query with an array of
 * rows whose first row is the header.
 */

import { z } from 'zod';
import { createLogger } from '@allelebase/config';
import { formatVariantId, parseFiniteNumber, type GenomicCoordinates } from '@allelebase/identity';
import type { StoredCoordinates, VariantWrite } from '@allelebase/db';
import { SourceUnavailableError } from './errors.js';
import { HttpError, type HttpClient } from './http.js';
import {
  skipItem,
  writeItem,
  type CoordinateSource,
  type GeneContext,
  type SourceAdapter,
  type SourceItem,
} from './types.js';

const logger = createLogger('sources.cadd');

const CellSchema = z.union([z.string(), z.number(), z.null()]);
const ResponseSchema = z.array(z.array(CellSchema));

type Cell = z.infer<typeof CellSchema>;

export interface CaddScore {
  phred: number | null;
  raw: number | null;
}

function cellText(cell: Cell | undefined): string | undefined {
  return cell === null || cell === undefined ? undefined : String(cell);
}

/**
 * Score for `ref>alt` in a CADD range response, or null when no row matches
 */
export function findCaddScore(rows: readonly (readonly Cell[])[], ref: string, alt: string): CaddScore | null {
  const [header, ...data] = rows;
  if (!header) return null;

  const index = new Map(header.map((name, position): [string, number] => [String(name), position]));
  const get = (row: readonly Cell[], name: string): string | undefined => {
    const position = index.get(name);
    return position === undefined ? undefined : cellText(row[position]);
  };

  for (const row of data) {
    if (get(row, 'Ref')?.toUpperCase() !== ref || get(row, 'Alt')?.toUpperCase() !== alt) continue;
    return {
      phred: parseFiniteNumber(get(row, 'PHRED')),
      raw: parseFiniteNumber(get(row, 'RawScore')),
    };
  }
  return null;
}

function caddWrite(gene: string, stored: StoredCoordinates, score: CaddScore): VariantWrite {
  const features = { caddPhred: score.phred, caddRaw: score.raw };
  const identity = { coordinates: stored.coordinates };
  return stored.table === 'missense'
    ? { table: 'missense', gene, identity, features, keepExistingWhenNull: ['caddPhred', 'caddRaw'] }
    : { table: 'lof', gene, identity, features, keepExistingWhenNull: ['caddPhred', 'caddRaw'] };
}

export interface CaddAdapterOptions {
  http: HttpClient;
  /** API build and release, e.g. `GRCh38-v1.6` */
  version: string;
  coordinates: CoordinateSource;
  /** Pause between requests */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createCaddAdapter(options: CaddAdapterOptions): SourceAdapter {
  const sleep = options.sleep ?? defaultSleep;

  async function lookup(gene: string, coordinates: GenomicCoordinates): Promise<readonly (readonly Cell[])[] | null> {
    const path = `/${options.version}/${coordinates.chromosome}:${coordinates.position}-${coordinates.position}`;
    let body: unknown;
    try {
      body = await options.http.getJson(path);
    } catch (error) {
      if (error instanceof HttpError) {
        if (error.statusCode === 404) return null;
        throw new SourceUnavailableError({
          source: 'cadd',
          gene,
          message: error.message,
          statusCode: error.statusCode,
          responseBody: error.responseBody,
          cause: error,
        });
      }
      throw error;
    }

    if (body === null) return null;
    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError({
        source: 'cadd',
        gene,
        message: `unexpected response shape for ${formatVariantId(coordinates)}`,
      });
    }
    return parsed.data;
  }

  async function* fetch(gene: GeneContext): AsyncGenerator<SourceItem> {
    const stored = options.coordinates.listCoordinates(gene.symbol);
    let scored = 0;

    for (const [index, entry] of stored.entries()) {
      if (index > 0 && options.delayMs > 0) {
        await sleep(options.delayMs);
      }

      const rows = await lookup(gene.symbol, entry.coordinates);
      const score = rows === null ? null : findCaddScore(rows, entry.coordinates.ref, entry.coordinates.alt);
      if (score === null) {
        yield skipItem('not_found', formatVariantId(entry.coordinates));
        continue;
      }

      scored++;
      yield writeItem(caddWrite(gene.symbol, entry, score));
    }

    logger.info(
      { event: 'source.cadd.scanned', gene: gene.symbol, version: options.version, positions: stored.length, scored },
      'CADD lookups complete'
    );
  }

  return { name: 'cadd', fetch };
}
