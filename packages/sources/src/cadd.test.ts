import { describe, expect, it } from 'vitest';
import type { StoredCoordinates } from '@allelebase/db';
import type { GenomicCoordinates } from '@allelebase/identity';
import { createCaddAdapter, findCaddScore } from './cadd.js';
import { SourceUnavailableError } from './errors.js';
import { createHttpClient, type FetchLike } from './http.js';
import type { CoordinateSource, SourceItem } from './types.js';

const API_URL = 'https://cadd.test/api/v1.0';
const HEADER = ['Chrom', 'Pos', 'Ref', 'Alt', 'RawScore', 'PHRED'];

const A561V: GenomicCoordinates = { chromosome: '7', position: 150951610, ref: 'G', alt: 'A', genomeBuild: 'GRCh38' };
const R534X: GenomicCoordinates = { chromosome: '7', position: 150951795, ref: 'G', alt: 'A', genomeBuild: 'GRCh38' };
const UNSCORED: GenomicCoordinates = { chromosome: '7', position: 150951900, ref: 'C', alt: 'T', genomeBuild: 'GRCh38' };

function coordinateSource(entries: StoredCoordinates[]): CoordinateSource {
  return { listCoordinates: () => entries };
}

function routes(table: Record<string, { status: number; body: unknown }>, requested: string[] = []): FetchLike {
  return async (url) => {
    requested.push(url);
    const route = table[url];
    if (!route) {
      return new Response('Not Found', { status: 404, statusText: 'Not Found' });
    }
    return new Response(JSON.stringify(route.body), { status: route.status });
  };
}

async function collect(items: AsyncIterable<SourceItem>): Promise<SourceItem[]> {
  const result: SourceItem[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

describe('findCaddScore', () => {
  it('matches the row on ref and alt', () => {
    const rows = [HEADER, ['7', '150951610', 'G', 'C', '2.0', '20.1'], ['7', '150951610', 'G', 'A', '3.21', '25.3']];
    expect(findCaddScore(rows, 'G', 'A')).toEqual({ phred: 25.3, raw: 3.21 });
    expect(findCaddScore(rows, 'G', 'T')).toBeNull();
  });

  it('accepts numeric cells', () => {
    expect(findCaddScore([HEADER, [7, 150951610, 'G', 'A', 0, 0.5]], 'G', 'A')).toEqual({ phred: 0.5, raw: 0 });
  });

  it('returns null for an empty response', () => {
    expect(findCaddScore([], 'G', 'A')).toBeNull();
    expect(findCaddScore([HEADER], 'G', 'A')).toBeNull();
  });
});

describe('createCaddAdapter', () => {
  it('scores every stored coordinate on its own table', async () => {
    const requested: string[] = [];
    const sleeps: number[] = [];
    const fetchImpl = routes(
      {
        [`${API_URL}/GRCh38-v1.6/7:150951610-150951610`]: {
          status: 200,
          body: [HEADER, ['7', '150951610', 'G', 'A', '3.21', '25.3']],
        },
        [`${API_URL}/GRCh38-v1.6/7:150951795-150951795`]: {
          status: 200,
          body: [HEADER, ['7', '150951795', 'G', 'A', '6.1', '38']],
        },
      },
      requested
    );
    const adapter = createCaddAdapter({
      http: createHttpClient({ baseUrl: API_URL, maxRetries: 0, fetchImpl }),
      version: 'GRCh38-v1.6',
      coordinates: coordinateSource([
        { table: 'missense', coordinates: A561V },
        { table: 'lof', coordinates: R534X },
        { table: 'missense', coordinates: UNSCORED },
      ]),
      delayMs: 250,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    const items = await collect(adapter.fetch({ symbol: 'KCNH2', reference: { symbol: 'KCNH2', transcripts: [] } }));

    expect(items).toEqual([
      {
        type: 'write',
        write: {
          table: 'missense',
          gene: 'KCNH2',
          identity: { coordinates: A561V },
          features: { caddPhred: 25.3, caddRaw: 3.21 },
          keepExistingWhenNull: ['caddPhred', 'caddRaw'],
        },
      },
      {
        type: 'write',
        write: {
          table: 'lof',
          gene: 'KCNH2',
          identity: { coordinates: R534X },
          features: { caddPhred: 38, caddRaw: 6.1 },
          keepExistingWhenNull: ['caddPhred', 'caddRaw'],
        },
      },
      { type: 'skip', reason: 'not_found', detail: '7-150951900-C-T' },
    ]);
    expect(requested).toHaveLength(3);
    expect(sleeps).toEqual([250, 250]);
  });

  it('raises server failures as an unavailable source', async () => {
    const fetchImpl = routes({
      [`${API_URL}/GRCh38-v1.6/7:150951610-150951610`]: { status: 503, body: { error: 'maintenance' } },
    });
    const adapter = createCaddAdapter({
      http: createHttpClient({ baseUrl: API_URL, maxRetries: 0, fetchImpl }),
      version: 'GRCh38-v1.6',
      coordinates: coordinateSource([{ table: 'missense', coordinates: A561V }]),
      delayMs: 0,
    });

    const error = await collect(adapter.fetch({ symbol: 'KCNH2', reference: { symbol: 'KCNH2', transcripts: [] } })).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ source: 'cadd', gene: 'KCNH2', statusCode: 503 });
  });
});
