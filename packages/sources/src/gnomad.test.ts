import { describe, expect, it } from 'vitest';
import type { GeneReferenceEntry } from '@allelebase/config';
import { SourceUnavailableError } from './errors.js';
import {
  createGnomadAdapter,
  createGnomadClient,
  createGnomadLofAdapter,
  popmaxFrequency,
  type GnomadClient,
} from './gnomad.js';
import { createHttpClient, type FetchLike } from './http.js';
import type { SourceItem } from './types.js';

const API_URL = 'https://gnomad.test/api';

const KCNH2: GeneReferenceEntry = {
  symbol: 'KCNH2',
  transcripts: ['ENST00000262186'],
  proteinLength: 1159,
  lastExonStartAa: 1000,
};

const GENE_RESPONSE = {
  data: {
    gene: {
      gene_id: 'ENSG00000055118',
      symbol: 'KCNH2',
      variants: [
        {
          variant_id: '7-150951610-G-A',
          hgvsc: 'c.1682C>T',
          hgvsp: 'p.Ala561Val',
          consequence: 'missense_variant',
          lof: null,
          lof_filter: null,
          lof_flags: null,
          exome: {
            ac: 2,
            an: 1000,
            af: 0.002,
            homozygote_count: 0,
            populations: [
              { id: 'afr', ac: 1, an: 100 },
              { id: 'nfe', ac: 1, an: 500 },
              { id: 'afr_XX', ac: 1, an: 10 },
              { id: 'XY', ac: 1, an: 5 },
              { id: 'amr', ac: 0, an: 0 },
            ],
          },
          genome: { ac: 1, an: 2000, af: 0.0005, homozygote_count: 1, populations: [] },
        },
        {
          variant_id: '7-150951795-G-A',
          hgvsc: 'c.1600C>T',
          hgvsp: 'p.Arg534Ter',
          consequence: 'stop_gained',
          lof: 'HC',
          lof_filter: null,
          lof_flags: 'SINGLE_EXON',
          exome: null,
          genome: {
            ac: 1,
            an: 2000,
            af: 0.0005,
            homozygote_count: 0,
            populations: [{ id: 'nfe', ac: 1, an: 1000 }],
          },
        },
        {
          variant_id: '7-150951800-C-T',
          hgvsc: 'c.1590G>A',
          hgvsp: 'p.Leu530=',
          consequence: 'synonymous_variant',
          lof: null,
          lof_filter: null,
          lof_flags: null,
          exome: null,
          genome: null,
        },
      ],
    },
  },
};

interface RecordedRequest {
  url: string;
  body: unknown;
}

function fakeFetch(payload: unknown, status = 200, requests: RecordedRequest[] = []): FetchLike {
  return async (url, init) => {
    requests.push({ url, body: JSON.parse(String(init?.body)) });
    return new Response(JSON.stringify(payload), { status, statusText: status === 200 ? 'OK' : 'Bad Request' });
  };
}

function client(fetchImpl: FetchLike): GnomadClient {
  return createGnomadClient({
    http: createHttpClient({ baseUrl: API_URL, maxRetries: 0, fetchImpl }),
    dataset: 'gnomad_r4',
    genomeBuild: 'GRCh38',
  });
}

async function collect(items: AsyncIterable<SourceItem>): Promise<SourceItem[]> {
  const result: SourceItem[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

describe('popmaxFrequency', () => {
  it('ignores sex-specific and empty populations', () => {
    const exome = GENE_RESPONSE.data.gene.variants[0].exome;
    expect(popmaxFrequency(exome, null)).toBe(0.01);
  });

  it('falls back to genome populations', () => {
    expect(popmaxFrequency(null, { populations: [{ id: 'nfe', ac: 3, an: 1000 }] })).toBe(0.003);
    expect(popmaxFrequency(null, null)).toBeNull();
  });
});

describe('createGnomadAdapter', () => {
  it('writes missense frequencies keyed by protein change', async () => {
    const requests: RecordedRequest[] = [];
    const adapter = createGnomadAdapter(client(fakeFetch(GENE_RESPONSE, 200, requests)));

    const items = await collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(requests).toEqual([
      {
        url: API_URL,
        body: {
          query: expect.stringContaining('variants(dataset: $dataset)'),
          variables: { geneSymbol: 'KCNH2', referenceGenome: 'GRCh38', dataset: 'gnomad_r4' },
        },
      },
    ]);
    expect(items).toEqual([
      {
        type: 'write',
        write: {
          table: 'missense',
          gene: 'KCNH2',
          identity: { hgvsP: 'p.Ala561Val' },
          features: {
            hgvsC: 'c.1682C>T',
            chromosome: '7',
            position: 150951610,
            ref: 'G',
            alt: 'A',
            genomeBuild: 'GRCh38',
            gnomadAf: 0.002,
            gnomadAn: 1000,
            gnomadAfPopmax: 0.01,
            gnomadHomozygotes: 1,
            gnomadVersion: 'gnomad_r4',
          },
          keepExistingWhenNull: ['gnomadAf', 'gnomadAfPopmax', 'gnomadAn'],
          alleleColumns: ['gnomadAf', 'gnomadAn', 'gnomadAfPopmax', 'gnomadHomozygotes', 'gnomadVersion', 'hgvsC'],
        },
      },
      { type: 'skip', reason: 'unsupported_consequence', detail: 'stop_gained' },
      { type: 'skip', reason: 'unsupported_consequence', detail: 'synonymous_variant' },
    ]);
  });

  it('reports an unknown gene as not found', async () => {
    const adapter = createGnomadAdapter(client(fakeFetch({ data: { gene: null } })));

    const items = await collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items).toEqual([{ type: 'skip', reason: 'not_found', detail: 'KCNH2' }]);
  });

  it('raises GraphQL errors as an unavailable source', async () => {
    const adapter = createGnomadAdapter(client(fakeFetch({ data: null, errors: [{ message: 'Gene not found' }] })));

    await expect(collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 }))).rejects.toThrow(
      new SourceUnavailableError({ source: 'gnomad', gene: 'KCNH2', message: 'Gene not found' }).message
    );
  });

  it('carries the status code of a failed request', async () => {
    const adapter = createGnomadAdapter(client(fakeFetch({ message: 'bad query' }, 400)));

    const error = await collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 })).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ source: 'gnomad', gene: 'KCNH2', statusCode: 400 });
  });
});

describe('createGnomadLofAdapter', () => {
  it('writes loss-of-function records keyed by coding change', async () => {
    const adapter = createGnomadLofAdapter(client(fakeFetch(GENE_RESPONSE)));

    const items = await collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items).toEqual([
      {
        type: 'write',
        write: {
          table: 'lof',
          gene: 'KCNH2',
          identity: { hgvsC: 'c.1600C>T' },
          features: {
            hgvsP: 'p.Arg534Ter',
            lofType: 'nonsense',
            lofteeConfidence: 'HC',
            lofteeFilter: null,
            lofteeFlags: 'SINGLE_EXON',
            truncationPosition: 534 / 1159,
            isLastExon: false,
            nmdEscape: false,
            chromosome: '7',
            position: 150951795,
            ref: 'G',
            alt: 'A',
            genomeBuild: 'GRCh38',
            gnomadAf: 0.0005,
            gnomadAn: 2000,
            gnomadAfPopmax: 0.001,
            gnomadHomozygotes: 0,
            gnomadVersion: 'gnomad_r4',
          },
          keepExistingWhenNull: ['gnomadAf', 'gnomadAfPopmax', 'gnomadAn'],
          alleleColumns: ['gnomadAf', 'gnomadAn', 'gnomadAfPopmax', 'gnomadHomozygotes', 'gnomadVersion'],
        },
      },
    ]);
  });

  it('shares one request per gene with the missense adapter', async () => {
    const requests: RecordedRequest[] = [];
    const shared = client(fakeFetch(GENE_RESPONSE, 200, requests));

    await collect(createGnomadAdapter(shared).fetch({ symbol: 'KCNH2', reference: KCNH2 }));
    await collect(createGnomadLofAdapter(shared).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(requests).toHaveLength(1);
  });

  it('drops a gene once every adapter has read it', async () => {
    const requests: RecordedRequest[] = [];
    const shared = client(fakeFetch(GENE_RESPONSE, 200, requests));

    await collect(createGnomadAdapter(shared).fetch({ symbol: 'KCNH2', reference: KCNH2 }));
    await collect(createGnomadLofAdapter(shared).fetch({ symbol: 'KCNH2', reference: KCNH2 }));
    await collect(createGnomadAdapter(shared).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(requests).toHaveLength(2);
  });

  it('keeps nothing when a single adapter reads through the client', async () => {
    const requests: RecordedRequest[] = [];
    const missenseOnly = createGnomadClient({
      http: createHttpClient({ baseUrl: API_URL, maxRetries: 0, fetchImpl: fakeFetch(GENE_RESPONSE, 200, requests) }),
      dataset: 'gnomad_r4',
      genomeBuild: 'GRCh38',
      consumers: ['gnomad'],
    });

    await missenseOnly.geneVariants('KCNH2', 'gnomad');
    await missenseOnly.geneVariants('KCNH2', 'gnomad');

    expect(requests).toHaveLength(2);
  });
});
