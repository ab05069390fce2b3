import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { gzipSync } from 'zlib';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { GeneReferenceEntry } from '@allelebase/config';
import { CLINVAR_COLUMNS, createClinvarAdapter, parseClinvarDate } from './clinvar.js';
import { MissingDataError } from './errors.js';
import type { SourceItem } from './types.js';

const KCNH2: GeneReferenceEntry = {
  symbol: 'KCNH2',
  uniprotId: 'Q12809',
  transcripts: ['ENST00000262186'],
  proteinLength: 1159,
  lastExonStartAa: 1000,
};

interface SummaryRow {
  type?: string;
  name: string;
  geneSymbol?: string;
  clinicalSignificance?: string;
  lastEvaluated?: string;
  assembly?: string;
  chromosome?: string;
  reviewStatus?: string;
  variationId?: string;
  positionVcf?: string;
  refVcf?: string;
  altVcf?: string;
}

function summaryLine(row: SummaryRow): string {
  const fields = Array.from({ length: CLINVAR_COLUMNS.altVcf + 1 }, () => '-');
  fields[CLINVAR_COLUMNS.type] = row.type ?? 'single nucleotide variant';
  fields[CLINVAR_COLUMNS.name] = row.name;
  fields[CLINVAR_COLUMNS.geneSymbol] = row.geneSymbol ?? 'KCNH2';
  fields[CLINVAR_COLUMNS.clinicalSignificance] = row.clinicalSignificance ?? 'Pathogenic';
  fields[CLINVAR_COLUMNS.lastEvaluated] = row.lastEvaluated ?? 'Jun 05, 2023';
  fields[CLINVAR_COLUMNS.assembly] = row.assembly ?? 'GRCh38';
  fields[CLINVAR_COLUMNS.chromosome] = row.chromosome ?? '7';
  fields[CLINVAR_COLUMNS.reviewStatus] = row.reviewStatus ?? 'reviewed by expert panel';
  fields[CLINVAR_COLUMNS.variationId] = row.variationId ?? '67345';
  fields[CLINVAR_COLUMNS.positionVcf] = row.positionVcf ?? '150951610';
  fields[CLINVAR_COLUMNS.refVcf] = row.refVcf ?? 'G';
  fields[CLINVAR_COLUMNS.altVcf] = row.altVcf ?? 'A';
  return fields.join('\t');
}

async function collect(items: AsyncIterable<SourceItem>): Promise<SourceItem[]> {
  const result: SourceItem[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

describe('parseClinvarDate', () => {
  it('converts the summary date format to ISO', () => {
    expect(parseClinvarDate('Jun 05, 2023')).toBe('2023-06-05');
    expect(parseClinvarDate('Dec 1, 2019')).toBe('2019-12-01');
  });

  it('returns null for placeholders and impossible dates', () => {
    expect(parseClinvarDate('-')).toBeNull();
    expect(parseClinvarDate('')).toBeNull();
    expect(parseClinvarDate(null)).toBeNull();
    expect(parseClinvarDate('Feb 30, 2023')).toBeNull();
    expect(parseClinvarDate('Foo 01, 2023')).toBeNull();
  });
});

describe('createClinvarAdapter', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'allelebase-clinvar-'));
    file = join(dir, 'variant_summary.txt.gz');
    const lines = [
      '#AlleleID\tType\tName',
      summaryLine({ name: 'NM_000238.4(KCNH2):c.1682C>T (p.Ala561Val)' }),
      summaryLine({ name: 'NM_000238.4(KCNH2):c.1682C>T (p.Ala561Val)', variationId: '99999' }),
      summaryLine({ name: 'NM_000238.4(KCNH2):c.1682C>T (p.Ala561Val)', assembly: 'GRCh37', positionVcf: '150648698' }),
      summaryLine({
        name: 'NM_000238.4(KCNH2):c.1600C>T (p.Arg534Ter)',
        variationId: '67300',
        lastEvaluated: '-',
        reviewStatus: 'criteria provided, single submitter',
        positionVcf: '150951795',
      }),
      summaryLine({ name: 'NM_000238.4(KCNH2):c.453del (p.Leu152fs)', type: 'Deletion' }),
      summaryLine({ name: 'NM_000238.4(KCNH2):c.2398+1G>A', positionVcf: '150951900' }),
      summaryLine({ name: 'NM_000218.3(KCNQ1):c.569G>A (p.Arg190Gln)', geneSymbol: 'KCNQ1', chromosome: '11' }),
    ];
    writeFileSync(file, gzipSync(lines.join('\n') + '\n'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('turns a clinical name into a missense write with its review tier', async () => {
    const items = await collect(createClinvarAdapter({ file, assembly: 'GRCh38' }).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items[0]).toEqual({
      type: 'write',
      write: {
        table: 'missense',
        gene: 'KCNH2',
        identity: { hgvsP: 'p.Ala561Val' },
        features: {
          hgvsC: 'c.1682C>T',
          clinvarId: 67345,
          clinvarSignificance: 'Pathogenic',
          clinvarReviewStatus: 'reviewed by expert panel',
          clinvarStars: 3,
          clinvarLastEvaluated: '2023-06-05',
          chromosome: '7',
          position: 150951610,
          ref: 'G',
          alt: 'A',
          genomeBuild: 'GRCh38',
        },
        alleleColumns: [
          'clinvarId',
          'clinvarSignificance',
          'clinvarReviewStatus',
          'clinvarStars',
          'clinvarLastEvaluated',
          'hgvsC',
        ],
      },
    });
  });

  it('keeps the first record for a protein change', async () => {
    const items = await collect(createClinvarAdapter({ file, assembly: 'GRCh38' }).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items[1]).toEqual({ type: 'skip', reason: 'duplicate', detail: 'p.Ala561Val' });
  });

  it('routes stop-gains to the LOF table keyed by coding change', async () => {
    const items = await collect(createClinvarAdapter({ file, assembly: 'GRCh38' }).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items[2]).toEqual({
      type: 'write',
      write: {
        table: 'lof',
        gene: 'KCNH2',
        identity: { hgvsC: 'c.1600C>T' },
        features: {
          clinvarId: 67300,
          clinvarSignificance: 'Pathogenic',
          clinvarReviewStatus: 'criteria provided, single submitter',
          clinvarStars: 1,
          clinvarLastEvaluated: null,
          chromosome: '7',
          position: 150951795,
          ref: 'G',
          alt: 'A',
          genomeBuild: 'GRCh38',
          hgvsP: 'p.Arg534Ter',
          lofType: 'nonsense',
          truncationPosition: 534 / 1159,
          isLastExon: false,
          nmdEscape: false,
        },
        alleleColumns: ['clinvarId', 'clinvarSignificance', 'clinvarReviewStatus', 'clinvarStars', 'clinvarLastEvaluated'],
      },
    });
  });

  it('reports filtered and unparseable records as skips', async () => {
    const items = await collect(createClinvarAdapter({ file, assembly: 'GRCh38' }).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items.slice(3)).toEqual([
      { type: 'skip', reason: 'filtered', detail: 'Deletion' },
      { type: 'skip', reason: 'unparseable_identity', detail: 'NM_000238.4(KCNH2):c.2398+1G>A' },
    ]);
  });

  it('reads the other assembly when asked', async () => {
    const items = await collect(createClinvarAdapter({ file, assembly: 'GRCh37' }).fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    expect(items).toHaveLength(1);
    expect(items[0]).toMatchObject({
      type: 'write',
      write: { identity: { hgvsP: 'p.Ala561Val' }, features: { position: 150648698, genomeBuild: 'GRCh37' } },
    });
  });

  it('keeps non-SNV records when all types are included', async () => {
    const adapter = createClinvarAdapter({ file, assembly: 'GRCh38', includeAllTypes: true });
    const items = await collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 }));

    // p.Leu152fs has no substitution or stop-gain, so it is unparseable rather than filtered
    expect(items[3]).toEqual({
      type: 'skip',
      reason: 'unparseable_identity',
      detail: 'NM_000238.4(KCNH2):c.453del (p.Leu152fs)',
    });
  });

  it('fails with the expected path when the summary is missing', async () => {
    const adapter = createClinvarAdapter({ file: join(dir, 'missing.txt.gz'), assembly: 'GRCh38' });

    await expect(collect(adapter.fetch({ symbol: 'KCNH2', reference: KCNH2 }))).rejects.toBeInstanceOf(MissingDataError);
  });
});
