/**
 * ClinVar adapter (local `variant_summary.txt.gz`)
 *
 * One pass over the summary per gene. Missense records land in the missense
 * table keyed by protein change; stop-gain records land in the LOF table keyed
 * by coding change. The first record for a protein change wins.
 */

import {
  DEFAULT_REVIEW_STATUS_TABLE,
  classifyLofType,
  getReviewStars,
  type ReviewStatusTable,
} from '@allelebase/classify';
import { createLogger, type GenomeBuild } from '@allelebase/config';
import {
  DEFAULT_AMINO_ACID_TABLE,
  createCoordinates,
  isStopGain,
  parseCodingChange,
  parseOptionalText,
  parsePositiveInteger,
  parseProteinChange,
  type AminoAcidTable,
} from '@allelebase/identity';
import { readLines, requireDataFile } from './lines.js';
import { truncationFeatures } from './truncation.js';
import { skipItem, writeItem, type GeneContext, type SourceAdapter, type SourceItem } from './types.js';

const logger = createLogger('sources.clinvar');

export const CLINVAR_SUMMARY_URL = 'https://ftp.ncbi.nlm.nih.gov/pub/clinvar/tab_delimited/variant_summary.txt.gz';

/** Column indexes in variant_summary.txt */
export const CLINVAR_COLUMNS = {
  type: 1,
  name: 2,
  geneSymbol: 4,
  clinicalSignificance: 6,
  lastEvaluated: 8,
  assembly: 16,
  chromosome: 18,
  reviewStatus: 24,
  variationId: 30,
  positionVcf: 31,
  refVcf: 32,
  altVcf: 33,
} as const;

const MIN_FIELDS = CLINVAR_COLUMNS.altVcf + 1;
const SNV_TYPE = 'single nucleotide variant';

/** ClinVar columns describe one allele, not the protein change */
const CLINICAL_COLUMNS = [
  'clinvarId',
  'clinvarSignificance',
  'clinvarReviewStatus',
  'clinvarStars',
  'clinvarLastEvaluated',
] as const;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * `Jun 05, 2023` -> `2023-06-05`; `-`, blank and invalid dates -> null
 */
export function parseClinvarDate(text: string | null | undefined): string | null {
  const match = /^([A-Za-z]{3}) (\d{1,2}), (\d{4})$/.exec(text?.trim() ?? '');
  if (!match) return null;

  const month = MONTHS.indexOf(match[1].toLowerCase()) + 1;
  const day = Number(match[2]);
  const year = Number(match[3]);
  if (month === 0) return null;

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date.toISOString().slice(0, 10);
}

export interface ClinvarAdapterOptions {
  file: string;
  assembly: GenomeBuild;
  /** Keep indels and other non-SNV records */
  includeAllTypes?: boolean;
  reviewTable?: ReviewStatusTable;
  aminoAcids?: AminoAcidTable;
}

export function createClinvarAdapter(options: ClinvarAdapterOptions): SourceAdapter {
  const reviewTable = options.reviewTable ?? DEFAULT_REVIEW_STATUS_TABLE;
  const aminoAcids = options.aminoAcids ?? DEFAULT_AMINO_ACID_TABLE;

  async function* fetch(gene: GeneContext): AsyncGenerator<SourceItem> {
    requireDataFile('clinvar', options.file, `download from ${CLINVAR_SUMMARY_URL}`);

    const seen = new Set<string>();
    let header = true;
    let matched = 0;

    for await (const line of readLines(options.file)) {
      if (header) {
        header = false;
        continue;
      }
      const fields = line.split('\t');
      if (fields.length < MIN_FIELDS) continue;

      if (fields[CLINVAR_COLUMNS.geneSymbol] !== gene.symbol) continue;
      if (fields[CLINVAR_COLUMNS.assembly] !== options.assembly) continue;
      matched++;

      if (!options.includeAllTypes && fields[CLINVAR_COLUMNS.type] !== SNV_TYPE) {
        yield skipItem('filtered', fields[CLINVAR_COLUMNS.type]);
        continue;
      }

      const name = fields[CLINVAR_COLUMNS.name];
      const hgvsP = parseProteinChange(name, aminoAcids);
      if (hgvsP === null) {
        yield skipItem('unparseable_identity', name);
        continue;
      }

      if (seen.has(hgvsP)) {
        yield skipItem('duplicate', hgvsP);
        continue;
      }
      seen.add(hgvsP);

      const hgvsC = parseCodingChange(name);
      const reviewStatus = parseOptionalText(fields[CLINVAR_COLUMNS.reviewStatus]);
      const coordinates = createCoordinates(
        fields[CLINVAR_COLUMNS.chromosome],
        fields[CLINVAR_COLUMNS.positionVcf],
        fields[CLINVAR_COLUMNS.refVcf],
        fields[CLINVAR_COLUMNS.altVcf],
        options.assembly
      );

      const clinical = {
        clinvarId: parsePositiveInteger(fields[CLINVAR_COLUMNS.variationId]),
        clinvarSignificance: parseOptionalText(fields[CLINVAR_COLUMNS.clinicalSignificance]),
        clinvarReviewStatus: reviewStatus,
        clinvarStars: getReviewStars(reviewStatus, reviewTable),
        clinvarLastEvaluated: parseClinvarDate(fields[CLINVAR_COLUMNS.lastEvaluated]),
        ...coordinates,
      };

      if (isStopGain(hgvsP)) {
        if (hgvsC === null) {
          yield skipItem('unparseable_identity', name);
          continue;
        }
        yield writeItem({
          table: 'lof',
          gene: gene.symbol,
          identity: { hgvsC },
          features: {
            ...clinical,
            hgvsP,
            lofType: classifyLofType(hgvsC, hgvsP, null),
            ...truncationFeatures(hgvsP, gene.reference),
          },
          alleleColumns: CLINICAL_COLUMNS,
        });
        continue;
      }

      yield writeItem({
        table: 'missense',
        gene: gene.symbol,
        identity: { hgvsP },
        features: hgvsC === null ? clinical : { ...clinical, hgvsC },
        alleleColumns: [...CLINICAL_COLUMNS, 'hgvsC'],
      });
    }

    logger.info(
      { event: 'source.clinvar.scanned', gene: gene.symbol, records: matched, unique: seen.size },
      'ClinVar scan complete'
    );
  }

  return { name: 'clinvar', fetch };
}
