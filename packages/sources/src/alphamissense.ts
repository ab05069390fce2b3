/**
 * AlphaMissense adapter (local TSV, gzip or plain)
 *
 * Both published layouts are read: the amino-acid substitution table
 * (`uniprot_id protein_variant am_pathogenicity am_class`) and the hg19/hg38
 * tables that add `#CHROM POS REF ALT genome` in front.
 */

import { createLogger, type GenomeBuild } from '@allelebase/config';
import {
  DEFAULT_AMINO_ACID_TABLE,
  compactToProteinChange,
  createCoordinates,
  isStopGain,
  parseFiniteNumber,
  parseOptionalText,
  splitProteinChange,
  type AminoAcidTable,
} from '@allelebase/identity';
import type { MissenseFeatures } from '@allelebase/db';
import { GeneReferenceError } from './errors.js';
import { readLines, requireDataFile } from './lines.js';
import { skipItem, writeItem, type GeneContext, type SourceAdapter, type SourceItem } from './types.js';

const logger = createLogger('sources.alphamissense');

export const ALPHAMISSENSE_URL =
  'https://storage.googleapis.com/dm_alphamissense/AlphaMissense_aa_substitutions.tsv.gz';

const GENOME_LABELS: ReadonlyMap<string, GenomeBuild> = new Map<string, GenomeBuild>([
  ['hg38', 'GRCh38'],
  ['grch38', 'GRCh38'],
  ['hg19', 'GRCh37'],
  ['grch37', 'GRCh37'],
]);

type Header = ReadonlyMap<string, number>;

function parseHeader(line: string): Header {
  const columns = line.replace(/^#/, '').split('\t');
  return new Map(columns.map((column, index): [string, number] => [column.trim(), index]));
}

function column(fields: readonly string[], header: Header, name: string): string | undefined {
  const index = header.get(name);
  return index === undefined ? undefined : fields[index];
}

export interface AlphaMissenseAdapterOptions {
  file: string;
  aminoAcids?: AminoAcidTable;
}

export function createAlphaMissenseAdapter(options: AlphaMissenseAdapterOptions): SourceAdapter {
  const aminoAcids = options.aminoAcids ?? DEFAULT_AMINO_ACID_TABLE;

  async function* fetch(gene: GeneContext): AsyncGenerator<SourceItem> {
    const accession = gene.reference.uniprotId;
    if (!accession) {
      throw new GeneReferenceError('alphamissense', gene.symbol, 'uniprotId');
    }
    requireDataFile('alphamissense', options.file, `download from ${ALPHAMISSENSE_URL}`);

    let header: Header | null = null;
    let matched = 0;

    for await (const line of readLines(options.file)) {
      if (header === null) {
        // Copyright lines start with '#'; the hg38 layout's header does too
        if (line.startsWith('#') && !line.includes('protein_variant')) continue;
        header = parseHeader(line);
        continue;
      }
      if (line.length === 0) continue;

      const fields = line.split('\t');
      if (column(fields, header, 'uniprot_id') !== accession) continue;
      matched++;

      const proteinVariant = column(fields, header, 'protein_variant') ?? '';
      const hgvsP = compactToProteinChange(proteinVariant, aminoAcids);
      if (hgvsP === null) {
        yield skipItem('unparseable_identity', proteinVariant);
        continue;
      }
      if (isStopGain(hgvsP)) {
        yield skipItem('unsupported_consequence', hgvsP);
        continue;
      }

      const features: MissenseFeatures = {
        alphamissenseClass: parseOptionalText(column(fields, header, 'am_class')),
      };
      const score = parseFiniteNumber(column(fields, header, 'am_pathogenicity'));
      if (score !== null) {
        features.alphamissenseScore = score;
      }

      const parts = splitProteinChange(hgvsP);
      if (parts) {
        features.aaPosition = parts.position;
        features.aaRef = parts.ref;
        features.aaAlt = parts.alt;
      }

      const build = GENOME_LABELS.get((column(fields, header, 'genome') ?? '').toLowerCase());
      if (build !== undefined) {
        const coordinates = createCoordinates(
          column(fields, header, 'CHROM'),
          column(fields, header, 'POS'),
          column(fields, header, 'REF'),
          column(fields, header, 'ALT'),
          build
        );
        if (coordinates) {
          Object.assign(features, coordinates);
        }
      }

      yield writeItem({ table: 'missense', gene: gene.symbol, identity: { hgvsP }, features });
    }

    logger.info(
      { event: 'source.alphamissense.scanned', gene: gene.symbol, uniprotId: accession, records: matched },
      'AlphaMissense scan complete'
    );
  }

  return { name: 'alphamissense', fetch };
}
