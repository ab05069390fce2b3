/**
 * REVEL adapter (local `revel_with_transcript_ids` CSV)
 *
 * REVEL rows carry genomic coordinates and one-letter residues but no protein
 * position, so writes are keyed by coordinates and only land on rows that an
 * earlier source already created.
 */

import { createLogger, type GenomeBuild } from '@allelebase/config';
import {
  DEFAULT_AMINO_ACID_TABLE,
  createCoordinates,
  parseFiniteNumber,
  type AminoAcidTable,
} from '@allelebase/identity';
import type { ExpectedSubstitution } from '@allelebase/db';
import { GeneReferenceError } from './errors.js';
import { readLines, requireDataFile } from './lines.js';
import { skipItem, writeItem, type GeneContext, type SourceAdapter, type SourceItem } from './types.js';

const logger = createLogger('sources.revel');

const POSITION_COLUMN: Readonly<Record<GenomeBuild, string>> = {
  GRCh38: 'grch38_pos',
  GRCh37: 'hg19_pos',
};

export interface RevelAdapterOptions {
  file: string;
  genomeBuild: GenomeBuild;
  aminoAcids?: AminoAcidTable;
}

export function createRevelAdapter(options: RevelAdapterOptions): SourceAdapter {
  const aminoAcids = options.aminoAcids ?? DEFAULT_AMINO_ACID_TABLE;
  const positionColumn = POSITION_COLUMN[options.genomeBuild];

  function expectedSubstitution(aaref: string | undefined, aaalt: string | undefined): ExpectedSubstitution | undefined {
    const ref = aaref ? aminoAcids.toThree(aaref) : null;
    const alt = aaalt ? aminoAcids.toThree(aaalt) : null;
    return ref && alt ? { ref, alt } : undefined;
  }

  async function* fetch(gene: GeneContext): AsyncGenerator<SourceItem> {
    const transcripts = new Set(gene.reference.transcripts);
    if (transcripts.size === 0) {
      throw new GeneReferenceError('revel', gene.symbol, 'transcripts');
    }
    requireDataFile('revel', options.file, 'download from https://sites.google.com/site/revelgenomics/downloads');

    let header: ReadonlyMap<string, number> | null = null;
    let matched = 0;

    for await (const line of readLines(options.file)) {
      if (header === null) {
        header = new Map(line.split(',').map((name, index): [string, number] => [name.trim(), index]));
        continue;
      }
      if (line.length === 0) continue;

      const fields = line.split(',');
      const get = (name: string): string | undefined => {
        const index = header?.get(name);
        return index === undefined ? undefined : fields[index];
      };

      const rowTranscripts = (get('Ensembl_transcriptid') ?? '').split(';').map((id) => id.trim());
      if (!rowTranscripts.some((id) => transcripts.has(id))) continue;
      matched++;

      const score = parseFiniteNumber(get('REVEL'));
      if (score === null) {
        yield skipItem('filtered', 'no REVEL score');
        continue;
      }

      const coordinates = createCoordinates(get('chr'), get(positionColumn), get('ref'), get('alt'), options.genomeBuild);
      if (coordinates === null) {
        yield skipItem('unparseable_identity', line);
        continue;
      }

      yield writeItem({
        table: 'missense',
        gene: gene.symbol,
        identity: { coordinates },
        features: { revelScore: score },
        keepExistingWhenNull: ['revelScore'],
        expectedSubstitution: expectedSubstitution(get('aaref'), get('aaalt')),
      });
    }

    logger.info(
      { event: 'source.revel.scanned', gene: gene.symbol, transcripts: transcripts.size, records: matched },
      'REVEL scan complete'
    );
  }

  return { name: 'revel', fetch };
}
