import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { GeneReferenceEntry } from '@allelebase/config';
import { GeneReferenceError } from './errors.js';
import { createRevelAdapter } from './revel.js';
import type { SourceItem } from './types.js';

const KCNH2: GeneReferenceEntry = { symbol: 'KCNH2', transcripts: ['ENST00000262186', 'ENST00000392968'] };

async function collect(items: AsyncIterable<SourceItem>): Promise<SourceItem[]> {
  const result: SourceItem[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

const UNPARSEABLE_ROW = '7,150648700,.,C,T,R,W,0.3,ENST00000262186';

describe('createRevelAdapter', () => {
  let dir: string;
  let file: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'allelebase-revel-'));
    file = join(dir, 'revel_with_transcript_ids');
    writeFileSync(
      file,
      [
        'chr,hg19_pos,grch38_pos,ref,alt,aaref,aaalt,REVEL,Ensembl_transcriptid',
        '7,150648698,150951610,G,A,A,V,0.812,ENST00000392968;ENST00000262186',
        '7,150648699,150951611,C,T,A,T,.,ENST00000262186',
        '7,1,2,C,T,A,T,0.1,ENST00000999999',
        UNPARSEABLE_ROW,
        '',
      ].join('\n')
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keys scores by coordinates and carries the expected residues', async () => {
    const items = await collect(
      createRevelAdapter({ file, genomeBuild: 'GRCh38' }).fetch({ symbol: 'KCNH2', reference: KCNH2 })
    );

    expect(items).toEqual([
      {
        type: 'write',
        write: {
          table: 'missense',
          gene: 'KCNH2',
          identity: {
            coordinates: { chromosome: '7', position: 150951610, ref: 'G', alt: 'A', genomeBuild: 'GRCh38' },
          },
          features: { revelScore: 0.812 },
          keepExistingWhenNull: ['revelScore'],
          expectedSubstitution: { ref: 'Ala', alt: 'Val' },
        },
      },
      { type: 'skip', reason: 'filtered', detail: 'no REVEL score' },
      { type: 'skip', reason: 'unparseable_identity', detail: UNPARSEABLE_ROW },
    ]);
  });

  it('uses hg19 positions for GRCh37', async () => {
    const items = await collect(
      createRevelAdapter({ file, genomeBuild: 'GRCh37' }).fetch({ symbol: 'KCNH2', reference: KCNH2 })
    );

    expect(items[0]).toMatchObject({
      type: 'write',
      write: { identity: { coordinates: { position: 150648698, genomeBuild: 'GRCh37' } } },
    });
    // The hg19 column is set on the last row, so it resolves
    expect(items[2]).toMatchObject({
      type: 'write',
      write: { identity: { coordinates: { position: 150648700 } }, expectedSubstitution: { ref: 'Arg', alt: 'Trp' } },
    });
  });

  it('needs at least one transcript', async () => {
    const adapter = createRevelAdapter({ file, genomeBuild: 'GRCh38' });

    await expect(
      collect(adapter.fetch({ symbol: 'KCNH2', reference: { symbol: 'KCNH2', transcripts: [] } }))
    ).rejects.toBeInstanceOf(GeneReferenceError);
  });
});
