import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createGeneReference, loadGeneReference, resolveGene } from './genes.js';

describe('gene reference', () => {
  it('upper-cases symbols and freezes entries', () => {
    const reference = createGeneReference({
      genes: { kcnh2: { uniprotId: 'Q12809', transcripts: ['ENST00000262186'], proteinLength: 1159 } },
    });

    const entry = reference.get('KCNH2');
    expect(entry).toEqual({
      symbol: 'KCNH2',
      uniprotId: 'Q12809',
      transcripts: ['ENST00000262186'],
      proteinLength: 1159,
    });
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it('rejects a non-positive protein length', () => {
    expect(() => createGeneReference({ genes: { KCNQ1: { proteinLength: 0 } } })).toThrow(
      /genes\.KCNQ1\.proteinLength/
    );
  });

  it('returns a bare entry for genes it does not know', () => {
    const reference = createGeneReference({ genes: {} });

    expect(resolveGene(reference, ' scn5a ')).toEqual({ symbol: 'SCN5A', transcripts: [] });
  });

  it('names the path when the file is missing', () => {
    const dir = mkdtempSync(join(tmpdir(), 'genes-'));
    const path = join(dir, 'missing.json');

    expect(() => loadGeneReference(path)).toThrow(`Gene reference file not found: ${path}`);
  });

  it('loads the file from disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'genes-'));
    const path = join(dir, 'genes.json');
    writeFileSync(path, JSON.stringify({ genes: { RYR2: { uniprotId: 'Q92736' } } }));

    expect(loadGeneReference(path).get('RYR2')?.uniprotId).toBe('Q92736');
  });
});
