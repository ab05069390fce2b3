import { describe, it, expect } from 'vitest';
import {
  createCoordinates,
  formatVariantId,
  isCompleteCoordinates,
  normalizeChromosome,
  parseVariantId,
} from './coordinates.js';
import { parseFiniteNumber, parsePositiveInteger } from './fields.js';

describe('coordinates', () => {
  it('normalizes chromosome names', () => {
    expect(normalizeChromosome('chr7')).toBe('7');
    expect(normalizeChromosome('CHRX')).toBe('X');
    expect(normalizeChromosome('chrM')).toBe('MT');
  });

  it('parses gnomAD variant ids', () => {
    expect(parseVariantId('7-150945368-a-C', 'GRCh38')).toEqual({
      chromosome: '7',
      position: 150945368,
      ref: 'A',
      alt: 'C',
      genomeBuild: 'GRCh38',
    });
    expect(parseVariantId('7-150945368-A', 'GRCh38')).toBeNull();
    expect(parseVariantId('7-0-A-C', 'GRCh38')).toBeNull();
  });

  it('rejects placeholder alleles', () => {
    expect(createCoordinates('7', '150945368', 'na', 'T', 'GRCh38')).toBeNull();
    expect(createCoordinates('7', 'na', 'C', 'T', 'GRCh38')).toBeNull();
  });

  it('formats and recognizes complete tuples', () => {
    const coordinates = createCoordinates('chr7', 150945368, 'C', 'T', 'GRCh38');
    expect(coordinates && formatVariantId(coordinates)).toBe('7-150945368-C-T');
    expect(isCompleteCoordinates({ chromosome: '7', position: 1, ref: 'C', alt: null, genomeBuild: 'GRCh38' })).toBe(
      false
    );
  });
});

describe('numeric fields', () => {
  it('treats malformed positions as absent, not zero', () => {
    expect(parsePositiveInteger('1682')).toBe(1682);
    expect(parsePositiveInteger('0')).toBeNull();
    expect(parsePositiveInteger('-4')).toBeNull();
    expect(parsePositiveInteger('12.5')).toBeNull();
    expect(parsePositiveInteger('na')).toBeNull();
  });

  it('keeps a zero score distinct from a missing one', () => {
    expect(parseFiniteNumber('0')).toBe(0);
    expect(parseFiniteNumber('0.0')).toBe(0);
    expect(parseFiniteNumber('.')).toBeNull();
    expect(parseFiniteNumber('')).toBeNull();
    expect(parseFiniteNumber('abc')).toBeNull();
    expect(parseFiniteNumber('0.9124')).toBe(0.9124);
  });
});
