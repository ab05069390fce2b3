/**
 * Amino-acid code tables
 */

export const STOP_CODE = 'Ter';

/** One-letter -> three-letter code for the 20 standard amino acids */
export const AMINO_ACIDS: Readonly<Record<string, string>> = Object.freeze({
  A: 'Ala',
  C: 'Cys',
  D: 'Asp',
  E: 'Glu',
  F: 'Phe',
  G: 'Gly',
  H: 'His',
  I: 'Ile',
  K: 'Lys',
  L: 'Leu',
  M: 'Met',
  N: 'Asn',
  P: 'Pro',
  Q: 'Gln',
  R: 'Arg',
  S: 'Ser',
  T: 'Thr',
  V: 'Val',
  W: 'Trp',
  Y: 'Tyr',
});

export interface AminoAcidTable {
  /** `'g'` / `'G'` -> `'Gly'` */
  toThree(letter: string): string | null;
  /** `'gly'` / `'Gly'` -> `'G'` */
  toOne(code: string): string | null;
  /** Canonical capitalisation of a known three-letter code */
  canonicalThree(code: string): string | null;
  readonly size: number;
}

export function createAminoAcidTable(
  entries: Readonly<Record<string, string>> = AMINO_ACIDS
): AminoAcidTable {
  const oneToThree = new Map<string, string>();
  const threeToOne = new Map<string, string>();

  for (const [letter, code] of Object.entries(entries)) {
    if (letter.length !== 1 || code.length !== 3) {
      throw new Error(`Invalid amino-acid table entry: ${letter} -> ${code}`);
    }
    oneToThree.set(letter.toUpperCase(), code);
    threeToOne.set(code.toUpperCase(), letter.toUpperCase());
  }

  return Object.freeze({
    toThree: (letter: string) => oneToThree.get(letter.toUpperCase()) ?? null,
    toOne: (code: string) => threeToOne.get(code.toUpperCase()) ?? null,
    canonicalThree: (code: string) => {
      const letter = threeToOne.get(code.toUpperCase());
      return letter === undefined ? null : oneToThree.get(letter) ?? null;
    },
    size: oneToThree.size,
  });
}

export const DEFAULT_AMINO_ACID_TABLE: AminoAcidTable = createAminoAcidTable();
