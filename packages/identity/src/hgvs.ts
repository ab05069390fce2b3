/**
 * Canonical protein-change and coding-change identifiers
 *
 * Protein changes are emitted as `p.<Ref3><Pos><Alt3>` (stop-gain alt is `Ter`),
 * coding changes as `c.<change>`. Both parse paths (free-text nomenclature and
 * compact one-letter codes) must produce the same string for the same variant,
 * since the store joins sources on it.
 */

import { DEFAULT_AMINO_ACID_TABLE, STOP_CODE, type AminoAcidTable } from './amino-acids.js';
import { parsePositiveInteger } from './fields.js';

export interface ProteinChangeParts {
  ref: string;
  position: number;
  alt: string;
}

const FREE_TEXT_SUBSTITUTION = /\(p\.([A-Za-z]{3})(\d+)([A-Za-z]{3})\)/;
const FREE_TEXT_STOP_GAIN = /\(p\.([A-Za-z]{3})(\d+)(Ter|\*)\)/;
const CODING_IN_NAME = /:c\.([^\s(]+)/;

const THREE_LETTER = /^([A-Za-z]{3})(\d+)([A-Za-z]{3}|\*)$/;
const ONE_LETTER = /^([A-Za-z])(\d+)([A-Za-z*])$/;
const CANONICAL = /^p\.([A-Z][a-z]{2})(\d+)([A-Z][a-z]{2})$/;

function canonicalAlt(code: string, table: AminoAcidTable): string | null {
  if (code === '*' || code.toUpperCase() === STOP_CODE.toUpperCase()) {
    return STOP_CODE;
  }
  return table.canonicalThree(code);
}

function build(ref: string | null, positionText: string, alt: string | null): string | null {
  const position = parsePositiveInteger(positionText);
  if (ref === null || alt === null || position === null) {
    return null;
  }
  return `p.${ref}${position}${alt}`;
}

/**
 * Protein change from a clinical name such as
 * `NM_000238.4(KCNH2):c.1682C>T (p.Ala561Val)`.
 *
 * Substitutions are tried first, then stop-gain (`Ter` or `*`). Returns null
 * when neither pattern is present or a code/position is invalid.
 */
export function parseProteinChange(
  name: string,
  table: AminoAcidTable = DEFAULT_AMINO_ACID_TABLE
): string | null {
  for (const pattern of [FREE_TEXT_SUBSTITUTION, FREE_TEXT_STOP_GAIN]) {
    const match = pattern.exec(name);
    if (!match) continue;

    const parsed = build(table.canonicalThree(match[1]), match[2], canonicalAlt(match[3], table));
    if (parsed !== null) {
      return parsed;
    }
  }
  return null;
}

/**
 * Coding change from a clinical name: the text after `:c.` up to whitespace or `(`
 */
export function parseCodingChange(name: string): string | null {
  const match = CODING_IN_NAME.exec(name);
  return match ? `c.${match[1]}` : null;
}

/**
 * `A561V`, `p.A561V` or `KCNH2_A561V` -> `p.Ala561Val`
 */
export function compactToProteinChange(
  code: string,
  table: AminoAcidTable = DEFAULT_AMINO_ACID_TABLE
): string | null {
  let variant = code.trim();
  const underscore = variant.lastIndexOf('_');
  if (underscore >= 0) {
    variant = variant.slice(underscore + 1);
  }
  if (variant.startsWith('p.')) {
    variant = variant.slice(2);
  }

  const match = ONE_LETTER.exec(variant);
  if (!match) {
    return null;
  }
  const alt = match[3] === '*' ? STOP_CODE : table.toThree(match[3]);
  return build(table.toThree(match[1]), match[2], alt);
}

/**
 * Canonical form of any protein notation a source may hand over:
 * `p.Ala561Val`, `Ala561Val`, `p.(Ala561Val)`, `p.A561V`, `A561V`, `p.Arg534*`
 */
export function normalizeProteinChange(
  value: string | null | undefined,
  table: AminoAcidTable = DEFAULT_AMINO_ACID_TABLE
): string | null {
  if (!value) return null;

  let body = value.trim();
  if (body.startsWith('p.')) {
    body = body.slice(2);
  }
  if (body.startsWith('(') && body.endsWith(')')) {
    body = body.slice(1, -1);
  }

  const three = THREE_LETTER.exec(body);
  if (three) {
    return build(table.canonicalThree(three[1]), three[2], canonicalAlt(three[3], table));
  }
  if (ONE_LETTER.test(body)) {
    return compactToProteinChange(body, table);
  }
  return null;
}

export function splitProteinChange(hgvsP: string): ProteinChangeParts | null {
  const match = CANONICAL.exec(hgvsP);
  if (!match) return null;

  const position = parsePositiveInteger(match[2]);
  if (position === null) return null;
  return { ref: match[1], position, alt: match[3] };
}

/**
 * `p.Ala561Val` -> `A561V`; stop-gain alt becomes `*`
 */
export function proteinChangeToCompact(
  hgvsP: string,
  table: AminoAcidTable = DEFAULT_AMINO_ACID_TABLE
): string | null {
  const parts = splitProteinChange(hgvsP);
  if (!parts) return null;

  const ref = table.toOne(parts.ref);
  const alt = parts.alt === STOP_CODE ? '*' : table.toOne(parts.alt);
  if (ref === null || alt === null) return null;
  return `${ref}${parts.position}${alt}`;
}

export function isStopGain(hgvsP: string | null | undefined): boolean {
  return !!hgvsP && hgvsP.endsWith(STOP_CODE) && !hgvsP.includes('fs');
}

/**
 * `c.1682C>T` or `NM_000238.4:c.1682C>T` -> `c.1682C>T`
 */
export function normalizeCodingChange(value: string | null | undefined): string | null {
  if (!value) return null;

  const trimmed = value.trim();
  if (trimmed.includes(':c.')) {
    return parseCodingChange(trimmed);
  }
  const match = /^c\.([^\s(]+)/.exec(trimmed);
  return match ? `c.${match[1]}` : null;
}

export function normalizeGeneSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
