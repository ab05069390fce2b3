/**
 * Source adapter contract
 */

import type { GeneReferenceEntry } from '@allelebase/config';
import type { StoredCoordinates, VariantWrite } from '@allelebase/db';

export const SOURCE_NAMES = ['clinvar', 'alphamissense', 'revel', 'gnomad', 'gnomad-lof', 'cadd'] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

export const SKIP_REASONS = [
  'unparseable_identity',
  'duplicate',
  'filtered',
  'not_found',
  'unsupported_consequence',
] as const;
export type SkipReason = (typeof SKIP_REASONS)[number];

export interface GeneContext {
  symbol: string;
  reference: GeneReferenceEntry;
}

export type SourceItem =
  | { type: 'write'; write: VariantWrite }
  | { type: 'skip'; reason: SkipReason; detail?: string };

export interface SourceAdapter {
  readonly name: SourceName;
  /** Records for one gene, produced lazily in source order */
  fetch(gene: GeneContext): AsyncIterable<SourceItem>;
}

/** Read access to coordinates already stored, for sources keyed by position */
export interface CoordinateSource {
  listCoordinates(gene: string): StoredCoordinates[];
}

export function writeItem(write: VariantWrite): SourceItem {
  return { type: 'write', write };
}

export function skipItem(reason: SkipReason, detail?: string): SourceItem {
  return detail === undefined ? { type: 'skip', reason } : { type: 'skip', reason, detail };
}

export function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}
