/**
 * Partial feature sets and merge planning
 *
 * A feature set names only the columns a source owns. An absent key means
 * "leave the stored value alone"; an explicit `null` writes NULL. A key whose
 * value is `undefined` is treated as absent.
 */

import type { LofInsert, MissenseInsert, PenetranceInsert, GeneRow } from './schema.js';

type EngineOwned = 'id' | 'gene' | 'createdAt' | 'updatedAt';

export type MissenseFeatures = Partial<Omit<MissenseInsert, EngineOwned | 'hgvsP'>>;

export type LofFeatures = Partial<
  Omit<LofInsert, EngineOwned | 'hgvsC' | 'genePli' | 'geneOeLof' | 'geneOeLofUpper'>
>;

/** Gene constraint copied onto LOF rows at write time */
export type ConstraintSnapshot = Partial<Pick<LofInsert, 'genePli' | 'geneOeLof' | 'geneOeLofUpper'>>;

export type GeneFeatures = Partial<Omit<GeneRow, 'id' | 'symbol' | 'createdAt' | 'updatedAt'>>;

export type PenetranceFeatures = Partial<
  Omit<PenetranceInsert, 'id' | 'variantCategory' | 'variantId' | 'createdAt' | 'updatedAt'>
>;

export type MissenseColumn = keyof MissenseFeatures;
export type LofColumn = keyof LofFeatures;

export interface MergePolicy<P extends object> {
  /** Columns whose incoming null must not replace a stored value */
  keepExistingWhenNull?: ReadonlyArray<keyof P>;
}

/**
 * Columns to write for `features`: undefined values drop out, and so do nulls
 * on keep-existing columns.
 */
export function planMerge<P extends object>(features: P, policy: MergePolicy<P> = {}): Partial<P> {
  const keep = new Set<keyof P>(policy.keepExistingWhenNull ?? []);
  const planned: Partial<P> = {};

  for (const key in features) {
    if (!Object.prototype.hasOwnProperty.call(features, key)) continue;
    const value = features[key];
    if (value === undefined) continue;
    if (value === null && keep.has(key)) continue;
    planned[key] = value;
  }

  return planned;
}

/**
 * Planned columns whose value differs from the stored row
 */
export function changedColumns<P extends object>(existing: Record<string, unknown>, planned: P): string[] {
  const changed: string[] = [];
  for (const key in planned) {
    if (!Object.prototype.hasOwnProperty.call(planned, key)) continue;
    if (!Object.is(existing[key], planned[key])) {
      changed.push(key);
    }
  }
  return changed;
}

/**
 * `planned` without `columns`
 */
export function omitColumns<P extends object>(planned: Partial<P>, columns: ReadonlySet<keyof P>): Partial<P> {
  const kept: Partial<P> = {};
  for (const key in planned) {
    if (!Object.prototype.hasOwnProperty.call(planned, key) || columns.has(key)) continue;
    kept[key] = planned[key];
  }
  return kept;
}
