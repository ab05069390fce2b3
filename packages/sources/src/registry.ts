/**
 * Source registry - builds adapters from settings
 */

import type { Settings } from '@allelebase/config';
import { createAlphaMissenseAdapter } from './alphamissense.js';
import { createCaddAdapter } from './cadd.js';
import { createClinvarAdapter } from './clinvar.js';
import {
  GNOMAD_SOURCES,
  createGnomadAdapter,
  createGnomadClient,
  createGnomadLofAdapter,
  type GnomadClient,
} from './gnomad.js';
import { createHttpClient, type FetchLike } from './http.js';
import { createRevelAdapter } from './revel.js';
import { SOURCE_NAMES, isSourceName, type CoordinateSource, type SourceAdapter, type SourceName } from './types.js';

export interface AdapterDependencies {
  settings: Settings;
  /** Stored coordinates for position-keyed sources (CADD) */
  coordinates: CoordinateSource;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Parse a `--sources` value. `all` (or nothing) selects every source.
 * @throws Error naming the unknown sources
 */
export function parseSourceNames(value: string | undefined): SourceName[] {
  if (value === undefined || value.trim() === '' || value.trim() === 'all') {
    return [...SOURCE_NAMES];
  }
  const requested = value
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
  const unknown = requested.filter((name) => !isSourceName(name));
  if (unknown.length > 0) {
    throw new Error(`Unknown source(s): ${unknown.join(', ')}. Available: ${SOURCE_NAMES.join(', ')}`);
  }
  return requested.filter(isSourceName);
}

/**
 * Adapters for `names`, in run order (the order of SOURCE_NAMES, each once)
 */
export function createAdapters(names: readonly SourceName[], deps: AdapterDependencies): SourceAdapter[] {
  const { settings } = deps;
  const selected = new Set(names);
  let gnomadClient: GnomadClient | null = null;

  const gnomad = (): GnomadClient => {
    gnomadClient ??= createGnomadClient({
      http: createHttpClient({
        baseUrl: settings.gnomad.apiUrl,
        timeoutMs: settings.http.timeoutMs,
        maxRetries: settings.http.maxRetries,
        fetchImpl: deps.fetchImpl,
        sleep: deps.sleep,
      }),
      dataset: settings.gnomad.dataset,
      genomeBuild: settings.genomeBuild,
      consumers: GNOMAD_SOURCES.filter((name) => selected.has(name)),
    });
    return gnomadClient;
  };

  const factories: Record<SourceName, () => SourceAdapter> = {
    clinvar: () => createClinvarAdapter({ file: settings.clinvarFile, assembly: settings.genomeBuild }),
    alphamissense: () => createAlphaMissenseAdapter({ file: settings.alphamissenseFile }),
    revel: () => createRevelAdapter({ file: settings.revelFile, genomeBuild: settings.genomeBuild }),
    gnomad: () => createGnomadAdapter(gnomad()),
    'gnomad-lof': () => createGnomadLofAdapter(gnomad()),
    cadd: () =>
      createCaddAdapter({
        http: createHttpClient({
          baseUrl: settings.cadd.apiUrl,
          timeoutMs: settings.http.timeoutMs,
          maxRetries: settings.http.maxRetries,
          fetchImpl: deps.fetchImpl,
          sleep: deps.sleep,
        }),
        version: settings.cadd.version,
        coordinates: deps.coordinates,
        delayMs: settings.http.delayMs,
        sleep: deps.sleep,
      }),
  };

  return SOURCE_NAMES.filter((name) => selected.has(name)).map((name) => factories[name]());
}
