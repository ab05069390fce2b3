/**
 * gnomAD adapters (GraphQL API)
 *
 * One query per gene returns every variant with its exome/genome frequencies
 * and LOFTEE annotation. `gnomad` keeps the missense records, `gnomad-lof` the
 * loss-of-function ones. Both share a client that holds each gene's response
 * until every adapter using the client has read it, so the two adapters cost
 * one request per gene.
 */

import { z } from 'zod';
import { classifyLofType, normalizeLofteeConfidence } from '@allelebase/classify';
import { createLogger, type GenomeBuild } from '@allelebase/config';
import {
  normalizeCodingChange,
  normalizeProteinChange,
  parseOptionalText,
  parseVariantId,
} from '@allelebase/identity';
import type { MissenseColumn } from '@allelebase/db';
import { SourceUnavailableError } from './errors.js';
import { HttpError, type HttpClient } from './http.js';
import { truncationFeatures } from './truncation.js';
import { skipItem, writeItem, type GeneContext, type SourceAdapter, type SourceItem } from './types.js';

const logger = createLogger('sources.gnomad');

export const GENE_VARIANTS_QUERY = `
  query GeneVariants($geneSymbol: String!, $referenceGenome: ReferenceGenomeId!, $dataset: DatasetId!) {
    gene(gene_symbol: $geneSymbol, reference_genome: $referenceGenome) {
      gene_id
      symbol
      variants(dataset: $dataset) {
        variant_id
        hgvsc
        hgvsp
        consequence
        lof
        lof_filter
        lof_flags
        exome {
          ac
          an
          af
          homozygote_count
          populations { id ac an }
        }
        genome {
          ac
          an
          af
          homozygote_count
          populations { id ac an }
        }
      }
    }
  }
`;

const PopulationSchema = z.object({
  id: z.string(),
  ac: z.number().nullable().optional(),
  an: z.number().nullable().optional(),
});

const FrequencySchema = z.object({
  ac: z.number().nullable().optional(),
  an: z.number().nullable().optional(),
  af: z.number().nullable().optional(),
  homozygote_count: z.number().nullable().optional(),
  populations: z.array(PopulationSchema).nullable().optional(),
});

const VariantSchema = z.object({
  variant_id: z.string(),
  hgvsc: z.string().nullable().optional(),
  hgvsp: z.string().nullable().optional(),
  consequence: z.string().nullable().optional(),
  lof: z.string().nullable().optional(),
  lof_filter: z.string().nullable().optional(),
  lof_flags: z.string().nullable().optional(),
  exome: FrequencySchema.nullable().optional(),
  genome: FrequencySchema.nullable().optional(),
});

const ResponseSchema = z.object({
  data: z
    .object({
      gene: z
        .object({
          gene_id: z.string().nullable().optional(),
          symbol: z.string().nullable().optional(),
          variants: z.array(VariantSchema),
        })
        .nullable(),
    })
    .nullable()
    .optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export type GnomadVariant = z.infer<typeof VariantSchema>;
type Frequency = z.infer<typeof FrequencySchema>;

export const GNOMAD_SOURCES = ['gnomad', 'gnomad-lof'] as const;
export type GnomadSource = (typeof GNOMAD_SOURCES)[number];

export interface GnomadClientOptions {
  http: HttpClient;
  dataset: string;
  genomeBuild: GenomeBuild;
  /** Adapters that read through this client; defaults to both */
  consumers?: readonly GnomadSource[];
}

export interface GnomadClient {
  readonly dataset: string;
  readonly genomeBuild: GenomeBuild;
  /** Variants for `gene`, or null when gnomAD does not know the gene */
  geneVariants(gene: string, source: GnomadSource): Promise<GnomadVariant[] | null>;
}

export function createGnomadClient(options: GnomadClientOptions): GnomadClient {
  const consumers = new Set<GnomadSource>(options.consumers ?? GNOMAD_SOURCES);
  const cache = new Map<string, { variants: GnomadVariant[] | null; readBy: Set<GnomadSource> }>();

  const readByAll = (readBy: ReadonlySet<GnomadSource>): boolean =>
    [...consumers].every((consumer) => readBy.has(consumer));

  async function query(gene: string, source: GnomadSource): Promise<GnomadVariant[] | null> {
    let body: unknown;
    try {
      body = await options.http.postJson('', {
        query: GENE_VARIANTS_QUERY,
        variables: { geneSymbol: gene, referenceGenome: options.genomeBuild, dataset: options.dataset },
      });
    } catch (error) {
      if (error instanceof HttpError) {
        throw new SourceUnavailableError({
          source,
          gene,
          message: error.message,
          statusCode: error.statusCode,
          responseBody: error.responseBody,
          cause: error,
        });
      }
      throw error;
    }

    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError({
        source,
        gene,
        message: `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      });
    }
    if (parsed.data.errors && parsed.data.errors.length > 0) {
      throw new SourceUnavailableError({
        source,
        gene,
        message: parsed.data.errors.map((error) => error.message).join('; '),
      });
    }
    return parsed.data.data?.gene?.variants ?? null;
  }

  return {
    dataset: options.dataset,
    genomeBuild: options.genomeBuild,
    async geneVariants(gene, source) {
      const hit = cache.get(gene);
      if (hit !== undefined) {
        hit.readBy.add(source);
        if (readByAll(hit.readBy)) cache.delete(gene);
        return hit.variants;
      }
      const variants = await query(gene, source);
      const readBy = new Set<GnomadSource>([source]);
      if (!readByAll(readBy)) cache.set(gene, { variants, readBy });
      logger.info(
        { event: 'source.gnomad.fetched', gene, dataset: options.dataset, variants: variants?.length ?? 0 },
        'gnomAD gene variants fetched'
      );
      return variants;
    },
  };
}

/** Exome value when present (zero included), otherwise genome */
function preferExome(
  exome: Frequency | null | undefined,
  genome: Frequency | null | undefined,
  key: 'af' | 'an'
): number | null {
  return exome?.[key] ?? genome?.[key] ?? null;
}

const SEX_SPECIFIC = /(^|_)X[XY]$/;

/**
 * Highest population allele frequency, exome populations first
 */
export function popmaxFrequency(exome: Frequency | null | undefined, genome: Frequency | null | undefined): number | null {
  const populations = exome?.populations?.length ? exome.populations : genome?.populations ?? [];
  let max: number | null = null;
  for (const population of populations) {
    const ac = population.ac ?? 0;
    const an = population.an ?? 0;
    if (an <= 0) continue;
    // Sex-specific entries (`XX`, `afr_XY`) repeat their parent populations
    if (SEX_SPECIFIC.test(population.id)) continue;
    const af = ac / an;
    if (max === null || af > max) max = af;
  }
  return max;
}

export function frequencyFeatures(variant: GnomadVariant, dataset: string) {
  return {
    gnomadAf: preferExome(variant.exome, variant.genome, 'af'),
    gnomadAn: preferExome(variant.exome, variant.genome, 'an'),
    gnomadAfPopmax: popmaxFrequency(variant.exome, variant.genome),
    gnomadHomozygotes: (variant.exome?.homozygote_count ?? 0) + (variant.genome?.homozygote_count ?? 0),
    gnomadVersion: dataset,
  };
}

const KEEP_FREQUENCIES: readonly MissenseColumn[] = ['gnomadAf', 'gnomadAfPopmax', 'gnomadAn'];

/** Frequencies belong to one allele, not to the protein change it encodes */
const FREQUENCY_COLUMNS = ['gnomadAf', 'gnomadAn', 'gnomadAfPopmax', 'gnomadHomozygotes', 'gnomadVersion'] as const;

export function createGnomadAdapter(client: GnomadClient): SourceAdapter {
  async function* fetch(gene: GeneContext): AsyncGenerator<SourceItem> {
    const variants = await client.geneVariants(gene.symbol, 'gnomad');
    if (variants === null) {
      yield skipItem('not_found', gene.symbol);
      return;
    }

    for (const variant of variants) {
      if (!variant.consequence?.includes('missense_variant')) {
        yield skipItem('unsupported_consequence', variant.consequence ?? variant.variant_id);
        continue;
      }
      const hgvsP = normalizeProteinChange(variant.hgvsp);
      if (hgvsP === null) {
        yield skipItem('unparseable_identity', variant.hgvsp ?? variant.variant_id);
        continue;
      }

      const hgvsC = normalizeCodingChange(variant.hgvsc);
      yield writeItem({
        table: 'missense',
        gene: gene.symbol,
        identity: { hgvsP },
        features: {
          ...(hgvsC === null ? {} : { hgvsC }),
          ...parseVariantId(variant.variant_id, client.genomeBuild),
          ...frequencyFeatures(variant, client.dataset),
        },
        keepExistingWhenNull: KEEP_FREQUENCIES,
        alleleColumns: [...FREQUENCY_COLUMNS, 'hgvsC'],
      });
    }
  }

  return { name: 'gnomad', fetch };
}

export function createGnomadLofAdapter(client: GnomadClient): SourceAdapter {
  async function* fetch(gene: GeneContext): AsyncGenerator<SourceItem> {
    const variants = await client.geneVariants(gene.symbol, 'gnomad-lof');
    if (variants === null) {
      yield skipItem('not_found', gene.symbol);
      return;
    }

    for (const variant of variants) {
      const rawProtein = parseOptionalText(variant.hgvsp);
      const lofType = classifyLofType(variant.hgvsc, rawProtein, variant.consequence);
      const confidence = normalizeLofteeConfidence(variant.lof);
      if (lofType === null && confidence === null) {
        continue;
      }
      if (lofType === null) {
        yield skipItem('unsupported_consequence', variant.consequence ?? variant.variant_id);
        continue;
      }

      const hgvsC = normalizeCodingChange(variant.hgvsc);
      if (hgvsC === null) {
        yield skipItem('unparseable_identity', variant.variant_id);
        continue;
      }
      const hgvsP = normalizeProteinChange(rawProtein) ?? rawProtein;

      yield writeItem({
        table: 'lof',
        gene: gene.symbol,
        identity: { hgvsC },
        features: {
          hgvsP,
          lofType,
          lofteeConfidence: confidence,
          lofteeFilter: parseOptionalText(variant.lof_filter),
          lofteeFlags: parseOptionalText(variant.lof_flags),
          ...truncationFeatures(hgvsP, gene.reference),
          ...parseVariantId(variant.variant_id, client.genomeBuild),
          ...frequencyFeatures(variant, client.dataset),
        },
        keepExistingWhenNull: ['gnomadAf', 'gnomadAfPopmax', 'gnomadAn'],
        alleleColumns: FREQUENCY_COLUMNS,
      });
    }
  }

  return { name: 'gnomad-lof', fetch };
}
