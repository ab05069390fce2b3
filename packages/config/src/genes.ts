/**
 * Gene reference table (symbol -> external identifiers)
 *
 * Loaded once at startup and passed by reference to whatever needs a lookup.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';

const accession = z.string().trim().min(1);

const GeneEntrySchema = z.object({
  uniprotId: accession.optional(),
  ensemblGeneId: accession.optional(),
  canonicalTranscript: accession.optional(),
  transcripts: z.array(accession).default([]),
  chromosome: accession.optional(),
  proteinLength: z.number().int().positive().optional(),
  /** First amino-acid position encoded by the last exon */
  lastExonStartAa: z.number().int().positive().optional(),
});

const GeneFileSchema = z.object({
  genes: z.record(GeneEntrySchema),
});

export type GeneReferenceEntry = Readonly<
  Omit<z.infer<typeof GeneEntrySchema>, 'transcripts'> & { symbol: string; transcripts: readonly string[] }
>;

export type GeneReference = ReadonlyMap<string, GeneReferenceEntry>;

/**
 * Build an immutable reference from already-parsed JSON
 */
export function createGeneReference(input: unknown): GeneReference {
  const parsed = GeneFileSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid gene reference:\n  - ${problems.join('\n  - ')}`);
  }

  const entries = new Map<string, GeneReferenceEntry>();
  for (const [rawSymbol, entry] of Object.entries(parsed.data.genes)) {
    const symbol = rawSymbol.trim().toUpperCase();
    entries.set(
      symbol,
      Object.freeze({ ...entry, symbol, transcripts: Object.freeze([...entry.transcripts]) })
    );
  }
  return entries;
}

export function loadGeneReference(path: string): GeneReference {
  if (!existsSync(path)) {
    throw new Error(`Gene reference file not found: ${path}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Gene reference file is not valid JSON (${path}): ${message}`);
  }
  return createGeneReference(json);
}

/**
 * Entry for `symbol`, or a bare entry when the table does not know the gene
 */
export function resolveGene(reference: GeneReference, symbol: string): GeneReferenceEntry {
  const normalized = symbol.trim().toUpperCase();
  return reference.get(normalized) ?? Object.freeze({ symbol: normalized, transcripts: Object.freeze([]) });
}
