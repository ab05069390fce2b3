import type { GeneSummary, VariantStore } from '@allelebase/db';
import { normalizeGeneSymbol } from '@allelebase/identity';

export interface Verification {
  genes: GeneSummary[];
  totals: {
    missense: number;
    lof: number;
    penetrance: number;
  };
}

/**
 * Re-read the store and count what each gene ended up with
 */
export function verifyStore(store: VariantStore, genes: readonly string[]): Verification {
  const symbols = [...new Set(genes.map(normalizeGeneSymbol))].filter((gene) => gene.length > 0);
  const summaries = symbols.map((gene) => store.summarize(gene));

  return {
    genes: summaries,
    totals: {
      missense: summaries.reduce((sum, summary) => sum + summary.missense.total, 0),
      lof: summaries.reduce((sum, summary) => sum + summary.lof.total, 0),
      penetrance: summaries.reduce((sum, summary) => sum + summary.penetrance, 0),
    },
  };
}
