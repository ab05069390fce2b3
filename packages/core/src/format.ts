/**
 * Plain-text renderings of build and verification results
 */

import { SKIP_REASONS } from '@allelebase/sources';
import type { BuildReport, GeneRunResult } from './pipeline.js';
import type { Verification } from './verify.js';

function formatSkipped(skipped: GeneRunResult['skipped']): string {
  const parts = SKIP_REASONS.flatMap((reason) => {
    const count = skipped[reason];
    return count ? [`${reason}=${count}`] : [];
  });
  return parts.length > 0 ? `, skipped ${parts.join(' ')}` : '';
}

function formatCount(label: string, count: number): string {
  return count > 0 ? `, ${label} ${count}` : '';
}

export function formatGeneResult(result: GeneRunResult): string {
  const counts =
    `created ${result.created}, updated ${result.updated}, unresolved ${result.unresolved}, ` +
    `conflicts ${result.conflicts}${formatCount('allele mismatches', result.alleleMismatches)}` +
    `${formatCount('write errors', result.writeErrors)}${formatSkipped(result.skipped)}`;
  const error = result.error ? ` - ${result.error}` : '';
  return `  ${result.gene} ${result.status}: ${counts}${error}`;
}

export function formatBuildReport(report: BuildReport): string[] {
  const lines = [`Build of ${report.genes.join(', ')} from ${report.sources.join(', ')}`];

  for (const source of report.sources) {
    lines.push(`${source}:`);
    for (const result of report.results) {
      if (result.source === source) {
        lines.push(formatGeneResult(result));
      }
    }
  }

  if (report.conflicts.length > 0) {
    lines.push(`Conflicts (${report.conflicts.length}):`);
    for (const conflict of report.conflicts) {
      lines.push(`  ${conflict.source} ${conflict.gene}: ${conflict.message}`);
    }
  }
  if (report.writeErrors.length > 0) {
    lines.push(`Write errors (${report.writeErrors.length}):`);
    for (const failure of report.writeErrors) {
      lines.push(`  ${failure.source} ${failure.gene} ${failure.identity}: ${failure.message}`);
    }
  }
  if (report.fatal.length > 0) {
    lines.push(`Fatal (${report.fatal.length}):`);
    for (const fatal of report.fatal) {
      lines.push(`  ${fatal.source}: ${fatal.message}`);
    }
  }
  return lines;
}

export function formatVerification(verification: Verification): string[] {
  const lines = verification.genes.map(({ gene, missense, lof, penetrance }) =>
    [
      `${gene}:`,
      `missense ${missense.total} (clinvar ${missense.withClinvar}, alphamissense ${missense.withAlphamissense},`,
      `revel ${missense.withRevel}, cadd ${missense.withCadd}, gnomad ${missense.withGnomad});`,
      `lof ${lof.total} (clinvar ${lof.withClinvar}, gnomad ${lof.withGnomad}, cadd ${lof.withCadd},`,
      `HC ${lof.highConfidence}, NMD escape ${lof.nmdEscape});`,
      `penetrance ${penetrance}`,
    ].join(' ')
  );
  const { totals } = verification;
  lines.push(`Total: missense ${totals.missense}, lof ${totals.lof}, penetrance ${totals.penetrance}`);
  return lines;
}
