/**
 * allelebase CLI
 *
 * Usage:
 *   npm run cli -- build --genes KCNH2,KCNQ1 [--sources clinvar,gnomad|all] [--db path] [--batch-size n]
 *   npm run cli -- verify --genes KCNH2 [--db path]
 *   npm run cli -- env
 */

import { envResult } from './load-env.js';
import { getEnvDiagnostics, loadGeneReference, loadSettings, SETTINGS_KEYS, type Settings } from '@allelebase/config';
import {
  failedGenesBySource,
  formatBuildReport,
  formatVerification,
  hasFatalProblems,
  runBuild,
  verifyStore,
} from '@allelebase/core';
import { openStore } from '@allelebase/db';
import { createAdapters, parseSourceNames } from '@allelebase/sources';
import { parseArgs, USAGE, type BuildCommand, type VerifyCommand } from './args.js';

async function build(command: BuildCommand, settings: Settings): Promise<number> {
  const sources = parseSourceNames(command.sources);
  const geneReference = loadGeneReference(settings.geneReferenceFile);
  const databasePath = command.db ?? settings.databasePath;
  const store = openStore({ path: databasePath });

  try {
    console.log(`🧬 Building ${command.genes.join(', ')} from ${sources.join(', ')}`);
    console.log(`   Store: ${databasePath}`);

    const adapters = createAdapters(sources, { settings, coordinates: store });
    const report = await runBuild({
      store,
      adapters,
      genes: command.genes,
      geneReference,
      batchSize: command.batchSize ?? settings.batchSize,
    });

    console.log('');
    for (const line of formatBuildReport(report)) console.log(line);

    const failed = Object.entries(failedGenesBySource(report));
    if (failed.length > 0) {
      console.log('\n⚠️  Failed genes:');
      for (const [source, genes] of failed) {
        console.log(`   ${source}: ${genes?.join(', ') ?? ''}`);
      }
    }

    console.log('\n📊 Verification:');
    for (const line of formatVerification(verifyStore(store, report.genes))) console.log(`   ${line}`);

    if (hasFatalProblems(report)) {
      console.error(
        `\n❌ Build finished with ${report.fatal.length} fatal error(s), ${report.conflicts.length} conflict(s) ` +
          `and ${report.writeErrors.length} failed write(s)`
      );
      return 1;
    }
    console.log('\n✅ Build complete');
    return 0;
  } finally {
    store.close();
  }
}

function verify(command: VerifyCommand, settings: Settings): number {
  const databasePath = command.db ?? settings.databasePath;
  const store = openStore({ path: databasePath });
  try {
    console.log(`📊 Store: ${databasePath}`);
    for (const line of formatVerification(verifyStore(store, command.genes))) console.log(`   ${line}`);
    return 0;
  } finally {
    store.close();
  }
}

function env(settings: Settings): number {
  console.log('🔍 Environment');
  console.log(`   Repo root: ${envResult.repoRoot}`);
  console.log(`   .env: ${envResult.envFilePath} ${envResult.loaded ? '✅' : '❌'}`);
  console.log(`   .env.local: ${envResult.envLocalFilePath} ${envResult.localLoaded ? '✅' : '⚪'}`);

  const diagnostics = getEnvDiagnostics(SETTINGS_KEYS);
  for (const key of diagnostics.requiredKeys) {
    const source = key.source ? ` [from ${key.source}]` : '';
    console.log(`   ${key.present ? '✅' : '⚪'} ${key.key}${source}`);
  }
  for (const warning of diagnostics.warnings) {
    console.log(`   ⚠️  ${warning}`);
  }

  console.log('\n⚙️  Resolved settings');
  console.log(`   Database: ${settings.databasePath}`);
  console.log(`   Gene reference: ${settings.geneReferenceFile}`);
  console.log(`   ClinVar: ${settings.clinvarFile}`);
  console.log(`   AlphaMissense: ${settings.alphamissenseFile}`);
  console.log(`   REVEL: ${settings.revelFile}`);
  console.log(`   Genome build: ${settings.genomeBuild}`);
  console.log(`   gnomAD: ${settings.gnomad.apiUrl} (${settings.gnomad.dataset})`);
  console.log(`   CADD: ${settings.cadd.apiUrl} (${settings.cadd.version})`);
  return 0;
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 1;
  }

  const settings = loadSettings();
  switch (parsed.value.command) {
    case 'build':
      return build(parsed.value, settings);
    case 'verify':
      return verify(parsed.value, settings);
    case 'env':
      return env(settings);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    console.error(`\n❌ ${err.message}`);
    console.log(JSON.stringify({ event: 'cli.fail', command: process.argv[2], error: err.message }));
    process.exitCode = 1;
  }
);
