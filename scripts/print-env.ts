/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints environment loading diagnostics and the settings they resolve to,
 * without opening the store or touching any source.
 */

import { initEnv, getEnvDiagnostics, loadSettings, SETTINGS_KEYS } from '@allelebase/config';

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from .env: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics(SETTINGS_KEYS);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.requiredKeys) {
  const status = key.present ? '✅' : '⚪';
  const length = key.length ? ` (length: ${key.length})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${length}${source}`);
}

let settingsError: string | null = null;
try {
  const settings = loadSettings();
  console.log('\n⚙️  Resolved settings:');
  console.log(`   DATABASE_PATH -> ${settings.databasePath}`);
  console.log(`   GENE_REFERENCE_FILE -> ${settings.geneReferenceFile}`);
  console.log(`   GENOME_BUILD -> ${settings.genomeBuild}`);
  console.log(`   BATCH_SIZE -> ${settings.batchSize}`);
} catch (error) {
  settingsError = error instanceof Error ? error.message : String(error);
  console.log(`\n❌ ${settingsError}`);
}

// Structured JSON output (for machine parsing)
const structuredOutput = {
  event: 'env.diagnostics',
  envFilePath,
  envFileExists: loaded,
  envLocalFilePath,
  envLocalFileExists: localLoaded,
  keysLoadedCount: keysLoaded.length,
  settingsValid: settingsError === null,
  variables: diagnostics.requiredKeys.map((k) => ({
    key: k.key,
    present: k.present,
    length: k.length,
    source: k.source,
  })),
  warnings: diagnostics.warnings,
};

console.log('\n📊 Structured Output (JSON):');
console.log(JSON.stringify(structuredOutput, null, 2));

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}

if (settingsError !== null) {
  process.exitCode = 1;
}
