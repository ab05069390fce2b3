import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { findRepoRoot, getEnvDiagnostics, requireEnv, validateRequiredEnv } from './env.js';

describe('findRepoRoot', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('stops at the package.json that declares workspaces', () => {
    dir = mkdtempSync(join(tmpdir(), 'allelebase-root-'));
    const nested = join(dir, 'packages', 'db', 'src');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(dir, 'package.json'), JSON.stringify({ name: 'root', workspaces: ['packages/*'] }));
    writeFileSync(join(dir, 'packages', 'db', 'package.json'), JSON.stringify({ name: 'db' }));

    expect(findRepoRoot(nested)).toBe(dir);
  });
});

describe('getEnvDiagnostics', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reports presence and masks secret-looking keys', () => {
    vi.stubEnv('ALLELEBASE_TEST_API_TOKEN', 'test-secret-value');
    vi.stubEnv('ALLELEBASE_TEST_BUILD', 'GRCh38');
    vi.stubEnv('ALLELEBASE_TEST_EMPTY', '   ');

    const diagnostics = getEnvDiagnostics([
      'ALLELEBASE_TEST_API_TOKEN',
      'ALLELEBASE_TEST_BUILD',
      'ALLELEBASE_TEST_EMPTY',
    ]);

    expect(diagnostics.requiredKeys).toEqual([
      { key: 'ALLELEBASE_TEST_API_TOKEN', present: true, length: 17, maskedValue: 'test...alue', source: undefined },
      { key: 'ALLELEBASE_TEST_BUILD', present: true, length: 6, maskedValue: undefined, source: undefined },
      { key: 'ALLELEBASE_TEST_EMPTY', present: false },
    ]);
  });

  it('warns about quoted values', () => {
    vi.stubEnv('ALLELEBASE_TEST_QUOTED', '"data/variants.db"');

    const diagnostics = getEnvDiagnostics(['ALLELEBASE_TEST_QUOTED']);

    expect(diagnostics.warnings).toContain(
      'ALLELEBASE_TEST_QUOTED contains quotes or leading/trailing whitespace (may cause issues)'
    );
  });
});

describe('required variables', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('lists missing keys and returns trimmed values', () => {
    vi.stubEnv('ALLELEBASE_TEST_PRESENT', '  value  ');
    vi.stubEnv('ALLELEBASE_TEST_BLANK', '');

    expect(validateRequiredEnv(['ALLELEBASE_TEST_PRESENT', 'ALLELEBASE_TEST_BLANK'])).toEqual({
      valid: false,
      missing: ['ALLELEBASE_TEST_BLANK'],
    });
    expect(requireEnv('ALLELEBASE_TEST_PRESENT')).toBe('value');
    expect(() => requireEnv('ALLELEBASE_TEST_BLANK')).toThrow(
      'Missing or empty required environment variable: ALLELEBASE_TEST_BLANK'
    );
  });
});
