/**
 * Centralized environment loader
 *
 * Finds the workspace root and loads `.env` then `.env.local` from it.
 * Diagnostics report key presence and length only, never values.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  requiredKeys: EnvKeyStatus[];
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  /** key -> '.env' | '.env.local' */
  keySources: Record<string, string>;
}

const SECRET_MARKERS = ['TOKEN', 'SECRET', 'PASSWORD', 'KEY'];

function declaresWorkspaces(packageJsonPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    // Unreadable package.json is not a workspace root
    return false;
  }
}

/**
 * Walk up from `startPath` to the directory holding the workspace package.json
 * (or a .git folder). Falls back to `startPath`.
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && declaresWorkspaces(packageJsonPath)) {
      return current;
    }
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return SECRET_MARKERS.some((marker) => key.includes(marker));
}

/**
 * CRLF leftovers and other control characters (newline and tab are fine)
 */
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function loadEnvFile(
  path: string,
  label: string,
  keysLoaded: string[],
  keySources: Record<string, string>
): boolean {
  const result = config({ path, override: true });
  const parsed = result.parsed ?? {};

  for (const [key, value] of Object.entries(parsed)) {
    if (value.trim().length === 0) continue;
    keySources[key] = label;
    if (!keysLoaded.includes(key)) {
      keysLoaded.push(key);
    }
  }

  if (result.error && Object.keys(parsed).length === 0) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
    return false;
  }
  return true;
}

let cachedResult: EnvInitResult | null = null;

/**
 * Load `<root>/.env` (or ENV_FILE) and then `<root>/.env.local`.
 * Must run before anything reads process.env. Subsequent calls return the cached result.
 *
 * A variable that was already set to a non-empty value is restored if a file
 * blanked it.
 */
export function initEnv(envFileOverride?: string): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv = new Map<string, string>();
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv.set(key, value);
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadEnvFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadEnvFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, value] of existingEnv) {
    const current = process.env[key];
    if (!current || current.trim().length === 0) {
      process.env[key] = value;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };
  return cachedResult;
}

/**
 * Presence/length report for the given keys (safe to log)
 */
export function getEnvDiagnostics(requiredKeys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const keySources = cachedResult?.keySources ?? {};

  const keyStatus = requiredKeys.map((key): EnvKeyStatus => {
    const value = process.env[key]?.trim();
    if (!value) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!existsSync(envFilePath)) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }
  for (const key of requiredKeys) {
    const value = process.env[key];
    if (!value) continue;
    if (hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists: existsSync(envFilePath),
    requiredKeys: keyStatus,
    warnings,
  };
}

export function validateRequiredEnv(requiredKeys: readonly string[]): {
  valid: boolean;
  missing: string[];
} {
  const missing = requiredKeys.filter((key) => !process.env[key]?.trim());
  return { valid: missing.length === 0, missing };
}

/**
 * Trimmed value of a required variable
 * @throws Error naming the key when it is missing or blank
 */
export function requireEnv(key: string): string {
  const value = process.env[key]?.trim();
  if (!value) {
    throw new Error(
      `Missing or empty required environment variable: ${key}\n` +
        `Please check your .env file and ensure ${key} is set with a non-empty value.`
    );
  }
  return value;
}
