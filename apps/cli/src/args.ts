/**
 * Command-line parsing for `allelebase`
 */

export const USAGE = [
  'Usage:',
  '  allelebase build --genes KCNH2,KCNQ1 [--sources clinvar,gnomad,...|all] [--db path] [--batch-size n]',
  '  allelebase verify --genes KCNH2,KCNQ1 [--db path]',
  '  allelebase env',
].join('\n');

export interface BuildCommand {
  command: 'build';
  genes: string[];
  sources?: string;
  db?: string;
  batchSize?: number;
}

export interface VerifyCommand {
  command: 'verify';
  genes: string[];
  db?: string;
}

export interface EnvCommand {
  command: 'env';
}

export type CliCommand = BuildCommand | VerifyCommand | EnvCommand;

export type ParseResult = { ok: true; value: CliCommand } | { ok: false; error: string };

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseArgs(argv: readonly string[]): ParseResult {
  const [command, ...args] = argv;
  if (command === 'env') {
    return { ok: true, value: { command: 'env' } };
  }
  if (command !== 'build' && command !== 'verify') {
    return { ok: false, error: command ? `Unknown command: ${command}` : 'No command given' };
  }

  let genes: string[] = [];
  let sources: string | undefined;
  let db: string | undefined;
  let batchSize: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      return { ok: false, error: `Missing value for ${flag}` };
    }

    if (flag === '--genes') {
      genes = splitList(value);
    } else if (flag === '--db') {
      db = value;
    } else if (flag === '--sources' && command === 'build') {
      sources = value;
    } else if (flag === '--batch-size' && command === 'build') {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        return { ok: false, error: `--batch-size must be a positive integer, got ${value}` };
      }
      batchSize = parsed;
    } else {
      return { ok: false, error: `Unknown option for ${command}: ${flag}` };
    }
    i++;
  }

  if (genes.length === 0) {
    return { ok: false, error: '--genes is required' };
  }

  return command === 'build'
    ? { ok: true, value: { command, genes, sources, db, batchSize } }
    : { ok: true, value: { command, genes, db } };
}
