import { closeSync, createReadStream, existsSync, openSync, readSync } from 'fs';
import { createInterface } from 'readline';
import { createGunzip } from 'zlib';
import { MissingDataError } from './errors.js';
import type { SourceName } from './types.js';

const GZIP_MAGIC = [0x1f, 0x8b];

export function requireDataFile(source: SourceName, path: string, hint?: string): void {
  if (!existsSync(path)) {
    throw new MissingDataError(source, path, hint);
  }
}

export function isGzipFile(path: string): boolean {
  const fd = openSync(path, 'r');
  try {
    const head = Buffer.alloc(2);
    const read = readSync(fd, head, 0, 2, 0);
    return read === 2 && head[0] === GZIP_MAGIC[0] && head[1] === GZIP_MAGIC[1];
  } finally {
    closeSync(fd);
  }
}

/**
 * Lines of a text file, gunzipped on the fly when the file is gzip
 */
export async function* readLines(path: string): AsyncGenerator<string> {
  const input = createReadStream(path);
  const stream = isGzipFile(path) ? input.pipe(createGunzip()) : input;
  const reader = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of reader) {
      yield line;
    }
  } finally {
    reader.close();
    input.destroy();
  }
}
