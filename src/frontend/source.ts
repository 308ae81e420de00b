import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Where the lexer gets source text from.
 *
 * `read` returns `undefined` when nothing exists at `path`; any other failure propagates.
 */
export interface SourceReader {
  read(path: string): string | undefined;
}

/**
 * Reads UTF-8 source files from disk.
 */
export const fileSourceReader: SourceReader = {
  read(path: string): string | undefined {
    if (!existsSync(path)) return undefined;
    return readFileSync(path, 'utf8');
  },
};

/**
 * In-memory reader over a path->text record. Keys are resolved against the working directory,
 * the same way include paths are.
 */
export function memorySourceReader(files: Record<string, string>): SourceReader {
  const byPath = new Map<string, string>();
  for (const [path, text] of Object.entries(files)) byPath.set(resolve(path), text);
  return {
    read: (path) => byPath.get(resolve(path)),
  };
}
