/**
 * Identifier Store
 *
 * Flat-file record of article identifiers that were already delivered.
 * One identifier per line, sorted ascending, rewritten in full on save.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { StoreIOError, errorMessage } from '../utils/errors.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Ascending code-unit order, independent of locale
 */
export function sortIdentifiers(identifiers: Iterable<string>): string[] {
  return [...identifiers].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export class IdentifierStore {
  constructor(readonly path: string) {}

  /**
   * Read persisted identifiers. A missing file is an empty store.
   */
  async load(): Promise<Set<string>> {
    let content: string;

    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info({ path: this.path }, 'Identifier store not found, starting empty');
        return new Set();
      }
      throw new StoreIOError(this.path, `Failed to read identifier store: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const identifiers = new Set<string>();
    for (const line of content.split('\n')) {
      const identifier = line.trim();
      if (identifier) {
        identifiers.add(identifier);
      }
    }

    logger.debug({ path: this.path, count: identifiers.size }, 'Identifier store loaded');
    return identifiers;
  }

  /**
   * Overwrite the backing file with every identifier
   */
  async save(identifiers: ReadonlySet<string>): Promise<void> {
    const lines = sortIdentifiers(identifiers);
    const content = lines.map((line) => `${line}\n`).join('');

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, content, 'utf-8');
    } catch (error) {
      throw new StoreIOError(this.path, `Failed to write identifier store: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    logger.debug({ path: this.path, count: lines.length }, 'Identifier store saved');
  }
}
