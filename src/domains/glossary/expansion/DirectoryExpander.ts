/**
 * DirectoryExpander
 *
 * Replaces every directory entry of the registry with one pending entry per
 * regular file it directly contains. Non-recursive: subdirectories are
 * skipped. Runs before format filtering.
 *
 * @module domains/glossary/expansion
 */

import { readdir, stat } from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { GlossaryIOError } from '../errors';
import { createPendingEntry, type GlossaryRegistry } from '../registry';
import type { GlossaryEntry } from '../types';

export interface DirectoryExpanderDependencies {
  logger?: Logger;
}

export class DirectoryExpander {
  private readonly log: Logger;

  constructor(deps?: DirectoryExpanderDependencies) {
    this.log = deps?.logger ?? createChildLogger({ service: 'DirectoryExpander' });
  }

  /**
   * Expand directory entries in place.
   *
   * @returns Number of directories expanded
   * @throws GlossaryIOError if a path is neither a readable file nor a readable directory
   */
  async expand(registry: GlossaryRegistry): Promise<number> {
    if (registry.isEmpty()) {
      return 0;
    }

    const expanded = new Map<string, GlossaryEntry>();
    let directoryCount = 0;

    for (const entry of registry.entries()) {
      const stats = await statPath(entry.sourcePath);

      if (stats.isFile()) {
        if (!expanded.has(entry.sourcePath)) {
          expanded.set(entry.sourcePath, entry);
        }
        continue;
      }

      if (!stats.isDirectory()) {
        throw new GlossaryIOError(
          `Glossary path is neither a file nor a directory: ${entry.sourcePath}`,
          entry.sourcePath
        );
      }

      directoryCount++;
      const files = await listFiles(entry.sourcePath);
      this.log.debug({ directory: entry.sourcePath, fileCount: files.length }, 'Expanded glossary directory');

      for (const file of files) {
        if (!expanded.has(file)) {
          expanded.set(file, createPendingEntry(file));
        }
      }
    }

    registry.replaceEntries(expanded);
    return directoryCount;
  }
}

async function statPath(sourcePath: string): Promise<Stats> {
  try {
    return await stat(sourcePath);
  } catch (error) {
    throw new GlossaryIOError(`Cannot access glossary path: ${sourcePath}`, sourcePath, { cause: error });
  }
}

/**
 * Immediate regular files of a directory (symlinks followed)
 */
async function listFiles(directory: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    throw new GlossaryIOError(`Cannot read glossary directory: ${directory}`, directory, { cause: error });
  }

  const files: string[] = [];
  for (const name of names.sort()) {
    const filePath = path.join(directory, name);
    const stats = await statPath(filePath);
    if (stats.isFile()) {
      files.push(filePath);
    }
  }
  return files;
}
