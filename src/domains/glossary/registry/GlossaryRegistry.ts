/**
 * GlossaryRegistry
 *
 * In-memory map from source path to glossary entry. Either empty (no
 * glossary processing needed) or populated; a populated registry that
 * loses its last entry becomes empty again.
 *
 * Collections are never mutated while iterated: callers build a new map
 * and swap it in with replaceEntries().
 *
 * @module domains/glossary/registry
 */

import type {
  GlossaryEntry,
  GlossaryRegistryState,
  TranslationGlossary,
} from '../types';

export class GlossaryRegistry {
  private state: GlossaryRegistryState;

  constructor(sourcePaths?: readonly string[] | null) {
    this.state = { kind: 'empty' };
    if (!sourcePaths || sourcePaths.length === 0) {
      return;
    }

    const entries = new Map<string, GlossaryEntry>();
    for (const sourcePath of sourcePaths) {
      if (!entries.has(sourcePath)) {
        entries.set(sourcePath, createPendingEntry(sourcePath));
      }
    }
    this.state = { kind: 'populated', entries };
  }

  getState(): GlossaryRegistryState {
    return this.state;
  }

  isEmpty(): boolean {
    return this.state.kind === 'empty';
  }

  get size(): number {
    return this.state.kind === 'empty' ? 0 : this.state.entries.size;
  }

  /**
   * Snapshot of the current entries (entry objects are shared)
   */
  entries(): GlossaryEntry[] {
    return this.state.kind === 'empty' ? [] : Array.from(this.state.entries.values());
  }

  get(sourcePath: string): GlossaryEntry | undefined {
    return this.state.kind === 'empty' ? undefined : this.state.entries.get(sourcePath);
  }

  /**
   * Swap in a new entry map. An empty map moves the registry to the empty state.
   */
  replaceEntries(entries: Map<string, GlossaryEntry>): void {
    this.state = entries.size === 0 ? { kind: 'empty' } : { kind: 'populated', entries };
  }

  /**
   * Signed-URI view: source path -> descriptor, for uploaded entries
   */
  toSignedUriGlossaries(): Map<string, TranslationGlossary> {
    const result = new Map<string, TranslationGlossary>();
    for (const entry of this.entries()) {
      if (entry.signedUri && entry.formatCode) {
        result.set(entry.sourcePath, { glossaryUrl: entry.signedUri, format: entry.formatCode });
      }
    }
    return result;
  }

  /**
   * Plain-URI view for managed identity access. Same keys as the signed view.
   */
  toPlainUriGlossaries(): Map<string, TranslationGlossary> {
    const result = new Map<string, TranslationGlossary>();
    for (const entry of this.entries()) {
      if (entry.plainUri && entry.formatCode) {
        result.set(entry.sourcePath, { glossaryUrl: entry.plainUri, format: entry.formatCode });
      }
    }
    return result;
  }
}

export function createPendingEntry(sourcePath: string): GlossaryEntry {
  return { sourcePath, status: 'pending' };
}
