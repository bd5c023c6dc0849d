/**
 * FormatFilter
 *
 * Removes registry entries whose extension is not in the allow-list.
 * Removed entries are reported, not treated as errors.
 *
 * @module domains/glossary/filter
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { getFileExtension } from '../fileExtension';
import type { GlossaryRegistry } from '../registry';
import type { GlossaryEntry } from '../types';

export interface FormatFilterDependencies {
  logger?: Logger;
  /** Notified once per pass with every discarded path */
  onDiscarded?: (sourcePaths: string[]) => void;
}

export class FormatFilter {
  private readonly log: Logger;
  private readonly allowed: ReadonlySet<string>;
  private readonly onDiscarded?: (sourcePaths: string[]) => void;

  /**
   * @param allowedExtensions - Extensions with leading dot, compared case-insensitively
   */
  constructor(allowedExtensions: readonly string[], deps?: FormatFilterDependencies) {
    this.log = deps?.logger ?? createChildLogger({ service: 'FormatFilter' });
    this.allowed = new Set(allowedExtensions.map((ext) => ext.toLowerCase()));
    this.onDiscarded = deps?.onDiscarded;
  }

  isAllowed(sourcePath: string): boolean {
    const extension = getFileExtension(sourcePath).toLowerCase();
    return extension.length > 0 && this.allowed.has(extension);
  }

  /**
   * Filter the registry in place.
   *
   * @returns Discarded entries, marked 'discarded'
   */
  filter(registry: GlossaryRegistry): GlossaryEntry[] {
    const kept = new Map<string, GlossaryEntry>();
    const discarded: GlossaryEntry[] = [];

    for (const entry of registry.entries()) {
      if (this.isAllowed(entry.sourcePath)) {
        kept.set(entry.sourcePath, entry);
      } else {
        entry.status = 'discarded';
        discarded.push(entry);
      }
    }

    registry.replaceEntries(kept);

    if (discarded.length > 0) {
      const sourcePaths = discarded.map((entry) => entry.sourcePath);
      for (const sourcePath of sourcePaths) {
        this.log.warn({ sourcePath }, 'Glossary file ignored: unsupported format');
      }
      this.onDiscarded?.(sourcePaths);
    }

    return discarded;
  }
}
