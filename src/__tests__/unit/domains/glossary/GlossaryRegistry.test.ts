import { describe, it, expect } from 'vitest';
import { GlossaryRegistry, createPendingEntry } from '@/domains/glossary/registry';
import type { GlossaryEntry } from '@/domains/glossary/types';

describe('GlossaryRegistry', () => {
  describe('construction', () => {
    it('should be empty for null input', () => {
      const registry = new GlossaryRegistry(null);
      expect(registry.isEmpty()).toBe(true);
      expect(registry.getState()).toEqual({ kind: 'empty' });
    });

    it('should be empty for an empty list', () => {
      const registry = new GlossaryRegistry([]);
      expect(registry.isEmpty()).toBe(true);
      expect(registry.size).toBe(0);
      expect(registry.entries()).toEqual([]);
    });

    it('should register each path once as pending', () => {
      const registry = new GlossaryRegistry(['a.csv', 'b.tsv', 'a.csv']);

      expect(registry.size).toBe(2);
      expect(registry.get('a.csv')).toEqual({ sourcePath: 'a.csv', status: 'pending' });
      expect(registry.get('b.tsv')).toEqual({ sourcePath: 'b.tsv', status: 'pending' });
    });
  });

  describe('replaceEntries()', () => {
    it('should swap in the new map', () => {
      const registry = new GlossaryRegistry(['a.csv']);
      const next = new Map<string, GlossaryEntry>([['b.csv', createPendingEntry('b.csv')]]);

      registry.replaceEntries(next);

      expect(registry.get('a.csv')).toBeUndefined();
      expect(registry.get('b.csv')).toEqual({ sourcePath: 'b.csv', status: 'pending' });
    });

    it('should move to the empty state when given an empty map', () => {
      const registry = new GlossaryRegistry(['a.csv']);

      registry.replaceEntries(new Map());

      expect(registry.getState()).toEqual({ kind: 'empty' });
    });
  });

  describe('URI views', () => {
    it('should expose signed and plain views with identical keys for uploaded entries', () => {
      const registry = new GlossaryRegistry(['a.csv', 'b.tsv']);
      Object.assign(registry.get('a.csv') ?? {}, {
        status: 'uploaded',
        formatCode: 'CSV',
        signedUri: 'https://x/a.csv?sig=1',
        plainUri: 'https://x/a.csv',
      });

      const signed = registry.toSignedUriGlossaries();
      const plain = registry.toPlainUriGlossaries();

      expect(Array.from(signed.keys())).toEqual(['a.csv']);
      expect(Array.from(plain.keys())).toEqual(['a.csv']);
      expect(signed.get('a.csv')).toEqual({ glossaryUrl: 'https://x/a.csv?sig=1', format: 'CSV' });
      expect(plain.get('a.csv')).toEqual({ glossaryUrl: 'https://x/a.csv', format: 'CSV' });
    });
  });
});
