/**
 * GlossaryService Unit Tests
 *
 * End-to-end pipeline over real temporary files and InMemoryGlossaryStorage.
 *
 * Pattern: vi.hoisted() logger mock + DI constructor injection
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GlossaryFileFixture } from '../../../fixtures/GlossaryFileFixture';
import { InMemoryGlossaryStorage, TEST_CONNECTION } from '../../../mocks/InMemoryGlossaryStorage';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('@/shared/utils/logger', () => ({
  logger: mockLogger,
  createChildLogger: vi.fn(() => mockLogger),
}));

import { GlossaryService, type GlossaryServiceDependencies } from '@/domains/glossary/GlossaryService';
import { DEFAULT_GLOSSARY_CONFIG } from '@/domains/glossary/config';
import {
  ContainerDestroyedError,
  GlossaryIOError,
  GlossaryStorageError,
} from '@/domains/glossary/errors';
import { toObjectKey } from '@/domains/glossary/upload';

const HOUR_MS = 60 * 60 * 1000;
const issuedAt = new Date('2026-10-19T09:30:00.000Z');

describe('GlossaryService', () => {
  let workspace: GlossaryFileFixture;
  let storage: InMemoryGlossaryStorage;
  const onDiscarded = vi.fn();
  const onUploadComplete = vi.fn();

  const createService = (
    files: readonly string[] | null,
    overrides?: Partial<GlossaryServiceDependencies>
  ): GlossaryService =>
    new GlossaryService(files, {
      storage,
      config: DEFAULT_GLOSSARY_CONFIG,
      handlers: { onDiscarded, onUploadComplete },
      now: () => issuedAt,
      ...overrides,
    });

  beforeEach(async () => {
    vi.clearAllMocks();
    storage = new InMemoryGlossaryStorage();
    workspace = await GlossaryFileFixture.create({
      'a.csv': 'hello,hallo\n',
      'b.txt': 'not a glossary\n',
      'c.tsv': 'yes\tja\n',
      'dir/x.csv': 'x,y\n',
      'dir/y.exe': 'MZ',
    });
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('uploadAsync()', () => {
    it('should discard unsupported formats and upload the rest with CSV and TSV tags', async () => {
      const a = workspace.path('a.csv');
      const b = workspace.path('b.txt');
      const c = workspace.path('c.tsv');
      const service = createService([a, b, c], { allowedExtensions: ['.csv', '.tsv'] });

      const result = await service.uploadAsync(TEST_CONNECTION, 'run1');

      expect(onDiscarded).toHaveBeenCalledTimes(1);
      expect(onDiscarded).toHaveBeenCalledWith([b]);
      expect(service.discarded).toEqual([b]);
      expect(result).toEqual({ filesUploaded: 2, totalBytes: 19 });
      expect(onUploadComplete).toHaveBeenCalledWith({ filesUploaded: 2, totalBytes: 19 });

      const glossaries = service.glossaries;
      expect(Array.from(glossaries.keys())).toEqual([a, c]);
      expect(glossaries.get(a)?.format).toBe('CSV');
      expect(glossaries.get(c)?.format).toBe('TSV');

      const plain = service.plainUriGlossaries;
      expect(plain?.get(a)?.format).toBe('CSV');
      expect(plain?.get(c)?.format).toBe('TSV');
      expect(Array.from(plain?.keys() ?? [])).toEqual(Array.from(glossaries.keys()));
    });

    it('should expand a directory before filtering', async () => {
      const service = createService([workspace.path('dir')], { allowedExtensions: ['.csv'] });

      const result = await service.uploadAsync(TEST_CONNECTION, 'run1');

      expect(result).toEqual({ filesUploaded: 1, totalBytes: 4 });
      expect(onDiscarded).toHaveBeenCalledWith([workspace.path('dir/y.exe')]);
      expect(Array.from(service.glossaries.keys())).toEqual([workspace.path('dir/x.csv')]);
    });

    it('should issue both URIs for every entry with expiry five hours after issuance', async () => {
      const service = createService([workspace.path('a.csv'), workspace.path('dir/x.csv')]);

      await service.uploadAsync(TEST_CONNECTION, 'run1');

      const state = service.state;
      expect(state.kind).toBe('populated');
      if (state.kind !== 'populated') return;

      for (const entry of state.entries.values()) {
        expect(entry.status).toBe('uploaded');
        expect(entry.signedUri).toBeDefined();
        expect(entry.plainUri).toBeDefined();
        expect(entry.formatCode).toBe('CSV');
        expect(entry.signedUriExpiresOn?.getTime()).toBe(issuedAt.getTime() + 5 * HOUR_MS);
      }
    });

    it('should return zeros and create no container for empty input', async () => {
      const service = createService([]);

      const result = await service.uploadAsync(TEST_CONNECTION, 'run1');

      expect(result).toEqual({ filesUploaded: 0, totalBytes: 0 });
      expect(storage.createCalls).toBe(0);
      expect(service.state).toEqual({ kind: 'empty' });
      expect(service.plainUriGlossaries).toBeNull();
    });

    it('should short-circuit when filtering removes every file', async () => {
      const service = createService([workspace.path('b.txt')], { allowedExtensions: ['.csv'] });

      const result = await service.uploadAsync(TEST_CONNECTION, 'run1');

      expect(result).toEqual({ filesUploaded: 0, totalBytes: 0 });
      expect(storage.createCalls).toBe(0);
      expect(service.state).toEqual({ kind: 'empty' });
      expect(onUploadComplete).not.toHaveBeenCalled();
    });

    it('should fail with GlossaryIOError for a file removed after registration', async () => {
      const service = createService([workspace.path('a.csv'), workspace.path('c.tsv')]);
      await workspace.remove('c.tsv');

      await expect(service.uploadAsync(TEST_CONNECTION, 'run1')).rejects.toBeInstanceOf(GlossaryIOError);
    });

    it('should refuse to upload again after the container was deleted', async () => {
      const service = createService([workspace.path('a.csv')]);
      await service.uploadAsync(TEST_CONNECTION, 'run1');
      await service.deleteAsync();

      await expect(service.uploadAsync(TEST_CONNECTION, 'run1')).rejects.toBeInstanceOf(
        ContainerDestroyedError
      );
    });
  });

  describe('getTranslationGlossaries()', () => {
    it('should return signed URIs by default and plain URIs for managed identity', async () => {
      const a = workspace.path('a.csv');
      const service = createService([a]);
      await service.uploadAsync(TEST_CONNECTION, 'run1');

      const [signed] = service.getTranslationGlossaries();
      const [plain] = service.getTranslationGlossaries(true);

      expect(signed?.glossaryUrl).toContain('sig=test-signature');
      expect(plain).toEqual({
        glossaryUrl: `https://teststorage.blob.local/run1gls/${toObjectKey(a)}`,
        format: 'CSV',
      });
    });
  });

  describe('deleteAsync()', () => {
    it('should be a no-op returning null for an empty registry', async () => {
      const service = createService(null);

      await expect(service.deleteAsync()).resolves.toBeNull();
      expect(storage.deleteCalls).toBe(0);
    });

    it('should be a no-op after filtering emptied the registry', async () => {
      const service = createService([workspace.path('b.txt')], { allowedExtensions: ['.csv'] });
      await service.uploadAsync(TEST_CONNECTION, 'run1');

      await expect(service.deleteAsync()).resolves.toBeNull();
      expect(storage.deleteCalls).toBe(0);
    });

    it('should delete the container and return the backend response', async () => {
      const service = createService([workspace.path('a.csv')]);
      await service.uploadAsync(TEST_CONNECTION, 'run1');

      const response = await service.deleteAsync();

      expect(response).toEqual({ requestId: 'req-1', date: new Date(0) });
      expect(storage.containers.has('run1gls')).toBe(false);
      // Registry is stale but not cleared
      expect(service.glossaries.size).toBe(1);
    });

    it('should fail when the container was never created', async () => {
      const service = createService([workspace.path('a.csv')]);

      await expect(service.deleteAsync()).rejects.toBeInstanceOf(GlossaryStorageError);
      expect(storage.deleteCalls).toBe(0);
    });

    it('should propagate a backend rejection', async () => {
      const service = createService([workspace.path('a.csv')]);
      await service.uploadAsync(TEST_CONNECTION, 'run1');
      const rejection = new GlossaryStorageError('AuthorizationFailure', 'deleteContainer', {
        statusCode: 403,
      });
      storage.deleteFailure = rejection;

      await expect(service.deleteAsync()).rejects.toBe(rejection);
    });
  });
});
