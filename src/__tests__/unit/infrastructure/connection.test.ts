import { describe, it, expect, vi } from 'vitest';

const mockEnv = vi.hoisted(() => ({
  STORAGE_CONNECTION_STRING: undefined as string | undefined,
}));

vi.mock('@/infrastructure/config/environment', () => ({
  env: mockEnv,
}));

import { getStorageConnectionFromEnv } from '@/infrastructure/storage/connection';
import { GlossaryValidationError } from '@/domains/glossary/errors';

describe('getStorageConnectionFromEnv()', () => {
  it('should build the connection from STORAGE_CONNECTION_STRING', () => {
    mockEnv.STORAGE_CONNECTION_STRING = 'UseDevelopmentStorage=true';

    expect(getStorageConnectionFromEnv()).toEqual({ connectionString: 'UseDevelopmentStorage=true' });
  });

  it('should fail when the variable is missing', () => {
    mockEnv.STORAGE_CONNECTION_STRING = undefined;

    expect(() => getStorageConnectionFromEnv()).toThrow(GlossaryValidationError);
  });
});
