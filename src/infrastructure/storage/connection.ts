import { env } from '@/infrastructure/config/environment';
import { GlossaryValidationError } from '@/domains/glossary/errors';
import type { StorageConnectionInfo } from '@/domains/glossary/storage';

/**
 * Storage connection from STORAGE_CONNECTION_STRING
 *
 * @throws GlossaryValidationError if the variable is not set
 */
export function getStorageConnectionFromEnv(): StorageConnectionInfo {
  const connectionString = env.STORAGE_CONNECTION_STRING;
  if (!connectionString) {
    throw new GlossaryValidationError('STORAGE_CONNECTION_STRING is required');
  }
  return { connectionString };
}
