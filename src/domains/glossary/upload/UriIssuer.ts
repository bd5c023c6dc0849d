/**
 * UriIssuer
 *
 * Issues the two addresses of an uploaded glossary: a signed URI with full
 * permissions and a fixed absolute expiry, and a plain URI for callers that
 * authenticate with a managed identity.
 *
 * @module domains/glossary/upload
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { GlossaryValidationError } from '../errors';
import { getFileExtension } from '../fileExtension';
import type { ContainerRef, IGlossaryStorage } from '../storage';
import type { IssuedGlossaryUris } from '../types';

const HOUR_MS = 60 * 60 * 1000;

export interface UriIssuerDependencies {
  storage: IGlossaryStorage;
  signedUriTtlHours: number;
  logger?: Logger;
  /** Clock used for the expiry computation */
  now?: () => Date;
}

/**
 * Upper-cased extension without the dot, e.g. 'terms.csv' -> 'CSV'
 */
export function toFormatCode(sourcePath: string): string {
  const extension = getFileExtension(sourcePath);
  if (!extension) {
    throw new GlossaryValidationError(`Glossary file has no extension: ${sourcePath}`);
  }
  return extension.slice(1).toUpperCase();
}

export class UriIssuer {
  private readonly log: Logger;
  private readonly storage: IGlossaryStorage;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(deps: UriIssuerDependencies) {
    this.storage = deps.storage;
    this.ttlMs = deps.signedUriTtlHours * HOUR_MS;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ service: 'UriIssuer' });
  }

  async issue(container: ContainerRef, objectKey: string, sourcePath: string): Promise<IssuedGlossaryUris> {
    const formatCode = toFormatCode(sourcePath);
    const signedUriExpiresOn = new Date(this.now().getTime() + this.ttlMs);

    const signedUri = await this.storage.generateSignedUri(container, objectKey, 'all', signedUriExpiresOn);
    const plainUri = this.storage.objectUri(container, objectKey);

    this.log.debug({ sourcePath, plainUri, formatCode, signedUriExpiresOn }, 'Glossary URIs issued');

    return { formatCode, signedUri, signedUriExpiresOn, plainUri };
  }
}
