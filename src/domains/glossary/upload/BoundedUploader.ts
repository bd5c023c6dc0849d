/**
 * BoundedUploader
 *
 * Uploads every pending registry entry to the glossary container with a
 * cap on concurrent uploads, and attaches the issued URIs to each entry.
 *
 * Concurrency:
 * - A slot is acquired before an upload is issued and released when that
 *   upload settles, so at most `concurrency` uploads are in flight.
 * - The issuing loop is the only writer of the batch counters.
 * - Each upload task writes only its own entry's status.
 *
 * Failure:
 * - A local I/O or signing failure aborts the batch before that file's
 *   upload is issued. Uploads already issued are joined, not rolled back,
 *   and the original error is rethrown.
 * - A rejected upload surfaces after all uploads settled.
 *
 * @module domains/glossary/upload
 */

import { stat } from 'fs/promises';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { Semaphore } from '@/shared/utils/semaphore';
import { GlossaryIOError } from '../errors';
import type { GlossaryRegistry } from '../registry';
import type { ContainerRef, IGlossaryStorage } from '../storage';
import {
  EMPTY_UPLOAD_RESULT,
  type GlossaryEntry,
  type IssuedGlossaryUris,
  type UploadResult,
} from '../types';
import { toObjectKey } from './objectKey';
import type { UriIssuer } from './UriIssuer';

export interface BoundedUploaderDependencies {
  storage: IGlossaryStorage;
  uriIssuer: UriIssuer;
  /** Max uploads in flight */
  concurrency: number;
  logger?: Logger;
  onUploadComplete?: (result: UploadResult) => void;
}

type UploadOutcome =
  | { ok: true }
  | { ok: false; sourcePath: string; error: unknown };

export class BoundedUploader {
  private readonly log: Logger;
  private readonly storage: IGlossaryStorage;
  private readonly uriIssuer: UriIssuer;
  private readonly concurrency: number;
  private readonly onUploadComplete?: (result: UploadResult) => void;

  constructor(deps: BoundedUploaderDependencies) {
    this.storage = deps.storage;
    this.uriIssuer = deps.uriIssuer;
    this.concurrency = deps.concurrency;
    this.onUploadComplete = deps.onUploadComplete;
    this.log = deps.logger ?? createChildLogger({ service: 'BoundedUploader' });
  }

  /**
   * Upload all pending entries of the registry.
   *
   * @returns Files uploaded and the sum of their local sizes
   * @throws GlossaryIOError if a local file cannot be read
   * @throws GlossaryStorageError if the backend rejects an upload or signing
   */
  async upload(registry: GlossaryRegistry, container: ContainerRef): Promise<UploadResult> {
    const pending = registry.entries().filter((entry) => entry.status === 'pending');
    if (pending.length === 0) {
      return { ...EMPTY_UPLOAD_RESULT };
    }

    this.log.info(
      { containerName: container.name, fileCount: pending.length, concurrency: this.concurrency },
      'Starting glossary upload'
    );

    const semaphore = new Semaphore(this.concurrency);
    const uploads: Promise<UploadOutcome>[] = [];
    let filesUploaded = 0;
    let totalBytes = 0;

    try {
      for (const entry of pending) {
        await semaphore.acquire();

        let sizeBytes: number;
        let objectKey: string;
        let uris: IssuedGlossaryUris;
        try {
          sizeBytes = await readFileSize(entry.sourcePath);
          objectKey = toObjectKey(entry.sourcePath);
          uris = await this.uriIssuer.issue(container, objectKey, entry.sourcePath);
        } catch (error) {
          semaphore.release();
          throw error;
        }

        // URIs are attached before the upload can mark the entry 'uploaded'
        Object.assign(entry, uris, { objectKey, sizeBytes });
        uploads.push(this.startUpload(entry, container, objectKey, semaphore));

        filesUploaded++;
        totalBytes += sizeBytes;
        this.log.debug({ sourcePath: entry.sourcePath, objectKey, sizeBytes }, 'Glossary upload issued');
      }
    } catch (error) {
      this.log.error(
        { error, filesUploaded, totalBytes, issued: uploads.length },
        'Glossary upload aborted'
      );
      await Promise.all(uploads);
      throw error;
    }

    const outcomes = await Promise.all(uploads);
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        throw outcome.error;
      }
    }

    const result: UploadResult = { filesUploaded, totalBytes };
    this.log.info(
      { containerName: container.name, ...result },
      `Glossary: ${filesUploaded} files, ${totalBytes} bytes uploaded`
    );
    this.onUploadComplete?.(result);
    return result;
  }

  /**
   * Issue one upload. Never rejects: the failure is returned so the batch
   * can surface it after every upload settled.
   */
  private async startUpload(
    entry: GlossaryEntry,
    container: ContainerRef,
    objectKey: string,
    semaphore: Semaphore
  ): Promise<UploadOutcome> {
    try {
      await this.storage.uploadObject(container, objectKey, entry.sourcePath);
      entry.status = 'uploaded';
      return { ok: true };
    } catch (error) {
      this.log.error({ error, sourcePath: entry.sourcePath, objectKey }, 'Glossary file upload failed');
      return { ok: false, sourcePath: entry.sourcePath, error };
    } finally {
      semaphore.release();
    }
  }
}

async function readFileSize(sourcePath: string): Promise<number> {
  try {
    const stats = await stat(sourcePath);
    if (!stats.isFile()) {
      throw new GlossaryIOError(`Glossary path is not a regular file: ${sourcePath}`, sourcePath);
    }
    return stats.size;
  } catch (error) {
    if (error instanceof GlossaryIOError) {
      throw error;
    }
    throw new GlossaryIOError(`Cannot read glossary file: ${sourcePath}`, sourcePath, { cause: error });
  }
}
