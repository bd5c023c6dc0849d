/**
 * GlossaryService
 *
 * Stages the glossary files of one translation run in blob storage:
 * expands directories, drops unsupported formats, uploads the rest to a
 * transient container and issues signed and plain URIs for each file.
 * deleteAsync() removes the container once the run is over.
 *
 * Pipeline:
 *   DirectoryExpander -> FormatFilter -> ContainerLifecycleManager.ensureContainer
 *   -> BoundedUploader (UriIssuer per file) -> caller reads glossaries
 *   -> deleteAsync()
 *
 * @module domains/glossary
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { getAzureGlossaryStorage } from '@/infrastructure/storage';
import { getGlossaryConfig, type GlossaryConfig } from './config';
import { ContainerLifecycleManager } from './container';
import { GlossaryStorageError } from './errors';
import { DirectoryExpander } from './expansion';
import { FormatFilter } from './filter';
import { GlossaryRegistry } from './registry';
import type {
  ContainerRef,
  IGlossaryStorage,
  StorageConnectionInfo,
  StorageDeleteResponse,
} from './storage';
import { BoundedUploader, UriIssuer } from './upload';
import {
  EMPTY_UPLOAD_RESULT,
  type GlossaryEventHandlers,
  type GlossaryRegistryState,
  type TranslationGlossary,
  type UploadResult,
} from './types';

/**
 * Dependencies for GlossaryService (DI support for testing)
 */
export interface GlossaryServiceDependencies {
  storage?: IGlossaryStorage;
  /** Overrides config.allowedExtensions, e.g. the formats the translator accepts */
  allowedExtensions?: readonly string[];
  config?: GlossaryConfig;
  handlers?: GlossaryEventHandlers;
  logger?: Logger;
  now?: () => Date;
}

export class GlossaryService {
  private readonly log: Logger;
  private readonly registry: GlossaryRegistry;
  private readonly expander: DirectoryExpander;
  private readonly filter: FormatFilter;
  private readonly containers: ContainerLifecycleManager;
  private readonly uploader: BoundedUploader;
  private container: ContainerRef | null = null;
  private uploadStarted = false;
  private discardedPaths: string[] = [];

  constructor(glossaryFiles: readonly string[] | null | undefined, deps?: GlossaryServiceDependencies) {
    this.log = deps?.logger ?? createChildLogger({ service: 'GlossaryService' });
    const config = deps?.config ?? getGlossaryConfig();
    const storage = deps?.storage ?? getAzureGlossaryStorage();
    const handlers = deps?.handlers ?? {};
    const logger = deps?.logger;

    this.registry = new GlossaryRegistry(glossaryFiles);
    this.expander = new DirectoryExpander({ logger });
    this.filter = new FormatFilter(deps?.allowedExtensions ?? config.allowedExtensions, {
      logger,
      onDiscarded: handlers.onDiscarded,
    });
    this.containers = new ContainerLifecycleManager({ storage, logger });
    this.uploader = new BoundedUploader({
      storage,
      concurrency: config.uploadConcurrency,
      logger,
      onUploadComplete: handlers.onUploadComplete,
      uriIssuer: new UriIssuer({
        storage,
        signedUriTtlHours: config.signedUriTtlHours,
        logger,
        now: deps?.now,
      }),
    });
  }

  get state(): GlossaryRegistryState {
    return this.registry.getState();
  }

  /**
   * Uploaded glossaries keyed by source path, addressed by signed URI
   */
  get glossaries(): Map<string, TranslationGlossary> {
    return this.registry.toSignedUriGlossaries();
  }

  /**
   * Uploaded glossaries addressed by plain URI (managed identity).
   * Null until upload has started.
   */
  get plainUriGlossaries(): Map<string, TranslationGlossary> | null {
    return this.uploadStarted ? this.registry.toPlainUriGlossaries() : null;
  }

  /** Paths removed by the last filtering pass */
  get discarded(): readonly string[] {
    return this.discardedPaths;
  }

  /**
   * Glossaries to attach to a translation request
   */
  getTranslationGlossaries(useManagedIdentity = false): TranslationGlossary[] {
    const view = useManagedIdentity ? this.registry.toPlainUriGlossaries() : this.glossaries;
    return Array.from(view.values());
  }

  /**
   * Expand, filter and upload the glossary files.
   *
   * @param connection - Storage account used for the container
   * @param containerNameBase - Unique base name; the container is `${containerNameBase}gls`
   * @returns Files uploaded and their combined local size; zeros when there is nothing to upload
   */
  async uploadAsync(connection: StorageConnectionInfo, containerNameBase: string): Promise<UploadResult> {
    if (this.registry.isEmpty()) {
      return { ...EMPTY_UPLOAD_RESULT };
    }

    await this.expander.expand(this.registry);
    this.discardedPaths = this.filter.filter(this.registry).map((entry) => entry.sourcePath);

    if (this.registry.isEmpty()) {
      this.log.info({ discarded: this.discardedPaths.length }, 'No glossary files left after filtering');
      return { ...EMPTY_UPLOAD_RESULT };
    }

    this.container = await this.containers.ensureContainer(connection, containerNameBase);
    this.uploadStarted = true;
    return this.uploader.upload(this.registry, this.container);
  }

  /**
   * Delete the glossary container.
   *
   * @returns Backend response, or null when there were no glossaries
   * @throws GlossaryStorageError if the container was never created or the backend rejects the delete
   */
  async deleteAsync(): Promise<StorageDeleteResponse | null> {
    if (this.registry.isEmpty()) {
      return null;
    }

    if (!this.container) {
      const error = new GlossaryStorageError('Glossary container does not exist', 'deleteContainer');
      this.log.error({ error }, 'Glossary deletion failed');
      throw error;
    }

    return this.containers.teardown(this.container);
  }
}
