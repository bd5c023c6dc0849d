/**
 * ContainerLifecycleManager
 *
 * Owns the single transient container backing one glossary registry.
 * The container is created lazily, deleted once and never recreated.
 *
 * @module domains/glossary/container
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { ContainerNameSchema, GLOSSARY_CONTAINER_SUFFIX } from '../config';
import { ContainerDestroyedError, GlossaryStateError, GlossaryValidationError } from '../errors';
import type {
  ContainerRef,
  IGlossaryStorage,
  StorageConnectionInfo,
  StorageDeleteResponse,
} from '../storage';

export interface ContainerLifecycleManagerDependencies {
  storage: IGlossaryStorage;
  logger?: Logger;
}

type ContainerState =
  | { kind: 'none' }
  | { kind: 'creating'; containerName: string; pending: Promise<ContainerRef> }
  | { kind: 'active'; container: ContainerRef }
  | { kind: 'destroyed'; containerName: string };

export function toContainerName(nameBase: string): string {
  const containerName = nameBase + GLOSSARY_CONTAINER_SUFFIX;
  const parsed = ContainerNameSchema.safeParse(containerName);
  if (!parsed.success) {
    throw new GlossaryValidationError(`Invalid glossary container name: ${containerName}`);
  }
  return parsed.data;
}

export class ContainerLifecycleManager {
  private readonly log: Logger;
  private readonly storage: IGlossaryStorage;
  private state: ContainerState = { kind: 'none' };

  constructor(deps: ContainerLifecycleManagerDependencies) {
    this.storage = deps.storage;
    this.log = deps.logger ?? createChildLogger({ service: 'ContainerLifecycleManager' });
  }

  /**
   * Current container, if created and not yet deleted
   */
  get container(): ContainerRef | null {
    return this.state.kind === 'active' ? this.state.container : null;
  }

  /**
   * Create `nameBase + "gls"` if absent. Repeated calls with the same name,
   * including calls made while creation is in flight, share one backend call.
   *
   * @throws ContainerDestroyedError after teardown
   * @throws GlossaryStateError if a different container was already created
   * @throws GlossaryStorageError if the backend rejects creation
   */
  async ensureContainer(connection: StorageConnectionInfo, nameBase: string): Promise<ContainerRef> {
    const containerName = toContainerName(nameBase);

    switch (this.state.kind) {
      case 'destroyed':
        throw new ContainerDestroyedError(this.state.containerName);
      case 'creating':
        this.assertSameContainer(this.state.containerName, containerName);
        return this.state.pending;
      case 'active':
        this.assertSameContainer(this.state.container.name, containerName);
        return this.state.container;
      case 'none':
        break;
    }

    this.log.debug({ containerName }, 'Creating glossary container');
    const pending = this.storage.createContainerIfNotExists(connection, containerName);
    this.state = { kind: 'creating', containerName, pending };

    let container: ContainerRef;
    try {
      container = await pending;
    } catch (error) {
      this.state = { kind: 'none' };
      throw error;
    }

    this.state = { kind: 'active', container };
    this.log.info({ containerName: container.name }, 'Glossary container ready');
    return container;
  }

  /**
   * Delete the container. Backend failures are logged and rethrown unchanged.
   *
   * @throws ContainerDestroyedError if already deleted
   */
  async teardown(container: ContainerRef): Promise<StorageDeleteResponse> {
    if (this.state.kind === 'destroyed') {
      throw new ContainerDestroyedError(this.state.containerName);
    }
    if (this.state.kind === 'active' && this.state.container.name !== container.name) {
      throw new GlossaryStateError(
        `Container ${container.name} is not managed here (active: ${this.state.container.name})`
      );
    }

    let response: StorageDeleteResponse;
    try {
      response = await this.storage.deleteContainer(container);
    } catch (error) {
      this.log.error({ error, containerName: container.name }, 'Glossary deletion failed');
      throw error;
    }

    this.state = { kind: 'destroyed', containerName: container.name };
    this.log.info({ containerName: container.name }, 'Glossary container deleted');
    return response;
  }

  private assertSameContainer(current: string, requested: string): void {
    if (current !== requested) {
      throw new GlossaryStateError(`Glossary container ${current} already exists; cannot switch to ${requested}`);
    }
  }
}
