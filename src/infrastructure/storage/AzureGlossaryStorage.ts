import { BlobSASPermissions, BlobServiceClient, RestError } from '@azure/storage-blob';
import type { ContainerClient } from '@azure/storage-blob';
import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import { GlossaryIOError, GlossaryStorageError } from '@/domains/glossary/errors';
import type {
  ContainerRef,
  IGlossaryStorage,
  SignedUriPermissions,
  StorageConnectionInfo,
  StorageDeleteResponse,
} from '@/domains/glossary/storage';

// read, add, create, write, delete, deleteVersion, permanentDelete, tag, move, execute, setImmutabilityPolicy
const ALL_BLOB_PERMISSIONS = 'racwdxytmei';

const SAS_PERMISSIONS: Record<SignedUriPermissions, string> = {
  all: ALL_BLOB_PERMISSIONS,
  read: 'r',
};

/**
 * Azure Blob Storage implementation of IGlossaryStorage
 *
 * - Clients are created from the connection string of each container ref
 * - Signed URIs are service SAS URLs; the connection string must carry an account key
 * - Every backend rejection is wrapped once in GlossaryStorageError
 */
export class AzureGlossaryStorage implements IGlossaryStorage {
  private static instance: AzureGlossaryStorage | null = null;
  private readonly logger: Logger;
  private readonly serviceClients = new Map<string, BlobServiceClient>();

  constructor(logger?: Logger) {
    this.logger = logger ?? createChildLogger({ service: 'AzureGlossaryStorage' });
  }

  public static getInstance(): AzureGlossaryStorage {
    if (!AzureGlossaryStorage.instance) {
      AzureGlossaryStorage.instance = new AzureGlossaryStorage();
    }
    return AzureGlossaryStorage.instance;
  }

  public static resetInstance(): void {
    AzureGlossaryStorage.instance = null;
  }

  public async createContainerIfNotExists(
    connection: StorageConnectionInfo,
    containerName: string
  ): Promise<ContainerRef> {
    const containerClient = this.getServiceClient(connection).getContainerClient(containerName);

    try {
      const response = await containerClient.createIfNotExists();
      this.logger.info({ containerName, created: response.succeeded }, 'Container ensured');
    } catch (error) {
      this.logger.error({ error, containerName }, 'Failed to create container');
      throw toStorageError(error, 'createContainer', `Failed to create container ${containerName}`);
    }

    return { name: containerName, url: containerClient.url, connection };
  }

  public async uploadObject(container: ContainerRef, objectKey: string, localPath: string): Promise<void> {
    const blockBlobClient = this.getContainerClient(container).getBlockBlobClient(objectKey);

    try {
      await blockBlobClient.uploadFile(localPath);
      this.logger.debug({ containerName: container.name, objectKey }, 'Blob uploaded');
    } catch (error) {
      if (isSystemError(error)) {
        throw new GlossaryIOError(`Cannot read ${localPath} for upload`, localPath, { cause: error });
      }
      throw toStorageError(error, 'uploadObject', `Failed to upload ${objectKey}`);
    }
  }

  public async generateSignedUri(
    container: ContainerRef,
    objectKey: string,
    permissions: SignedUriPermissions,
    expiresOn: Date
  ): Promise<string> {
    const blobClient = this.getContainerClient(container).getBlobClient(objectKey);

    try {
      return await blobClient.generateSasUrl({
        permissions: BlobSASPermissions.parse(SAS_PERMISSIONS[permissions]),
        expiresOn,
      });
    } catch (error) {
      throw toStorageError(error, 'generateSignedUri', `Failed to sign URI for ${objectKey}`);
    }
  }

  public objectUri(container: ContainerRef, objectKey: string): string {
    return this.getContainerClient(container).getBlobClient(objectKey).url;
  }

  public async deleteContainer(container: ContainerRef): Promise<StorageDeleteResponse> {
    try {
      const response = await this.getContainerClient(container).delete();
      return { requestId: response.requestId, date: response.date };
    } catch (error) {
      throw toStorageError(error, 'deleteContainer', `Failed to delete container ${container.name}`);
    }
  }

  private getContainerClient(container: ContainerRef): ContainerClient {
    return this.getServiceClient(container.connection).getContainerClient(container.name);
  }

  private getServiceClient(connection: StorageConnectionInfo): BlobServiceClient {
    const cached = this.serviceClients.get(connection.connectionString);
    if (cached) {
      return cached;
    }

    let client: BlobServiceClient;
    try {
      client = BlobServiceClient.fromConnectionString(connection.connectionString);
    } catch (error) {
      throw toStorageError(error, 'connect', 'Invalid storage connection string');
    }
    this.serviceClients.set(connection.connectionString, client);
    return client;
  }
}

function toStorageError(error: unknown, operation: string, message: string): GlossaryStorageError {
  if (error instanceof GlossaryStorageError) {
    return error;
  }
  const statusCode = error instanceof RestError ? error.statusCode : undefined;
  const detail = error instanceof Error ? `: ${error.message}` : '';
  return new GlossaryStorageError(`${message}${detail}`, operation, { cause: error, statusCode });
}

/**
 * Node.js fs errors carry an errno code and the offending path
 */
function isSystemError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && 'syscall' in error;
}

export function getAzureGlossaryStorage(): AzureGlossaryStorage {
  return AzureGlossaryStorage.getInstance();
}

/**
 * Reset for testing
 */
export function __resetAzureGlossaryStorage(): void {
  AzureGlossaryStorage.resetInstance();
}
