/**
 * IGlossaryStorage Interface
 *
 * Object-storage capabilities consumed by the glossary pipeline.
 * Implementations wrap backend rejections in GlossaryStorageError.
 *
 * @module domains/glossary/storage
 */

export interface StorageConnectionInfo {
  connectionString: string;
}

/**
 * Handle to a created container, threaded from creation to teardown
 */
export interface ContainerRef {
  name: string;
  url: string;
  connection: StorageConnectionInfo;
}

/** 'all' grants every blob permission the backend supports */
export type SignedUriPermissions = 'all' | 'read';

export interface StorageDeleteResponse {
  requestId?: string;
  date?: Date;
}

export interface IGlossaryStorage {
  /** Idempotent: succeeds when the container already exists */
  createContainerIfNotExists(
    connection: StorageConnectionInfo,
    containerName: string
  ): Promise<ContainerRef>;

  /** Upload a local file, overwriting any existing object under the key */
  uploadObject(container: ContainerRef, objectKey: string, localPath: string): Promise<void>;

  generateSignedUri(
    container: ContainerRef,
    objectKey: string,
    permissions: SignedUriPermissions,
    expiresOn: Date
  ): Promise<string>;

  /** Durable object address, no credential */
  objectUri(container: ContainerRef, objectKey: string): string;

  /** Rejects if the container does not exist */
  deleteContainer(container: ContainerRef): Promise<StorageDeleteResponse>;
}
