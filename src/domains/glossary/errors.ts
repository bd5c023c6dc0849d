/**
 * Glossary Errors
 *
 * Fatal failures of the staging pipeline. The original filesystem or
 * backend failure is kept as `cause`.
 *
 * @module domains/glossary/errors
 */

/**
 * Local filesystem failure (expansion, stat, size computation)
 */
export class GlossaryIOError extends Error {
  readonly path: string;
  readonly code?: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GlossaryIOError';
    this.path = path;
    this.code = errnoCode(options?.cause);
  }
}

/**
 * Storage backend rejected a create, upload, sign or delete request
 */
export class GlossaryStorageError extends Error {
  readonly operation: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    operation: string,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, options);
    this.name = 'GlossaryStorageError';
    this.operation = operation;
    this.statusCode = options?.statusCode;
  }
}

/**
 * Lifecycle misuse (e.g. a second container for the same registry)
 */
export class GlossaryStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GlossaryStateError';
  }
}

/**
 * The glossary container was already torn down. Terminal.
 */
export class ContainerDestroyedError extends GlossaryStateError {
  readonly containerName: string;

  constructor(containerName: string) {
    super(`Glossary container ${containerName} has been deleted and cannot be reused`);
    this.name = 'ContainerDestroyedError';
    this.containerName = containerName;
  }
}

export class GlossaryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GlossaryValidationError';
  }
}

function errnoCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const { code } = cause;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
