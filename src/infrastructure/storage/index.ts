/**
 * Storage infrastructure
 * @module infrastructure/storage
 */
export * from './AzureGlossaryStorage';
export * from './connection';
