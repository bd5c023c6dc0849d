export * from './domains/glossary';
export {
  AzureGlossaryStorage,
  getAzureGlossaryStorage,
  getStorageConnectionFromEnv,
} from './infrastructure/storage';
export { logger, createChildLogger } from './shared/utils/logger';
