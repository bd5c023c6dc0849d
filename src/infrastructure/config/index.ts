/**
 * Application configuration
 * @module infrastructure/config
 */
export * from './environment';
