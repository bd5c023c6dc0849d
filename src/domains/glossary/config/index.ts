/**
 * @module domains/glossary/config
 */
export * from './glossary.config';
