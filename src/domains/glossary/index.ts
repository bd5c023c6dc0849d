/**
 * Glossary Domain
 *
 * Stages glossary files in blob storage and issues the URIs a document
 * translation request references them by.
 *
 * @module domains/glossary
 */

export * from './types';
export * from './errors';
export * from './fileExtension';
export * from './config';
export * from './registry';
export * from './expansion';
export * from './filter';
export * from './container';
export * from './upload';
export type * from './storage';
export * from './GlossaryService';
