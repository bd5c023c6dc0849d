/**
 * @module domains/glossary/storage
 */
export type * from './IGlossaryStorage';
