/**
 * @module domains/glossary/filter
 */
export * from './FormatFilter';
