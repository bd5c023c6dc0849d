/**
 * @module domains/glossary/expansion
 */
export * from './DirectoryExpander';
