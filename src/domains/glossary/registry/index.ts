/**
 * @module domains/glossary/registry
 */
export * from './GlossaryRegistry';
