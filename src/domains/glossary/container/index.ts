/**
 * @module domains/glossary/container
 */
export * from './ContainerLifecycleManager';
