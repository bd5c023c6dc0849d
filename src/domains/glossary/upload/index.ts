/**
 * @module domains/glossary/upload
 */
export * from './BoundedUploader';
export * from './UriIssuer';
export * from './objectKey';
