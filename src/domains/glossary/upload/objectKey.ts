import { GlossaryValidationError } from '../errors';

/**
 * Normalize a local file path into a storage-safe object key.
 *
 * Keeps the directory structure so files with the same name in different
 * directories do not overwrite each other.
 *
 * @example
 * toObjectKey('C:\\data\\Terms #1.csv') // => 'data/Terms-1.csv'
 * toObjectKey('/tmp/glossaries/de.tsv') // => 'tmp/glossaries/de.tsv'
 */
export function toObjectKey(sourcePath: string): string {
  const segments = sourcePath
    .replace(/\\/g, '/')
    .replace(/^[A-Za-z]:/, '')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..')
    .map((segment) => segment.replace(/[^A-Za-z0-9._-]/g, '-').replace(/-+/g, '-'));

  if (segments.length === 0) {
    throw new GlossaryValidationError(`Cannot derive an object key from path: ${sourcePath}`);
  }

  return segments.join('/');
}
