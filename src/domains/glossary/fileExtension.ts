import path from 'path';

/**
 * Extension of the file name including the dot, or '' if there is none.
 *
 * Unlike path.extname, a dotfile such as '.csv' counts as having the
 * extension '.csv'. A trailing dot ('terms.') gives ''.
 */
export function getFileExtension(sourcePath: string): string {
  const fileName = path.basename(sourcePath);
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 && dot < fileName.length - 1 ? fileName.slice(dot) : '';
}
