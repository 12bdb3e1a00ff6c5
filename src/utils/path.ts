import { extname } from 'node:path';

const MAX_NAME_LENGTH = 100;

export function getExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

/** Make a pass or function name usable as a file name component. */
export function sanitizeFileName(name: string): string {
  const clean = name
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/[,()[\]]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');

  return clean.length > MAX_NAME_LENGTH ? clean.slice(0, MAX_NAME_LENGTH) : clean;
}
