import { isAbsolute, posix } from 'node:path';
import picomatch from 'picomatch';

/** Paths an external diff may never touch, whatever its TF's footprint says. */
export const PROTECTED_PATH_PATTERNS = ['.fixpoint/**', '.git/**', 'node_modules/**'] as const;

const isProtected = picomatch([...PROTECTED_PATH_PATTERNS], { dot: true });

export function isProtectedPath(path: string): boolean {
  return isProtected(posix.normalize(path));
}

/** True when a tree-relative path would resolve outside the tree root. */
export function escapesTree(path: string): boolean {
  if (isAbsolute(path) || posix.isAbsolute(path) || /^[A-Za-z]:/.test(path)) return true;
  return path.split(/[\\/]/).includes('..');
}
