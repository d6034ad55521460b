import picomatch from 'picomatch';

import { listFilesRec } from '../../utils/fs.js';

export interface SourceTree {
  root: string;
  /** Tree-relative POSIX paths, sorted. */
  files: string[];
}

export interface TreeFilter {
  include: string[];
  exclude: string[];
}

export const DEFAULT_TREE_FILTER: TreeFilter = {
  include: ['**/*'],
  exclude: ['node_modules/**', 'dist/**', 'coverage/**', '.fixpoint/**']
};

const IGNORED_DIRS = new Set(['.git', 'node_modules']);

export async function collectTree(root: string, filter: TreeFilter = DEFAULT_TREE_FILTER): Promise<SourceTree> {
  const files = await listFilesRec(root, IGNORED_DIRS);
  const included = picomatch(filter.include, { dot: true });
  const excluded = filter.exclude.length ? picomatch(filter.exclude, { dot: true }) : () => false;
  return { root, files: files.filter((f) => included(f) && !excluded(f)) };
}

/** Restrict a tree to the given paths (e.g. a change footprint); order stays sorted. */
export function narrowTree(tree: SourceTree, files: Iterable<string>): SourceTree {
  const keep = new Set(files);
  return { root: tree.root, files: tree.files.filter((f) => keep.has(f)) };
}
