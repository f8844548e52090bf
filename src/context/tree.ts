/**
 * Directory Tree - folds the flat path list into a nested tree and renders it
 * as a `tree`-style ASCII diagram.
 *
 * Children live in a Map keyed by segment name. Map iteration order is
 * insertion order, which depends on input order; the renderer sorts every
 * level itself, so output never depends on how the tree was built.
 */

import { relative, isAbsolute, sep } from 'path';
import { compareNames } from './collector.js';

export interface FileNode {
  kind: 'file';
}

export interface DirectoryNode {
  kind: 'directory';
  children: Map<string, TreeNode>;
}

export type TreeNode = FileNode | DirectoryNode;

export function createDirectory(): DirectoryNode {
  return { kind: 'directory', children: new Map() };
}

/** Path segments of `path` below `rootPath`; the given path's segments when it lies elsewhere. */
export function pathSegments(rootPath: string, path: string): string[] {
  const rel = relative(rootPath, path);
  const outside = rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
  const source = outside ? path : rel;
  return source.split(sep === '/' ? '/' : /[/\\]/).filter(segment => segment !== '' && segment !== '.');
}

/**
 * Insert one path. Every segment but the last becomes (or reuses) a directory;
 * the last becomes a file leaf. Re-inserting a path overwrites the same leaf.
 */
export function insertPath(root: DirectoryNode, segments: readonly string[]): void {
  if (segments.length === 0) return;

  let current = root;
  for (const segment of segments.slice(0, -1)) {
    const existing = current.children.get(segment);
    if (existing?.kind === 'directory') {
      current = existing;
      continue;
    }
    const dir = createDirectory();
    current.children.set(segment, dir);
    current = dir;
  }

  current.children.set(segments[segments.length - 1], { kind: 'file' });
}

export function buildTree(rootPath: string, paths: readonly string[]): DirectoryNode {
  const root = createDirectory();
  for (const path of paths) {
    insertPath(root, pathSegments(rootPath, path));
  }
  return root;
}

function* treeHelper(node: DirectoryNode, prefix: string): Generator<string> {
  const names = [...node.children.keys()].sort(compareNames);

  for (let i = 0; i < names.length; i++) {
    const name = names[i];
    const isLast = i === names.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    yield `${prefix}${connector}${name}`;

    const child = node.children.get(name);
    if (child?.kind === 'directory') {
      yield* treeHelper(child, `${prefix}${childPrefix}`);
    }
  }
}

/** `.` line for the root, then one line per node; every line ends with a newline. */
export function renderTree(root: DirectoryNode): string {
  let out = '.\n';
  for (const line of treeHelper(root, '')) {
    out += `${line}\n`;
  }
  return out;
}

/** Count of file leaves, used to check a tree against its source list. */
export function countFiles(node: TreeNode): number {
  if (node.kind === 'file') return 1;
  let total = 0;
  for (const child of node.children.values()) total += countFiles(child);
  return total;
}
