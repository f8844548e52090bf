/**
 * Snapshot pipeline:
 *
 * 1. Resolve ignore rules for the root
 * 2. Walk the tree in parallel, emitting accepted files onto the channel
 * 3. Close the channel and collect a sorted, deduplicated path list
 * 4. Short-circuit with "empty" when nothing survived
 * 5. Build + render the tree, read contents, assemble the document
 *
 * Verbose progress goes to stderr; stdout is reserved for the document.
 */

import { existsSync, statSync } from 'fs';
import { resolve, basename } from 'path';
import { PathChannel, type FilteredPathList } from './collector.js';
import { resolveRuleSet, type RuleOptions } from './rules.js';
import { walkProject, type SkippedEntry, type WalkOptions } from './walker.js';
import { assembleSnapshotParts } from './snapshot.js';
import { SnapshotError } from './errors.js';

export interface ScanOptions extends WalkOptions, Omit<RuleOptions, 'onWarning'> {
  /** Verbose logging */
  verbose?: boolean;
}

export interface SnapshotOptions extends ScanOptions {
  /** Title in the document header (default: basename of the resolved root) */
  projectName?: string;
  /** Concurrent file reads while assembling (default: 16) */
  readConcurrency?: number;
}

export interface ScanResult {
  /** Absolute root every path is relative to */
  root: string;
  paths: FilteredPathList;
  /** Entries the walk could not use */
  skipped: SkippedEntry[];
  /** Non-fatal rule problems */
  warnings: string[];
  /** Ignore-rule layers in effect at the root */
  ruleLayers: number;
  scanMs: number;
}

export interface EmptySnapshot {
  kind: 'empty';
  root: string;
  skipped: SkippedEntry[];
  warnings: string[];
}

export interface Snapshot {
  kind: 'snapshot';
  root: string;
  projectName: string;
  /** The final document */
  document: string;
  /** The rendered tree diagram */
  tree: string;
  /** Number of files included */
  fileCount: number;
  /** Files whose contents could not be read (they still have a block) */
  unreadable: string[];
  skipped: SkippedEntry[];
  warnings: string[];
  /** Timing info */
  timing: {
    scanMs: number;
    assembleMs: number;
    totalMs: number;
  };
}

export type SnapshotOutcome = EmptySnapshot | Snapshot;

function log(verbose: boolean, message: string): void {
  if (verbose) console.error(message);
}

/**
 * Validate that the root exists and is a directory; returns it resolved.
 */
export function validateRoot(path: string): string {
  const abs = resolve(path);

  if (!existsSync(abs)) {
    throw new SnapshotError('ROOT_NOT_FOUND', `Path does not exist: ${path}\nResolved to: ${abs}`);
  }

  if (!statSync(abs).isDirectory()) {
    throw new SnapshotError('ROOT_NOT_DIRECTORY', `Path is not a directory: ${path}\nResolved to: ${abs}`);
  }

  return abs;
}

/**
 * Resolve rules, walk, collect. The returned list is sorted and complete
 * regardless of concurrency or scheduling.
 */
export async function scanProject(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  const start = Date.now();
  const { verbose = false, concurrency, followSymlinks, ...ruleOptions } = options;
  const absRoot = validateRoot(root);
  const warnings: string[] = [];

  const ruleSet = await resolveRuleSet(absRoot, {
    ...ruleOptions,
    onWarning: message => {
      warnings.push(message);
      log(verbose, `  Warning: ${message}`);
    },
  });

  if (verbose) {
    log(true, `  Rule layers at root: ${ruleSet.layers.length}`);
    for (const layer of ruleSet.layers) log(true, `    - [${layer.source}] ${layer.origin}`);
  }

  const channel = new PathChannel();
  const walk = await walkProject(absRoot, ruleSet, channel, { concurrency, followSymlinks }).finally(() =>
    channel.close()
  );
  const paths = await channel.collect();
  const scanMs = Date.now() - start;

  log(verbose, `  Scanned ${walk.directories} directories in ${scanMs}ms: ${paths.length} file(s) accepted`);
  if (verbose && walk.skipped.length > 0) {
    log(true, `  Skipped ${walk.skipped.length} entr${walk.skipped.length === 1 ? 'y' : 'ies'}:`);
    for (const entry of walk.skipped) log(true, `    - ${entry.path} (${entry.reason})`);
  }

  return { root: absRoot, paths, skipped: walk.skipped, warnings, ruleLayers: ruleSet.layers.length, scanMs };
}

/**
 * Full pipeline. Returns `{ kind: 'empty' }` instead of a document when no
 * file survives filtering.
 */
export async function takeSnapshot(root: string, options: SnapshotOptions = {}): Promise<SnapshotOutcome> {
  const totalStart = Date.now();
  const { projectName, readConcurrency, ...scanOptions } = options;
  const verbose = options.verbose ?? false;

  const scan = await scanProject(root, scanOptions);

  if (scan.paths.length === 0) {
    log(verbose, '  Nothing to include');
    return { kind: 'empty', root: scan.root, skipped: scan.skipped, warnings: scan.warnings };
  }

  // Resolved root, so `projsnap .` is titled with the directory's own name.
  const name = projectName ?? basename(scan.root);
  const assembleStart = Date.now();
  const { document, tree, files } = await assembleSnapshotParts(name, scan.root, scan.paths, {
    concurrency: readConcurrency,
  });
  const assembleMs = Date.now() - assembleStart;

  const unreadable = files.filter(f => f.status === 'read-error').map(f => f.relativePath);
  log(verbose, `  Assembled ${files.length} file block(s) in ${assembleMs}ms (${unreadable.length} unreadable)`);
  for (const path of unreadable) log(verbose, `    - unreadable: ${path}`);

  return {
    kind: 'snapshot',
    root: scan.root,
    projectName: name,
    document,
    tree,
    fileCount: files.length,
    unreadable,
    skipped: scan.skipped,
    warnings: scan.warnings,
    timing: { scanMs: scan.scanMs, assembleMs, totalMs: Date.now() - totalStart },
  };
}
