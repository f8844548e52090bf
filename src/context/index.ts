export { validateRoot, scanProject, takeSnapshot } from './gather.js';
export type { ScanOptions, SnapshotOptions, ScanResult, SnapshotOutcome, Snapshot, EmptySnapshot } from './gather.js';

// Ignore rules
export { resolveRuleSet, RuleSet, findRepository, globalExcludesPath, parseExcludesFile, isVcsPath, VCS_DIR, IGNORE_FILE_NAMES } from './rules.js';
export type { IgnoreRuleLayer, RuleOptions, RuleSource, RepositoryInfo } from './rules.js';

// Traversal
export { walkProject, defaultConcurrency } from './walker.js';
export type { CandidateEntry, EntryKind, SkippedEntry, SkipReason, WalkOptions, WalkStats } from './walker.js';
export { PathChannel, comparePaths, compareNames } from './collector.js';
export type { FilteredPathList } from './collector.js';

// Tree generation
export { buildTree, renderTree, insertPath, pathSegments, createDirectory, countFiles } from './tree.js';
export type { TreeNode, FileNode, DirectoryNode } from './tree.js';

// File reading + document
export { readFileContents, readFileContent, languageTag } from './reader.js';
export type { FileContent, FileText, FileReadFailure, ReadOptions } from './reader.js';
export { assembleSnapshot, assembleSnapshotParts, formatSnapshot, formatFileBlock, SNAPSHOT_SUMMARY } from './snapshot.js';
export type { AssembledSnapshot } from './snapshot.js';

// Errors
export { SnapshotError, ChannelClosedError } from './errors.js';
export type { SnapshotErrorCode } from './errors.js';
