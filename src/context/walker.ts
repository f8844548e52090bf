/**
 * Parallel Walker - fans out over the directory tree with a bounded pool of
 * concurrent tasks, prunes ignored directories and emits accepted regular files
 * onto the PathChannel.
 *
 * A pooled task only reads and classifies one directory (and loads that
 * directory's ignore files for its children). Children are awaited outside the
 * pool, so deep trees cannot starve the limiter.
 */

import { readdir, lstat, stat, realpath } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import { availableParallelism } from 'os';
import pLimit from 'p-limit';
import type { PathChannel } from './collector.js';
import type { RuleSet } from './rules.js';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

/** A filesystem object seen during the walk, before acceptance or rejection. */
export interface CandidateEntry {
    path: string;
    kind: EntryKind;
}

export type SkipReason = 'read-error' | 'broken-symlink' | 'symlink-loop' | 'special';

export interface SkippedEntry {
    path: string;
    reason: SkipReason;
}

export interface WalkOptions {
    /** Concurrent directory tasks (default: available parallelism) */
    concurrency?: number;
    /** Follow symbolic links to files and directories (default: false) */
    followSymlinks?: boolean;
}

export interface WalkStats {
    directories: number;
    emitted: number;
    skipped: SkippedEntry[];
}

interface PendingDir {
    path: string;
    rules: RuleSet;
    /** Real paths of this directory and its ancestors; only tracked when following links */
    ancestors: ReadonlySet<string>;
}

export function defaultConcurrency(): number {
    return Math.max(1, availableParallelism());
}

async function classify(entry: Dirent, path: string): Promise<EntryKind> {
    if (entry.isFile()) return 'file';
    if (entry.isDirectory()) return 'directory';
    if (entry.isSymbolicLink()) return 'symlink';
    if (entry.isFIFO() || entry.isSocket() || entry.isBlockDevice() || entry.isCharacterDevice()) return 'other';

    // Some filesystems report DT_UNKNOWN; ask lstat instead.
    const info = await lstat(path);
    if (info.isFile()) return 'file';
    if (info.isDirectory()) return 'directory';
    if (info.isSymbolicLink()) return 'symlink';
    return 'other';
}

/** Kind of a symlink's target, or null when it dangles. */
async function resolveLink(path: string): Promise<EntryKind | null> {
    try {
        const target = await stat(path);
        if (target.isFile()) return 'file';
        if (target.isDirectory()) return 'directory';
        return 'other';
    } catch {
        return null;
    }
}

export async function walkProject(
    root: string,
    ruleSet: RuleSet,
    channel: PathChannel,
    options: WalkOptions = {}
): Promise<WalkStats> {
    const { concurrency = defaultConcurrency(), followSymlinks = false } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const limit = pLimit(concurrency);
    const stats: WalkStats = { directories: 0, emitted: 0, skipped: [] };

    const readDirectory = async (dir: PendingDir): Promise<PendingDir[]> => {
        let entries: Dirent[];
        try {
            entries = await readdir(dir.path, { withFileTypes: true });
        } catch {
            stats.skipped.push({ path: dir.path, reason: 'read-error' });
            return [];
        }
        stats.directories++;

        const subdirs: PendingDir[] = [];

        for (const entry of entries) {
            const candidate: CandidateEntry = { path: join(dir.path, entry.name), kind: 'other' };
            try {
                candidate.kind = await classify(entry, candidate.path);
            } catch {
                // Vanished between readdir and lstat.
                stats.skipped.push({ path: candidate.path, reason: 'read-error' });
                continue;
            }

            if (candidate.kind === 'symlink') {
                if (!followSymlinks) continue;
                const target = await resolveLink(candidate.path);
                if (target === null) {
                    stats.skipped.push({ path: candidate.path, reason: 'broken-symlink' });
                    continue;
                }
                candidate.kind = target;
            }

            if (candidate.kind === 'other') {
                stats.skipped.push({ path: candidate.path, reason: 'special' });
                continue;
            }

            if (candidate.kind === 'file') {
                if (dir.rules.isIgnored(candidate.path, false)) continue;
                channel.emit(candidate.path);
                stats.emitted++;
                continue;
            }

            if (dir.rules.isIgnored(candidate.path, true)) continue;

            let ancestors = dir.ancestors;
            if (followSymlinks) {
                let real: string;
                try {
                    real = await realpath(candidate.path);
                } catch {
                    stats.skipped.push({ path: candidate.path, reason: 'read-error' });
                    continue;
                }
                if (ancestors.has(real)) {
                    stats.skipped.push({ path: candidate.path, reason: 'symlink-loop' });
                    continue;
                }
                ancestors = new Set([...ancestors, real]);
            }

            subdirs.push({ path: candidate.path, rules: dir.rules, ancestors });
        }

        return Promise.all(subdirs.map(async sub => ({ ...sub, rules: await dir.rules.enter(sub.path) })));
    };

    const visit = async (dir: PendingDir): Promise<void> => {
        const children = await limit(() => readDirectory(dir));
        await Promise.all(children.map(visit));
    };

    const rootAncestors = followSymlinks ? new Set([await realpath(root)]) : new Set<string>();
    await visit({ path: root, rules: ruleSet, ancestors: rootAncestors });

    return stats;
}
