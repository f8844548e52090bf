/**
 * RuleSet Resolver - layered gitignore evaluation.
 *
 * Layers, lowest precedence first:
 *   global excludes file → .git/info/exclude → ancestor ignore files →
 *   root and per-directory ignore files (deeper wins) → explicit overrides
 * and above all of them the `.git` directory exclusion, which no rule can undo.
 *
 * Matching itself is delegated to the `ignore` package; this module only decides
 * which layers apply to a path and in which order their verdicts combine.
 */

import { readFile, stat } from 'fs/promises';
import { join, dirname, resolve, isAbsolute } from 'path';
import { homedir } from 'os';
import ignore, { type Ignore } from 'ignore';
import { errorMessage } from './errors.js';
import { relativeWithin } from './paths.js';

export const VCS_DIR = '.git';

/** Per-directory ignore files, lowest precedence first. */
export const IGNORE_FILE_NAMES = ['.gitignore', '.ignore'] as const;

export type RuleSource = 'global' | 'exclude' | 'parent' | 'directory' | 'override';

export interface IgnoreRuleLayer {
    readonly source: RuleSource;
    /** Directory the patterns are relative to */
    readonly base: string;
    /** File the patterns came from, or `<overrides>` */
    readonly origin: string;
    readonly matcher: Ignore;
}

export interface RepositoryInfo {
    /** Working tree root (directory holding `.git`) */
    root: string;
    /** Resolved git directory; differs from `<root>/.git` for worktrees and submodules */
    gitDir: string;
}

export interface RuleOptions {
    /** Read the user's global excludes file (default: true) */
    gitGlobal?: boolean;
    /** Read `.git/info/exclude` of the enclosing repository (default: true) */
    gitExclude?: boolean;
    /** Read ignore files in directories above the root (default: true) */
    parents?: boolean;
    /** Extra gitignore patterns, relative to the root, that beat every ignore file */
    overrides?: string[];
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
    /** Receives non-fatal rule problems (unreadable or malformed ignore files) */
    onWarning?: (message: string) => void;
}

type WarningSink = (message: string) => void;

// ── Layer loading ───────────────────────────────────────────────────────────

function isMissing(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('code' in error)) return false;
    return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

function compileLayer(
    patterns: string | string[],
    base: string,
    source: RuleSource,
    origin: string,
    warn: WarningSink
): IgnoreRuleLayer | null {
    try {
        // Names like `...` are legal entries; without allowRelativePaths `test()` throws on them.
        const matcher = ignore({ ignorecase: false, allowRelativePaths: true }).add(patterns);
        return { source, base, origin, matcher };
    } catch (error) {
        warn(`Ignoring malformed rules in ${origin}: ${errorMessage(error)}`);
        return null;
    }
}

async function loadLayer(
    file: string,
    base: string,
    source: RuleSource,
    warn: WarningSink
): Promise<IgnoreRuleLayer | null> {
    let content: string;
    try {
        content = await readFile(file, 'utf-8');
    } catch (error) {
        if (!isMissing(error)) warn(`Cannot read ignore file ${file}: ${errorMessage(error)}`);
        return null;
    }
    return compileLayer(content, base, source, file, warn);
}

/** `.gitignore` then `.ignore` of one directory. */
async function loadDirectoryLayers(dir: string, source: RuleSource, warn: WarningSink): Promise<IgnoreRuleLayer[]> {
    const layers = await Promise.all(IGNORE_FILE_NAMES.map(name => loadLayer(join(dir, name), dir, source, warn)));
    return layers.filter((layer): layer is IgnoreRuleLayer => layer !== null);
}

async function statOrNull(path: string) {
    try {
        return await stat(path);
    } catch {
        return null;
    }
}

// ── Repository discovery ────────────────────────────────────────────────────

async function readGitFile(gitFile: string, worktree: string): Promise<string | null> {
    try {
        const content = await readFile(gitFile, 'utf-8');
        const match = /^gitdir:\s*(.+)$/m.exec(content);
        if (!match) return null;
        const target = match[1].trim();
        return isAbsolute(target) ? target : resolve(worktree, target);
    } catch {
        return null;
    }
}

/** Nearest ancestor of `start` (inclusive) that holds a `.git` directory or gitfile. */
export async function findRepository(start: string): Promise<RepositoryInfo | null> {
    let current = resolve(start);
    for (;;) {
        const candidate = join(current, VCS_DIR);
        const info = await statOrNull(candidate);
        if (info?.isDirectory()) return { root: current, gitDir: candidate };
        if (info?.isFile()) {
            const gitDir = await readGitFile(candidate, current);
            if (gitDir) return { root: current, gitDir };
        }
        const parent = dirname(current);
        if (parent === current) return null;
        current = parent;
    }
}

// ── Global excludes ─────────────────────────────────────────────────────────

function unquote(value: string): string {
    const trimmed = value.trim();
    if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
        return trimmed.slice(1, -1);
    }
    return trimmed;
}

/** `core.excludesFile` from git config text; last assignment wins. */
export function parseExcludesFile(gitConfig: string): string | null {
    let inCore = false;
    let value: string | null = null;

    for (const raw of gitConfig.split(/\r?\n/)) {
        const line = raw.trim();
        if (!line || line.startsWith('#') || line.startsWith(';')) continue;

        const section = /^\[\s*([^\]\s"]+)(?:\s+"[^"]*")?\s*\]/.exec(line);
        if (section) {
            inCore = section[1].toLowerCase() === 'core';
            continue;
        }
        if (!inCore) continue;

        const entry = /^excludesfile\s*=\s*(.*)$/i.exec(line);
        if (entry) value = unquote(entry[1]);
    }

    return value;
}

function expandHome(p: string, homeDir: string): string {
    if (p === '~') return homeDir;
    if (p.startsWith('~/')) return join(homeDir, p.slice(2));
    return p;
}

/**
 * Location of the global excludes file, following git's lookup:
 * core.excludesFile from $XDG_CONFIG_HOME/git/config then ~/.gitconfig,
 * falling back to $XDG_CONFIG_HOME/git/ignore (or ~/.config/git/ignore).
 */
export async function globalExcludesPath(homeDir: string, env: NodeJS.ProcessEnv): Promise<string> {
    const xdg = env.XDG_CONFIG_HOME?.trim();
    const configHome = xdg ? xdg : join(homeDir, '.config');

    let configured: string | null = null;
    for (const file of [join(configHome, 'git', 'config'), join(homeDir, '.gitconfig')]) {
        let text: string;
        try {
            text = await readFile(file, 'utf-8');
        } catch {
            continue;
        }
        configured = parseExcludesFile(text) ?? configured;
    }

    if (configured) return resolve(homeDir, expandHome(configured, homeDir));
    return join(configHome, 'git', 'ignore');
}

/** Ancestors whose ignore files apply to `root`, outermost first. */
function ancestorDirs(root: string, stopAt: string | null): string[] {
    const dirs: string[] = [];
    if (stopAt === root || dirname(root) === root) return dirs;

    let current = dirname(root);
    for (;;) {
        dirs.push(current);
        if (current === stopAt) break;
        const parent = dirname(current);
        if (parent === current) break;
        current = parent;
    }
    return dirs.reverse();
}

// ── RuleSet ─────────────────────────────────────────────────────────────────

/**
 * Immutable rule chain for one scan. `enter()` returns a new chain with a
 * directory's own ignore files appended; the receiver is left untouched so
 * sibling walker tasks never observe each other's rules.
 */
export class RuleSet {
    constructor(
        readonly root: string,
        private readonly fileLayers: readonly IgnoreRuleLayer[],
        private readonly overrideLayers: readonly IgnoreRuleLayer[],
        private readonly warn: WarningSink
    ) {}

    get layers(): readonly IgnoreRuleLayer[] {
        return [...this.fileLayers, ...this.overrideLayers];
    }

    /** Chain for the children of `dir`, including `dir`'s own ignore files. */
    async enter(dir: string): Promise<RuleSet> {
        const added = await loadDirectoryLayers(dir, 'directory', this.warn);
        if (added.length === 0) return this;
        return new RuleSet(this.root, [...this.fileLayers, ...added], this.overrideLayers, this.warn);
    }

    isIgnored(path: string, isDirectory: boolean): boolean {
        if (isVcsPath(this.root, path, isDirectory)) return true;

        let ignored = false;
        for (const layer of this.fileLayers) ignored = applyLayer(layer, path, isDirectory, ignored);
        for (const layer of this.overrideLayers) ignored = applyLayer(layer, path, isDirectory, ignored);
        return ignored;
    }
}

function applyLayer(layer: IgnoreRuleLayer, path: string, isDirectory: boolean, current: boolean): boolean {
    const rel = relativeWithin(layer.base, path);
    if (rel === null) return current;

    const verdict = layer.matcher.test(isDirectory ? `${rel}/` : rel);
    if (verdict.ignored) return true;
    if (verdict.unignored) return false;
    return current;
}

/** A `.git` directory anywhere below the root, or anything inside one. */
export function isVcsPath(root: string, path: string, isDirectory: boolean): boolean {
    const rel = relativeWithin(root, path);
    if (rel === null) return false;

    const segments = rel.split('/');
    const last = segments.length - 1;
    return segments.some((segment, i) => segment === VCS_DIR && (i < last || isDirectory));
}

/**
 * Build the rule chain for `root`. Never requires a repository: with no ignore
 * files anywhere the chain is empty and only the `.git` exclusion applies.
 */
export async function resolveRuleSet(root: string, options: RuleOptions = {}): Promise<RuleSet> {
    const {
        gitGlobal = true,
        gitExclude = true,
        parents = true,
        overrides = [],
        homeDir = homedir(),
        env = process.env,
        onWarning = () => {},
    } = options;

    const absRoot = resolve(root);
    const repo = await findRepository(absRoot);
    const repoBase = repo?.root ?? absRoot;

    const pending: Promise<IgnoreRuleLayer | null>[] = [];

    if (gitGlobal) {
        const file = await globalExcludesPath(homeDir, env);
        pending.push(loadLayer(file, repoBase, 'global', onWarning));
    }

    if (gitExclude && repo) {
        pending.push(loadLayer(join(repo.gitDir, 'info', 'exclude'), repo.root, 'exclude', onWarning));
    }

    const baseLayers = (await Promise.all(pending)).filter((layer): layer is IgnoreRuleLayer => layer !== null);

    const parentLayers: IgnoreRuleLayer[] = [];
    if (parents) {
        for (const dir of ancestorDirs(absRoot, repo?.root ?? null)) {
            parentLayers.push(...(await loadDirectoryLayers(dir, 'parent', onWarning)));
        }
    }

    const rootLayers = await loadDirectoryLayers(absRoot, 'directory', onWarning);

    const overrideLayers: IgnoreRuleLayer[] = [];
    const patterns = overrides.map(p => p.trim()).filter(p => p.length > 0);
    if (patterns.length > 0) {
        const layer = compileLayer(patterns, absRoot, 'override', '<overrides>', onWarning);
        if (layer) overrideLayers.push(layer);
    }

    return new RuleSet(absRoot, [...baseLayers, ...parentLayers, ...rootLayers], overrideLayers, onWarning);
}
