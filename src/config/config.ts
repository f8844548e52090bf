/**
 * CLI Config File Support
 *
 * One JSON file for everything the snapshot command accepts:
 * - Output (output)
 * - Ignore rules (exclude, gitGlobal, gitExclude, parents)
 * - Traversal (concurrency, followSymlinks)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';

export interface SnapshotConfig {
    // Output
    output?: string;

    // Ignore rules
    exclude?: string[];
    gitGlobal?: boolean;
    gitExclude?: boolean;
    parents?: boolean;

    // Traversal
    concurrency?: number;
    followSymlinks?: boolean;

    // Misc
    verbose?: boolean;
}

export const DEFAULT_CONFIG_FILE = 'projsnap.config.json';

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'output',
    'exclude', 'gitGlobal', 'gitExclude', 'parents',
    'concurrency', 'followSymlinks',
    'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new Error(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return val;
}

function assertPositiveInteger(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number' || !Number.isInteger(val) || val < 1) {
        throw new Error(`Config "${key}" must be a positive integer`);
    }
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val) || !val.every((v): v is string => typeof v === 'string')) {
        throw new Error(`Config "${key}" must be an array of strings`);
    }
    return val;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative `output` resolves from the config file's directory
 * - Throws on missing file, invalid JSON or a mistyped field
 */
export function loadConfig(configPath: string): SnapshotConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const unknownKeys = Object.keys(parsed).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: SnapshotConfig = {};
    const configDir = dirname(absolutePath);

    if (parsed.output !== undefined) {
        const output = assertString(parsed, 'output');
        config.output = isAbsolute(output) ? output : resolve(configDir, output);
    }

    if (parsed.exclude !== undefined) config.exclude = assertStringArray(parsed, 'exclude');
    if (parsed.gitGlobal !== undefined) config.gitGlobal = assertBoolean(parsed, 'gitGlobal');
    if (parsed.gitExclude !== undefined) config.gitExclude = assertBoolean(parsed, 'gitExclude');
    if (parsed.parents !== undefined) config.parents = assertBoolean(parsed, 'parents');

    if (parsed.concurrency !== undefined) config.concurrency = assertPositiveInteger(parsed, 'concurrency');
    if (parsed.followSymlinks !== undefined) config.followSymlinks = assertBoolean(parsed, 'followSymlinks');

    if (parsed.verbose !== undefined) config.verbose = assertBoolean(parsed, 'verbose');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Starter config written by `init`. `concurrency` is left out so the
 * machine's parallelism is used unless someone pins it.
 */
export const CONFIG_TEMPLATE: SnapshotConfig = {
    output: 'snapshot.md',
    exclude: ['*.lock', 'dist/'],
    gitGlobal: true,
    gitExclude: true,
    parents: true,
    followSymlinks: false,
    verbose: false,
};
