/**
 * Merges parsed CLI flags with a loaded config file.
 * Priority: CLI flags > config file > hardcoded defaults.
 */

import { InvalidArgumentError } from 'commander';
import type { SnapshotOptions } from '../context/index.js';
import type { SnapshotConfig } from './config.js';

/** Options as commander hands them to the snapshot action. */
export interface SnapshotCliOptions {
    out?: string;
    text?: boolean;
    exclude: string[];
    concurrency?: number;
    followSymlinks?: boolean;
    gitGlobal: boolean;
    gitExclude: boolean;
    parents: boolean;
    configPath?: string;
    verbose?: boolean;
}

/** Where commander got a value from: 'cli', 'default', 'env', ... */
export type OptionSource = (name: string) => string | undefined;

export interface RunOptions {
    /** Destination file; undefined means stdout */
    output?: string;
    verbose: boolean;
    snapshot: SnapshotOptions;
}

export function parseConcurrency(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return n;
}

/** Accumulator for repeatable string options. */
export function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

export function mergeOptions(cli: SnapshotCliOptions, config: SnapshotConfig, source: OptionSource): RunOptions {
    const fromCli = (name: string) => source(name) === 'cli';

    const pick = <T>(name: string, cliValue: T, configValue: T | undefined): T =>
        fromCli(name) || configValue === undefined ? cliValue : configValue;

    const verbose = pick('verbose', cli.verbose ?? false, config.verbose);
    // --text only displaces a configured output; an explicit --out still wins.
    const toStdout = fromCli('text') && cli.text === true && !fromCli('out');

    return {
        output: toStdout ? undefined : pick('out', cli.out, config.output),
        verbose,
        snapshot: {
            overrides: pick('exclude', cli.exclude, config.exclude),
            gitGlobal: pick('gitGlobal', cli.gitGlobal, config.gitGlobal),
            gitExclude: pick('gitExclude', cli.gitExclude, config.gitExclude),
            parents: pick('parents', cli.parents, config.parents),
            concurrency: pick('concurrency', cli.concurrency, config.concurrency),
            followSymlinks: pick('followSymlinks', cli.followSymlinks ?? false, config.followSymlinks),
            verbose,
        },
    };
}
