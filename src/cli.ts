#!/usr/bin/env node

/**
 * projsnap CLI
 *
 * Snapshot a project directory (gitignore-aware tree + file contents) into
 * one document, printed to stdout or written to a file.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { takeSnapshot } from './context/index.js';
import { loadConfig, CONFIG_TEMPLATE, DEFAULT_CONFIG_FILE, type SnapshotConfig } from './config/config.js';
import { mergeOptions, parseConcurrency, collect, type SnapshotCliOptions } from './config/options.js';
import { writeSnapshot } from './output/write.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const noPatterns: string[] = [];

const program = new Command();

program
    .name('projsnap')
    .description('Snapshot a project tree and its file contents into one text document')
    .version(pkg.version);

/**
 * Snapshot command (default)
 */
program
    .command('snapshot', { isDefault: true })
    .description('Scan a directory and render the snapshot document')
    .argument('[path]', 'Project directory to scan', '.')
    .option('-o, --out <file>', 'Write the snapshot to a file')
    .option('-t, --text', 'Print the snapshot to stdout, even when the config sets an output file')
    .option('-e, --exclude <pattern>', 'Extra ignore pattern, gitignore syntax (can be used multiple times)', collect, noPatterns)
    .option('-j, --concurrency <n>', 'Parallel directory tasks (default: available parallelism)', parseConcurrency)
    .option('--follow-symlinks', 'Follow symbolic links to files and directories')
    .option('--no-git-global', 'Do not read the global git excludes file')
    .option('--no-git-exclude', 'Do not read .git/info/exclude')
    .option('--no-parents', 'Do not read ignore files above the scanned directory')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Progress output on stderr')
    .action(async (path: string, cliOptions: SnapshotCliOptions, command: Command) => {
        try {
            let config: SnapshotConfig = {};
            if (cliOptions.configPath) {
                config = loadConfig(cliOptions.configPath);
            }

            const run = mergeOptions(cliOptions, config, name => command.getOptionValueSource(name));

            if (run.verbose) {
                if (cliOptions.configPath) console.error(`Config loaded from: ${resolve(cliOptions.configPath)}`);
                console.error(`Scanning: ${resolve(path)}`);
            }

            const outcome = await takeSnapshot(path, run.snapshot);

            if (outcome.kind === 'empty') {
                console.error('No files to include in the snapshot. Exiting.');
                return;
            }

            if (run.verbose) {
                const t = outcome.timing;
                console.error(`Snapshot: ${outcome.fileCount} files, ${(outcome.document.length / 1024).toFixed(1)}KB (scan: ${t.scanMs}ms, assemble: ${t.assembleMs}ms, total: ${t.totalMs}ms)`);
            }

            if (run.output) {
                const written = writeSnapshot(outcome.document, run.output);
                console.error(`Snapshot successfully written to: ${written}`);
            } else {
                console.log(outcome.document);
            }
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', DEFAULT_CONFIG_FILE)
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: projsnap --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// Parse arguments and run
await program.parseAsync();
