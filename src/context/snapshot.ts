/**
 * Snapshot Assembler - the one output format this tool has. The layout is a
 * byte-for-byte contract so snapshots of an unchanged tree diff cleanly.
 */

import { buildTree, renderTree } from './tree.js';
import { readFileContents, type FileContent, type ReadOptions } from './reader.js';

export const SNAPSHOT_SUMMARY =
    'This file contains a snapshot of the project structure and source code, formatted for AI consumption.';

export function formatHeader(projectName: string, fileCount: number): string {
    return `# Project Snapshot: ${projectName}\n\n${SNAPSHOT_SUMMARY}\nTotal files included: ${fileCount}\n\n`;
}

export function formatTreeBlock(tree: string): string {
    return `\`\`\`\n${tree}\n\`\`\`\n\n`;
}

/** One fenced block: `{ext}:{path}` on the fence, raw content (or the read error) inside. */
export function formatFileBlock(file: FileContent): string {
    const body = file.status === 'ok' ? file.content : `Error reading file: ${file.error}`;
    return `\`\`\`${file.language}:${file.relativePath}\n${body}\n\`\`\`\n\n`;
}

export function formatSnapshot(projectName: string, tree: string, files: readonly FileContent[]): string {
    return [
        formatHeader(projectName, files.length),
        formatTreeBlock(tree),
        '## File Contents\n\n',
        ...files.map(formatFileBlock),
    ].join('');
}

export interface AssembledSnapshot {
    document: string;
    tree: string;
    files: FileContent[];
}

/** Like assembleSnapshot, also returning the rendered tree and per-file read results. */
export async function assembleSnapshotParts(
    projectName: string,
    rootPath: string,
    paths: readonly string[],
    options: ReadOptions = {}
): Promise<AssembledSnapshot> {
    const tree = renderTree(buildTree(rootPath, paths));
    const files = await readFileContents(rootPath, paths, options);
    return { document: formatSnapshot(projectName, tree, files), tree, files };
}

/**
 * Build the full snapshot document for a non-empty path list.
 * Read failures become inline error blocks; they never abort assembly.
 */
export async function assembleSnapshot(
    projectName: string,
    rootPath: string,
    paths: readonly string[],
    options: ReadOptions = {}
): Promise<string> {
    const { document } = await assembleSnapshotParts(projectName, rootPath, paths, options);
    return document;
}
