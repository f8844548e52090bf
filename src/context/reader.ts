/**
 * File Reader - reads the contents of every listed file for the snapshot.
 *
 * Reads run concurrently through a p-limit pool, but results come back in
 * list order. A failed read never throws: it is returned as a `read-error`
 * entry that carries the message the snapshot shows in place of the content.
 */

import { readFile } from 'fs/promises';
import { extname, basename } from 'path';
import pLimit from 'p-limit';
import { errorMessage } from './errors.js';
import { displayPath } from './paths.js';

export interface ReadOptions {
    /** Concurrent reads (default: 16) */
    concurrency?: number;
}

interface FileBase {
    /** Path relative to the root being scanned, `/`-separated */
    relativePath: string;
    /** Path as listed */
    absolutePath: string;
    /** Extension without the dot, or '' when the name has none */
    language: string;
}

export interface FileText extends FileBase {
    status: 'ok';
    content: string;
    /** File size in bytes */
    size: number;
}

export interface FileReadFailure extends FileBase {
    status: 'read-error';
    error: string;
}

export type FileContent = FileText | FileReadFailure;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Fence language hint for a file name: its last extension without the dot.
 * Names like `.gitignore` count as having no extension.
 */
export function languageTag(fileName: string): string {
    return extname(basename(fileName)).slice(1);
}

/** Read one file as strict UTF-8. */
export async function readFileContent(rootPath: string, absolutePath: string): Promise<FileContent> {
    const base: FileBase = {
        relativePath: displayPath(rootPath, absolutePath),
        absolutePath,
        language: languageTag(absolutePath),
    };

    try {
        const bytes = await readFile(absolutePath);
        return { ...base, status: 'ok', content: utf8.decode(bytes), size: bytes.byteLength };
    } catch (error) {
        return { ...base, status: 'read-error', error: errorMessage(error) };
    }
}

/** Read every path; the result has one entry per path, in the same order. */
export async function readFileContents(
    rootPath: string,
    paths: readonly string[],
    options: ReadOptions = {}
): Promise<FileContent[]> {
    const limit = pLimit(options.concurrency ?? 16);
    return Promise.all(paths.map(path => limit(() => readFileContent(rootPath, path))));
}
