/**
 * Path Collector - the single join point between the concurrent walk and the
 * synchronous render pipeline.
 *
 * Walker tasks emit in whatever order their I/O completes; collect() waits for
 * close(), then dedupes and sorts so every later stage sees one canonical order.
 */

import { sep } from 'path';
import { ChannelClosedError } from './errors.js';

/** Sorted (component-wise, code-unit order), deduplicated absolute paths of regular files. */
export type FilteredPathList = readonly string[];

/** Plain code-unit comparison of two names. localeCompare varies by ICU build and locale. */
export function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

const SEPARATOR = sep === '/' ? '/' : /[/\\]/;

/**
 * Component-wise path order: `src/main.ts` sorts before `src-old/x.ts`, the
 * same order the tree diagram lists them in.
 */
export function comparePaths(a: string, b: string): number {
    const left = a.split(SEPARATOR);
    const right = b.split(SEPARATOR);
    const shared = Math.min(left.length, right.length);

    for (let i = 0; i < shared; i++) {
        const order = compareNames(left[i], right[i]);
        if (order !== 0) return order;
    }
    return Math.sign(left.length - right.length);
}

export class PathChannel {
    private readonly buffer: string[] = [];
    private readonly waiters: Array<() => void> = [];
    private closed = false;

    get isClosed(): boolean {
        return this.closed;
    }

    emit(path: string): void {
        if (this.closed) throw new ChannelClosedError(path);
        this.buffer.push(path);
    }

    /** Idempotent. */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const wake of this.waiters.splice(0)) wake();
    }

    async collect(): Promise<FilteredPathList> {
        if (!this.closed) {
            await new Promise<void>(resolve => this.waiters.push(resolve));
        }
        const unique = [...new Set(this.buffer)];
        unique.sort(comparePaths);
        return unique;
    }
}
