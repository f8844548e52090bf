/**
 * Boundary errors. Everything below the boundary (rule files, directory
 * entries, file contents) is absorbed into warnings, skipped entries or
 * inline error blocks instead.
 */

export type SnapshotErrorCode = 'ROOT_NOT_FOUND' | 'ROOT_NOT_DIRECTORY' | 'OUTPUT_WRITE_FAILED';

export class SnapshotError extends Error {
    readonly code: SnapshotErrorCode;

    constructor(code: SnapshotErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SnapshotError';
        this.code = code;
    }
}

/** Raised when a producer emits after the collector has been closed. */
export class ChannelClosedError extends Error {
    constructor(path: string) {
        super(`Path channel is closed; cannot emit ${path}`);
        this.name = 'ChannelClosedError';
    }
}

/** Best-effort message for an unknown thrown value. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
