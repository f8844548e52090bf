import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { SnapshotError, errorMessage } from '../context/errors.js';

/**
 * Write the document verbatim. Failure here is the one fatal outcome:
 * without a destination the run has no effect.
 */
export function writeSnapshot(document: string, outputPath: string): string {
    const absolutePath = resolve(outputPath);
    try {
        writeFileSync(absolutePath, document, 'utf-8');
    } catch (error) {
        throw new SnapshotError(
            'OUTPUT_WRITE_FAILED',
            `Failed to write snapshot to ${absolutePath}: ${errorMessage(error)}`,
            { cause: error }
        );
    }
    return absolutePath;
}
