import { relative, isAbsolute, sep } from 'path';

/** Forward slashes regardless of platform, so output and matching are identical everywhere. */
export function toPosix(p: string): string {
    return sep === '/' ? p : p.split(sep).join('/');
}

/**
 * Path of `target` relative to `base` in posix form, or null when target is
 * base itself or lies outside it.
 */
export function relativeWithin(base: string, target: string): string | null {
    const rel = relative(base, target);
    if (rel === '' || isAbsolute(rel)) return null;
    if (rel === '..' || rel.startsWith(`..${sep}`)) return null;
    return toPosix(rel);
}

/** Display form of a listed path: relative to root when under it, as given otherwise. */
export function displayPath(root: string, target: string): string {
    return relativeWithin(root, target) ?? toPosix(target);
}
