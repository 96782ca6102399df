/**
 * Path helpers shared by the tree renderer, tree parser and selector.
 */

import { realpathSync } from 'fs';
import path from 'path';

const DRIVE_LETTER = /^[A-Za-z]:/;

/** Node's path API, or its win32 flavour for paths written the Windows way. */
export type PathApi = typeof path.posix;

export function isWindowsStylePath(p: string): boolean {
    return DRIVE_LETTER.test(p) || (p.includes('\\') && !p.includes('/'));
}

export function pathApiFor(p: string): PathApi {
    return isWindowsStylePath(p) ? path.win32 : path;
}

/**
 * Ensure a separator follows the colon of a drive-letter path (`C:foo` -> `C:\foo`).
 * Everything else is returned unchanged. Idempotent.
 */
export function normalizePath(p: string): string {
    if (!DRIVE_LETTER.test(p) || p.length <= 2) return p;
    const third = p[2];
    if (third === '\\' || third === '/') return p;
    return `${p.slice(0, 2)}\\${p.slice(2)}`;
}

/**
 * Display form of a configured path: collapsed separators and `..` segments,
 * no trailing separator, drive letter fixed.
 */
export function displayPath(p: string): string {
    const api = pathApiFor(p);
    let normalized = api.normalize(p);
    while (normalized.length > 1 && normalized.endsWith(api.sep) && !isFilesystemRoot(normalized, api)) {
        normalized = normalized.slice(0, -1);
    }
    return normalizePath(normalized);
}

function isFilesystemRoot(p: string, api: PathApi): boolean {
    return api.parse(p).root === p;
}

/**
 * Key used to decide whether two spellings name the same file. Symbolic
 * links are resolved; paths that do not exist fall back to `path.resolve`.
 */
export function canonicalPath(p: string): string {
    try {
        return realpathSync(p);
    } catch {
        return path.resolve(p);
    }
}

/** Name shown on the root line of a rendered tree. */
export function rootLabel(dir: string): string {
    const api = pathApiFor(dir);
    return api.basename(dir) || dir;
}

/**
 * `target` relative to `anchor` with `/` separators, or null when target
 * lies outside anchor.
 */
export function relativeInside(anchor: string, target: string): string | null {
    const rel = path.relative(path.resolve(anchor), path.resolve(target));
    if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) return null;
    return toPosix(rel);
}

export function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}
