/**
 * Ignore Matcher - gitignore-style exclusion for the tree walk and file selection.
 *
 * Pattern semantics (precedence, negation, directory-only rules) come from the
 * `ignore` package. Callers pass paths relative to the directory they walk;
 * directories are probed with a trailing slash so `build/` style rules match.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import ignore from 'ignore';
import type { Diagnostic } from './diagnostics.js';
import { errorMessage } from './diagnostics.js';
import { toPosix } from './paths.js';

export interface IgnoreMatcher {
    /** Directory that paths outside any walk are made relative to */
    readonly root: string;
    matches(relativePath: string, isDirectory: boolean): boolean;
}

export interface LoadedIgnoreMatcher {
    matcher: IgnoreMatcher;
    diagnostic?: Diagnostic;
}

/**
 * Build a matcher from gitignore lines. An empty pattern list excludes nothing.
 */
export function createIgnoreMatcher(patterns: string | string[], root: string = process.cwd()): IgnoreMatcher {
    const ig = ignore().add(patterns);
    const absoluteRoot = resolve(root);

    return {
        root: absoluteRoot,
        matches(relativePath: string, isDirectory: boolean): boolean {
            let probe = toPosix(relativePath).replace(/^\.\//, '');
            if (!probe || probe === '.' || probe.startsWith('../') || probe === '..' || probe.startsWith('/')) {
                return false;
            }
            if (isDirectory && !probe.endsWith('/')) probe += '/';
            // names such as `...` are not relative paths to `ignore`
            if (!ignore.isPathValid(probe)) return false;
            return ig.ignores(probe);
        },
    };
}

/**
 * Read an ignore file. A missing or unreadable file yields an empty matcher
 * and a diagnostic; the matcher's root is the ignore file's directory.
 */
export function loadIgnoreMatcher(ignorePath?: string): LoadedIgnoreMatcher {
    if (!ignorePath) {
        return { matcher: createIgnoreMatcher([]) };
    }

    const absolutePath = resolve(ignorePath);
    const root = dirname(absolutePath);

    if (!existsSync(absolutePath)) {
        return {
            matcher: createIgnoreMatcher([], root),
            diagnostic: {
                kind: 'IgnoreFileNotFound',
                path: ignorePath,
                message: `.gitignore file not found at: ${ignorePath}`,
            },
        };
    }

    let content: string;
    try {
        content = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        return {
            matcher: createIgnoreMatcher([], root),
            diagnostic: {
                kind: 'IgnoreFileUnreadable',
                path: ignorePath,
                message: `Cannot read .gitignore file at: ${ignorePath}: ${errorMessage(error)}`,
            },
        };
    }
    return { matcher: createIgnoreMatcher(content, root) };
}
