/**
 * File Selector - resolves the configured selection rules into the ordered
 * list of files whose contents go into the report.
 *
 * Explicit files come first, in the order listed, then regex rules in
 * declaration order. A file reachable through several rules is selected once:
 * the first rule to reach it wins, later ones skip it silently.
 */

import { statSync } from 'fs';
import { basename, join } from 'path';
import type { Diagnostic } from './diagnostics.js';
import { errorMessage } from './diagnostics.js';
import type { IgnoreMatcher } from './filter.js';
import { canonicalPath, displayPath, pathApiFor, relativeInside } from './paths.js';
import { isDirectory, joinRelative, listDirectory, type DirectoryListing } from './tree.js';

export type SelectionRule =
    /** Rendered as a tree only; selects no content */
    | { kind: 'dir'; path: string }
    | { kind: 'file'; path: string }
    | { kind: 'regex'; dir: string; pattern: string; recursive: boolean };

export interface SelectedFile {
    /** Path as shown in the report */
    path: string;
    /** Absolute path used for de-duplication */
    canonical: string;
    source: 'file' | 'regex';
}

export interface SelectionResult {
    files: SelectedFile[];
    /**
     * Rule-level problems in the order met, followed by the `files` entries
     * that were never included (not found or excluded).
     */
    diagnostics: Diagnostic[];
}

interface SelectionState {
    matcher: IgnoreMatcher;
    printed: Set<string>;
    files: SelectedFile[];
    diagnostics: Diagnostic[];
    /** Explicit-file problems, resolved against `printed` once every rule ran */
    pending: { canonical: string; diagnostic: Diagnostic }[];
}

function include(state: SelectionState, shown: string, source: SelectedFile['source']): void {
    const canonical = canonicalPath(shown);
    if (state.printed.has(canonical)) return;
    state.printed.add(canonical);
    state.files.push({ path: shown, canonical, source });
}

function selectExplicitFile(state: SelectionState, filePath: string): void {
    const shown = displayPath(filePath);
    const canonical = canonicalPath(shown);

    let isFile: boolean;
    try {
        isFile = statSync(shown).isFile();
    } catch {
        state.pending.push({ canonical, diagnostic: { kind: 'FileNotFound', path: shown, message: `File not found: ${shown}` } });
        return;
    }
    if (!isFile) {
        state.pending.push({ canonical, diagnostic: { kind: 'FileNotFound', path: shown, message: `Not a file: ${shown}` } });
        return;
    }

    const relativePath = relativeInside(state.matcher.root, shown) ?? basename(shown);
    if (state.matcher.matches(relativePath, false)) {
        state.pending.push({
            canonical,
            diagnostic: { kind: 'ExcludedByIgnore', path: shown, message: `Excluded by ignore rules: ${shown}` },
        });
        return;
    }

    include(state, shown, 'file');
}

function selectByPattern(state: SelectionState, rule: Extract<SelectionRule, { kind: 'regex' }>): void {
    const base = displayPath(rule.dir);

    if (!isDirectory(base)) {
        state.diagnostics.push({ kind: 'BaseDirNotFound', path: base, message: `Base directory not found: ${base}` });
        return;
    }

    let pattern: RegExp;
    try {
        pattern = new RegExp(rule.pattern);
    } catch (error) {
        state.diagnostics.push({
            kind: 'InvalidPattern',
            path: base,
            message: `Invalid regex pattern '${rule.pattern}' for ${base}: ${errorMessage(error)}`,
        });
        return;
    }

    const api = pathApiFor(base);

    const visit = (absoluteDir: string, relativeDir: string): void => {
        let listing: DirectoryListing;
        try {
            listing = listDirectory(absoluteDir);
        } catch (error) {
            const shown = relativeDir ? api.join(base, ...relativeDir.split('/')) : base;
            state.diagnostics.push({
                kind: 'DirectoryAccessError',
                path: shown,
                message: `Cannot read directory ${shown}: ${errorMessage(error)}`,
            });
            return;
        }

        for (const file of listing.files) {
            const rel = joinRelative(relativeDir, file);
            if (state.matcher.matches(rel, false)) continue;
            if (!pattern.test(file)) continue;
            include(state, api.join(base, ...rel.split('/')), 'regex');
        }

        if (!rule.recursive) return;

        for (const dir of listing.directories) {
            const rel = joinRelative(relativeDir, dir);
            if (state.matcher.matches(rel, true)) continue;
            visit(join(absoluteDir, dir), rel);
        }
    };

    visit(base, '');
}

/**
 * Resolve `rules` against the filesystem. Nothing here throws for a missing
 * or unreadable path: each problem becomes a diagnostic.
 */
export function selectFiles(rules: SelectionRule[], matcher: IgnoreMatcher): SelectionResult {
    const state: SelectionState = {
        matcher,
        printed: new Set<string>(),
        files: [],
        diagnostics: [],
        pending: [],
    };

    for (const rule of rules) {
        if (rule.kind === 'file') selectExplicitFile(state, rule.path);
    }
    for (const rule of rules) {
        if (rule.kind === 'regex') selectByPattern(state, rule);
    }

    const reported = new Set<string>();
    const unresolved: Diagnostic[] = [];
    for (const entry of state.pending) {
        if (state.printed.has(entry.canonical) || reported.has(entry.canonical)) continue;
        reported.add(entry.canonical);
        unresolved.push(entry.diagnostic);
    }

    return { files: state.files, diagnostics: [...state.diagnostics, ...unresolved] };
}
