/**
 * Directory Tree Renderer - walks one directory top-down and produces the
 * indented `+---` listing used in reports.
 *
 * Each directory line is followed by its files, then by its subdirectories.
 * Siblings are sorted by name. Symbolic links are never descended.
 */

import { readdirSync, statSync } from 'fs';
import { join } from 'path';
import type { Diagnostic } from './diagnostics.js';
import { errorMessage } from './diagnostics.js';
import type { IgnoreMatcher } from './filter.js';
import { displayPath, pathApiFor, rootLabel } from './paths.js';

export const TREE_INDENT = '    ';
export const TREE_MARKER = '+---';

export interface TreeLine {
    kind: 'directory' | 'file';
    name: string;
    /** Path relative to the rendered root, `/`-separated; '' for the root */
    relativePath: string;
    /** Indentation level (one level = 4 spaces) */
    depth: number;
}

export interface TreeOptions {
    /** Receives DirectoryAccessError diagnostics for directories that cannot be listed */
    onDiagnostic?: (diagnostic: Diagnostic) => void;
}

export interface DirectoryListing {
    directories: string[];
    files: string[];
}

/**
 * Immediate subdirectories and regular files of `dirPath`, sorted by name.
 * Links to files count as files; links to directories and broken links are left out.
 * Throws when the directory cannot be read.
 */
export function listDirectory(dirPath: string): DirectoryListing {
    const entries = readdirSync(dirPath, { withFileTypes: true });
    const directories: string[] = [];
    const files: string[] = [];

    for (const entry of entries) {
        if (entry.isDirectory()) {
            directories.push(entry.name);
        } else if (entry.isFile()) {
            files.push(entry.name);
        } else if (entry.isSymbolicLink()) {
            try {
                if (statSync(join(dirPath, entry.name)).isFile()) files.push(entry.name);
            } catch {
                // broken link
                continue;
            }
        }
    }

    directories.sort((a, b) => a.localeCompare(b));
    files.sort((a, b) => a.localeCompare(b));
    return { directories, files };
}

export function isDirectory(p: string): boolean {
    try {
        return statSync(p).isDirectory();
    } catch {
        return false;
    }
}

export function joinRelative(parent: string, name: string): string {
    return parent ? `${parent}/${name}` : name;
}

/**
 * Render `rootDir` as tree lines, skipping everything the matcher excludes.
 * Excluded directories are never entered.
 */
export function renderTree(rootDir: string, matcher: IgnoreMatcher, options: TreeOptions = {}): TreeLine[] {
    const lines: TreeLine[] = [];
    const api = pathApiFor(rootDir);
    const shownRoot = displayPath(rootDir);

    const visit = (absoluteDir: string, relativeDir: string, name: string, depth: number): void => {
        lines.push({ kind: 'directory', name, relativePath: relativeDir, depth });

        let listing: DirectoryListing;
        try {
            listing = listDirectory(absoluteDir);
        } catch (error) {
            const shown = relativeDir ? api.join(shownRoot, ...relativeDir.split('/')) : shownRoot;
            options.onDiagnostic?.({
                kind: 'DirectoryAccessError',
                path: shown,
                message: `Cannot read directory ${shown}: ${errorMessage(error)}`,
            });
            return;
        }

        for (const file of listing.files) {
            const rel = joinRelative(relativeDir, file);
            if (matcher.matches(rel, false)) continue;
            lines.push({ kind: 'file', name: file, relativePath: rel, depth: depth + 1 });
        }

        for (const dir of listing.directories) {
            const rel = joinRelative(relativeDir, dir);
            if (matcher.matches(rel, true)) continue;
            visit(join(absoluteDir, dir), rel, dir, depth + 1);
        }
    };

    visit(rootDir, '', rootLabel(shownRoot), 0);
    return lines;
}

export function formatTreeLine(line: TreeLine): string {
    const indent = TREE_INDENT.repeat(line.depth);
    return line.depth === 0 ? `${indent}${line.name}` : `${indent}${TREE_MARKER}${line.name}`;
}

/** Render and format in one step: one string per line. */
export function generateTree(rootDir: string, matcher: IgnoreMatcher, options: TreeOptions = {}): string[] {
    return renderTree(rootDir, matcher, options).map(formatTreeLine);
}
