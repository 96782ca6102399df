/**
 * Tree Parser - turns a rendered `+---` tree (or a plain list of paths) back
 * into full paths, filtered by kind and by a file-name pattern.
 *
 * Input with a `Directory: <base>` header and marker lines is read as a tree:
 * indentation / 4 gives each node's depth, and a stack of ancestor names gives
 * its path. Anything else is read as one path per line.
 *
 * A name counts as a file when it contains a dot.
 */

import { errorMessage } from './diagnostics.js';
import { normalizePath, pathApiFor, type PathApi } from './paths.js';
import { TREE_INDENT, TREE_MARKER } from './tree.js';

export type PathKind = 'files' | 'dirs' | 'both';

export interface ParseOptions {
    /** Which nodes to return (default: both) */
    type?: PathKind;
    /** Files whose name does not match (search semantics) are dropped; directories pass */
    namePattern?: string | RegExp;
}

export class TreeParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TreeParseError';
    }
}

export const README_PATTERN = 'README\\.md$';

const HEADER = /^\s*Directory:\s*(.*?)\s*$/;
const FILE_HEADER = /^File: /;

interface TreeSection {
    base: string;
    lines: string[];
}

interface SectionPaths {
    paths: string[];
    /** First segment below the base; rendered output may repeat it */
    firstDir?: string;
    api: PathApi;
}

function compileNamePattern(pattern: string | RegExp | undefined): RegExp | undefined {
    if (pattern === undefined) return undefined;
    if (pattern instanceof RegExp) {
        return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    }
    try {
        return new RegExp(pattern);
    } catch (error) {
        throw new TreeParseError(`Invalid name pattern "${pattern}": ${errorMessage(error)}`);
    }
}

function isFileName(name: string): boolean {
    return name.includes('.');
}

function wanted(type: PathKind, isFile: boolean, name: string, pattern?: RegExp): boolean {
    if (type === 'files' && !isFile) return false;
    if (type === 'dirs' && isFile) return false;
    if (isFile && pattern && !pattern.test(name)) return false;
    return true;
}

function markerIndent(line: string): number {
    return line.indexOf(TREE_MARKER);
}

/**
 * True when the text carries a `Directory:` header and at least one marker
 * line aligned to the 4-space grid.
 */
export function isRenderedTree(text: string): boolean {
    const lines = text.split(/\r?\n/);
    const hasHeader = lines.some(line => HEADER.test(line));
    const hasMarker = lines.some(line => {
        const indent = markerIndent(line);
        return indent !== -1 && indent % TREE_INDENT.length === 0;
    });
    return hasHeader && hasMarker;
}

function splitSections(text: string): TreeSection[] {
    const sections: TreeSection[] = [];
    let current: TreeSection | undefined;

    for (const line of text.split(/\r?\n/)) {
        const header = HEADER.exec(line);
        if (header) {
            current = { base: normalizePath(header[1] ?? ''), lines: [] };
            sections.push(current);
            continue;
        }
        // file blocks of a pasted report end the tree section
        if (FILE_HEADER.test(line)) {
            current = undefined;
            continue;
        }
        current?.lines.push(line);
    }

    return sections;
}

function parseSection(section: TreeSection, type: PathKind, pattern?: RegExp): SectionPaths {
    const api = pathApiFor(section.base);
    const stack: string[] = [];
    const paths: string[] = [];
    let firstDir: string | undefined;
    let sawLine = false;

    for (const line of section.lines) {
        if (!line.trim()) continue;

        const indent = markerIndent(line);
        if (indent === -1) {
            // the root label precedes the first node and seeds ancestor slot 0
            if (!sawLine) stack.push(line.trim());
            sawLine = true;
            continue;
        }
        sawLine = true;

        const name = line.slice(indent + TREE_MARKER.length).trim();
        if (!name) continue;

        const depth = Math.min(Math.floor(indent / TREE_INDENT.length), stack.length);
        stack.length = depth;
        stack.push(name);
        if (firstDir === undefined) firstDir = stack[0];

        if (wanted(type, isFileName(name), name, pattern)) {
            paths.push(api.join(section.base, ...stack));
        }
    }

    return { paths, firstDir, api };
}

/**
 * Rendered trees repeat the root directory's name below a base that already
 * ends with it (`base/app/app/x`). Drop the second occurrence of `firstDir`.
 */
export function collapseDuplicateSegment(fullPath: string, firstDir: string, api: PathApi = pathApiFor(fullPath)): string {
    const parts = fullPath.split(api.sep);
    const first = parts.indexOf(firstDir);
    if (first === -1) return fullPath;
    const second = parts.indexOf(firstDir, first + 1);
    if (second === -1) return fullPath;
    parts.splice(second, 1);
    return parts.join(api.sep);
}

function parseFlatList(text: string, type: PathKind, pattern?: RegExp): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0)
        .map(normalizePath)
        .filter(p => {
            const name = pathApiFor(p).basename(p);
            return wanted(type, isFileName(name), name, pattern);
        });
}

/**
 * Reconstruct full paths from rendered tree text or a flat path list.
 * Every `Directory:` section is parsed on its own.
 */
export function parseTree(text: string, options: ParseOptions = {}): string[] {
    const type = options.type ?? 'both';
    const pattern = compileNamePattern(options.namePattern);

    if (!isRenderedTree(text)) {
        return parseFlatList(text, type, pattern);
    }

    const result: string[] = [];
    for (const section of splitSections(text)) {
        const parsed = parseSection(section, type, pattern);
        const { firstDir, api } = parsed;
        const collapsed = firstDir === undefined
            ? parsed.paths
            : parsed.paths.map(p => collapseDuplicateSegment(p, firstDir, api));
        result.push(...collapsed.map(normalizePath));
    }
    return result;
}

/** One `  - <path>` line per path, ready to paste under `files:` in a config. */
export function formatAsYamlList(paths: string[]): string {
    return paths.map(p => `  - ${normalizePath(p)}`).join('\n');
}

export function listPaths(text: string, options: ParseOptions = {}): string {
    return formatAsYamlList(parseTree(text, options));
}
