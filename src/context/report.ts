/**
 * Report Assembler - directory trees, then file blocks, then diagnostics.
 *
 * Every piece is emitted as a ReportEntry together with its rendered text.
 * The same sequence feeds the `onEntry` sink (console echo) and the returned
 * report, so both read the same.
 */

import type { Diagnostic } from './diagnostics.js';
import { isFileRequestDiagnostic } from './diagnostics.js';
import type { IgnoreMatcher } from './filter.js';
import { displayPath } from './paths.js';
import { readFileEntry } from './reader.js';
import type { SelectionResult } from './selector.js';
import { formatTreeLine, isDirectory, renderTree, type TreeLine } from './tree.js';

export const FENCE = '```';
export const DIAGNOSTICS_HEADING = 'Diagnostics:';
export const UNRESOLVED_FILES_HEADING = 'Files not found or ignored:';

export type ReportEntry =
    | { kind: 'directory'; path: string }
    | { kind: 'tree-line'; line: TreeLine; text: string }
    | { kind: 'file'; path: string; content: string }
    | { kind: 'heading'; text: string }
    /** `inline` diagnostics stand between tree sections and are listed again at the end */
    | { kind: 'diagnostic'; diagnostic: Diagnostic; inline: boolean };

export type EntrySink = (entry: ReportEntry, text: string) => void;

export interface AssembleOptions {
    /** Trees only: no file blocks, no selection diagnostics */
    dirOnly?: boolean;
    /** File blocks only: no directory trees */
    skipTree?: boolean;
    /** Diagnostics raised before assembly (e.g. a missing ignore file) */
    diagnostics?: Diagnostic[];
    onEntry?: EntrySink;
}

export interface Report {
    /** Concatenation of every rendered entry, trimmed */
    text: string;
    entries: ReportEntry[];
    diagnostics: Diagnostic[];
    fileCount: number;
}

export function renderEntry(entry: ReportEntry): string {
    switch (entry.kind) {
        case 'directory':
            return `\nDirectory: ${entry.path}\n`;
        case 'tree-line':
            return `${entry.text}\n`;
        case 'file':
            return `\nFile: ${entry.path}\n${FENCE}\n${entry.content}\n${FENCE}\n`;
        case 'heading':
            return `\n${entry.text}\n`;
        case 'diagnostic':
            return entry.inline ? `\n${entry.diagnostic.message}\n` : `${entry.diagnostic.message}\n`;
    }
}

/**
 * Build the report for `dirs` and an already computed selection.
 */
export function assembleReport(
    dirs: string[],
    selection: SelectionResult,
    matcher: IgnoreMatcher,
    options: AssembleOptions = {}
): Report {
    const { dirOnly = false, skipTree = false } = options;
    const entries: ReportEntry[] = [];
    const segments: string[] = [];
    const summary: Diagnostic[] = [...(options.diagnostics ?? [])];
    let fileCount = 0;

    const emit = (entry: ReportEntry): void => {
        const text = renderEntry(entry);
        entries.push(entry);
        segments.push(text);
        options.onEntry?.(entry, text);
    };

    if (!skipTree) {
        for (const dir of dirs) {
            const shown = displayPath(dir);
            if (!isDirectory(shown)) {
                const diagnostic: Diagnostic = { kind: 'DirNotFound', path: shown, message: `Directory not found: ${shown}` };
                summary.push(diagnostic);
                emit({ kind: 'diagnostic', diagnostic, inline: true });
                continue;
            }

            emit({ kind: 'directory', path: shown });
            const lines = renderTree(shown, matcher, { onDiagnostic: d => summary.push(d) });
            for (const line of lines) {
                emit({ kind: 'tree-line', line, text: formatTreeLine(line) });
            }
        }
    }

    if (!dirOnly) {
        for (const file of selection.files) {
            const entry = readFileEntry(file.path);
            if (entry.diagnostic) summary.push(entry.diagnostic);
            emit({ kind: 'file', path: file.path, content: entry.content });
            fileCount++;
        }
        summary.push(...selection.diagnostics);
    }

    const general = summary.filter(d => !isFileRequestDiagnostic(d));
    const unresolved = summary.filter(isFileRequestDiagnostic);

    if (general.length > 0) {
        emit({ kind: 'heading', text: DIAGNOSTICS_HEADING });
        for (const diagnostic of general) emit({ kind: 'diagnostic', diagnostic, inline: false });
    }
    if (unresolved.length > 0) {
        emit({ kind: 'heading', text: UNRESOLVED_FILES_HEADING });
        for (const diagnostic of unresolved) emit({ kind: 'diagnostic', diagnostic, inline: false });
    }

    return {
        text: segments.join('').trim(),
        entries,
        diagnostics: [...general, ...unresolved],
        fileCount,
    };
}
