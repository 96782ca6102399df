/**
 * Report pipeline:
 *
 * 1. Load the ignore file (missing file -> empty matcher + diagnostic)
 * 2. Turn the config into selection rules
 * 3. Select files (explicit files, then regex rules, each path at most once)
 * 4. Assemble trees, file blocks and diagnostics into one report
 *
 * State (printed set, diagnostics) lives for one call only.
 */

import type { ProjectConfig } from '../config/config.js';
import { loadIgnoreMatcher } from './filter.js';
import { assembleReport, type EntrySink, type Report } from './report.js';
import { selectFiles, type SelectionResult, type SelectionRule } from './selector.js';

export interface ReportOptions {
    /** Trees only */
    dirOnly?: boolean;
    /** File blocks only */
    skipTree?: boolean;
    /** Receives every entry as it is produced (console echo) */
    onEntry?: EntrySink;
}

export interface ReportResult extends Report {
    selection: SelectionResult;
    timing: {
        selectMs: number;
        assembleMs: number;
        totalMs: number;
    };
}

export function rulesFromConfig(config: ProjectConfig): SelectionRule[] {
    return [
        ...config.dirs.map((path): SelectionRule => ({ kind: 'dir', path })),
        ...config.files.map((path): SelectionRule => ({ kind: 'file', path })),
        ...config.regexfiles.map((entry): SelectionRule => ({
            kind: 'regex',
            dir: entry.dir,
            pattern: entry.pattern,
            recursive: entry.subdirs,
        })),
    ];
}

export function generateReport(config: ProjectConfig, options: ReportOptions = {}): ReportResult {
    const totalStart = Date.now();
    const { matcher, diagnostic } = loadIgnoreMatcher(config.gitignore);
    const rules = rulesFromConfig(config);

    const selectStart = Date.now();
    const selection: SelectionResult = options.dirOnly
        ? { files: [], diagnostics: [] }
        : selectFiles(rules, matcher);
    const selectMs = Date.now() - selectStart;

    const dirs = rules.flatMap(rule => (rule.kind === 'dir' ? [rule.path] : []));

    const assembleStart = Date.now();
    const report = assembleReport(dirs, selection, matcher, {
        dirOnly: options.dirOnly,
        skipTree: options.skipTree,
        diagnostics: diagnostic ? [diagnostic] : [],
        onEntry: options.onEntry,
    });
    const assembleMs = Date.now() - assembleStart;

    return {
        ...report,
        selection,
        timing: { selectMs, assembleMs, totalMs: Date.now() - totalStart },
    };
}
