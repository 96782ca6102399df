export { generateReport, rulesFromConfig } from './gather.js';
export type { ReportOptions, ReportResult } from './gather.js';

// Report assembly
export { assembleReport, renderEntry, FENCE, DIAGNOSTICS_HEADING, UNRESOLVED_FILES_HEADING } from './report.js';
export type { AssembleOptions, EntrySink, Report, ReportEntry } from './report.js';

// File selection
export { selectFiles } from './selector.js';
export type { SelectedFile, SelectionResult, SelectionRule } from './selector.js';

// Tree rendering and parsing
export { renderTree, generateTree, formatTreeLine, listDirectory, TREE_INDENT, TREE_MARKER } from './tree.js';
export type { TreeLine, TreeOptions, DirectoryListing } from './tree.js';
export { parseTree, isRenderedTree, collapseDuplicateSegment, formatAsYamlList, listPaths, TreeParseError, README_PATTERN } from './tree-parser.js';
export type { ParseOptions, PathKind } from './tree-parser.js';

// File reading
export { readFileEntry, decodeText } from './reader.js';
export type { FileEntry } from './reader.js';
export { extractCode, isNotebookPath } from './notebook.js';

// Filtering
export { createIgnoreMatcher, loadIgnoreMatcher } from './filter.js';
export type { IgnoreMatcher, LoadedIgnoreMatcher } from './filter.js';

// Paths and diagnostics
export { normalizePath, displayPath, canonicalPath } from './paths.js';
export type { Diagnostic, DiagnosticKind } from './diagnostics.js';
