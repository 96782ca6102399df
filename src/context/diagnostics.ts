/**
 * Non-fatal problems collected during a run and listed at the end of the report.
 */

export type DiagnosticKind =
    | 'DirNotFound'
    | 'BaseDirNotFound'
    | 'FileNotFound'
    | 'ExcludedByIgnore'
    | 'InvalidPattern'
    | 'DirectoryAccessError'
    | 'IgnoreFileNotFound'
    | 'IgnoreFileUnreadable'
    | 'FileUnreadable';

export interface Diagnostic {
    kind: DiagnosticKind;
    /** Path as configured (or as reached by a walk) */
    path: string;
    message: string;
}

/** Kinds that describe an entry of the `files` list that never made it into the report */
const FILE_REQUEST_KINDS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>(['FileNotFound', 'ExcludedByIgnore']);

export function isFileRequestDiagnostic(diagnostic: Diagnostic): boolean {
    return FILE_REQUEST_KINDS.has(diagnostic.kind);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
