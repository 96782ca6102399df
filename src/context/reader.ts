/**
 * File Reader - loads the content of each selected file for the report.
 * UTF-8 first, Latin-1 when the bytes are not valid UTF-8; notebooks go
 * through code-cell extraction instead of being read verbatim.
 */

import { readFileSync } from 'fs';
import type { Diagnostic } from './diagnostics.js';
import { errorMessage } from './diagnostics.js';
import { extractCode, isNotebookPath } from './notebook.js';

export interface FileEntry {
    /** Path as shown in the report */
    path: string;
    content: string;
    encoding: 'utf-8' | 'latin1' | 'notebook';
    /** Set when the file could not be read; content then holds the error text */
    diagnostic?: Diagnostic;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decode bytes as UTF-8, falling back to Latin-1 (which accepts any byte). */
export function decodeText(buffer: Buffer): { text: string; encoding: 'utf-8' | 'latin1' } {
    try {
        return { text: utf8.decode(buffer), encoding: 'utf-8' };
    } catch {
        return { text: buffer.toString('latin1'), encoding: 'latin1' };
    }
}

export function readFileEntry(filePath: string): FileEntry {
    if (isNotebookPath(filePath)) {
        return { path: filePath, content: extractCode(filePath), encoding: 'notebook' };
    }

    let buffer: Buffer;
    try {
        buffer = readFileSync(filePath);
    } catch (error) {
        const message = `Error reading file ${filePath}: ${errorMessage(error)}`;
        return {
            path: filePath,
            content: message,
            encoding: 'utf-8',
            diagnostic: { kind: 'FileUnreadable', path: filePath, message },
        };
    }

    const { text, encoding } = decodeText(buffer);
    return { path: filePath, content: text, encoding };
}
