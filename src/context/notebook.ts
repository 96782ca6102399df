/**
 * Notebook extraction - code cells of an `.ipynb` document as plain source.
 */

import { readFileSync } from 'fs';
import { errorMessage } from './diagnostics.js';

export const NOTEBOOK_EXTENSION = '.ipynb';

interface NotebookCell {
    cell_type: string;
    source: string | string[];
}

function isNotebookCell(value: unknown): value is NotebookCell {
    if (typeof value !== 'object' || value === null) return false;
    const cell = value as Record<string, unknown>;
    const source = cell.source;
    return typeof cell.cell_type === 'string'
        && (typeof source === 'string' || (Array.isArray(source) && source.every(s => typeof s === 'string')));
}

function readCells(document: unknown): NotebookCell[] {
    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
        throw new Error('notebook must be a JSON object');
    }
    const cells = (document as Record<string, unknown>).cells;
    if (!Array.isArray(cells)) {
        throw new Error('notebook has no "cells" array');
    }
    return cells.filter(isNotebookCell);
}

export function isNotebookPath(filePath: string): boolean {
    return filePath.toLowerCase().endsWith(NOTEBOOK_EXTENSION);
}

/**
 * Source of every non-empty code cell, each followed by a blank line, under a
 * `# Generated from <path>` header. Never throws: failures come back as a
 * `# Error converting notebook` line.
 */
export function extractCode(notebookPath: string): string {
    try {
        const document: unknown = JSON.parse(readFileSync(notebookPath, 'utf-8'));
        let output = `# Generated from ${notebookPath}\n\n`;

        for (const cell of readCells(document)) {
            if (cell.cell_type !== 'code') continue;
            const source = Array.isArray(cell.source) ? cell.source.join('') : cell.source;
            if (!source.trim()) continue;
            output += `${source}\n\n`;
        }

        return output;
    } catch (error) {
        return `# Error converting notebook ${notebookPath}: ${errorMessage(error)}`;
    }
}
