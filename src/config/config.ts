/**
 * Project Config File Support
 *
 * One YAML file (default `proj.yml`) names what goes into the report:
 * - dirs: directories rendered as trees
 * - files: files included verbatim
 * - regexfiles: { dir, pattern, subdirs } searches for files by name
 * - gitignore: ignore file applied to all of the above
 *
 * JSON is valid YAML, so `.json` configs load too. Paths are used as written.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse } from 'yaml';

export interface RegexFileConfig {
    dir: string;
    pattern: string;
    /** Descend into subdirectories (default: true) */
    subdirs: boolean;
}

export interface ProjectConfig {
    dirs: string[];
    files: string[];
    regexfiles: RegexFileConfig[];
    gitignore?: string;
}

/** The configuration cannot be used; the run stops. */
export class ConfigUnreadableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigUnreadableError';
    }
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>(['dirs', 'files', 'regexfiles', 'gitignore']);
const REGEXFILE_KEYS = new Set<string>(['dir', 'pattern', 'subdirs']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string, where: string = key): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigUnreadableError(`Config "${where}" must be a string`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (val === null || val === undefined) return [];
    if (!Array.isArray(val)) {
        throw new ConfigUnreadableError(`Config "${key}" must be a list of strings`);
    }
    const result: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new ConfigUnreadableError(`Config "${key}" must be a list of strings`);
        result.push(item);
    }
    return result;
}

function parseRegexFiles(value: unknown): RegexFileConfig[] {
    if (value === null || value === undefined) return [];
    if (!Array.isArray(value)) {
        throw new ConfigUnreadableError('Config "regexfiles" must be a list of { dir, pattern, subdirs } entries');
    }

    const result: RegexFileConfig[] = [];
    value.forEach((entry: unknown, index: number) => {
        const where = `regexfiles[${index}]`;
        if (!isRecord(entry)) {
            throw new ConfigUnreadableError(`Config "${where}" must be an object`);
        }

        const unknowns = Object.keys(entry).filter(k => !REGEXFILE_KEYS.has(k));
        if (unknowns.length > 0) {
            console.warn(`Warning: Unknown ${where} keys ignored: ${unknowns.join(', ')}`);
        }

        if (entry.dir === undefined || entry.dir === null || entry.pattern === undefined || entry.pattern === null) {
            console.warn(`Warning: ${where} skipped: both "dir" and "pattern" are required`);
            return;
        }

        let subdirs = true;
        if (entry.subdirs !== undefined && entry.subdirs !== null) {
            if (typeof entry.subdirs !== 'boolean') {
                throw new ConfigUnreadableError(`Config "${where}.subdirs" must be a boolean`);
            }
            subdirs = entry.subdirs;
        }

        result.push({
            dir: assertString(entry, 'dir', `${where}.dir`),
            pattern: assertString(entry, 'pattern', `${where}.pattern`),
            subdirs,
        });
    });
    return result;
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Validate already-decoded config data. Null or missing keys read as empty.
 */
export function parseConfig(data: unknown, source: string = 'config'): ProjectConfig {
    if (data === null || data === undefined) {
        return { dirs: [], files: [], regexfiles: [] };
    }
    if (!isRecord(data)) {
        throw new ConfigUnreadableError(`Config file must contain a mapping: ${source}`);
    }

    const unknownKeys = Object.keys(data).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: ProjectConfig = {
        dirs: assertStringArray(data, 'dirs'),
        files: assertStringArray(data, 'files'),
        regexfiles: parseRegexFiles(data.regexfiles),
    };
    if (data.gitignore !== undefined && data.gitignore !== null) {
        config.gitignore = assertString(data, 'gitignore');
    }
    return config;
}

/**
 * Load and validate a config file.
 * Throws ConfigUnreadableError on a missing or unreadable file, bad YAML or bad types.
 */
export function loadConfig(configPath: string): ProjectConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigUnreadableError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new ConfigUnreadableError(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigUnreadableError(`Invalid YAML in config file: ${absolutePath}\n${reason}`);
    }

    return parseConfig(parsed, absolutePath);
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Starter config written by the `init` command.
 */
export const CONFIG_TEMPLATE: ProjectConfig = {
    dirs: ['.'],
    files: ['README.md'],
    regexfiles: [
        { dir: 'src', pattern: '\\.ts$', subdirs: true },
    ],
    gitignore: '.gitignore',
};
