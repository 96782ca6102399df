import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, realpathSync, symlinkSync } from 'fs';
import { join, relative } from 'path';
import { tmpdir } from 'os';
import { selectFiles, type SelectionRule } from '../../../src/context/selector.js';
import { loadIgnoreMatcher, createIgnoreMatcher, type IgnoreMatcher } from '../../../src/context/filter.js';

describe('selectFiles', () => {
  let base: string;
  let project: string;
  let matcher: IgnoreMatcher;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'projprint-select-'));
    project = join(base, 'project');
    mkdirSync(join(project, 'subdir'), { recursive: true });
    writeFileSync(join(base, '.gitignore'), '*.txt\n!root_file.txt\n');
    writeFileSync(join(project, 'main.py'), 'print("main")');
    writeFileSync(join(project, 'root_file.txt'), 'This is the root file.');
    writeFileSync(join(project, 'subdir', 'helper.py'), 'print("helper")');
    writeFileSync(join(project, 'subdir', 'subdir_file.txt'), 'This is the file in a subdirectory.');
    matcher = loadIgnoreMatcher(join(base, '.gitignore')).matcher;
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  const paths = (rules: SelectionRule[], m: IgnoreMatcher = matcher): string[] =>
    selectFiles(rules, m).files.map(f => f.path);

  // ── Regex rules ───────────────────────────────────────────────────────────

  it('searches subdirectories when recursive', () => {
    expect(paths([{ kind: 'regex', dir: project, pattern: '\\.py$', recursive: true }])).toEqual([
      join(project, 'main.py'),
      join(project, 'subdir', 'helper.py'),
    ]);
  });

  it('stays in the base directory when not recursive', () => {
    expect(paths([{ kind: 'regex', dir: project, pattern: '\\.py$', recursive: false }])).toEqual([
      join(project, 'main.py'),
    ]);
  });

  it('supports lookahead patterns', () => {
    expect(paths([{ kind: 'regex', dir: project, pattern: '^(?!.*\\.txt$).*', recursive: true }])).toEqual([
      join(project, 'main.py'),
      join(project, 'subdir', 'helper.py'),
    ]);
  });

  it('matches anywhere in the name', () => {
    expect(paths([{ kind: 'regex', dir: project, pattern: 'elp', recursive: true }])).toEqual([
      join(project, 'subdir', 'helper.py'),
    ]);
  });

  it('skips files the ignore rules exclude', () => {
    expect(paths([{ kind: 'regex', dir: project, pattern: '\\.txt$', recursive: true }])).toEqual([
      join(project, 'root_file.txt'),
    ]);
  });

  it('reports an invalid pattern and carries on with the next rule', () => {
    const result = selectFiles([
      { kind: 'regex', dir: project, pattern: '[', recursive: true },
      { kind: 'regex', dir: project, pattern: '^main', recursive: false },
    ], matcher);

    expect(result.files.map(f => f.path)).toEqual([join(project, 'main.py')]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].kind).toBe('InvalidPattern');
    expect(result.diagnostics[0].message.startsWith(`Invalid regex pattern '[' for ${project}: `)).toBe(true);
  });

  it('reports a missing base directory', () => {
    const missing = join(base, 'nope');
    const result = selectFiles([{ kind: 'regex', dir: missing, pattern: '.', recursive: true }], matcher);
    expect(result.files).toEqual([]);
    expect(result.diagnostics).toEqual([
      { kind: 'BaseDirNotFound', path: missing, message: `Base directory not found: ${missing}` },
    ]);
  });

  // ── Explicit files ────────────────────────────────────────────────────────

  it('includes explicit files before regex matches', () => {
    const result = selectFiles([
      { kind: 'regex', dir: project, pattern: '.', recursive: false },
      { kind: 'file', path: join(project, 'root_file.txt') },
    ], matcher);

    expect(result.files).toEqual([
      { path: join(project, 'root_file.txt'), canonical: realpathSync(join(project, 'root_file.txt')), source: 'file' },
      { path: join(project, 'main.py'), canonical: realpathSync(join(project, 'main.py')), source: 'regex' },
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it('selects a file once whether spelled relative or absolute', () => {
    const absolute = join(project, 'main.py');
    const rel = relative(process.cwd(), absolute);
    const result = selectFiles([
      { kind: 'file', path: rel },
      { kind: 'file', path: absolute },
      { kind: 'regex', dir: project, pattern: 'main', recursive: false },
    ], matcher);

    expect(result.files).toHaveLength(1);
    expect(result.files[0].canonical).toBe(realpathSync(absolute));
  });

  it('selects a file once when reached through a linked directory', () => {
    const real = join(project, 'real');
    mkdirSync(real);
    writeFileSync(join(real, 'a.py'), 'print("a")');
    symlinkSync(real, join(project, 'alias'), 'dir');

    const result = selectFiles([
      { kind: 'file', path: join(project, 'alias', 'a.py') },
      { kind: 'regex', dir: real, pattern: 'a', recursive: false },
    ], matcher);

    expect(result.files.map(f => f.path)).toEqual([join(project, 'alias', 'a.py')]);
    expect(result.diagnostics).toEqual([]);
  });

  it('reports a missing explicit file once', () => {
    const missing = join(project, 'missing.py');
    const result = selectFiles([
      { kind: 'file', path: missing },
      { kind: 'file', path: missing },
    ], matcher);

    expect(result.diagnostics).toEqual([
      { kind: 'FileNotFound', path: missing, message: `File not found: ${missing}` },
    ]);
  });

  it('reports a directory given as a file', () => {
    const dir = join(project, 'subdir');
    const result = selectFiles([{ kind: 'file', path: dir }], matcher);
    expect(result.diagnostics).toEqual([
      { kind: 'FileNotFound', path: dir, message: `Not a file: ${dir}` },
    ]);
  });

  it('reports an explicit file the ignore rules exclude', () => {
    const excluded = join(project, 'subdir', 'subdir_file.txt');
    const result = selectFiles([{ kind: 'file', path: excluded }], matcher);
    expect(result.files).toEqual([]);
    expect(result.diagnostics).toEqual([
      { kind: 'ExcludedByIgnore', path: excluded, message: `Excluded by ignore rules: ${excluded}` },
    ]);
  });

  it('drops the exclusion report when a regex rule includes the file after all', () => {
    const target = join(project, 'root_file.txt');
    const anchored: IgnoreMatcher = {
      root: base,
      matches: (relativePath: string) => relativePath === 'project/root_file.txt',
    };

    const result = selectFiles([
      { kind: 'file', path: target },
      { kind: 'regex', dir: project, pattern: '^root_', recursive: false },
    ], anchored);

    expect(result.files.map(f => [f.path, f.source])).toEqual([[target, 'regex']]);
    expect(result.diagnostics).toEqual([]);
  });

  it('matches explicit files outside the ignore root by name', () => {
    const outside = mkdtempSync(join(tmpdir(), 'projprint-outside-'));
    try {
      writeFileSync(join(outside, 'notes.txt'), 'x');
      const result = selectFiles([{ kind: 'file', path: join(outside, 'notes.txt') }], matcher);
      expect(result.diagnostics.map(d => d.kind)).toEqual(['ExcludedByIgnore']);
    } finally {
      rmSync(outside, { recursive: true, force: true });
    }
  });

  it('lists rule problems before unresolved files', () => {
    const missingFile = join(project, 'gone.py');
    const missingDir = join(base, 'gone');
    const result = selectFiles([
      { kind: 'file', path: missingFile },
      { kind: 'regex', dir: missingDir, pattern: '.', recursive: true },
    ], createIgnoreMatcher([]));

    expect(result.diagnostics.map(d => d.kind)).toEqual(['BaseDirNotFound', 'FileNotFound']);
  });

  it('ignores dir rules', () => {
    expect(selectFiles([{ kind: 'dir', path: project }], matcher)).toEqual({ files: [], diagnostics: [] });
  });
});
