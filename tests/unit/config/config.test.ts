import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, parseConfig, CONFIG_TEMPLATE, ConfigUnreadableError } from '../../../src/config/config.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parse, stringify } from 'yaml';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'projprint-config-test-' + Date.now());

function writeConfig(filename: string, content: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filepath = join(TEST_DIR, filename);
  writeFileSync(filepath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filepath;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  afterEach(() => {
    try { rmSync(TEST_DIR, { recursive: true, force: true }); } catch { /* ignore */ }
    vi.restoreAllMocks();
  });

  // ── File loading ──────────────────────────────────────────────────────────

  it('throws if config file does not exist', () => {
    expect(() => loadConfig('/nonexistent/path/proj.yml')).toThrow(ConfigUnreadableError);
    expect(() => loadConfig('/nonexistent/path/proj.yml')).toThrow('Config file not found');
  });

  it('throws on invalid YAML', () => {
    const path = writeConfig('bad.yml', 'dirs: [unclosed\n');
    expect(() => loadConfig(path)).toThrow('Invalid YAML in config file');
  });

  it('throws if config is a list', () => {
    const path = writeConfig('list.yml', '- a\n- b\n');
    expect(() => loadConfig(path)).toThrow(`Config file must contain a mapping: ${path}`);
  });

  it('reads an empty file as an empty config', () => {
    const path = writeConfig('empty.yml', '');
    expect(loadConfig(path)).toEqual({ dirs: [], files: [], regexfiles: [] });
  });

  it('loads JSON as YAML', () => {
    const path = writeConfig('proj.json', { dirs: ['src'], files: ['a.txt'] });
    expect(loadConfig(path)).toEqual({ dirs: ['src'], files: ['a.txt'], regexfiles: [] });
  });

  it('loads every section', () => {
    const path = writeConfig('full.yml', [
      'dirs:',
      '  - ./project',
      'files:',
      '  - ./project/root_file.txt',
      'regexfiles:',
      '  - dir: ./project',
      '    pattern: \'^(?!.*\\.txt$).*\'',
      '    subdirs: false',
      'gitignore: ./.gitignore',
      '',
    ].join('\n'));
    expect(loadConfig(path)).toEqual({
      dirs: ['./project'],
      files: ['./project/root_file.txt'],
      regexfiles: [{ dir: './project', pattern: '^(?!.*\\.txt$).*', subdirs: false }],
      gitignore: './.gitignore',
    });
  });

  // ── Validation ────────────────────────────────────────────────────────────

  it('treats null sections as empty', () => {
    const path = writeConfig('nulls.yml', 'dirs:\nfiles:\nregexfiles:\n');
    expect(loadConfig(path)).toEqual({ dirs: [], files: [], regexfiles: [] });
  });

  it('defaults subdirs to true', () => {
    const config = parseConfig({ regexfiles: [{ dir: 'src', pattern: '\\.ts$' }] });
    expect(config.regexfiles).toEqual([{ dir: 'src', pattern: '\\.ts$', subdirs: true }]);
  });

  it('throws when dirs is not a list of strings', () => {
    expect(() => parseConfig({ dirs: 'src' })).toThrow('Config "dirs" must be a list of strings');
    expect(() => parseConfig({ files: [1] })).toThrow('Config "files" must be a list of strings');
  });

  it('throws when subdirs is not a boolean', () => {
    expect(() => parseConfig({ regexfiles: [{ dir: 'a', pattern: 'b', subdirs: 'yes' }] }))
      .toThrow('Config "regexfiles[0].subdirs" must be a boolean');
  });

  it('throws when a regexfiles entry is not an object', () => {
    expect(() => parseConfig({ regexfiles: ['src'] })).toThrow('Config "regexfiles[0]" must be an object');
  });

  it('throws when gitignore is not a string', () => {
    expect(() => parseConfig({ gitignore: ['a'] })).toThrow('Config "gitignore" must be a string');
  });

  it('skips a regexfiles entry without a pattern', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = parseConfig({ regexfiles: [{ dir: 'src' }, { dir: 'lib', pattern: 'x' }] });
    expect(config.regexfiles).toEqual([{ dir: 'lib', pattern: 'x', subdirs: true }]);
    expect(warnSpy).toHaveBeenCalledWith('Warning: regexfiles[0] skipped: both "dir" and "pattern" are required');
  });

  // ── Unknown keys ──────────────────────────────────────────────────────────

  it('warns on unknown keys', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = parseConfig({ dirs: ['.'], unknownKey: 'value', another: 42 });
    expect(config.dirs).toEqual(['.']);
    expect(warnSpy).toHaveBeenCalledWith('Warning: Unknown config keys ignored: unknownKey, another');
  });

  it('warns on unknown regexfiles keys', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    parseConfig({ regexfiles: [{ dir: 'a', pattern: 'b', depth: 2 }] });
    expect(warnSpy).toHaveBeenCalledWith('Warning: Unknown regexfiles[0] keys ignored: depth');
  });
});

describe('CONFIG_TEMPLATE', () => {
  it('survives a YAML round trip through parseConfig', () => {
    expect(parseConfig(parse(stringify(CONFIG_TEMPLATE)))).toEqual(CONFIG_TEMPLATE);
  });
});
