import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { CONFIG_ENV, CONFIG_FILE, mergeTables, parseConfigFile, resolveConfig } from '../../src/core/config.js';
import { DEFAULT_PATTERNS, DEFAULT_RULES, defaultTables } from '../../src/core/data/index.js';
import { createDetector } from '../../src/core/detector.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('resolveConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mojiscan-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
    return path;
  }

  it('should fall back to the bundled tables without a config file', () => {
    const config = resolveConfig({ projectRoot: dir, env: {} });

    expect(config.projectRoot).toBe(dir);
    expect(config.configPath).toBeUndefined();
    expect(config.tables).toEqual(defaultTables());
  });

  it('should append entries from the project config file', () => {
    const path = writeConfig(CONFIG_FILE, {
      patterns: [{ corrupted: 'Ã°', correct: 'ð' }],
      rules: [{ pattern: 'Ð[\\x80-\\xBF]', description: 'Cyrillic read as Latin-1' }],
      weirdChars: ['Ð'],
    });

    const config = resolveConfig({ projectRoot: dir, env: {} });

    expect(config.configPath).toBe(path);
    expect(config.tables.patterns).toHaveLength(DEFAULT_PATTERNS.length + 1);
    expect(config.tables.patterns.at(-1)).toEqual({ corrupted: 'Ã°', correct: 'ð' });
    expect(config.tables.rules).toHaveLength(DEFAULT_RULES.length + 1);
    expect(config.tables.profile.weirdChars.at(-1)).toBe('Ð');
  });

  it('should replace the bundled tables when asked', () => {
    writeConfig(CONFIG_FILE, {
      replaceDefaults: true,
      patterns: [{ corrupted: 'Ð¿', correct: 'п' }],
    });

    const config = resolveConfig({ projectRoot: dir, env: {} });

    expect(config.tables).toEqual({
      patterns: [{ corrupted: 'Ð¿', correct: 'п' }],
      rules: [],
      profile: { suspiciousCombos: [], weirdChars: [] },
    });
  });

  it('should prefer an explicit path over the environment', () => {
    writeConfig('explicit.json', { patterns: [{ corrupted: 'A', correct: 'a' }] });
    writeConfig('from-env.json', { patterns: [{ corrupted: 'B', correct: 'b' }] });

    const explicit = resolveConfig({ projectRoot: dir, configPath: 'explicit.json', env: { [CONFIG_ENV]: 'from-env.json' } });
    const fromEnv = resolveConfig({ projectRoot: dir, env: { [CONFIG_ENV]: 'from-env.json' } });

    expect(explicit.tables.patterns.at(-1)).toEqual({ corrupted: 'A', correct: 'a' });
    expect(fromEnv.tables.patterns.at(-1)).toEqual({ corrupted: 'B', correct: 'b' });
  });

  it('should fail when an explicit config file is missing', () => {
    expect(() => resolveConfig({ projectRoot: dir, configPath: 'missing.json', env: {} }))
      .toThrow(ConfigurationError);
  });

  it('should fail on invalid JSON', () => {
    writeConfig(CONFIG_FILE, '{ "patterns": [');

    expect(() => resolveConfig({ projectRoot: dir, env: {} })).toThrow(/not valid JSON/);
  });

  it('should fail on unknown keys and wrong types', () => {
    writeConfig(CONFIG_FILE, { patterns: 'nope', colour: true });

    expect(() => resolveConfig({ projectRoot: dir, env: {} })).toThrow(ConfigurationError);
  });

  it('should surface broken rules when the detector is built', () => {
    writeConfig(CONFIG_FILE, { rules: [{ pattern: '(', description: 'open group' }] });

    const config = resolveConfig({ projectRoot: dir, env: {} });

    expect(() => createDetector(config)).toThrow(/open group/);
  });
});

describe('parseConfigFile', () => {
  it('should fill defaults for missing sections', () => {
    expect(parseConfigFile({})).toEqual({
      replaceDefaults: false,
      patterns: [],
      rules: [],
      suspiciousCombos: [],
      weirdChars: [],
    });
  });

  it('should list every schema problem', () => {
    try {
      parseConfigFile({ patterns: [{ corrupted: 1 }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues.map(i => i.split(':')[0])).toEqual(['patterns.0.corrupted', 'patterns.0.correct']);
      }
    }
  });
});

describe('mergeTables', () => {
  it('should keep bundled entries first', () => {
    const merged = mergeTables(defaultTables(), parseConfigFile({ suspiciousCombos: ['Ã°'] }));

    expect(merged.profile.suspiciousCombos[0]).toBe('Ã¢');
    expect(merged.profile.suspiciousCombos.at(-1)).toBe('Ã°');
  });
});
