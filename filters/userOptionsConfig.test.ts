import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ConfigError,
  USER_OPTIONS,
  loadUserOptions,
  mergeUserOptions,
  parseUserOptionsYaml,
} from './userOptionsConfig';

describe('USER_OPTIONS', () => {
  it('rewrites footnotes for pdf and html with the footnote class by default', () => {
    expect(USER_OPTIONS.formatPatterns).toEqual(['pdf', 'html']);
    expect(USER_OPTIONS.spanClass).toBe('footnote');
    expect(USER_OPTIONS.reporting.enabled).toBe(false);
  });
});

describe('mergeUserOptions', () => {
  it('overrides only the keys that are given', () => {
    const merged = mergeUserOptions(USER_OPTIONS, { spanClass: 'sidenote', reporting: { enabled: true } });
    expect(merged).toEqual({
      formatPatterns: ['pdf', 'html'],
      spanClass: 'sidenote',
      logging: { verbose: false },
      reporting: { enabled: true, reportsDir: 'reports' },
    });
    expect(USER_OPTIONS.spanClass).toBe('footnote');
  });
});

describe('parseUserOptionsYaml', () => {
  it('reads overrides from YAML', () => {
    const source = ['formatPatterns:', '  - html', 'logging:', '  verbose: true'].join('\n');
    expect(parseUserOptionsYaml(source, 'options.yaml')).toEqual({
      formatPatterns: ['html'],
      logging: { verbose: true },
    });
  });

  it('treats an empty file as no overrides', () => {
    expect(parseUserOptionsYaml('', 'options.yaml')).toEqual({});
  });

  it('rejects unknown keys', () => {
    expect(() => parseUserOptionsYaml('spanClas: typo', 'options.yaml')).toThrow(ConfigError);
  });

  it('rejects an empty pattern list', () => {
    expect(() => parseUserOptionsYaml('formatPatterns: []', 'options.yaml')).toThrow(
      /Invalid options in options.yaml: formatPatterns:/
    );
  });

  it('reports YAML syntax errors as ConfigError', () => {
    expect(() => parseUserOptionsYaml('formatPatterns: [html', 'options.yaml')).toThrow(ConfigError);
  });
});

describe('loadUserOptions', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'footnote-styler-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns a copy of the defaults with an empty environment', () => {
    const options = loadUserOptions({});
    expect(options).toEqual(USER_OPTIONS);
    expect(options).not.toBe(USER_OPTIONS);
  });

  it('applies the YAML file named by FOOTNOTE_STYLER_CONFIG', () => {
    const configPath = path.join(tempDir, 'footnote-styler.yaml');
    fs.writeFileSync(configPath, 'spanClass: note-body\nreporting:\n  reportsDir: out\n');
    const options = loadUserOptions({ FOOTNOTE_STYLER_CONFIG: configPath });
    expect(options.spanClass).toBe('note-body');
    expect(options.reporting).toEqual({ enabled: false, reportsDir: 'out' });
  });

  it('lets FOOTNOTE_STYLER_VERBOSE switch on verbose logging', () => {
    expect(loadUserOptions({ FOOTNOTE_STYLER_VERBOSE: 'true' }).logging.verbose).toBe(true);
    expect(loadUserOptions({ FOOTNOTE_STYLER_VERBOSE: '0' }).logging.verbose).toBe(false);
  });

  it('throws ConfigError when the options file is missing', () => {
    expect(() => loadUserOptions({ FOOTNOTE_STYLER_CONFIG: path.join(tempDir, 'missing.yaml') })).toThrow(
      ConfigError
    );
  });
});
