import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigParseError, buildConfig, getDefaultConfig, parseConfig } from './parser.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { loadConfig } from './index.js';

describe('parseConfig', () => {
  it('returns defaults for empty content', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
    expect(getDefaultConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges each section over its defaults', () => {
    const config = parseConfig(`
[interview]
max_questions = 5
adaptive_stopping = true

[output]
vendor = "aider"

[cli]
colors = false
`);

    expect(config.interview).toEqual({
      max_questions: 5,
      adaptive_timeout_ms: 20000,
      adaptive_stopping: true,
      offline: false,
    });
    expect(config.output).toEqual({ vendor: 'aider', directory: '.' });
    expect(config.cli).toEqual({ colors: false, welcome: true });
    expect(config.models).toEqual(DEFAULT_CONFIG.models);
  });

  it('does not share objects with the defaults', () => {
    const config = parseConfig('');
    config.interview.max_questions = 99;
    expect(DEFAULT_CONFIG.interview.max_questions).toBe(8);
  });

  it('rejects invalid TOML syntax', () => {
    expect(() => parseConfig('[interview\nmax_questions = ')).toThrow(/Invalid TOML syntax/);
  });

  it('rejects wrong value types with the field path', () => {
    expect(() => parseConfig('[models]\nplanner_model = 3')).toThrow(
      "Invalid type for 'models.planner_model': expected string, got number"
    );
    expect(() => parseConfig('[cli]\nwelcome = "yes"')).toThrow(
      "Invalid type for 'cli.welcome': expected boolean, got string"
    );
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig('interview = 3')).toThrow(
      "Invalid type for 'interview': expected table, got number"
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => parseConfig('[interview]\nmax_questions = 0')).toThrow(ConfigParseError);
    expect(() => parseConfig('[interview]\nmax_questions = 2.5')).toThrow(
      "Invalid value for 'interview.max_questions': must be a positive integer, got 2.5"
    );
    expect(() => parseConfig('[retry]\nbase_delay_ms = -1')).toThrow(ConfigParseError);
    expect(() => parseConfig('[output]\ndirectory = " "')).toThrow(
      "Invalid value for 'output.directory': must not be empty"
    );
  });
});

describe('buildConfig', () => {
  it('merges over a given base', () => {
    const base = parseConfig('[claude]\nexecutable = "/opt/claude"');
    const config = buildConfig({ claude: { timeout_ms: 1000 } }, base);

    expect(config.claude).toEqual({ executable: '/opt/claude', timeout_ms: 1000 });
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'devprompt-config-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads an explicit file and applies env overrides on top', async () => {
    const file = join(tempDir, 'custom.toml');
    await writeFile(file, '[interview]\nmax_questions = 4\noffline = false\n', 'utf-8');

    const config = await loadConfig({ path: file, env: { DEVPROMPT_OFFLINE: 'true' } });

    expect(config.interview.max_questions).toBe(4);
    expect(config.interview.offline).toBe(true);
  });

  it('fails when an explicit file is missing', async () => {
    await expect(
      loadConfig({ path: join(tempDir, 'missing.toml'), env: {} })
    ).rejects.toBeInstanceOf(ConfigParseError);
  });
});
