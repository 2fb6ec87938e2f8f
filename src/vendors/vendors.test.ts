import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { DEFAULT_FIELDS } from '../profile/fields.js';
import { ProfileStore } from '../profile/store.js';
import { AiderAdapter } from './aider.js';
import { ContinueAdapter } from './continue.js';
import { CursorAdapter, formatDate } from './cursor.js';
import { VendorRegistry, createDefaultVendorRegistry, writeVendorOutput } from './registry.js';
import { UnknownVendorError } from './types.js';

const fixedClock = (): Date => new Date('2026-03-04T10:00:00Z');

function snapshotOf(answers: Record<string, string>) {
  const store = new ProfileStore({ fields: DEFAULT_FIELDS });
  for (const [field, value] of Object.entries(answers)) {
    store.merge(field, value);
  }
  return store.snapshot();
}

const full = snapshotOf({
  intended_use: 'web apps',
  primary_languages: 'TypeScript, Go',
  experience_level: 'advanced',
  current_project: 'billing service',
});

describe('CursorAdapter', () => {
  it('writes a comment header before the prompt', () => {
    const text = new CursorAdapter(fixedClock).formatPrompt('Use pnpm.', full);

    expect(text).toBe(
      '# Generated with devprompt\n' +
        '# Profile: advanced TypeScript, Go\n' +
        '# Generated on: 2026-03-04\n' +
        '# Intended use: web apps\n\n' +
        'Use pnpm.'
    );
  });

  it('uses placeholders for missing answers', () => {
    const text = new CursorAdapter(fixedClock).formatPrompt('Rules', snapshotOf({}));

    expect(text.split('\n').slice(0, 4)).toEqual([
      '# Generated with devprompt',
      '# Profile: Developer',
      '# Generated on: 2026-03-04',
      '# Intended use: Coding assistance',
    ]);
  });

  it('formats dates in UTC', () => {
    expect(formatDate(new Date('2026-12-31T23:30:00Z'))).toBe('2026-12-31');
  });
});

describe('ContinueAdapter', () => {
  it('writes a JSON document', () => {
    const prompt = 'Say "hi"\nthen code.';
    const parsed: unknown = JSON.parse(new ContinueAdapter().formatPrompt(prompt, full));

    expect(parsed).toEqual({
      systemMessage: prompt,
      generatedBy: 'devprompt',
      profile: { languages: 'TypeScript, Go', experience: 'advanced', project: 'billing service' },
    });
  });
});

describe('AiderAdapter', () => {
  it('writes YAML settings after a comment header', () => {
    const prompt = 'Line one\nLine two: with a colon';
    const text = new AiderAdapter().formatPrompt(prompt, full);

    expect(text.startsWith('# Generated with devprompt\n# Profile: advanced\n# Languages: TypeScript, Go\n\n')).toBe(true);
    expect(text).toContain('auto-commits: false\ndirty-commits: true\n');
    expect(yaml.load(text)).toEqual({
      'system-message': prompt,
      'auto-commits': false,
      'dirty-commits': true,
    });
  });
});

describe('VendorRegistry', () => {
  const registry = createDefaultVendorRegistry(fixedClock);

  it('lists the built-in vendors', () => {
    expect(registry.available()).toEqual({
      cursor: 'Cursor AI',
      continue: 'Continue',
      aider: 'Aider',
    });
    expect(registry.get('aider').outputFilename).toBe('.aider.conf.yml');
  });

  it('rejects unknown keys with the known ones', () => {
    expect(() => registry.get('copilot')).toThrow(UnknownVendorError);
    expect(() => registry.get('copilot')).toThrow(
      'Unknown vendor: copilot. Available: cursor, continue, aider'
    );
  });

  it('accepts vendors registered after construction', () => {
    const extended = createDefaultVendorRegistry(fixedClock).register({
      key: 'notes',
      vendorName: 'Plain notes',
      outputFilename: 'RULES.md',
      formatPrompt: (prompt) => prompt,
    });

    expect(extended.keys()).toEqual(['cursor', 'continue', 'aider', 'notes']);
    expect(extended.get('notes').outputFilename).toBe('RULES.md');
    expect(() => extended.register(new AiderAdapter())).toThrow('Duplicate vendor key: aider');
  });

  it('rejects duplicate keys', () => {
    expect(() => new VendorRegistry([new AiderAdapter(), new AiderAdapter()])).toThrow(
      'Duplicate vendor key: aider'
    );
  });
});

describe('writeVendorOutput', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(os.tmpdir(), 'devprompt-vendors-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes the formatted file into the output directory', async () => {
    const outputDir = join(tempDir, 'nested');

    const written = await writeVendorOutput(new ContinueAdapter(), 'Rules', full, outputDir);

    expect(written).toBe(join(outputDir, '.continuerules'));
    const content = await readFile(written, 'utf-8');
    expect(content).toBe(new ContinueAdapter().formatPrompt('Rules', full));
  });
});
