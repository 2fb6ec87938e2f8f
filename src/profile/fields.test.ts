import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  coerceAnswer,
  describeAnswer,
  formatAnswer,
  humanizeFieldName,
  isEmptyAnswer,
  DEFAULT_FIELDS,
} from './fields.js';

const LEVELS = { kind: 'enum', choices: ['beginner', 'intermediate', 'advanced'] } as const;

describe('coerceAnswer', () => {
  it('trims text answers', () => {
    expect(coerceAnswer({ kind: 'text' }, '  building a CLI  ')).toEqual({
      kind: 'text',
      text: 'building a CLI',
    });
  });

  it('splits list answers on commas, semicolons, ampersands and "and"', () => {
    expect(coerceAnswer({ kind: 'list' }, 'TypeScript, Go and Rust')).toEqual({
      kind: 'list',
      items: ['TypeScript', 'Go', 'Rust'],
    });
    expect(coerceAnswer({ kind: 'list' }, 'git; docker & make')).toEqual({
      kind: 'list',
      items: ['git', 'docker', 'make'],
    });
  });

  it('does not split words that merely contain "and"', () => {
    expect(coerceAnswer({ kind: 'list' }, 'Pandas')).toEqual({ kind: 'list', items: ['Pandas'] });
  });

  it('keeps an empty list answer as raw', () => {
    expect(coerceAnswer({ kind: 'list' }, ' , ')).toEqual({ kind: 'raw', text: ',' });
  });

  it('matches enum choices case-insensitively', () => {
    expect(coerceAnswer(LEVELS, 'Advanced')).toEqual({
      kind: 'choice',
      choice: 'advanced',
      raw: 'Advanced',
    });
  });

  it('matches enum choices by 1-based index', () => {
    expect(coerceAnswer(LEVELS, '2')).toEqual({ kind: 'choice', choice: 'intermediate', raw: '2' });
    expect(coerceAnswer(LEVELS, '7')).toEqual({ kind: 'raw', text: '7' });
  });

  it('matches a single mentioned choice', () => {
    expect(coerceAnswer(LEVELS, 'I am a beginner with Python')).toEqual({
      kind: 'choice',
      choice: 'beginner',
      raw: 'I am a beginner with Python',
    });
  });

  it('keeps ambiguous or unknown enum answers as raw', () => {
    expect(coerceAnswer(LEVELS, 'beginner or intermediate')).toEqual({
      kind: 'raw',
      text: 'beginner or intermediate',
    });
    expect(coerceAnswer(LEVELS, '10 years of Java')).toEqual({
      kind: 'raw',
      text: '10 years of Java',
    });
    expect(coerceAnswer(LEVELS, '')).toEqual({ kind: 'raw', text: '' });
  });

  it('never throws for any shape and input', () => {
    const shapes = [{ kind: 'text' } as const, { kind: 'list' } as const, LEVELS];
    fc.assert(
      fc.property(fc.constantFrom(...shapes), fc.string(), (shape, input) => {
        const value = coerceAnswer(shape, input);
        return ['text', 'list', 'choice', 'raw'].includes(value.kind);
      })
    );
  });
});

describe('answer helpers', () => {
  it('detects empty answers', () => {
    expect(isEmptyAnswer({ kind: 'text', text: '   ' })).toBe(true);
    expect(isEmptyAnswer({ kind: 'list', items: [] })).toBe(true);
    expect(isEmptyAnswer({ kind: 'raw', text: 'x' })).toBe(false);
  });

  it('formats list answers joined by commas', () => {
    expect(formatAnswer({ kind: 'list', items: ['a', 'b'] })).toBe('a, b');
  });

  it('describes choice answers with the original text when it differs', () => {
    expect(describeAnswer({ kind: 'choice', choice: 'beginner', raw: 'a beginner' })).toBe(
      'beginner (a beginner)'
    );
    expect(describeAnswer({ kind: 'choice', choice: 'advanced', raw: 'Advanced' })).toBe(
      'advanced'
    );
  });

  it('humanizes field names', () => {
    expect(humanizeFieldName('primary_languages')).toBe('primary languages');
  });
});

describe('DEFAULT_FIELDS', () => {
  it('declares three required fields first', () => {
    expect(DEFAULT_FIELDS.filter((f) => f.required).map((f) => f.name)).toEqual([
      'intended_use',
      'primary_languages',
      'experience_level',
    ]);
  });

  it('has unique names and a default assumption for every field', () => {
    const names = DEFAULT_FIELDS.map((f) => f.name);
    expect(new Set(names).size).toBe(names.length);
    expect(DEFAULT_FIELDS.every((f) => f.defaultAssumption.length > 0)).toBe(true);
  });
});
