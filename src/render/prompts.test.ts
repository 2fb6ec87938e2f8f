import { describe, it, expect } from 'vitest';
import { DEFAULT_FIELDS } from '../profile/fields.js';
import { ProfileStore } from '../profile/store.js';
import { experienceTier, renderGeneratorPrompts } from './prompts.js';

function snapshotOf(answers: Record<string, string>) {
  const store = new ProfileStore({ fields: DEFAULT_FIELDS });
  for (const [field, value] of Object.entries(answers)) {
    store.merge(field, value);
  }
  return store.snapshot();
}

describe('experienceTier', () => {
  it('uses the matched choice', () => {
    expect(experienceTier(snapshotOf({ experience_level: 'advanced' }))).toBe('advanced');
    expect(experienceTier(snapshotOf({ experience_level: '1' }))).toBe('beginner');
  });

  it('classifies free text', () => {
    expect(experienceTier(snapshotOf({ experience_level: 'senior engineer, 10 years' }))).toBe(
      'advanced'
    );
    expect(experienceTier(snapshotOf({ experience_level: '1 year' }))).toBe('beginner');
  });

  it('defaults to intermediate', () => {
    expect(experienceTier(snapshotOf({}))).toBe('intermediate');
  });
});

describe('renderGeneratorPrompts', () => {
  it('lists answers and default assumptions', () => {
    const prompts = renderGeneratorPrompts(
      snapshotOf({ primary_languages: 'TypeScript, Go', experience_level: 'beginner' }),
      DEFAULT_FIELDS
    );

    expect(prompts.tier).toBe('beginner');
    expect(prompts.system.startsWith('You write personalized coding assistant prompts for BEGINNER')).toBe(true);
    expect(prompts.user.startsWith('Create coding rules assuming industry standards for TypeScript, Go:\n\n')).toBe(true);
    expect(prompts.user).toContain('Primary Languages: TypeScript, Go\nExperience Level: beginner\n');
    expect(prompts.user).toContain(
      'Testing Approach: not specified (assume: Unit tests with the standard framework of each language for new behavior)'
    );
    expect(prompts.user).toContain('- Simple, beginner-appropriate tools');
  });

  it('falls back to a generic language phrase', () => {
    const prompts = renderGeneratorPrompts(snapshotOf({}), DEFAULT_FIELDS);

    expect(prompts.user.startsWith('Create coding rules assuming industry standards for their languages:')).toBe(true);
  });
});
