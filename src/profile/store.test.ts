import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { DEFAULT_FIELDS } from './fields.js';
import { ProfileStore } from './store.js';

function createStore(priorityOrder?: readonly string[]): ProfileStore {
  return new ProfileStore(
    priorityOrder !== undefined ? { fields: DEFAULT_FIELDS, priorityOrder } : { fields: DEFAULT_FIELDS }
  );
}

describe('ProfileStore', () => {
  describe('merge', () => {
    it('coerces strings through the field shape', () => {
      const store = createStore();

      expect(store.merge('primary_languages', 'TypeScript, Go')).toEqual({
        kind: 'list',
        items: ['TypeScript', 'Go'],
      });
      expect(store.merge('experience_level', 'advanced')).toEqual({
        kind: 'choice',
        choice: 'advanced',
        raw: 'advanced',
      });
    });

    it('stores unknown fields as raw text', () => {
      const store = createStore();
      expect(store.merge('favourite_editor', ' vim ')).toEqual({ kind: 'raw', text: 'vim' });
      expect(store.isAnswered('favourite_editor')).toBe(true);
    });

    it('overwrites a field and moves it to the end of the order', () => {
      const store = createStore();
      store.merge('intended_use', 'web apps');
      store.merge('primary_languages', 'Python');
      store.merge('intended_use', 'data pipelines');

      expect(store.get('intended_use')).toEqual({ kind: 'text', text: 'data pipelines' });
      expect(store.answeredFields()).toEqual(['primary_languages', 'intended_use']);
      expect(store.size).toBe(2);
    });

    it('leaves every other field unchanged', () => {
      fc.assert(
        fc.property(
          fc.constantFrom(...DEFAULT_FIELDS.map((f) => f.name)),
          fc.string(),
          (field, answer) => {
            const store = createStore();
            store.merge('intended_use', 'web apps');
            store.merge('coding_style', 'functional');
            const before = store.snapshot();

            store.merge(field, answer);

            return DEFAULT_FIELDS.filter((f) => f.name !== field).every(
              (f) => JSON.stringify(store.get(f.name)) === JSON.stringify(before.get(f.name))
            );
          }
        )
      );
    });
  });

  describe('required completeness', () => {
    it('is incomplete until all required fields have non-empty answers', () => {
      const store = createStore();
      store.merge('intended_use', 'web apps');
      store.merge('primary_languages', 'TypeScript');
      expect(store.isRequiredComplete()).toBe(false);

      store.merge('experience_level', '   ');
      expect(store.isRequiredComplete()).toBe(false);
      expect(store.unansweredRequiredFields()).toEqual(['experience_level']);

      store.merge('experience_level', 'beginner');
      expect(store.isRequiredComplete()).toBe(true);
      expect(store.unansweredRequiredFields()).toEqual([]);
    });

    it('orders unanswered required fields by the given priority order', () => {
      const store = createStore(['experience_level', 'coding_style', 'intended_use']);

      expect(store.unansweredRequiredFields()).toEqual([
        'experience_level',
        'intended_use',
        'primary_languages',
      ]);
    });

    it('ignores unknown names in the priority order', () => {
      const store = createStore(['nonexistent', 'primary_languages']);

      expect(store.unansweredRequiredFields()).toEqual([
        'primary_languages',
        'intended_use',
        'experience_level',
      ]);
    });
  });

  describe('snapshot', () => {
    it('is frozen and unaffected by later merges', () => {
      const store = createStore();
      store.merge('intended_use', 'web apps');
      const snapshot = store.snapshot();

      store.merge('intended_use', 'games');
      store.merge('coding_style', 'OOP');

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.order)).toBe(true);
      expect(snapshot.display('intended_use')).toBe('web apps');
      expect(snapshot.isAnswered('coding_style')).toBe(false);
      expect(snapshot.partial).toBe(false);
    });

    it('is unaffected by mutating the merged value', () => {
      const store = createStore();
      const items = ['Go'];
      store.merge('primary_languages', { kind: 'list', items });
      const snapshot = store.snapshot();

      items.push('Rust');

      expect(snapshot.display('primary_languages')).toBe('Go');
      expect(store.get('primary_languages')).toEqual({ kind: 'list', items: ['Go'] });
      expect(Object.isFrozen(snapshot.get('primary_languages'))).toBe(true);
    });

    it('exposes entries as a copy', () => {
      const store = createStore();
      store.merge('coding_style', '');
      store.merge('intended_use', 'web apps');
      const snapshot = store.snapshot();

      const entries = snapshot.entries();
      entries.push(['primary_languages', { kind: 'text', text: 'Go' }]);

      expect(snapshot.entries()).toEqual([
        ['coding_style', { kind: 'text', text: '' }],
        ['intended_use', { kind: 'text', text: 'web apps' }],
      ]);
      expect(snapshot.isAnswered('primary_languages')).toBe(false);
    });

    it('carries the partial flag', () => {
      expect(createStore().snapshot({ partial: true }).partial).toBe(true);
    });

    it('converts answered fields to display strings in answer order', () => {
      const store = createStore();
      store.merge('primary_languages', 'Go and Rust');
      store.merge('intended_use', 'infrastructure');
      store.merge('coding_style', '');

      const record = store.snapshot().toRecord();

      expect(record).toEqual({ primary_languages: 'Go, Rust', intended_use: 'infrastructure' });
      expect(Object.keys(record)).toEqual(['primary_languages', 'intended_use']);
    });

    it('uses the fallback for unanswered fields', () => {
      expect(createStore().snapshot().display('testing_approach', 'n/a')).toBe('n/a');
    });
  });
});
