import { describe, it, expect } from 'vitest';
import {
  VERSION,
  DEFAULT_FIELDS,
  TemplateRenderer,
  createDefaultCatalog,
  createDefaultVendorRegistry,
  renderRulesTemplate,
  renderTemplate,
} from './index.js';

describe('devprompt', () => {
  it('exposes a semver version', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('re-exports the built-in catalog and vendors', () => {
    const catalog = createDefaultCatalog();

    expect(catalog.fields).toEqual(DEFAULT_FIELDS);
    expect(catalog.fallbackOrder(catalog.createStore())[0]?.id).toBe('intended_use');
    expect(createDefaultVendorRegistry().keys()).toEqual(['cursor', 'continue', 'aider']);
  });

  it('keeps the prompt template and the rules template apart', async () => {
    const catalog = createDefaultCatalog();
    const snapshot = catalog.createStore().snapshot();

    expect(renderTemplate('Hello {{intended_use|there}}', snapshot)).toBe('Hello there');
    await expect(new TemplateRenderer(catalog.fields).render(snapshot)).resolves.toBe(
      renderRulesTemplate(snapshot, catalog.fields)
    );
  });
});
