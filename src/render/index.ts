/**
 * Rendering of a finished profile into a rules prompt.
 *
 * @packageDocumentation
 */

export { ModelRenderer } from './model.js';
export type { ModelRendererOptions } from './model.js';
export { experienceTier, renderGeneratorPrompts } from './prompts.js';
export type { GeneratorPrompts } from './prompts.js';
export { TEMPLATE_TITLE, TemplateRenderer, renderRulesTemplate } from './template.js';
export { PARTIAL_PROFILE_NOTICE } from './types.js';
export type { ExperienceTier, Renderer } from './types.js';
