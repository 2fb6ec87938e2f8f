/**
 * Generator prompts, keyed by experience tier.
 *
 * @packageDocumentation
 */

import { classifyExperience } from '../interview/stopping.js';
import type { FieldDefinition } from '../profile/fields.js';
import type { ProfileSnapshot } from '../profile/store.js';
import type { ExperienceTier } from './types.js';

const EXPERIENCE_FIELD = 'experience_level';
const LANGUAGES_FIELD = 'primary_languages';

const INDUSTRY_STANDARDS = `ASSUME industry standards by default:
- Prettier/ESLint for TypeScript/JavaScript
- Black/flake8 for Python
- gofmt/golangci-lint for Go
- Standard directory structures (src/, test/, etc.)
- Common naming conventions for each language

ONLY specify:
- Chosen tools within standard options
- Deviations from language conventions
- Project-specific requirements
- Workflow variations from standard practices

Write practical "house rules" that complement, not replace, industry standards. Respond with the rules only.`;

const TIER_SYSTEM: Record<ExperienceTier, string> = {
  beginner: `You write personalized coding assistant prompts for BEGINNER developers. Create a supportive, learning-focused prompt that won't overwhelm them.

Your task is to:
1. Focus on foundational practices and learning
2. Prioritize essential tools and workflows
3. Include short explanations of why a practice matters
4. Keep recommendations simple and actionable`,
  intermediate: `You write personalized coding assistant prompts. Create a balanced, practical prompt that makes the developer's coding assistant more helpful.

Your task is to:
1. Synthesize what the developer told you
2. Consider their project context and experience level
3. Generate practical, actionable instructions
4. Focus on essential practices and tools`,
  advanced: `You write personalized coding assistant prompts for EXPERIENCED developers. Create a sophisticated prompt that respects their expertise.

Your task is to:
1. Generate advanced, nuanced guidance
2. Focus on architectural decisions and trade-offs
3. Address professional workflow optimizations
4. Respect their experience and judgment`,
};

const TIER_FOCUS: Record<ExperienceTier, readonly string[]> = {
  beginner: [
    'Essential coding practices for their current project',
    'Simple, beginner-appropriate tools',
    'Learning resources and explanations',
    'Basic workflow suggestions',
  ],
  intermediate: [
    'Specific tool choices (e.g. "Use Vitest over Jest", "Use pytest over unittest")',
    'Appropriate testing approach and tools',
    'Team workflow preferences (PR process, commit conventions)',
    'Language-specific guidance for their stack',
  ],
  advanced: [
    'Architectural and design conventions they follow',
    'Code review and team practices',
    'Performance and scaling considerations',
    'Deviations from defaults only where specified',
  ],
};

/**
 * Reads the experience tier from the profile. A matched choice wins; free
 * text goes through the experience classifier. Unknown is intermediate.
 */
export function experienceTier(snapshot: ProfileSnapshot): ExperienceTier {
  const value = snapshot.get(EXPERIENCE_FIELD);
  if (value?.kind === 'choice' && isTier(value.choice)) {
    return value.choice;
  }

  const signals = classifyExperience(snapshot);
  if (signals.beginner) {
    return 'beginner';
  }
  if (signals.advanced) {
    return 'advanced';
  }
  return 'intermediate';
}

function isTier(value: string): value is ExperienceTier {
  return value === 'beginner' || value === 'intermediate' || value === 'advanced';
}

/**
 * System and user prompts for the generator model.
 */
export interface GeneratorPrompts {
  readonly tier: ExperienceTier;
  readonly system: string;
  readonly user: string;
}

export function renderGeneratorPrompts(
  snapshot: ProfileSnapshot,
  fields: readonly FieldDefinition[]
): GeneratorPrompts {
  const tier = experienceTier(snapshot);
  const languages = snapshot.display(LANGUAGES_FIELD, 'their languages');

  const profileLines = fields.map((field) => {
    const value = snapshot.isAnswered(field.name)
      ? snapshot.display(field.name)
      : `not specified (assume: ${field.defaultAssumption})`;
    return `${field.label}: ${value}`;
  });

  const user = [
    `Create coding rules assuming industry standards for ${languages}:`,
    profileLines.join('\n'),
    `Focus on:\n${TIER_FOCUS[tier].map((item) => `- ${item}`).join('\n')}`,
  ].join('\n\n');

  return {
    tier,
    system: `${TIER_SYSTEM[tier]}\n\n${INDUSTRY_STANDARDS}`,
    user,
  };
}
