/**
 * Prompts for adaptive question selection.
 *
 * @packageDocumentation
 */

import { renderTemplate } from '../catalog/prerequisites.js';
import { humanizeFieldName, type FieldName } from '../profile/fields.js';
import type { ProjectContext } from '../project-context/analyzer.js';
import type { SelectionRequest } from './types.js';

/**
 * System and user prompt pair sent to the planner model.
 */
export interface PlannerPrompts {
  readonly system: string;
  readonly user: string;
}

const INTERVIEWER_ROLE = `You are an experienced technical interviewer having a natural conversation with a developer to understand their coding practices and preferences. The goal is a personalized coding assistant prompt for them.

You pick up on context clues from previous answers, adapt your tone to their experience level, and focus on what matters most to their situation. Make them feel understood, not interrogated.`;

const SELECTION_GUIDANCE = `Consider their context:
- If they seem junior or learning, ask supportive questions about their learning journey.
- If they are time-constrained, focus on practical choices.
- If they are experienced, dive into nuanced preferences and team dynamics.

Choose the most relevant next question from the candidate list, based on what they already shared and what would give the most insight into their daily coding life.`;

const RESPONSE_FORMAT = `Respond with a single JSON object and nothing else:
{"question_id": "<one of the candidate ids>", "question": "<the question, phrased naturally for this developer>"}`;

/**
 * Fields targeted by the candidates that are still unanswered, in candidate
 * order.
 */
export function openFields(request: SelectionRequest): FieldName[] {
  const open = new Set<FieldName>();
  for (const question of request.candidates) {
    for (const field of question.fields) {
      if (!request.snapshot.isAnswered(field)) {
        open.add(field);
      }
    }
  }
  return [...open];
}

function projectSection(context: ProjectContext): string {
  const lines = [
    'The developer is working in their project directory. Detected:',
    `- Languages: ${context.languages.join(', ')}`,
  ];
  if (context.frameworks.length > 0) {
    lines.push(`- Frameworks: ${context.frameworks.join(', ')}`);
  }
  if (context.hasTests) {
    lines.push('- Has a test directory');
  }
  if (context.hasDocker) {
    lines.push('- Uses Docker');
  }
  if (context.hasGit) {
    lines.push('- Uses Git');
  }
  if (context.ideConfig.length > 0) {
    lines.push(`- IDE setup: ${context.ideConfig.join(', ')}`);
  }
  if (context.lintingTools.length > 0) {
    lines.push(`- Linting tools: ${context.lintingTools.join(', ')}`);
  }
  lines.push('', 'Use this to ask about their actual setup and choices.');
  return lines.join('\n');
}

/**
 * Renders the planner prompts for a selection request.
 *
 * The project section is only included when languages were detected.
 */
export function renderPlannerPrompts(
  request: SelectionRequest,
  projectContext?: ProjectContext
): PlannerPrompts {
  const missing = openFields(request).map(humanizeFieldName).join(', ');

  const systemParts = [INTERVIEWER_ROLE];
  if (projectContext !== undefined && projectContext.languages.length > 0) {
    systemParts.push(projectSection(projectContext));
  }
  systemParts.push(SELECTION_GUIDANCE, `Fields still to cover: ${missing}`, RESPONSE_FORMAT);

  const answered = request.snapshot.answeredFields();
  const learned =
    answered.length === 0
      ? 'This is the start of our conversation.'
      : [
          "What I've learned about them:",
          ...answered.map(
            (field) => `- ${humanizeFieldName(field)}: ${request.snapshot.display(field)}`
          ),
        ].join('\n');

  const candidates = request.candidates.map(
    (question) =>
      `- ${question.id} [${question.fields.join(', ')}]: ${renderTemplate(question.prompt, request.snapshot)}`
  );

  const user = [
    learned,
    `Still need to understand: ${missing}`,
    ['Candidate questions:', ...candidates].join('\n'),
    'Which candidate is the most natural next question? Make it feel like a conversation between two developers, not a survey.',
  ].join('\n\n');

  return { system: systemParts.join('\n\n'), user };
}
