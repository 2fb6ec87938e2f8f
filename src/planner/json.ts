/**
 * Extraction of JSON objects from model responses.
 *
 * @packageDocumentation
 */

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the first balanced `{...}` span starting at the first opening brace.
 * Braces inside string literals are not counted.
 */
function balancedObject(content: string): string | undefined {
  const start = content.indexOf('{');
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < content.length; i++) {
    const char = content.charAt(i);
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return content.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

/**
 * Extracts a JSON object from model output.
 *
 * Tries, in order: the whole text, the first fenced code block, and the
 * first balanced brace span.
 *
 * @returns The parsed object, or undefined when none was found.
 */
export function extractJsonObject(content: string): Record<string, unknown> | undefined {
  const trimmed = content.trim();

  const whole = tryParse(trimmed);
  if (isObject(whole)) {
    return whole;
  }

  const fenced = FENCED_BLOCK.exec(trimmed)?.[1];
  if (fenced !== undefined) {
    const parsed = tryParse(fenced.trim());
    if (isObject(parsed)) {
      return parsed;
    }
  }

  const span = balancedObject(trimmed);
  if (span !== undefined) {
    const parsed = tryParse(span);
    if (isObject(parsed)) {
      return parsed;
    }
  }

  return undefined;
}
