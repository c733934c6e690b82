import type { Docstring } from '../model/types.js';

const PARAM_TAG_PATTERN = /^@param\s+(?:\{[^}]*\}\s+)?([A-Za-z_$][\w$]*)\s*(?:-\s*)?(.*)$/;

/**
 * Parse a `/** ... *\/` block into a summary line and `@param` sections.
 *
 * Only the first non-empty line before any tag counts as the summary.
 * Continuation lines after a `@param` tag are folded into its description.
 */
export function parseDocComment(comment: string | null): Docstring {
  if (!comment) {
    return { summary: '', argSections: {} };
  }

  const lines = comment
    .replace(/^\/\*\*/, '')
    .replace(/\*\/$/, '')
    .split('\n')
    .map((line) => line.trim().replace(/^\*\s?/, '').trim());

  let summary = '';
  let seenTag = false;
  let currentParam: string | null = null;
  const argSections: Record<string, string> = {};

  for (const line of lines) {
    if (line.startsWith('@')) {
      seenTag = true;
      const match = PARAM_TAG_PATTERN.exec(line);
      if (match?.[1]) {
        currentParam = match[1];
        argSections[currentParam] = (match[2] ?? '').trim();
      } else {
        currentParam = null;
      }
      continue;
    }

    if (line === '') {
      currentParam = null;
      continue;
    }

    if (currentParam !== null) {
      const previous = argSections[currentParam] ?? '';
      argSections[currentParam] = previous ? `${previous} ${line}` : line;
    } else if (!seenTag && summary === '') {
      summary = line;
    }
  }

  return { summary, argSections };
}
