import type { ParameterInfo, ToolDefinition } from './types.js';

/**
 * Restricted parameter domains read from parameter descriptions.
 *
 * Both the generator (to emit guards) and the validator (to demand them) go
 * through `inferDomain`, so they agree on which parameters are restricted.
 * Reading ranges out of prose is a heuristic: it finds the common phrasings
 * ("60-200", "4 to 64", "between 0 and 1", "(audio, midi, return)",
 * "one of: a, b") and nothing more.
 */

export type ParameterKind = 'string' | 'number' | 'integer' | 'boolean';

/**
 * Kinds a TypeScript annotation can express; integers are declared as `number`
 */
export type DeclaredKind = Exclude<ParameterKind, 'integer'>;

export type ParameterDomain =
  | { readonly kind: 'range'; readonly min: number; readonly max: number }
  | { readonly kind: 'choice'; readonly choices: readonly string[] };

const NUMBER = String.raw`-?\d+(?:\.\d+)?`;
const BETWEEN_PATTERN = new RegExp(String.raw`\bbetween\s+(${NUMBER})\s+and\s+(${NUMBER})`, 'i');
const SPAN_PATTERN = new RegExp(String.raw`(${NUMBER})\s*(?:-|–|\bto\b)\s*(${NUMBER})`, 'i');
const PARENTHESIZED_PATTERN = /\(([^()]*)\)/g;
const ONE_OF_PATTERN = /\bone of:?\s+([^.;()]+)/i;
const CHOICE_TOKEN_PATTERN = /^[A-Za-z0-9_#+-]+$/;
const NON_CHOICE_LEADS = ['e.g', 'i.e', 'default', 'optional', 'see'];

/**
 * Map a type annotation to a parameter kind, ignoring `| null` and `| undefined`
 */
export function kindOfDeclaredType(declaredType: string | null): DeclaredKind | null {
  if (declaredType === null) {
    return null;
  }

  const members = declaredType
    .split('|')
    .map((member) => member.trim())
    .filter((member) => member !== 'null' && member !== 'undefined');

  if (members.length !== 1) {
    return null;
  }

  switch (members[0]) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return null;
  }
}

function parseRange(description: string): ParameterDomain | null {
  const match = BETWEEN_PATTERN.exec(description) ?? SPAN_PATTERN.exec(description);
  if (!match?.[1] || !match[2]) {
    return null;
  }

  const min = Number(match[1]);
  const max = Number(match[2]);
  if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
    return null;
  }

  return { kind: 'range', min, max };
}

function splitChoices(list: string): string[] | null {
  const tokens = list
    .split(/,|\/|\bor\b/)
    .map((token) => token.trim().replace(/^['"`]|['"`]$/g, ''))
    .filter((token) => token.length > 0);

  if (tokens.length < 2 || !tokens.every((token) => CHOICE_TOKEN_PATTERN.test(token))) {
    return null;
  }

  return [...new Set(tokens)];
}

function parseChoices(description: string): ParameterDomain | null {
  for (const match of description.matchAll(PARENTHESIZED_PATTERN)) {
    const inner = (match[1] ?? '').trim();
    const lead = inner.toLowerCase();
    if (NON_CHOICE_LEADS.some((prefix) => lead.startsWith(prefix))) {
      continue;
    }
    const choices = splitChoices(inner);
    if (choices) {
      return { kind: 'choice', choices };
    }
  }

  const oneOf = ONE_OF_PATTERN.exec(description);
  if (oneOf?.[1]) {
    const choices = splitChoices(oneOf[1]);
    if (choices) {
      return { kind: 'choice', choices };
    }
  }

  return null;
}

/**
 * Read the restricted domain of a parameter from its description.
 * Ranges apply to numeric kinds, choice sets to strings.
 */
export function inferDomain(kind: ParameterKind | null, description: string | undefined): ParameterDomain | null {
  if (!description) {
    return null;
  }

  if (kind === 'number' || kind === 'integer') {
    return parseRange(description);
  }

  if (kind === 'string') {
    return parseChoices(description);
  }

  return null;
}

/**
 * Domain of an extracted parameter, read from its doc comment entry
 */
export function parameterDomain(definition: ToolDefinition, parameter: ParameterInfo): ParameterDomain | null {
  return inferDomain(kindOfDeclaredType(parameter.declaredType), definition.docstring.argSections[parameter.name]);
}

/**
 * Parameters of a tool that have a restricted domain, in declaration order
 */
export function restrictedParameters(
  definition: ToolDefinition
): { parameter: ParameterInfo; domain: ParameterDomain }[] {
  const restricted: { parameter: ParameterInfo; domain: ParameterDomain }[] = [];
  for (const parameter of definition.parameters) {
    const domain = parameterDomain(definition, parameter);
    if (domain) {
      restricted.push({ parameter, domain });
    }
  }
  return restricted;
}

/**
 * Human-readable form of a domain, used in guard messages
 */
export function describeDomain(domain: ParameterDomain): string {
  return domain.kind === 'range'
    ? `between ${String(domain.min)} and ${String(domain.max)}`
    : `one of: ${domain.choices.join(', ')}`;
}

/**
 * A value inside the domain (first choice, lower bound)
 */
export function sampleInDomain(domain: ParameterDomain): string | number {
  return domain.kind === 'range' ? domain.min : (domain.choices[0] ?? '');
}

/**
 * A value outside the domain
 */
export function sampleOutsideDomain(domain: ParameterDomain, parameterName: string): string | number {
  return domain.kind === 'range' ? Math.floor(domain.max) + 1 : `invalid_${parameterName}`;
}

/**
 * Check a value against a domain
 */
export function isInDomain(domain: ParameterDomain, value: unknown): boolean {
  if (domain.kind === 'range') {
    return typeof value === 'number' && value >= domain.min && value <= domain.max;
  }
  return typeof value === 'string' && domain.choices.includes(value);
}
