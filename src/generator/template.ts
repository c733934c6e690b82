import {
  BACKEND_PROPERTY,
  CONTEXT_PARAMETER,
  CONTEXT_TYPE,
  ERROR_PREFIX,
  HANDLERS_PROPERTY,
  INITIALIZATION_FAILED_MESSAGE,
  MARKER_FUNCTION,
  NOT_INITIALIZED_MESSAGE,
  RUNTIME_MODULE,
} from '../model/conventions.js';
import { describeDomain, inferDomain } from '../model/domain.js';
import type { Delegation } from '../model/types.js';
import { SpecError } from '../utils/errors.js';
import { parseToolSpec, type ParameterSpec, type ToolSpec } from './schema.js';
import { documentedDescription, literal, quote, tsType } from './template-parts.js';

/**
 * Template Generator
 *
 * Emits tool source that the extractor reads back as a fully conforming
 * definition. Output depends only on the spec: parameters keep their order
 * and nothing time- or environment-dependent is written.
 */

const INDENT = '  ';

export const IMPORT_LINE = `import { ${MARKER_FUNCTION}, resultText, type ${CONTEXT_TYPE} } from '${RUNTIME_MODULE}';`;

const CATCH_RETURN = 'return `' + ERROR_PREFIX + '${error instanceof Error ? error.message : String(error)}`;';

function delegationOf(spec: ToolSpec): Delegation {
  const method = spec.delegationMethod ?? spec.name;
  if (spec.mode === 'direct') {
    return { kind: 'direct', method };
  }
  if (!spec.delegationTarget) {
    throw new SpecError(['delegationTarget: Delegated tools need a delegationTarget (or use mode "direct")']);
  }
  return { kind: 'delegated', target: spec.delegationTarget, method };
}

function signatureOf(parameter: ParameterSpec): string {
  const type = tsType(parameter.type, parameter.default === null);
  if (parameter.default !== undefined) {
    return `${parameter.name}: ${type} = ${literal(parameter.default)}`;
  }
  return parameter.optional ? `${parameter.name}?: ${type}` : `${parameter.name}: ${type}`;
}

function docCommentOf(spec: ToolSpec): string[] {
  const lines = ['/**', ` * ${spec.description}`];
  if (spec.parameters.length > 0) {
    lines.push(' *');
    for (const parameter of spec.parameters) {
      lines.push(` * @param ${parameter.name} - ${documentedDescription(parameter)}`);
    }
  }
  lines.push(' */');
  return lines;
}

function guardOf(parameter: ParameterSpec): string[] {
  const domain = inferDomain(parameter.type, documentedDescription(parameter));
  if (!domain) {
    return [];
  }

  const { name } = parameter;
  let condition: string;
  let message: string;

  if (domain.kind === 'range') {
    const bounds = `${name} < ${String(domain.min)} || ${name} > ${String(domain.max)}`;
    if (parameter.type === 'integer') {
      condition = `!Number.isInteger(${name}) || ${bounds}`;
      message = `${ERROR_PREFIX}${name} must be an integer ${describeDomain(domain)}`;
    } else {
      condition = bounds;
      message = `${ERROR_PREFIX}${name} must be ${describeDomain(domain)}`;
    }
  } else {
    condition = `![${domain.choices.map(quote).join(', ')}].includes(${name})`;
    message = `${ERROR_PREFIX}${name} must be ${describeDomain(domain)}`;
  }

  if (parameter.default === null) {
    condition = `${name} !== null && (${condition})`;
  } else if (parameter.optional && parameter.default === undefined) {
    condition = `${name} !== undefined && (${condition})`;
  }

  return [`${INDENT}if (${condition}) {`, `${INDENT}${INDENT}return ${quote(message)};`, `${INDENT}}`];
}

function delegationBlock(spec: ToolSpec, delegation: Delegation): string[] {
  const pad = INDENT.repeat(2);
  const args = spec.parameters.map((parameter) => parameter.name).join(', ');
  const fallback = `${spec.description.replace(/\.$/, '')} completed`;

  const [handle, unavailable, call] =
    delegation.kind === 'direct'
      ? [
          `${CONTEXT_PARAMETER}.${BACKEND_PROPERTY}`,
          INITIALIZATION_FAILED_MESSAGE,
          `${CONTEXT_PARAMETER}.${BACKEND_PROPERTY}.${delegation.method}(${args})`,
        ]
      : [
          `${CONTEXT_PARAMETER}.${HANDLERS_PROPERTY}`,
          NOT_INITIALIZED_MESSAGE,
          `${CONTEXT_PARAMETER}.${HANDLERS_PROPERTY}.${delegation.target}.${delegation.method}(${args})`,
        ];

  return [
    `${INDENT}try {`,
    `${pad}if (!${handle}) {`,
    `${pad}${INDENT}return ${quote(unavailable)};`,
    `${pad}}`,
    `${pad}const result = await ${call};`,
    `${pad}return resultText(result, ${quote(fallback)});`,
    `${INDENT}} catch (error) {`,
    `${pad}${CATCH_RETURN}`,
    `${INDENT}}`,
  ];
}

/**
 * Render one validated spec, without the import line
 */
export function renderTool(spec: ToolSpec): string {
  const delegation = delegationOf(spec);
  const parameters = [`${CONTEXT_PARAMETER}: ${CONTEXT_TYPE}`, ...spec.parameters.map(signatureOf)].join(', ');
  const guards = spec.parameters.flatMap(guardOf);

  const lines = [
    ...docCommentOf(spec),
    `export const ${spec.name} = ${MARKER_FUNCTION}(${quote(spec.name)}, async (${parameters}): Promise<string> => {`,
    ...(guards.length > 0 ? [...guards, ''] : []),
    ...delegationBlock(spec, delegation),
    '});',
  ];

  return lines.join('\n');
}

/**
 * Generate a catalog module holding one tool
 *
 * @throws SpecError when the spec is invalid
 */
export function generateTool(input: unknown): string {
  const spec = parseToolSpec(input);
  return `${IMPORT_LINE}\n\n${renderTool(spec)}\n`;
}

/**
 * Generate a catalog module holding several tools, in the given order
 *
 * @throws SpecError listing the issues of every invalid spec
 */
export function generateCatalog(inputs: readonly unknown[]): string {
  const issues: string[] = [];
  const specs: ToolSpec[] = [];

  inputs.forEach((input, index) => {
    try {
      specs.push(parseToolSpec(input));
    } catch (error) {
      if (!(error instanceof SpecError)) {
        throw error;
      }
      issues.push(...error.issues.map((issue) => `[${String(index)}] ${issue}`));
    }
  });

  const names = new Set<string>();
  for (const spec of specs) {
    if (names.has(spec.name)) {
      issues.push(`Duplicate tool name "${spec.name}"`);
    }
    names.add(spec.name);
  }

  if (issues.length > 0) {
    throw new SpecError(issues);
  }

  return `${IMPORT_LINE}\n\n${specs.map(renderTool).join('\n\n')}\n`;
}
