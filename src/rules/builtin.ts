import { describeDomain, restrictedParameters } from '../model/domain.js';
import { ERROR_PREFIX, MARKER_FUNCTION, TOOL_NAME_REGEX } from '../model/conventions.js';
import type { Rule } from './types.js';

/**
 * Built-in conformance rules. Each reads only the definition it is given.
 */

const pass = (message: string) => ({ passed: true, message });
const fail = (message: string) => ({ passed: false, message });

export const registrationMarkerRule: Rule = {
  id: 'registration-marker',
  description: `Tool is registered with ${MARKER_FUNCTION}() under its exported name`,
  check: (definition) =>
    definition.hasRegistrationMarker
      ? pass(`Registered with ${MARKER_FUNCTION}('${definition.name}', ...)`)
      : fail(definition.markerIssue ?? `Missing registration marker ${MARKER_FUNCTION}('${definition.name}', ...)`),
};

export const asyncCallableRule: Rule = {
  id: 'async-callable',
  description: 'Tool callable is async',
  check: (definition) =>
    definition.isAsyncCallable
      ? pass('Callable is async')
      : fail('Tool callable must be declared async'),
};

export const textReturnRule: Rule = {
  id: 'text-return',
  description: 'Tool declares a textual return type',
  check: (definition) =>
    definition.returnsPlainText
      ? pass('Returns Promise<string>')
      : fail("Declare the return type as 'Promise<string>'; structured results are not allowed"),
};

export const failureBoundaryRule: Rule = {
  id: 'failure-boundary',
  description: 'Delegation calls are wrapped in try/catch that returns an error string',
  check: (definition) => {
    if (!definition.bodyShape.hasSurroundingFailureBoundary) {
      return fail(
        `Wrap the delegation call in try { ... } catch (error) { return \`${ERROR_PREFIX}\${...}\`; }`
      );
    }
    return definition.delegation
      ? pass('Delegation call is inside a failure boundary')
      : pass('No delegation call to guard');
  },
};

export const initializationGuardRule: Rule = {
  id: 'initialization-guard',
  description: 'Delegation layer availability is checked before first use',
  check: (definition) => {
    if (definition.bodyShape.hasGuardedInitializationCheck) {
      return definition.delegation
        ? pass('Availability check precedes delegation')
        : pass('No delegation layer used');
    }
    const handle = definition.delegation?.kind === 'direct' ? 'backend' : 'handlers';
    const context = definition.contextParameter ?? 'ctx';
    return fail(`Check 'if (!${context}.${handle})' and return an error before delegating`);
  },
};

export const errorPrefixRule: Rule = {
  id: 'error-prefix',
  description: `Error-path returns start with '${ERROR_PREFIX}'`,
  check: (definition) =>
    definition.bodyShape.errorMessagePrefixConsistent
      ? pass(`Error returns start with '${ERROR_PREFIX}'`)
      : fail(`Every guard and catch return must be a string starting with '${ERROR_PREFIX}'`),
};

export const docstringRule: Rule = {
  id: 'docstring',
  description: 'Doc comment has a summary and documents every parameter',
  check: (definition) => {
    const problems: string[] = [];
    if (definition.docstring.summary === '') {
      problems.push('missing summary line');
    }
    const undocumented = definition.parameters
      .map((parameter) => parameter.name)
      .filter((name) => !definition.docstring.argSections[name]);
    if (undocumented.length > 0) {
      problems.push(`undocumented parameters: ${undocumented.join(', ')}`);
    }
    return problems.length === 0
      ? pass('Doc comment is complete')
      : fail(`Doc comment incomplete (${problems.join('; ')}); add '@param name - description' entries`);
  },
};

export const parameterGuardsRule: Rule = {
  id: 'parameter-guards',
  description: 'Restricted-domain parameters are validated before delegation',
  check: (definition) => {
    const unguarded = restrictedParameters(definition).filter(
      ({ parameter }) => !definition.parameterValidationGuards.includes(parameter.name)
    );
    if (unguarded.length === 0) {
      return pass('Restricted parameters are guarded');
    }
    const details = unguarded.map(({ parameter, domain }) => `${parameter.name} (${describeDomain(domain)})`);
    return fail(`Add validation guards before delegation for: ${details.join(', ')}`);
  },
};

export const parameterTypesRule: Rule = {
  id: 'parameter-types',
  description: 'Every parameter has a type annotation',
  check: (definition) => {
    const untyped = definition.parameters
      .filter((parameter) => parameter.declaredType === null)
      .map((parameter) => parameter.name);
    return untyped.length === 0
      ? pass('Parameters are typed')
      : fail(`Add type annotations to: ${untyped.join(', ')}`);
  },
};

export const toolNameRule: Rule = {
  id: 'tool-name',
  description: 'Tool name is lowercase snake_case, 3-50 characters',
  check: (definition) =>
    TOOL_NAME_REGEX.test(definition.name)
      ? pass('Tool name is well formed')
      : fail(
          'Tool name must be lowercase, start with a letter, contain only letters, numbers and underscores, and be 3-50 characters'
        ),
};

/**
 * Default rule set, in report order
 */
export const BUILTIN_RULES: readonly Rule[] = [
  registrationMarkerRule,
  asyncCallableRule,
  textReturnRule,
  failureBoundaryRule,
  initializationGuardRule,
  errorPrefixRule,
  docstringRule,
  parameterGuardsRule,
  parameterTypesRule,
  toolNameRule,
];

