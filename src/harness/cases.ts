import type { LiveTool } from '../catalog/types.js';
import { kindOfDeclaredType, restrictedParameters, sampleInDomain, sampleOutsideDomain, parameterDomain } from '../model/domain.js';
import type { ToolDefinition } from '../model/types.js';
import type { TestCase } from './types.js';

export const MOCK_SUCCESS_TEXT = 'Mock success';
export const MOCK_FAILURE_MESSAGE = 'Simulated delegation failure';

const SUCCESS_PAYLOAD = [{ type: 'text', text: MOCK_SUCCESS_TEXT }];

/**
 * Valid named arguments for every required parameter
 */
export function happyArgs(definition: ToolDefinition): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  for (const parameter of definition.parameters) {
    if (parameter.isOptional) {
      continue;
    }
    const domain = parameterDomain(definition, parameter);
    if (domain) {
      args[parameter.name] = sampleInDomain(domain);
      continue;
    }
    switch (kindOfDeclaredType(parameter.declaredType)) {
      case 'number':
        args[parameter.name] = 1;
        break;
      case 'boolean':
        args[parameter.name] = true;
        break;
      default:
        args[parameter.name] = 'test';
    }
  }
  return args;
}

/**
 * Cases 1 to 4 of the standard battery for one tool
 */
export function standardCases(tool: LiveTool): TestCase[] {
  const { definition } = tool;
  const args = happyArgs(definition);
  const delegates = definition.delegation !== null;
  const pureReason = delegates ? undefined : 'Tool does not delegate';

  const [restricted] = restrictedParameters(definition);

  return [
    {
      id: 'unavailable-dependency',
      description: 'Returns an error when the delegation layer is unavailable',
      registryConfig: { available: false, defaultBehavior: { kind: 'return', value: SUCCESS_PAYLOAD } },
      invocationArgs: args,
      expectedOutcomeKind: 'error',
      expectNoInvocations: true,
      ...(pureReason ? { skipReason: pureReason } : {}),
    },
    {
      id: 'happy-path',
      description: 'Returns the delegation result as text',
      registryConfig: { available: true, defaultBehavior: { kind: 'return', value: SUCCESS_PAYLOAD } },
      invocationArgs: args,
      expectedOutcomeKind: 'success',
      ...(delegates ? { expectedText: MOCK_SUCCESS_TEXT } : {}),
    },
    {
      id: 'delegation-failure',
      description: 'Returns an error when delegation raises',
      registryConfig: { available: true, defaultBehavior: { kind: 'throw', message: MOCK_FAILURE_MESSAGE } },
      invocationArgs: args,
      expectedOutcomeKind: 'error',
      ...(pureReason ? { skipReason: pureReason } : {}),
    },
    {
      id: 'invalid-parameter',
      description: restricted
        ? `Rejects an out-of-domain ${restricted.parameter.name} before delegating`
        : 'Rejects an out-of-domain parameter before delegating',
      registryConfig: { available: true, defaultBehavior: { kind: 'return', value: SUCCESS_PAYLOAD } },
      invocationArgs: restricted
        ? { ...args, [restricted.parameter.name]: sampleOutsideDomain(restricted.domain, restricted.parameter.name) }
        : args,
      expectedOutcomeKind: 'error',
      expectNoInvocations: true,
      ...(restricted ? {} : { skipReason: 'No parameter with a restricted domain' }),
    },
  ];
}
