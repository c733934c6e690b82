import { readFile } from 'fs/promises';
import { z } from 'zod';
import { describeDomain, inferDomain, isInDomain } from '../model/domain.js';
import {
  IDENTIFIER_REGEX,
  RESERVED_PARAMETER_NAMES,
  TOOL_NAME_REGEX,
  isReservedWord,
} from '../model/conventions.js';
import { SpecError, errorMessage } from '../utils/errors.js';
import { documentedDescription } from './template-parts.js';

/**
 * Text that ends up inside a generated doc comment
 */
const DocTextSchema = z
  .string()
  .trim()
  .min(1, 'Description cannot be empty')
  .refine((text) => !/[\r\n]/.test(text), 'Description must be a single line')
  .refine((text) => !text.includes('*/'), "Description cannot contain '*/'");

/**
 * First line of the doc comment, so it cannot open with a tag
 */
const SummarySchema = DocTextSchema.refine((text) => !text.startsWith('@'), "Description cannot start with '@'");

const ParameterSpecSchema = z.object({
  name: z
    .string()
    .regex(IDENTIFIER_REGEX, 'Parameter name must be a valid identifier')
    .refine((name) => !isReservedWord(name), 'Parameter name cannot be a reserved word')
    .refine((name) => !RESERVED_PARAMETER_NAMES.has(name), 'Parameter name is reserved by the generated body'),
  type: z.enum(['string', 'number', 'integer', 'boolean']),
  description: DocTextSchema,
  optional: z.boolean().default(false),
  default: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
});

/**
 * Declarative input to the template generator
 */
export const ToolSpecSchema = z
  .object({
    /** Tool name, also the exported binding */
    name: z
      .string()
      .regex(
        TOOL_NAME_REGEX,
        'Tool name must be lowercase, start with a letter, contain only letters, numbers and underscores, and be 3-50 characters'
      )
      .refine((name) => !isReservedWord(name), 'Tool name cannot be a reserved word'),
    description: SummarySchema,
    /** Delegated: named handler lookup. Direct: the single backend object */
    mode: z.enum(['delegated', 'direct']).default('delegated'),
    /** Handler name, required in delegated mode */
    delegationTarget: z.string().regex(IDENTIFIER_REGEX, 'Delegation target must be a valid identifier').optional(),
    /** Method to call, defaults to the tool name */
    delegationMethod: z.string().regex(IDENTIFIER_REGEX, 'Delegation method must be a valid identifier').optional(),
    parameters: z.array(ParameterSpecSchema),
  })
  .superRefine((spec, ctx) => {
    if (spec.mode === 'delegated' && !spec.delegationTarget) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['delegationTarget'],
        message: 'Delegated tools need a delegationTarget (or use mode "direct")',
      });
    }

    const seen = new Set<string>();
    let optionalSeen = false;

    spec.parameters.forEach((parameter, index) => {
      const path = ['parameters', index];

      if (seen.has(parameter.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, 'name'], message: `Duplicate parameter "${parameter.name}"` });
      }
      seen.add(parameter.name);

      if (parameter.optional) {
        optionalSeen = true;
      } else if (optionalSeen) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'optional'],
          message: `Required parameter "${parameter.name}" follows an optional one`,
        });
      }

      const domain = inferDomain(parameter.type, documentedDescription(parameter));
      if (
        parameter.type === 'integer' &&
        domain?.kind === 'range' &&
        !(Number.isInteger(domain.min) && Number.isInteger(domain.max))
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'description'],
          message: `Range bounds for integer "${parameter.name}" must be integers`,
        });
      }

      if (parameter.default === undefined) {
        return;
      }

      if (!parameter.optional) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'default'],
          message: `Parameter "${parameter.name}" has a default but is not optional`,
        });
      }

      if (parameter.default === null) {
        return;
      }

      const expected = parameter.type === 'integer' ? 'number' : parameter.type;
      if (typeof parameter.default !== expected || (parameter.type === 'integer' && !Number.isInteger(parameter.default))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'default'],
          message: `Default for "${parameter.name}" must be of type ${parameter.type}`,
        });
        return;
      }

      if (domain && !isInDomain(domain, parameter.default)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, 'default'],
          message: `Default for "${parameter.name}" must be ${describeDomain(domain)}`,
        });
      }
    });
  });

export type ToolSpecInput = z.input<typeof ToolSpecSchema>;
export type ToolSpec = z.output<typeof ToolSpecSchema>;
export type ParameterSpec = ToolSpec['parameters'][number];

/**
 * Validate a ToolSpec
 *
 * @throws SpecError listing every issue
 */
export function parseToolSpec(input: unknown): ToolSpec {
  const result = ToolSpecSchema.safeParse(input);

  if (!result.success) {
    throw new SpecError(
      result.error.errors.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  return result.data;
}

/**
 * Read and validate a ToolSpec JSON file
 *
 * @throws SpecError when the file is unreadable, not JSON, or invalid
 */
export async function loadToolSpecFile(filePath: string): Promise<ToolSpec> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SpecError([`Cannot read ${filePath}: ${errorMessage(error)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SpecError([`${filePath} is not valid JSON: ${errorMessage(error)}`]);
  }

  return parseToolSpec(parsed);
}
