import type { ParameterKind } from '../model/domain.js';
import type { ParameterSpec } from './schema.js';

/**
 * Single-quoted string literal
 */
export function quote(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Source form of a default value
 */
export function literal(value: string | number | boolean | null): string {
  return typeof value === 'string' ? quote(value) : String(value);
}

/**
 * TypeScript type for a spec parameter
 */
export function tsType(kind: ParameterKind, nullable: boolean): string {
  const base = kind === 'integer' ? 'number' : kind;
  return nullable ? `${base} | null` : base;
}

/**
 * Description as written into the doc comment. Domain inference reads this
 * exact text on both the generating and the validating side.
 */
export function documentedDescription(parameter: Pick<ParameterSpec, 'description' | 'default'>): string {
  return parameter.default === undefined
    ? parameter.description
    : `${parameter.description} (default: ${literal(parameter.default)})`;
}
