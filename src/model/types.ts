/**
 * Structural model of one tool, as extracted from source
 */

/**
 * How a tool reaches the delegation layer
 */
export type Delegation =
  | { readonly kind: 'delegated'; readonly target: string; readonly method: string }
  | { readonly kind: 'direct'; readonly method: string };

export type DelegationKind = Delegation['kind'];

export interface ParameterInfo {
  readonly name: string;
  /** Type annotation as written, null when missing */
  readonly declaredType: string | null;
  readonly isOptional: boolean;
  /** Default value expression as written */
  readonly defaultValue?: string;
}

export interface Docstring {
  /** First line of the doc comment, empty when there is none */
  readonly summary: string;
  /** `@param` descriptions keyed by parameter name */
  readonly argSections: Readonly<Record<string, string>>;
}

export interface BodyShape {
  /** Availability check of the delegation handle before its first use */
  readonly hasGuardedInitializationCheck: boolean;
  /** Every delegation call sits in a try whose catch returns */
  readonly hasSurroundingFailureBoundary: boolean;
  /** Every error-path return starts with the canonical prefix */
  readonly errorMessagePrefixConsistent: boolean;
}

export interface ToolDefinition {
  readonly name: string;
  /** Source unit (file name) the tool was extracted from */
  readonly sourceUnit: string;
  /** 1-based line of the declaration */
  readonly line: number;
  readonly isAsyncCallable: boolean;
  readonly hasRegistrationMarker: boolean;
  /** Why the marker is absent or malformed */
  readonly markerIssue: string | null;
  /** Name of the ToolContext parameter, null for pure tools */
  readonly contextParameter: string | null;
  readonly parameters: readonly ParameterInfo[];
  readonly returnsPlainText: boolean;
  readonly docstring: Docstring;
  readonly bodyShape: BodyShape;
  /** Parameters checked by a guard before delegation, in parameter order */
  readonly parameterValidationGuards: readonly string[];
  /** First delegation call, null when the tool never delegates */
  readonly delegation: Delegation | null;
}

/**
 * Build an immutable definition. Re-extraction creates a new instance;
 * nothing mutates one in place.
 */
export function createToolDefinition(fields: ToolDefinition): ToolDefinition {
  return Object.freeze({
    ...fields,
    parameters: Object.freeze(fields.parameters.map((parameter) => Object.freeze({ ...parameter }))),
    docstring: Object.freeze({
      summary: fields.docstring.summary,
      argSections: Object.freeze({ ...fields.docstring.argSections }),
    }),
    bodyShape: Object.freeze({ ...fields.bodyShape }),
    parameterValidationGuards: Object.freeze([...fields.parameterValidationGuards]),
    delegation: fields.delegation ? Object.freeze({ ...fields.delegation }) : null,
  });
}
