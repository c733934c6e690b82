import ts from 'typescript';
import { CONTEXT_TYPE, MARKER_FUNCTION } from '../model/conventions.js';
import { createToolDefinition, type ParameterInfo, type ToolDefinition } from '../model/types.js';
import { ExtractionError } from '../utils/errors.js';
import { analyzeBody } from './body.js';
import { parseDocComment } from './docstring.js';

/**
 * Tool Model Extractor
 *
 * Turns catalog source into ToolDefinitions. Every exported callable is a
 * tool unit; exported plain values are ignored. Units are extracted
 * independently, in declaration order.
 */

export type ExtractionOutcome =
  | { readonly ok: true; readonly definition: ToolDefinition }
  | { readonly ok: false; readonly error: ExtractionError };

type Callable = ts.ArrowFunction | ts.FunctionExpression | ts.FunctionDeclaration;

interface ToolUnit {
  readonly name: string;
  /** Statement the doc comment is attached to */
  readonly statement: ts.Statement;
  readonly callable: Callable | null;
  readonly marker: { present: boolean; issue: string | null };
}

function isCallable(node: ts.Node): node is ts.ArrowFunction | ts.FunctionExpression {
  return ts.isArrowFunction(node) || ts.isFunctionExpression(node);
}

function isExported(statement: ts.Statement): boolean {
  return ts.canHaveModifiers(statement)
    ? (ts.getModifiers(statement) ?? []).some((modifier) => modifier.kind === ts.SyntaxKind.ExportKeyword)
    : false;
}

function isAsync(callable: Callable): boolean {
  return (ts.getModifiers(callable) ?? []).some((modifier) => modifier.kind === ts.SyntaxKind.AsyncKeyword);
}

/**
 * Inspect `defineTool('name', callable)` and friends
 */
function unitFromCall(name: string, statement: ts.Statement, call: ts.CallExpression): ToolUnit | null {
  const callee = call.expression.getText();
  const callable = call.arguments.find(isCallable) ?? null;

  if (callee !== MARKER_FUNCTION) {
    // Not a registration call; only a tool if it wraps a callable
    return callable
      ? {
          name,
          statement,
          callable,
          marker: { present: false, issue: `Registered through ${callee}() instead of ${MARKER_FUNCTION}()` },
        }
      : null;
  }

  const [nameArgument] = call.arguments;
  let issue: string | null = null;
  if (!nameArgument || !ts.isStringLiteralLike(nameArgument)) {
    issue = `${MARKER_FUNCTION}() must receive the tool name as a string literal first argument`;
  } else if (nameArgument.text !== name) {
    issue = `${MARKER_FUNCTION}('${nameArgument.text}') does not match the exported name '${name}'`;
  } else if (call.arguments[1] !== callable) {
    issue = `${MARKER_FUNCTION}() must receive the callable as its second argument`;
  }

  return { name, statement, callable, marker: { present: issue === null, issue } };
}

function unitsOf(statement: ts.Statement): ToolUnit[] {
  if (!isExported(statement)) {
    return [];
  }

  if (ts.isFunctionDeclaration(statement)) {
    return [
      {
        name: statement.name?.text ?? 'default',
        statement,
        callable: statement,
        marker: { present: false, issue: `Declared as a plain function; wrap it in ${MARKER_FUNCTION}()` },
      },
    ];
  }

  if (!ts.isVariableStatement(statement)) {
    return [];
  }

  const units: ToolUnit[] = [];
  for (const declaration of statement.declarationList.declarations) {
    if (!ts.isIdentifier(declaration.name) || !declaration.initializer) {
      continue;
    }
    const name = declaration.name.text;
    const initializer = declaration.initializer;

    if (ts.isCallExpression(initializer)) {
      const unit = unitFromCall(name, statement, initializer);
      if (unit) {
        units.push(unit);
      }
    } else if (isCallable(initializer)) {
      units.push({
        name,
        statement,
        callable: initializer,
        marker: { present: false, issue: `Missing registration marker ${MARKER_FUNCTION}('${name}', ...)` },
      });
    }
  }
  return units;
}

function docCommentOf(statement: ts.Statement, text: string): string | null {
  const ranges = ts.getLeadingCommentRanges(text, statement.getFullStart()) ?? [];
  const blocks = ranges
    .map((range) => text.slice(range.pos, range.end))
    .filter((comment) => comment.startsWith('/**'));
  return blocks.length > 0 ? (blocks[blocks.length - 1] ?? null) : null;
}

function isContextParameter(parameter: ts.ParameterDeclaration): boolean {
  return parameter.type !== undefined && parameter.type.getText().replace(/\s/g, '') === CONTEXT_TYPE;
}

function returnsText(callable: Callable): boolean {
  if (!callable.type) {
    return false;
  }
  const declared = callable.type.getText().replace(/\s/g, '');
  return declared === 'Promise<string>' || declared === 'string';
}

function extractUnit(unit: ToolUnit, file: ts.SourceFile): ToolDefinition {
  const { callable } = unit;
  if (!callable) {
    throw new ExtractionError(unit.name, `${MARKER_FUNCTION}() call has no callable to register`);
  }
  if (!callable.body) {
    throw new ExtractionError(unit.name, 'Callable has no body');
  }

  let contextParameter: string | null = null;
  const parameters: ParameterInfo[] = [];

  for (const [index, parameter] of callable.parameters.entries()) {
    if (!ts.isIdentifier(parameter.name)) {
      throw new ExtractionError(unit.name, `Malformed signature: parameter ${String(index + 1)} is destructured`);
    }
    if (parameter.dotDotDotToken) {
      throw new ExtractionError(unit.name, `Malformed signature: rest parameter '${parameter.name.text}'`);
    }
    if (index === 0 && isContextParameter(parameter)) {
      contextParameter = parameter.name.text;
      continue;
    }
    parameters.push({
      name: parameter.name.text,
      declaredType: parameter.type ? parameter.type.getText() : null,
      isOptional: parameter.questionToken !== undefined || parameter.initializer !== undefined,
      ...(parameter.initializer ? { defaultValue: parameter.initializer.getText() } : {}),
    });
  }

  const analysis = analyzeBody(
    callable.body,
    contextParameter,
    parameters.map((parameter) => parameter.name)
  );

  return createToolDefinition({
    name: unit.name,
    sourceUnit: file.fileName,
    line: file.getLineAndCharacterOfPosition(unit.statement.getStart()).line + 1,
    isAsyncCallable: isAsync(callable),
    hasRegistrationMarker: unit.marker.present,
    markerIssue: unit.marker.issue,
    contextParameter,
    parameters,
    returnsPlainText: returnsText(callable),
    docstring: parseDocComment(docCommentOf(unit.statement, file.text)),
    bodyShape: analysis.bodyShape,
    parameterValidationGuards: analysis.parameterValidationGuards,
    delegation: analysis.delegation,
  });
}

/**
 * First syntax error in the source, null when it parses
 */
function syntaxError(source: string, sourceUnit: string): string | null {
  const { diagnostics = [] } = ts.transpileModule(source, {
    fileName: sourceUnit,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.ESNext },
  });
  const [first] = diagnostics;
  if (!first) {
    return null;
  }

  const message = ts.flattenDiagnosticMessageText(first.messageText, ' ');
  if (first.file && first.start !== undefined) {
    const { line } = first.file.getLineAndCharacterOfPosition(first.start);
    return `line ${String(line + 1)}: ${message}`;
  }
  return message;
}

/**
 * Extract every tool unit in a source file
 */
export function extractTools(source: string, sourceUnit: string): ExtractionOutcome[] {
  const problem = syntaxError(source, sourceUnit);
  if (problem !== null) {
    return [{ ok: false, error: new ExtractionError(sourceUnit, `Syntax error at ${problem}`) }];
  }

  const file = ts.createSourceFile(sourceUnit, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const outcomes: ExtractionOutcome[] = [];

  for (const statement of file.statements) {
    for (const unit of unitsOf(statement)) {
      try {
        outcomes.push({ ok: true, definition: extractUnit(unit, file) });
      } catch (error) {
        if (!(error instanceof ExtractionError)) {
          throw error;
        }
        outcomes.push({ ok: false, error });
      }
    }
  }

  return outcomes;
}

/**
 * Extract a source unit holding exactly one tool
 *
 * @throws ExtractionError when the unit holds no tool, several tools, or a malformed one
 */
export function extractTool(source: string, sourceUnit: string): ToolDefinition {
  const outcomes = extractTools(source, sourceUnit);
  const [only] = outcomes;

  if (!only) {
    throw new ExtractionError(sourceUnit, 'No exported callable found');
  }
  if (outcomes.length > 1) {
    throw new ExtractionError(sourceUnit, `Expected one tool, found ${String(outcomes.length)}`);
  }
  if (!only.ok) {
    throw only.error;
  }
  return only.definition;
}

export { parseDocComment } from './docstring.js';
