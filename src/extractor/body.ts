import ts from 'typescript';
import {
  BACKEND_PROPERTY,
  ERROR_PREFIX,
  HANDLERS_PROPERTY,
} from '../model/conventions.js';
import type { BodyShape, Delegation } from '../model/types.js';

/**
 * Surface-level analysis of a tool body.
 *
 * Looks at top-level `if` guards (also those directly inside a top-level
 * `try`), which calls reach the delegation layer, whether those calls sit in
 * a `try` with a returning `catch`, and the string shape of error-path
 * returns. Nothing is evaluated or type-checked.
 */
export interface BodyAnalysis {
  readonly bodyShape: BodyShape;
  readonly parameterValidationGuards: readonly string[];
  readonly delegation: Delegation | null;
}

interface DelegationCall {
  readonly node: ts.CallExpression;
  readonly delegation: Delegation;
}

function isFunctionLike(node: ts.Node): boolean {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node)
  );
}

/**
 * Visit descendants without entering nested functions
 */
function walk(node: ts.Node, visit: (child: ts.Node) => void): void {
  ts.forEachChild(node, (child) => {
    if (isFunctionLike(child)) {
      return;
    }
    visit(child);
    walk(child, visit);
  });
}

/**
 * Visit descendants including nested functions
 */
function walkAll(node: ts.Node, visit: (child: ts.Node) => void): void {
  ts.forEachChild(node, (child) => {
    visit(child);
    walkAll(child, visit);
  });
}

/**
 * Property name of `a.b` or `a['b']`
 */
function memberName(node: ts.Expression): { object: ts.Expression; name: string } | null {
  if (ts.isPropertyAccessExpression(node)) {
    return { object: node.expression, name: node.name.text };
  }
  if (ts.isElementAccessExpression(node) && ts.isStringLiteralLike(node.argumentExpression)) {
    return { object: node.expression, name: node.argumentExpression.text };
  }
  return null;
}

/**
 * `ctx.handlers` or `ctx.backend`
 */
function delegationHandle(node: ts.Expression, contextName: string): string | null {
  const member = memberName(node);
  if (!member || !ts.isIdentifier(member.object) || member.object.text !== contextName) {
    return null;
  }
  return member.name === HANDLERS_PROPERTY || member.name === BACKEND_PROPERTY ? member.name : null;
}

function toDelegationCall(node: ts.CallExpression, contextName: string): DelegationCall | null {
  const callee = memberName(node.expression);
  if (!callee) {
    return null;
  }

  // ctx.backend.method(...)
  if (delegationHandle(callee.object, contextName) === BACKEND_PROPERTY) {
    return { node, delegation: { kind: 'direct', method: callee.name } };
  }

  // ctx.handlers.target.method(...)
  const target = memberName(callee.object);
  if (target && delegationHandle(target.object, contextName) === HANDLERS_PROPERTY) {
    return { node, delegation: { kind: 'delegated', target: target.name, method: callee.name } };
  }

  return null;
}

function findDelegationCalls(body: ts.Node, contextName: string | null): DelegationCall[] {
  if (contextName === null) {
    return [];
  }

  const calls: DelegationCall[] = [];
  walkAll(body, (node) => {
    if (ts.isCallExpression(node)) {
      const call = toDelegationCall(node, contextName);
      if (call) {
        calls.push(call);
      }
    }
  });
  return calls;
}

/**
 * `if` statements at the top of the body and directly inside top-level `try` blocks
 */
function collectGuards(body: ts.Block): ts.IfStatement[] {
  const guards: ts.IfStatement[] = [];
  for (const statement of body.statements) {
    if (ts.isIfStatement(statement)) {
      guards.push(statement);
    } else if (ts.isTryStatement(statement)) {
      guards.push(...statement.tryBlock.statements.filter(ts.isIfStatement));
    }
  }
  return guards;
}

function returnsIn(node: ts.Node): ts.ReturnStatement[] {
  if (ts.isReturnStatement(node)) {
    return [node];
  }
  const returns: ts.ReturnStatement[] = [];
  walk(node, (child) => {
    if (ts.isReturnStatement(child)) {
      returns.push(child);
    }
  });
  return returns;
}

/**
 * Does the condition test whether the delegation handle is missing?
 * Matches `!ctx.handlers` and `ctx.backend === undefined` style checks.
 */
function checksAvailability(condition: ts.Expression, contextName: string): boolean {
  let found = false;
  const inspect = (node: ts.Node): void => {
    if (
      ts.isPrefixUnaryExpression(node) &&
      node.operator === ts.SyntaxKind.ExclamationToken &&
      delegationHandle(node.operand, contextName) !== null
    ) {
      found = true;
    }
    if (
      ts.isBinaryExpression(node) &&
      (node.operatorToken.kind === ts.SyntaxKind.EqualsEqualsEqualsToken ||
        node.operatorToken.kind === ts.SyntaxKind.EqualsEqualsToken)
    ) {
      const [handleSide, valueSide] =
        delegationHandle(node.left, contextName) !== null ? [node.left, node.right] : [node.right, node.left];
      const isEmpty =
        valueSide.kind === ts.SyntaxKind.NullKeyword ||
        (ts.isIdentifier(valueSide) && valueSide.text === 'undefined');
      if (delegationHandle(handleSide, contextName) !== null && isEmpty) {
        found = true;
      }
    }
  };
  inspect(condition);
  walkAll(condition, inspect);
  return found;
}

function referencedIdentifiers(node: ts.Node): Set<string> {
  const names = new Set<string>();
  if (ts.isIdentifier(node)) {
    names.add(node.text);
  }
  walkAll(node, (child) => {
    // Skip the `name` in `a.name`
    if (ts.isIdentifier(child) && !(ts.isPropertyAccessExpression(child.parent) && child.parent.name === child)) {
      names.add(child.text);
    }
  });
  return names;
}

/**
 * Static text a returned expression starts with, null when not a string
 */
function leadingText(expression: ts.Expression | undefined): string | null {
  if (!expression) {
    return null;
  }
  if (ts.isParenthesizedExpression(expression)) {
    return leadingText(expression.expression);
  }
  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text;
  }
  if (ts.isTemplateExpression(expression)) {
    return expression.head.text;
  }
  if (ts.isBinaryExpression(expression) && expression.operatorToken.kind === ts.SyntaxKind.PlusToken) {
    return leadingText(expression.left);
  }
  return null;
}

function isErrorPrefixed(statement: ts.ReturnStatement): boolean {
  return leadingText(statement.expression)?.startsWith(ERROR_PREFIX) ?? false;
}

/**
 * Is the node inside a `try` block (within the body) whose `catch` returns?
 */
function isInsideFailureBoundary(node: ts.Node, body: ts.Node): boolean {
  let current: ts.Node = node;
  while (current !== body && current.parent) {
    const parent: ts.Node = current.parent;
    if (ts.isTryStatement(parent) && parent.tryBlock === current) {
      const handler = parent.catchClause;
      if (handler && returnsIn(handler.block).length > 0) {
        return true;
      }
    }
    current = parent;
  }
  return false;
}

export function analyzeBody(
  body: ts.ConciseBody,
  contextName: string | null,
  parameterNames: readonly string[]
): BodyAnalysis {
  const calls = findDelegationCalls(body, contextName);
  const firstCallStart = calls.length > 0 ? Math.min(...calls.map((call) => call.node.getStart())) : Infinity;

  const guards = ts.isBlock(body) ? collectGuards(body) : [];
  const guardsBeforeDelegation = guards.filter(
    (guard) => guard.getEnd() <= firstCallStart && returnsIn(guard.thenStatement).length > 0
  );

  const hasInitializationGuard =
    calls.length === 0 ||
    (contextName !== null &&
      guardsBeforeDelegation.some((guard) => checksAvailability(guard.expression, contextName)));

  const guardedParameters = new Set<string>();
  for (const guard of guardsBeforeDelegation) {
    const referenced = referencedIdentifiers(guard.expression);
    for (const name of parameterNames) {
      if (referenced.has(name)) {
        guardedParameters.add(name);
      }
    }
  }

  const hasFailureBoundary = calls.every((call) => isInsideFailureBoundary(call.node, body));

  const errorReturns: ts.ReturnStatement[] = [];
  for (const guard of guards) {
    errorReturns.push(...returnsIn(guard.thenStatement));
  }
  walk(body, (node) => {
    if (ts.isCatchClause(node)) {
      errorReturns.push(...returnsIn(node.block));
    }
  });

  const first = calls[0];

  return {
    bodyShape: {
      hasGuardedInitializationCheck: hasInitializationGuard,
      hasSurroundingFailureBoundary: hasFailureBoundary,
      errorMessagePrefixConsistent: errorReturns.every(isErrorPrefixed),
    },
    parameterValidationGuards: parameterNames.filter((name) => guardedParameters.has(name)),
    delegation: first ? first.delegation : null,
  };
}
