/**
 * Expression Validator
 * Structural validation of authored rule expressions (JSON-logic shaped).
 * Builds the typed expression tree the evaluator runs on, collects referenced
 * variables, and infers the coercion context of each variable.
 */

import type {
  ArithmeticOperator,
  BinaryOperator,
  ComparisonOperator,
  ConstantValue,
  ExpressionIssue,
  ExpressionNode,
  ExpressionValidation,
  FactScalar,
  UsageContext,
} from '../shared/types.js';

export const MAX_EXPRESSION_DEPTH = 20;
export const MAX_EXPRESSION_NODES = 1000;

const EQUALITY_OPERATORS: readonly ComparisonOperator[] = ['==', '===', '!=', '!=='] as const;
const ORDERING_OPERATORS: readonly ComparisonOperator[] = ['<', '<=', '>', '>='] as const;
const FOLDABLE_OPERATORS: readonly ArithmeticOperator[] = ['+', '*', 'min', 'max'] as const;

/** Every operator token an expression may use */
export const SUPPORTED_OPERATORS: readonly string[] = [
  'var',
  ...EQUALITY_OPERATORS,
  ...ORDERING_OPERATORS,
  '!',
  '!!',
  'and',
  'or',
  'if',
  '+',
  '-',
  '*',
  '/',
  '%',
  'min',
  'max',
  'in',
] as const;

interface ParseContext {
  issues: ExpressionIssue[];
  nodes: number;
  nodeLimitReported: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isScalar(value: unknown): value is FactScalar {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isEqualityOperator(op: string): op is ComparisonOperator {
  return EQUALITY_OPERATORS.some((candidate) => candidate === op);
}

function isOrderingOperator(op: string): op is ComparisonOperator {
  return ORDERING_OPERATORS.some((candidate) => candidate === op);
}

function isFoldableOperator(op: string): op is ArithmeticOperator {
  return FOLDABLE_OPERATORS.some((candidate) => candidate === op);
}

function isBinaryOperator(op: string): op is BinaryOperator {
  return (
    isEqualityOperator(op) ||
    isOrderingOperator(op) ||
    isFoldableOperator(op) ||
    op === '-' ||
    op === '/' ||
    op === '%' ||
    op === 'in'
  );
}

/**
 * Minimum and maximum operand counts per operator (max null = unbounded).
 */
function arityOf(op: string): [number, number | null] {
  if (op === '!' || op === '!!') return [1, 1];
  if (op === '-') return [1, 2];
  if (op === 'and' || op === 'or') return [1, null];
  if (op === 'if' || isFoldableOperator(op)) return [2, null];
  return [2, 2];
}

function describeArity([min, max]: [number, number | null]): string {
  if (max === null) return `at least ${min}`;
  if (min === max) return `${min}`;
  return `${min} to ${max}`;
}

function parseVariable(value: unknown, path: string, ctx: ParseContext): ExpressionNode | null {
  let name: unknown = value;
  if (Array.isArray(value)) {
    name = value.length === 1 ? value[0] : undefined;
  }
  if (typeof name !== 'string' || name.trim() === '') {
    ctx.issues.push({ path: `${path}.var`, message: 'var requires a single non-empty fact key' });
    return null;
  }
  return { kind: 'variable', path, name };
}

function parseArray(raw: unknown[], path: string, ctx: ParseContext): ExpressionNode | null {
  if (raw.length === 0) {
    ctx.issues.push({ path, message: 'Empty array in expression' });
    return null;
  }
  const items: Array<FactScalar | null> = [];
  for (const [i, item] of raw.entries()) {
    if (item === null || isScalar(item)) {
      items.push(item);
      continue;
    }
    ctx.issues.push({
      path: `${path}[${i}]`,
      message: 'Array literals may only contain scalar constants',
    });
    return null;
  }
  const value: ConstantValue = items;
  return { kind: 'constant', path, value };
}

/**
 * Left-fold n-ary arithmetic (+, *, min, max) into nested binary nodes.
 */
function foldBinary(
  operator: BinaryOperator,
  operands: ExpressionNode[],
  path: string
): ExpressionNode | null {
  const [first, ...rest] = operands;
  if (!first) return null;
  let acc: ExpressionNode = first;
  for (const next of rest) {
    acc = { kind: 'binary', path, operator, left: acc, right: next };
  }
  return acc;
}

function parseOperation(
  op: string,
  value: unknown,
  path: string,
  depth: number,
  ctx: ParseContext
): ExpressionNode | null {
  if (op === 'var') {
    return parseVariable(value, path, ctx);
  }

  const args: unknown[] = Array.isArray(value) ? value : [value];
  const arity = arityOf(op);
  const [min, max] = arity;
  if (args.length < min || (max !== null && args.length > max)) {
    ctx.issues.push({
      path,
      message: `Operator '${op}' expects ${describeArity(arity)} operand(s), got ${args.length}`,
    });
    return null;
  }

  const operands: ExpressionNode[] = [];
  let failed = false;
  for (const [i, arg] of args.entries()) {
    const child = parseNode(arg, `${path}.${op}[${i}]`, depth + 1, ctx);
    if (child === null) {
      failed = true;
    } else {
      operands.push(child);
    }
  }
  if (failed) return null;

  if (op === '!' || op === '!!' || (op === '-' && operands.length === 1)) {
    const [operand] = operands;
    if (!operand) return null;
    return { kind: 'unary', path, operator: op, operand };
  }

  if (op === 'and' || op === 'or') {
    return { kind: 'logic', path, operator: op, operands };
  }

  if (op === 'if') {
    const branches: Array<{ condition: ExpressionNode; then: ExpressionNode }> = [];
    let i = 0;
    for (; i + 1 < operands.length; i += 2) {
      const condition = operands[i];
      const then = operands[i + 1];
      if (condition && then) branches.push({ condition, then });
    }
    return { kind: 'conditional', path, branches, otherwise: operands[i] ?? null };
  }

  if (isBinaryOperator(op)) {
    return foldBinary(op, operands, path);
  }

  ctx.issues.push({ path, message: `Unknown operator '${op}'` });
  return null;
}

function parseNode(raw: unknown, path: string, depth: number, ctx: ParseContext): ExpressionNode | null {
  if (depth > MAX_EXPRESSION_DEPTH) {
    ctx.issues.push({
      path,
      message: `Expression too deeply nested (max depth: ${MAX_EXPRESSION_DEPTH})`,
    });
    return null;
  }

  ctx.nodes += 1;
  if (ctx.nodes > MAX_EXPRESSION_NODES) {
    if (!ctx.nodeLimitReported) {
      ctx.issues.push({
        path,
        message: `Expression too complex (max nodes: ${MAX_EXPRESSION_NODES})`,
      });
      ctx.nodeLimitReported = true;
    }
    return null;
  }

  if (raw === null || isScalar(raw)) {
    return { kind: 'constant', path, value: raw };
  }

  if (Array.isArray(raw)) {
    return parseArray(raw, path, ctx);
  }

  if (!isPlainObject(raw)) {
    ctx.issues.push({ path, message: `Invalid value in expression: ${String(raw)}` });
    return null;
  }

  const keys = Object.keys(raw);
  if (keys.length === 0) {
    ctx.issues.push({ path, message: 'Empty object in expression' });
    return null;
  }
  if (keys.length > 1) {
    ctx.issues.push({
      path,
      message: `Expression object has multiple keys: ${keys.join(', ')}. Expected a single operator key.`,
    });
    return null;
  }

  const op = keys[0] ?? '';
  if (!SUPPORTED_OPERATORS.includes(op)) {
    ctx.issues.push({ path, message: `Unknown operator '${op}' at ${path}` });
    return null;
  }

  return parseOperation(op, raw[op], path, depth, ctx);
}

// =============================================================================
// Variable collection and usage inference
// =============================================================================

function childrenOf(node: ExpressionNode): ExpressionNode[] {
  switch (node.kind) {
    case 'constant':
    case 'variable':
      return [];
    case 'unary':
      return [node.operand];
    case 'binary':
      return [node.left, node.right];
    case 'logic':
      return node.operands;
    case 'conditional': {
      const nodes = node.branches.flatMap((b) => [b.condition, b.then]);
      return node.otherwise ? [...nodes, node.otherwise] : nodes;
    }
  }
}

function collectVariables(node: ExpressionNode, out: string[]): void {
  if (node.kind === 'variable') {
    if (!out.includes(node.name)) out.push(node.name);
    return;
  }
  for (const child of childrenOf(node)) collectVariables(child, out);
}

type UsageHint = UsageContext | 'none';

/** Context a constant on the other side of an equality implies */
function equalityContext(other: ExpressionNode): UsageHint {
  if (other.kind !== 'constant') return 'none';
  if (typeof other.value === 'boolean') return 'boolean';
  if (typeof other.value === 'number') return 'number';
  return 'none';
}

function orderingContext(other: ExpressionNode): UsageHint {
  return other.kind === 'constant' && typeof other.value === 'string' ? 'none' : 'number';
}

function inferUsage(node: ExpressionNode, context: UsageHint, hints: Map<string, Set<UsageHint>>): void {
  switch (node.kind) {
    case 'constant':
      return;
    case 'variable': {
      const seen = hints.get(node.name) ?? new Set<UsageHint>();
      seen.add(context);
      hints.set(node.name, seen);
      return;
    }
    case 'unary':
      inferUsage(node.operand, node.operator === '!' ? 'boolean' : node.operator === '-' ? 'number' : 'none', hints);
      return;
    case 'logic':
      for (const operand of node.operands) inferUsage(operand, 'boolean', hints);
      return;
    case 'conditional':
      for (const branch of node.branches) {
        inferUsage(branch.condition, 'boolean', hints);
        inferUsage(branch.then, context, hints);
      }
      if (node.otherwise) inferUsage(node.otherwise, context, hints);
      return;
    case 'binary': {
      const { operator, left, right } = node;
      if (isEqualityOperator(operator)) {
        inferUsage(left, equalityContext(right), hints);
        inferUsage(right, equalityContext(left), hints);
      } else if (isOrderingOperator(operator)) {
        inferUsage(left, orderingContext(right), hints);
        inferUsage(right, orderingContext(left), hints);
      } else if (operator === 'in') {
        inferUsage(left, 'none', hints);
        inferUsage(right, 'none', hints);
      } else {
        inferUsage(left, 'number', hints);
        inferUsage(right, 'number', hints);
      }
      return;
    }
  }
}

/**
 * Coercion context per variable, kept only where every use agrees.
 */
function resolveUsage(ast: ExpressionNode): Record<string, UsageContext> {
  const hints = new Map<string, Set<UsageHint>>();
  inferUsage(ast, 'boolean', hints);
  const usage: Record<string, UsageContext> = Object.create(null);
  for (const [name, seen] of hints) {
    const [only] = [...seen];
    if (seen.size === 1 && only !== undefined && only !== 'none') {
      usage[name] = only;
    }
  }
  return usage;
}

/**
 * Validate an authored expression and build its typed tree.
 *
 * - null/undefined, empty objects and empty arrays are rejected
 * - nesting deeper than MAX_EXPRESSION_DEPTH is rejected without evaluation
 * - operator tokens must be in SUPPORTED_OPERATORS; each issue names its path
 * - a bare constant is valid
 */
export function validateExpression(expression: unknown): ExpressionValidation {
  if (expression === null || expression === undefined) {
    return { ok: false, errors: [{ path: '$', message: 'Expression is required' }] };
  }

  const ctx: ParseContext = { issues: [], nodes: 0, nodeLimitReported: false };
  const ast = parseNode(expression, '$', 0, ctx);

  if (ast === null || ctx.issues.length > 0) {
    const errors = ctx.issues.length > 0 ? ctx.issues : [{ path: '$', message: 'Invalid expression' }];
    return { ok: false, errors };
  }

  const variables: string[] = [];
  collectVariables(ast, variables);

  return {
    ok: true,
    ast,
    variables_referenced: variables,
    usage: resolveUsage(ast),
  };
}

/**
 * Format validation issues as one message per issue ("path: message").
 */
export function formatExpressionIssues(issues: ExpressionIssue[]): string[] {
  return issues.map((issue) => `${issue.path}: ${issue.message}`);
}
