/**
 * Expression Evaluator
 * Interprets a validated expression tree against current fact values.
 *
 * Never throws: every failure mode is a RequirementOutcome.
 * Typing is strict: operands are not silently coerced, and a null or
 * non-boolean result is an error rather than `false`.
 */

import type {
  BinaryNode,
  EvaluationError,
  EvaluationErrorKind,
  ExpressionNode,
  FactScalar,
  FactValues,
  Requirement,
  RequirementOutcome,
  RequirementResult,
} from '../shared/types.js';
import { validateExpression, formatExpressionIssues } from './expression-validator.js';
import { coerceFactValues, factValue, hasFact } from '../facts/normalizer.js';

type RuntimeValue = FactScalar | null | Array<FactScalar | null>;

/** Raised inside the tree walk; caught once at the top */
class EvaluationFailure extends Error {
  constructor(
    readonly kind: EvaluationErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'EvaluationFailure';
  }
}

function describe(value: RuntimeValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function requireNumber(value: RuntimeValue, node: ExpressionNode, role: string): number {
  if (typeof value !== 'number') {
    throw new EvaluationFailure(
      'type_mismatch',
      `${node.path}: ${role} must be a number, got ${describe(value)}`
    );
  }
  return value;
}

function requireBoolean(value: RuntimeValue, node: ExpressionNode, role: string): boolean {
  if (typeof value !== 'boolean') {
    throw new EvaluationFailure(
      'type_mismatch',
      `${node.path}: ${role} must be a boolean, got ${describe(value)}`
    );
  }
  return value;
}

function requireFinite(value: number, node: ExpressionNode): number {
  if (!Number.isFinite(value)) {
    throw new EvaluationFailure('non_finite_result', `${node.path}: arithmetic produced ${String(value)}`);
  }
  return value;
}

function isTruthy(value: RuntimeValue): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

function strictEquals(left: RuntimeValue, right: RuntimeValue, node: BinaryNode): boolean {
  if (left === null || right === null) return left === right;
  if (Array.isArray(left) || Array.isArray(right) || typeof left !== typeof right) {
    throw new EvaluationFailure(
      'type_mismatch',
      `${node.path}: cannot compare ${describe(left)} with ${describe(right)} using '${node.operator}'`
    );
  }
  return left === right;
}

function compareOrdered(left: RuntimeValue, right: RuntimeValue, node: BinaryNode): boolean {
  let sign: number;
  if (typeof left === 'number' && typeof right === 'number') {
    sign = left === right ? 0 : left < right ? -1 : 1;
  } else if (typeof left === 'string' && typeof right === 'string') {
    sign = left === right ? 0 : left < right ? -1 : 1;
  } else {
    throw new EvaluationFailure(
      'type_mismatch',
      `${node.path}: cannot order ${describe(left)} against ${describe(right)} using '${node.operator}'`
    );
  }
  switch (node.operator) {
    case '<':
      return sign < 0;
    case '<=':
      return sign <= 0;
    case '>':
      return sign > 0;
    default:
      return sign >= 0;
  }
}

function membership(needle: RuntimeValue, haystack: RuntimeValue, node: BinaryNode): boolean {
  if (Array.isArray(haystack)) {
    if (Array.isArray(needle)) {
      throw new EvaluationFailure('type_mismatch', `${node.path}: 'in' needle must be a scalar`);
    }
    return haystack.includes(needle);
  }
  if (typeof haystack === 'string' && typeof needle === 'string') {
    return haystack.includes(needle);
  }
  throw new EvaluationFailure(
    'type_mismatch',
    `${node.path}: 'in' expects a list or a string haystack, got ${describe(haystack)}`
  );
}

function arithmetic(node: BinaryNode, facts: FactValues): number {
  const left = requireNumber(evaluateNode(node.left, facts), node, 'left operand');
  const right = requireNumber(evaluateNode(node.right, facts), node, 'right operand');
  switch (node.operator) {
    case '+':
      return requireFinite(left + right, node);
    case '-':
      return requireFinite(left - right, node);
    case '*':
      return requireFinite(left * right, node);
    case '/':
      if (right === 0) throw new EvaluationFailure('division_by_zero', `${node.path}: division by zero`);
      return requireFinite(left / right, node);
    case '%':
      if (right === 0) throw new EvaluationFailure('division_by_zero', `${node.path}: modulo by zero`);
      return requireFinite(left % right, node);
    case 'min':
      return Math.min(left, right);
    case 'max':
      return Math.max(left, right);
    default:
      throw new EvaluationFailure('type_mismatch', `${node.path}: '${node.operator}' is not arithmetic`);
  }
}

function evaluateBinary(node: BinaryNode, facts: FactValues): RuntimeValue {
  switch (node.operator) {
    case '==':
    case '===':
      return strictEquals(evaluateNode(node.left, facts), evaluateNode(node.right, facts), node);
    case '!=':
    case '!==':
      return !strictEquals(evaluateNode(node.left, facts), evaluateNode(node.right, facts), node);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return compareOrdered(evaluateNode(node.left, facts), evaluateNode(node.right, facts), node);
    case 'in':
      return membership(evaluateNode(node.left, facts), evaluateNode(node.right, facts), node);
    default:
      return arithmetic(node, facts);
  }
}

function evaluateNode(node: ExpressionNode, facts: FactValues): RuntimeValue {
  switch (node.kind) {
    case 'constant':
      return node.value;
    case 'variable': {
      const value = factValue(facts, node.name);
      if (value === undefined) {
        throw new EvaluationFailure('null_result', `${node.path}: fact '${node.name}' is not available`);
      }
      return value;
    }
    case 'unary': {
      const operand = evaluateNode(node.operand, facts);
      if (node.operator === '!') return !requireBoolean(operand, node, 'operand');
      if (node.operator === '!!') return isTruthy(operand);
      return requireFinite(-requireNumber(operand, node, 'operand'), node);
    }
    case 'logic': {
      const shortCircuitOn = node.operator === 'or';
      for (const [i, operand] of node.operands.entries()) {
        const value = requireBoolean(evaluateNode(operand, facts), node, `operand ${i}`);
        if (value === shortCircuitOn) return value;
      }
      return !shortCircuitOn;
    }
    case 'conditional': {
      for (const [i, branch] of node.branches.entries()) {
        if (requireBoolean(evaluateNode(branch.condition, facts), node, `condition ${i}`)) {
          return evaluateNode(branch.then, facts);
        }
      }
      return node.otherwise ? evaluateNode(node.otherwise, facts) : null;
    }
    case 'binary':
      return evaluateBinary(node, facts);
  }
}

function errorOutcome(
  variables: string[],
  error: EvaluationError
): RequirementOutcome {
  return { status: 'error', variables_referenced: variables, missing_facts: [], error };
}

/**
 * Evaluate an authored expression against current fact values.
 *
 * 1. Invalid structure → error (invalid_expression), never evaluated
 * 2. Referenced facts absent → missing_facts, no partial evaluation
 * 3. Walk the tree with usage-coerced facts
 * 4. division_by_zero / type_mismatch / non_finite_result → error
 * 5. null result → error (null_result)
 * 6. boolean → passed / failed; anything else → error (non_boolean_result)
 */
export function evaluateExpression(expression: unknown, facts: FactValues): RequirementOutcome {
  const validation = validateExpression(expression);
  if (!validation.ok) {
    return errorOutcome([], {
      kind: 'invalid_expression',
      message: formatExpressionIssues(validation.errors).join('; '),
    });
  }

  const variables = validation.variables_referenced;
  const missing = variables.filter((name) => !hasFact(facts, name));
  if (missing.length > 0) {
    return { status: 'missing_facts', variables_referenced: variables, missing_facts: missing, error: null };
  }

  let result: RuntimeValue;
  try {
    result = evaluateNode(validation.ast, coerceFactValues(facts, validation.usage));
  } catch (err) {
    if (err instanceof EvaluationFailure) {
      return errorOutcome(variables, { kind: err.kind, message: err.message });
    }
    throw err;
  }

  if (result === null) {
    return errorOutcome(variables, {
      kind: 'null_result',
      message: 'Expression result is null; the condition could not be determined',
    });
  }
  if (typeof result === 'number' && !Number.isFinite(result)) {
    return errorOutcome(variables, {
      kind: 'non_finite_result',
      message: `Expression result is ${String(result)}`,
    });
  }
  if (typeof result !== 'boolean') {
    return errorOutcome(variables, {
      kind: 'non_boolean_result',
      message: `Expression must produce a boolean, got ${describe(result)}`,
    });
  }

  return {
    status: result ? 'passed' : 'failed',
    variables_referenced: variables,
    missing_facts: [],
    error: null,
  };
}

/**
 * Evaluate one requirement and tag the outcome with its code and flags.
 */
export function evaluateRequirement(requirement: Requirement, facts: FactValues): RequirementResult {
  return {
    requirement_code: requirement.requirement_code,
    label: requirement.label,
    mandatory: requirement.mandatory,
    ...evaluateExpression(requirement.expression, facts),
  };
}
