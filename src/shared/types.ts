/**
 * Shared TypeScript types for the Eligibility Engine
 */

/**
 * Rejection reason details
 */
export interface RejectionReason {
  code: string;
  message: string;
  field_path?: string;
}

/**
 * Validation result from boundary validation
 */
export interface ValidationResult {
  valid: boolean;
  errors: RejectionReason[];
}

/** Any value representable in JSON (authored expressions, stored payloads) */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// =============================================================================
// Fact Types
// =============================================================================

/** Who asserted a fact */
export type FactSource = 'user' | 'ai' | 'reviewer';

/** Runtime constant for fact source validation */
export const FACT_SOURCES: readonly FactSource[] = ['user', 'ai', 'reviewer'] as const;

export type FactScalar = string | number | boolean;

/** Fact values are scalars; null means "asserted unknown" and is treated as absent */
export type FactValue = FactScalar | null;

/**
 * A single observed attribute of a case.
 * Several facts may share a key; the most recently created one is current.
 */
export interface Fact {
  key: string;
  value: FactValue;
  source: FactSource;
  /** RFC3339 creation time */
  created_at: string;
}

/** Fact as persisted by the fact store */
export interface StoredFact extends Fact {
  fact_id: string;
  case_id: string;
}

/** Flat map of current fact values, keyed by fact key. Absent keys are missing facts. */
export type FactValues = Readonly<Record<string, FactScalar>>;

/** Coercion context a variable is used in, inferred from the expression */
export type UsageContext = 'number' | 'boolean';

// =============================================================================
// Expression Types
// =============================================================================

export type ComparisonOperator = '==' | '===' | '!=' | '!==' | '<' | '<=' | '>' | '>=';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | 'min' | 'max';

export type BinaryOperator = ComparisonOperator | ArithmeticOperator | 'in';

export type UnaryOperator = '!' | '!!' | '-';

export type LogicOperator = 'and' | 'or';

/** Literal operand: a scalar, null, or a flat list of scalars (for `in`) */
export type ConstantValue = FactScalar | null | Array<FactScalar | null>;

/** Fixed value, independent of facts */
export interface ConstantNode {
  kind: 'constant';
  path: string;
  value: ConstantValue;
}

/** Reference to a fact by key */
export interface VariableNode {
  kind: 'variable';
  path: string;
  name: string;
}

export interface UnaryNode {
  kind: 'unary';
  path: string;
  operator: UnaryOperator;
  operand: ExpressionNode;
}

export interface BinaryNode {
  kind: 'binary';
  path: string;
  operator: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

/** Short-circuit AND / OR over one or more operands */
export interface LogicNode {
  kind: 'logic';
  path: string;
  operator: LogicOperator;
  operands: ExpressionNode[];
}

/** if / else-if / else chain */
export interface ConditionalNode {
  kind: 'conditional';
  path: string;
  branches: Array<{ condition: ExpressionNode; then: ExpressionNode }>;
  otherwise: ExpressionNode | null;
}

/** Typed expression tree, built once by the expression validator */
export type ExpressionNode =
  | ConstantNode
  | VariableNode
  | UnaryNode
  | BinaryNode
  | LogicNode
  | ConditionalNode;

/** Structural problem found while validating an expression */
export interface ExpressionIssue {
  path: string;
  message: string;
}

/** Result of validating an authored expression */
export type ExpressionValidation =
  | {
      ok: true;
      ast: ExpressionNode;
      /** Variable names in first-occurrence order */
      variables_referenced: string[];
      /** Coercion context per variable, where exactly one could be inferred */
      usage: Readonly<Record<string, UsageContext>>;
    }
  | { ok: false; errors: ExpressionIssue[] };

// =============================================================================
// Requirement Evaluation Types
// =============================================================================

export type RequirementStatus = 'passed' | 'failed' | 'missing_facts' | 'error';

export type EvaluationErrorKind =
  | 'invalid_expression'
  | 'division_by_zero'
  | 'type_mismatch'
  | 'non_finite_result'
  | 'null_result'
  | 'non_boolean_result';

export interface EvaluationError {
  kind: EvaluationErrorKind;
  message: string;
}

/** Outcome of evaluating one expression against one fact set */
export interface RequirementOutcome {
  status: RequirementStatus;
  variables_referenced: string[];
  missing_facts: string[];
  error: EvaluationError | null;
}

/** RequirementOutcome tagged with the requirement it belongs to */
export interface RequirementResult extends RequirementOutcome {
  requirement_code: string;
  label: string;
  mandatory: boolean;
}

// =============================================================================
// Rule Version Types
// =============================================================================

/** Inclusive date range (YYYY-MM-DD). effective_to null = open-ended. */
export interface DateRange {
  effective_from: string;
  effective_to: string | null;
}

/** One declarative condition within a rule version */
export interface Requirement {
  requirement_code: string;
  label: string;
  mandatory: boolean;
  expression: JsonValue;
}

/** Temporally scoped snapshot of requirements for a rule set */
export interface RuleVersion extends DateRange {
  rule_version_id: string;
  rule_set_id: string;
  published: boolean;
  /** Incremented on every mutation; used for compare-and-swap writes only */
  monotonic_version: number;
  /** RFC3339 */
  created_at: string;
  requirements: Requirement[];
}

export type RangeRelation = 'no_conflict' | 'overlap' | 'contains' | 'contained_by';

export type ConflictType = Exclude<RangeRelation, 'no_conflict'>;

/** Existing version whose range collides with a proposed range */
export interface RuleVersionConflict extends DateRange {
  rule_version_id: string;
  published: boolean;
  conflict_type: ConflictType;
}

/** Intersection of two published versions (data-integrity report) */
export interface RangeOverlap extends DateRange {
  rule_version_ids: [string, string];
}

/** Discriminated outcome of rule version resolution */
export type ResolutionOutcome =
  | { ok: true; version: RuleVersion; warnings: string[] }
  | { ok: false; error: RejectionReason };

/** Requirement-level differences between two rule versions */
export interface RuleVersionComparison {
  added: Requirement[];
  removed: Requirement[];
  modified: Array<{
    requirement_code: string;
    changes: Array<{ field: 'label' | 'mandatory' | 'expression'; old: JsonValue; new: JsonValue }>;
  }>;
  unchanged: string[];
}

// =============================================================================
// Eligibility Types
// =============================================================================

export type EligibilityOutcome = 'eligible' | 'not_eligible' | 'requires_review';

/** Runtime constant for outcome validation */
export const ELIGIBILITY_OUTCOMES: readonly EligibilityOutcome[] = [
  'eligible',
  'not_eligible',
  'requires_review',
] as const;

/** Confidence thresholds applied by the result aggregator */
export interface AggregationPolicy {
  eligibleThreshold: number;
  notEligibleThreshold: number;
}

/** Deterministic verdict for one (rule version, fact set) */
export interface AggregateResult {
  outcome: EligibilityOutcome;
  confidence: number;
  requirements_total: number;
  requirements_passed: number;
  requirements_failed: number;
  requirements_missing_facts: number;
  requirements_errored: number;
  missing_facts: string[];
  /** Missing keys referenced by at least one mandatory requirement */
  mandatory_missing_facts: string[];
  warnings: string[];
  requirement_results: RequirementResult[];
}

export interface Citation {
  source: string;
  excerpt?: string;
}

/** Probabilistic verdict produced outside the engine */
export interface AIVerdict {
  outcome: EligibilityOutcome;
  confidence: number;
  reasoning: string;
  citations: Citation[];
}

export type EscalationReason =
  | 'low_confidence'
  | 'rule_ai_conflict'
  | 'missing_mandatory_facts'
  | 'no_active_rule_version';

/** Fusion weights and escalation floor for the eligibility combiner */
export interface CombinerPolicy {
  confidenceFloor: number;
  ruleEngineWeight: number;
  aiWeight: number;
}

/** Rule verdict fused with the AI verdict */
export interface CombinedResult {
  outcome: EligibilityOutcome;
  confidence: number;
  conflict_detected: boolean;
  requires_review: boolean;
  escalation_reasons: EscalationReason[];
  reasoning_summary: string;
  aggregate: AggregateResult;
  ai_verdict: AIVerdict;
}

/** Stored, immutable record of one eligibility check */
export interface EligibilityResult {
  result_id: string;
  case_id: string;
  rule_set_id: string;
  rule_version_id: string | null;
  /** Evaluation date (YYYY-MM-DD) */
  as_of: string;
  /** RFC3339 */
  evaluated_at: string;
  outcome: EligibilityOutcome;
  confidence: number;
  conflict_detected: boolean;
  requires_review: boolean;
  escalation_reasons: EscalationReason[];
  reasoning_summary: string;
  aggregate: AggregateResult | null;
  ai_verdict: AIVerdict | null;
  warnings: string[];
}

/** Request to run an eligibility check */
export interface EligibilityCheckRequest {
  case_id: string;
  rule_set_id: string;
  /** YYYY-MM-DD; defaults to today (UTC) */
  as_of?: string;
}

/** Discriminated outcome for runEligibilityCheck */
export type EligibilityCheckOutcome =
  | { ok: true; result: EligibilityResult }
  | { ok: false; errors: RejectionReason[] };

/** Request for GET /v1/eligibility-results */
export interface GetEligibilityResultsRequest {
  case_id: string;
  page_token?: string;
  page_size?: number;
}

/** Response for GET /v1/eligibility-results */
export interface GetEligibilityResultsResponse {
  case_id: string;
  results: EligibilityResult[];
  next_page_token: string | null;
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

/** Read-only fact history for a case; latest-per-key resolution is the engine's job */
export interface FactProvider {
  currentFacts(caseId: string): Fact[];
}

/** Read-only published rule versions for a rule set */
export interface RuleVersionProvider {
  publishedVersions(ruleSetId: string): RuleVersion[];
}

/** Opaque AI reasoning call */
export interface AIReasoningProvider {
  evaluate(caseId: string, ruleSetId: string): Promise<AIVerdict>;
}
