/**
 * Evaluation, scoring, and iteration types.
 */

import type { RuleBatch, TestCategory } from './detection-rule.js';
import type { FeedbackReport } from './feedback.js';

// --- Backend schema ---

/**
 * Field types the harness provisions.
 *
 * - wildcard: pattern-capable, substring and wildcard queries match the whole value
 * - keyword:  exact-match
 * - text:     tokenized and lowercased
 * - date:     ISO-8601 timestamps
 */
export type FieldType = 'wildcard' | 'keyword' | 'text' | 'date';

export type FieldTypeMap = Record<string, FieldType>;

export type ProvisionAction = 'created' | 'reused' | 'extended' | 'recreated';

// --- Classification ---

export type EvaluationErrorKind = 'malformed_query' | 'backend_error' | 'ingestion_failed';

interface OutcomeBase {
  ruleId: string;
  testCaseId: string;
  category: TestCategory;
  expectedMatch: boolean;
  documentId: string;
}

export interface ScoredOutcome extends OutcomeBase {
  status: 'scored';
  actualMatch: boolean;
  correct: boolean;
}

export interface ErroredOutcome extends OutcomeBase {
  status: 'errored';
  actualMatch: 'indeterminate';
  errorKind: EvaluationErrorKind;
  message: string;
}

export type ClassificationOutcome = ScoredOutcome | ErroredOutcome;

// --- Harness results ---

export interface CompletedEvaluation {
  status: 'completed';
  runTag: string;
  /** Outcomes keyed by rule id, in test case order. */
  outcomes: ReadonlyMap<string, ClassificationOutcome[]>;
  /** Field types as the backend actually holds them after provisioning. */
  fieldTypes: FieldTypeMap;
  provisioning: ProvisionAction;
  ingestion: { attempted: number; failed: number };
  teardown: 'cleaned' | 'retained' | 'failed';
  durationMs: number;
}

export interface UnavailableEvaluation {
  status: 'backend_unavailable';
  reason: string;
  durationMs: number;
}

export type EvaluationResult = CompletedEvaluation | UnavailableEvaluation;

// --- Metrics ---

export interface RuleMetrics {
  ruleId: string;
  truePositives: number;
  falsePositives: number;
  trueNegatives: number;
  falseNegatives: number;
  /** FN-category cases that indeed did not match. */
  evasionConfirmed: number;
  /** FN-category cases that matched anyway (label anomaly on the case). */
  evasionAnomalies: number;
  anomalousTestCaseIds: string[];
  erroredCases: number;
  /** TP + FP + TN + FN. */
  scorableCases: number;
  precision: number;
  recall: number;
  f1: number;
  accuracy: number;
}

export interface AggregateMetrics {
  ruleCount: number;
  scoredRuleCount: number;
  /** Rules without a single scorable case; excluded from the means. */
  unscorableRuleIds: string[];
  precision: number;
  recall: number;
  f1: number;
  accuracy: number;
  erroredCases: number;
  pooled: {
    truePositives: number;
    falsePositives: number;
    trueNegatives: number;
    falseNegatives: number;
    precision: number;
    recall: number;
    f1: number;
  };
}

// --- Thresholds ---

export interface QualityThresholds {
  readonly minPrecision: number;
  readonly minRecall: number;
  readonly maxIterations: number;
}

// --- Iterations ---

export type IterationStatus =
  | 'accepted'
  | 'retrying_with_feedback'
  | 'exhausted_retries'
  | 'skipped_no_backend'
  | 'generator_contract_violation';

export interface PhaseSpan {
  startedAt: string;
  endedAt: string;
}

export interface PhaseTimings {
  generation: PhaseSpan;
  evaluation?: PhaseSpan;
  scoring?: PhaseSpan;
}

export interface IterationResult {
  iteration: number;
  status: IterationStatus;
  batch: RuleBatch | null;
  ruleMetrics: RuleMetrics[];
  aggregate: AggregateMetrics | null;
  evaluation: EvaluationResult | null;
  /** Feedback produced from this iteration's results, if any. */
  feedback: FeedbackReport | null;
  timings: PhaseTimings;
  durationMs: number;
  /** Set when the generator broke its contract or the backend was absent. */
  error?: { kind: 'generator_contract_violation' | 'backend_unavailable'; message: string; issues: string[] };
}
