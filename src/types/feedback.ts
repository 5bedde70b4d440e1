/**
 * Structured feedback handed back to the rule generator between iterations.
 */

import type { TestCategory } from './detection-rule.js';

/**
 * Fixed taxonomy of failure hypotheses. Assignment is rule-based on the
 * confusion matrix and outcome detail, never free-form.
 */
export type FailureCategory =
  | 'no_test_cases'
  | 'missing_positive_cases'
  | 'malformed_query'
  | 'unknown_field'
  | 'evaluation_errors'
  | 'field_type_mismatch'
  | 'payload_field_mismatch'
  | 'query_too_broad'
  | 'query_too_narrow'
  | 'query_unbalanced'
  | 'evasion_label_anomaly';

export interface FailureHypothesis {
  category: FailureCategory;
  summary: string;
  evidence: string;
}

export interface FailingMetric {
  metric: 'precision' | 'recall';
  value: number;
  threshold: number;
}

export interface MisclassifiedCase {
  testCaseId: string;
  category: TestCategory;
  expectedMatch: boolean;
  actualMatch: boolean | 'indeterminate';
  payloadSnippet: string;
  note?: string;
}

export interface RuleFeedback {
  ruleId: string;
  ruleName: string;
  query: string;
  failingMetrics: FailingMetric[];
  counts: {
    truePositives: number;
    falsePositives: number;
    trueNegatives: number;
    falseNegatives: number;
    erroredCases: number;
    evasionAnomalies: number;
  };
  hypotheses: FailureHypothesis[];
  misclassified: MisclassifiedCase[];
  suggestions: string[];
}

export interface FeedbackReport {
  iteration: number;
  thresholds: { minPrecision: number; minRecall: number };
  aggregate: { precision: number; recall: number; f1: number };
  rules: RuleFeedback[];
  passingRuleIds: string[];
}
