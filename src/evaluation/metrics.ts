/**
 * Metrics engine: confusion matrix and quality scores per rule and per batch.
 *
 * Category handling:
 *   - TP cases: match -> TP, no match -> FN
 *   - FP and TN cases: match -> FP, no match -> TN
 *   - FN cases (evasions): no match confirms the evasion, a match is an
 *     anomaly on the test case; neither enters the rule's own matrix
 *   - errored cases are counted apart and excluded from every denominator
 */

import type { RuleBatch } from '@/types/detection-rule.js';
import type {
  AggregateMetrics,
  ClassificationOutcome,
  QualityThresholds,
  RuleMetrics,
} from '@/types/evaluation.js';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function scoreRule(ruleId: string, outcomes: readonly ClassificationOutcome[]): RuleMetrics {
  let truePositives = 0;
  let falsePositives = 0;
  let trueNegatives = 0;
  let falseNegatives = 0;
  let evasionConfirmed = 0;
  let erroredCases = 0;
  const anomalousTestCaseIds: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'errored') {
      erroredCases++;
      continue;
    }

    const matched = outcome.actualMatch;
    switch (outcome.category) {
      case 'TP':
        if (matched) truePositives++;
        else falseNegatives++;
        break;
      case 'FP':
      case 'TN':
        if (matched) falsePositives++;
        else trueNegatives++;
        break;
      case 'FN':
        if (matched) anomalousTestCaseIds.push(outcome.testCaseId);
        else evasionConfirmed++;
        break;
    }
  }

  const precision = ratio(truePositives, truePositives + falsePositives);
  const recall = ratio(truePositives, truePositives + falseNegatives);
  const scorableCases = truePositives + falsePositives + trueNegatives + falseNegatives;

  return {
    ruleId,
    truePositives,
    falsePositives,
    trueNegatives,
    falseNegatives,
    evasionConfirmed,
    evasionAnomalies: anomalousTestCaseIds.length,
    anomalousTestCaseIds,
    erroredCases,
    scorableCases,
    precision,
    recall,
    f1: harmonicMean(precision, recall),
    accuracy: ratio(truePositives + trueNegatives, scorableCases),
  };
}

/**
 * Score every rule of a batch, in batch order. Rules without outcomes
 * score as empty.
 */
export function scoreBatch(
  batch: RuleBatch,
  outcomes: ReadonlyMap<string, readonly ClassificationOutcome[]>,
): RuleMetrics[] {
  return batch.rules.map((rule) => scoreRule(rule.id, outcomes.get(rule.id) ?? []));
}

/**
 * Macro averages over rules with at least one scorable case, plus pooled
 * (micro) counts over all rules.
 */
export function aggregateMetrics(ruleMetrics: readonly RuleMetrics[]): AggregateMetrics {
  const scored = ruleMetrics.filter((m) => m.scorableCases > 0);
  const mean = (pick: (m: RuleMetrics) => number): number =>
    scored.length === 0 ? 0 : scored.reduce((sum, m) => sum + pick(m), 0) / scored.length;

  const sum = (pick: (m: RuleMetrics) => number): number => ruleMetrics.reduce((acc, m) => acc + pick(m), 0);
  const truePositives = sum((m) => m.truePositives);
  const falsePositives = sum((m) => m.falsePositives);
  const trueNegatives = sum((m) => m.trueNegatives);
  const falseNegatives = sum((m) => m.falseNegatives);
  const pooledPrecision = ratio(truePositives, truePositives + falsePositives);
  const pooledRecall = ratio(truePositives, truePositives + falseNegatives);

  return {
    ruleCount: ruleMetrics.length,
    scoredRuleCount: scored.length,
    unscorableRuleIds: ruleMetrics.filter((m) => m.scorableCases === 0).map((m) => m.ruleId),
    precision: mean((m) => m.precision),
    recall: mean((m) => m.recall),
    f1: mean((m) => m.f1),
    accuracy: mean((m) => m.accuracy),
    erroredCases: sum((m) => m.erroredCases),
    pooled: {
      truePositives,
      falsePositives,
      trueNegatives,
      falseNegatives,
      precision: pooledPrecision,
      recall: pooledRecall,
      f1: harmonicMean(pooledPrecision, pooledRecall),
    },
  };
}

/**
 * True when both precision and recall reach their thresholds. A batch
 * with no scorable rule never passes.
 */
export function meetsThresholds(
  aggregate: AggregateMetrics,
  thresholds: Pick<QualityThresholds, 'minPrecision' | 'minRecall'>,
): boolean {
  if (aggregate.scoredRuleCount === 0) return false;
  return aggregate.precision >= thresholds.minPrecision && aggregate.recall >= thresholds.minRecall;
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

function harmonicMean(precision: number, recall: number): number {
  return precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
}
