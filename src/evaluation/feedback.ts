/**
 * Feedback synthesizer: turns an evaluated iteration into structured,
 * rule-by-rule guidance for the next generation attempt.
 *
 * Hypotheses come from a fixed taxonomy and are assigned by deterministic
 * checks over the confusion matrix and the outcome detail. The report
 * names fields but carries no other backend detail.
 */

import type { Rule, RuleBatch, TestCase } from '@/types/detection-rule.js';
import type {
  AggregateMetrics,
  ClassificationOutcome,
  CompletedEvaluation,
  FieldTypeMap,
  QualityThresholds,
  RuleMetrics,
} from '@/types/evaluation.js';
import type {
  FailingMetric,
  FailureCategory,
  FailureHypothesis,
  FeedbackReport,
  MisclassifiedCase,
  RuleFeedback,
} from '@/types/feedback.js';
import { checkQueryFields } from '@/knowledge/ecs/catalog.js';
import { collectFieldUsages, extractQueryFields, matchesDocument, parseQuery } from '@/query/lucene.js';
import type { QueryNode } from '@/query/lucene.js';
import { MalformedQueryError } from '@/utils/errors.js';
import { flattenPayload } from '@/utils/flatten.js';
import type { FlatDocument } from '@/utils/flatten.js';

const SNIPPET_LIMIT = 200;

/**
 * Sysmon-style field names and their ECS counterparts.
 */
const SYSMON_TO_ECS: Readonly<Record<string, string>> = {
  Image: 'process.executable',
  CommandLine: 'process.command_line',
  ParentImage: 'process.parent.executable',
  ParentCommandLine: 'process.parent.command_line',
  ProcessId: 'process.pid',
  ProcessGuid: 'process.entity_id',
  User: 'user.name',
  TargetFilename: 'file.path',
  TargetObject: 'registry.path',
  EventID: 'event.code',
  UtcTime: '@timestamp',
  DestinationIp: 'destination.ip',
  DestinationPort: 'destination.port',
  SourceIp: 'source.ip',
  SourcePort: 'source.port',
};

const SUGGESTIONS: Readonly<Record<FailureCategory, string>> = {
  no_test_cases: 'Add labeled test cases: at least one TP attack payload and one TN or FP benign payload.',
  missing_positive_cases: 'Add at least one TP test case containing the attack behaviour the rule must match.',
  malformed_query: 'Fix the query syntax: balance parentheses and quotes, and escape "/" and other reserved characters with a backslash.',
  unknown_field: 'Query ECS fields, or fields the test payloads carry; check the field names for typos.',
  evaluation_errors: 'Keep payloads to flat JSON values and simple nesting so every test case can be indexed and searched.',
  field_type_mismatch: 'The field holding the value is not pattern-capable; match whole values exactly or query a field that supports wildcards.',
  payload_field_mismatch: 'Use the same field names in the query and the test payloads, preferably ECS names.',
  query_too_broad: 'Tighten the query: add AND conditions or more specific values so the benign cases no longer match.',
  query_too_narrow: 'Broaden the query: add OR alternatives or wildcards for the attack variants that were missed.',
  query_unbalanced: 'Rework the core condition: it both misses attack cases and matches benign ones.',
  evasion_label_anomaly: 'Review FN-labeled cases that matched: either relabel them TP or change the payload so it is a real evasion.',
};

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface FeedbackInput {
  iteration: number;
  batch: RuleBatch;
  evaluation: CompletedEvaluation;
  ruleMetrics: readonly RuleMetrics[];
  aggregate: AggregateMetrics;
  thresholds: Pick<QualityThresholds, 'minPrecision' | 'minRecall'>;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function synthesizeFeedback(input: FeedbackInput): FeedbackReport {
  const { batch, evaluation, thresholds } = input;
  const metricsById = new Map(input.ruleMetrics.map((m) => [m.ruleId, m]));

  const rules: RuleFeedback[] = [];
  const passingRuleIds: string[] = [];

  for (const rule of batch.rules) {
    const metrics = metricsById.get(rule.id);
    if (!metrics) continue;

    const outcomes = evaluation.outcomes.get(rule.id) ?? [];
    const failingMetrics = findFailingMetrics(metrics, thresholds);
    const unknownFields = findUnknownFields(rule);
    const needsFeedback =
      failingMetrics.length > 0 ||
      metrics.erroredCases > 0 ||
      metrics.evasionAnomalies > 0 ||
      unknownFields.length > 0 ||
      rule.testCases.length === 0;

    if (!needsFeedback) {
      passingRuleIds.push(rule.id);
      continue;
    }

    rules.push(buildRuleFeedback(rule, metrics, outcomes, failingMetrics, unknownFields, evaluation.fieldTypes));
  }

  return {
    iteration: input.iteration,
    thresholds: { minPrecision: thresholds.minPrecision, minRecall: thresholds.minRecall },
    aggregate: {
      precision: input.aggregate.precision,
      recall: input.aggregate.recall,
      f1: input.aggregate.f1,
    },
    rules,
    passingRuleIds,
  };
}

function findFailingMetrics(
  metrics: RuleMetrics,
  thresholds: Pick<QualityThresholds, 'minPrecision' | 'minRecall'>,
): FailingMetric[] {
  const failing: FailingMetric[] = [];
  if (metrics.precision < thresholds.minPrecision) {
    failing.push({ metric: 'precision', value: metrics.precision, threshold: thresholds.minPrecision });
  }
  if (metrics.recall < thresholds.minRecall) {
    failing.push({ metric: 'recall', value: metrics.recall, threshold: thresholds.minRecall });
  }
  return failing;
}

// ---------------------------------------------------------------------------
// Per-rule analysis
// ---------------------------------------------------------------------------

function buildRuleFeedback(
  rule: Rule,
  metrics: RuleMetrics,
  outcomes: readonly ClassificationOutcome[],
  failingMetrics: FailingMetric[],
  unknownFields: readonly string[],
  fieldTypes: FieldTypeMap,
): RuleFeedback {
  const testCases = new Map(rule.testCases.map((tc) => [tc.id, tc]));
  const hypotheses: FailureHypothesis[] = [];
  const suggestions: string[] = [];
  const add = (category: FailureCategory, summary: string, evidence: string): void => {
    hypotheses.push({ category, summary, evidence });
    suggestions.push(SUGGESTIONS[category]);
  };

  const parsed = tryParse(rule.query);
  const missedPositives = outcomes
    .filter((o) => o.status === 'scored' && o.category === 'TP' && !o.actualMatch)
    .flatMap((o) => {
      const testCase = testCases.get(o.testCaseId);
      return testCase ? [testCase] : [];
    });

  if (rule.testCases.length === 0) {
    add('no_test_cases', 'The rule has no test cases, so it cannot be scored.', 'testCases is empty');
  } else if (!rule.testCases.some((tc) => tc.category === 'TP')) {
    add(
      'missing_positive_cases',
      'The rule has no TP test case, so recall cannot be measured.',
      `categories present: ${[...new Set(rule.testCases.map((tc) => tc.category))].join(', ')}`,
    );
  }

  const malformed = outcomes.filter((o) => o.status === 'errored' && o.errorKind === 'malformed_query');
  if (malformed.length > 0) {
    const detail = parsed instanceof MalformedQueryError ? parsed.message : 'the search backend rejected the query syntax';
    add('malformed_query', 'The query could not be parsed.', detail);
  }

  if (unknownFields.length > 0) {
    add(
      'unknown_field',
      'The query references fields that are not in ECS and not in any test payload.',
      `unknown fields: ${unknownFields.join(', ')}`,
    );
    suggestions.push(...unknownFields.flatMap(ecsRenameHint));
  }

  const otherErrors = outcomes.filter((o) => o.status === 'errored' && o.errorKind !== 'malformed_query');
  if (otherErrors.length > 0) {
    const byKind = countBy(otherErrors.map((o) => (o.status === 'errored' ? o.errorKind : 'unknown')));
    add(
      'evaluation_errors',
      `${otherErrors.length} test case(s) could not be evaluated.`,
      Object.entries(byKind).map(([kind, count]) => `${kind}: ${count}`).join(', '),
    );
  }

  let mismatchFound = false;
  if (!(parsed instanceof MalformedQueryError) && missedPositives.length > 0) {
    const typeMismatch = detectFieldTypeMismatch(parsed, missedPositives, fieldTypes);
    if (typeMismatch) {
      mismatchFound = true;
      add(
        'field_type_mismatch',
        'Missed attack cases match once the queried fields support pattern matching.',
        typeMismatch,
      );
    }

    const payloadMismatch = detectPayloadFieldMismatch(parsed, missedPositives);
    if (payloadMismatch) {
      mismatchFound = true;
      add(
        'payload_field_mismatch',
        'Missed attack cases do not contain fields the query depends on.',
        payloadMismatch.evidence,
      );
      suggestions.push(...payloadMismatch.ecsHints);
    }
  }

  if (metrics.falsePositives > 0 && metrics.falseNegatives === 0) {
    add('query_too_broad', 'The query matches benign cases.', `FP=${metrics.falsePositives}, FN=0`);
  }
  if (metrics.falseNegatives > 0 && metrics.falsePositives === 0 && !mismatchFound) {
    add('query_too_narrow', 'The query misses attack cases.', `FN=${metrics.falseNegatives}, FP=0`);
  }
  if (metrics.falsePositives > 0 && metrics.falseNegatives > 0) {
    add(
      'query_unbalanced',
      'The query both misses attack cases and matches benign ones.',
      `FP=${metrics.falsePositives}, FN=${metrics.falseNegatives}`,
    );
  }
  if (metrics.evasionAnomalies > 0) {
    add(
      'evasion_label_anomaly',
      'Evasion (FN) test cases matched the rule.',
      `test cases: ${metrics.anomalousTestCaseIds.join(', ')}`,
    );
  }

  return {
    ruleId: rule.id,
    ruleName: rule.name,
    query: rule.query,
    failingMetrics,
    counts: {
      truePositives: metrics.truePositives,
      falsePositives: metrics.falsePositives,
      trueNegatives: metrics.trueNegatives,
      falseNegatives: metrics.falseNegatives,
      erroredCases: metrics.erroredCases,
      evasionAnomalies: metrics.evasionAnomalies,
    },
    hypotheses,
    misclassified: collectMisclassified(outcomes, testCases),
    suggestions: [...new Set(suggestions)],
  };
}

/**
 * Re-evaluate missed TP cases with every queried field treated as
 * pattern-capable. Returns evidence when at least one then matches.
 */
function detectFieldTypeMismatch(
  node: QueryNode,
  missed: readonly TestCase[],
  fieldTypes: FieldTypeMap,
): string | null {
  const usages = collectFieldUsages(node);
  const relaxed: FieldTypeMap = { ...fieldTypes };
  for (const usage of usages) {
    relaxed[usage.field] = 'wildcard';
  }

  const recovered = missed.filter((tc) => matchesDocument(node, documentFor(tc), relaxed));
  if (recovered.length === 0) return null;

  const offending = usages
    .filter((u) => u.pattern && (fieldTypes[u.field] ?? 'keyword') !== 'wildcard')
    .map((u) => `${u.field} (${fieldTypes[u.field] ?? 'keyword'})`);

  const fields = offending.length > 0 ? offending.join(', ') : 'the queried fields';
  return `${recovered.length} missed TP case(s) (${recovered.map((tc) => tc.id).join(', ')}) match under pattern semantics; not pattern-capable: ${fields}`;
}

function detectPayloadFieldMismatch(
  node: QueryNode,
  missed: readonly TestCase[],
): { evidence: string; ecsHints: string[] } | null {
  const required = collectFieldUsages(node)
    .filter((u) => !u.negated)
    .map((u) => u.field);
  if (required.length === 0) return null;

  const absent = new Set<string>();
  const affected: string[] = [];
  const payloadFields = new Set<string>();

  for (const testCase of missed) {
    const doc = flattenPayload(testCase.payload);
    Object.keys(doc).forEach((f) => payloadFields.add(f));
    const missing = required.filter((field) => !(field in doc));
    if (missing.length > 0) {
      affected.push(testCase.id);
      missing.forEach((f) => absent.add(f));
    }
  }
  if (affected.length === 0) return null;

  const ecsHints = [...absent, ...payloadFields].flatMap(ecsRenameHint);

  return {
    evidence: `fields missing from ${affected.join(', ')}: ${[...absent].join(', ')}`,
    ecsHints: [...new Set(ecsHints)],
  };
}

function ecsRenameHint(field: string): string[] {
  const leaf = field.split('.').pop() ?? field;
  const ecs = SYSMON_TO_ECS[leaf];
  return ecs && ecs !== field ? [`Rename ${field} to its ECS equivalent ${ecs} in both query and payloads.`] : [];
}

/**
 * Named fields of the query that neither ECS nor the rule's own payloads
 * account for. Unparseable queries have none.
 */
function findUnknownFields(rule: Rule): string[] {
  const payloadFields = new Set(rule.testCases.flatMap((tc) => Object.keys(flattenPayload(tc.payload))));
  return checkQueryFields(
    extractQueryFields(rule.query).map((u) => u.field),
    payloadFields,
  ).unknown;
}

function collectMisclassified(
  outcomes: readonly ClassificationOutcome[],
  testCases: ReadonlyMap<string, TestCase>,
): MisclassifiedCase[] {
  const misclassified: MisclassifiedCase[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'scored' && outcome.correct) continue;

    const testCase = testCases.get(outcome.testCaseId);
    const entry: MisclassifiedCase = {
      testCaseId: outcome.testCaseId,
      category: outcome.category,
      expectedMatch: outcome.expectedMatch,
      actualMatch: outcome.actualMatch,
      payloadSnippet: testCase ? payloadSnippet(testCase) : '',
    };

    if (outcome.status === 'errored') {
      entry.note = `not evaluated (${outcome.errorKind})`;
    } else if (outcome.category === 'FN') {
      entry.note = 'evasion variant matched';
    }
    misclassified.push(entry);
  }

  return misclassified;
}

export function payloadSnippet(testCase: TestCase): string {
  const json = JSON.stringify(testCase.payload);
  return json.length <= SNIPPET_LIMIT ? json : `${json.substring(0, SNIPPET_LIMIT - 3)}...`;
}

function documentFor(testCase: TestCase): FlatDocument {
  return { 'event.kind': 'event', ...flattenPayload(testCase.payload) };
}

function tryParse(query: string): QueryNode | MalformedQueryError {
  try {
    return parseQuery(query);
  } catch (error) {
    if (error instanceof MalformedQueryError) return error;
    throw error;
  }
}

function countBy(values: readonly string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}
