export { Classifier } from './classifier.js';
export { EvaluationHarness } from './harness.js';
export type { HarnessOptions, RuleEvaluator } from './harness.js';
export { scoreRule, scoreBatch, aggregateMetrics, meetsThresholds } from './metrics.js';
export { synthesizeFeedback, payloadSnippet } from './feedback.js';
export type { FeedbackInput } from './feedback.js';
