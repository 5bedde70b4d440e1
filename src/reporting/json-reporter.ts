/**
 * Machine-readable JSON report of a refinement run.
 *
 * Contains every iteration's metrics, feedback and phase timings, plus
 * the reported rules in rule-file form.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import type { RuleDocument } from '@/generation/rule-schema.js';
import { toRuleDocument } from '@/generation/rule-schema.js';
import type { RefinementOutcome, RefinementStatus } from '@/refinement/controller.js';
import type {
  AggregateMetrics,
  EvaluationResult,
  IterationResult,
  IterationStatus,
  PhaseTimings,
  QualityThresholds,
  RuleMetrics,
} from '@/types/evaluation.js';
import type { FeedbackReport } from '@/types/feedback.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type EvaluationSummary =
  | {
      status: 'completed';
      runTag: string;
      provisioning: string;
      ingestion: { attempted: number; failed: number };
      teardown: string;
      durationMs: number;
    }
  | { status: 'backend_unavailable'; reason: string; durationMs: number };

export interface IterationReport {
  iteration: number;
  status: IterationStatus;
  durationMs: number;
  timings: PhaseTimings;
  ruleCount: number;
  aggregate: AggregateMetrics | null;
  ruleMetrics: RuleMetrics[];
  evaluation: EvaluationSummary | null;
  feedback: FeedbackReport | null;
  error?: IterationResult['error'];
}

export interface RunReport {
  metadata: {
    generatedAt: string;
    version: string;
    source: string;
    backend: string;
    processingTimeMs: number;
  };
  status: RefinementStatus;
  thresholds: QualityThresholds;
  generatorInvocations: number;
  reportedIteration: number | null;
  iterations: IterationReport[];
  rules: RuleDocument[];
  cost?: { totalUsd: number; totalTokens: number; requestCount: number };
}

/** Report of a one-shot evaluation of existing rule files. */
export interface EvaluationReport {
  metadata: RunReport['metadata'];
  passed: boolean;
  thresholds: QualityThresholds;
  evaluation: EvaluationSummary;
  aggregate: AggregateMetrics | null;
  ruleMetrics: RuleMetrics[];
  feedback: FeedbackReport | null;
}

export interface RunReportContext {
  version: string;
  source: string;
  backend: string;
  processingTimeMs: number;
  cost?: RunReport['cost'];
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the report for a finished run. The reported rules come from the
 * best iteration, or from the final one when nothing was scored.
 */
export function buildRunReport(outcome: RefinementOutcome, context: RunReportContext): RunReport {
  const reported = outcome.bestIteration ?? outcome.finalIteration;

  return {
    metadata: buildMetadata(context),
    status: outcome.status,
    thresholds: outcome.thresholds,
    generatorInvocations: outcome.generatorInvocations,
    reportedIteration: reported.batch ? reported.iteration : null,
    iterations: outcome.history.map(toIterationReport),
    rules: reported.batch ? reported.batch.rules.map(toRuleDocument) : [],
    ...(context.cost ? { cost: context.cost } : {}),
  };
}

export interface EvaluationReportInput {
  thresholds: QualityThresholds;
  evaluation: EvaluationResult;
  ruleMetrics: RuleMetrics[];
  aggregate: AggregateMetrics | null;
  passed: boolean;
  feedback: FeedbackReport | null;
}

export function buildEvaluationReport(input: EvaluationReportInput, context: RunReportContext): EvaluationReport {
  return {
    metadata: buildMetadata(context),
    passed: input.passed,
    thresholds: input.thresholds,
    evaluation: summarizeEvaluation(input.evaluation),
    aggregate: input.aggregate,
    ruleMetrics: input.ruleMetrics,
    feedback: input.feedback,
  };
}

export function generateJsonReport(report: RunReport | EvaluationReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Write the report to disk, creating parent directories as needed.
 */
export function writeRunReport(report: RunReport | EvaluationReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, generateJsonReport(report), 'utf-8');
}

export function summarizeEvaluation(evaluation: EvaluationResult): EvaluationSummary {
  if (evaluation.status === 'backend_unavailable') {
    return { status: evaluation.status, reason: evaluation.reason, durationMs: evaluation.durationMs };
  }
  return {
    status: evaluation.status,
    runTag: evaluation.runTag,
    provisioning: evaluation.provisioning,
    ingestion: evaluation.ingestion,
    teardown: evaluation.teardown,
    durationMs: evaluation.durationMs,
  };
}

function buildMetadata(context: RunReportContext): RunReport['metadata'] {
  return {
    generatedAt: (context.now ?? (() => new Date()))().toISOString(),
    version: context.version,
    source: context.source,
    backend: context.backend,
    processingTimeMs: context.processingTimeMs,
  };
}

function toIterationReport(result: IterationResult): IterationReport {
  return {
    iteration: result.iteration,
    status: result.status,
    durationMs: result.durationMs,
    timings: result.timings,
    ruleCount: result.batch?.rules.length ?? 0,
    aggregate: result.aggregate,
    ruleMetrics: result.ruleMetrics,
    evaluation: result.evaluation ? summarizeEvaluation(result.evaluation) : null,
    feedback: result.feedback,
    ...(result.error ? { error: result.error } : {}),
  };
}
