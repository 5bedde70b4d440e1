import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  buildEvaluationReport,
  buildRunReport,
  generateJsonReport,
  summarizeEvaluation,
  writeRunReport,
} from '../../../src/reporting/json-reporter.js';
import type { RunReportContext } from '../../../src/reporting/json-reporter.js';
import { InMemoryBackend } from '../../../src/backend/memory-backend.js';
import { EvaluationHarness } from '../../../src/evaluation/harness.js';
import type { RuleEvaluator } from '../../../src/evaluation/harness.js';
import { aggregateMetrics, scoreBatch } from '../../../src/evaluation/metrics.js';
import type { RuleGenerator } from '../../../src/generation/generator.js';
import { toRuleDocument } from '../../../src/generation/rule-schema.js';
import { RefinementController } from '../../../src/refinement/controller.js';
import type { RefinementOutcome } from '../../../src/refinement/controller.js';
import { createQualityThresholds } from '../../../src/refinement/thresholds.js';
import type { EvaluationResult } from '../../../src/types/evaluation.js';
import { GeneratorContractError } from '../../../src/utils/errors.js';
import { FIXED_NOW, makeBatch, vssadminRule } from '../../helpers/batches.js';

const batch = makeBatch([vssadminRule()]);

const context: RunReportContext = {
  version: '0.1.0',
  source: '/reports/ransomware.md',
  backend: 'memory',
  processingTimeMs: 1234,
  now: FIXED_NOW,
};

const fixedGenerator: RuleGenerator = { generate: async () => batch };

const unavailable: RuleEvaluator = {
  evaluate: async (): Promise<EvaluationResult> => ({
    status: 'backend_unavailable',
    reason: 'connection refused',
    durationMs: 5,
  }),
};

function run(generator: RuleGenerator, evaluator: RuleEvaluator): Promise<RefinementOutcome> {
  return new RefinementController({
    generator,
    evaluator,
    thresholds: createQualityThresholds({ maxIterations: 1 }),
    now: FIXED_NOW,
  }).run('report');
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'detectloop-report-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('buildRunReport', () => {
  it('reports the best iteration with its rules', async () => {
    const outcome = await run(fixedGenerator, new EvaluationHarness(new InMemoryBackend(), { now: FIXED_NOW }));
    const report = buildRunReport(outcome, {
      ...context,
      cost: { totalUsd: 0.012, totalTokens: 1500, requestCount: 1 },
    });

    expect(report.metadata).toEqual({
      generatedAt: '2026-01-15T10:00:00.000Z',
      version: '0.1.0',
      source: '/reports/ransomware.md',
      backend: 'memory',
      processingTimeMs: 1234,
    });
    expect(report.status).toBe('exhausted_retries');
    expect(report.reportedIteration).toBe(1);
    expect(report.generatorInvocations).toBe(1);
    expect(report.thresholds).toEqual({ minPrecision: 0.6, minRecall: 0.7, maxIterations: 1 });
    expect(report.rules).toEqual([toRuleDocument(batch.rules[0])]);
    expect(report.cost).toEqual({ totalUsd: 0.012, totalTokens: 1500, requestCount: 1 });

    const [iteration] = report.iterations;
    expect(iteration).toMatchObject({ iteration: 1, status: 'exhausted_retries', ruleCount: 1 });
    expect(iteration.aggregate?.precision).toBe(0.5);
    expect(iteration.evaluation).toMatchObject({
      status: 'completed',
      ingestion: { attempted: 4, failed: 0 },
      teardown: 'cleaned',
    });
    expect('error' in iteration).toBe(false);
  });

  it('keeps the unvalidated rules of a skipped run', async () => {
    const report = buildRunReport(await run(fixedGenerator, unavailable), context);

    expect(report.status).toBe('skipped_no_backend');
    expect(report.reportedIteration).toBe(1);
    expect(report.rules.map((r) => r.id)).toEqual(['vss-delete']);
    expect(report.iterations[0].evaluation).toEqual({
      status: 'backend_unavailable',
      reason: 'connection refused',
      durationMs: 5,
    });
    expect(report.iterations[0].error).toEqual({
      kind: 'backend_unavailable',
      message: 'connection refused',
      issues: [],
    });
    expect('cost' in report).toBe(false);
  });

  it('reports no rules when the generator broke its contract', async () => {
    const broken: RuleGenerator = {
      generate: async () => {
        throw new GeneratorContractError('Model response is not a valid rule batch', ['(root): Required']);
      },
    };
    const report = buildRunReport(await run(broken, unavailable), context);

    expect(report.status).toBe('generator_contract_violation');
    expect(report.reportedIteration).toBeNull();
    expect(report.rules).toEqual([]);
    expect(report.iterations[0]).toMatchObject({ ruleCount: 0, evaluation: null, aggregate: null });
  });
});

describe('buildEvaluationReport', () => {
  it('summarizes a completed evaluation', async () => {
    const evaluation = await new EvaluationHarness(new InMemoryBackend(), { now: FIXED_NOW }).evaluate(batch);
    if (evaluation.status !== 'completed') throw new Error('expected a completed evaluation');
    const ruleMetrics = scoreBatch(batch, evaluation.outcomes);

    const report = buildEvaluationReport(
      {
        thresholds: createQualityThresholds(),
        evaluation,
        ruleMetrics,
        aggregate: aggregateMetrics(ruleMetrics),
        passed: false,
        feedback: null,
      },
      context,
    );

    expect(report.passed).toBe(false);
    expect(report.evaluation).toEqual(summarizeEvaluation(evaluation));
    expect(report.ruleMetrics[0]).toMatchObject({ ruleId: 'vss-delete', truePositives: 1, falsePositives: 1 });
    expect('outcomes' in report.evaluation).toBe(false);
  });
});

describe('writeRunReport', () => {
  it('writes pretty JSON, creating parent directories', async () => {
    const report = buildRunReport(await run(fixedGenerator, unavailable), context);
    const path = join(dir, 'out', 'nested', 'report.json');

    writeRunReport(report, path);

    const written = readFileSync(path, 'utf-8');
    expect(written).toBe(generateJsonReport(report));
    expect(written.split('\n')[1]).toBe('  "metadata": {');
    expect(JSON.parse(written)).toEqual(JSON.parse(JSON.stringify(report)));
  });
});
