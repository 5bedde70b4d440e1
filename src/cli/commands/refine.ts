/**
 * Refine command: generate rules from a threat report and refine them
 * against the evaluation backend until they meet the quality thresholds.
 *
 * Writes the reported rules as YAML, a JSON run report, and prints a
 * summary. Exit code 0 when accepted or skipped, 1 when retries ran out,
 * 2 when the generator broke its contract.
 */

import { join } from 'node:path';
import type { Command } from 'commander';
import ora from 'ora';

import { AIClient } from '@/ai/client.js';
import type { ModelTier } from '@/ai/client.js';
import { EvaluationHarness } from '@/evaluation/harness.js';
import { LlmRuleGenerator } from '@/generation/generator.js';
import { loadCti } from '@/ingestion/cti-loader.js';
import { RefinementController } from '@/refinement/controller.js';
import type { ControllerState, RefinementOutcome, RefinementStatus } from '@/refinement/controller.js';
import { buildRunReport, writeRunReport } from '@/reporting/json-reporter.js';
import { printSummary, ruleSummaryRows } from '@/reporting/summary-reporter.js';
import { writeRuleFiles } from '@/reporting/rule-writer.js';
import type { EvaluationFlags } from '../options.js';
import {
  addBackendOptions,
  addOutputOption,
  addThresholdOptions,
  addVerboseOption,
  createBackend,
  packageVersion,
  printError,
  printHeader,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
  resolveOutputDir,
  resolveRunConfig,
  thresholdsFor,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface RefineOptions extends EvaluationFlags {
  input: string;
  output: string;
  report?: string;
  model?: string;
}

const EXIT_CODES: Record<RefinementStatus, number> = {
  accepted: 0,
  skipped_no_backend: 0,
  exhausted_retries: 1,
  generator_contract_violation: 2,
};

const STATE_MESSAGES: Partial<Record<ControllerState, string>> = {
  generate: 'generating rules',
  evaluate: 'evaluating against the backend',
  score: 'scoring results',
  feedback: 'synthesizing feedback',
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRefineCommand(program: Command): void {
  const cmd = program
    .command('refine')
    .description('Generate detection rules from threat intelligence and refine them against test data')
    .requiredOption('-i, --input <path>', 'Path to a threat report file or directory')
    .option('--report <path>', 'Path for the JSON run report (default: <output>/refinement-report.json)')
    .option('--model <tier>', 'Model tier for generation: fast, standard, quality', 'quality');

  addOutputOption(cmd);
  addBackendOptions(cmd);
  addThresholdOptions(cmd);
  addVerboseOption(cmd);

  cmd.action(async (options: RefineOptions) => {
    await runRefine(options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runRefine(options: RefineOptions): Promise<void> {
  const startTime = Date.now();
  printHeader('Rule Refinement');

  const modelTier = parseModelTier(options.model);
  const inputPath = resolveInputPath(options.input);
  const outputDir = resolveOutputDir(options.output);
  const config = resolveRunConfig(options);
  const thresholds = thresholdsFor(config);

  printInfo(`Input:      ${inputPath}`);
  printInfo(`Output:     ${outputDir}`);
  printInfo(`Backend:    ${config.backend}${config.backend === 'elasticsearch' ? ` (${config.elasticsearch.url})` : ''}`);
  printInfo(
    `Thresholds: precision >= ${thresholds.minPrecision}, recall >= ${thresholds.minRecall}, ` +
      `max ${thresholds.maxIterations} iteration(s)`,
  );
  console.log('');

  const cti = await loadCti(inputPath);
  if (cti.text.trim().length === 0) {
    throw new Error(`No threat intelligence text found in ${inputPath}`);
  }

  const client = AIClient.fromEnv();
  const backend = createBackend(config);
  const spinner = ora('Starting refinement...');
  const controller = new RefinementController({
    generator: new LlmRuleGenerator(client, { modelTier }),
    evaluator: new EvaluationHarness(backend, {
      healthCheckTimeoutMs: config.healthCheckTimeoutMs,
      concurrency: config.concurrency,
      retainDocuments: config.retainDocuments,
    }),
    thresholds,
    onStateChange: (state, iteration) => {
      const message = STATE_MESSAGES[state];
      if (message) spinner.text = `Iteration ${iteration}/${thresholds.maxIterations}: ${message}...`;
    },
  });

  spinner.start();
  let outcome: RefinementOutcome;
  try {
    outcome = await controller.run(cti.text);
  } catch (err) {
    spinner.fail('Refinement failed');
    throw err;
  }

  switch (outcome.status) {
    case 'accepted':
      spinner.succeed(`Thresholds met on iteration ${outcome.finalIteration.iteration}`);
      break;
    case 'exhausted_retries':
      spinner.warn(`Thresholds not met after ${outcome.generatorInvocations} iteration(s)`);
      break;
    case 'skipped_no_backend':
      spinner.warn('Evaluation backend unavailable; rules were not evaluated');
      break;
    case 'generator_contract_violation':
      spinner.fail('Generator produced an invalid rule batch');
      break;
  }

  // --- Output ---
  const reported = outcome.bestIteration ?? outcome.finalIteration;
  if (reported.batch) {
    const written = writeRuleFiles(reported.batch.rules, outputDir);
    printSuccess(`Wrote ${written.length} rule file(s) from iteration ${reported.iteration}`);
    if (outcome.status === 'skipped_no_backend') {
      printWarning('These rules are unvalidated: no backend was reachable to test them.');
    }
  }

  const cost = client.getCostSummary();
  const reportPath = options.report ?? join(outputDir, 'refinement-report.json');
  const runReport = buildRunReport(outcome, {
    version: packageVersion(),
    source: inputPath,
    backend: config.backend,
    processingTimeMs: Date.now() - startTime,
    cost: { totalUsd: cost.totalCostUsd, totalTokens: cost.totalTokens, requestCount: cost.requestCount },
  });
  writeRunReport(runReport, reportPath);
  printSuccess(`Run report: ${reportPath}`);
  console.log('');

  if (outcome.finalIteration.error) {
    printError(outcome.finalIteration.error.message, outcome.finalIteration.error.issues.join('; ') || undefined);
  }

  printSummary({
    title: 'REFINEMENT SUMMARY',
    source: inputPath,
    status: outcome.status,
    backend: config.backend,
    durationMs: Date.now() - startTime,
    iterations: outcome.history.length,
    generatorInvocations: outcome.generatorInvocations,
    ...(reported.batch ? { selectedIteration: reported.iteration } : {}),
    thresholds,
    ...(reported.aggregate ? { aggregate: reported.aggregate } : {}),
    rules: reported.batch ? ruleSummaryRows(reported.batch, reported.ruleMetrics) : [],
    cost: { totalUsd: cost.totalCostUsd, totalTokens: cost.totalTokens },
  });
  console.log('');

  process.exitCode = EXIT_CODES[outcome.status];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseModelTier(value: string | undefined): ModelTier {
  if (value === undefined) return 'quality';
  if (value === 'fast' || value === 'standard' || value === 'quality') return value;
  throw new Error(`Unknown model tier "${value}". Use: fast, standard, quality`);
}
