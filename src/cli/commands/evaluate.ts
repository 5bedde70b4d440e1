/**
 * Evaluate command: score existing rule files against the backend once.
 *
 * Loads rules with their embedded test cases, runs the evaluation
 * harness, and prints per-rule metrics plus refinement feedback for the
 * rules that fall short. Exits 0 when the thresholds are met, 1 when
 * they are not, 3 when no backend was reachable.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { renderFeedback } from '@/ai/prompts/rule-generation.js';
import { synthesizeFeedback } from '@/evaluation/feedback.js';
import { EvaluationHarness } from '@/evaluation/harness.js';
import { aggregateMetrics, meetsThresholds, scoreBatch } from '@/evaluation/metrics.js';
import { loadRuleFiles } from '@/ingestion/rule-loader.js';
import { checkThresholds } from '@/refinement/thresholds.js';
import { buildEvaluationReport, writeRunReport } from '@/reporting/json-reporter.js';
import { printSummary, ruleSummaryRows } from '@/reporting/summary-reporter.js';
import type { RuleMetrics } from '@/types/evaluation.js';
import type { EvaluationFlags } from '../options.js';
import {
  addBackendOptions,
  addThresholdOptions,
  addVerboseOption,
  createBackend,
  packageVersion,
  printHeader,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
  resolveRunConfig,
  thresholdsFor,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface EvaluateOptions extends EvaluationFlags {
  input: string;
  report?: string;
  feedback: boolean;
}

const EXIT_BACKEND_UNAVAILABLE = 3;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerEvaluateCommand(program: Command): void {
  const cmd = program
    .command('evaluate')
    .description('Evaluate existing rule files and their test cases against the backend')
    .requiredOption('-i, --input <path>', 'Path to a rule file or directory of rule files')
    .option('--report <path>', 'Write a JSON evaluation report to this path')
    .option('--no-feedback', 'Do not print refinement feedback for failing rules');

  addBackendOptions(cmd);
  addThresholdOptions(cmd);
  addVerboseOption(cmd);

  cmd.action(async (options: EvaluateOptions) => {
    await runEvaluate(options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runEvaluate(options: EvaluateOptions): Promise<void> {
  const startTime = Date.now();
  printHeader('Rule Evaluation');

  const inputPath = resolveInputPath(options.input);
  const config = resolveRunConfig(options);
  const thresholds = thresholdsFor(config);

  const batch = await loadRuleFiles(inputPath);
  printInfo(`Input:   ${inputPath}`);
  printInfo(`Rules:   ${batch.rules.length}`);
  printInfo(`Backend: ${config.backend}`);
  console.log('');

  const harness = new EvaluationHarness(createBackend(config), {
    healthCheckTimeoutMs: config.healthCheckTimeoutMs,
    concurrency: config.concurrency,
    retainDocuments: config.retainDocuments,
  });

  const spinner = ora('Evaluating rules against the backend...').start();
  const evaluation = await harness.evaluate(batch);
  const reportContext = {
    version: packageVersion(),
    source: inputPath,
    backend: config.backend,
  };

  if (evaluation.status === 'backend_unavailable') {
    spinner.warn(`Backend unavailable: ${evaluation.reason}`);
    if (options.report) {
      writeRunReport(
        buildEvaluationReport(
          { thresholds, evaluation, ruleMetrics: [], aggregate: null, passed: false, feedback: null },
          { ...reportContext, processingTimeMs: Date.now() - startTime },
        ),
        options.report,
      );
    }
    console.log('');
    printSummary({
      title: 'EVALUATION SUMMARY',
      source: inputPath,
      status: 'backend_unavailable',
      backend: config.backend,
      durationMs: Date.now() - startTime,
      thresholds,
      rules: [],
    });
    process.exitCode = EXIT_BACKEND_UNAVAILABLE;
    return;
  }

  spinner.succeed(
    `Evaluated ${evaluation.ingestion.attempted} test case(s) (schema ${evaluation.provisioning}, ` +
      `${evaluation.ingestion.failed} ingestion failure(s))`,
  );
  console.log('');

  const ruleMetrics = scoreBatch(batch, evaluation.outcomes);
  const aggregate = aggregateMetrics(ruleMetrics);
  const passed = meetsThresholds(aggregate, thresholds);

  for (const metrics of ruleMetrics) {
    printRuleLine(metrics, thresholds.minPrecision, thresholds.minRecall);
  }
  console.log('');

  const feedback = passed
    ? null
    : synthesizeFeedback({ iteration: 1, batch, evaluation, ruleMetrics, aggregate, thresholds });

  if (feedback && options.feedback && feedback.rules.length > 0) {
    console.log(chalk.bold('  Refinement Feedback'));
    console.log(chalk.gray('  ─────────────────────────────────────────'));
    console.log(renderFeedback(feedback));
    console.log('');
  }

  if (options.report) {
    writeRunReport(
      buildEvaluationReport(
        { thresholds, evaluation, ruleMetrics, aggregate, passed, feedback },
        { ...reportContext, processingTimeMs: Date.now() - startTime },
      ),
      options.report,
    );
    printSuccess(`Evaluation report: ${options.report}`);
    console.log('');
  }

  printSummary({
    title: 'EVALUATION SUMMARY',
    source: inputPath,
    status: 'evaluated',
    backend: config.backend,
    durationMs: Date.now() - startTime,
    thresholds,
    aggregate,
    rules: ruleSummaryRows(batch, ruleMetrics),
  });
  console.log('');

  if (passed) {
    printSuccess('All quality thresholds met');
  } else {
    printWarning('Quality thresholds not met');
    for (const check of checkThresholds(aggregate, thresholds)) {
      if (!check.pass) {
        printWarning(`  ${check.name} ${check.actual.toFixed(2)} is below ${check.threshold.toFixed(2)}`);
      }
    }
    process.exitCode = 1;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printRuleLine(metrics: RuleMetrics, minPrecision: number, minRecall: number): void {
  const ok = metrics.scorableCases > 0 && metrics.precision >= minPrecision && metrics.recall >= minRecall;
  const label = ok ? chalk.green('PASS') : chalk.red('FAIL');
  const counts = `TP ${metrics.truePositives}  FP ${metrics.falsePositives}  TN ${metrics.trueNegatives}  FN ${metrics.falseNegatives}`;
  const extra = metrics.erroredCases > 0 ? chalk.yellow(`  (${metrics.erroredCases} errored)`) : '';
  console.log(`  ${label}  ${metrics.ruleId} ${chalk.gray(counts)}${extra}`);
}
