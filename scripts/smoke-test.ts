#!/usr/bin/env tsx
/**
 * Smoke test: runs the refinement loop with real generation calls against
 * the in-memory backend (or Elasticsearch when EVAL_BACKEND=elasticsearch).
 *
 * Run:  npm run smoke
 *
 * This is NOT a unit test. It hits the OpenRouter API, costs real tokens,
 * and takes 30-90 seconds.
 */

import 'dotenv/config';
import chalk from 'chalk';
import {
  AIClient,
  ElasticsearchBackend,
  EvaluationHarness,
  InMemoryBackend,
  LlmRuleGenerator,
  RefinementController,
  createQualityThresholds,
  loadRunConfig,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Sample threat report
// ---------------------------------------------------------------------------

const SAMPLE_REPORT = `
# Ransomware Pre-Encryption Activity

## Summary
Before deploying the encryptor, the operators removed recovery options on
every reachable Windows host.

## Observed Behaviour
1. **Inhibit System Recovery (T1490)**: vssadmin.exe was executed with
   "delete shadows /all /quiet" to remove volume shadow copies. On some hosts
   the operators used "wmic shadowcopy delete" instead.
2. **Inhibit System Recovery (T1490)**: bcdedit.exe was run with
   "/set {default} recoveryenabled no" to disable Windows recovery.
3. **Service Stop (T1489)**: net.exe stopped backup services such as
   "net stop VSS" and "net stop SQLWriter".

## Recommendations
- Alert on shadow copy deletion from any parent process
- Monitor bcdedit modifications of boot configuration
`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  const startTime = Date.now();

  console.log(chalk.cyan.bold('\n=== detectloop Smoke Test (Real API Calls) ===\n'));

  console.log(chalk.yellow('1. Creating AI client from .env...'));
  const client = AIClient.fromEnv();
  console.log(chalk.green('   OK: API key loaded'));

  console.log(chalk.yellow('2. Preparing evaluation backend...'));
  const config = loadRunConfig(process.env);
  const backend =
    config.backend === 'elasticsearch' ? new ElasticsearchBackend(config.elasticsearch) : new InMemoryBackend();
  console.log(chalk.green(`   OK: ${backend.name}`));

  console.log(chalk.yellow('3. Running refinement loop (real API calls)...'));
  const controller = new RefinementController({
    generator: new LlmRuleGenerator(client, { modelTier: 'fast' }),
    evaluator: new EvaluationHarness(backend, { healthCheckTimeoutMs: config.healthCheckTimeoutMs }),
    thresholds: createQualityThresholds({ maxIterations: 2 }, 'dev'),
    onStateChange: (state, iteration) => console.log(chalk.gray(`       [${iteration}] ${state}`)),
  });
  const outcome = await controller.run(SAMPLE_REPORT);

  for (const result of outcome.history) {
    const agg = result.aggregate;
    const scores = agg
      ? `P=${agg.precision.toFixed(2)} R=${agg.recall.toFixed(2)} F1=${agg.f1.toFixed(2)}`
      : 'not scored';
    console.log(chalk.gray(`       iteration ${result.iteration}: ${result.status} (${scores})`));
  }

  const totalDuration = Date.now() - startTime;
  const cost = client.getCostSummary();
  const reported = outcome.bestIteration ?? outcome.finalIteration;

  console.log(chalk.cyan.bold('\n=== Smoke Test Results ==='));
  console.log(`  Status:           ${outcome.status}`);
  console.log(`  Iterations:       ${outcome.history.length}`);
  console.log(`  Reported rules:   ${reported.batch?.rules.length ?? 0}`);
  console.log(`  API calls:        ${cost.requestCount}`);
  console.log(`  Total tokens:     ${cost.totalTokens.toLocaleString()}`);
  console.log(`  Total cost:       $${cost.totalCostUsd.toFixed(4)}`);
  console.log(`  Total time:       ${(totalDuration / 1000).toFixed(1)}s`);
  console.log(chalk.cyan.bold('\n=== Done ===\n'));

  if (cost.requestCount === 0) {
    console.log(chalk.red.bold('WARNING: No API calls were made! Something is wrong.'));
    process.exit(1);
  }

  if (outcome.status === 'generator_contract_violation') {
    console.log(chalk.red.bold('WARNING: The model output broke the rule batch contract.'));
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(chalk.red.bold('\nSmoke test FAILED:'));
  console.error(err);
  process.exit(1);
});
