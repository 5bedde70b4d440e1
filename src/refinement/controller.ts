/**
 * Refinement controller: the generate / evaluate / score / decide loop.
 *
 * State machine:
 *
 *   init -> generate -> evaluate -> score -> decide -> accept
 *                                              |-> feedback -> generate
 *                                              '-> give_up
 *   generate -> generator_contract_violation
 *   evaluate -> skipped_no_backend
 *
 * The generator is invoked at most `maxIterations` times. On give-up the
 * best iteration by F1 (then recall, then the earlier one) is returned.
 */

import type { RuleEvaluator } from '@/evaluation/harness.js';
import { synthesizeFeedback } from '@/evaluation/feedback.js';
import { aggregateMetrics, meetsThresholds, scoreBatch } from '@/evaluation/metrics.js';
import type { RuleGenerator } from '@/generation/generator.js';
import { assertBatchContract } from '@/generation/rule-builder.js';
import type { RuleBatch } from '@/types/detection-rule.js';
import type { IterationResult, PhaseSpan, PhaseTimings, QualityThresholds } from '@/types/evaluation.js';
import type { FeedbackReport } from '@/types/feedback.js';
import { GeneratorContractError } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const logger = createLogger('controller');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type ControllerState =
  | 'init'
  | 'generate'
  | 'evaluate'
  | 'score'
  | 'decide'
  | 'feedback'
  | 'accept'
  | 'give_up'
  | 'skipped_no_backend'
  | 'generator_contract_violation';

export type RefinementStatus = 'accepted' | 'exhausted_retries' | 'skipped_no_backend' | 'generator_contract_violation';

export interface RefinementOutcome {
  status: RefinementStatus;
  /**
   * The accepted iteration, or the best-effort one after give-up. Null
   * when no iteration was scored.
   */
  bestIteration: IterationResult | null;
  /** The iteration the run ended on. */
  finalIteration: IterationResult;
  history: IterationResult[];
  generatorInvocations: number;
  thresholds: QualityThresholds;
}

export interface ControllerOptions {
  generator: RuleGenerator;
  evaluator: RuleEvaluator;
  thresholds: QualityThresholds;
  now?: () => Date;
  onStateChange?: (state: ControllerState, iteration: number) => void;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export class RefinementController {
  private readonly generator: RuleGenerator;
  private readonly evaluator: RuleEvaluator;
  private readonly thresholds: QualityThresholds;
  private readonly now: () => Date;
  private readonly onStateChange?: (state: ControllerState, iteration: number) => void;

  constructor(options: ControllerOptions) {
    this.generator = options.generator;
    this.evaluator = options.evaluator;
    this.thresholds = options.thresholds;
    this.now = options.now ?? (() => new Date());
    this.onStateChange = options.onStateChange;
  }

  async run(ctiText: string): Promise<RefinementOutcome> {
    const history: IterationResult[] = [];
    let feedback: FeedbackReport | undefined;
    let invocations = 0;

    this.transition('init', 0);

    for (let iteration = 1; ; iteration++) {
      const iterationStart = this.now();

      // --- generate ---
      this.transition('generate', iteration);
      const generationStart = this.now();
      let batch: RuleBatch;
      try {
        invocations++;
        batch = await this.generator.generate(ctiText, feedback);
        assertBatchContract(batch);
      } catch (error) {
        if (!(error instanceof GeneratorContractError)) throw error;

        logger.error(`Generator contract violation on iteration ${iteration}: ${error.message}`);
        this.transition('generator_contract_violation', iteration);
        const record = this.record(iteration, iterationStart, {
          status: 'generator_contract_violation',
          timings: { generation: this.span(generationStart) },
          error: { kind: 'generator_contract_violation', message: error.message, issues: error.issues },
        });
        history.push(record);
        return this.finish('generator_contract_violation', pickBest(history), record, history, invocations);
      }
      const generation = this.span(generationStart);

      // --- evaluate ---
      this.transition('evaluate', iteration);
      const evaluationStart = this.now();
      const evaluation = await this.evaluator.evaluate(batch);
      const evaluationSpan = this.span(evaluationStart);

      if (evaluation.status === 'backend_unavailable') {
        logger.warn(`Skipping refinement: ${evaluation.reason}`);
        this.transition('skipped_no_backend', iteration);
        const record = this.record(iteration, iterationStart, {
          status: 'skipped_no_backend',
          batch,
          evaluation,
          timings: { generation, evaluation: evaluationSpan },
          error: { kind: 'backend_unavailable', message: evaluation.reason, issues: [] },
        });
        history.push(record);
        return this.finish('skipped_no_backend', null, record, history, invocations);
      }

      // --- score ---
      this.transition('score', iteration);
      const scoringStart = this.now();
      const ruleMetrics = scoreBatch(batch, evaluation.outcomes);
      const aggregate = aggregateMetrics(ruleMetrics);
      const timings: PhaseTimings = { generation, evaluation: evaluationSpan, scoring: this.span(scoringStart) };

      // --- decide ---
      this.transition('decide', iteration);
      logger.info(
        `Iteration ${iteration}: precision=${aggregate.precision.toFixed(3)} ` +
          `recall=${aggregate.recall.toFixed(3)} f1=${aggregate.f1.toFixed(3)}`,
      );

      const scored = { batch, ruleMetrics, aggregate, evaluation, timings };

      if (meetsThresholds(aggregate, this.thresholds)) {
        this.transition('accept', iteration);
        const record = this.record(iteration, iterationStart, { ...scored, status: 'accepted' });
        history.push(record);
        return this.finish('accepted', record, record, history, invocations);
      }

      if (iteration >= this.thresholds.maxIterations) {
        this.transition('give_up', iteration);
        const record = this.record(iteration, iterationStart, { ...scored, status: 'exhausted_retries' });
        history.push(record);
        const best = pickBest(history);
        logger.warn(
          `Thresholds not met after ${iteration} iteration(s); returning iteration ${best?.iteration ?? iteration} as best effort`,
        );
        return this.finish('exhausted_retries', best, record, history, invocations);
      }

      // --- feedback ---
      this.transition('feedback', iteration);
      feedback = synthesizeFeedback({
        iteration,
        batch,
        evaluation,
        ruleMetrics,
        aggregate,
        thresholds: this.thresholds,
      });
      history.push(this.record(iteration, iterationStart, { ...scored, status: 'retrying_with_feedback', feedback }));
    }
  }

  private transition(state: ControllerState, iteration: number): void {
    logger.debug(`-> ${state} (iteration ${iteration})`);
    this.onStateChange?.(state, iteration);
  }

  private span(start: Date): PhaseSpan {
    return { startedAt: start.toISOString(), endedAt: this.now().toISOString() };
  }

  private record(
    iteration: number,
    start: Date,
    fields: Partial<IterationResult> & Pick<IterationResult, 'status' | 'timings'>,
  ): IterationResult {
    return {
      iteration,
      batch: null,
      ruleMetrics: [],
      aggregate: null,
      evaluation: null,
      feedback: null,
      ...fields,
      durationMs: this.now().getTime() - start.getTime(),
    };
  }

  private finish(
    status: RefinementStatus,
    bestIteration: IterationResult | null,
    finalIteration: IterationResult,
    history: IterationResult[],
    generatorInvocations: number,
  ): RefinementOutcome {
    return { status, bestIteration, finalIteration, history, generatorInvocations, thresholds: this.thresholds };
  }
}

/**
 * Highest F1; ties go to higher recall, then to the earlier iteration.
 */
export function pickBest(history: readonly IterationResult[]): IterationResult | null {
  let best: IterationResult | null = null;
  for (const candidate of history) {
    const metrics = candidate.aggregate;
    if (!metrics) continue;
    if (!best || !best.aggregate) {
      best = candidate;
      continue;
    }
    if (
      metrics.f1 > best.aggregate.f1 ||
      (metrics.f1 === best.aggregate.f1 && metrics.recall > best.aggregate.recall)
    ) {
      best = candidate;
    }
  }
  return best;
}
