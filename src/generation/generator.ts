/**
 * Rule generators.
 *
 * A generator turns CTI text (plus, on retries, the previous iteration's
 * feedback) into a rule batch. Generators hold no state between calls;
 * everything an attempt needs is in its arguments.
 */

import type { AIClient, ModelTier } from '@/ai/client.js';
import { withRetry } from '@/ai/retry.js';
import { buildRuleGenerationPrompt, parseRuleGenerationResponse } from '@/ai/prompts/rule-generation.js';
import type { RawRuleBatch } from './rule-builder.js';
import type { RuleBatch } from '@/types/detection-rule.js';
import type { FeedbackReport } from '@/types/feedback.js';
import { GeneratorContractError, errorMessage } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';
import { buildRuleBatch } from './rule-builder.js';

const logger = createLogger('generator');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface RuleGenerator {
  /**
   * @throws GeneratorContractError when the output breaks the batch contract.
   */
  generate(ctiText: string, feedback?: FeedbackReport): Promise<RuleBatch>;
}

export interface LlmGeneratorOptions {
  /** AI model tier to use (default: "quality"). */
  modelTier?: ModelTier;
  /** Maximum tokens for the AI response (default: 8192). */
  maxTokens?: number;
  /** Sampling temperature (default: 0.2). */
  temperature?: number;
  /** Maximum retry attempts on transient AI errors (default: 3). */
  maxRetries?: number;
}

const DEFAULT_OPTIONS: Required<LlmGeneratorOptions> = {
  modelTier: 'quality',
  maxTokens: 8192,
  temperature: 0.2,
  maxRetries: 3,
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export class LlmRuleGenerator implements RuleGenerator {
  private readonly opts: Required<LlmGeneratorOptions>;

  constructor(
    private readonly client: AIClient,
    options: LlmGeneratorOptions = {},
  ) {
    this.opts = { ...DEFAULT_OPTIONS, ...options };
  }

  async generate(ctiText: string, feedback?: FeedbackReport): Promise<RuleBatch> {
    const { system, user } = buildRuleGenerationPrompt(ctiText, feedback);

    const result = await withRetry(
      () =>
        this.client.prompt(system, user, {
          model: this.opts.modelTier,
          maxTokens: this.opts.maxTokens,
          temperature: this.opts.temperature,
          jsonMode: true,
        }),
      {
        maxRetries: this.opts.maxRetries,
        onRetry: (error, attempt) => logger.warn(`Generation attempt ${attempt} failed: ${error.message}`),
      },
    );

    logger.debug(`Generation used ${result.usage.inputTokens + result.usage.outputTokens} tokens`);

    let raw: RawRuleBatch;
    try {
      raw = parseRuleGenerationResponse(result.content);
    } catch (error) {
      throw new GeneratorContractError('Model response is not a valid rule batch', [errorMessage(error)]);
    }

    const batch = buildRuleBatch(raw);
    logger.info(
      `Generated ${batch.rules.length} rule(s) with ` +
        `${batch.rules.reduce((n, r) => n + r.testCases.length, 0)} test case(s)`,
    );
    return batch;
  }
}
