/**
 * OpenRouter AI client.
 *
 * Three model tiers:
 *   - fast:     cheap models for quick drafts
 *   - standard: balanced models for general tasks
 *   - quality:  best models for rule generation
 *
 * Tracks token usage and estimated cost per request.
 */

import { z } from 'zod';
import type { AIConfig, APIUsage } from '@/types/config.js';

export type ModelTier = 'fast' | 'standard' | 'quality';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface InferenceOptions {
  model?: ModelTier;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
}

export interface InferenceResult {
  content: string;
  usage: APIUsage;
}

// OpenRouter pricing per million tokens (approximate)
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'google/gemini-2.0-flash-001':    { input: 0.10, output: 0.40 },
  'anthropic/claude-3.5-haiku':     { input: 0.80, output: 4.00 },
  'anthropic/claude-sonnet-4':      { input: 3.00, output: 15.00 },
};

const CompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).default([]),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

export class AIClient {
  private usageLog: APIUsage[] = [];

  constructor(private readonly config: AIConfig) {}

  /**
   * Create an AIClient from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): AIClient {
    const config: AIConfig = {
      provider: 'openrouter',
      openrouter: {
        apiKey: env.OPENROUTER_API_KEY || '',
        models: {
          fast: env.OPENROUTER_MODEL_FAST || 'google/gemini-2.0-flash-001',
          standard: env.OPENROUTER_MODEL_STANDARD || 'anthropic/claude-3.5-haiku',
          quality: env.OPENROUTER_MODEL_QUALITY || 'anthropic/claude-sonnet-4',
        },
        baseUrl: env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
      },
      costTracking: env.TRACK_API_COSTS !== 'false',
      requestTimeoutMs: Number(env.OPENROUTER_TIMEOUT_MS) || 120_000,
      maxTokensPerRequest: 4096,
      temperature: 0.1,
    };

    if (!config.openrouter.apiKey) {
      throw new Error('OPENROUTER_API_KEY is required. Set it in .env or environment.');
    }

    return new AIClient(config);
  }

  /**
   * Run inference with the specified model tier.
   */
  async infer(messages: ChatMessage[], options: InferenceOptions = {}): Promise<InferenceResult> {
    const modelId = this.config.openrouter.models[options.model ?? 'standard'];
    const startTime = Date.now();

    const body: Record<string, unknown> = {
      model: modelId,
      messages,
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens ?? this.config.maxTokensPerRequest,
    };

    if (options.jsonMode) {
      body.response_format = { type: 'json_object' };
    }

    const response = await fetch(`${this.config.openrouter.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.config.openrouter.apiKey}`,
        'Content-Type': 'application/json',
        'X-Title': 'detectloop',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenRouter API error (${response.status}): ${errorText}`);
    }

    const data = CompletionSchema.parse(await response.json());

    const content = data.choices[0]?.message.content ?? '';
    const inputTokens = data.usage?.prompt_tokens ?? 0;
    const outputTokens = data.usage?.completion_tokens ?? 0;

    const usage: APIUsage = {
      operation: 'inference',
      model: modelId,
      inputTokens,
      outputTokens,
      costUsd: this.calculateCost(modelId, inputTokens, outputTokens),
      durationMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    };

    if (this.config.costTracking) {
      this.usageLog.push(usage);
    }

    return { content, usage };
  }

  /**
   * Convenience: single prompt inference.
   */
  async prompt(systemPrompt: string, userPrompt: string, options: InferenceOptions = {}): Promise<InferenceResult> {
    return this.infer(
      [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      options,
    );
  }

  private calculateCost(modelId: string, inputTokens: number, outputTokens: number): number {
    const pricing = MODEL_PRICING[modelId];
    if (!pricing) {
      // Unknown model, estimate conservatively
      return (inputTokens * 1.0 + outputTokens * 3.0) / 1_000_000;
    }
    return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
  }

  getUsageLog(): APIUsage[] {
    return [...this.usageLog];
  }

  /**
   * Totals across all tracked requests.
   */
  getCostSummary(): { totalCostUsd: number; totalTokens: number; requestCount: number } {
    let totalCost = 0;
    let totalTokens = 0;
    for (const entry of this.usageLog) {
      totalCost += entry.costUsd;
      totalTokens += entry.inputTokens + entry.outputTokens;
    }
    return {
      totalCostUsd: Math.round(totalCost * 10000) / 10000,
      totalTokens,
      requestCount: this.usageLog.length,
    };
  }
}
