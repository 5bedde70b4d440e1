import { describe, it, expect, vi } from 'vitest';
import { AIClient } from '../../../src/ai/client.js';
import type { InferenceResult } from '../../../src/ai/client.js';
import { LlmRuleGenerator } from '../../../src/generation/generator.js';
import type { FeedbackReport } from '../../../src/types/feedback.js';
import { GeneratorContractError } from '../../../src/utils/errors.js';

function createClient(): AIClient {
  return AIClient.fromEnv({ OPENROUTER_API_KEY: 'test-key' });
}

function reply(content: string): InferenceResult {
  return {
    content,
    usage: {
      operation: 'inference',
      model: 'test-model',
      inputTokens: 100,
      outputTokens: 50,
      costUsd: 0,
      durationMs: 1,
      timestamp: '2026-01-15T10:00:00.000Z',
    },
  };
}

const VALID_RESPONSE = JSON.stringify({
  rules: [
    {
      name: 'Boot Recovery Disabled via Bcdedit',
      query: 'process.name:bcdedit.exe AND process.command_line:*recoveryenabled*no*',
      severity: 'high',
      mitre: ['T1490'],
      test_cases: [
        {
          type: 'TP',
          log_entry: { process: { name: 'bcdedit.exe', command_line: 'bcdedit /set {default} recoveryenabled no' } },
        },
        { type: 'TN', log_entry: { process: { name: 'bcdedit.exe', command_line: 'bcdedit /enum' } } },
      ],
    },
  ],
});

const FEEDBACK: FeedbackReport = {
  iteration: 1,
  thresholds: { minPrecision: 0.6, minRecall: 0.7 },
  aggregate: { precision: 0, recall: 0, f1: 0 },
  rules: [],
  passingRuleIds: [],
};

describe('LlmRuleGenerator', () => {
  it('builds a batch from the model response', async () => {
    const client = createClient();
    const prompt = vi.spyOn(client, 'prompt').mockResolvedValue(reply(VALID_RESPONSE));

    const batch = await new LlmRuleGenerator(client, { modelTier: 'fast' }).generate('bcdedit disabled recovery');

    expect(batch.rules.map((r) => r.id)).toEqual(['rule-1']);
    expect(batch.rules[0].testCases.map((tc) => [tc.id, tc.expectedMatch])).toEqual([
      ['rule-1-tc-1', true],
      ['rule-1-tc-2', false],
    ]);
    expect(prompt).toHaveBeenCalledTimes(1);
    expect(prompt.mock.calls[0][2]).toEqual({ model: 'fast', maxTokens: 8192, temperature: 0.2, jsonMode: true });
    expect(prompt.mock.calls[0][1]).toContain('bcdedit disabled recovery');
  });

  it('passes feedback into the user prompt', async () => {
    const client = createClient();
    const prompt = vi.spyOn(client, 'prompt').mockResolvedValue(reply(VALID_RESPONSE));

    await new LlmRuleGenerator(client).generate('report', FEEDBACK);

    expect(prompt.mock.calls[0][1]).toContain('## Refinement Feedback (iteration 1)');
    expect(prompt.mock.calls[0][2]).toMatchObject({ model: 'quality' });
  });

  it('turns an unparseable response into a contract violation', async () => {
    const client = createClient();
    vi.spyOn(client, 'prompt').mockResolvedValue(reply('{"rules": []}'));

    const error = await new LlmRuleGenerator(client).generate('report').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GeneratorContractError);
    expect(error).toMatchObject({ message: 'Model response is not a valid rule batch' });
  });

  it('surfaces label contradictions from the builder', async () => {
    const client = createClient();
    const response = JSON.stringify({
      rules: [{ name: 'x', query: 'a:b', test_cases: [{ type: 'FP', expected_match: true, log_entry: {} }] }],
    });
    vi.spyOn(client, 'prompt').mockResolvedValue(reply(response));

    await expect(new LlmRuleGenerator(client).generate('report')).rejects.toThrow(
      'Generator output has 1 invalid test case(s)',
    );
  });

  it('propagates API failures once retries are spent', async () => {
    const client = createClient();
    const prompt = vi
      .spyOn(client, 'prompt')
      .mockRejectedValue(new Error('OpenRouter API error (401): invalid key'));

    await expect(new LlmRuleGenerator(client, { maxRetries: 2 }).generate('report')).rejects.toThrow('invalid key');
    expect(prompt).toHaveBeenCalledTimes(1);
  });
});
