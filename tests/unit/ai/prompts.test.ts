import { describe, it, expect } from 'vitest';
import {
  buildRuleGenerationPrompt,
  parseRuleGenerationResponse,
  renderFeedback,
} from '../../../src/ai/prompts/rule-generation.js';
import type { FeedbackReport } from '../../../src/types/feedback.js';

function feedbackReport(overrides: Partial<FeedbackReport> = {}): FeedbackReport {
  return {
    iteration: 1,
    thresholds: { minPrecision: 0.6, minRecall: 0.7 },
    aggregate: { precision: 0.5, recall: 1, f1: 2 / 3 },
    rules: [
      {
        ruleId: 'vss-delete',
        ruleName: 'Shadow Copy Deletion via Vssadmin',
        query: 'process.name:*vssadmin*',
        failingMetrics: [{ metric: 'precision', value: 0.5, threshold: 0.6 }],
        counts: {
          truePositives: 1,
          falsePositives: 1,
          trueNegatives: 1,
          falseNegatives: 0,
          erroredCases: 0,
          evasionAnomalies: 0,
        },
        hypotheses: [{ category: 'query_too_broad', summary: 'The query matches benign cases.', evidence: 'FP=1, FN=0' }],
        misclassified: [
          {
            testCaseId: 'fp-1',
            category: 'FP',
            expectedMatch: false,
            actualMatch: true,
            payloadSnippet: '{"process":{"name":"backup-vssadmin-helper.exe"}}',
          },
        ],
        suggestions: ['Tighten the query.'],
      },
    ],
    passingRuleIds: [],
    ...overrides,
  };
}

describe('buildRuleGenerationPrompt', () => {
  it('puts the trimmed report in the user prompt', () => {
    const { system, user } = buildRuleGenerationPrompt('  vssadmin deleted shadow copies  \n');

    expect(user).toContain('## Threat Intelligence\n\nvssadmin deleted shadow copies\n\nRespond with ONLY the JSON object.');
    expect(user).not.toContain('Refinement Feedback');
    expect(system).toContain('query_string');
  });

  it('appends rendered feedback on retries', () => {
    const report = feedbackReport();
    const { user } = buildRuleGenerationPrompt('report', report);

    expect(user.endsWith(`Respond with ONLY the JSON object.\n\n---\n\n${renderFeedback(report)}`)).toBe(true);
  });

  it('keeps the system prompt identical across attempts', () => {
    expect(buildRuleGenerationPrompt('a').system).toBe(buildRuleGenerationPrompt('b', feedbackReport()).system);
  });
});

describe('renderFeedback', () => {
  it('renders targets, counts, causes and misclassified cases', () => {
    const lines = renderFeedback(feedbackReport()).split('\n');

    expect(lines.slice(0, 3)).toEqual([
      '## Refinement Feedback (iteration 1)',
      '',
      'Targets: precision >= 0.60, recall >= 0.70.',
    ]);
    expect(lines[3]).toBe('Batch scored precision 0.50, recall 1.00, F1 0.67.');
    expect(lines).toContain('### Shadow Copy Deletion via Vssadmin (vss-delete)');
    expect(lines).toContain('Query: `process.name:*vssadmin*`');
    expect(lines).toContain('Results: TP=1 FP=1 TN=1 FN=0');
    expect(lines).toContain('- precision 0.50 is below 0.60');
    expect(lines).toContain('- [query_too_broad] The query matches benign cases. (FP=1, FN=0)');
    expect(lines).toContain(
      '- fp-1 [FP] expected no match, got matched: {"process":{"name":"backup-vssadmin-helper.exe"}}',
    );
    expect(lines).toContain('- Tighten the query.');
  });

  it('lists rules that already pass', () => {
    const text = renderFeedback(feedbackReport({ passingRuleIds: ['certutil-download', 'bcdedit-recovery'] }));
    expect(text).toContain('Rules meeting the targets (keep them unchanged): certutil-download, bcdedit-recovery');
  });

  it('shows errors, anomalies and notes when present', () => {
    const base = feedbackReport();
    const rule = {
      ...base.rules[0],
      counts: { ...base.rules[0].counts, erroredCases: 2, evasionAnomalies: 1 },
      misclassified: [
        {
          testCaseId: 'tp-2',
          category: 'TP' as const,
          expectedMatch: true,
          actualMatch: 'indeterminate' as const,
          payloadSnippet: '{}',
          note: 'malformed_query',
        },
      ],
    };
    const lines = renderFeedback({ ...base, rules: [rule] }).split('\n');

    expect(lines).toContain('Results: TP=1 FP=1 TN=1 FN=0 errors=2 evasion-anomalies=1');
    expect(lines).toContain('- tp-2 [TP] expected match, got not evaluated (malformed_query): {}');
  });
});

describe('parseRuleGenerationResponse', () => {
  it('maps the document format to raw rules', () => {
    const raw = JSON.stringify({
      rules: [
        {
          name: 'Shadow Copy Deletion via Vssadmin',
          query: 'process.name:*vssadmin*',
          severity: 'high',
          risk_score: 73,
          mitre: ['T1490'],
          test_cases: [{ type: 'TP', description: 'quiet delete', log_entry: { process: { name: 'vssadmin.exe' } } }],
        },
      ],
    });

    expect(parseRuleGenerationResponse(raw)).toEqual({
      rules: [
        {
          id: undefined,
          name: 'Shadow Copy Deletion via Vssadmin',
          description: '',
          query: 'process.name:*vssadmin*',
          severity: 'high',
          riskScore: 73,
          mitre: ['T1490'],
          testCases: [
            {
              id: undefined,
              category: 'TP',
              expectedMatch: undefined,
              payload: { process: { name: 'vssadmin.exe' } },
              description: 'quiet delete',
            },
          ],
        },
      ],
    });
  });

  it('rejects a response with no rules', () => {
    expect(() => parseRuleGenerationResponse('{"rules": []}')).toThrow('At least one rule is required');
  });

  it('rejects an empty query', () => {
    expect(() => parseRuleGenerationResponse('{"rules": [{"name": "x", "query": ""}]}')).toThrow(
      'rules.0.query: Query must not be empty',
    );
  });
});
