/**
 * External rule document format, shared by model responses and YAML rule
 * files (snake_case keys, test cases typed by category).
 *
 *   name: Shadow Copy Deletion via Vssadmin
 *   query: process.name:*vssadmin* AND process.command_line:*delete*shadows*
 *   severity: high
 *   test_cases:
 *     - type: TP
 *       log_entry: { process: { name: vssadmin.exe, ... } }
 */

import { z } from 'zod';
import type { Rule } from '@/types/detection-rule.js';
import type { RawRuleBatch } from './rule-builder.js';

export const TestCaseDocumentSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.enum(['TP', 'FN', 'FP', 'TN']),
  description: z.string().optional(),
  expected_match: z.boolean().optional(),
  log_entry: z.record(z.unknown()),
});

export const RuleDocumentSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  description: z.string().default(''),
  query: z.string().min(1, 'Query must not be empty'),
  severity: z.enum(['low', 'medium', 'high', 'critical']).default('medium'),
  risk_score: z.number().int().min(0).max(100).optional(),
  mitre: z.array(z.string()).default([]),
  test_cases: z.array(TestCaseDocumentSchema).default([]),
});

export const RuleSetDocumentSchema = z.object({
  rules: z.array(RuleDocumentSchema).min(1, 'At least one rule is required'),
});

export type TestCaseDocument = z.infer<typeof TestCaseDocumentSchema>;
export type RuleDocument = z.infer<typeof RuleDocumentSchema>;

/**
 * Map rule documents to the raw batch shape `buildRuleBatch` validates.
 */
export function toRawRuleBatch(documents: readonly RuleDocument[]): RawRuleBatch {
  return {
    rules: documents.map((doc) => ({
      id: doc.id,
      name: doc.name,
      description: doc.description,
      query: doc.query,
      severity: doc.severity,
      riskScore: doc.risk_score,
      mitre: doc.mitre,
      testCases: doc.test_cases.map((tc) => ({
        id: tc.id,
        category: tc.type,
        expectedMatch: tc.expected_match,
        payload: tc.log_entry,
        description: tc.description,
      })),
    })),
  };
}

/**
 * Inverse of {@link toRawRuleBatch} for a built rule.
 */
export function toRuleDocument(rule: Rule): RuleDocument {
  return {
    id: rule.id,
    name: rule.name,
    description: rule.description,
    query: rule.query,
    severity: rule.severity,
    ...(rule.riskScore !== undefined ? { risk_score: rule.riskScore } : {}),
    mitre: [...rule.mitre],
    test_cases: rule.testCases.map((tc) => ({
      id: tc.id,
      type: tc.category,
      ...(tc.description !== undefined ? { description: tc.description } : {}),
      expected_match: tc.expectedMatch,
      log_entry: { ...tc.payload },
    })),
  };
}
