/**
 * Construction and validation of rule batches.
 *
 * Everything a generator returns passes through here before evaluation.
 * Violations raise {@link GeneratorContractError} with one issue per
 * problem found.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Payload, Rule, RuleBatch, TestCase, TestCategory } from '@/types/detection-rule.js';
import { GeneratorContractError } from '@/utils/errors.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const PayloadSchema = z.record(z.unknown());

export const RawTestCaseSchema = z.object({
  id: z.string().min(1).optional(),
  category: z.enum(['TP', 'FN', 'FP', 'TN']),
  expectedMatch: z.boolean().optional(),
  payload: PayloadSchema,
  description: z.string().optional(),
});

export const RawRuleSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  description: z.string().default(''),
  query: z.string().min(1),
  severity: z.enum(['low', 'medium', 'high', 'critical']).default('medium'),
  riskScore: z.number().int().min(0).max(100).optional(),
  mitre: z.array(z.string()).default([]),
  testCases: z.array(RawTestCaseSchema).default([]),
});

export const RawRuleBatchSchema = z.object({
  rules: z.array(RawRuleSchema),
  generatedAt: z.string().optional(),
});

export type RawTestCase = z.input<typeof RawTestCaseSchema>;
export type RawRule = z.input<typeof RawRuleSchema>;
export type RawRuleBatch = z.input<typeof RawRuleBatchSchema>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build a test case. `expectedMatch` defaults from the category and must
 * agree with it when given.
 */
export function createTestCase(input: {
  id?: string;
  category: TestCategory;
  expectedMatch?: boolean;
  payload: Payload;
  description?: string;
}): TestCase {
  const derived = input.category === 'TP';
  if (input.expectedMatch !== undefined && input.expectedMatch !== derived) {
    throw new GeneratorContractError(
      `Test case ${input.id ?? '(unnamed)'}: category ${input.category} requires expectedMatch=${derived}`,
      [`expectedMatch contradicts category ${input.category}`],
    );
  }

  const testCase: TestCase = {
    id: input.id ?? uuidv4(),
    category: input.category,
    expectedMatch: derived,
    payload: deepFreeze(structuredClone(input.payload)),
    ...(input.description !== undefined ? { description: input.description } : {}),
  };
  return Object.freeze(testCase);
}

/**
 * Validate raw generator output and build a frozen batch.
 *
 * @throws GeneratorContractError listing every problem found.
 */
export function buildRuleBatch(raw: unknown, now: () => Date = () => new Date()): RuleBatch {
  const parsed = RawRuleBatchSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new GeneratorContractError('Generator output does not match the rule batch schema', issues);
  }

  const issues: string[] = [];
  const rules: Rule[] = [];

  parsed.data.rules.forEach((rawRule, ruleIndex) => {
    const ruleId = rawRule.id ?? `rule-${ruleIndex + 1}`;
    const testCases: TestCase[] = [];

    rawRule.testCases.forEach((rawCase, caseIndex) => {
      try {
        testCases.push(
          createTestCase({
            id: rawCase.id ?? `${ruleId}-tc-${caseIndex + 1}`,
            category: rawCase.category,
            expectedMatch: rawCase.expectedMatch,
            payload: toPayload(rawCase.payload),
            description: rawCase.description,
          }),
        );
      } catch (error) {
        if (!(error instanceof GeneratorContractError)) throw error;
        issues.push(`rules.${ruleIndex}.testCases.${caseIndex}: ${error.message}`);
      }
    });

    rules.push(
      Object.freeze({
        id: ruleId,
        name: rawRule.name,
        description: rawRule.description,
        query: rawRule.query,
        severity: rawRule.severity,
        ...(rawRule.riskScore !== undefined ? { riskScore: rawRule.riskScore } : {}),
        mitre: Object.freeze([...rawRule.mitre]),
        testCases: Object.freeze(testCases),
      }),
    );
  });

  if (issues.length > 0) {
    throw new GeneratorContractError(`Generator output has ${issues.length} invalid test case(s)`, issues);
  }

  const batch: RuleBatch = Object.freeze({
    rules: Object.freeze(rules),
    generatedAt: parsed.data.generatedAt ?? now().toISOString(),
  });
  assertBatchContract(batch);
  return batch;
}

/**
 * Batch-level rules: at least one rule, unique rule ids, unique test case
 * ids within a rule, at least one TP case overall, labels consistent with
 * categories.
 *
 * @throws GeneratorContractError
 */
export function assertBatchContract(batch: RuleBatch): void {
  const issues: string[] = [];

  if (batch.rules.length === 0) {
    issues.push('batch contains no rules');
  }

  const seenRules = new Set<string>();
  for (const rule of batch.rules) {
    if (seenRules.has(rule.id)) issues.push(`duplicate rule id ${rule.id}`);
    seenRules.add(rule.id);

    const seenCases = new Set<string>();
    for (const testCase of rule.testCases) {
      if (seenCases.has(testCase.id)) issues.push(`rule ${rule.id}: duplicate test case id ${testCase.id}`);
      seenCases.add(testCase.id);
      if (testCase.expectedMatch !== (testCase.category === 'TP')) {
        issues.push(`rule ${rule.id}: test case ${testCase.id} expectedMatch contradicts category ${testCase.category}`);
      }
    }
  }

  if (batch.rules.length > 0 && !batch.rules.some((r) => r.testCases.some((tc) => tc.category === 'TP'))) {
    issues.push('batch contains no TP test case');
  }

  if (issues.length > 0) {
    throw new GeneratorContractError(`Rule batch violates the generator contract: ${issues[0]}`, issues);
  }
}

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

/**
 * Narrow a JSON object to a payload, dropping values JSON cannot carry.
 */
function toPayload(value: Record<string, unknown>): Payload {
  const payload: Payload = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toPayloadValue(entry);
    if (converted !== undefined) payload[key] = converted;
  }
  return payload;
}

function toPayloadValue(value: unknown): Payload[string] | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    return value.flatMap((item) => {
      const converted = toPayloadValue(item);
      return converted === undefined ? [] : [converted];
    });
  }
  if (typeof value === 'object') {
    return toPayload(Object.fromEntries(Object.entries(value)));
  }
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
