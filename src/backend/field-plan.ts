/**
 * Field plan: which type every field of a batch must be provisioned with.
 */

import type { RuleBatch } from '@/types/detection-rule.js';
import type { FieldType, FieldTypeMap } from '@/types/evaluation.js';
import { extractQueryFields } from '@/query/lucene.js';
import { flattenPayload } from '@/utils/flatten.js';
import type { FieldPlan } from './types.js';

export const RUN_TAG_FIELD = 'labels.evaluation_run';
export const RULE_ID_FIELD = 'labels.rule_id';
export const TEST_CASE_ID_FIELD = 'labels.test_case_id';
export const TEST_CATEGORY_FIELD = 'labels.test_category';

export const CORE_FIELDS: Readonly<FieldTypeMap> = {
  '@timestamp': 'date',
  'event.kind': 'keyword',
  [RUN_TAG_FIELD]: 'keyword',
  [RULE_ID_FIELD]: 'keyword',
  [TEST_CASE_ID_FIELD]: 'keyword',
  [TEST_CATEGORY_FIELD]: 'keyword',
};

/**
 * Build the plan for a batch.
 *
 * Fields any rule queries with a wildcard or regex become `wildcard`;
 * everything else queried or present in a payload is `keyword`.
 */
export function buildFieldPlan(batch: RuleBatch): FieldPlan {
  const fields: FieldTypeMap = {};
  const set = (field: string, type: FieldType): void => {
    if (field in CORE_FIELDS) return;
    if (fields[field] === 'wildcard') return;
    fields[field] = type;
  };

  for (const rule of batch.rules) {
    for (const usage of extractQueryFields(rule.query)) {
      set(usage.field, usage.pattern ? 'wildcard' : 'keyword');
    }
    for (const testCase of rule.testCases) {
      for (const field of Object.keys(flattenPayload(testCase.payload))) {
        set(field, 'keyword');
      }
    }
  }

  return { fields: { ...fields, ...CORE_FIELDS } };
}

/**
 * Fields of `plan` whose type differs from what `actual` holds.
 */
export function findConflicts(plan: FieldPlan, actual: FieldTypeMap): string[] {
  return Object.entries(plan.fields)
    .filter(([field, type]) => actual[field] !== undefined && actual[field] !== type)
    .map(([field]) => field);
}

/**
 * Fields of `plan` that `actual` does not hold yet.
 */
export function findMissing(plan: FieldPlan, actual: FieldTypeMap): string[] {
  return Object.keys(plan.fields).filter((field) => actual[field] === undefined);
}
