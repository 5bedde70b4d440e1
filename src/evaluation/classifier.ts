/**
 * Classifier: decides whether a rule's query matches one ingested test
 * case document.
 *
 * Each rule's query runs once per evaluation, scoped to the run tag; every
 * test case of the rule is then a membership check on that hit set.
 */

import type { SearchBackend } from '@/backend/types.js';
import type { Rule, TestCase } from '@/types/detection-rule.js';
import type { ClassificationOutcome } from '@/types/evaluation.js';
import { MalformedQueryError, errorMessage } from '@/utils/errors.js';

export class Classifier {
  private readonly hits = new Map<string, Promise<Set<string>>>();

  constructor(
    private readonly backend: SearchBackend,
    private readonly runTag: string,
  ) {}

  async classify(rule: Rule, testCase: TestCase, documentId: string): Promise<ClassificationOutcome> {
    const base = {
      ruleId: rule.id,
      testCaseId: testCase.id,
      category: testCase.category,
      expectedMatch: testCase.expectedMatch,
      documentId,
    };

    try {
      const matched = (await this.hitsFor(rule)).has(documentId);
      return { ...base, status: 'scored', actualMatch: matched, correct: matched === testCase.expectedMatch };
    } catch (error) {
      return {
        ...base,
        status: 'errored',
        actualMatch: 'indeterminate',
        errorKind: error instanceof MalformedQueryError ? 'malformed_query' : 'backend_error',
        message: errorMessage(error),
      };
    }
  }

  private hitsFor(rule: Rule): Promise<Set<string>> {
    let pending = this.hits.get(rule.id);
    if (!pending) {
      pending = this.backend.query(rule.query, this.runTag);
      this.hits.set(rule.id, pending);
    }
    return pending;
  }
}
