/**
 * Evaluation harness: runs a rule batch against a search backend.
 *
 * Steps:
 *   1. availability gate (bounded health probe)
 *   2. schema provisioning from the batch's field plan
 *   3. ingestion of one document per (rule, test case), then a refresh
 *   4. classification of every pair with bounded concurrency
 *   5. teardown of the run's documents
 *
 * An unreachable backend is reported as `backend_unavailable`, never thrown.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  buildFieldPlan,
  RULE_ID_FIELD,
  RUN_TAG_FIELD,
  TEST_CASE_ID_FIELD,
  TEST_CATEGORY_FIELD,
} from '@/backend/field-plan.js';
import type { IndexedDocument, SearchBackend } from '@/backend/types.js';
import type { Rule, RuleBatch, TestCase } from '@/types/detection-rule.js';
import type {
  ClassificationOutcome,
  CompletedEvaluation,
  EvaluationResult,
  FieldTypeMap,
  ProvisionAction,
  UnavailableEvaluation,
} from '@/types/evaluation.js';
import { mapWithConcurrency } from '@/utils/concurrency.js';
import { errorMessage } from '@/utils/errors.js';
import { flattenPayload } from '@/utils/flatten.js';
import { createLogger } from '@/utils/logger.js';
import { Classifier } from './classifier.js';

const logger = createLogger('harness');

/** Extra time granted to the probe on top of its own timeout. */
const HEALTH_GRACE_MS = 250;

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface HarnessOptions {
  /** Health probe timeout. Default: 3000. */
  healthCheckTimeoutMs?: number;
  /** Concurrent ingest and classify operations. Default: 4. */
  concurrency?: number;
  /** Keep run documents after evaluation. Default: false. */
  retainDocuments?: boolean;
  /** Clock used for document timestamps. */
  now?: () => Date;
  runTagFactory?: () => string;
}

/**
 * Anything that can evaluate a batch; the refinement controller depends
 * on this rather than on the harness class.
 */
export interface RuleEvaluator {
  evaluate(batch: RuleBatch): Promise<EvaluationResult>;
}

interface PlannedPair {
  rule: Rule;
  testCase: TestCase;
  document: IndexedDocument;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export class EvaluationHarness implements RuleEvaluator {
  private readonly healthCheckTimeoutMs: number;
  private readonly concurrency: number;
  private readonly retainDocuments: boolean;
  private readonly now: () => Date;
  private readonly runTagFactory: () => string;

  constructor(
    private readonly backend: SearchBackend,
    options: HarnessOptions = {},
  ) {
    this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? 3000;
    this.concurrency = options.concurrency ?? 4;
    this.retainDocuments = options.retainDocuments ?? false;
    this.now = options.now ?? (() => new Date());
    this.runTagFactory = options.runTagFactory ?? (() => `run-${uuidv4()}`);
  }

  async evaluate(batch: RuleBatch): Promise<EvaluationResult> {
    const started = Date.now();
    const unavailable = (reason: string): UnavailableEvaluation => {
      logger.warn(`Backend ${this.backend.name} unavailable: ${reason}`);
      return { status: 'backend_unavailable', reason, durationMs: Date.now() - started };
    };

    // 1. Availability gate
    const healthy = await this.probe();
    if (healthy !== true) {
      return unavailable(healthy);
    }

    // 2. Provisioning
    let provisioning: ProvisionAction;
    let fieldTypes: FieldTypeMap;
    try {
      provisioning = await this.backend.provisionSchema(buildFieldPlan(batch));
      fieldTypes = await this.backend.getFieldTypes();
    } catch (error) {
      return unavailable(`schema provisioning failed: ${errorMessage(error)}`);
    }
    logger.debug(`Schema ${provisioning} (${Object.keys(fieldTypes).length} fields)`);

    const runTag = this.runTagFactory();
    const pairs = this.planDocuments(batch, runTag);
    const failedIngest = new Map<string, string>();
    let teardown: CompletedEvaluation['teardown'] | undefined;

    try {
      // 3. Ingestion
      await mapWithConcurrency(pairs, this.concurrency, async ({ document }) => {
        try {
          await this.backend.ingest(document, runTag);
        } catch (error) {
          failedIngest.set(document.id, errorMessage(error));
          logger.warn(`Ingestion failed for ${document.id}: ${errorMessage(error)}`);
        }
      });

      try {
        await this.backend.refresh();
      } catch (error) {
        return unavailable(`refresh failed: ${errorMessage(error)}`);
      }

      // 4. Classification, one slot per pair
      const classifier = new Classifier(this.backend, runTag);
      const results = await mapWithConcurrency(pairs, this.concurrency, async ({ rule, testCase, document }) => {
        const ingestError = failedIngest.get(document.id);
        if (ingestError !== undefined) {
          return ingestionFailed(rule, testCase, document.id, ingestError);
        }
        return classifier.classify(rule, testCase, document.id);
      });

      const outcomes = new Map<string, ClassificationOutcome[]>();
      for (const rule of batch.rules) {
        outcomes.set(rule.id, []);
      }
      for (const outcome of results) {
        outcomes.get(outcome.ruleId)?.push(outcome);
      }

      logger.info(
        `Evaluated ${batch.rules.length} rule(s), ${pairs.length} test case(s) in run ${runTag}` +
          (failedIngest.size > 0 ? ` (${failedIngest.size} ingestion failure(s))` : ''),
      );

      // 5. Teardown
      teardown = await this.teardown(runTag);
      return {
        status: 'completed',
        runTag,
        outcomes,
        fieldTypes,
        provisioning,
        ingestion: { attempted: pairs.length, failed: failedIngest.size },
        teardown,
        durationMs: Date.now() - started,
      };
    } finally {
      if (teardown === undefined) {
        await this.teardown(runTag);
      }
    }
  }

  /**
   * Resolves true when healthy, otherwise with the reason it is not.
   */
  private async probe(): Promise<true | string> {
    const timeoutMs = this.healthCheckTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<string>((resolve) => {
      timer = setTimeout(() => resolve(`health check timed out after ${timeoutMs}ms`), timeoutMs + HEALTH_GRACE_MS);
    });

    const check = this.backend.healthCheck(timeoutMs).then(
      (ok): true | string => (ok ? true : 'health check failed'),
      (error: unknown): string => `health check error: ${errorMessage(error)}`,
    );

    try {
      return await Promise.race([check, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private planDocuments(batch: RuleBatch, runTag: string): PlannedPair[] {
    const timestamp = this.now().toISOString();
    const pairs: PlannedPair[] = [];

    for (const rule of batch.rules) {
      rule.testCases.forEach((testCase, index) => {
        const flat = flattenPayload(testCase.payload);
        const id = `${runTag}:${rule.id}:${index}`;
        pairs.push({
          rule,
          testCase,
          document: {
            id,
            source: {
              '@timestamp': timestamp,
              'event.kind': 'event',
              ...flat,
              [RUN_TAG_FIELD]: runTag,
              [RULE_ID_FIELD]: rule.id,
              [TEST_CASE_ID_FIELD]: testCase.id,
              [TEST_CATEGORY_FIELD]: testCase.category,
            },
          },
        });
      });
    }

    return pairs;
  }

  private async teardown(runTag: string): Promise<CompletedEvaluation['teardown']> {
    if (this.retainDocuments) return 'retained';
    try {
      const removed = await this.backend.deleteRun(runTag);
      logger.debug(`Removed ${removed} document(s) of run ${runTag}`);
      return 'cleaned';
    } catch (error) {
      logger.warn(`Teardown of run ${runTag} failed: ${errorMessage(error)}`);
      return 'failed';
    }
  }
}

function ingestionFailed(rule: Rule, testCase: TestCase, documentId: string, message: string): ClassificationOutcome {
  return {
    ruleId: rule.id,
    testCaseId: testCase.id,
    category: testCase.category,
    expectedMatch: testCase.expectedMatch,
    documentId,
    status: 'errored',
    actualMatch: 'indeterminate',
    errorKind: 'ingestion_failed',
    message,
  };
}
