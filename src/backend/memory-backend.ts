/**
 * In-process search backend.
 *
 * Emulates the parts of an Elasticsearch index the harness relies on:
 * typed field mappings, a refresh barrier, run-tag scoped queries and
 * per-run deletion. Query semantics per field type come from
 * `matchesDocument`. Unlike Elasticsearch, which answers wildcard queries
 * on `keyword` fields, the emulator treats `keyword` as exact-match only so
 * that a field provisioned without pattern support visibly loses matches.
 */

import type { FieldTypeMap, ProvisionAction } from '@/types/evaluation.js';
import { parseQuery, matchesDocument } from '@/query/lucene.js';
import { IngestionError, BackendRequestError } from '@/utils/errors.js';
import type { FlatDocument } from '@/utils/flatten.js';
import { createLogger } from '@/utils/logger.js';
import { RUN_TAG_FIELD, findConflicts, findMissing } from './field-plan.js';
import type { FieldPlan, IndexedDocument, SearchBackend } from './types.js';

const logger = createLogger('memory-backend');

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type HealthBehavior = 'up' | 'down' | 'hang';

export interface InMemoryBackendOptions {
  /** How the health probe behaves. Default: 'up'. */
  health?: HealthBehavior;
  /** Delay before the probe answers, capped by its timeout. */
  healthDelayMs?: number;
  /**
   * Types pinned regardless of the provisioning plan, like an index
   * template the harness cannot override.
   */
  forcedFieldTypes?: FieldTypeMap;
  /** Document ids whose ingestion fails. */
  failIngestFor?: (documentId: string) => boolean;
  failProvisioning?: boolean;
  failRefresh?: boolean;
  failQueries?: boolean;
  failDeletion?: boolean;
}

interface StoredDocument {
  runTag: string;
  source: FlatDocument;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export class InMemoryBackend implements SearchBackend {
  readonly name = 'memory';

  private mapping: FieldTypeMap = {};
  private documents = new Map<string, StoredDocument>();
  private visible = new Set<string>();
  private queryCount = 0;

  constructor(private readonly options: InMemoryBackendOptions = {}) {}

  async healthCheck(timeoutMs: number): Promise<boolean> {
    const behavior = this.options.health ?? 'up';
    if (behavior === 'hang') {
      return new Promise<boolean>(() => {});
    }

    const delay = this.options.healthDelayMs ?? 0;
    if (delay > 0) {
      await sleep(Math.min(delay, timeoutMs));
      if (delay > timeoutMs) return false;
    }
    return behavior === 'up';
  }

  async provisionSchema(plan: FieldPlan): Promise<ProvisionAction> {
    if (this.options.failProvisioning) {
      throw new BackendRequestError('Simulated provisioning failure (503)', 503);
    }

    const desired: FieldPlan = {
      fields: { ...plan.fields, ...this.options.forcedFieldTypes },
    };

    if (Object.keys(this.mapping).length === 0) {
      this.mapping = { ...desired.fields };
      return 'created';
    }

    if (findConflicts(desired, this.mapping).length > 0) {
      logger.debug('Mapping conflict, rebuilding index');
      this.mapping = { ...desired.fields };
      this.documents.clear();
      this.visible.clear();
      return 'recreated';
    }

    const missing = findMissing(desired, this.mapping);
    if (missing.length > 0) {
      for (const field of missing) {
        this.mapping[field] = desired.fields[field];
      }
      return 'extended';
    }

    return 'reused';
  }

  async getFieldTypes(): Promise<FieldTypeMap> {
    return { ...this.mapping };
  }

  async ingest(doc: IndexedDocument, runTag: string): Promise<void> {
    if (this.options.failIngestFor?.(doc.id)) {
      throw new IngestionError(`Simulated ingestion failure for ${doc.id}`, doc.id);
    }
    this.documents.set(doc.id, {
      runTag,
      source: { ...doc.source, [RUN_TAG_FIELD]: runTag },
    });
  }

  async refresh(): Promise<void> {
    if (this.options.failRefresh) {
      throw new BackendRequestError('Simulated refresh failure (503)', 503);
    }
    this.visible = new Set(this.documents.keys());
  }

  async query(expression: string, runTag: string): Promise<Set<string>> {
    this.queryCount++;
    const node = parseQuery(expression);
    if (this.options.failQueries) {
      throw new BackendRequestError('Simulated search failure (500)', 500);
    }

    const hits = new Set<string>();
    for (const id of this.visible) {
      const stored = this.documents.get(id);
      if (!stored || stored.runTag !== runTag) continue;
      if (matchesDocument(node, stored.source, this.mapping)) {
        hits.add(id);
      }
    }
    return hits;
  }

  async deleteRun(runTag: string): Promise<number> {
    if (this.options.failDeletion) {
      throw new BackendRequestError('Simulated deletion failure (503)', 503);
    }

    let removed = 0;
    for (const [id, stored] of this.documents) {
      if (stored.runTag !== runTag) continue;
      this.documents.delete(id);
      this.visible.delete(id);
      removed++;
    }
    return removed;
  }

  // --- Inspection helpers for tests and offline runs ---

  documentCount(runTag?: string): number {
    if (runTag === undefined) return this.documents.size;
    return [...this.documents.values()].filter((d) => d.runTag === runTag).length;
  }

  getDocument(id: string): FlatDocument | undefined {
    return this.documents.get(id)?.source;
  }

  get queriesExecuted(): number {
    return this.queryCount;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
