/**
 * Search backend contract used by the evaluation harness.
 */

import type { FieldTypeMap, ProvisionAction } from '@/types/evaluation.js';
import type { FlatDocument } from '@/utils/flatten.js';

/**
 * Field mapping the harness asks the backend to hold before ingestion.
 */
export interface FieldPlan {
  fields: FieldTypeMap;
}

export interface IndexedDocument {
  id: string;
  source: FlatDocument;
}

export interface SearchBackend {
  /** Short identifier used in logs. */
  readonly name: string;

  /** Resolves false (never rejects) when the backend is not reachable in time. */
  healthCheck(timeoutMs: number): Promise<boolean>;

  /**
   * Bring the schema in line with `plan`. Idempotent: a compatible mapping
   * is reused, missing fields are added, conflicting types force a rebuild.
   */
  provisionSchema(plan: FieldPlan): Promise<ProvisionAction>;

  /** Field types as the backend actually holds them. */
  getFieldTypes(): Promise<FieldTypeMap>;

  ingest(doc: IndexedDocument, runTag: string): Promise<void>;

  /** Make everything ingested so far visible to queries. */
  refresh(): Promise<void>;

  /**
   * Ids of documents tagged with `runTag` that match `expression`.
   *
   * @throws MalformedQueryError when the expression cannot be parsed.
   */
  query(expression: string, runTag: string): Promise<Set<string>>;

  /** Delete every document of a run. Returns the number removed. */
  deleteRun(runTag: string): Promise<number>;
}
