/**
 * Elasticsearch backend over the REST API.
 *
 * Requests go through `fetch` with per-request timeouts and the shared
 * retry helper; responses are validated with Zod before use.
 */

import { z } from 'zod';
import { withRetry } from '@/ai/retry.js';
import type { ElasticsearchConfig } from '@/types/config.js';
import type { FieldType, FieldTypeMap, ProvisionAction } from '@/types/evaluation.js';
import { BackendRequestError, IngestionError, MalformedQueryError, errorMessage } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';
import { RUN_TAG_FIELD, findConflicts, findMissing } from './field-plan.js';
import type { FieldPlan, IndexedDocument, SearchBackend } from './types.js';

const logger = createLogger('elasticsearch');

const MAX_HITS = 10_000;

// --- Response schemas ---

const ClusterHealthSchema = z.object({
  status: z.enum(['green', 'yellow', 'red']),
});

const SearchResponseSchema = z.object({
  hits: z.object({
    hits: z.array(z.object({ _id: z.string() })),
  }),
});

const DeleteByQuerySchema = z.object({
  deleted: z.number().default(0),
});

const MappingResponseSchema = z.record(
  z.object({
    mappings: z.object({
      properties: z.record(z.unknown()).default({}),
    }).passthrough(),
  }),
);

const FIELD_TYPES: readonly FieldType[] = ['wildcard', 'keyword', 'text', 'date'];

interface RequestOptions {
  body?: unknown;
  /** Statuses returned to the caller instead of thrown. */
  allowStatuses?: number[];
}

interface RawResponse {
  status: number;
  body: unknown;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export class ElasticsearchBackend implements SearchBackend {
  readonly name = 'elasticsearch';

  private readonly baseUrl: string;

  constructor(private readonly config: ElasticsearchConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
  }

  async healthCheck(timeoutMs: number): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/_cluster/health`, {
        method: 'GET',
        headers: this.headers(),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        logger.debug(`Health probe returned ${response.status}`);
        return false;
      }
      const parsed = ClusterHealthSchema.safeParse(await response.json());
      if (!parsed.success) return false;
      return parsed.data.status !== 'red';
    } catch (error) {
      logger.debug(`Health probe failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async provisionSchema(plan: FieldPlan): Promise<ProvisionAction> {
    const index = this.indexPath();
    const existing = await this.request('HEAD', index, { allowStatuses: [404] });

    if (existing.status === 404) {
      await this.createIndex(plan.fields);
      return 'created';
    }

    const actual = await this.getFieldTypes();
    const conflicts = findConflicts(plan, actual);
    if (conflicts.length > 0) {
      logger.warn(`Mapping conflict on ${conflicts.join(', ')}; recreating ${this.config.index}`);
      await this.request('DELETE', index, { allowStatuses: [404] });
      await this.createIndex(plan.fields);
      return 'recreated';
    }

    const missing = findMissing(plan, actual);
    if (missing.length > 0) {
      const properties = Object.fromEntries(missing.map((field) => [field, { type: plan.fields[field] }]));
      await this.request('PUT', `${index}/_mapping`, { body: { properties } });
      return 'extended';
    }

    return 'reused';
  }

  async getFieldTypes(): Promise<FieldTypeMap> {
    const response = await this.request('GET', `${this.indexPath()}/_mapping`, { allowStatuses: [404] });
    if (response.status === 404) return {};

    const parsed = MappingResponseSchema.parse(response.body);
    const types: FieldTypeMap = {};
    for (const entry of Object.values(parsed)) {
      collectFieldTypes(entry.mappings.properties, '', types);
    }
    return types;
  }

  async ingest(doc: IndexedDocument, runTag: string): Promise<void> {
    const source = { ...doc.source, [RUN_TAG_FIELD]: runTag };
    try {
      await this.request('PUT', `${this.indexPath()}/_doc/${encodeURIComponent(doc.id)}`, { body: source });
    } catch (error) {
      throw new IngestionError(`Failed to index ${doc.id}: ${errorMessage(error)}`, doc.id);
    }
  }

  async refresh(): Promise<void> {
    await this.request('POST', `${this.indexPath()}/_refresh`);
  }

  async query(expression: string, runTag: string): Promise<Set<string>> {
    const body = {
      size: MAX_HITS,
      _source: false,
      query: {
        bool: {
          filter: [{ term: { [RUN_TAG_FIELD]: runTag } }],
          must: [{ query_string: { query: expression, allow_leading_wildcard: true } }],
        },
      },
    };

    let response: RawResponse;
    try {
      response = await this.request('POST', `${this.indexPath()}/_search`, { body });
    } catch (error) {
      if (error instanceof BackendRequestError && error.statusCode === 400) {
        throw new MalformedQueryError(`Query rejected by Elasticsearch: ${error.message}`, expression);
      }
      throw error;
    }

    const parsed = SearchResponseSchema.parse(response.body);
    return new Set(parsed.hits.hits.map((hit) => hit._id));
  }

  async deleteRun(runTag: string): Promise<number> {
    const response = await this.request('POST', `${this.indexPath()}/_delete_by_query?refresh=true`, {
      body: { query: { term: { [RUN_TAG_FIELD]: runTag } } },
    });
    return DeleteByQuerySchema.parse(response.body).deleted;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async createIndex(fields: FieldTypeMap): Promise<void> {
    const properties = Object.fromEntries(Object.entries(fields).map(([field, type]) => [field, { type }]));
    await this.request('PUT', this.indexPath(), { body: { mappings: { properties } } });
  }

  private indexPath(): string {
    return `/${encodeURIComponent(this.config.index)}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers['Authorization'] = `ApiKey ${this.config.apiKey}`;
    } else if (this.config.username && this.config.password) {
      const token = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
      headers['Authorization'] = `Basic ${token}`;
    }
    return headers;
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<RawResponse> {
    return withRetry(
      async () => {
        const response = await fetch(`${this.baseUrl}${path}`, {
          method,
          headers: this.headers(),
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
          signal: AbortSignal.timeout(this.config.requestTimeoutMs),
        });

        if (options.allowStatuses?.includes(response.status)) {
          return { status: response.status, body: null };
        }

        if (!response.ok) {
          const text = await response.text();
          throw new BackendRequestError(
            `Elasticsearch request failed (${response.status}): ${method} ${path}: ${text.substring(0, 300)}`,
            response.status,
          );
        }

        const text = method === 'HEAD' ? '' : await response.text();
        return { status: response.status, body: text ? parseJson(text) : null };
      },
      {
        maxRetries: this.config.maxRetries,
        initialDelayMs: 250,
        onRetry: (error, attempt) => {
          logger.warn(`Retrying ${method} ${path} (attempt ${attempt}): ${error.message}`);
        },
      },
    );
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new BackendRequestError(`Elasticsearch returned invalid JSON: ${text.substring(0, 200)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && FIELD_TYPES.some((t) => t === value);
}

/**
 * Walk nested mapping properties into dotted field names. Types outside
 * the provisioned set (long, ip, ...) are reported as keyword.
 */
function collectFieldTypes(properties: Record<string, unknown>, prefix: string, out: FieldTypeMap): void {
  for (const [name, definition] of Object.entries(properties)) {
    if (!isRecord(definition)) continue;
    const path = prefix ? `${prefix}.${name}` : name;

    if (isRecord(definition.properties)) {
      collectFieldTypes(definition.properties, path, out);
      continue;
    }
    if (definition.type === undefined) continue;
    out[path] = isFieldType(definition.type) ? definition.type : 'keyword';
  }
}
