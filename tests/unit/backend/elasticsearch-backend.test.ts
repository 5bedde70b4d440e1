import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ElasticsearchBackend } from '../../../src/backend/elasticsearch-backend.js';
import type { ElasticsearchConfig } from '../../../src/types/config.js';
import { IngestionError, MalformedQueryError } from '../../../src/utils/errors.js';

// ---------------------------------------------------------------------------
// fetch stub
// ---------------------------------------------------------------------------

type Reply = () => Response;

const json = (body: unknown, status = 200): Reply => () => new Response(JSON.stringify(body), { status });
const empty = (status: number): Reply => () => new Response(null, { status });

let replies: Reply[] = [];
const fetchMock = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
  const next = replies.shift();
  if (!next) throw new Error('unexpected fetch');
  return next();
});

function call(index: number): { url: string; method: string; body: unknown; headers: Headers } {
  const [url, init] = fetchMock.mock.calls[index];
  const raw = init?.body;
  return {
    url,
    method: init?.method ?? 'GET',
    body: typeof raw === 'string' ? JSON.parse(raw) : undefined,
    headers: new Headers(init?.headers),
  };
}

function backend(overrides: Partial<ElasticsearchConfig> = {}): ElasticsearchBackend {
  return new ElasticsearchBackend({
    url: 'http://es.test:9200/',
    index: 'detectloop-eval',
    requestTimeoutMs: 1000,
    maxRetries: 0,
    ...overrides,
  });
}

beforeEach(() => {
  replies = [];
  fetchMock.mockClear();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ElasticsearchBackend', () => {
  describe('healthCheck', () => {
    it('is healthy on green or yellow', async () => {
      replies = [json({ status: 'yellow' })];
      expect(await backend().healthCheck(500)).toBe(true);
      expect(call(0).url).toBe('http://es.test:9200/_cluster/health');
    });

    it('is unhealthy on red, error statuses and network failures', async () => {
      replies = [json({ status: 'red' }), empty(503)];
      const es = backend();
      expect(await es.healthCheck(500)).toBe(false);
      expect(await es.healthCheck(500)).toBe(false);

      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      expect(await es.healthCheck(500)).toBe(false);
    });
  });

  describe('provisionSchema', () => {
    it('creates a missing index with the planned mapping', async () => {
      replies = [empty(404), json({ acknowledged: true })];
      const action = await backend().provisionSchema({ fields: { 'process.name': 'wildcard' } });

      expect(action).toBe('created');
      expect(call(0)).toMatchObject({ method: 'HEAD', url: 'http://es.test:9200/detectloop-eval' });
      expect(call(1)).toMatchObject({
        method: 'PUT',
        url: 'http://es.test:9200/detectloop-eval',
        body: { mappings: { properties: { 'process.name': { type: 'wildcard' } } } },
      });
    });

    it('recreates the index when a field type conflicts', async () => {
      replies = [
        empty(200),
        json({ 'detectloop-eval': { mappings: { properties: { process: { properties: { name: { type: 'keyword' } } } } } } }),
        json({ acknowledged: true }),
        json({ acknowledged: true }),
      ];
      const action = await backend().provisionSchema({ fields: { 'process.name': 'wildcard' } });

      expect(action).toBe('recreated');
      expect(fetchMock.mock.calls.map((_, i) => call(i).method)).toEqual(['HEAD', 'GET', 'DELETE', 'PUT']);
    });

    it('adds missing fields to a compatible mapping', async () => {
      replies = [
        empty(200),
        json({ 'detectloop-eval': { mappings: { properties: { a: { type: 'keyword' } } } } }),
        json({ acknowledged: true }),
      ];
      const action = await backend().provisionSchema({ fields: { a: 'keyword', b: 'wildcard' } });

      expect(action).toBe('extended');
      expect(call(2)).toMatchObject({
        method: 'PUT',
        url: 'http://es.test:9200/detectloop-eval/_mapping',
        body: { properties: { b: { type: 'wildcard' } } },
      });
    });

    it('reuses an identical mapping', async () => {
      replies = [empty(200), json({ 'detectloop-eval': { mappings: { properties: { a: { type: 'keyword' } } } } })];
      expect(await backend().provisionSchema({ fields: { a: 'keyword' } })).toBe('reused');
    });
  });

  describe('getFieldTypes', () => {
    it('flattens nested properties and maps unknown types to keyword', async () => {
      replies = [
        json({
          'detectloop-eval': {
            mappings: {
              properties: {
                '@timestamp': { type: 'date' },
                process: { properties: { name: { type: 'wildcard' }, pid: { type: 'long' } } },
              },
            },
          },
        }),
      ];
      expect(await backend().getFieldTypes()).toEqual({
        '@timestamp': 'date',
        'process.name': 'wildcard',
        'process.pid': 'keyword',
      });
    });

    it('returns an empty map when the index does not exist', async () => {
      replies = [empty(404)];
      expect(await backend().getFieldTypes()).toEqual({});
    });
  });

  describe('query', () => {
    it('filters by run tag and returns hit ids', async () => {
      replies = [json({ hits: { hits: [{ _id: 'd1' }, { _id: 'd2' }] } })];
      const hits = await backend().query('process.name:*cmd*', 'run-1');

      expect(hits).toEqual(new Set(['d1', 'd2']));
      expect(call(0)).toMatchObject({
        method: 'POST',
        url: 'http://es.test:9200/detectloop-eval/_search',
        body: {
          size: 10000,
          _source: false,
          query: {
            bool: {
              filter: [{ term: { 'labels.evaluation_run': 'run-1' } }],
              must: [{ query_string: { query: 'process.name:*cmd*', allow_leading_wildcard: true } }],
            },
          },
        },
      });
    });

    it('maps a 400 response to MalformedQueryError', async () => {
      replies = [json({ error: { type: 'query_shard_exception' } }, 400)];
      await expect(backend().query('a:(', 'run-1')).rejects.toThrow(MalformedQueryError);
    });
  });

  describe('ingest', () => {
    it('writes the document with the run tag', async () => {
      replies = [json({ result: 'created' }, 201)];
      await backend().ingest({ id: 'run-1:r1:0', source: { a: 'x' } }, 'run-1');

      expect(call(0)).toMatchObject({
        method: 'PUT',
        url: 'http://es.test:9200/detectloop-eval/_doc/run-1%3Ar1%3A0',
        body: { a: 'x', 'labels.evaluation_run': 'run-1' },
      });
    });

    it('wraps failures in IngestionError', async () => {
      replies = [json({ error: 'mapper_parsing_exception' }, 500)];
      const error = await backend()
        .ingest({ id: 'd1', source: {} }, 'run-1')
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IngestionError);
      expect(error).toMatchObject({ documentId: 'd1' });
    });
  });

  describe('deleteRun', () => {
    it('deletes by run tag and returns the count', async () => {
      replies = [json({ deleted: 7 })];
      expect(await backend().deleteRun('run-1')).toBe(7);
      expect(call(0).url).toBe('http://es.test:9200/detectloop-eval/_delete_by_query?refresh=true');
      expect(call(0).body).toEqual({ query: { term: { 'labels.evaluation_run': 'run-1' } } });
    });
  });

  describe('requests', () => {
    it('sends an API key when configured', async () => {
      replies = [json({})];
      await backend({ apiKey: 'test-key' }).refresh();
      expect(call(0).headers.get('Authorization')).toBe('ApiKey test-key');
    });

    it('sends basic credentials when configured', async () => {
      replies = [json({})];
      await backend({ username: 'elastic', password: 'test-secret' }).refresh();
      expect(call(0).headers.get('Authorization')).toBe(
        `Basic ${Buffer.from('elastic:test-secret').toString('base64')}`,
      );
    });

    it('retries transient failures', async () => {
      replies = [empty(503), json({})];
      await backend({ maxRetries: 1 }).refresh();
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('reports the status and path of a failed request', async () => {
      replies = [() => new Response('unavailable', { status: 503 })];
      await expect(backend().refresh()).rejects.toThrow(
        'Elasticsearch request failed (503): POST /detectloop-eval/_refresh: unavailable',
      );
    });
  });
});
