import { describe, it, expect } from 'vitest';
import { InMemoryBackend } from '../../../src/backend/memory-backend.js';
import { RUN_TAG_FIELD } from '../../../src/backend/field-plan.js';
import { BackendRequestError, IngestionError, MalformedQueryError } from '../../../src/utils/errors.js';

describe('InMemoryBackend', () => {
  describe('provisionSchema', () => {
    it('creates, reuses, extends and recreates the mapping', async () => {
      const backend = new InMemoryBackend();

      expect(await backend.provisionSchema({ fields: { a: 'keyword' } })).toBe('created');
      expect(await backend.provisionSchema({ fields: { a: 'keyword' } })).toBe('reused');
      expect(await backend.provisionSchema({ fields: { a: 'keyword', b: 'wildcard' } })).toBe('extended');
      expect(await backend.getFieldTypes()).toEqual({ a: 'keyword', b: 'wildcard' });
      expect(await backend.provisionSchema({ fields: { a: 'wildcard' } })).toBe('recreated');
      expect(await backend.getFieldTypes()).toEqual({ a: 'wildcard' });
    });

    it('drops existing documents when the mapping is rebuilt', async () => {
      const backend = new InMemoryBackend();
      await backend.provisionSchema({ fields: { a: 'keyword' } });
      await backend.ingest({ id: 'd1', source: { a: 'x' } }, 'run-1');
      expect(backend.documentCount()).toBe(1);

      await backend.provisionSchema({ fields: { a: 'wildcard' } });
      expect(backend.documentCount()).toBe(0);
    });

    it('pins forced field types over the plan', async () => {
      const backend = new InMemoryBackend({ forcedFieldTypes: { a: 'keyword' } });
      expect(await backend.provisionSchema({ fields: { a: 'wildcard' } })).toBe('created');
      expect(await backend.getFieldTypes()).toEqual({ a: 'keyword' });
      expect(await backend.provisionSchema({ fields: { a: 'wildcard' } })).toBe('reused');
    });

    it('throws when provisioning is set to fail', async () => {
      const backend = new InMemoryBackend({ failProvisioning: true });
      await expect(backend.provisionSchema({ fields: {} })).rejects.toThrow(BackendRequestError);
    });
  });

  describe('ingest / refresh / query', () => {
    async function seeded(): Promise<InMemoryBackend> {
      const backend = new InMemoryBackend();
      await backend.provisionSchema({ fields: { 'process.name': 'wildcard' } });
      await backend.ingest({ id: 'd1', source: { 'process.name': 'cmd.exe' } }, 'run-a');
      await backend.ingest({ id: 'd2', source: { 'process.name': 'cmd.exe' } }, 'run-b');
      return backend;
    }

    it('hides documents until refresh', async () => {
      const backend = await seeded();
      expect(await backend.query('process.name:cmd.exe', 'run-a')).toEqual(new Set());
      await backend.refresh();
      expect(await backend.query('process.name:cmd.exe', 'run-a')).toEqual(new Set(['d1']));
    });

    it('scopes queries to the run tag', async () => {
      const backend = await seeded();
      await backend.refresh();
      expect(await backend.query('process.name:*cmd*', 'run-b')).toEqual(new Set(['d2']));
    });

    it('answers patterns on wildcard fields but not on keyword fields', async () => {
      const backend = new InMemoryBackend();
      await backend.provisionSchema({ fields: { 'process.name': 'keyword', 'process.command_line': 'wildcard' } });
      await backend.ingest({ id: 'd1', source: { 'process.name': 'cmd.exe', 'process.command_line': 'cmd /c whoami' } }, 'run-a');
      await backend.refresh();

      expect(await backend.query('process.name:*cmd*', 'run-a')).toEqual(new Set());
      expect(await backend.query('process.name:cmd.exe', 'run-a')).toEqual(new Set(['d1']));
      expect(await backend.query('process.command_line:*whoami*', 'run-a')).toEqual(new Set(['d1']));
    });

    it('stamps the run tag onto stored documents', async () => {
      const backend = await seeded();
      expect(backend.getDocument('d1')).toEqual({ 'process.name': 'cmd.exe', [RUN_TAG_FIELD]: 'run-a' });
    });

    it('rejects malformed queries', async () => {
      const backend = await seeded();
      await expect(backend.query('process.name:(cmd', 'run-a')).rejects.toThrow(MalformedQueryError);
      expect(backend.queriesExecuted).toBe(1);
    });

    it('fails queries when configured to', async () => {
      const backend = new InMemoryBackend({ failQueries: true });
      await expect(backend.query('a:1', 'run-a')).rejects.toThrow('Simulated search failure (500)');
    });

    it('fails ingestion for selected documents', async () => {
      const backend = new InMemoryBackend({ failIngestFor: (id) => id === 'bad' });
      await expect(backend.ingest({ id: 'bad', source: {} }, 'run-a')).rejects.toThrow(IngestionError);
      await backend.ingest({ id: 'good', source: {} }, 'run-a');
      expect(backend.documentCount('run-a')).toBe(1);
    });
  });

  describe('deleteRun', () => {
    it('removes only the given run', async () => {
      const backend = new InMemoryBackend();
      await backend.ingest({ id: 'd1', source: {} }, 'run-a');
      await backend.ingest({ id: 'd2', source: {} }, 'run-a');
      await backend.ingest({ id: 'd3', source: {} }, 'run-b');

      expect(await backend.deleteRun('run-a')).toBe(2);
      expect(backend.documentCount()).toBe(1);
      expect(backend.documentCount('run-b')).toBe(1);
    });
  });

  describe('healthCheck', () => {
    it('reports up and down', async () => {
      expect(await new InMemoryBackend().healthCheck(100)).toBe(true);
      expect(await new InMemoryBackend({ health: 'down' }).healthCheck(100)).toBe(false);
    });

    it('reports false when the delay exceeds the timeout', async () => {
      expect(await new InMemoryBackend({ healthDelayMs: 50 }).healthCheck(10)).toBe(false);
    });
  });
});
