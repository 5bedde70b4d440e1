import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import {
  addBackendOptions,
  addThresholdOptions,
  createBackend,
  packageVersion,
  parseInteger,
  parseRatio,
  resolveInputPath,
  resolveOutputDir,
  resolveRunConfig,
  thresholdsFor,
} from '../../../src/cli/options.js';
import { ElasticsearchBackend } from '../../../src/backend/elasticsearch-backend.js';
import { InMemoryBackend } from '../../../src/backend/memory-backend.js';
import { getLogLevel, setLogLevel } from '../../../src/utils/logger.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'detectloop-cli-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  setLogLevel('info');
});

describe('value parsers', () => {
  it('parses non-negative integers', () => {
    expect(parseInteger('250')).toBe(250);
    expect(() => parseInteger('2.5')).toThrow(InvalidArgumentError);
    expect(() => parseInteger('-1')).toThrow('Expected a non-negative integer.');
  });

  it('parses ratios between 0 and 1', () => {
    expect(parseRatio('0.75')).toBe(0.75);
    expect(parseRatio('1')).toBe(1);
    expect(() => parseRatio('')).toThrow('Expected a number between 0 and 1.');
    expect(() => parseRatio('1.5')).toThrow(InvalidArgumentError);
  });
});

describe('option registration', () => {
  it('parses backend and threshold flags', () => {
    const cmd = addThresholdOptions(addBackendOptions(new Command('evaluate')));
    cmd.parse(['--backend', 'memory', '--min-recall', '0.8', '--max-iterations', '4', '--retain-documents'], { from: 'user' });

    expect(cmd.opts()).toEqual({ backend: 'memory', minRecall: 0.8, maxIterations: 4, retainDocuments: true });
  });
});

describe('resolveRunConfig', () => {
  it('puts flags on top of the environment', () => {
    const config = resolveRunConfig(
      { backend: 'memory', minPrecision: 0.9, healthTimeout: 500 },
      { EVAL_BACKEND: 'elasticsearch', MIN_PRECISION: '0.4', EVAL_CONCURRENCY: '2' },
    );

    expect(config.backend).toBe('memory');
    expect(config.minPrecision).toBe(0.9);
    expect(config.healthCheckTimeoutMs).toBe(500);
    expect(config.concurrency).toBe(2);
  });

  it('applies a quality profile', () => {
    expect(resolveRunConfig({ profile: 'dev' }, {})).toMatchObject({ minPrecision: 0.5, minRecall: 0.5, maxIterations: 2 });
  });

  it('rejects unknown backends and profiles', () => {
    expect(() => resolveRunConfig({ backend: 'solr' }, {})).toThrow('Unknown backend "solr". Use: elasticsearch, memory');
    expect(() => resolveRunConfig({ profile: 'lenient' }, {})).toThrow(
      'Unknown profile "lenient". Use: dev, standard, production',
    );
  });

  it('sets the log level', () => {
    resolveRunConfig({}, { LOG_LEVEL: 'warn' });
    expect(getLogLevel()).toBe('warn');

    resolveRunConfig({ verbose: true }, { LOG_LEVEL: 'warn' });
    expect(getLogLevel()).toBe('debug');
  });
});

describe('thresholdsFor', () => {
  it('builds frozen thresholds from the configuration', () => {
    const thresholds = thresholdsFor(resolveRunConfig({ maxIterations: 6 }, {}));
    expect(thresholds).toEqual({ minPrecision: 0.6, minRecall: 0.7, maxIterations: 6 });
    expect(Object.isFrozen(thresholds)).toBe(true);
  });
});

describe('createBackend', () => {
  it('picks the backend named in the configuration', () => {
    expect(createBackend(resolveRunConfig({ backend: 'memory' }, {}))).toBeInstanceOf(InMemoryBackend);
    expect(createBackend(resolveRunConfig({}, {}))).toBeInstanceOf(ElasticsearchBackend);
  });
});

describe('packageVersion', () => {
  it('reads the version from the package manifest', () => {
    expect(packageVersion()).toBe('0.1.0');
  });
});

describe('resolveInputPath', () => {
  it('returns the absolute path of an existing file', () => {
    const file = join(dir, 'report.md');
    writeFileSync(file, 'text');
    expect(resolveInputPath(file)).toBe(file);
  });

  it('rejects a missing path', () => {
    const missing = join(dir, 'missing.md');
    expect(() => resolveInputPath(missing)).toThrow(`Input path does not exist: ${missing}`);
  });
});

describe('resolveOutputDir', () => {
  it('creates missing directories', () => {
    const out = join(dir, 'a', 'b');
    expect(resolveOutputDir(out)).toBe(out);
    expect(existsSync(out)).toBe(true);
  });

  it('rejects a path that is a file', () => {
    const file = join(dir, 'rules.yml');
    writeFileSync(file, '');
    expect(() => resolveOutputDir(file)).toThrow(`Output path exists but is not a directory: ${file}`);
  });
});
