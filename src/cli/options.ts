/**
 * Shared CLI option helpers for detectloop commands.
 *
 * Option registration, run configuration from flags and environment,
 * backend construction, path resolution and message printing.
 */

import { existsSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';

import { ElasticsearchBackend } from '@/backend/elasticsearch-backend.js';
import { InMemoryBackend } from '@/backend/memory-backend.js';
import type { SearchBackend } from '@/backend/types.js';
import { loadRunConfig } from '@/config/run-config.js';
import type { RunConfigOverrides } from '@/config/run-config.js';
import { createQualityThresholds } from '@/refinement/thresholds.js';
import type { RunConfig } from '@/types/config.js';
import type { QualityThresholds } from '@/types/evaluation.js';
import { setLogLevel } from '@/utils/logger.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/** Flags shared by every command that evaluates rules. */
export interface EvaluationFlags {
  backend?: string;
  esUrl?: string;
  esIndex?: string;
  profile?: string;
  minPrecision?: number;
  minRecall?: number;
  maxIterations?: number;
  healthTimeout?: number;
  concurrency?: number;
  retainDocuments?: boolean;
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the -o/--output option to a command.
 */
export function addOutputOption(cmd: Command, defaultValue = './rules'): Command {
  return cmd.option('-o, --output <dir>', 'Output directory for rule files', defaultValue);
}

/**
 * Add backend selection and connection options.
 */
export function addBackendOptions(cmd: Command): Command {
  return cmd
    .option('--backend <kind>', 'Evaluation backend: elasticsearch, memory')
    .option('--es-url <url>', 'Elasticsearch base URL')
    .option('--es-index <name>', 'Elasticsearch evaluation index')
    .option('--health-timeout <ms>', 'Backend health check timeout in milliseconds', parseInteger)
    .option('--concurrency <n>', 'Concurrent ingest and query operations', parseInteger)
    .option('--retain-documents', 'Keep evaluation documents after the run');
}

/**
 * Add quality threshold options.
 */
export function addThresholdOptions(cmd: Command): Command {
  return cmd
    .option('--profile <name>', 'Quality profile: dev, standard, production')
    .option('--min-precision <value>', 'Minimum aggregate precision (0-1)', parseRatio)
    .option('--min-recall <value>', 'Minimum aggregate recall (0-1)', parseRatio)
    .option('--max-iterations <n>', 'Maximum generation attempts', parseInteger);
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output');
}

// ---------------------------------------------------------------------------
// Value parsers
// ---------------------------------------------------------------------------

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseRatio(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Run configuration from the environment with command-line flags on top.
 * Also applies the log level.
 */
export function resolveRunConfig(flags: EvaluationFlags, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const overrides: RunConfigOverrides = {};
  if (flags.backend !== undefined) {
    if (flags.backend !== 'memory' && flags.backend !== 'elasticsearch') {
      throw new Error(`Unknown backend "${flags.backend}". Use: elasticsearch, memory`);
    }
    overrides.backend = flags.backend;
  }
  if (flags.esUrl !== undefined) overrides.esUrl = flags.esUrl;
  if (flags.esIndex !== undefined) overrides.esIndex = flags.esIndex;
  if (flags.healthTimeout !== undefined) overrides.healthCheckTimeoutMs = flags.healthTimeout;
  if (flags.concurrency !== undefined) overrides.concurrency = flags.concurrency;
  if (flags.retainDocuments) overrides.retainDocuments = true;
  if (flags.minPrecision !== undefined) overrides.minPrecision = flags.minPrecision;
  if (flags.minRecall !== undefined) overrides.minRecall = flags.minRecall;
  if (flags.maxIterations !== undefined) overrides.maxIterations = flags.maxIterations;

  if (flags.profile !== undefined) {
    if (flags.profile !== 'dev' && flags.profile !== 'standard' && flags.profile !== 'production') {
      throw new Error(`Unknown profile "${flags.profile}". Use: dev, standard, production`);
    }
    overrides.profile = flags.profile;
  }

  const config = loadRunConfig(env, overrides);
  setLogLevel(flags.verbose ? 'debug' : config.logLevel);
  return config;
}

export function thresholdsFor(config: RunConfig): QualityThresholds {
  return createQualityThresholds({
    minPrecision: config.minPrecision,
    minRecall: config.minRecall,
    maxIterations: config.maxIterations,
  });
}

export function createBackend(config: RunConfig): SearchBackend {
  return config.backend === 'memory' ? new InMemoryBackend() : new ElasticsearchBackend(config.elasticsearch);
}

/**
 * Version from the package manifest, for --version and report metadata.
 */
export function packageVersion(): string {
  const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  const manifest = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(manifestPath, 'utf-8')));
  return manifest.version;
}

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve an input file or directory.
 *
 * @throws Error when it does not exist.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);
  if (!existsSync(resolved)) {
    throw new Error(`Input path does not exist: ${resolved}`);
  }
  return resolved;
}

/**
 * Resolve an output directory path, creating it (and parents) if missing.
 *
 * @throws Error when the path exists and is not a directory.
 */
export function resolveOutputDir(dir: string): string {
  const resolved = resolve(dir);
  if (!existsSync(resolved)) {
    mkdirSync(resolved, { recursive: true });
  } else if (!statSync(resolved).isDirectory()) {
    throw new Error(`Output path exists but is not a directory: ${resolved}`);
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

export function printHeader(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  detectloop — ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
