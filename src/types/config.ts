/**
 * Configuration types for detectloop.
 */

import type { QualityProfile } from '@/refinement/thresholds.js';

export interface AIConfig {
  provider: 'openrouter';
  openrouter: {
    apiKey: string;
    models: {
      fast: string;       // Cheap, for quick drafts
      standard: string;   // Balanced, for general tasks
      quality: string;    // Best, for rule generation
    };
    baseUrl: string;
  };
  costTracking: boolean;
  /** Abort a completion request after this long. */
  requestTimeoutMs: number;
  maxTokensPerRequest: number;
  temperature: number;
}

export type BackendKind = 'elasticsearch' | 'memory';

export interface ElasticsearchConfig {
  url: string;
  index: string;
  apiKey?: string;
  username?: string;
  password?: string;
  /** Per-request timeout for everything except the health probe. */
  requestTimeoutMs: number;
  maxRetries: number;
}

export interface RunConfig {
  backend: BackendKind;
  elasticsearch: ElasticsearchConfig;
  healthCheckTimeoutMs: number;
  concurrency: number;
  retainDocuments: boolean;
  profile: QualityProfile;
  minPrecision: number;
  minRecall: number;
  maxIterations: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

// Cost tracking

export interface APIUsage {
  operation: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  durationMs: number;
  timestamp: string;
}
