/**
 * Quality thresholds for the refinement loop.
 *
 * Three tiered profiles control strictness:
 * - **dev**: Lenient thresholds for rapid iteration
 * - **standard**: Baseline for rules meant to be deployed
 * - **production**: Strict precision for high-confidence alerting
 *
 * Thresholds are immutable values passed explicitly to the controller.
 */

import { z } from 'zod';
import type { AggregateMetrics, QualityThresholds } from '@/types/evaluation.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type QualityProfile = 'dev' | 'standard' | 'production';

export const QUALITY_PROFILES: readonly QualityProfile[] = ['dev', 'standard', 'production'];

export interface ThresholdCheck {
  name: 'precision' | 'recall';
  pass: boolean;
  actual: number;
  threshold: number;
}

// ---------------------------------------------------------------------------
// Profile Definitions
// ---------------------------------------------------------------------------

const PROFILES: Record<QualityProfile, QualityThresholds> = {
  dev: { minPrecision: 0.5, minRecall: 0.5, maxIterations: 2 },
  standard: { minPrecision: 0.6, minRecall: 0.7, maxIterations: 3 },
  production: { minPrecision: 0.8, minRecall: 0.7, maxIterations: 5 },
};

const ThresholdsSchema = z.object({
  minPrecision: z.number().min(0).max(1),
  minRecall: z.number().min(0).max(1),
  maxIterations: z.number().int().min(1).max(50),
});

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function isQualityProfile(value: unknown): value is QualityProfile {
  return typeof value === 'string' && QUALITY_PROFILES.some((p) => p === value);
}

/**
 * Get the thresholds for a given quality profile.
 */
export function getProfileThresholds(profile: QualityProfile): QualityThresholds {
  return Object.freeze({ ...PROFILES[profile] });
}

export const DEFAULT_THRESHOLDS: QualityThresholds = getProfileThresholds('standard');

/**
 * Build a validated, frozen thresholds value. Missing fields come from
 * the profile (default: standard).
 *
 * @throws Error when a value is out of range.
 */
export function createQualityThresholds(
  overrides: Partial<QualityThresholds> = {},
  profile: QualityProfile = 'standard',
): QualityThresholds {
  const base = PROFILES[profile];
  const result = ThresholdsSchema.safeParse({
    minPrecision: overrides.minPrecision ?? base.minPrecision,
    minRecall: overrides.minRecall ?? base.minRecall,
    maxIterations: overrides.maxIterations ?? base.maxIterations,
  });

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid quality thresholds: ${issues.join('; ')}`);
  }

  return Object.freeze(result.data);
}

/**
 * Per-metric pass/fail against the thresholds.
 */
export function checkThresholds(aggregate: AggregateMetrics, thresholds: QualityThresholds): ThresholdCheck[] {
  return [
    {
      name: 'precision',
      pass: aggregate.precision >= thresholds.minPrecision,
      actual: aggregate.precision,
      threshold: thresholds.minPrecision,
    },
    {
      name: 'recall',
      pass: aggregate.recall >= thresholds.minRecall,
      actual: aggregate.recall,
      threshold: thresholds.minRecall,
    },
  ];
}
