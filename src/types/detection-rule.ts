/**
 * Detection rule types: rules produced by the generator and the labeled
 * synthetic payloads (test cases) that ship with them.
 */

// --- Test Cases ---

/**
 * Closed set of test case categories.
 *
 * - TP: attack payload the rule must match
 * - FN: known evasion variant, expected to slip past the rule
 * - FP: benign payload that looks suspicious, must not match
 * - TN: ordinary benign payload, must not match
 */
export type TestCategory = 'TP' | 'FN' | 'FP' | 'TN';

export const TEST_CATEGORIES: readonly TestCategory[] = ['TP', 'FN', 'FP', 'TN'];

/** A scalar value as it appears in a flattened payload. */
export type PayloadScalar = string | number | boolean | null;

/** Structured key-value document. Nested objects are allowed. */
export interface Payload {
  [key: string]: PayloadValue;
}

export type PayloadValue = PayloadScalar | PayloadValue[] | Payload;

export interface TestCase {
  readonly id: string;
  readonly category: TestCategory;
  /** True exactly when `category` is TP. */
  readonly expectedMatch: boolean;
  readonly payload: Readonly<Payload>;
  readonly description?: string;
}

// --- Rules ---

export type RuleSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** Lucene query_string expression. */
  readonly query: string;
  readonly severity: RuleSeverity;
  /** 0-100, mirrors the risk score of the target monitoring platform. */
  readonly riskScore?: number;
  /** ATT&CK technique ids, e.g. T1490. */
  readonly mitre: readonly string[];
  readonly testCases: readonly TestCase[];
}

export interface RuleBatch {
  readonly rules: readonly Rule[];
  readonly generatedAt: string;
}
