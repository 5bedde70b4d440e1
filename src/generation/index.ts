export { LlmRuleGenerator } from './generator.js';
export type { RuleGenerator, LlmGeneratorOptions } from './generator.js';
export { buildRuleBatch, createTestCase, assertBatchContract } from './rule-builder.js';
export type { RawRule, RawRuleBatch, RawTestCase } from './rule-builder.js';
