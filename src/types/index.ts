export type * from './detection-rule.js';
export type * from './evaluation.js';
export type * from './feedback.js';
export type * from './config.js';
export { TEST_CATEGORIES } from './detection-rule.js';
