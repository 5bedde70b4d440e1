/**
 * detectloop public API.
 */

export * from './types/index.js';
export * from './backend/index.js';
export * from './evaluation/index.js';
export * from './generation/index.js';
export * from './refinement/index.js';
export * from './reporting/index.js';
export { AIClient } from './ai/client.js';
export type { ModelTier } from './ai/client.js';
export { loadRunConfig } from './config/run-config.js';
export type { RunConfigOverrides } from './config/run-config.js';
export { loadCti } from './ingestion/cti-loader.js';
export { loadRuleFiles } from './ingestion/rule-loader.js';
export { checkQueryFields, getEcsFieldType, isEcsField, loadEcsCatalog } from './knowledge/ecs/catalog.js';
export type { EcsCatalog, EcsFieldCheck, EcsFieldType } from './knowledge/ecs/catalog.js';
export { parseQuery, extractQueryFields, matchesDocument } from './query/lucene.js';
export type { QueryNode, FieldUsage } from './query/lucene.js';
export { GeneratorContractError, MalformedQueryError, IngestionError, BackendRequestError } from './utils/errors.js';
export { createLogger, setLogLevel } from './utils/logger.js';
