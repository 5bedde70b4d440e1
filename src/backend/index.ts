export type { FieldPlan, IndexedDocument, SearchBackend } from './types.js';
export {
  buildFieldPlan,
  findConflicts,
  findMissing,
  CORE_FIELDS,
  RUN_TAG_FIELD,
  RULE_ID_FIELD,
  TEST_CASE_ID_FIELD,
  TEST_CATEGORY_FIELD,
} from './field-plan.js';
export { InMemoryBackend } from './memory-backend.js';
export type { InMemoryBackendOptions, HealthBehavior } from './memory-backend.js';
export { ElasticsearchBackend } from './elasticsearch-backend.js';
