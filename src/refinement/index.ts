export { RefinementController, pickBest } from './controller.js';
export type { ControllerOptions, ControllerState, RefinementOutcome, RefinementStatus } from './controller.js';
export {
  createQualityThresholds,
  getProfileThresholds,
  checkThresholds,
  isQualityProfile,
  DEFAULT_THRESHOLDS,
  QUALITY_PROFILES,
} from './thresholds.js';
export type { QualityProfile, ThresholdCheck } from './thresholds.js';
