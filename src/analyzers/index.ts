/**
 * Analyzers
 *
 * Classification (pluggable models fused by the ensemble), biomechanical
 * evaluation against the exercise rule tables, and session reporting.
 */

export { BiomechanicalEvaluator, NO_ACTIVE_EXERCISE } from './BiomechanicalEvaluator';
export {
  EnsembleClassifier,
  type EnsembleConfig,
  type EnsembleModels,
} from './EnsembleClassifier';
export {
  applyDeepSquatOverride,
  applyLungeSymmetryOverride,
  looksLikeDeepSquat,
  measureOverrideMetrics,
  type OverrideMetrics,
} from './OverrideRules';
export {
  type ClassifierPrediction,
  type ClassifierSlot,
  NO_PREDICTION,
  type PoseClassifier,
  type PredictionSummary,
  runClassifier,
  summarizePrediction,
  toClassificationResult,
} from './PoseClassifier';
export {
  generateReport,
  mostFrequentViolation,
  type QualityTier,
  type ReportSummary,
  summarizeDiagnostics,
  tierForScore,
  type ViolationCount,
} from './ReportGenerator';
