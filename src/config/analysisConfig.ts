/**
 * Analysis Configuration
 *
 * Window geometry, decision thresholds and the clinical constants the override
 * rules and exercise rule tables read. The clinical values are empirical; keep
 * them here rather than inline so they can be tuned per deployment.
 */

import { AnalysisConfigError } from '../utils/errors';

/**
 * Empirical thresholds used by override rules and per-exercise rule tables.
 * Distances are in normalized image units, angles in degrees.
 */
export interface ClinicalThresholds {
  // Ensemble overrides
  /** Mean per-frame minimum knee angle below which a window may be a squat */
  squatOverrideKneeAngle: number;
  /** Mean knee angle below which a window is a squat regardless of hip travel */
  squatOverrideDeepKneeAngle: number;
  /** Minimum range of the hip-to-ankle vertical gap for the squat override */
  squatOverrideHipTravel: number;
  /** Mean ankle depth difference below which an inline lunge is really a squat */
  lungeAnkleDepthMin: number;

  // Deep squat (temporal)
  /** Deepest knee angle above which the squat is too shallow */
  squatDepthMaxAngle: number;
  /** Knee spread must be at least this fraction of ankle spread */
  kneeToAnkleWidthRatio: number;
  /** Smoothed torso lean ratio above which the lean is excessive */
  torsoLeanMax: number;

  // Per-frame rule tables
  lateralShiftMax: number;
  pelvicTiltMax: number;
  stanceKneeMinAngle: number;
  trunkLeanMaxAngle: number;
  sideLungeTrunkLeanMaxAngle: number;
  shoulderTrunkLeanMaxAngle: number;
  heelRiseMax: number;
  straightLegMinAngle: number;
  earShoulderMinDistance: number;
  wristAsymmetryMax: number;
  straightElbowMinAngle: number;
  elbowDriftMax: number;
}

export interface AnalysisConfig {
  /** Target window length in frames */
  windowSize: number;
  /** Offset between batch window starts in frames */
  step: number;
  /** Frames buffered before live analysis can run */
  minFramesForLiveReady: number;
  /** Classifications below this confidence become NoExerciseDetected */
  confidenceGateThreshold: number;
  /** Windows must exceed this confidence to vote on the session exercise */
  voteConfidenceThreshold: number;
  /** Capacity of the torso-lean smoothing buffer */
  smoothingBufferCapacity: number;
  /** Identical feedback messages inside this interval are dropped */
  feedbackDebounceSeconds: number;
  /** Mean joint visibility at which a frame counts as visible */
  frameVisibilityThreshold: number;
  /** Share of visible frames at which a window counts as visible */
  windowVisibleRatio: number;
  /** Live mode analyzes once every this many ingested frames */
  liveCadenceFrames: number;
  thresholds: ClinicalThresholds;
}

export type AnalysisConfigOverrides = Partial<Omit<AnalysisConfig, 'thresholds'>> & {
  thresholds?: Partial<ClinicalThresholds>;
};

export const DEFAULT_CLINICAL_THRESHOLDS: ClinicalThresholds = {
  squatOverrideKneeAngle: 135,
  squatOverrideDeepKneeAngle: 110,
  squatOverrideHipTravel: 0.1,
  lungeAnkleDepthMin: 0.2,

  squatDepthMaxAngle: 100,
  kneeToAnkleWidthRatio: 0.75,
  torsoLeanMax: 0.7,

  lateralShiftMax: 0.12,
  pelvicTiltMax: 0.05,
  stanceKneeMinAngle: 160,
  trunkLeanMaxAngle: 20,
  sideLungeTrunkLeanMaxAngle: 30,
  shoulderTrunkLeanMaxAngle: 15,
  heelRiseMax: 0.03,
  straightLegMinAngle: 160,
  earShoulderMinDistance: 0.12,
  wristAsymmetryMax: 0.15,
  straightElbowMinAngle: 150,
  elbowDriftMax: 0.1,
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  windowSize: 60,
  step: 15,
  minFramesForLiveReady: 30,
  confidenceGateThreshold: 0.6,
  voteConfidenceThreshold: 0.5,
  smoothingBufferCapacity: 10,
  feedbackDebounceSeconds: 4.0,
  frameVisibilityThreshold: 0.5,
  windowVisibleRatio: 0.7,
  liveCadenceFrames: 15,
  thresholds: DEFAULT_CLINICAL_THRESHOLDS,
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Collect every problem with a config rather than stopping at the first.
 */
export function validateAnalysisConfig(config: AnalysisConfig): string[] {
  const problems: string[] = [];

  const integerKeys = [
    'windowSize',
    'step',
    'minFramesForLiveReady',
    'smoothingBufferCapacity',
    'liveCadenceFrames',
  ] as const;
  for (const key of integerKeys) {
    if (!isPositiveInteger(config[key])) {
      problems.push(`${key} must be a positive integer (got ${config[key]})`);
    }
  }

  const ratioKeys = [
    'confidenceGateThreshold',
    'voteConfidenceThreshold',
    'frameVisibilityThreshold',
    'windowVisibleRatio',
  ] as const;
  for (const key of ratioKeys) {
    if (!isUnitInterval(config[key])) {
      problems.push(`${key} must be within [0, 1] (got ${config[key]})`);
    }
  }

  if (!Number.isFinite(config.feedbackDebounceSeconds) || config.feedbackDebounceSeconds < 0) {
    problems.push(
      `feedbackDebounceSeconds must be a non-negative number (got ${config.feedbackDebounceSeconds})`
    );
  }

  if (
    isPositiveInteger(config.minFramesForLiveReady) &&
    isPositiveInteger(config.windowSize) &&
    config.minFramesForLiveReady > config.windowSize
  ) {
    problems.push(
      `minFramesForLiveReady (${config.minFramesForLiveReady}) cannot exceed windowSize (${config.windowSize})`
    );
  }

  for (const [key, value] of Object.entries(config.thresholds)) {
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`thresholds.${key} must be a non-negative number (got ${value})`);
    }
  }

  return problems;
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws AnalysisConfigError listing every invalid setting
 */
export function resolveAnalysisConfig(
  overrides: AnalysisConfigOverrides = {}
): AnalysisConfig {
  const { thresholds, ...rest } = overrides;
  const config: AnalysisConfig = {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...rest,
    thresholds: { ...DEFAULT_CLINICAL_THRESHOLDS, ...thresholds },
  };

  const problems = validateAnalysisConfig(config);
  if (problems.length > 0) {
    throw new AnalysisConfigError(problems);
  }
  return config;
}
