/**
 * Geometry-only corrections applied after ensemble fusion.
 *
 * The statistical models confuse a few exercise pairs in predictable ways.
 * These rules look at the skeleton directly and relabel the window when the
 * geometry is unambiguous:
 *
 * 1. Deep-squat override: a clearly bent-knee window that the arms model won
 *    is a squat.
 * 2. Lunge symmetry override: an "inline lunge" with both feet at the same
 *    depth is a squat seen from the front.
 */

import type { ClinicalThresholds } from '../config/analysisConfig';
import { defaultGeometry, type GeometryKit, mean } from '../models/Geometry';
import { Skeleton } from '../models/Skeleton';
import type { PoseFrame } from '../types';
import {
  type ClassificationResult,
  ExerciseLabel,
  getExerciseFamily,
  isCatalogueExercise,
} from '../types/exercise';

/**
 * Window-level measurements the override rules read
 */
export interface OverrideMetrics {
  /** Mean over frames of the smaller of the two knee angles, degrees */
  meanMinKneeAngle: number;
  /** max − min of the hip-to-ankle vertical gap across frames */
  hipAnkleGapRange: number;
  /** Mean front-to-back separation of the ankles */
  meanAnkleDepthDifference: number;
}

export function measureOverrideMetrics(
  frames: readonly PoseFrame[],
  geometry: GeometryKit = defaultGeometry
): OverrideMetrics {
  const skeletons = frames.map((frame) => new Skeleton(frame, geometry));

  const minKneeAngles = skeletons.map((skeleton) =>
    Math.min(skeleton.getKneeAngle('left'), skeleton.getKneeAngle('right'))
  );
  const gaps = skeletons.map((skeleton) => skeleton.getHipAnkleGap());
  const depthDifferences = skeletons.map((skeleton) =>
    skeleton.getAnkleDepthDifference()
  );

  return {
    meanMinKneeAngle: mean(minKneeAngles),
    hipAnkleGapRange: gaps.length > 0 ? Math.max(...gaps) - Math.min(...gaps) : 0,
    meanAnkleDepthDifference: mean(depthDifferences),
  };
}

/**
 * True when the knee geometry alone says "squat": moderately bent knees with
 * real vertical hip travel, or deeply bent knees regardless of travel.
 */
export function looksLikeDeepSquat(
  metrics: OverrideMetrics,
  thresholds: ClinicalThresholds
): boolean {
  const bentWithTravel =
    metrics.meanMinKneeAngle < thresholds.squatOverrideKneeAngle &&
    metrics.hipAnkleGapRange > thresholds.squatOverrideHipTravel;
  const deeplyBent = metrics.meanMinKneeAngle < thresholds.squatOverrideDeepKneeAngle;
  return bentWithTravel || deeplyBent;
}

/**
 * Relabel an arms-family winner as DeepSquat when the knees say otherwise.
 * Confidence is kept.
 */
export function applyDeepSquatOverride(
  result: ClassificationResult,
  metrics: OverrideMetrics,
  thresholds: ClinicalThresholds
): ClassificationResult {
  const armsWinner =
    isCatalogueExercise(result.label) && getExerciseFamily(result.label) === 'arms';
  if (!armsWinner || !looksLikeDeepSquat(metrics, thresholds)) {
    return result;
  }
  return { ...result, label: ExerciseLabel.DeepSquat, sourceModel: 'Legs (forced)' };
}

/**
 * Relabel InlineLunge as DeepSquat when both feet sit at the same depth.
 */
export function applyLungeSymmetryOverride(
  result: ClassificationResult,
  metrics: OverrideMetrics,
  thresholds: ClinicalThresholds
): ClassificationResult {
  if (
    result.label !== ExerciseLabel.InlineLunge ||
    metrics.meanAnkleDepthDifference >= thresholds.lungeAnkleDepthMin
  ) {
    return result;
  }
  return { ...result, label: ExerciseLabel.DeepSquat };
}
