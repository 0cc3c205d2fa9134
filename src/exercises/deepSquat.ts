/**
 * Deep Squat Exercise Definition
 *
 * Both feet planted, hips lowered until the thighs pass parallel.
 * Evaluated over the whole window rather than frame by frame: depth and
 * knee tracking are judged at the deepest frame, torso lean through a
 * smoothing buffer that carries across windows.
 */

import type { Skeleton } from '../models/Skeleton';
import {
  type ExerciseDefinition,
  ExerciseLabel,
  type TemporalContext,
} from '../types/exercise';

/**
 * The frame with the smallest mean knee angle (first one on ties)
 */
export function findDeepestFrame(
  skeletons: readonly Skeleton[]
): { skeleton: Skeleton; kneeAngle: number } | null {
  let deepest: { skeleton: Skeleton; kneeAngle: number } | null = null;
  for (const skeleton of skeletons) {
    const kneeAngle = skeleton.getMeanKneeAngle();
    if (deepest === null || kneeAngle < deepest.kneeAngle) {
      deepest = { skeleton, kneeAngle };
    }
  }
  return deepest;
}

function evaluateDeepSquat(
  skeletons: readonly Skeleton[],
  { thresholds, smoothing }: TemporalContext
): string[] {
  const deepest = findDeepestFrame(skeletons);
  if (deepest === null) return [];

  const violations: string[] = [];
  const { skeleton, kneeAngle } = deepest;

  if (kneeAngle > thresholds.squatDepthMaxAngle) {
    violations.push('too shallow');
  }

  if (skeleton.getKneeSpread() < thresholds.kneeToAnkleWidthRatio * skeleton.getAnkleSpread()) {
    violations.push('knees too narrow');
  }

  // Decide on the smoothed lean, never the instantaneous value
  smoothing.push(skeleton.getTorsoLean());
  if (smoothing.getMean() > thresholds.torsoLeanMax) {
    violations.push('excessive lean');
  }

  return violations;
}

export const deepSquatDefinition: ExerciseDefinition = {
  label: ExerciseLabel.DeepSquat,
  name: 'Deep Squat',
  family: 'legs',
  description:
    'Bilateral squat to full depth with feet flat, knees tracking over the toes and the torso upright.',
  strategy: {
    kind: 'temporal',
    advice: {
      'too shallow':
        'Lower your hips further until your thighs are at least parallel to the floor.',
      'knees too narrow':
        'Push your knees outward in line with your toes. Do not let them cave in.',
      'excessive lean':
        'Keep your weight centered over both feet. Avoid shifting your torso to one side.',
    },
    evaluate: evaluateDeepSquat,
  },
};
