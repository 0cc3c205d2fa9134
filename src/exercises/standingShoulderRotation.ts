/**
 * Standing Shoulder Internal/External Rotation Exercise Definition
 *
 * Elbow bent at 90° and tucked at the side; the forearm rotates in and out.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { shrugging, torsoInstability } from './commonRules';

export const standingShoulderRotationDefinition: ExerciseDefinition = {
  label: ExerciseLabel.StandingShoulderRotation,
  name: 'Standing Shoulder Internal/External Rotation',
  family: 'arms',
  description: 'Rotate the forearm in and out with the elbow bent and pinned to the side.',
  strategy: {
    kind: 'per-frame',
    rules: [
      {
        violation: 'elbow drift',
        advice: 'Keep your elbow tucked against your side while the forearm rotates.',
        isViolated: (skeleton, t) =>
          Math.max(skeleton.getElbowDrift('left'), skeleton.getElbowDrift('right')) >
          t.elbowDriftMax,
      },
      shrugging,
      torsoInstability,
    ],
  },
};
