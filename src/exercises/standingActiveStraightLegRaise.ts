/**
 * Standing Active Straight Leg Raise Exercise Definition
 *
 * Standing tall, one straight leg lifts forward. Classified by the arms
 * model family, which covers the standing exercises.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { pelvicTilt, torsoInstability } from './commonRules';

export const standingActiveStraightLegRaiseDefinition: ExerciseDefinition = {
  label: ExerciseLabel.StandingActiveStraightLegRaise,
  name: 'Standing Active Straight Leg Raise',
  family: 'arms',
  description: 'Raise one straight leg forward while standing tall on the other.',
  strategy: {
    kind: 'per-frame',
    rules: [
      {
        violation: 'raised knee bent',
        advice: 'Keep the lifting leg straight from hip to ankle.',
        isViolated: (skeleton, t) =>
          skeleton.getKneeAngle(skeleton.getRaisedSide()) < t.straightLegMinAngle,
      },
      torsoInstability,
      pelvicTilt,
    ],
  },
};
