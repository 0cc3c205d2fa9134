/**
 * Hurdle Step Exercise Definition
 *
 * Standing on one leg, the other knee lifts as if stepping over a hurdle.
 * The stance leg stays straight and the pelvis level.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { pelvicTilt, torsoInstability } from './commonRules';

export const hurdleStepDefinition: ExerciseDefinition = {
  label: ExerciseLabel.HurdleStep,
  name: 'Hurdle Step',
  family: 'legs',
  description:
    'Single-leg stance while the opposite knee is raised and lowered over an imaginary hurdle.',
  strategy: {
    kind: 'per-frame',
    rules: [
      torsoInstability,
      pelvicTilt,
      {
        violation: 'stance knee bent',
        advice: 'Keep your standing leg straight and stable while the other leg moves.',
        // The straighter knee is the stance leg
        isViolated: (skeleton, t) =>
          Math.max(skeleton.getKneeAngle('left'), skeleton.getKneeAngle('right')) <
          t.stanceKneeMinAngle,
      },
    ],
  },
};
