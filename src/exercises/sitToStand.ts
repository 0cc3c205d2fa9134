/**
 * Sit to Stand Exercise Definition
 *
 * Rising from a chair without using the hands.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { torsoInstability } from './commonRules';

export const sitToStandDefinition: ExerciseDefinition = {
  label: ExerciseLabel.SitToStand,
  name: 'Sit to Stand',
  family: 'legs',
  description: 'Stand up from a seated position and sit back down with control.',
  strategy: {
    kind: 'per-frame',
    rules: [
      {
        violation: 'knees too narrow',
        advice: 'Keep your knees apart, in line with your feet, as you rise and sit.',
        isViolated: (skeleton, t) =>
          skeleton.getKneeSpread() < t.kneeToAnkleWidthRatio * skeleton.getAnkleSpread(),
      },
      torsoInstability,
    ],
  },
};
