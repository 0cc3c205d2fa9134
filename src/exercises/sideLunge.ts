/**
 * Side Lunge Exercise Definition
 *
 * Lateral step into a single-knee bend while the trailing leg stays
 * straight. Some forward lean is expected, so the trunk limit is looser
 * than for the inline lunge.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { forwardTrunkLean } from './commonRules';

export const sideLungeDefinition: ExerciseDefinition = {
  label: ExerciseLabel.SideLunge,
  name: 'Side Lunge',
  family: 'legs',
  description: 'Lateral lunge with the trailing leg straight and both feet flat.',
  strategy: {
    kind: 'per-frame',
    rules: [
      forwardTrunkLean((t) => t.sideLungeTrunkLeanMaxAngle),
      {
        violation: 'heel rise',
        advice: 'Keep both heels firmly planted on the ground throughout the movement.',
        isViolated: (skeleton, t) =>
          Math.max(skeleton.getHeelRise('left'), skeleton.getHeelRise('right')) >
          t.heelRiseMax,
      },
    ],
  },
};
