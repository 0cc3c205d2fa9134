/**
 * Inline Lunge Exercise Definition
 *
 * Split stance with the feet one behind the other; the back knee lowers
 * toward the floor with the torso upright.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { forwardTrunkLean, pelvicTilt, torsoInstability } from './commonRules';

export const inlineLungeDefinition: ExerciseDefinition = {
  label: ExerciseLabel.InlineLunge,
  name: 'Inline Lunge',
  family: 'legs',
  description: 'Lunge in a narrow split stance, lowering the back knee behind the front heel.',
  strategy: {
    kind: 'per-frame',
    rules: [
      torsoInstability,
      forwardTrunkLean((t) => t.trunkLeanMaxAngle),
      pelvicTilt,
    ],
  },
};
