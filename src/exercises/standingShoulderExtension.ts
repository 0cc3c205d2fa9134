/**
 * Standing Shoulder Extension Exercise Definition
 *
 * Straight arms swing backward behind the body.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { elbowBent, forwardTrunkLean, shrugging } from './commonRules';

export const standingShoulderExtensionDefinition: ExerciseDefinition = {
  label: ExerciseLabel.StandingShoulderExtension,
  name: 'Standing Shoulder Extension',
  family: 'arms',
  description: 'Move straight arms backward behind the body without bending forward.',
  strategy: {
    kind: 'per-frame',
    rules: [shrugging, elbowBent, forwardTrunkLean((t) => t.shoulderTrunkLeanMaxAngle)],
  },
};
