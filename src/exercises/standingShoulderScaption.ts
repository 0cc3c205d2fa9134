/**
 * Standing Shoulder Scaption Exercise Definition
 *
 * Straight arms raise in the scapular plane, about 30° forward of the sides.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { armAsymmetry, elbowBent, shrugging } from './commonRules';

export const standingShoulderScaptionDefinition: ExerciseDefinition = {
  label: ExerciseLabel.StandingShoulderScaption,
  name: 'Standing Shoulder Scaption',
  family: 'arms',
  description: 'Raise both straight arms in the scapular plane to shoulder height.',
  strategy: {
    kind: 'per-frame',
    rules: [shrugging, armAsymmetry, elbowBent],
  },
};
