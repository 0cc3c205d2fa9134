/**
 * Standing Shoulder Abduction Exercise Definition
 *
 * Both straight arms raise out to the sides to shoulder height.
 */

import { type ExerciseDefinition, ExerciseLabel } from '../types/exercise';
import { armAsymmetry, shrugging, torsoInstability } from './commonRules';

export const standingShoulderAbductionDefinition: ExerciseDefinition = {
  label: ExerciseLabel.StandingShoulderAbduction,
  name: 'Standing Shoulder Abduction',
  family: 'arms',
  description: 'Raise both arms sideways to shoulder height and lower them with control.',
  strategy: {
    kind: 'per-frame',
    rules: [shrugging, armAsymmetry, torsoInstability],
  },
};
