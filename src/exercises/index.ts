/**
 * Exercise Registry
 *
 * Central registry for all catalogue exercise definitions.
 * Provides lookup functions by label and by name.
 */

import {
  ARMS_EXERCISES,
  type CatalogueExercise,
  type ExerciseDefinition,
  ExerciseLabel,
  LEGS_EXERCISES,
} from '../types/exercise';
import { deepSquatDefinition } from './deepSquat';
import { hurdleStepDefinition } from './hurdleStep';
import { inlineLungeDefinition } from './inlineLunge';
import { sideLungeDefinition } from './sideLunge';
import { sitToStandDefinition } from './sitToStand';
import { standingActiveStraightLegRaiseDefinition } from './standingActiveStraightLegRaise';
import { standingShoulderAbductionDefinition } from './standingShoulderAbduction';
import { standingShoulderExtensionDefinition } from './standingShoulderExtension';
import { standingShoulderRotationDefinition } from './standingShoulderRotation';
import { standingShoulderScaptionDefinition } from './standingShoulderScaption';

/**
 * Registry of all catalogue exercise definitions
 */
export const exerciseRegistry: Readonly<Record<CatalogueExercise, ExerciseDefinition>> = {
  [ExerciseLabel.DeepSquat]: deepSquatDefinition,
  [ExerciseLabel.HurdleStep]: hurdleStepDefinition,
  [ExerciseLabel.InlineLunge]: inlineLungeDefinition,
  [ExerciseLabel.SideLunge]: sideLungeDefinition,
  [ExerciseLabel.SitToStand]: sitToStandDefinition,
  [ExerciseLabel.StandingActiveStraightLegRaise]: standingActiveStraightLegRaiseDefinition,
  [ExerciseLabel.StandingShoulderAbduction]: standingShoulderAbductionDefinition,
  [ExerciseLabel.StandingShoulderExtension]: standingShoulderExtensionDefinition,
  [ExerciseLabel.StandingShoulderRotation]: standingShoulderRotationDefinition,
  [ExerciseLabel.StandingShoulderScaption]: standingShoulderScaptionDefinition,
};

/**
 * Get an exercise definition by label
 */
export function getExerciseDefinition(label: CatalogueExercise): ExerciseDefinition {
  return exerciseRegistry[label];
}

/**
 * Get all catalogue labels, legs family first
 */
export function getAvailableExercises(): CatalogueExercise[] {
  return [...LEGS_EXERCISES, ...ARMS_EXERCISES];
}

/**
 * Get exercise definition by label or display name (case- and spacing-insensitive)
 *
 * @returns The exercise definition or undefined if not found
 */
export function getExerciseByName(name: string): ExerciseDefinition | undefined {
  const normalize = (value: string) => value.toLowerCase().replace(/[\s\-_/]/g, '');
  const normalizedName = normalize(name);

  return Object.values(exerciseRegistry).find(
    (definition) =>
      normalize(definition.label) === normalizedName ||
      normalize(definition.name) === normalizedName
  );
}

/**
 * Corrective cue for a violation of the given exercise, if one is defined
 */
export function getAdvice(label: CatalogueExercise, violation: string): string | undefined {
  const { strategy } = getExerciseDefinition(label);
  switch (strategy.kind) {
    case 'per-frame':
      return strategy.rules.find((rule) => rule.violation === violation)?.advice;
    case 'temporal':
      return strategy.advice[violation];
  }
}

/**
 * Every violation name the exercise can report, in rule order
 */
export function getViolationNames(label: CatalogueExercise): string[] {
  const { strategy } = getExerciseDefinition(label);
  switch (strategy.kind) {
    case 'per-frame':
      return strategy.rules.map((rule) => rule.violation);
    case 'temporal':
      return Object.keys(strategy.advice);
  }
}

// Re-export individual definitions for direct import
export { deepSquatDefinition, findDeepestFrame } from './deepSquat';
export { hurdleStepDefinition } from './hurdleStep';
export { inlineLungeDefinition } from './inlineLunge';
export { sideLungeDefinition } from './sideLunge';
export { sitToStandDefinition } from './sitToStand';
export { standingActiveStraightLegRaiseDefinition } from './standingActiveStraightLegRaise';
export { standingShoulderAbductionDefinition } from './standingShoulderAbduction';
export { standingShoulderExtensionDefinition } from './standingShoulderExtension';
export { standingShoulderRotationDefinition } from './standingShoulderRotation';
export { standingShoulderScaptionDefinition } from './standingShoulderScaption';
