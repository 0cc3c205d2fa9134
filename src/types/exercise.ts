/**
 * Exercise catalogue and the result records that flow out of classification
 * and evaluation.
 */

import type { ClinicalThresholds } from '../config/analysisConfig';
import type { Skeleton } from '../models/Skeleton';
import type { SmoothingBuffer } from '../models/SmoothingBuffer';

/**
 * Closed catalogue of rehabilitation exercises, plus the "nothing detected" sentinel.
 */
export enum ExerciseLabel {
  DeepSquat = 'DeepSquat',
  HurdleStep = 'HurdleStep',
  InlineLunge = 'InlineLunge',
  SideLunge = 'SideLunge',
  SitToStand = 'SitToStand',
  StandingActiveStraightLegRaise = 'StandingActiveStraightLegRaise',
  StandingShoulderAbduction = 'StandingShoulderAbduction',
  StandingShoulderExtension = 'StandingShoulderExtension',
  StandingShoulderRotation = 'StandingShoulderRotation',
  StandingShoulderScaption = 'StandingShoulderScaption',
  NoExerciseDetected = 'NoExerciseDetected',
}

/** Every label except the sentinel */
export type CatalogueExercise = Exclude<ExerciseLabel, ExerciseLabel.NoExerciseDetected>;

/**
 * Which classifier family recognizes an exercise
 */
export type ExerciseFamily = 'legs' | 'arms';

export const LEGS_EXERCISES: readonly CatalogueExercise[] = [
  ExerciseLabel.DeepSquat,
  ExerciseLabel.HurdleStep,
  ExerciseLabel.InlineLunge,
  ExerciseLabel.SideLunge,
  ExerciseLabel.SitToStand,
];

export const ARMS_EXERCISES: readonly CatalogueExercise[] = [
  ExerciseLabel.StandingActiveStraightLegRaise,
  ExerciseLabel.StandingShoulderAbduction,
  ExerciseLabel.StandingShoulderExtension,
  ExerciseLabel.StandingShoulderRotation,
  ExerciseLabel.StandingShoulderScaption,
];

const LABEL_VALUES: ReadonlySet<string> = new Set(Object.values(ExerciseLabel));

export function isExerciseLabel(value: string): value is ExerciseLabel {
  return LABEL_VALUES.has(value);
}

export function isCatalogueExercise(
  label: ExerciseLabel
): label is CatalogueExercise {
  return label !== ExerciseLabel.NoExerciseDetected;
}

/**
 * Get the classifier family for a catalogue exercise
 */
export function getExerciseFamily(label: CatalogueExercise): ExerciseFamily {
  return LEGS_EXERCISES.includes(label) ? 'legs' : 'arms';
}

/**
 * Which part of the ensemble produced a classification
 */
export type SourceModel = 'Legs' | 'Arms' | 'Legs (forced)' | 'Locked' | 'None';

/**
 * One classification decision per window
 */
export interface ClassificationResult {
  readonly label: ExerciseLabel;
  /** 0-1 */
  readonly confidence: number;
  readonly sourceModel: SourceModel;
}

/**
 * Outcome of evaluating a set of frames against an exercise's rules
 */
export interface DiagnosticResult {
  readonly isCorrect: boolean;
  /** Violation names in the order they were first seen */
  readonly violations: ReadonlySet<string>;
}

/**
 * Classification and evaluation of one window
 */
export interface WindowAnalysis {
  readonly classification: ClassificationResult;
  readonly diagnostic: DiagnosticResult;
}

// ============================================
// Exercise definitions
// ============================================

/**
 * One named fault checked on every frame of a window
 */
export interface FrameRule {
  /** Violation name reported when the check fires */
  readonly violation: string;
  /** Corrective cue shown in reports */
  readonly advice: string;
  isViolated(skeleton: Skeleton, thresholds: ClinicalThresholds): boolean;
}

/**
 * Evaluation state a temporal strategy may read and update
 */
export interface TemporalContext {
  readonly thresholds: ClinicalThresholds;
  /** Owned by the evaluator; persists across windows of one session */
  readonly smoothing: SmoothingBuffer;
}

/**
 * Per-frame: every rule on every frame, violations unioned.
 */
export interface PerFrameStrategy {
  readonly kind: 'per-frame';
  readonly rules: readonly FrameRule[];
}

/**
 * Temporal: looks at the window as a whole (e.g. its deepest frame).
 */
export interface TemporalStrategy {
  readonly kind: 'temporal';
  /** Corrective cue per violation this strategy can report */
  readonly advice: Readonly<Record<string, string>>;
  evaluate(skeletons: readonly Skeleton[], context: TemporalContext): string[];
}

export type EvaluationStrategy = PerFrameStrategy | TemporalStrategy;

/**
 * Complete definition of a catalogue exercise
 */
export interface ExerciseDefinition {
  readonly label: CatalogueExercise;
  /** Human-readable name for reports */
  readonly name: string;
  readonly family: ExerciseFamily;
  readonly description: string;
  readonly strategy: EvaluationStrategy;
}
