/**
 * Biomechanical Evaluator
 *
 * Judges a set of frames against the rules of one exercise. Dispatch goes
 * through the exercise registry: each definition carries either a per-frame
 * rule table or a temporal strategy.
 *
 * The evaluator owns one SmoothingBuffer for the temporal strategy. It
 * persists across windows of a session and is reset when the exercise is
 * (re)locked.
 */

import type { ClinicalThresholds } from '../config/analysisConfig';
import { getExerciseDefinition } from '../exercises';
import { defaultGeometry, type GeometryKit } from '../models/Geometry';
import { Skeleton } from '../models/Skeleton';
import { SmoothingBuffer } from '../models/SmoothingBuffer';
import type { PoseFrame } from '../types';
import {
  type DiagnosticResult,
  type EvaluationStrategy,
  type ExerciseLabel,
  isCatalogueExercise,
} from '../types/exercise';

export const NO_ACTIVE_EXERCISE = 'no active exercise detected';

function assertNever(value: never): never {
  throw new Error(`Unhandled evaluation strategy: ${JSON.stringify(value)}`);
}

export class BiomechanicalEvaluator {
  private readonly smoothing: SmoothingBuffer;

  constructor(
    private readonly thresholds: ClinicalThresholds,
    smoothingCapacity = 10,
    private readonly geometry: GeometryKit = defaultGeometry
  ) {
    this.smoothing = new SmoothingBuffer(smoothingCapacity);
  }

  /**
   * Evaluate frames as the given exercise. Never throws.
   *
   * NoExerciseDetected or no frames yields an incorrect result with the
   * single violation "no active exercise detected".
   */
  evaluate(frames: readonly PoseFrame[], label: ExerciseLabel): DiagnosticResult {
    if (!isCatalogueExercise(label) || frames.length === 0) {
      return { isCorrect: false, violations: new Set([NO_ACTIVE_EXERCISE]) };
    }

    const skeletons = frames.map((frame) => new Skeleton(frame, this.geometry));
    const violations = this.runStrategy(getExerciseDefinition(label).strategy, skeletons);

    return { isCorrect: violations.size === 0, violations };
  }

  private runStrategy(
    strategy: EvaluationStrategy,
    skeletons: readonly Skeleton[]
  ): Set<string> {
    switch (strategy.kind) {
      case 'per-frame': {
        const violations = new Set<string>();
        for (const skeleton of skeletons) {
          for (const rule of strategy.rules) {
            if (rule.isViolated(skeleton, this.thresholds)) {
              violations.add(rule.violation);
            }
          }
        }
        return violations;
      }
      case 'temporal':
        return new Set(
          strategy.evaluate(skeletons, {
            thresholds: this.thresholds,
            smoothing: this.smoothing,
          })
        );
      default:
        return assertNever(strategy);
    }
  }

  /**
   * Current smoothed torso lean (0 when nothing has been pushed)
   */
  getSmoothedLean(): number {
    return this.smoothing.getMean();
  }

  /**
   * Forget smoothing history, e.g. when a new exercise is locked
   */
  resetSmoothing(): void {
    this.smoothing.clear();
  }
}
