/**
 * Stub classifiers for ensemble and session tests.
 *
 * Each stub reports a single label column so its confidence is exactly the
 * probability it was given, whatever that value is.
 */

import { vi } from 'vitest';
import type { ClassifierPrediction, ClassifierSlot, PoseClassifier } from '../PoseClassifier';
import { available, type PoseWindow, unavailable } from '../../types';
import type { ExerciseLabel } from '../../types/exercise';

export type StubOutput = readonly [label: ExerciseLabel, probability: number];

/**
 * A prediction where every frame puts `probability` on `label`
 */
export function createUniformPrediction(
  window: PoseWindow,
  [label, probability]: StubOutput
): ClassifierPrediction {
  return {
    labels: [label],
    frameProbabilities: window.frames.map(() => [probability]),
  };
}

/**
 * Always answers with the same label and probability
 */
export function createConstantClassifier(
  label: ExerciseLabel,
  probability: number
) {
  return {
    predict: vi.fn<(window: PoseWindow) => ClassifierPrediction>((window) =>
      createUniformPrediction(window, [label, probability])
    ),
  } satisfies PoseClassifier;
}

/**
 * Answers from a script, one entry per call; the last entry repeats once
 * the script runs out.
 */
export function createScriptedClassifier(script: readonly StubOutput[]) {
  let call = 0;
  return {
    predict: vi.fn<(window: PoseWindow) => ClassifierPrediction>((window) => {
      const output = script[Math.min(call, script.length - 1)];
      call++;
      return createUniformPrediction(window, output);
    }),
  } satisfies PoseClassifier;
}

/**
 * Throws on every call
 */
export function createFailingClassifier(message = 'model crashed') {
  return {
    predict: vi.fn<(window: PoseWindow) => ClassifierPrediction>(() => {
      throw new Error(message);
    }),
  } satisfies PoseClassifier;
}

export function slotOf(classifier: PoseClassifier): ClassifierSlot {
  return available(classifier);
}

export function missingSlot(reason = 'model not loaded'): ClassifierSlot {
  return unavailable(reason);
}
