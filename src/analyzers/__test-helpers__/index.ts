/**
 * Shared test helpers for analyzer and session tests.
 *
 * Usage:
 * ```typescript
 * import { createConstantClassifier, slotOf } from './__test-helpers__';
 *
 * const legs = slotOf(createConstantClassifier(ExerciseLabel.DeepSquat, 0.9));
 * ```
 */

export {
  createConstantClassifier,
  createFailingClassifier,
  createScriptedClassifier,
  createUniformPrediction,
  missingSlot,
  slotOf,
  type StubOutput,
} from './mockClassifiers';
