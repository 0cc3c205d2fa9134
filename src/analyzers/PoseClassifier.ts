/**
 * PoseClassifier - contract for the pluggable statistical models
 *
 * A model maps a window of frames to one probability row per frame over its
 * own label columns. The ensemble never sees a model directly: it holds a
 * ClassifierSlot that is either available or explicitly unavailable (model
 * not loaded, adapter failed to initialize).
 */

import { mean } from '../models/Geometry';
import type { Pluggable, PoseWindow } from '../types';
import {
  type CatalogueExercise,
  type ClassificationResult,
  ExerciseLabel,
  isCatalogueExercise,
  isExerciseLabel,
} from '../types/exercise';
import type { Logger } from '../utils/logger';

/**
 * Raw model output for one window
 */
export interface ClassifierPrediction {
  /** Label for each probability column */
  readonly labels: readonly ExerciseLabel[];
  /** One probability row per frame */
  readonly frameProbabilities: readonly (readonly number[])[];
}

export interface PoseClassifier {
  predict(window: PoseWindow): ClassifierPrediction;
}

export type ClassifierSlot = Pluggable<PoseClassifier>;

/**
 * Window-level label and confidence derived from a prediction
 */
export interface PredictionSummary {
  readonly label: ExerciseLabel;
  readonly confidence: number;
}

export const NO_PREDICTION: PredictionSummary = {
  label: ExerciseLabel.NoExerciseDetected,
  confidence: 0,
};

function argMax(row: readonly number[]): number {
  let best = -1;
  let bestValue = Number.NEGATIVE_INFINITY;
  row.forEach((value, index) => {
    if (value > bestValue) {
      best = index;
      bestValue = value;
    }
  });
  return best;
}

/**
 * Reduce per-frame probabilities to one label and confidence.
 *
 * The label is the majority of per-frame top-1 labels, ties going to the
 * label seen first. Confidence is the mean top-class probability over the
 * frames whose own top-1 is that label. Rows whose top-1 column is unlabeled
 * or is the NoExerciseDetected sentinel are skipped.
 */
export function summarizePrediction(
  prediction: ClassifierPrediction
): PredictionSummary {
  const votes = new Map<CatalogueExercise, number[]>();

  for (const row of prediction.frameProbabilities) {
    const column = argMax(row);
    if (column < 0 || column >= prediction.labels.length) continue;

    const label = prediction.labels[column];
    if (!isExerciseLabel(label) || !isCatalogueExercise(label)) continue;

    const topProbabilities = votes.get(label) ?? [];
    topProbabilities.push(row[column]);
    votes.set(label, topProbabilities);
  }

  let winner: CatalogueExercise | null = null;
  let winnerTops: number[] = [];
  for (const [label, tops] of votes) {
    if (tops.length > winnerTops.length) {
      winner = label;
      winnerTops = tops;
    }
  }

  if (winner === null) return NO_PREDICTION;

  const confidence = mean(winnerTops);
  return { label: winner, confidence: Math.min(Math.max(confidence, 0), 1) };
}

/**
 * Run one ensemble leg. Never throws: an unavailable model, a model that
 * throws, or an empty prediction all yield NoExerciseDetected at 0.
 */
export function runClassifier(
  slot: ClassifierSlot,
  window: PoseWindow,
  leg: string,
  logger: Logger
): PredictionSummary {
  if (slot.status === 'unavailable') {
    logger.debug('Classifier unavailable', { action: 'predict', leg, reason: slot.reason });
    return NO_PREDICTION;
  }

  let prediction: ClassifierPrediction;
  try {
    prediction = slot.value.predict(window);
  } catch (error) {
    logger.error('Prediction failed', error, { action: 'predict', leg });
    return NO_PREDICTION;
  }

  if (prediction.frameProbabilities.length === 0) {
    logger.warn('Empty prediction', { action: 'predict', leg });
    return NO_PREDICTION;
  }

  return summarizePrediction(prediction);
}

/**
 * Helper for adapters and tests: wrap a summary as a ClassificationResult
 */
export function toClassificationResult(
  summary: PredictionSummary,
  sourceModel: ClassificationResult['sourceModel']
): ClassificationResult {
  return { label: summary.label, confidence: summary.confidence, sourceModel };
}
