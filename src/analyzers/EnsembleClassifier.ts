/**
 * Ensemble Classifier
 *
 * Fuses the "legs" and "arms" model outputs into one decision per window:
 *
 * 1. A forced (locked) label bypasses inference entirely.
 * 2. Both models run; the strictly higher confidence wins, ties go to legs.
 * 3. Geometry overrides correct known confusions (see OverrideRules).
 * 4. A confidence gate turns weak decisions into NoExerciseDetected.
 *
 * Never throws: a model that is unavailable or fails counts as a
 * zero-confidence NoExerciseDetected for its leg.
 */

import type { AnalysisConfig } from '../config/analysisConfig';
import { defaultGeometry, type GeometryKit } from '../models/Geometry';
import type { PoseWindow } from '../types';
import {
  type CatalogueExercise,
  type ClassificationResult,
  ExerciseLabel,
} from '../types/exercise';
import { createLogger } from '../utils/logger';
import {
  applyDeepSquatOverride,
  applyLungeSymmetryOverride,
  measureOverrideMetrics,
} from './OverrideRules';
import { type ClassifierSlot, runClassifier, toClassificationResult } from './PoseClassifier';

const logger = createLogger({ component: 'EnsembleClassifier' });

export type EnsembleConfig = Pick<AnalysisConfig, 'confidenceGateThreshold' | 'thresholds'>;

export interface EnsembleModels {
  legs: ClassifierSlot;
  arms: ClassifierSlot;
}

export class EnsembleClassifier {
  constructor(
    private readonly models: EnsembleModels,
    private readonly config: EnsembleConfig,
    private readonly geometry: GeometryKit = defaultGeometry
  ) {}

  /**
   * Classify one window, optionally locked to a known exercise
   */
  classify(
    window: PoseWindow,
    forcedLabel: CatalogueExercise | null = null
  ): ClassificationResult {
    if (forcedLabel !== null) {
      return { label: forcedLabel, confidence: 1.0, sourceModel: 'Locked' };
    }

    const legs = toClassificationResult(
      runClassifier(this.models.legs, window, 'legs', logger),
      'Legs'
    );
    const arms = toClassificationResult(
      runClassifier(this.models.arms, window, 'arms', logger),
      'Arms'
    );

    let result = arms.confidence > legs.confidence ? arms : legs;

    const metrics = measureOverrideMetrics(window.frames, this.geometry);
    const thresholds = this.config.thresholds;
    const beforeOverrides = result;
    result = applyDeepSquatOverride(result, metrics, thresholds);
    result = applyLungeSymmetryOverride(result, metrics, thresholds);

    if (result.label !== beforeOverrides.label) {
      logger.debug('Override applied', {
        action: 'classify',
        from: beforeOverrides.label,
        to: result.label,
        kneeAngle: metrics.meanMinKneeAngle,
      });
    }

    if (result.confidence < this.config.confidenceGateThreshold) {
      return { label: ExerciseLabel.NoExerciseDetected, confidence: 0.0, sourceModel: 'None' };
    }

    return result;
  }
}
