import { describe, expect, it } from 'vitest';
import { DEFAULT_CLINICAL_THRESHOLDS } from '../config/analysisConfig';
import { createRecording, createSquatRecording } from '../test-utils/pose-fixtures';
import { type ClassificationResult, ExerciseLabel } from '../types/exercise';
import {
  applyDeepSquatOverride,
  applyLungeSymmetryOverride,
  looksLikeDeepSquat,
  measureOverrideMetrics,
  type OverrideMetrics,
} from './OverrideRules';

const thresholds = DEFAULT_CLINICAL_THRESHOLDS;

function metrics(overrides: Partial<OverrideMetrics>): OverrideMetrics {
  return {
    meanMinKneeAngle: 175,
    hipAnkleGapRange: 0,
    meanAnkleDepthDifference: 0.5,
    ...overrides,
  };
}

describe('OverrideRules', () => {
  describe('measureOverrideMetrics', () => {
    it('sees straight knees and no travel when standing still', () => {
      const result = measureOverrideMetrics(createRecording(5));

      expect(result.meanMinKneeAngle).toBeCloseTo(180, 4);
      expect(result.hipAnkleGapRange).toBeCloseTo(0, 10);
      expect(result.meanAnkleDepthDifference).toBe(0);
    });

    it('sees bent knees and hip travel across one squat repetition', () => {
      const result = measureOverrideMetrics(createSquatRecording(30));

      // cosine over a full period averages out: mean knee angle is the midline
      expect(result.meanMinKneeAngle).toBeCloseTo(132.5, 6);
      // gap = 0.2 - 0.2·cos(θ) for θ between 95° and 170°
      expect(result.hipAnkleGapRange).toBeCloseTo(
        0.2 * (Math.cos((95 * Math.PI) / 180) - Math.cos((170 * Math.PI) / 180)),
        6
      );
    });

    it('returns zeros for no frames', () => {
      expect(measureOverrideMetrics([])).toEqual({
        meanMinKneeAngle: 0,
        hipAnkleGapRange: 0,
        meanAnkleDepthDifference: 0,
      });
    });
  });

  describe('looksLikeDeepSquat', () => {
    it('requires hip travel for moderately bent knees', () => {
      expect(looksLikeDeepSquat(metrics({ meanMinKneeAngle: 130, hipAnkleGapRange: 0.15 }), thresholds)).toBe(true);
      expect(looksLikeDeepSquat(metrics({ meanMinKneeAngle: 120, hipAnkleGapRange: 0.05 }), thresholds)).toBe(false);
    });

    it('accepts deeply bent knees without travel', () => {
      expect(looksLikeDeepSquat(metrics({ meanMinKneeAngle: 105 }), thresholds)).toBe(true);
    });

    it('rejects straight knees even with travel', () => {
      expect(looksLikeDeepSquat(metrics({ meanMinKneeAngle: 140, hipAnkleGapRange: 0.5 }), thresholds)).toBe(false);
    });
  });

  describe('applyDeepSquatOverride', () => {
    const squatMetrics = metrics({ meanMinKneeAngle: 100 });

    it('relabels an arms win as a forced DeepSquat keeping confidence', () => {
      const result: ClassificationResult = {
        label: ExerciseLabel.StandingShoulderAbduction,
        confidence: 0.8,
        sourceModel: 'Arms',
      };

      expect(applyDeepSquatOverride(result, squatMetrics, thresholds)).toEqual({
        label: ExerciseLabel.DeepSquat,
        confidence: 0.8,
        sourceModel: 'Legs (forced)',
      });
    });

    it('relabels an arms-family label even when the legs model produced it', () => {
      const result: ClassificationResult = {
        label: ExerciseLabel.StandingShoulderAbduction,
        confidence: 0.9,
        sourceModel: 'Legs',
      };

      expect(applyDeepSquatOverride(result, squatMetrics, thresholds)).toEqual({
        label: ExerciseLabel.DeepSquat,
        confidence: 0.9,
        sourceModel: 'Legs (forced)',
      });
    });

    it('leaves a legs-family label alone even when the arms model produced it', () => {
      const result: ClassificationResult = {
        label: ExerciseLabel.HurdleStep,
        confidence: 0.8,
        sourceModel: 'Arms',
      };
      expect(applyDeepSquatOverride(result, squatMetrics, thresholds)).toBe(result);
    });

    it('leaves a legs win alone', () => {
      const result: ClassificationResult = {
        label: ExerciseLabel.SitToStand,
        confidence: 0.7,
        sourceModel: 'Legs',
      };
      expect(applyDeepSquatOverride(result, squatMetrics, thresholds)).toBe(result);
    });

    it('leaves an arms win alone when the knees are straight', () => {
      const result: ClassificationResult = {
        label: ExerciseLabel.StandingShoulderScaption,
        confidence: 0.9,
        sourceModel: 'Arms',
      };
      expect(applyDeepSquatOverride(result, metrics({}), thresholds)).toBe(result);
    });
  });

  describe('applyLungeSymmetryOverride', () => {
    const lunge: ClassificationResult = {
      label: ExerciseLabel.InlineLunge,
      confidence: 0.9,
      sourceModel: 'Legs',
    };

    it('relabels a lunge with level feet as DeepSquat', () => {
      expect(
        applyLungeSymmetryOverride(lunge, metrics({ meanAnkleDepthDifference: 0.1 }), thresholds)
      ).toEqual({ label: ExerciseLabel.DeepSquat, confidence: 0.9, sourceModel: 'Legs' });
    });

    it('keeps a lunge with staggered feet', () => {
      expect(
        applyLungeSymmetryOverride(lunge, metrics({ meanAnkleDepthDifference: 0.2 }), thresholds)
      ).toBe(lunge);
    });

    it('ignores other labels', () => {
      const result: ClassificationResult = {
        label: ExerciseLabel.SideLunge,
        confidence: 0.9,
        sourceModel: 'Legs',
      };
      expect(
        applyLungeSymmetryOverride(result, metrics({ meanAnkleDepthDifference: 0 }), thresholds)
      ).toBe(result);
    });
  });
});
