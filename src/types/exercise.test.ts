import { describe, expect, it } from 'vitest';
import {
  ARMS_EXERCISES,
  ExerciseLabel,
  getExerciseFamily,
  isCatalogueExercise,
  isExerciseLabel,
  LEGS_EXERCISES,
} from './exercise';

describe('exercise types', () => {
  describe('ExerciseLabel enum', () => {
    it('uses the label name as its value', () => {
      expect(ExerciseLabel.DeepSquat).toBe('DeepSquat');
      expect(ExerciseLabel.NoExerciseDetected).toBe('NoExerciseDetected');
    });
  });

  describe('families', () => {
    it('partitions the catalogue into disjoint legs and arms families', () => {
      const overlap = LEGS_EXERCISES.filter((label) =>
        ARMS_EXERCISES.includes(label)
      );
      expect(overlap).toEqual([]);
      expect(LEGS_EXERCISES.length + ARMS_EXERCISES.length).toBe(10);
    });

    it('does not put the sentinel in either family', () => {
      expect(LEGS_EXERCISES).not.toContain(ExerciseLabel.NoExerciseDetected);
      expect(ARMS_EXERCISES).not.toContain(ExerciseLabel.NoExerciseDetected);
    });

    it('reports the family of each exercise', () => {
      expect(getExerciseFamily(ExerciseLabel.InlineLunge)).toBe('legs');
      expect(getExerciseFamily(ExerciseLabel.StandingShoulderScaption)).toBe(
        'arms'
      );
      expect(
        getExerciseFamily(ExerciseLabel.StandingActiveStraightLegRaise)
      ).toBe('arms');
    });
  });

  describe('isExerciseLabel', () => {
    it('returns true for catalogue labels and the sentinel', () => {
      expect(isExerciseLabel('HurdleStep')).toBe(true);
      expect(isExerciseLabel('NoExerciseDetected')).toBe(true);
    });

    it('returns false for unknown strings', () => {
      expect(isExerciseLabel('Deep Squat')).toBe(false);
      expect(isExerciseLabel('')).toBe(false);
      expect(isExerciseLabel('pushup')).toBe(false);
    });
  });

  describe('isCatalogueExercise', () => {
    it('excludes only the sentinel', () => {
      expect(isCatalogueExercise(ExerciseLabel.SitToStand)).toBe(true);
      expect(isCatalogueExercise(ExerciseLabel.NoExerciseDetected)).toBe(false);
    });
  });
});
