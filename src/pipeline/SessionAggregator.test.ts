import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createConstantClassifier,
  createScriptedClassifier,
  missingSlot,
  slotOf,
} from '../analyzers/__test-helpers__';
import { DEFAULT_ANALYSIS_CONFIG, resolveAnalysisConfig } from '../config/analysisConfig';
import {
  createRecording,
  createSquatRecording,
  createStandingFrame,
} from '../test-utils/pose-fixtures';
import { ExerciseLabel } from '../types/exercise';
import {
  AnalysisConfigError,
  EmptyInputError,
  InputShapeError,
  NoConfidentExerciseError,
} from '../utils/errors';
import { buildWindow } from './WindowBuffer';
import {
  MOVEMENT_CORRECT,
  type RecordingOutcome,
  SessionAggregator,
  type SessionVerdict,
  toOutcomeJson,
  toVerdictJson,
} from './SessionAggregator';

function expectVerdict(outcome: RecordingOutcome): SessionVerdict {
  if (outcome.status !== 'verdict') {
    throw new Error(`expected a verdict, got ${outcome.status}`);
  }
  return outcome.verdict;
}

function createSquatSession(): SessionAggregator {
  return new SessionAggregator({
    legs: slotOf(createConstantClassifier(ExerciseLabel.DeepSquat, 0.9)),
    arms: slotOf(createConstantClassifier(ExerciseLabel.StandingShoulderAbduction, 0.3)),
  });
}

describe('SessionAggregator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  describe('constructor', () => {
    it('rejects a config that skipped validation', () => {
      const models = {
        legs: slotOf(createConstantClassifier(ExerciseLabel.DeepSquat, 0.9)),
        arms: missingSlot(),
      };

      expect(() => new SessionAggregator(models, { ...DEFAULT_ANALYSIS_CONFIG, step: 0 })).toThrow(
        AnalysisConfigError
      );
      expect(() => new SessionAggregator(models, { ...DEFAULT_ANALYSIS_CONFIG, step: 0 })).toThrow(
        'Invalid analysis config: step must be a positive integer (got 0)'
      );
    });
  });

  describe('analyzeWindow', () => {
    it('classifies and evaluates one window', () => {
      const session = new SessionAggregator({
        legs: slotOf(createConstantClassifier(ExerciseLabel.SitToStand, 0.8)),
        arms: missingSlot(),
      });

      const analysis = session.analyzeWindow(buildWindow(createRecording(10)));

      expect(analysis.classification).toEqual({
        label: ExerciseLabel.SitToStand,
        confidence: 0.8,
        sourceModel: 'Legs',
      });
      expect(analysis.diagnostic).toEqual({ isCorrect: true, violations: new Set() });
    });

    it('reports no active exercise when the gate rejects the window', () => {
      const session = new SessionAggregator({
        legs: slotOf(createConstantClassifier(ExerciseLabel.SitToStand, 0.3)),
        arms: missingSlot(),
      });

      const analysis = session.analyzeWindow(buildWindow(createRecording(10)));

      expect(analysis.classification.label).toBe(ExerciseLabel.NoExerciseDetected);
      expect(analysis.diagnostic).toEqual({
        isCorrect: false,
        violations: new Set(['no active exercise detected']),
      });
    });
  });

  describe('analyzeRecording', () => {
    it('locks a deep squat recording and judges it correct', () => {
      const verdict = expectVerdict(createSquatSession().analyzeRecording(createSquatRecording(90)));

      expect(verdict.discoveryResults).toEqual([
        { label: ExerciseLabel.DeepSquat, confidence: 0.9, sourceModel: 'Legs' },
        { label: ExerciseLabel.DeepSquat, confidence: 0.9, sourceModel: 'Legs' },
      ]);
      expect(verdict.lockedExercise).toBe(ExerciseLabel.DeepSquat);
      expect(verdict.votingConfidence).toBe(1);
      expect(verdict.perWindowResults).toHaveLength(2);
      for (const result of verdict.perWindowResults) {
        expect(result.classification).toEqual({
          label: ExerciseLabel.DeepSquat,
          confidence: 1.0,
          sourceModel: 'Locked',
        });
      }
      expect(verdict.isCorrect).toBe(true);
      expect(verdict.feedback).toBe(MOVEMENT_CORRECT);
      expect(verdict.textReport.split('\n').slice(0, 2)).toEqual([
        'Exercise: Deep Squat',
        'Score: 100% (2/2 windows correct)',
      ]);
    });

    it('locks the majority of confident votes', () => {
      const legs = createScriptedClassifier([
        [ExerciseLabel.SitToStand, 0.9],
        [ExerciseLabel.HurdleStep, 0.9],
        [ExerciseLabel.HurdleStep, 0.9],
        [ExerciseLabel.SideLunge, 0.9],
        [ExerciseLabel.SitToStand, 0.9],
        [ExerciseLabel.HurdleStep, 0.9],
        [ExerciseLabel.HurdleStep, 0.9],
        [ExerciseLabel.SideLunge, 0.9],
        [ExerciseLabel.SitToStand, 0.9],
        [ExerciseLabel.HurdleStep, 0.9],
      ]);
      const session = new SessionAggregator(
        { legs: slotOf(legs), arms: missingSlot() },
        resolveAnalysisConfig({ windowSize: 4, step: 1, minFramesForLiveReady: 2 })
      );

      // 14 frames, window 4, step 1: starts 0..9
      const verdict = expectVerdict(session.analyzeRecording(createRecording(14)));

      expect(verdict.discoveryResults).toHaveLength(10);
      expect(verdict.lockedExercise).toBe(ExerciseLabel.HurdleStep);
      expect(verdict.votingConfidence).toBe(0.5);
      // Pass 2 is locked and never consults the models
      expect(legs.predict).toHaveBeenCalledTimes(10);
      expect(verdict.perWindowResults.map((r) => r.classification.sourceModel)).toEqual(
        Array(10).fill('Locked')
      );
    });

    it('gives a tied vote to the label seen first', () => {
      const legs = createScriptedClassifier([
        [ExerciseLabel.SideLunge, 0.9],
        [ExerciseLabel.SitToStand, 0.9],
        [ExerciseLabel.SitToStand, 0.9],
        [ExerciseLabel.SideLunge, 0.9],
      ]);
      const session = new SessionAggregator(
        { legs: slotOf(legs), arms: missingSlot() },
        resolveAnalysisConfig({ windowSize: 4, step: 1, minFramesForLiveReady: 2 })
      );

      const verdict = expectVerdict(session.analyzeRecording(createRecording(8)));

      expect(verdict.lockedExercise).toBe(ExerciseLabel.SideLunge);
      expect(verdict.votingConfidence).toBe(0.5);
    });

    it('only counts votes strictly above the vote threshold', () => {
      const legs = createScriptedClassifier([
        [ExerciseLabel.SitToStand, 0.5],
        [ExerciseLabel.SitToStand, 0.5],
        [ExerciseLabel.SitToStand, 0.5],
        [ExerciseLabel.HurdleStep, 0.8],
      ]);
      const session = new SessionAggregator(
        { legs: slotOf(legs), arms: missingSlot() },
        resolveAnalysisConfig({
          windowSize: 4,
          step: 1,
          minFramesForLiveReady: 2,
          confidenceGateThreshold: 0.3,
        })
      );

      const verdict = expectVerdict(session.analyzeRecording(createRecording(8)));

      expect(verdict.lockedExercise).toBe(ExerciseLabel.HurdleStep);
      expect(verdict.votingConfidence).toBe(1);
    });

    it('mirrors the last window in the top-level verdict', () => {
      const session = new SessionAggregator(
        { legs: slotOf(createConstantClassifier(ExerciseLabel.HurdleStep, 0.9)), arms: missingSlot() },
        resolveAnalysisConfig({ windowSize: 4, step: 4, minFramesForLiveReady: 2 })
      );
      // Starts 0 and 4; the second window holds the tilted frames
      const frames = [
        ...createRecording(4),
        ...createRecording(5, () => createStandingFrame({ LEFT_HIP: { y: 0.54 } })),
      ];

      const verdict = expectVerdict(session.analyzeRecording(frames));

      expect(verdict.perWindowResults.map((r) => r.diagnostic.isCorrect)).toEqual([true, false]);
      expect(verdict.isCorrect).toBe(false);
      expect(verdict.feedback).toEqual(['pelvic tilt']);
    });

    it('reports no data for an empty recording', () => {
      const outcome = createSquatSession().analyzeRecording([]);

      expect(outcome.status).toBe('no-data');
      if (outcome.status === 'no-data') {
        expect(outcome.error).toBeInstanceOf(EmptyInputError);
        expect(outcome.error.message).toBe('No person detected');
      }
    });

    it('reports no confident exercise when every window is gated', () => {
      const session = new SessionAggregator({
        legs: slotOf(createConstantClassifier(ExerciseLabel.SitToStand, 0.4)),
        arms: slotOf(createConstantClassifier(ExerciseLabel.StandingShoulderAbduction, 0.4)),
      });

      const outcome = session.analyzeRecording(createRecording(90));

      expect(outcome.status).toBe('no-confident-exercise');
      if (outcome.status === 'no-confident-exercise') {
        expect(outcome.error).toBeInstanceOf(NoConfidentExerciseError);
        expect(outcome.discoveryResults).toHaveLength(2);
        expect(outcome.discoveryResults[0].label).toBe(ExerciseLabel.NoExerciseDetected);
      }
    });

    it('leaves malformed frames out and still reaches a verdict', () => {
      const frames: (readonly unknown[])[] = createSquatRecording(90);
      frames[45] = frames[45].slice(0, 32);

      const verdict = expectVerdict(createSquatSession().analyzeRecording(frames));

      expect(verdict.lockedExercise).toBe(ExerciseLabel.DeepSquat);
      expect(verdict.rejectedFrames).toBe(1);
      expect(verdict.perWindowResults).toHaveLength(2);
      expect(verdict.isCorrect).toBe(true);
      expect(console.warn).toHaveBeenCalledWith(
        '[SessionAggregator] (analyzeRecording) Rejected frame reason=Frame 45: expected 33 keypoints (MediaPipe-33), got 32'
      );
    });

    it('reports no data when every frame is malformed', () => {
      const frames = [createStandingFrame().slice(0, 17), []];

      const outcome = createSquatSession().analyzeRecording(frames);

      expect(outcome.status).toBe('no-data');
      expect(console.warn).toHaveBeenCalledWith(
        '[SessionAggregator] (analyzeRecording) Rejected frame reason=Frame 1: expected 33 keypoints (MediaPipe-33), got 0'
      );
    });

    it('returns the same verdict when run twice', () => {
      const session = createSquatSession();
      const frames = createSquatRecording(90);

      expect(session.analyzeRecording(frames)).toEqual(session.analyzeRecording(frames));
    });
  });

  describe('serialization', () => {
    it('serializes a verdict with snake_case keys', () => {
      const verdict = expectVerdict(createSquatSession().analyzeRecording(createSquatRecording(90)));

      expect(toVerdictJson(verdict)).toEqual({
        exercise: 'Deep Squat',
        confidence: 1,
        is_correct: true,
        feedback: 'Movement correct.',
        text_report: verdict.textReport,
      });
    });

    it('serializes failures as an error message', () => {
      expect(toOutcomeJson(createSquatSession().analyzeRecording([]))).toEqual({
        error: 'No person detected',
      });
      expect(
        toOutcomeJson({
          status: 'no-confident-exercise',
          error: new NoConfidentExerciseError(),
          discoveryResults: [],
        })
      ).toEqual({ error: 'No exercise detected with sufficient confidence.' });
    });
  });

  describe('live mode', () => {
    function createLiveSession(): SessionAggregator {
      return new SessionAggregator({
        legs: slotOf(createConstantClassifier(ExerciseLabel.SitToStand, 0.9)),
        arms: missingSlot(),
      });
    }

    it('waits for enough frames before analyzing', () => {
      const session = createLiveSession();
      for (let i = 0; i < DEFAULT_ANALYSIS_CONFIG.minFramesForLiveReady - 1; i++) {
        session.pushFrame(createStandingFrame());
      }

      expect(session.isReady()).toBe(false);
      expect(session.analyzeLive()).toBeNull();

      session.pushFrame(createStandingFrame());

      expect(session.isReady()).toBe(true);
      expect(session.analyzeLive()?.classification.label).toBe(ExerciseLabel.SitToStand);
    });

    it('keeps at most one window of frames', () => {
      const session = createLiveSession();
      for (let i = 0; i < 75; i++) {
        session.pushFrame(createStandingFrame());
      }

      expect(session.bufferedFrames).toBe(DEFAULT_ANALYSIS_CONFIG.windowSize);
    });

    it('rejects a malformed frame without buffering it', () => {
      const session = createLiveSession();

      expect(() => session.pushFrame([])).toThrow(InputShapeError);
      expect(session.bufferedFrames).toBe(0);
    });

    it('defaults missing visibility when buffering', () => {
      const session = createLiveSession();
      const frame = createStandingFrame().map(({ x, y, z }) => ({ x, y, z }));

      expect(session.pushFrame(frame)[0].visibility).toBe(1.0);
    });

    it('uses the locked exercise until unlocked', () => {
      const session = createLiveSession();
      for (let i = 0; i < 30; i++) {
        session.pushFrame(createStandingFrame());
      }

      session.lockExercise(ExerciseLabel.HurdleStep);
      expect(session.getLockedExercise()).toBe(ExerciseLabel.HurdleStep);
      expect(session.analyzeLive()?.classification).toEqual({
        label: ExerciseLabel.HurdleStep,
        confidence: 1.0,
        sourceModel: 'Locked',
      });

      expect(session.analyzeLive(ExerciseLabel.SideLunge)?.classification.label).toBe(
        ExerciseLabel.SideLunge
      );

      session.lockExercise(null);
      expect(session.analyzeLive()?.classification.sourceModel).toBe('Legs');
    });

    it('forgets frames and lock on reset', () => {
      const session = createLiveSession();
      for (let i = 0; i < 30; i++) {
        session.pushFrame(createStandingFrame());
      }
      session.lockExercise(ExerciseLabel.HurdleStep);

      session.reset();

      expect(session.isReady()).toBe(false);
      expect(session.bufferedFrames).toBe(0);
      expect(session.getLockedExercise()).toBeNull();
    });
  });
});
