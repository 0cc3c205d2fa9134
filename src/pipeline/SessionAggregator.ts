/**
 * SessionAggregator - turns windows and recordings into session verdicts
 *
 * Recording analysis runs in two passes:
 *
 * 1. Discovery: every window is classified without a lock. Windows whose
 *    confidence clears the vote threshold vote for their label; the majority
 *    (ties go to the label seen first) locks the session exercise.
 * 2. Diagnosis: every window is re-run forced to the locked exercise and
 *    evaluated. The session verdict mirrors the last window and the text
 *    report covers them all.
 *
 * Live mode buffers validated frames in a ring buffer and analyzes the
 * current window on demand, optionally locked to a known exercise.
 *
 * One aggregator per session: it owns the evaluator's smoothing state.
 */

import { BiomechanicalEvaluator } from '../analyzers/BiomechanicalEvaluator';
import { EnsembleClassifier, type EnsembleModels } from '../analyzers/EnsembleClassifier';
import { generateReport } from '../analyzers/ReportGenerator';
import {
  type AnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
  validateAnalysisConfig,
} from '../config/analysisConfig';
import { getExerciseDefinition } from '../exercises';
import { defaultGeometry, type GeometryKit } from '../models/Geometry';
import type { PoseFrame, PoseWindow } from '../types';
import {
  type CatalogueExercise,
  type ClassificationResult,
  type DiagnosticResult,
  isCatalogueExercise,
  type WindowAnalysis,
} from '../types/exercise';
import {
  AnalysisConfigError,
  EmptyInputError,
  NoConfidentExerciseError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { partitionPoseFrames, validatePoseFrame } from './KeypointAdapter';
import { createWindows, type VisibilityRule, WindowBuffer } from './WindowBuffer';

const logger = createLogger({ component: 'SessionAggregator' });

export const MOVEMENT_CORRECT = 'Movement correct.';

/**
 * "Movement correct." or the violations of an incorrect window
 */
export type Feedback = typeof MOVEMENT_CORRECT | readonly string[];

export interface SessionVerdict {
  readonly lockedExercise: CatalogueExercise;
  /** Share of valid votes won by the locked exercise */
  readonly votingConfidence: number;
  /** Pass 2 results, one per window in window order */
  readonly perWindowResults: readonly WindowAnalysis[];
  /** Pass 1 classifications, one per window in window order */
  readonly discoveryResults: readonly ClassificationResult[];
  /** Malformed frames left out of the analysis */
  readonly rejectedFrames: number;
  readonly isCorrect: boolean;
  readonly feedback: Feedback;
  readonly textReport: string;
}

export type RecordingOutcome =
  | { readonly status: 'verdict'; readonly verdict: SessionVerdict }
  | { readonly status: 'no-data'; readonly error: EmptyInputError }
  | {
      readonly status: 'no-confident-exercise';
      readonly error: NoConfidentExerciseError;
      readonly discoveryResults: readonly ClassificationResult[];
    };

export interface VerdictJson {
  exercise: string;
  confidence: number;
  is_correct: boolean;
  feedback: string | string[];
  text_report: string;
}

export function toFeedback(diagnostic: DiagnosticResult): Feedback {
  return diagnostic.isCorrect ? MOVEMENT_CORRECT : [...diagnostic.violations];
}

/**
 * Serialize a verdict for transport
 */
export function toVerdictJson(verdict: SessionVerdict): VerdictJson {
  return {
    exercise: getExerciseDefinition(verdict.lockedExercise).name,
    confidence: verdict.votingConfidence,
    is_correct: verdict.isCorrect,
    feedback: typeof verdict.feedback === 'string' ? verdict.feedback : [...verdict.feedback],
    text_report: verdict.textReport,
  };
}

/**
 * Serialize any recording outcome; failures become `{error}`
 */
export function toOutcomeJson(outcome: RecordingOutcome): VerdictJson | { error: string } {
  switch (outcome.status) {
    case 'verdict':
      return toVerdictJson(outcome.verdict);
    case 'no-data':
    case 'no-confident-exercise':
      return { error: outcome.error.message };
  }
}

export interface VoteTally {
  readonly winner: CatalogueExercise;
  readonly winnerVotes: number;
  readonly totalVotes: number;
}

/**
 * Majority vote over classifications whose confidence exceeds the threshold.
 * Ties go to the label seen first; null when nothing voted.
 */
export function tallyVotes(
  results: readonly ClassificationResult[],
  voteConfidenceThreshold: number
): VoteTally | null {
  const votes = new Map<CatalogueExercise, number>();
  let totalVotes = 0;

  for (const { label, confidence } of results) {
    if (confidence > voteConfidenceThreshold && isCatalogueExercise(label)) {
      votes.set(label, (votes.get(label) ?? 0) + 1);
      totalVotes++;
    }
  }

  let tally: VoteTally | null = null;
  for (const [label, count] of votes) {
    logger.debug('Vote summary', { action: 'vote', exercise: label, votes: count, totalVotes });
    if (tally === null || count > tally.winnerVotes) {
      tally = { winner: label, winnerVotes: count, totalVotes };
    }
  }
  return tally;
}

export class SessionAggregator {
  private readonly ensemble: EnsembleClassifier;
  private readonly evaluator: BiomechanicalEvaluator;
  private readonly liveBuffer: WindowBuffer;
  private readonly visibilityRule: VisibilityRule;
  private lockedExercise: CatalogueExercise | null = null;

  constructor(
    models: EnsembleModels,
    readonly config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
    geometry: GeometryKit = defaultGeometry
  ) {
    const problems = validateAnalysisConfig(config);
    if (problems.length > 0) {
      throw new AnalysisConfigError(problems);
    }

    this.ensemble = new EnsembleClassifier(models, config, geometry);
    this.evaluator = new BiomechanicalEvaluator(
      config.thresholds,
      config.smoothingBufferCapacity,
      geometry
    );
    this.visibilityRule = {
      frameVisibilityThreshold: config.frameVisibilityThreshold,
      windowVisibleRatio: config.windowVisibleRatio,
    };
    this.liveBuffer = new WindowBuffer(
      config.windowSize,
      config.minFramesForLiveReady,
      this.visibilityRule
    );
  }

  // ============================================
  // Window and recording analysis
  // ============================================

  /**
   * Classify and evaluate one window
   */
  analyzeWindow(
    window: PoseWindow,
    forcedLabel: CatalogueExercise | null = null
  ): WindowAnalysis {
    const classification = this.ensemble.classify(window, forcedLabel);
    const diagnostic = this.evaluator.evaluate(window.frames, classification.label);
    return { classification, diagnostic };
  }

  /**
   * Analyze a whole recording with discovery voting and a locked re-run.
   * Malformed frames are logged and left out; a recording with no usable
   * frame is reported as no data.
   */
  analyzeRecording(frames: readonly (readonly unknown[])[]): RecordingOutcome {
    const { accepted: validated, rejected } = partitionPoseFrames(frames);
    for (const error of rejected) {
      logger.warn('Rejected frame', { action: 'analyzeRecording', reason: error.message });
    }

    if (validated.length === 0) {
      logger.warn('Empty recording', {
        action: 'analyzeRecording',
        rejected: rejected.length,
      });
      return { status: 'no-data', error: new EmptyInputError() };
    }

    this.evaluator.resetSmoothing();

    const windows = createWindows(
      validated,
      this.config.windowSize,
      this.config.step,
      this.visibilityRule
    );
    const discoveryResults = windows.map((window) => this.ensemble.classify(window));

    const tally = tallyVotes(discoveryResults, this.config.voteConfidenceThreshold);
    if (tally === null) {
      logger.info('No confident exercise', {
        action: 'analyzeRecording',
        windows: windows.length,
      });
      return {
        status: 'no-confident-exercise',
        error: new NoConfidentExerciseError(),
        discoveryResults,
      };
    }

    const { winner, winnerVotes, totalVotes } = tally;
    const votingConfidence = winnerVotes / totalVotes;
    logger.info('Exercise locked', {
      action: 'analyzeRecording',
      exercise: winner,
      votingConfidence,
    });

    this.evaluator.resetSmoothing();
    const perWindowResults = windows.map((window) => this.analyzeWindow(window, winner));
    const diagnostics = perWindowResults.map((result) => result.diagnostic);
    const last = diagnostics[diagnostics.length - 1];

    return {
      status: 'verdict',
      verdict: {
        lockedExercise: winner,
        votingConfidence,
        perWindowResults,
        discoveryResults,
        rejectedFrames: rejected.length,
        isCorrect: last.isCorrect,
        feedback: toFeedback(last),
        textReport: generateReport(winner, diagnostics),
      },
    };
  }

  // ============================================
  // Live mode
  // ============================================

  /**
   * Validate and buffer one live frame.
   *
   * @throws InputShapeError if the frame is malformed; nothing is buffered
   */
  pushFrame(frame: readonly unknown[]): PoseFrame {
    const validated = validatePoseFrame(frame);
    this.liveBuffer.push(validated);
    return validated;
  }

  isReady(): boolean {
    return this.liveBuffer.isReady();
  }

  get bufferedFrames(): number {
    return this.liveBuffer.size;
  }

  getLockedExercise(): CatalogueExercise | null {
    return this.lockedExercise;
  }

  /**
   * Lock live analysis to an exercise (or unlock with null).
   * Smoothing history starts over either way.
   */
  lockExercise(label: CatalogueExercise | null): void {
    this.lockedExercise = label;
    this.evaluator.resetSmoothing();
    logger.info(label === null ? 'Exercise unlocked' : 'Exercise locked', {
      action: 'lockExercise',
      exercise: label ?? undefined,
    });
  }

  /**
   * Analyze the buffered window; null until enough frames are buffered.
   * Without an explicit label the locked exercise (if any) is used.
   */
  analyzeLive(
    forcedLabel: CatalogueExercise | null = this.lockedExercise
  ): WindowAnalysis | null {
    if (!this.liveBuffer.isReady()) return null;
    return this.analyzeWindow(this.liveBuffer.snapshot(), forcedLabel);
  }

  /**
   * Drop buffered frames, the lock and smoothing history
   */
  reset(): void {
    this.liveBuffer.clear();
    this.lockedExercise = null;
    this.evaluator.resetSmoothing();
  }
}
