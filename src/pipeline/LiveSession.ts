/**
 * LiveSession - frame-by-frame analysis with spoken feedback
 *
 * Wires one SessionAggregator to one FeedbackChannel. Every
 * `liveCadenceFrames` valid frames (once the buffer is ready) the current
 * window is analyzed, the result is emitted on `results$`, and the first
 * violation of an incorrect result is queued for announcement.
 *
 * Optional calibration: with `calibrationAnalyses > 0` and no exercise
 * locked, that many unlocked analyses vote on the exercise before the
 * session locks the majority. A calibration with no valid votes starts over.
 */

import { type Observable, Subject } from 'rxjs';
import type { FeedbackChannel } from '../services/FeedbackChannel';
import type {
  CatalogueExercise,
  ClassificationResult,
  WindowAnalysis,
} from '../types/exercise';
import { InputShapeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { type SessionAggregator, tallyVotes } from './SessionAggregator';

const logger = createLogger({ component: 'LiveSession' });

export interface LiveSessionOptions {
  /** Unlocked analyses that vote before locking; 0 disables calibration */
  calibrationAnalyses?: number;
}

export interface LiveResult {
  /** Count of valid frames ingested when the analysis ran */
  readonly frameIndex: number;
  readonly analysis: WindowAnalysis;
  /** The exercise the session is locked to after this analysis */
  readonly lockedExercise: CatalogueExercise | null;
}

export class LiveSession {
  private readonly resultSubject = new Subject<LiveResult>();
  private readonly calibrationAnalyses: number;
  private calibration: ClassificationResult[] = [];
  private acceptedFrames = 0;
  private rejectedFrames = 0;

  constructor(
    private readonly aggregator: SessionAggregator,
    private readonly channel: FeedbackChannel,
    options: LiveSessionOptions = {}
  ) {
    this.calibrationAnalyses = options.calibrationAnalyses ?? 0;
  }

  /**
   * Analyses as they happen
   */
  get results$(): Observable<LiveResult> {
    return this.resultSubject.asObservable();
  }

  get framesAccepted(): number {
    return this.acceptedFrames;
  }

  get framesRejected(): number {
    return this.rejectedFrames;
  }

  /**
   * Feed one detector frame.
   *
   * Malformed frames are logged and counted, never thrown.
   *
   * @returns the analysis when this frame triggered one, otherwise null
   */
  ingest(frame: readonly unknown[]): WindowAnalysis | null {
    try {
      this.aggregator.pushFrame(frame);
    } catch (error) {
      if (!(error instanceof InputShapeError)) throw error;
      this.rejectedFrames++;
      logger.warn('Rejected frame', {
        action: 'ingest',
        reason: error.message,
        rejected: this.rejectedFrames,
      });
      return null;
    }

    this.acceptedFrames++;
    if (this.acceptedFrames % this.aggregator.config.liveCadenceFrames !== 0) return null;

    const analysis = this.aggregator.analyzeLive();
    if (analysis === null) return null;

    if (this.isCalibrating()) {
      this.recordCalibration(analysis.classification);
    } else {
      this.announce(analysis);
    }

    this.resultSubject.next({
      frameIndex: this.acceptedFrames,
      analysis,
      lockedExercise: this.aggregator.getLockedExercise(),
    });
    return analysis;
  }

  /**
   * Stop feedback and complete `results$`
   */
  async dispose(): Promise<void> {
    this.resultSubject.complete();
    await this.channel.stop();
  }

  private isCalibrating(): boolean {
    return this.calibrationAnalyses > 0 && this.aggregator.getLockedExercise() === null;
  }

  private recordCalibration(classification: ClassificationResult): void {
    this.calibration.push(classification);
    if (this.calibration.length < this.calibrationAnalyses) return;

    const tally = tallyVotes(this.calibration, this.aggregator.config.voteConfidenceThreshold);
    this.calibration = [];

    if (tally === null) {
      logger.info('Calibration found no exercise, restarting', { action: 'calibrate' });
      return;
    }
    this.aggregator.lockExercise(tally.winner);
  }

  private announce({ diagnostic }: WindowAnalysis): void {
    if (diagnostic.isCorrect) return;
    const [first] = diagnostic.violations;
    if (first !== undefined) {
      this.channel.enqueue(first);
    }
  }
}
