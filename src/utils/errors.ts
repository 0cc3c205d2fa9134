/**
 * Error taxonomy for the analysis core.
 *
 * InputShapeError is thrown by single-frame validation; recording analysis
 * sets malformed frames aside instead. AnalysisConfigError is thrown at the
 * boundary.
 * EmptyInputError and NoConfidentExerciseError never escape: they travel
 * inside a RecordingOutcome so the caller can turn them into a user-facing message.
 */

export type AnalysisErrorCode =
  | 'INPUT_SHAPE'
  | 'EMPTY_INPUT'
  | 'NO_CONFIDENT_EXERCISE'
  | 'INVALID_CONFIG';

export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A frame has the wrong joint count or a joint is missing coordinates.
 */
export class InputShapeError extends AnalysisError {
  readonly code = 'INPUT_SHAPE';

  constructor(
    message: string,
    /** Index of the offending frame within the submitted recording, if known */
    readonly frameIndex?: number
  ) {
    super(message);
  }
}

/**
 * Nothing to analyze: zero frames or zero windows.
 */
export class EmptyInputError extends AnalysisError {
  readonly code = 'EMPTY_INPUT';

  constructor(message = 'No person detected') {
    super(message);
  }
}

/**
 * Every window stayed below the voting confidence threshold.
 */
export class NoConfidentExerciseError extends AnalysisError {
  readonly code = 'NO_CONFIDENT_EXERCISE';

  constructor(message = 'No exercise detected with sufficient confidence.') {
    super(message);
  }
}

export class AnalysisConfigError extends AnalysisError {
  readonly code = 'INVALID_CONFIG';

  constructor(readonly problems: readonly string[]) {
    super(`Invalid analysis config: ${problems.join('; ')}`);
  }
}
