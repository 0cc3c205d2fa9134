/**
 * Rehab Motion Analyzer
 *
 * Exercise identification and movement-quality verdicts from MediaPipe-33
 * pose frames.
 *
 * @example
 * const factory = createSessionFactory({ legs, arms });
 * const outcome = factory.createSession().analyzeRecording(frames);
 * console.log(toOutcomeJson(outcome));
 */

export * from './analyzers';
export {
  type AnalysisConfig,
  type AnalysisConfigOverrides,
  type ClinicalThresholds,
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_CLINICAL_THRESHOLDS,
  resolveAnalysisConfig,
  validateAnalysisConfig,
} from './config/analysisConfig';
export {
  exerciseRegistry,
  findDeepestFrame,
  getAdvice,
  getAvailableExercises,
  getExerciseByName,
  getExerciseDefinition,
  getViolationNames,
} from './exercises';
export { defaultGeometry, type GeometryKit, mean } from './models/Geometry';
export { Skeleton } from './models/Skeleton';
export { SmoothingBuffer } from './models/SmoothingBuffer';
export {
  DEFAULT_VISIBILITY,
  isMediaPipeFormat,
  MEDIAPIPE_KEYPOINT_COUNT,
  type PartitionedFrames,
  partitionPoseFrames,
  validatePoseFrame,
} from './pipeline/KeypointAdapter';
export {
  type LiveResult,
  LiveSession,
  type LiveSessionOptions,
} from './pipeline/LiveSession';
export {
  centerOnHips,
  flattenFrames,
  resampleFrames,
  toModelInput,
} from './pipeline/Preprocessing';
export {
  type Feedback,
  MOVEMENT_CORRECT,
  type RecordingOutcome,
  SessionAggregator,
  type SessionVerdict,
  tallyVotes,
  toFeedback,
  toOutcomeJson,
  toVerdictJson,
  type VerdictJson,
  type VoteTally,
} from './pipeline/SessionAggregator';
export {
  type CreateSessionFactoryOptions,
  createSessionFactory,
  type SessionFactory,
} from './pipeline/SessionFactory';
export {
  buildWindow,
  createWindows,
  DEFAULT_VISIBILITY_RULE,
  isFrameVisible,
  type VisibilityRule,
  WindowBuffer,
} from './pipeline/WindowBuffer';
export {
  type Announcer,
  type AnnouncerSlot,
  FeedbackChannel,
  type FeedbackChannelOptions,
  type StopOptions,
} from './services/FeedbackChannel';
export {
  available,
  type BodyPart,
  type BodySide,
  MediaPipeBodyParts,
  type Pluggable,
  type PoseFrame,
  type PoseKeypoint,
  type PoseWindow,
  unavailable,
  type Vector3,
} from './types';
export * from './types/exercise';
export {
  AnalysisConfigError,
  AnalysisError,
  type AnalysisErrorCode,
  EmptyInputError,
  InputShapeError,
  NoConfidentExerciseError,
} from './utils/errors';
export { createLogger, type Logger, type LogLevel, setLogLevel } from './utils/logger';
