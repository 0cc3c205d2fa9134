/**
 * Core pose types shared by every stage of the analysis.
 *
 * All pose data uses the MediaPipe BlazePose layout (33 keypoints) in
 * normalized image coordinates: x to the right, y downward, z toward the camera.
 */

/**
 * MediaPipe BlazePose keypoint indices (33 total)
 */
export const MediaPipeBodyParts = {
  NOSE: 0,
  LEFT_EYE_INNER: 1,
  LEFT_EYE: 2,
  LEFT_EYE_OUTER: 3,
  RIGHT_EYE_INNER: 4,
  RIGHT_EYE: 5,
  RIGHT_EYE_OUTER: 6,
  LEFT_EAR: 7,
  RIGHT_EAR: 8,
  MOUTH_LEFT: 9,
  MOUTH_RIGHT: 10,
  LEFT_SHOULDER: 11,
  RIGHT_SHOULDER: 12,
  LEFT_ELBOW: 13,
  RIGHT_ELBOW: 14,
  LEFT_WRIST: 15,
  RIGHT_WRIST: 16,
  LEFT_PINKY: 17,
  RIGHT_PINKY: 18,
  LEFT_INDEX: 19,
  RIGHT_INDEX: 20,
  LEFT_THUMB: 21,
  RIGHT_THUMB: 22,
  LEFT_HIP: 23,
  RIGHT_HIP: 24,
  LEFT_KNEE: 25,
  RIGHT_KNEE: 26,
  LEFT_ANKLE: 27,
  RIGHT_ANKLE: 28,
  LEFT_HEEL: 29,
  RIGHT_HEEL: 30,
  LEFT_FOOT_INDEX: 31,
  RIGHT_FOOT_INDEX: 32,
} as const;

export type BodyPart = keyof typeof MediaPipeBodyParts;

export function isBodyPart(name: string): name is BodyPart {
  return Object.prototype.hasOwnProperty.call(MediaPipeBodyParts, name);
}

export type BodySide = 'left' | 'right';

/**
 * A point in 3D space
 */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/**
 * A single joint as produced by the pose detector
 */
export interface PoseKeypoint extends Vector3 {
  /** Detector confidence that the joint is visible, 0-1 (defaults to 1.0) */
  visibility?: number;
}

/**
 * One instant's full-body snapshot: exactly 33 keypoints, indexed by MediaPipeBodyParts.
 */
export type PoseFrame = readonly PoseKeypoint[];

/**
 * A bounded, ordered run of frames: the unit of classification and evaluation.
 */
export interface PoseWindow {
  readonly frames: readonly PoseFrame[];
  /** True when enough of the frames had the body in view */
  readonly windowVisible: boolean;
}

/**
 * A collaborator that may be missing at runtime (model not loaded, no audio device).
 */
export type Pluggable<T> =
  | { status: 'available'; value: T }
  | { status: 'unavailable'; reason: string };

export function available<T>(value: T): Pluggable<T> {
  return { status: 'available', value };
}

export function unavailable<T>(reason: string): Pluggable<T> {
  return { status: 'unavailable', reason };
}
