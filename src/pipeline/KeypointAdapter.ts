/**
 * KeypointAdapter - Frame validation at ingestion
 *
 * Everything downstream assumes MediaPipe BlazePose format (33 keypoints)
 * with finite coordinates. Frames from the detector pass through here
 * before they reach a WindowBuffer.
 *
 * MediaPipe BlazePose keypoints (33 total):
 *   0: nose, 1-6: eyes (inner/outer), 7-8: ears, 9-10: mouth,
 *   11-12: shoulders, 13-14: elbows, 15-16: wrists,
 *   17-22: hands (pinky/index/thumb), 23-24: hips, 25-26: knees,
 *   27-28: ankles, 29-30: heels, 31-32: foot index
 */

import type { PoseFrame, PoseKeypoint } from '../types';
import { InputShapeError } from '../utils/errors';

/**
 * Expected keypoint count for MediaPipe BlazePose format
 */
export const MEDIAPIPE_KEYPOINT_COUNT = 33;

/**
 * Visibility assumed when the detector omits it
 */
export const DEFAULT_VISIBILITY = 1.0;

/**
 * Check if keypoints are in MediaPipe format (33 keypoints)
 */
export function isMediaPipeFormat(keypoints: readonly unknown[]): boolean {
  return keypoints.length === MEDIAPIPE_KEYPOINT_COUNT;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function describeFrame(frameIndex: number | undefined): string {
  return frameIndex === undefined ? 'Frame' : `Frame ${frameIndex}`;
}

function toKeypoint(
  value: unknown,
  jointIndex: number,
  frameIndex: number | undefined
): PoseKeypoint {
  const where = `${describeFrame(frameIndex)}, joint ${jointIndex}`;

  if (
    typeof value !== 'object' ||
    value === null ||
    !('x' in value) ||
    !('y' in value) ||
    !('z' in value)
  ) {
    throw new InputShapeError(`${where}: expected an {x, y, z} point`, frameIndex);
  }

  const { x, y, z } = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
    throw new InputShapeError(`${where}: coordinates must be finite numbers`, frameIndex);
  }

  const rawVisibility = 'visibility' in value ? value.visibility : undefined;
  if (rawVisibility === undefined || rawVisibility === null) {
    return { x, y, z, visibility: DEFAULT_VISIBILITY };
  }
  if (!isFiniteNumber(rawVisibility)) {
    throw new InputShapeError(`${where}: visibility must be a finite number`, frameIndex);
  }

  return { x, y, z, visibility: Math.min(Math.max(rawVisibility, 0), 1) };
}

/**
 * Validate one detector frame and normalize it.
 *
 * Visibility defaults to 1.0 when missing and is clamped to [0, 1].
 *
 * @throws InputShapeError if the joint count is not 33 or a joint lacks
 *   finite x, y, z coordinates
 */
export function validatePoseFrame(
  keypoints: readonly unknown[],
  frameIndex?: number
): PoseFrame {
  if (!isMediaPipeFormat(keypoints)) {
    throw new InputShapeError(
      `${describeFrame(frameIndex)}: expected ${MEDIAPIPE_KEYPOINT_COUNT} keypoints (MediaPipe-33), got ${keypoints.length}`,
      frameIndex
    );
  }

  return keypoints.map((keypoint, jointIndex) =>
    toKeypoint(keypoint, jointIndex, frameIndex)
  );
}

export interface PartitionedFrames {
  readonly accepted: PoseFrame[];
  readonly rejected: InputShapeError[];
}

/**
 * Validate every frame of a recording, setting malformed frames aside
 * instead of failing the whole recording.
 */
export function partitionPoseFrames(
  frames: readonly (readonly unknown[])[]
): PartitionedFrames {
  const accepted: PoseFrame[] = [];
  const rejected: InputShapeError[] = [];

  frames.forEach((frame, frameIndex) => {
    try {
      accepted.push(validatePoseFrame(frame, frameIndex));
    } catch (error) {
      if (!(error instanceof InputShapeError)) throw error;
      rejected.push(error);
    }
  });

  return { accepted, rejected };
}
