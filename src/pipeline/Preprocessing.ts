/**
 * Preprocessing for classifier adapters.
 *
 * Sequence classifiers are trained on hip-centered windows of a fixed
 * length. These helpers turn a PoseWindow into that shape; the
 * analysis core itself works on raw frames.
 */

import { MediaPipeBodyParts, type PoseFrame, type PoseKeypoint } from '../types';

/**
 * Translate every joint so the hip midpoint sits at the origin.
 */
export function centerOnHips(frames: readonly PoseFrame[]): PoseFrame[] {
  return frames.map((frame) => {
    const left = frame[MediaPipeBodyParts.LEFT_HIP];
    const right = frame[MediaPipeBodyParts.RIGHT_HIP];
    const cx = (left.x + right.x) / 2;
    const cy = (left.y + right.y) / 2;
    const cz = (left.z + right.z) / 2;

    return frame.map((keypoint) => ({
      ...keypoint,
      x: keypoint.x - cx,
      y: keypoint.y - cy,
      z: keypoint.z - cz,
    }));
  });
}

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

function interpolateFrames(a: PoseFrame, b: PoseFrame, t: number): PoseFrame {
  return a.map(
    (from, index): PoseKeypoint => {
      const to = b[index];
      return {
        x: lerp(from.x, to.x, t),
        y: lerp(from.y, to.y, t),
        z: lerp(from.z, to.z, t),
        visibility: lerp(from.visibility ?? 1, to.visibility ?? 1, t),
      };
    }
  );
}

/**
 * Linearly resample a sequence to `targetLength` frames.
 *
 * First and last frames are preserved. A single-frame target takes the
 * middle frame; a single-frame source is repeated.
 */
export function resampleFrames(
  frames: readonly PoseFrame[],
  targetLength: number
): PoseFrame[] {
  if (!Number.isInteger(targetLength) || targetLength < 1) {
    throw new RangeError(`targetLength must be a positive integer (got ${targetLength})`);
  }
  if (frames.length === 0) return [];
  if (frames.length === targetLength) return [...frames];
  if (targetLength === 1) {
    return [frames[Math.floor((frames.length - 1) / 2)]];
  }

  const lastIndex = frames.length - 1;
  return Array.from({ length: targetLength }, (_, i) => {
    const position = (i * lastIndex) / (targetLength - 1);
    const lower = Math.floor(position);
    const upper = Math.min(lower + 1, lastIndex);
    return interpolateFrames(frames[lower], frames[upper], position - lower);
  });
}

/**
 * One row of x, y, z per joint, concatenated: 99 features per frame.
 */
export function flattenFrames(frames: readonly PoseFrame[]): number[][] {
  return frames.map((frame) =>
    frame.flatMap((keypoint) => [keypoint.x, keypoint.y, keypoint.z])
  );
}

/**
 * Hip-center, resample and flatten a window's frames into a model input.
 */
export function toModelInput(
  frames: readonly PoseFrame[],
  targetLength: number
): number[][] {
  return flattenFrames(resampleFrames(centerOnHips(frames), targetLength));
}
