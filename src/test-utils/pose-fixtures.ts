/**
 * Pose Fixtures for Unit Tests
 *
 * Synthetic MediaPipe-33 frames in normalized image coordinates (y down).
 * The standing pose is upright, symmetric and passes every exercise rule;
 * tests override individual joints to provoke a specific violation.
 */

import {
  type BodyPart,
  isBodyPart,
  MediaPipeBodyParts,
  type PoseFrame,
  type PoseKeypoint,
  type Vector3,
} from '../types';

/**
 * MediaPipe keypoint indices (33-point format)
 */
export const KEYPOINT_INDICES = MediaPipeBodyParts;

export const DEFAULT_VISIBILITY = 0.9;

/**
 * Standing pose, arms hanging, feet hip-width apart.
 *
 * Shoulders at y=0.30, hips at y=0.60, knees at y=0.75, ankles at y=0.90.
 */
const STANDING_POSITIONS: Record<BodyPart, [number, number]> = {
  NOSE: [0.5, 0.15],
  LEFT_EYE_INNER: [0.49, 0.14],
  LEFT_EYE: [0.48, 0.14],
  LEFT_EYE_OUTER: [0.47, 0.14],
  RIGHT_EYE_INNER: [0.51, 0.14],
  RIGHT_EYE: [0.52, 0.14],
  RIGHT_EYE_OUTER: [0.53, 0.14],
  LEFT_EAR: [0.47, 0.15],
  RIGHT_EAR: [0.53, 0.15],
  MOUTH_LEFT: [0.49, 0.17],
  MOUTH_RIGHT: [0.51, 0.17],
  LEFT_SHOULDER: [0.4, 0.3],
  RIGHT_SHOULDER: [0.6, 0.3],
  LEFT_ELBOW: [0.4, 0.45],
  RIGHT_ELBOW: [0.6, 0.45],
  LEFT_WRIST: [0.4, 0.6],
  RIGHT_WRIST: [0.6, 0.6],
  LEFT_PINKY: [0.4, 0.62],
  RIGHT_PINKY: [0.6, 0.62],
  LEFT_INDEX: [0.4, 0.63],
  RIGHT_INDEX: [0.6, 0.63],
  LEFT_THUMB: [0.41, 0.62],
  RIGHT_THUMB: [0.59, 0.62],
  LEFT_HIP: [0.45, 0.6],
  RIGHT_HIP: [0.55, 0.6],
  LEFT_KNEE: [0.45, 0.75],
  RIGHT_KNEE: [0.55, 0.75],
  LEFT_ANKLE: [0.45, 0.9],
  RIGHT_ANKLE: [0.55, 0.9],
  LEFT_HEEL: [0.45, 0.92],
  RIGHT_HEEL: [0.55, 0.92],
  LEFT_FOOT_INDEX: [0.43, 0.92],
  RIGHT_FOOT_INDEX: [0.57, 0.92],
};

export type JointOverrides = Partial<Record<BodyPart, Partial<PoseKeypoint>>>;

/**
 * Create a standing frame, optionally moving individual joints.
 */
export function createStandingFrame(
  overrides: JointOverrides = {},
  visibility = DEFAULT_VISIBILITY
): PoseKeypoint[] {
  const frame: PoseKeypoint[] = new Array(33);
  for (const [part, [x, y]] of Object.entries(STANDING_POSITIONS)) {
    if (isBodyPart(part)) {
      frame[MediaPipeBodyParts[part]] = { x, y, z: 0, visibility };
    }
  }
  for (const [part, patch] of Object.entries(overrides)) {
    if (isBodyPart(part) && patch) {
      const index = MediaPipeBodyParts[part];
      frame[index] = { ...frame[index], ...patch };
    }
  }
  return frame;
}

/**
 * Repeat a frame factory `count` times.
 */
export function createRecording(
  count: number,
  factory: (index: number) => PoseFrame = () => createStandingFrame()
): PoseFrame[] {
  return Array.from({ length: count }, (_, index) => factory(index));
}

const SHIN_LENGTH = 0.2;
const SPINE_LENGTH = 0.3;
const UPPER_BODY_PARTS: readonly BodyPart[] = [
  'NOSE',
  'LEFT_EYE_INNER',
  'LEFT_EYE',
  'LEFT_EYE_OUTER',
  'RIGHT_EYE_INNER',
  'RIGHT_EYE',
  'RIGHT_EYE_OUTER',
  'LEFT_EAR',
  'RIGHT_EAR',
  'MOUTH_LEFT',
  'MOUTH_RIGHT',
  'LEFT_SHOULDER',
  'RIGHT_SHOULDER',
  'LEFT_ELBOW',
  'RIGHT_ELBOW',
  'LEFT_WRIST',
  'RIGHT_WRIST',
  'LEFT_PINKY',
  'RIGHT_PINKY',
  'LEFT_INDEX',
  'RIGHT_INDEX',
  'LEFT_THUMB',
  'RIGHT_THUMB',
];

export interface SquatFrameOptions {
  /** Lateral torso lean ratio, shift / spine length (default 0.3) */
  lean?: number;
  /** Horizontal distance between the knees (default 0.1, same as the ankles) */
  kneeSpread?: number;
}

/**
 * A squat frame with both knees bent to exactly `kneeAngle` degrees.
 *
 * Shins are vertical with knees over the ankles; the thigh rotates forward
 * in z. The upper body is carried along with the shoulder midpoint placed
 * at `lean` of the spine length to the side of the hip midpoint.
 */
export function createSquatFrame(
  kneeAngle: number,
  { lean = 0.3, kneeSpread = 0.1 }: SquatFrameOptions = {}
): PoseKeypoint[] {
  const frame = createStandingFrame();
  const radians = (kneeAngle * Math.PI) / 180;
  const kneeY = 0.9 - SHIN_LENGTH;
  const hipY = kneeY + SHIN_LENGTH * Math.cos(radians);
  const hipZ = SHIN_LENGTH * Math.sin(radians);

  const place = (part: BodyPart, point: Vector3) => {
    frame[MediaPipeBodyParts[part]] = { ...point, visibility: DEFAULT_VISIBILITY };
  };

  for (const side of ['LEFT', 'RIGHT'] as const) {
    const sign = side === 'LEFT' ? -1 : 1;
    const ankleX = 0.5 + sign * 0.05;
    const kneeX = 0.5 + (sign * kneeSpread) / 2;
    place(`${side}_ANKLE`, { x: ankleX, y: 0.9, z: 0 });
    place(`${side}_KNEE`, { x: kneeX, y: kneeY, z: 0 });
    place(`${side}_HIP`, { x: kneeX, y: hipY, z: hipZ });
  }

  const shoulderMid = {
    x: 0.5 + SPINE_LENGTH * lean,
    y: hipY - SPINE_LENGTH * Math.sqrt(1 - lean * lean),
    z: hipZ,
  };
  const dx = shoulderMid.x - 0.5;
  const dy = shoulderMid.y - 0.3;
  for (const part of UPPER_BODY_PARTS) {
    const [x, y] = STANDING_POSITIONS[part];
    place(part, { x: x + dx, y: y + dy, z: hipZ });
  }

  return frame;
}

/**
 * Knee angle for frame `index` of a repeated squat: 170° standing down to
 * 95° at the bottom, one repetition every 30 frames (bottoms at 15, 45, 75).
 */
export function squatKneeAngleAt(index: number): number {
  return 132.5 + 37.5 * Math.cos((2 * Math.PI * index) / 30);
}

/**
 * A recording of repeated deep squats.
 */
export function createSquatRecording(
  frameCount = 90,
  options: SquatFrameOptions = {}
): PoseFrame[] {
  return createRecording(frameCount, (index) =>
    createSquatFrame(squatKneeAngleAt(index), options)
  );
}
