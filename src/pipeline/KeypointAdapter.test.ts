import { describe, expect, it } from 'vitest';
import { createStandingFrame } from '../test-utils/pose-fixtures';
import { InputShapeError } from '../utils/errors';
import {
  isMediaPipeFormat,
  MEDIAPIPE_KEYPOINT_COUNT,
  partitionPoseFrames,
  validatePoseFrame,
} from './KeypointAdapter';

describe('KeypointAdapter', () => {
  describe('isMediaPipeFormat', () => {
    it('accepts exactly 33 keypoints', () => {
      expect(isMediaPipeFormat(createStandingFrame())).toBe(true);
      expect(isMediaPipeFormat(createStandingFrame().slice(0, 17))).toBe(false);
    });
  });

  describe('validatePoseFrame', () => {
    it('returns a frame with the same coordinates', () => {
      const input = createStandingFrame();
      const frame = validatePoseFrame(input);

      expect(frame).toHaveLength(MEDIAPIPE_KEYPOINT_COUNT);
      expect(frame[11]).toEqual({ x: 0.4, y: 0.3, z: 0, visibility: 0.9 });
    });

    it('defaults missing visibility to 1.0', () => {
      const input = Array.from({ length: 33 }, () => ({ x: 0.1, y: 0.2, z: 0.3 }));
      const frame = validatePoseFrame(input);

      expect(frame[0].visibility).toBe(1);
      expect(frame[32].visibility).toBe(1);
    });

    it('treats null visibility as missing', () => {
      const input = Array.from({ length: 33 }, () => ({
        x: 0,
        y: 0,
        z: 0,
        visibility: null,
      }));
      expect(validatePoseFrame(input)[5].visibility).toBe(1);
    });

    it('clamps visibility into [0, 1]', () => {
      const input = createStandingFrame({
        NOSE: { visibility: 1.4 },
        LEFT_EAR: { visibility: -0.2 },
      });
      const frame = validatePoseFrame(input);

      expect(frame[0].visibility).toBe(1);
      expect(frame[7].visibility).toBe(0);
    });

    it('rejects the wrong joint count', () => {
      expect(() => validatePoseFrame(createStandingFrame().slice(0, 17), 4)).toThrow(
        'Frame 4: expected 33 keypoints (MediaPipe-33), got 17'
      );
    });

    it('rejects a joint without z', () => {
      const input: unknown[] = [...createStandingFrame()];
      input[3] = { x: 0.1, y: 0.2 };

      expect(() => validatePoseFrame(input)).toThrow(
        'Frame, joint 3: expected an {x, y, z} point'
      );
    });

    it('rejects non-finite coordinates', () => {
      const input = createStandingFrame({ LEFT_KNEE: { y: Number.NaN } });

      expect(() => validatePoseFrame(input, 2)).toThrow(
        'Frame 2, joint 25: coordinates must be finite numbers'
      );
    });

    it('rejects a non-numeric visibility', () => {
      const input: unknown[] = [...createStandingFrame()];
      input[0] = { x: 0, y: 0, z: 0, visibility: 'high' };

      expect(() => validatePoseFrame(input)).toThrow(InputShapeError);
    });

    it('rejects a null joint', () => {
      const input: unknown[] = [...createStandingFrame()];
      input[10] = null;

      expect(() => validatePoseFrame(input)).toThrow(InputShapeError);
    });
  });

  describe('partitionPoseFrames', () => {
    it('sets malformed frames aside with their recording index', () => {
      const frames = [
        createStandingFrame(),
        createStandingFrame().slice(0, 32),
        createStandingFrame(),
      ];

      const { accepted, rejected } = partitionPoseFrames(frames);

      expect(accepted).toHaveLength(2);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(InputShapeError);
      expect(rejected[0].frameIndex).toBe(1);
      expect(rejected[0].code).toBe('INPUT_SHAPE');
      expect(rejected[0].message).toBe('Frame 1: expected 33 keypoints (MediaPipe-33), got 32');
    });

    it('partitions an empty recording into empty lists', () => {
      expect(partitionPoseFrames([])).toEqual({ accepted: [], rejected: [] });
    });
  });
});
