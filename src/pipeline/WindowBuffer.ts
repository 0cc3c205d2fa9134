/**
 * WindowBuffer - temporal windowing of pose frames
 *
 * Two modes:
 * - Streaming: a fixed-capacity ring buffer fed one frame at a time
 *   (live analysis). `snapshot()` reads the current window without mutating.
 * - Batch: `createWindows()` splits a whole recording into overlapping
 *   windows (offline analysis).
 */

import { Skeleton } from '../models/Skeleton';
import type { PoseFrame, PoseWindow } from '../types';

export interface VisibilityRule {
  /** Mean joint visibility at which a frame counts as visible */
  frameVisibilityThreshold: number;
  /** Share of visible frames at which a window counts as visible */
  windowVisibleRatio: number;
}

export const DEFAULT_VISIBILITY_RULE: VisibilityRule = {
  frameVisibilityThreshold: 0.5,
  windowVisibleRatio: 0.7,
};

/**
 * A frame is visible when the mean visibility of its joints reaches the threshold.
 */
export function isFrameVisible(frame: PoseFrame, threshold: number): boolean {
  if (frame.length === 0) return false;
  return new Skeleton(frame).getMeanVisibility() >= threshold;
}

/**
 * Wrap frames as a window and derive its visibility flag.
 */
export function buildWindow(
  frames: readonly PoseFrame[],
  rule: VisibilityRule = DEFAULT_VISIBILITY_RULE
): PoseWindow {
  const visibleCount = frames.filter((frame) =>
    isFrameVisible(frame, rule.frameVisibilityThreshold)
  ).length;
  const windowVisible =
    frames.length > 0 && visibleCount / frames.length >= rule.windowVisibleRatio;

  return { frames, windowVisible };
}

/**
 * Split a recording into overlapping windows.
 *
 * - no frames: no windows
 * - `frames.length <= windowSize`: one window holding every frame
 * - otherwise windows start at 0, step, 2·step, … while the start stays
 *   strictly below `frames.length - windowSize`; a trailing partial window is
 *   never emitted
 *
 * @throws RangeError unless windowSize and step are positive integers
 */
export function createWindows(
  frames: readonly PoseFrame[],
  windowSize: number,
  step: number,
  rule: VisibilityRule = DEFAULT_VISIBILITY_RULE
): PoseWindow[] {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer (got ${windowSize})`);
  }
  if (!Number.isInteger(step) || step < 1) {
    throw new RangeError(`step must be a positive integer (got ${step})`);
  }
  if (frames.length === 0) return [];
  if (frames.length <= windowSize) {
    return [buildWindow(frames, rule)];
  }

  const windows: PoseWindow[] = [];
  for (let offset = 0; offset < frames.length - windowSize; offset += step) {
    windows.push(buildWindow(frames.slice(offset, offset + windowSize), rule));
  }
  return windows;
}

/**
 * Streaming ring buffer of the most recent frames.
 */
export class WindowBuffer {
  private readonly slots: (PoseFrame | undefined)[];
  private head = 0;
  private count = 0;

  constructor(
    readonly capacity: number,
    private readonly minFramesForReady: number,
    private readonly visibilityRule: VisibilityRule = DEFAULT_VISIBILITY_RULE
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`WindowBuffer capacity must be a positive integer (got ${capacity})`);
    }
    this.slots = new Array<PoseFrame | undefined>(capacity).fill(undefined);
  }

  /**
   * Append a frame, overwriting the oldest once full.
   */
  push(frame: PoseFrame): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = frame;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  get size(): number {
    return this.count;
  }

  /**
   * True once enough frames are buffered to analyze
   */
  isReady(): boolean {
    return this.count >= this.minFramesForReady;
  }

  /**
   * The buffered frames, oldest first, as a window.
   */
  snapshot(): PoseWindow {
    const frames: PoseFrame[] = [];
    for (let i = 0; i < this.count; i++) {
      const frame = this.slots[(this.head + i) % this.capacity];
      if (frame) {
        frames.push(frame);
      }
    }
    return buildWindow(frames, this.visibilityRule);
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
