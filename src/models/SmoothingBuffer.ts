import { mean } from './Geometry';

/**
 * Fixed-capacity FIFO of a scalar metric with a running mean.
 *
 * Used to damp single-frame jitter from pose estimation before a threshold
 * check. Owned by exactly one evaluator; never shared across sessions.
 */
export class SmoothingBuffer {
  private values: number[] = [];

  constructor(readonly capacity: number = 10) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`SmoothingBuffer capacity must be a positive integer (got ${capacity})`);
    }
  }

  /**
   * Add a value, evicting the oldest once full
   */
  push(value: number): void {
    this.values.push(value);

    // Keep buffer at fixed size
    if (this.values.length > this.capacity) {
      this.values.shift();
    }
  }

  /**
   * Mean of the buffered values, 0 when empty
   */
  getMean(): number {
    return mean(this.values);
  }

  get size(): number {
    return this.values.length;
  }

  getValues(): readonly number[] {
    return [...this.values];
  }

  clear(): void {
    this.values = [];
  }
}
