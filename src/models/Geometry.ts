import type { Vector3 } from '../types';

/**
 * Vector math shared by the skeleton, the override rules and the evaluator.
 *
 * Injected rather than inherited so a caller can swap in a 2D variant
 * (ignoring z) or instrument the calls in tests.
 */
export interface GeometryKit {
  /**
   * Angle in degrees at vertex `b` between the rays b→a and b→c.
   * Returns 0 when either ray has zero length.
   */
  angle(a: Vector3, b: Vector3, c: Vector3): number;

  /** Euclidean distance */
  distance(a: Vector3, b: Vector3): number;

  midpoint(a: Vector3, b: Vector3): Vector3;
}

function subtract(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

function dot(a: Vector3, b: Vector3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

function norm(v: Vector3): number {
  return Math.sqrt(dot(v, v));
}

export const defaultGeometry: GeometryKit = {
  angle(a, b, c) {
    const ba = subtract(a, b);
    const bc = subtract(c, b);

    const magBa = norm(ba);
    const magBc = norm(bc);
    if (magBa === 0 || magBc === 0) return 0;

    const cosAngle = Math.min(Math.max(dot(ba, bc) / (magBa * magBc), -1), 1);
    return Math.acos(cosAngle) * (180 / Math.PI);
  },

  distance(a, b) {
    return norm(subtract(a, b));
  },

  midpoint(a, b) {
    return {
      x: (a.x + b.x) / 2,
      y: (a.y + b.y) / 2,
      z: (a.z + b.z) / 2,
    };
  },
};

/**
 * Arithmetic mean, 0 for an empty list.
 *
 * Accumulates offsets from the first value, so a constant series averages to
 * exactly that value.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const reference = values[0];
  const offset = values.reduce((sum, value) => sum + (value - reference), 0);
  return reference + offset / values.length;
}
