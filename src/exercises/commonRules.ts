/**
 * Frame rules shared by several exercises.
 *
 * Each rule compares one Skeleton metric with one clinical threshold.
 * Exercises that need a different limit for the same fault (trunk lean)
 * build their own rule from the factory.
 */

import type { ClinicalThresholds } from '../config/analysisConfig';
import type { FrameRule } from '../types/exercise';

export const torsoInstability: FrameRule = {
  violation: 'torso instability',
  advice:
    'Keep your torso tall and centered over your hips. Avoid swaying from side to side.',
  isViolated: (skeleton, t) => skeleton.getLateralTorsoShift() > t.lateralShiftMax,
};

export const pelvicTilt: FrameRule = {
  violation: 'pelvic tilt',
  advice:
    'Keep your hips level. Brace your core and glutes so one side does not hike or drop.',
  isViolated: (skeleton, t) => skeleton.getPelvicTilt() > t.pelvicTiltMax,
};

export const shrugging: FrameRule = {
  violation: 'shrugging',
  advice: 'Keep your shoulders down and relaxed, away from your ears.',
  isViolated: (skeleton, t) =>
    skeleton.getEarShoulderDistance() < t.earShoulderMinDistance,
};

export const armAsymmetry: FrameRule = {
  violation: 'arm asymmetry',
  advice: 'Move both arms together at the same speed and height.',
  isViolated: (skeleton, t) =>
    skeleton.getWristHeightAsymmetry() > t.wristAsymmetryMax,
};

export const elbowBent: FrameRule = {
  violation: 'elbow bent',
  advice: 'Keep your elbows straight through the whole movement.',
  isViolated: (skeleton, t) =>
    Math.min(skeleton.getElbowAngle('left'), skeleton.getElbowAngle('right')) <
    t.straightElbowMinAngle,
};

/**
 * Trunk angle from vertical above an exercise-specific limit
 */
export function forwardTrunkLean(
  maxAngle: (thresholds: ClinicalThresholds) => number
): FrameRule {
  return {
    violation: 'forward trunk lean',
    advice: 'Keep your chest up and your back straight. Engage your core to stay upright.',
    isViolated: (skeleton, t) => skeleton.getTrunkAngle() > maxAngle(t),
  };
}
