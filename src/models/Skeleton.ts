import {
  type BodyPart,
  type BodySide,
  MediaPipeBodyParts,
  type PoseFrame,
  type PoseKeypoint,
  type Vector3,
} from '../types';
import { defaultGeometry, type GeometryKit } from './Geometry';

const UP: Vector3 = { x: 0, y: -1, z: 0 };

type SideJoint =
  | 'EAR'
  | 'SHOULDER'
  | 'ELBOW'
  | 'WRIST'
  | 'HIP'
  | 'KNEE'
  | 'ANKLE'
  | 'HEEL'
  | 'FOOT_INDEX';

function sidePart(side: BodySide, joint: SideJoint): BodyPart {
  const prefix: Uppercase<BodySide> = side === 'left' ? 'LEFT' : 'RIGHT';
  const part: `${Uppercase<BodySide>}_${SideJoint}` = `${prefix}_${joint}`;
  return part;
}

/**
 * Named-joint view over one pose frame with derived body metrics.
 *
 * COORDINATES: normalized image space, x to the right, y DOWNWARD, z toward
 * the camera. "Higher" on screen therefore means a smaller y.
 *
 * BIOMECHANICS REFERENCE:
 * - Knee Angle: Hip-Knee-Ankle. ~180° = straight leg, ~90° = deep squat
 * - Elbow Angle: Shoulder-Elbow-Wrist. ~180° = straight arm
 * - Trunk Angle: hip→shoulder line against vertical. 0° = upright
 */
export class Skeleton {
  constructor(
    private readonly frame: PoseFrame,
    private readonly geometry: GeometryKit = defaultGeometry
  ) {}

  getFrame(): PoseFrame {
    return this.frame;
  }

  getJoint(part: BodyPart): PoseKeypoint {
    return this.frame[MediaPipeBodyParts[part]];
  }

  private joint(side: BodySide, name: SideJoint): PoseKeypoint {
    return this.getJoint(sidePart(side, name));
  }

  // ============================================
  // Joint angles
  // ============================================

  getKneeAngle(side: BodySide): number {
    return this.geometry.angle(
      this.joint(side, 'HIP'),
      this.joint(side, 'KNEE'),
      this.joint(side, 'ANKLE')
    );
  }

  /** Mean of both knee angles */
  getMeanKneeAngle(): number {
    return (this.getKneeAngle('left') + this.getKneeAngle('right')) / 2;
  }

  getElbowAngle(side: BodySide): number {
    return this.geometry.angle(
      this.joint(side, 'SHOULDER'),
      this.joint(side, 'ELBOW'),
      this.joint(side, 'WRIST')
    );
  }

  // ============================================
  // Midpoints
  // ============================================

  getHipMidpoint(): Vector3 {
    return this.geometry.midpoint(
      this.getJoint('LEFT_HIP'),
      this.getJoint('RIGHT_HIP')
    );
  }

  getShoulderMidpoint(): Vector3 {
    return this.geometry.midpoint(
      this.getJoint('LEFT_SHOULDER'),
      this.getJoint('RIGHT_SHOULDER')
    );
  }

  getAnkleMidpoint(): Vector3 {
    return this.geometry.midpoint(
      this.getJoint('LEFT_ANKLE'),
      this.getJoint('RIGHT_ANKLE')
    );
  }

  // ============================================
  // Torso
  // ============================================

  /** Distance from hip midpoint to shoulder midpoint */
  getSpineLength(): number {
    return this.geometry.distance(
      this.getShoulderMidpoint(),
      this.getHipMidpoint()
    );
  }

  /** Horizontal offset of the shoulders over the hips */
  getLateralTorsoShift(): number {
    return Math.abs(this.getShoulderMidpoint().x - this.getHipMidpoint().x);
  }

  /**
   * Lateral shift as a fraction of spine length. 0 for a collapsed spine.
   */
  getTorsoLean(): number {
    const spine = this.getSpineLength();
    if (spine === 0) return 0;
    return this.getLateralTorsoShift() / spine;
  }

  /** Angle of the hip→shoulder line from vertical, in degrees */
  getTrunkAngle(): number {
    const hipMid = this.getHipMidpoint();
    const above = { x: hipMid.x + UP.x, y: hipMid.y + UP.y, z: hipMid.z + UP.z };
    return this.geometry.angle(this.getShoulderMidpoint(), hipMid, above);
  }

  /**
   * Ear-to-shoulder distance on the closer side. Shrinks when the shoulders
   * are hiked toward the ears.
   */
  getEarShoulderDistance(): number {
    return Math.min(
      this.geometry.distance(this.getJoint('LEFT_EAR'), this.getJoint('LEFT_SHOULDER')),
      this.geometry.distance(this.getJoint('RIGHT_EAR'), this.getJoint('RIGHT_SHOULDER'))
    );
  }

  /** Vertical gap between the hips */
  getPelvicTilt(): number {
    return Math.abs(this.getJoint('LEFT_HIP').y - this.getJoint('RIGHT_HIP').y);
  }

  // ============================================
  // Arms
  // ============================================

  /** Vertical gap between the wrists */
  getWristHeightAsymmetry(): number {
    return Math.abs(
      this.getJoint('LEFT_WRIST').y - this.getJoint('RIGHT_WRIST').y
    );
  }

  /** Horizontal distance of the elbow from its shoulder */
  getElbowDrift(side: BodySide): number {
    return Math.abs(this.joint(side, 'ELBOW').x - this.joint(side, 'SHOULDER').x);
  }

  // ============================================
  // Legs
  // ============================================

  getKneeSpread(): number {
    return this.geometry.distance(
      this.getJoint('LEFT_KNEE'),
      this.getJoint('RIGHT_KNEE')
    );
  }

  getAnkleSpread(): number {
    return this.geometry.distance(
      this.getJoint('LEFT_ANKLE'),
      this.getJoint('RIGHT_ANKLE')
    );
  }

  /** Front-to-back separation of the feet */
  getAnkleDepthDifference(): number {
    return Math.abs(this.getJoint('LEFT_ANKLE').z - this.getJoint('RIGHT_ANKLE').z);
  }

  /** Vertical gap from hip midpoint down to ankle midpoint */
  getHipAnkleGap(): number {
    return this.getAnkleMidpoint().y - this.getHipMidpoint().y;
  }

  /** How far the heel sits above the toes (positive = heel lifted) */
  getHeelRise(side: BodySide): number {
    return this.joint(side, 'FOOT_INDEX').y - this.joint(side, 'HEEL').y;
  }

  /**
   * The side whose ankle is higher on screen. Ties go to the left.
   */
  getRaisedSide(): BodySide {
    return this.getJoint('RIGHT_ANKLE').y < this.getJoint('LEFT_ANKLE').y
      ? 'right'
      : 'left';
  }

  // ============================================
  // Visibility
  // ============================================

  /** Mean joint visibility, missing values counted as fully visible */
  getMeanVisibility(): number {
    if (this.frame.length === 0) return 0;
    const total = this.frame.reduce(
      (sum, keypoint) => sum + (keypoint.visibility ?? 1),
      0
    );
    return total / this.frame.length;
  }
}
