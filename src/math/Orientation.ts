// ═══════════════════════════════════════════════════════════════════
// ORIENTATION - rotation helpers shared by springs and splines
//
// Orientation triples are Euler angles in radians applied in YXZ order
// (yaw about Y, then pitch about X, then roll about Z). Looking down -Z
// with +Y up is the identity orientation.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { TAU } from '../constants.js';

export const ORIENTATION_ORDER = 'YXZ';

/** [pitch (x), yaw (y), roll (z)] in radians */
export type Orientation = [number, number, number];

const _UP = new THREE.Vector3(0, 1, 0);
const _FORWARD = new THREE.Vector3(0, 0, -1);
const _euler = new THREE.Euler(0, 0, 0, ORIENTATION_ORDER);
const _matrix = new THREE.Matrix4();

export function toOrientation(rotation: THREE.Quaternion): Orientation {
  _euler.setFromQuaternion(rotation, ORIENTATION_ORDER);
  return [_euler.x, _euler.y, _euler.z];
}

export function fromOrientation(
  pitch: number, yaw: number, roll: number,
  target = new THREE.Quaternion(),
): THREE.Quaternion {
  _euler.set(pitch, yaw, roll, ORIENTATION_ORDER);
  return target.setFromEuler(_euler);
}

/**
 * Picks whichever of `angle`, `angle + 2π` and `angle - 2π` lies nearest
 * to `reference`, so blending toward it takes the short way round.
 */
export function closestAngle(angle: number, reference: number): number {
  let best = angle;
  for (const candidate of [angle + TAU, angle - TAU]) {
    if (Math.abs(candidate - reference) < Math.abs(best - reference)) best = candidate;
  }
  return best;
}

/** Rotation whose -Z axis points from `eye` toward `target` */
export function lookAtRotation(
  eye: THREE.Vector3, target: THREE.Vector3,
  up: THREE.Vector3 = _UP, out = new THREE.Quaternion(),
): THREE.Quaternion {
  _matrix.lookAt(eye, target, up);
  return out.setFromRotationMatrix(_matrix);
}

/** Direction a rotation faces (its -Z axis) */
export function lookVector(rotation: THREE.Quaternion, out = new THREE.Vector3()): THREE.Vector3 {
  return out.copy(_FORWARD).applyQuaternion(rotation);
}

/** Cubic ease-in/ease-out: 3t² - 2t³ */
export function smoothstep(t: number): number {
  return t * t * (3 - 2 * t);
}
