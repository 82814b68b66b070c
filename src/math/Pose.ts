// ═══════════════════════════════════════════════════════════════════
// POSE - position + rotation
//
// The oriented value used for spline control points, spline query
// results and pose springs.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { fromOrientation, lookAtRotation, lookVector, toOrientation } from './Orientation.js';
import type { Orientation } from './Orientation.js';

export class Pose {
  constructor(
    public position: THREE.Vector3 = new THREE.Vector3(),
    public rotation: THREE.Quaternion = new THREE.Quaternion(),
  ) {}

  // ── Factories ─────────────────────────────────────────────────

  static fromPosition(x: number, y: number, z: number): Pose {
    return new Pose(new THREE.Vector3(x, y, z));
  }

  /** Pose from a position and YXZ Euler angles in radians */
  static fromOrientation(position: THREE.Vector3, pitch: number, yaw: number, roll: number): Pose {
    return new Pose(position.clone(), fromOrientation(pitch, yaw, roll));
  }

  /** Pose at `eye` facing `target` (-Z forward, +Y up) */
  static lookAt(eye: THREE.Vector3, target: THREE.Vector3, up?: THREE.Vector3): Pose {
    return new Pose(eye.clone(), lookAtRotation(eye, target, up));
  }

  /** Linear position blend with a spherical rotation blend */
  static lerp(a: Pose, b: Pose, t: number): Pose {
    return new Pose(
      new THREE.Vector3().lerpVectors(a.position, b.position, t),
      new THREE.Quaternion().slerpQuaternions(a.rotation, b.rotation, t),
    );
  }

  // ── Queries ───────────────────────────────────────────────────

  get lookVector(): THREE.Vector3 {
    return lookVector(this.rotation);
  }

  toOrientation(): Orientation {
    return toOrientation(this.rotation);
  }

  clone(): Pose {
    return new Pose(this.position.clone(), this.rotation.clone());
  }

  /** Component-wise comparison; `epsilon` 0 means exact */
  equals(other: Pose, epsilon = 0): boolean {
    const a = [...this.position.toArray(), ...this.rotation.toArray()];
    const b = [...other.position.toArray(), ...other.rotation.toArray()];
    return a.every((value, i) => Math.abs(value - b[i]) <= epsilon);
  }
}
