// ═══════════════════════════════════════════════════════════════════
// CATMULL-ROM - uniform cubic basis
//
// For the window (p0, p1, p2, p3) the segment from p1 to p2 is
//   P(t) = point + tangent·t + second·t² + third·t³
// with t in [0, 1].
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';

export interface CatmullRomTerms {
  /** p1 */
  point: THREE.Vector3;
  /** 0.5·(p2 - p0) */
  tangent: THREE.Vector3;
  /** p0 - 2.5·p1 + 2·p2 - 0.5·p3 */
  second: THREE.Vector3;
  /** 1.5·(p1 - p2) + 0.5·(p3 - p0) */
  third: THREE.Vector3;
}

export function catmullRom(
  p0: THREE.Vector3, p1: THREE.Vector3, p2: THREE.Vector3, p3: THREE.Vector3,
): CatmullRomTerms {
  return {
    point: p1.clone(),
    tangent: new THREE.Vector3().subVectors(p2, p0).multiplyScalar(0.5),
    second: p0.clone()
      .addScaledVector(p1, -2.5)
      .addScaledVector(p2, 2)
      .addScaledVector(p3, -0.5),
    third: new THREE.Vector3().subVectors(p1, p2).multiplyScalar(1.5)
      .addScaledVector(p3, 0.5)
      .addScaledVector(p0, -0.5),
  };
}

export function positionAt(terms: CatmullRomTerms, t: number, out = new THREE.Vector3()): THREE.Vector3 {
  return out.copy(terms.point)
    .addScaledVector(terms.tangent, t)
    .addScaledVector(terms.second, t * t)
    .addScaledVector(terms.third, t * t * t);
}

/** dP/dt, the direction of travel at t */
export function derivativeAt(terms: CatmullRomTerms, t: number, out = new THREE.Vector3()): THREE.Vector3 {
  return out.copy(terms.tangent)
    .addScaledVector(terms.second, 2 * t)
    .addScaledVector(terms.third, 3 * t * t);
}

/**
 * Indices of the 4-point window for the segment starting at `segment`.
 * Out-of-range neighbours clamp to the end points, so the first and last
 * segments reuse their end point as its own neighbour.
 */
export function windowIndices(segment: number, count: number): [number, number, number, number] {
  const last = count - 1;
  return [
    Math.max(segment - 1, 0),
    segment,
    Math.min(segment + 1, last),
    Math.min(segment + 2, last),
  ];
}
