// ═══════════════════════════════════════════════════════════════════
// SPLINE - Catmull-Rom curve through oriented control points
//
// Two ways to walk the curve:
//   pointAtParametricAlpha  alpha split evenly across segments; speed
//                           varies with control-point spacing
//   pointAtArcLengthAlpha   alpha remapped through the arc-length table
//                           so equal steps cover roughly equal distance
//
// Alignment decides the rotation of each result: Track faces along the
// curve's derivative, Nodes blends the control points' own rotations.
//
// USAGE:
//   const spline = new Spline([a, b, c, d]);
//   const pose = spline.pointAtArcLengthAlpha(0.25, SplineAlignment.NODES);
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import {
  ARC_LENGTH_STEPS, DEFAULT_SEGMENTS_PER_CURVE, MIN_ARC_LENGTH_POINTS, MIN_TANGENT_LENGTH,
} from '../constants.js';
import { Pose } from '../math/Pose.js';
import { lookAtRotation, smoothstep } from '../math/Orientation.js';
import { catmullRom, derivativeAt, positionAt, windowIndices } from './CatmullRom.js';
import type { CatmullRomTerms } from './CatmullRom.js';

export enum SplineAlignment {
  /** Face along the curve */
  TRACK = 'Track',
  /** Ease between the control points' rotations */
  NODES = 'Nodes',
}

export interface CurveSample {
  readonly alpha: number;
  /** Track-aligned pose at `alpha` */
  readonly pose: Pose;
  /** Segment the sample falls in (segment i runs from control point i to i + 1) */
  readonly segment: number;
  /** Distance from the previous sample, 0 for the first */
  readonly span: number;
}

export type DestroyingListener = () => void;

export class Spline {
  private points: Pose[];
  private segments: number;

  // ── Arc-length table ───────────────────────────────────────
  private distances: number[] = [];
  private normalizedDistances: number[] = [];
  private totalLength = 0;

  private samples: CurveSample[] | null = null;
  private destroyingListeners: DestroyingListener[] = [];
  private destroyed = false;

  constructor(controlPoints: readonly Pose[], segmentsPerCurve = DEFAULT_SEGMENTS_PER_CURVE) {
    this.points = copyControlPoints(controlPoints);
    this.segments = checkSegments(segmentsPerCurve);
    this.rebuild();
  }

  // ── Properties ─────────────────────────────────────────────

  get controlPoints(): Pose[] {
    return this.points.map((point) => point.clone());
  }

  set controlPoints(points: readonly Pose[]) {
    this.assertAlive();
    this.points = copyControlPoints(points);
    this.rebuild();
  }

  get segmentsPerCurve(): number {
    return this.segments;
  }

  set segmentsPerCurve(value: number) {
    this.assertAlive();
    this.segments = checkSegments(value);
    this.rebuild();
  }

  /** Cumulative length at the end of each segment */
  get distancePoints(): readonly number[] {
    return [...this.distances];
  }

  /** distancePoints divided by the total length; the last entry is 1 */
  get normalizedDistancePoints(): readonly number[] {
    return [...this.normalizedDistances];
  }

  /** Approximate curve length, 0 when no table is built */
  get length(): number {
    return this.totalLength;
  }

  get hasArcLengthTable(): boolean {
    return this.normalizedDistances.length > 0;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  // ── Queries ────────────────────────────────────────────────

  pointAtParametricAlpha(alpha: number, alignment = SplineAlignment.TRACK): Pose {
    this.assertAlive();
    const count = this.points.length;
    if (alpha === 1) return this.points[count - 1].clone();

    const scaled = (count - 1) * alpha;
    const segment = THREE.MathUtils.clamp(Math.floor(scaled), 0, Math.max(count - 2, 0));
    return this.evaluate(segment, scaled - segment, alignment);
  }

  pointAtArcLengthAlpha(alpha: number, alignment = SplineAlignment.TRACK): Pose {
    this.assertAlive();
    if (!this.hasArcLengthTable) {
      throw new Error(
        `[Spline] Arc-length queries need at least ${MIN_ARC_LENGTH_POINTS} control points, got ${this.points.length}`,
      );
    }
    if (this.totalLength === 0) return this.points[0].clone();

    const table = this.normalizedDistances;
    let segment = table.findIndex((distance) => distance >= alpha);
    if (segment === -1) segment = table.length - 1;

    const previous = segment > 0 ? table[segment - 1] : 0;
    const span = table[segment] - previous;
    const t = span > 0 ? (alpha - previous) / span : 0;
    return this.evaluate(segment, t, alignment);
  }

  /**
   * Evenly spaced parametric samples (segmentsPerCurve per control point),
   * the polyline used to draw or debug the curve. Cached until the
   * control points or resolution change.
   */
  getCurveSamples(): readonly CurveSample[] {
    this.assertAlive();
    if (this.samples) return this.samples;

    const count = this.points.length;
    const total = this.segments * count;
    const samples: CurveSample[] = [];
    let previous: THREE.Vector3 | null = null;

    for (let i = 0; i <= total; i++) {
      const alpha = i / total;
      const pose = this.pointAtParametricAlpha(alpha);
      const segment = Math.min(Math.floor((count - 1) * alpha), Math.max(count - 2, 0));
      const span = previous ? pose.position.distanceTo(previous) : 0;
      samples.push({ alpha, pose, segment, span });
      previous = pose.position;
    }

    this.samples = samples;
    return samples;
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /** Subscribe to the one-time destroying notification */
  onDestroying(listener: DestroyingListener): () => void {
    this.destroyingListeners.push(listener);
    return () => {
      const idx = this.destroyingListeners.indexOf(listener);
      if (idx >= 0) this.destroyingListeners.splice(idx, 1);
    };
  }

  destroy(): void {
    if (this.destroyed) return;
    for (const listener of [...this.destroyingListeners]) listener();
    this.destroyed = true;
    this.destroyingListeners = [];
    this.samples = null;
  }

  // ── Internals ──────────────────────────────────────────────

  private termsAt(segment: number): CatmullRomTerms {
    const [i0, i1, i2, i3] = windowIndices(segment, this.points.length);
    return catmullRom(
      this.points[i0].position, this.points[i1].position,
      this.points[i2].position, this.points[i3].position,
    );
  }

  private evaluate(segment: number, t: number, alignment: SplineAlignment): Pose {
    const terms = this.termsAt(segment);
    const position = positionAt(terms, t);

    if (alignment === SplineAlignment.TRACK) {
      const direction = derivativeAt(terms, t);
      // A stalled curve has no direction to face; fall through to Nodes.
      if (direction.length() > MIN_TANGENT_LENGTH) {
        return new Pose(position, lookAtRotation(position, position.clone().add(direction)));
      }
    }

    const from = this.points[segment].rotation;
    const to = this.points[Math.min(segment + 1, this.points.length - 1)].rotation;
    return new Pose(position, new THREE.Quaternion().slerpQuaternions(from, to, smoothstep(t)));
  }

  /** Rebuilds the arc-length table; fewer than 3 points leave it empty */
  private rebuild(): void {
    this.samples = null;
    this.distances = [];
    this.normalizedDistances = [];
    this.totalLength = 0;

    const count = this.points.length;
    if (count < MIN_ARC_LENGTH_POINTS) return;

    const current = new THREE.Vector3();
    const last = new THREE.Vector3();
    for (let segment = 0; segment < count - 1; segment++) {
      const terms = this.termsAt(segment);
      last.copy(this.points[segment].position);
      let length = 0;
      for (let step = 1; step <= ARC_LENGTH_STEPS; step++) {
        positionAt(terms, step / ARC_LENGTH_STEPS, current);
        length += current.distanceTo(last);
        last.copy(current);
      }
      this.totalLength += length;
      this.distances.push(this.totalLength);
    }

    const total = this.totalLength;
    this.normalizedDistances = this.distances.map((distance) => (total > 0 ? distance / total : 0));
  }

  private assertAlive(): void {
    if (this.destroyed) throw new Error('[Spline] Spline has been destroyed');
  }
}

function copyControlPoints(points: readonly Pose[]): Pose[] {
  if (points.length === 0) throw new Error('[Spline] At least one control point is required');
  return points.map((point, i) => {
    if (!(point instanceof Pose)) throw new TypeError(`[Spline] Control point ${i} is not a Pose`);
    return point.clone();
  });
}

function checkSegments(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`[Spline] segmentsPerCurve must be a positive integer, got ${value}`);
  }
  return value;
}
