import { describe, it, expect, vi } from 'vitest';
import * as THREE from 'three';
import { Spline, SplineAlignment } from './Spline.js';
import { Pose } from '../math/Pose.js';

const DEG = Math.PI / 180;

function line(...xs: number[]): Pose[] {
  return xs.map((x) => Pose.fromPosition(x, 0, 0));
}

function expectVector(actual: THREE.Vector3, x: number, y: number, z: number, digits = 9): void {
  expect(actual.x).toBeCloseTo(x, digits);
  expect(actual.y).toBeCloseTo(y, digits);
  expect(actual.z).toBeCloseTo(z, digits);
}

describe('Spline', () => {
  describe('construction', () => {
    it('requires at least one Pose', () => {
      expect(() => new Spline([])).toThrow('[Spline] At least one control point is required');
    });

    it('requires a positive integer resolution', () => {
      expect(() => new Spline(line(0, 1), 0)).toThrow(RangeError);
      expect(() => new Spline(line(0, 1), 1.5)).toThrow(
        '[Spline] segmentsPerCurve must be a positive integer, got 1.5',
      );
    });

    it('copies its control points', () => {
      const points = line(0, 10, 20);
      const spline = new Spline(points);
      points[0].position.x = 99;
      spline.controlPoints[1].position.x = 99;
      expect(spline.controlPoints.map((p) => p.position.x)).toEqual([0, 10, 20]);
    });
  });

  describe('pointAtParametricAlpha', () => {
    it('follows evenly spaced points linearly and faces along them', () => {
      const spline = new Spline(line(0, 10, 20, 30));
      const pose = spline.pointAtParametricAlpha(0.5, SplineAlignment.TRACK);
      expectVector(pose.position, 15, 0, 0);
      expectVector(pose.lookVector, 1, 0, 0);
    });

    it('returns the last control point exactly at alpha 1', () => {
      const last = Pose.fromOrientation(new THREE.Vector3(30, 5, -2), 0.3, 1.2, -0.4);
      const spline = new Spline([...line(0, 10), last]);
      for (const alignment of [SplineAlignment.TRACK, SplineAlignment.NODES]) {
        const pose = spline.pointAtParametricAlpha(1, alignment);
        expect(pose.equals(last)).toBe(true);
        expect(pose).not.toBe(last);
      }
    });

    it('starts on the first control point', () => {
      const spline = new Spline(line(0, 10, 20, 30));
      expect(spline.pointAtParametricAlpha(0).position.x).toBe(0);
    });

    it('faces along the tangent at a corner', () => {
      const spline = new Spline([
        Pose.fromPosition(0, 0, 0), Pose.fromPosition(10, 0, 0), Pose.fromPosition(10, 0, -10),
      ]);
      const pose = spline.pointAtParametricAlpha(0.5, SplineAlignment.TRACK);
      expectVector(pose.position, 10, 0, 0);
      expectVector(pose.lookVector, Math.SQRT1_2, 0, -Math.SQRT1_2);
    });

    it('eases between control point rotations with Nodes', () => {
      const spline = new Spline([
        Pose.fromOrientation(new THREE.Vector3(0, 0, 0), 0, 0, 0),
        Pose.fromOrientation(new THREE.Vector3(10, 0, 0), 0, 90 * DEG, 0),
        Pose.fromOrientation(new THREE.Vector3(20, 0, 0), 0, 0, 0),
      ]);
      const half = spline.pointAtParametricAlpha(0.25, SplineAlignment.NODES);
      expect(half.toOrientation()[1]).toBeCloseTo(45 * DEG, 9);

      const quarter = spline.pointAtParametricAlpha(0.125, SplineAlignment.NODES);
      expect(quarter.toOrientation()[1]).toBeCloseTo(90 * DEG * 0.15625, 9);
    });

    it('interpolates between two points', () => {
      const spline = new Spline(line(0, 10));
      expectVector(spline.pointAtParametricAlpha(0.5).position, 5, 0, 0);
    });

    it('falls back to the control rotation where the curve has no direction', () => {
      const only = Pose.fromOrientation(new THREE.Vector3(1, 2, 3), 0.2, 0.4, 0);
      const spline = new Spline([only]);
      const pose = spline.pointAtParametricAlpha(0.3, SplineAlignment.TRACK);
      expect(pose.equals(only, 1e-12)).toBe(true);
    });
  });

  describe('arc length', () => {
    it('builds a cumulative table ending at exactly 1', () => {
      const spline = new Spline([
        Pose.fromPosition(0, 0, 0), Pose.fromPosition(10, 0, 0),
        Pose.fromPosition(10, 10, 0), Pose.fromPosition(0, 10, 5),
      ]);
      const table = spline.normalizedDistancePoints;
      expect(table).toHaveLength(3);
      expect(table[0]).toBeGreaterThan(0);
      expect(table[1]).toBeGreaterThan(table[0]);
      expect(table[2]).toBeGreaterThan(table[1]);
      expect(table[2]).toBe(1);
      expect(spline.distancePoints[2]).toBe(spline.length);
    });

    it('measures evenly spaced points as equal segments', () => {
      const spline = new Spline(line(0, 10, 20, 30));
      expect(spline.length).toBeCloseTo(30, 9);
      const [first, second] = spline.normalizedDistancePoints;
      expect(first).toBeCloseTo(1 / 3, 9);
      expect(second).toBeCloseTo(2 / 3, 9);
    });

    it('maps alpha onto segments by length', () => {
      const spline = new Spline(line(0, 10, 20, 30));
      expectVector(spline.pointAtArcLengthAlpha(0.5).position, 15, 0, 0, 6);
      expectVector(spline.pointAtArcLengthAlpha(1 / 6).position, 4.375, 0, 0, 6);
      expectVector(spline.pointAtArcLengthAlpha(1).position, 30, 0, 0, 6);
    });

    it('eases control point rotations by arc length with Nodes', () => {
      const spline = new Spline([
        Pose.fromOrientation(new THREE.Vector3(0, 0, 0), 0, 0, 0),
        Pose.fromOrientation(new THREE.Vector3(10, 0, 0), 0, 90 * DEG, 0),
        Pose.fromOrientation(new THREE.Vector3(20, 0, 0), 0, 0, 0),
      ]);
      const [first] = spline.normalizedDistancePoints;
      expect(first).toBeCloseTo(0.5, 9);

      const pose = spline.pointAtArcLengthAlpha(0.25, SplineAlignment.NODES);
      expectVector(pose.position, 4.375, 0, 0, 6);
      expect(pose.toOrientation()[1]).toBeCloseTo(45 * DEG, 6);
    });

    it('needs at least three control points', () => {
      const spline = new Spline(line(0, 10));
      expect(spline.hasArcLengthTable).toBe(false);
      expect(spline.normalizedDistancePoints).toEqual([]);
      expect(() => spline.pointAtArcLengthAlpha(0.5)).toThrow(
        '[Spline] Arc-length queries need at least 3 control points, got 2',
      );
    });

    it('returns the first point of a zero-length spline', () => {
      const first = Pose.fromOrientation(new THREE.Vector3(1, 2, 3), 0, 0.5, 0);
      const spline = new Spline([first, first.clone(), first.clone()]);
      expect(spline.length).toBe(0);
      expect(spline.pointAtArcLengthAlpha(0.7).equals(first)).toBe(true);
    });

    it('rebuilds when the control points change', () => {
      const spline = new Spline(line(0, 10, 20, 30));
      spline.controlPoints = line(0, 10, 20);
      expect(spline.distancePoints).toHaveLength(2);
      expect(spline.length).toBeCloseTo(20, 9);
    });
  });

  describe('getCurveSamples', () => {
    it('samples segmentsPerCurve points per control point', () => {
      const points = line(0, 10, 20, 30);
      const spline = new Spline(points, 10);
      const samples = spline.getCurveSamples();

      expect(samples).toHaveLength(41);
      expect(samples[0].alpha).toBe(0);
      expect(samples[0].span).toBe(0);
      expect(samples[20].segment).toBe(1);
      expect(samples[40].pose.equals(points[3])).toBe(true);
      expect(samples.reduce((sum, sample) => sum + sample.span, 0)).toBeCloseTo(30, 9);
      expect(spline.getCurveSamples()).toBe(samples);
    });

    it('resamples after the resolution changes', () => {
      const spline = new Spline(line(0, 10, 20, 30), 10);
      spline.getCurveSamples();
      spline.segmentsPerCurve = 2;
      expect(spline.getCurveSamples()).toHaveLength(9);
    });
  });

  describe('destroy', () => {
    it('notifies listeners once and refuses further use', () => {
      const spline = new Spline(line(0, 10, 20));
      const listener = vi.fn();
      const removed = vi.fn();
      spline.onDestroying(listener);
      const unsubscribe = spline.onDestroying(removed);
      unsubscribe();

      spline.destroy();
      spline.destroy();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(removed).not.toHaveBeenCalled();
      expect(spline.isDestroyed).toBe(true);
      expect(() => spline.pointAtParametricAlpha(0.5)).toThrow('[Spline] Spline has been destroyed');
      expect(() => spline.getCurveSamples()).toThrow('[Spline] Spline has been destroyed');
      expect(() => { spline.segmentsPerCurve = 4; }).toThrow('[Spline] Spline has been destroyed');
    });
  });
});
