import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { catmullRom, derivativeAt, positionAt, windowIndices } from './CatmullRom.js';

const x = (value: number): THREE.Vector3 => new THREE.Vector3(value, 0, 0);

describe('catmullRom', () => {
  it('builds the cubic terms of a window', () => {
    const terms = catmullRom(x(0), x(0), x(10), x(20));
    expect(terms.point.x).toBe(0);
    expect(terms.tangent.x).toBe(5);
    expect(terms.second.x).toBe(10);
    expect(terms.third.x).toBe(-5);
  });

  it('passes through the inner control points', () => {
    const terms = catmullRom(x(0), x(0), x(10), x(20));
    expect(positionAt(terms, 0).x).toBe(0);
    expect(positionAt(terms, 1).x).toBe(10);
    expect(positionAt(terms, 0.5).x).toBe(4.375);
  });

  it('is linear through evenly spaced points', () => {
    const terms = catmullRom(x(0), x(10), x(20), x(30));
    expect(positionAt(terms, 0.25).x).toBe(12.5);
    expect(derivativeAt(terms, 0.7).x).toBe(10);
  });

  it('differentiates the cubic', () => {
    const terms = catmullRom(x(0), x(0), x(10), x(20));
    expect(derivativeAt(terms, 0).x).toBe(5);
    expect(derivativeAt(terms, 1).x).toBe(10);
  });

  it('writes into an output vector when given one', () => {
    const terms = catmullRom(x(0), x(10), x(20), x(30));
    const out = new THREE.Vector3();
    expect(positionAt(terms, 0, out)).toBe(out);
  });
});

describe('windowIndices', () => {
  it('clamps neighbours at both ends', () => {
    expect(windowIndices(0, 4)).toEqual([0, 0, 1, 2]);
    expect(windowIndices(1, 4)).toEqual([0, 1, 2, 3]);
    expect(windowIndices(2, 4)).toEqual([1, 2, 3, 3]);
    expect(windowIndices(0, 2)).toEqual([0, 0, 1, 1]);
    expect(windowIndices(0, 1)).toEqual([0, 0, 0, 0]);
  });
});
