import { describe, it, expect } from 'vitest';
import { Vector3 } from 'three';
import { IDENTITY, fromQuaternion, length, multiply, normalize, rotationX, rotationY, toQuaternion } from '@/math/quat';
import { rotateVec3 } from '@/core/camera';

describe('quat', () => {
  it('treats identity as neutral', () => {
    const q = rotationY(0.7);
    expect(multiply(IDENTITY, q)).toEqual(q);
    expect(rotateVec3(IDENTITY, [1, 2, 3])).toEqual([1, 2, 3]);
  });

  it('converts to and from three without loss', () => {
    const q = { x: 0.1, y: -0.2, z: 0.3, w: 0.9 };
    expect(fromQuaternion(toQuaternion(q))).toEqual(q);
  });

  it('rotates +z toward +x under a positive yaw', () => {
    const v = rotateVec3(rotationY(Math.PI / 2), [0, 0, 1]);
    expect(v[0]).toBeCloseTo(1, 12);
    expect(v[1]).toBeCloseTo(0, 12);
    expect(v[2]).toBeCloseTo(0, 12);
  });

  it('rotates +y toward +z under a positive pitch', () => {
    const v = rotateVec3(rotationX(Math.PI / 2), [0, 1, 0]);
    expect(v[1]).toBeCloseTo(0, 12);
    expect(v[2]).toBeCloseTo(1, 12);
  });

  it('agrees with three when rotating per pixel', () => {
    const q = multiply(rotationY(0.7), rotationX(-0.3));
    const expected = new Vector3(0.2, -1, 3).applyQuaternion(toQuaternion(q));
    const v = rotateVec3(q, [0.2, -1, 3]);
    expect(v[0]).toBeCloseTo(expected.x, 12);
    expect(v[1]).toBeCloseTo(expected.y, 12);
    expect(v[2]).toBeCloseTo(expected.z, 12);
  });

  it('normalizes and falls back to identity for degenerate input', () => {
    expect(length(normalize({ x: 1, y: 2, z: 3, w: 4 }))).toBeCloseTo(1, 12);
    expect(normalize({ x: 0, y: 0, z: 0, w: 0 })).toEqual(IDENTITY);
    expect(normalize({ x: Number.NaN, y: 0, z: 0, w: 1 })).toEqual(IDENTITY);
  });
});
