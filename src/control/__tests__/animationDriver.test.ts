import { describe, it, expect } from 'vitest';
import { animatedPower, animatedZoom, applyAnimation, computeOverrides, spinDelta } from '@/control/animationDriver';
import { length, multiply, rotationX, rotationY } from '@/math/quat';
import { createParameterStore } from '@/state/parameterStore';
import { DEFAULT_ANIMATION } from '@/state/ranges';

describe('animation curves', () => {
  it('sweeps power between 1 and 16', () => {
    expect(animatedPower(0, 1)).toBe(4);
    expect(animatedPower(5 * Math.PI, 1)).toBeCloseTo(16, 9);
    expect(animatedPower(15 * Math.PI, 1)).toBeCloseTo(1, 9);
    for (let t = 0; t < 200; t += 0.7) {
      const p = animatedPower(t, 2.5);
      expect(p).toBeGreaterThanOrEqual(1);
      expect(p).toBeLessThanOrEqual(16);
    }
  });

  it('oscillates zoom around 2.75', () => {
    expect(animatedZoom(0, 1)).toBe(2.75);
    expect(animatedZoom(Math.PI / 2, 1)).toBeCloseTo(3, 12);
    expect(animatedZoom(Math.PI / 4, 2)).toBeCloseTo(3, 12);
  });

  it('spins by yaw then pitch of the same angle', () => {
    const q = spinDelta(0.5, 0.1);
    const expected = multiply(rotationY(0.05), rotationX(0.05));
    expect(q).toEqual(expected);
  });
});

describe('computeOverrides', () => {
  it('returns nothing when every animation is off', () => {
    expect(computeOverrides(3, 0.016, { ...DEFAULT_ANIMATION, rotationSpeed: 0 })).toEqual({});
  });

  it('skips rotation on a zero time step', () => {
    expect(computeOverrides(3, 0, DEFAULT_ANIMATION).rotation).toBeUndefined();
  });

  it('drives only the enabled fields', () => {
    const o = computeOverrides(0, 0.1, { ...DEFAULT_ANIMATION, animateZoom: true });
    expect(o.power).toBeUndefined();
    expect(o.cameraZoom).toBe(2.75);
    expect(o.rotation).toEqual(spinDelta(0.2, 0.1));
  });
});

describe('applyAnimation', () => {
  it('overrides manual edits of animated fields', () => {
    const store = createParameterStore({ animation: { animatePower: true, rotationSpeed: 0 } });
    store.getState().setPower(3);
    applyAnimation(store, 0, 0.016);
    expect(store.getState().params.power).toBe(4);
  });

  it('keeps the orientation unit length under continuous spin', () => {
    const store = createParameterStore({ animation: { rotationSpeed: 1 } });
    for (let i = 0; i < 2000; i++) applyAnimation(store, i / 60, 1 / 60);
    expect(Math.abs(length(store.getState().params.orientation) - 1)).toBeLessThan(1e-9);
  });
});
