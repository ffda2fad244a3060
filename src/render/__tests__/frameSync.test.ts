import { describe, it, expect } from 'vitest';
import { FOCUSED_POLL_MS, UNFOCUSED_POLL_MS, isAnimating, renderCadence, takeSnapshot } from '@/render/frameSync';
import { createParameterStore } from '@/state/parameterStore';
import { DEFAULT_ANIMATION } from '@/state/ranges';

describe('takeSnapshot', () => {
  it('freezes the snapshot and its nested values', () => {
    const store = createParameterStore();
    const snap = takeSnapshot(store.getState().params, { width: 640, height: 480 });
    expect(Object.isFrozen(snap)).toBe(true);
    expect(Object.isFrozen(snap.orientation)).toBe(true);
    expect(Object.isFrozen(snap.juliaConstant)).toBe(true);
    expect(snap.resolution).toEqual({ width: 640, height: 480 });
  });

  it('is unaffected by later store writes', () => {
    const store = createParameterStore();
    const snap = takeSnapshot(store.getState().params, { width: 1, height: 1 });
    store.getState().setPower(3);
    store.getState().setJuliaConstant([0.1, 0.2, 0.3]);
    expect(snap.power).toBe(8);
    expect(snap.juliaConstant).toEqual([0.35, 0.35, -0.35]);
  });
});

describe('renderCadence', () => {
  const still = { ...DEFAULT_ANIMATION, rotationSpeed: 0 };

  it('renders continuously while anything animates', () => {
    expect(isAnimating(DEFAULT_ANIMATION)).toBe(true);
    expect(renderCadence(DEFAULT_ANIMATION, false)).toEqual({ mode: 'continuous' });
    expect(renderCadence({ ...still, animatePower: true }, true)).toEqual({ mode: 'continuous' });
    expect(renderCadence({ ...still, animateZoom: true }, true)).toEqual({ mode: 'continuous' });
  });

  it('waits on events otherwise, longer when unfocused', () => {
    expect(isAnimating(still)).toBe(false);
    expect(renderCadence(still, true)).toEqual({ mode: 'reactive', waitMs: FOCUSED_POLL_MS });
    expect(renderCadence(still, false)).toEqual({ mode: 'reactive', waitMs: UNFOCUSED_POLL_MS });
    expect(UNFOCUSED_POLL_MS).toBe(1000);
  });
});
