import { describe, it, expect } from 'vitest';
import { InputController, dragRotation } from '@/control/inputController';
import { createParameterStore } from '@/state/parameterStore';

describe('InputController', () => {
  it('ignores motion without an active drag', () => {
    const store = createParameterStore();
    const input = new InputController();
    expect(input.pointerMoved(40, 10)).toBe(false);
    expect(input.flush(store)).toBe(false);
    expect(store.getState().params.orientation).toEqual({ x: 0, y: 0, z: 0, w: 1 });
  });

  it('ignores motion while the control panel captures the pointer', () => {
    const input = new InputController();
    input.setDragActive(true);
    input.setUiCapturing(true);
    expect(input.isDragging).toBe(false);
    expect(input.pointerMoved(40, 10)).toBe(false);
  });

  it('ends a drag when the panel takes the pointer', () => {
    const input = new InputController();
    input.setDragActive(true);
    input.setUiCapturing(true);
    input.setUiCapturing(false);
    expect(input.isDragging).toBe(false);
  });

  it('yaws on horizontal drag', () => {
    const store = createParameterStore();
    const input = new InputController();
    input.setDragActive(true);
    expect(input.pointerMoved(100, 0)).toBe(true);
    expect(input.flush(store)).toBe(true);
    const q = store.getState().params.orientation;
    expect(q.y).toBeCloseTo(Math.sin(0.25), 12);
    expect(q.w).toBeCloseTo(Math.cos(0.25), 12);
    expect(input.flush(store)).toBe(false);
  });

  it('pitches against vertical drag', () => {
    expect(dragRotation(0, 100).x).toBeCloseTo(Math.sin(-0.25), 12);
  });

  it('accumulates motion between flushes', () => {
    const store = createParameterStore();
    const input = new InputController();
    input.setDragActive(true);
    input.pointerMoved(50, 0);
    input.pointerMoved(50, 0);
    input.flush(store);
    expect(store.getState().params.orientation.y).toBeCloseTo(Math.sin(0.25), 12);
  });
});
