// src/control/animationDriver.ts — time-driven power, zoom and rotation overrides
import { multiply, rotationX, rotationY } from '@/math/quat';
import type { AnimationOverrides, ParameterStore } from '@/state/parameterStore';
import type { AnimationState } from '@/state/types';

export const MAX_ANIMATED_POWER = 16;
// slows the power sweep so a full 1 → 16 → 1 cycle takes about a minute at speed 1
export const POWER_TIME_SCALE = 0.1;
export const ZOOM_CENTER = 2.75;
export const ZOOM_AMPLITUDE = 0.25;

/**
 * Power follows 16^s for s in [0, 1]: the shape's complexity grows
 * exponentially with the exponent, so this spends equal time per visual change.
 */
export function animatedPower(t: number, powerSpeed: number): number {
  const s = 0.5 + 0.5 * Math.sin(t * POWER_TIME_SCALE * powerSpeed);
  return Math.pow(MAX_ANIMATED_POWER, s);
}

export function animatedZoom(t: number, zoomSpeed: number): number {
  return ZOOM_CENTER + ZOOM_AMPLITUDE * Math.sin(t * zoomSpeed);
}

/** Incremental spin for one tick: yaw about +Y, then pitch about +X, by the same angle. */
export function spinDelta(rotationSpeed: number, dt: number) {
  const angle = rotationSpeed * dt;
  return multiply(rotationY(angle), rotationX(angle));
}

export function computeOverrides(t: number, dt: number, animation: AnimationState): AnimationOverrides {
  const o: AnimationOverrides = {};
  if (animation.animatePower) o.power = animatedPower(t, animation.powerSpeed);
  if (animation.animateZoom) o.cameraZoom = animatedZoom(t, animation.zoomSpeed);
  if (animation.rotationSpeed > 0 && dt > 0) o.rotation = spinDelta(animation.rotationSpeed, dt);
  return o;
}

/** Writes this tick's overrides into the store. `t` and `dt` are in seconds. */
export function applyAnimation(store: ParameterStore, t: number, dt: number): AnimationOverrides {
  const o = computeOverrides(t, dt, store.getState().animation);
  store.getState().applyOverrides(o);
  return o;
}
