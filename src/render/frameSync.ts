// src/render/frameSync.ts — per-frame snapshots and render cadence
import type { AnimationState, FractalParameters, FrameSnapshot, Resolution } from '@/state/types';

export const FOCUSED_POLL_MS = 1000 / 60;
export const UNFOCUSED_POLL_MS = 1000;

export type RenderCadence =
  | { mode: 'continuous' }
  | { mode: 'reactive'; waitMs: number };

/** Immutable copy of the live parameters; the pixel stage only ever sees this. */
export function takeSnapshot(params: FractalParameters, resolution: Resolution): FrameSnapshot {
  return Object.freeze({
    ...params,
    orientation: Object.freeze({ ...params.orientation }),
    juliaConstant: Object.freeze([params.juliaConstant[0], params.juliaConstant[1], params.juliaConstant[2]] as const),
    resolution: Object.freeze({ width: resolution.width, height: resolution.height }),
  });
}

export function isAnimating(animation: AnimationState): boolean {
  return animation.animatePower || animation.animateZoom || animation.rotationSpeed > 0;
}

export function renderCadence(animation: AnimationState, focused: boolean): RenderCadence {
  if (isAnimating(animation)) return { mode: 'continuous' };
  return { mode: 'reactive', waitMs: focused ? FOCUSED_POLL_MS : UNFOCUSED_POLL_MS };
}
