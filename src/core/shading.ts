// src/core/shading.ts — palette, occlusion, rim and point-light shading
import { paletteColor } from '@/utils/palette';
import { clamp01, dot, normalize } from '@/math/vec3';
import type { FractalParameters, MarchResult, RGB, Vec3 } from '@/state/types';

export type ShadingParameters = Pick<
  FractalParameters,
  'paletteId' | 'colorScale' | 'colorOffset' | 'backgroundGlowIntensity' | 'aoStrength' | 'rimStrength' | 'rayStepCount'
>;

export const BACKGROUND_COLOR: Readonly<RGB> = [0.08, 0.1, 0.16];
export const AMBIENT = 0.25;
export const DIFFUSE = 0.75;
export const RIM_POWER = 3;
export const RIM_COLOR: Readonly<RGB> = [1, 1, 1];

export function background(intensity: number): RGB {
  return [
    clamp01(BACKGROUND_COLOR[0] * intensity),
    clamp01(BACKGROUND_COLOR[1] * intensity),
    clamp01(BACKGROUND_COLOR[2] * intensity),
  ];
}

/** More march steps before the hit means a more occluded surface. */
export function ambientOcclusion(steps: number, rayStepCount: number, aoStrength: number): number {
  return clamp01(1 - aoStrength * (steps / Math.max(1, rayStepCount)));
}

export function rimTerm(normal: Readonly<Vec3>, view: Readonly<Vec3>, rimStrength: number): number {
  const facing = clamp01(dot(normal, view));
  return Math.pow(1 - facing, RIM_POWER) * rimStrength;
}

export function lambert(normal: Readonly<Vec3>, point: Readonly<Vec3>, light: Readonly<Vec3>): number {
  const l = normalize([light[0] - point[0], light[1] - point[1], light[2] - point[2]]);
  return Math.max(0, dot(normal, l));
}

/**
 * Final color of one ray. `direction` is the ray's unit direction and
 * `light` the world-space light position for this frame.
 */
export function shade(result: MarchResult, direction: Readonly<Vec3>, light: Readonly<Vec3>, style: ShadingParameters): RGB {
  if (!result.hit) return background(style.backgroundGlowIntensity);

  const base = paletteColor(result.trap, style.paletteId, style.colorScale, style.colorOffset);
  const ao = ambientOcclusion(result.steps, style.rayStepCount, style.aoStrength);
  const view: Vec3 = [-direction[0], -direction[1], -direction[2]];
  const rim = rimTerm(result.normal, view, style.rimStrength);
  const lit = (AMBIENT + DIFFUSE * lambert(result.normal, result.point, light)) * ao;

  return [
    clamp01(base[0] * lit + rim * RIM_COLOR[0]),
    clamp01(base[1] * lit + rim * RIM_COLOR[1]),
    clamp01(base[2] * lit + rim * RIM_COLOR[2]),
  ];
}
