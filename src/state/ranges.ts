// src/state/ranges.ts — parameter domains, slider labels and defaults
import { PaletteId } from './types';
import type { AnimationState, FractalParameters, NumericParam } from './types';

export interface ParamRange {
  min: number;
  max: number;
  step: number;
  label: string;
  integer?: boolean;
  logarithmic?: boolean;
}

export const PARAMETER_RANGES: Record<NumericParam, ParamRange> = {
  power: { min: 1, max: 16, step: 0.01, label: 'Power' },
  mandelIterations: { min: 1, max: 50, step: 1, label: 'Iterations', integer: true },
  rayStepCount: { min: 10, max: 300, step: 1, label: 'Ray Steps', integer: true },
  hitThreshold: { min: 0.0001, max: 0.01, step: 0.0001, label: 'Threshold', logarithmic: true },
  maxMarchDistance: { min: 10, max: 100, step: 0.5, label: 'Max Dist' },
  cameraZoom: { min: 0.1, max: 10, step: 0.01, label: 'Zoom' },
  backgroundGlowIntensity: { min: 0, max: 5, step: 0.01, label: 'Background Brightness' },
  colorScale: { min: 0.1, max: 3, step: 0.01, label: 'Color Scale' },
  colorOffset: { min: 0, max: 1, step: 0.005, label: 'Color Offset' },
  lightX: { min: -10, max: 10, step: 0.1, label: 'Light X' },
  lightY: { min: -10, max: 10, step: 0.1, label: 'Light Y' },
  aoStrength: { min: 0, max: 5, step: 0.01, label: 'Ambient Occlusion' },
  rimStrength: { min: 0, max: 2, step: 0.01, label: 'Rim Lighting' },
  paletteId: { min: PaletteId.Standard, max: PaletteId.Ice, step: 1, label: 'Color Palette', integer: true },
};

export const JULIA_RANGE = { min: -2, max: 2, step: 0.005 } as const;

export const ANIMATION_RANGES = {
  powerSpeed: { min: 0.01, max: 4, step: 0.01 },
  zoomSpeed: { min: 0.1, max: 5, step: 0.01 },
  rotationSpeed: { min: 0, max: 1, step: 0.01 },
} as const;

export const PALETTE_NAMES: Record<PaletteId, string> = {
  [PaletteId.Standard]: 'Standard',
  [PaletteId.Fire]: 'Fire (Red/Yellow)',
  [PaletteId.Neon]: 'Neon (Purple/Green)',
  [PaletteId.Ice]: 'Ice (Blue/White)',
};

export const DEFAULT_PARAMETERS: FractalParameters = {
  power: 8,
  mandelIterations: 20,
  rayStepCount: 100,
  maxMarchDistance: 40,
  hitThreshold: 0.002,
  cameraZoom: 2.5,
  orientation: { x: 0, y: 0, z: 0, w: 1 },
  juliaEnabled: false,
  juliaConstant: [0.35, 0.35, -0.35],
  paletteId: PaletteId.Standard,
  colorScale: 1,
  colorOffset: 0,
  lightX: 2,
  lightY: 4,
  backgroundGlowIntensity: 0,
  aoStrength: 1,
  rimStrength: 0.5,
};

export const DEFAULT_ANIMATION: AnimationState = {
  animatePower: false,
  powerSpeed: 1,
  animateZoom: false,
  zoomSpeed: 1,
  rotationSpeed: 0.2,
};

export function clamp(v: number, a: number, b: number) { return Math.min(b, Math.max(a, v)); }

export function isPaletteId(v: number): v is PaletteId {
  return v === PaletteId.Standard || v === PaletteId.Fire || v === PaletteId.Neon || v === PaletteId.Ice;
}

/** Clamps a raw value into the field's domain; returns `fallback` for non-finite input. */
export function clampParam(key: NumericParam, value: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  const r = PARAMETER_RANGES[key];
  const v = r.integer ? Math.round(value) : value;
  return clamp(v, r.min, r.max);
}
