// src/state/types.ts — shared TypeScript types for parameters, animation and frames
export type Vec3 = [number, number, number];
export type RGB = [number, number, number];

export interface Quat {
  x: number;
  y: number;
  z: number;
  w: number;
}

export enum PaletteId {
  Standard = 0,
  Fire = 1,
  Neon = 2,
  Ice = 3,
}

export interface FractalParameters {
  power: number;            // 1..16
  mandelIterations: number; // 1..50
  rayStepCount: number;     // 10..300
  maxMarchDistance: number; // 10..100
  hitThreshold: number;     // 0.0001..0.01
  cameraZoom: number;       // 0.1..10
  orientation: Quat;
  juliaEnabled: boolean;
  juliaConstant: Vec3;
  paletteId: PaletteId;
  colorScale: number;  // 0.1..3
  colorOffset: number; // 0..1
  lightX: number;      // -10..10
  lightY: number;      // -10..10
  backgroundGlowIntensity: number;
  aoStrength: number;
  rimStrength: number;
}

export type NumericParam = {
  [K in keyof FractalParameters]: FractalParameters[K] extends number ? K : never
}[keyof FractalParameters];

export interface AnimationState {
  animatePower: boolean;
  powerSpeed: number;    // 0.01..4
  animateZoom: boolean;
  zoomSpeed: number;     // 0.1..5
  rotationSpeed: number; // 0..1, radians per second
}

export interface Resolution {
  width: number;
  height: number;
}

export type FrameSnapshot = Readonly<
  Omit<FractalParameters, 'orientation' | 'juliaConstant'> & {
    orientation: Readonly<Quat>;
    juliaConstant: Readonly<Vec3>;
    resolution: Readonly<Resolution>;
  }
>;

/** Per-ray outcome of sphere tracing. Reused between pixels by the CPU pipeline. */
export interface MarchResult {
  hit: boolean;
  point: Vec3;
  normal: Vec3;
  steps: number;
  distance: number;
  trap: number;
}
