// src/state/parameterStore.ts — parameter and animation store (Zustand) with clamped setters
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { fromQuaternion, normalize, toQuaternion } from '@/math/quat';
import { ANIMATION_RANGES, DEFAULT_ANIMATION, DEFAULT_PARAMETERS, JULIA_RANGE, clamp, clampParam, isPaletteId } from './ranges';
import type { AnimationState, FractalParameters, NumericParam, PaletteId, Quat, Vec3 } from './types';

/** Which frame an incremental rotation is expressed in. */
export type RotationFrame = 'local' | 'world';

export interface AnimationOverrides {
  power?: number;
  cameraZoom?: number;
  rotation?: Quat;
}

export interface FractalStoreState {
  params: FractalParameters;
  animation: AnimationState;
  setParams: (patch: Partial<FractalParameters>) => void;
  setParam: (key: ScalarParam, value: number) => void;
  setPower: (p: number) => void;
  setIterations: (n: number) => void;
  setCameraZoom: (z: number) => void;
  setPalette: (id: PaletteId) => void;
  setJuliaEnabled: (on: boolean) => void;
  setJuliaConstant: (c: Vec3) => void;
  rotate: (delta: Quat, frame: RotationFrame) => void;
  setAnimation: (patch: Partial<AnimationState>) => void;
  applyOverrides: (o: AnimationOverrides) => void;
  reset: () => void;
}

export type ParameterStore = StoreApi<FractalStoreState>;

export type ScalarParam = Exclude<NumericParam, 'paletteId'>;

export interface InitialState {
  params?: Partial<FractalParameters>;
  animation?: Partial<AnimationState>;
}

const NUMERIC_KEYS = [
  'power', 'mandelIterations', 'rayStepCount', 'maxMarchDistance', 'hitThreshold', 'cameraZoom',
  'colorScale', 'colorOffset', 'lightX', 'lightY', 'backgroundGlowIntensity', 'aoStrength', 'rimStrength',
] as const satisfies readonly ScalarParam[];

/** Fields whose manual edits are ignored while an animation drives them. */
export function animatedFields(animation: AnimationState): Set<keyof FractalParameters> {
  const locked = new Set<keyof FractalParameters>();
  if (animation.animatePower) locked.add('power');
  if (animation.animateZoom) locked.add('cameraZoom');
  return locked;
}

function clampJulia(c: Vec3, prev: Vec3): Vec3 {
  const axis = (i: 0 | 1 | 2) => Number.isFinite(c[i]) ? clamp(c[i], JULIA_RANGE.min, JULIA_RANGE.max) : prev[i];
  return [axis(0), axis(1), axis(2)];
}

/** Applies `patch` onto `prev`, clamping every field to its domain. */
export function clampParameters(prev: FractalParameters, patch: Partial<FractalParameters>): FractalParameters {
  const next: FractalParameters = { ...prev, orientation: { ...prev.orientation }, juliaConstant: [...prev.juliaConstant] };
  for (const key of NUMERIC_KEYS) {
    const v = patch[key];
    if (v !== undefined) next[key] = clampParam(key, v, prev[key]);
  }
  if (patch.paletteId !== undefined) {
    const id = clampParam('paletteId', patch.paletteId, prev.paletteId);
    if (isPaletteId(id)) next.paletteId = id;
  }
  if (patch.juliaEnabled !== undefined) next.juliaEnabled = patch.juliaEnabled;
  if (patch.juliaConstant !== undefined) next.juliaConstant = clampJulia(patch.juliaConstant, prev.juliaConstant);
  if (patch.orientation !== undefined) next.orientation = normalize(patch.orientation);
  return next;
}

export function clampAnimation(prev: AnimationState, patch: Partial<AnimationState>): AnimationState {
  const next = { ...prev, ...patch };
  const speed = (k: keyof typeof ANIMATION_RANGES) => {
    const v = next[k];
    return Number.isFinite(v) ? clamp(v, ANIMATION_RANGES[k].min, ANIMATION_RANGES[k].max) : prev[k];
  };
  next.powerSpeed = speed('powerSpeed');
  next.zoomSpeed = speed('zoomSpeed');
  next.rotationSpeed = speed('rotationSpeed');
  return next;
}

function withoutLocked(patch: Partial<FractalParameters>, animation: AnimationState): Partial<FractalParameters> {
  const locked = animatedFields(animation);
  if (!locked.size) return patch;
  const out: Partial<FractalParameters> = { ...patch };
  for (const k of locked) delete out[k];
  return out;
}

export function createParameterStore(initial: InitialState = {}): ParameterStore {
  const startParams = () => clampParameters(DEFAULT_PARAMETERS, initial.params ?? {});
  const startAnimation = () => clampAnimation(DEFAULT_ANIMATION, initial.animation ?? {});

  return createStore<FractalStoreState>()((set, get) => ({
    params: startParams(),
    animation: startAnimation(),
    setParams(patch) {
      const { params, animation } = get();
      set({ params: clampParameters(params, withoutLocked(patch, animation)) });
    },
    setParam(key, value) {
      const patch: Partial<FractalParameters> = {};
      patch[key] = value;
      get().setParams(patch);
    },
    setPower(p) { get().setParams({ power: p }); },
    setIterations(n) { get().setParams({ mandelIterations: n }); },
    setCameraZoom(z) { get().setParams({ cameraZoom: z }); },
    setPalette(id) { get().setParams({ paletteId: id }); },
    setJuliaEnabled(on) { get().setParams({ juliaEnabled: on }); },
    setJuliaConstant(c) { get().setParams({ juliaConstant: c }); },
    rotate(delta, frame) {
      const q = toQuaternion(get().params.orientation);
      const d = toQuaternion(delta);
      const composed = fromQuaternion(frame === 'local' ? q.multiply(d) : q.premultiply(d));
      set(state => ({ params: { ...state.params, orientation: normalize(composed) } }));
    },
    setAnimation(patch) { set(state => ({ animation: clampAnimation(state.animation, patch) })); },
    applyOverrides(o) {
      const patch: Partial<FractalParameters> = {};
      if (o.power !== undefined) patch.power = o.power;
      if (o.cameraZoom !== undefined) patch.cameraZoom = o.cameraZoom;
      if (patch.power !== undefined || patch.cameraZoom !== undefined) {
        set(state => ({ params: clampParameters(state.params, patch) }));
      }
      if (o.rotation) get().rotate(o.rotation, 'world');
    },
    reset() { set({ params: clampParameters(DEFAULT_PARAMETERS, {}), animation: { ...DEFAULT_ANIMATION } }); },
  }));
}
