// src/utils/urlState.ts — serialize/parse parameters and animation settings to/from the URL
import { isPaletteId } from '@/state/ranges';
import type { InitialState } from '@/state/parameterStore';
import type { AnimationState, FractalParameters } from '@/state/types';

const fmt = (v: number) => Number(v.toPrecision(6)).toString();

export function serializeState(params: FractalParameters, animation: AnimationState) {
  const p = new URLSearchParams();
  p.set('pow', fmt(params.power));
  p.set('iter', params.mandelIterations.toString());
  p.set('steps', params.rayStepCount.toString());
  p.set('dist', fmt(params.maxMarchDistance));
  p.set('eps', fmt(params.hitThreshold));
  p.set('zoom', fmt(params.cameraZoom));
  const q = params.orientation;
  p.set('rot', [q.x, q.y, q.z, q.w].map(fmt).join(','));
  p.set('pal', params.paletteId.toString());
  p.set('cs', fmt(params.colorScale));
  p.set('co', fmt(params.colorOffset));
  p.set('lx', fmt(params.lightX));
  p.set('ly', fmt(params.lightY));
  p.set('bg', fmt(params.backgroundGlowIntensity));
  p.set('ao', fmt(params.aoStrength));
  p.set('rim', fmt(params.rimStrength));
  if (params.juliaEnabled) {
    p.set('julia', params.juliaConstant.map(fmt).join(','));
  }
  p.set('spin', fmt(animation.rotationSpeed));
  if (animation.animatePower) p.set('apow', fmt(animation.powerSpeed));
  if (animation.animateZoom) p.set('azoom', fmt(animation.zoomSpeed));
  return p.toString();
}

export function pushUrlState(qs: string) {
  const url = `${location.pathname}?${qs}`;
  history.replaceState(null, '', url);
}

/**
 * Reads whatever the query string carries. Values are only checked for
 * being numbers here; the store clamps them into range on creation.
 */
export function parseUrlState(qs: string): InitialState {
  const p = new URLSearchParams(qs);
  const params: Partial<FractalParameters> = {};
  const animation: Partial<AnimationState> = {};

  const num = (k: string): number | undefined => {
    const v = p.get(k); if (v == null || v === '') return undefined;
    const n = Number(v); return Number.isFinite(n) ? n : undefined;
  };
  const list = (k: string, len: number): number[] | undefined => {
    const v = p.get(k); if (v == null) return undefined;
    const parts = v.split(',').map(Number);
    return parts.length === len && parts.every(Number.isFinite) ? parts : undefined;
  };
  const setNum = <K extends 'power' | 'mandelIterations' | 'rayStepCount' | 'maxMarchDistance' | 'hitThreshold' | 'cameraZoom'
    | 'colorScale' | 'colorOffset' | 'lightX' | 'lightY' | 'backgroundGlowIntensity' | 'aoStrength' | 'rimStrength'>(key: K, name: string) => {
    const v = num(name);
    if (v !== undefined) params[key] = v;
  };

  setNum('power', 'pow');
  setNum('mandelIterations', 'iter');
  setNum('rayStepCount', 'steps');
  setNum('maxMarchDistance', 'dist');
  setNum('hitThreshold', 'eps');
  setNum('cameraZoom', 'zoom');
  setNum('colorScale', 'cs');
  setNum('colorOffset', 'co');
  setNum('lightX', 'lx');
  setNum('lightY', 'ly');
  setNum('backgroundGlowIntensity', 'bg');
  setNum('aoStrength', 'ao');
  setNum('rimStrength', 'rim');

  const rot = list('rot', 4);
  if (rot) params.orientation = { x: rot[0], y: rot[1], z: rot[2], w: rot[3] };
  const pal = num('pal');
  if (pal !== undefined && isPaletteId(pal)) params.paletteId = pal;
  const julia = list('julia', 3);
  if (julia) {
    params.juliaEnabled = true;
    params.juliaConstant = [julia[0], julia[1], julia[2]];
  }

  const spin = num('spin');
  if (spin !== undefined) animation.rotationSpeed = spin;
  const apow = num('apow');
  if (apow !== undefined) { animation.animatePower = true; animation.powerSpeed = apow; }
  const azoom = num('azoom');
  if (azoom !== undefined) { animation.animateZoom = true; animation.zoomSpeed = azoom; }

  return { params, animation };
}
