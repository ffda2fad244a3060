// src/math/vec3.ts — small tuple vector helpers
import type { Vec3 } from '@/state/types';

export function dot(a: Readonly<Vec3>, b: Readonly<Vec3>) { return a[0] * b[0] + a[1] * b[1] + a[2] * b[2]; }

export function normalize(v: Readonly<Vec3>, fallback: Readonly<Vec3> = [0, 0, 1]): Vec3 {
  const len = Math.hypot(v[0], v[1], v[2]);
  if (!(len > 0) || !Number.isFinite(len)) return [fallback[0], fallback[1], fallback[2]];
  return [v[0] / len, v[1] / len, v[2] / len];
}

export function clamp01(x: number) { return Math.min(1, Math.max(0, x)); }

export function fract(x: number) { return x - Math.floor(x); }
