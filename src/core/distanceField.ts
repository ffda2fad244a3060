// src/core/distanceField.ts — escape-time distance estimator for the power-N bulb
import type { FractalParameters, Vec3 } from '@/state/types';

export type ShapeParameters = Pick<FractalParameters, 'power' | 'mandelIterations' | 'juliaEnabled'> & {
  readonly juliaConstant: Readonly<Vec3>;
};

export const ESCAPE_RADIUS = 2.0;

/** Returned when the orbit collapses onto the origin or the derivative vanishes. */
export const NO_SURFACE_DISTANCE = 1e3;

/** Optional orbit statistics filled in by {@link estimateDistance}. */
export interface OrbitTrap {
  /** Smallest |z| seen along the orbit, starting with the sample point itself. */
  minRadius: number;
  iterations: number;
}

export function createOrbitTrap(): OrbitTrap {
  return { minRadius: Infinity, iterations: 0 };
}

/**
 * Distance from (x, y, z) to the bulb surface. Negative or tiny values mean
 * the point is inside or on the set.
 *
 * With `juliaEnabled` the additive constant is `juliaConstant` instead of the
 * sample point.
 */
export function estimateDistance(x: number, y: number, z: number, shape: ShapeParameters, trap?: OrbitTrap): number {
  const p = shape.power;
  const cx = shape.juliaEnabled ? shape.juliaConstant[0] : x;
  const cy = shape.juliaEnabled ? shape.juliaConstant[1] : y;
  const cz = shape.juliaEnabled ? shape.juliaConstant[2] : z;

  let zx = x, zy = y, zz = z;
  let dr = 1.0;
  let r = 0.0;
  let minRadius = Infinity;
  let i = 0;

  for (; i < shape.mandelIterations; i++) {
    r = Math.sqrt(zx * zx + zy * zy + zz * zz);
    if (r < minRadius) minRadius = r;
    if (r > ESCAPE_RADIUS) break;

    dr = p * Math.pow(r, p - 1) * dr + 1.0;

    if (r === 0) {
      // z^p vanishes; avoid acos(0/0)
      zx = cx; zy = cy; zz = cz;
      continue;
    }

    const theta = Math.acos(Math.min(1, Math.max(-1, zz / r))) * p;
    const phi = Math.atan2(zy, zx) * p;
    const zr = Math.pow(r, p);
    const sinTheta = Math.sin(theta);

    zx = zr * sinTheta * Math.cos(phi) + cx;
    zy = zr * sinTheta * Math.sin(phi) + cy;
    zz = zr * Math.cos(theta) + cz;
  }

  if (trap) {
    trap.minRadius = minRadius;
    trap.iterations = i;
  }

  if (r === 0 || dr === 0) return NO_SURFACE_DISTANCE;
  const d = 0.5 * Math.log(r) * r / dr;
  return Number.isFinite(d) ? d : NO_SURFACE_DISTANCE;
}

export function estimate(point: Readonly<Vec3>, shape: ShapeParameters): number {
  return estimateDistance(point[0], point[1], point[2], shape);
}
