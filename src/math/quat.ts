// src/math/quat.ts — orientation composition on three's Quaternion, stored as plain {x, y, z, w}
import { Quaternion, Vector3 } from 'three';
import type { Quat } from '@/state/types';

export const IDENTITY: Readonly<Quat> = { x: 0, y: 0, z: 0, w: 1 };

const X_AXIS = new Vector3(1, 0, 0);
const Y_AXIS = new Vector3(0, 1, 0);

export function toQuaternion(q: Readonly<Quat>): Quaternion {
  return new Quaternion(q.x, q.y, q.z, q.w);
}

export function fromQuaternion(q: Quaternion): Quat {
  return { x: q.x, y: q.y, z: q.z, w: q.w };
}

export function rotationY(angle: number): Quat {
  return fromQuaternion(new Quaternion().setFromAxisAngle(Y_AXIS, angle));
}

export function rotationX(angle: number): Quat {
  return fromQuaternion(new Quaternion().setFromAxisAngle(X_AXIS, angle));
}

/** Hamilton product `a * b` (applies `b` first, then `a`). */
export function multiply(a: Readonly<Quat>, b: Readonly<Quat>): Quat {
  return fromQuaternion(toQuaternion(a).multiply(toQuaternion(b)));
}

export function length(q: Readonly<Quat>): number {
  return toQuaternion(q).length();
}

/** Unit-length copy; NaN or zero input resets to identity. */
export function normalize(q: Readonly<Quat>): Quat {
  const len = length(q);
  if (!(len > 0) || !Number.isFinite(len)) return { ...IDENTITY };
  return fromQuaternion(toQuaternion(q).normalize());
}
