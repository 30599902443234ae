/**
 * glTF Animation Channel Sampling
 *
 * Evaluates a sampler curve at an arbitrary time. Times before the first
 * or after the last key clamp to the end values.
 */

import type { Quat } from '../types';
import { normalizeQuat, slerpQuats } from '../utils/matrix-utils';

export type Interpolation = 'LINEAR' | 'STEP' | 'CUBICSPLINE';

export interface ChannelCurve {
  /** Key times in seconds, ascending */
  times: number[];
  /**
   * One entry per key; CUBICSPLINE curves hold three per key
   * (in-tangent, value, out-tangent).
   */
  values: number[][];
  interpolation: Interpolation;
  /** Rotation curves are quaternions and interpolate spherically */
  isRotation: boolean;
}

function keyValue(curve: ChannelCurve, key: number): number[] {
  return curve.interpolation === 'CUBICSPLINE' ? curve.values[key * 3 + 1] : curve.values[key];
}

function toQuat(v: number[]): Quat {
  return [v[0], v[1], v[2], v[3]];
}

function hermite(curve: ChannelCurve, key: number, u: number, dt: number): number[] {
  const v0 = curve.values[key * 3 + 1];
  const b0 = curve.values[key * 3 + 2];
  const a1 = curve.values[(key + 1) * 3];
  const v1 = curve.values[(key + 1) * 3 + 1];
  const u2 = u * u;
  const u3 = u2 * u;

  return v0.map((_, i) =>
    (2 * u3 - 3 * u2 + 1) * v0[i]
    + (u3 - 2 * u2 + u) * dt * b0[i]
    + (-2 * u3 + 3 * u2) * v1[i]
    + (u3 - u2) * dt * a1[i]);
}

export function sampleCurve(curve: ChannelCurve, time: number): number[] {
  const { times } = curve;
  if (times.length === 0) {
    return [];
  }
  const last = times.length - 1;
  if (time <= times[0]) return [...keyValue(curve, 0)];
  if (time >= times[last]) return [...keyValue(curve, last)];

  let key = 0;
  while (key < last - 1 && times[key + 1] <= time) {
    key++;
  }

  const dt = times[key + 1] - times[key];
  const u = dt === 0 ? 0 : (time - times[key]) / dt;

  switch (curve.interpolation) {
    case 'STEP':
      return [...keyValue(curve, key)];
    case 'CUBICSPLINE': {
      const value = hermite(curve, key, u, dt);
      return curve.isRotation ? normalizeQuat(toQuat(value)) : value;
    }
    case 'LINEAR':
    default: {
      const a = keyValue(curve, key);
      const b = keyValue(curve, key + 1);
      if (curve.isRotation) {
        return slerpQuats(toQuat(a), toQuat(b), u);
      }
      return a.map((value, i) => value + (b[i] - value) * u);
    }
  }
}
