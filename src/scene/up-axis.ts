/**
 * Up-Axis Conversion
 *
 * The host convention is Z-up. Y-up documents (plain glTF) are mapped with
 * the proper rotation (x, y, z) -> (x, -z, y), which keeps handedness.
 */

import type { Quat, Vec3 } from '../types';
import type { UpAxis } from '../schemas';

export interface AxisConversion {
  vector(v: Vec3): Vec3;
  quat(q: Quat): Quat;
  scale(s: Vec3): Vec3;
}

const IDENTITY_CONVERSION: AxisConversion = {
  vector: v => [v[0], v[1], v[2]],
  quat: q => [q[0], q[1], q[2], q[3]],
  scale: s => [s[0], s[1], s[2]],
};

const Y_UP_TO_HOST: AxisConversion = {
  vector: v => [v[0], -v[2], v[1]],
  quat: q => [q[0], -q[2], q[1], q[3]],
  scale: s => [s[0], s[2], s[1]],
};

const HOST_TO_Y_UP: AxisConversion = {
  vector: v => [v[0], v[2], -v[1]],
  quat: q => [q[0], q[2], -q[1], q[3]],
  scale: s => [s[0], s[2], s[1]],
};

/**
 * Conversion from a document with the given up axis into host space.
 */
export function toHostAxes(upAxis: UpAxis): AxisConversion {
  return upAxis === 'Y' ? Y_UP_TO_HOST : IDENTITY_CONVERSION;
}

/**
 * Conversion from host space into a document with the given up axis.
 */
export function fromHostAxes(upAxis: UpAxis): AxisConversion {
  return upAxis === 'Y' ? HOST_TO_Y_UP : IDENTITY_CONVERSION;
}
