/**
 * Coordinate mapping between the Z-up host space and the Zusi file space.
 *
 * Positions and normals map (x, y, z) -> (-y, x, z). Scales swap x and y.
 * Quaternions are written with x and y swapped, rotations of placements as
 * YXZ Euler angles mapped (-y, x, z).
 */

import type { Quat, Vec3 } from '../types';
import { eulerToQuat, quatToEuler } from './matrix-utils';

export function toZusiVector(v: Vec3): Vec3 {
  return [-v[1], v[0], v[2]];
}

export function fromZusiVector(v: Vec3): Vec3 {
  return [v[1], -v[0], v[2]];
}

export function toZusiScale(s: Vec3): Vec3 {
  return [s[1], s[0], s[2]];
}

export function fromZusiScale(s: Vec3): Vec3 {
  return [s[1], s[0], s[2]];
}

/**
 * Keyframe quaternion in Zusi component order (X, Y, Z, W).
 */
export function toZusiQuat(q: Quat): Quat {
  return [q[1], q[0], q[2], q[3]];
}

/**
 * Static placement rotation (`phi`) of a link or anchor point.
 */
export function toZusiRotation(q: Quat): Vec3 {
  const e = quatToEuler(q, 'YXZ');
  return [-e[1], e[0], e[2]];
}

export function fromZusiRotation(phi: Vec3): Quat {
  return eulerToQuat([phi[1], -phi[0], phi[2]], 'YXZ');
}

/**
 * Length of a vector projected onto the horizontal plane. The mapping
 * above is a rotation about the vertical axis, so host and Zusi vectors
 * give the same value.
 */
export function horizontalLength(v: Vec3): number {
  return Math.hypot(v[0], v[1]);
}
