/**
 * Matrix Utilities
 *
 * 4x4 matrices are column-major arrays of 16 numbers, the same layout glTF
 * uses for node matrices. Quaternions are (x, y, z, w).
 */

import type { Mat4, Quat, Transform, Vec3 } from '../types';

/**
 * Euler angles in radians. `XYZ` applies X first, then Y, then Z
 * (R = Rz * Ry * Rx); `YXZ` applies Y, then X, then Z (R = Rz * Rx * Ry).
 */
export type EulerOrder = 'XYZ' | 'YXZ';

export function identityMatrix(): Mat4 {
  return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
}

/**
 * Builds T * R * S.
 */
export function composeMatrix(translation: Vec3, rotation: Quat, scale: Vec3): Mat4 {
  const [x, y, z, w] = rotation;
  const [sx, sy, sz] = scale;
  const xx = x * x, yy = y * y, zz = z * z;
  const xy = x * y, xz = x * z, yz = y * z;
  const wx = w * x, wy = w * y, wz = w * z;

  return [
    (1 - 2 * (yy + zz)) * sx, 2 * (xy + wz) * sx, 2 * (xz - wy) * sx, 0,
    2 * (xy - wz) * sy, (1 - 2 * (xx + zz)) * sy, 2 * (yz + wx) * sy, 0,
    2 * (xz + wy) * sz, 2 * (yz - wx) * sz, (1 - 2 * (xx + yy)) * sz, 0,
    translation[0], translation[1], translation[2], 1,
  ];
}

export function transformToMatrix(transform: Transform): Mat4 {
  return composeMatrix(transform.translation, transform.rotation, transform.scale);
}

export function scaleMatrix(scale: Vec3): Mat4 {
  return [scale[0], 0, 0, 0, 0, scale[1], 0, 0, 0, 0, scale[2], 0, 0, 0, 0, 1];
}

/**
 * Returns a * b.
 */
export function multiplyMatrices(a: Mat4, b: Mat4): Mat4 {
  const out = new Array<number>(16);
  for (let col = 0; col < 4; col++) {
    for (let row = 0; row < 4; row++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[k * 4 + row] * b[col * 4 + k];
      }
      out[col * 4 + row] = sum;
    }
  }
  return out;
}

export function transformPoint(m: Mat4, v: Vec3): Vec3 {
  return [
    m[0] * v[0] + m[4] * v[1] + m[8] * v[2] + m[12],
    m[1] * v[0] + m[5] * v[1] + m[9] * v[2] + m[13],
    m[2] * v[0] + m[6] * v[1] + m[10] * v[2] + m[14],
  ];
}

/**
 * Determinant of the upper-left 3x3 block.
 */
export function determinant3(m: Mat4): number {
  return m[0] * (m[5] * m[10] - m[9] * m[6])
    - m[4] * (m[1] * m[10] - m[9] * m[2])
    + m[8] * (m[1] * m[6] - m[5] * m[2]);
}

/**
 * Inverse transpose of the upper-left 3x3 block, as a function that maps a
 * normal and renormalizes it. A singular block falls back to the cofactor
 * matrix, which points the same way up to sign.
 */
export function normalTransformer(m: Mat4): (n: Vec3) => Vec3 {
  // cRC is the cofactor of row R, column C; element (r, c) sits at m[c * 4 + r]
  const c00 = m[5] * m[10] - m[9] * m[6];
  const c01 = m[9] * m[2] - m[1] * m[10];
  const c02 = m[1] * m[6] - m[5] * m[2];
  const c10 = m[8] * m[6] - m[4] * m[10];
  const c11 = m[0] * m[10] - m[8] * m[2];
  const c12 = m[4] * m[2] - m[0] * m[6];
  const c20 = m[4] * m[9] - m[8] * m[5];
  const c21 = m[8] * m[1] - m[0] * m[9];
  const c22 = m[0] * m[5] - m[4] * m[1];
  const det = determinant3(m);
  const f = det === 0 ? 1 : 1 / det;

  // Row i of the inverse transpose is cofactor row i divided by det
  return (n: Vec3): Vec3 => normalize([
    f * (c00 * n[0] + c01 * n[1] + c02 * n[2]),
    f * (c10 * n[0] + c11 * n[1] + c12 * n[2]),
    f * (c20 * n[0] + c21 * n[1] + c22 * n[2]),
  ]);
}

export function vectorLength(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

export function normalize(v: Vec3): Vec3 {
  const len = vectorLength(v);
  return len === 0 ? v : [v[0] / len, v[1] / len, v[2] / len];
}

/**
 * Splits a matrix into translation, rotation and scale. A negative
 * determinant is folded into a negated scale so the rotation stays proper.
 */
export function decomposeMatrix(m: Mat4): Transform {
  let sx = vectorLength([m[0], m[1], m[2]]);
  let sy = vectorLength([m[4], m[5], m[6]]);
  let sz = vectorLength([m[8], m[9], m[10]]);
  if (determinant3(m) < 0) {
    sx = -sx;
    sy = -sy;
    sz = -sz;
  }

  const ix = sx === 0 ? 0 : 1 / sx;
  const iy = sy === 0 ? 0 : 1 / sy;
  const iz = sz === 0 ? 0 : 1 / sz;
  const r = [
    m[0] * ix, m[1] * ix, m[2] * ix,
    m[4] * iy, m[5] * iy, m[6] * iy,
    m[8] * iz, m[9] * iz, m[10] * iz,
  ];

  return {
    translation: [m[12], m[13], m[14]],
    rotation: rotationToQuat(r),
    scale: [sx, sy, sz],
  };
}

/**
 * Quaternion from a column-major 3x3 rotation.
 */
function rotationToQuat(r: number[]): Quat {
  const m00 = r[0], m10 = r[1], m20 = r[2];
  const m01 = r[3], m11 = r[4], m21 = r[5];
  const m02 = r[6], m12 = r[7], m22 = r[8];
  const trace = m00 + m11 + m22;

  let q: Quat;
  if (trace > 0) {
    const s = 0.5 / Math.sqrt(trace + 1);
    q = [(m21 - m12) * s, (m02 - m20) * s, (m10 - m01) * s, 0.25 / s];
  } else if (m00 > m11 && m00 > m22) {
    const s = 2 * Math.sqrt(1 + m00 - m11 - m22);
    q = [0.25 * s, (m01 + m10) / s, (m02 + m20) / s, (m21 - m12) / s];
  } else if (m11 > m22) {
    const s = 2 * Math.sqrt(1 + m11 - m00 - m22);
    q = [(m01 + m10) / s, 0.25 * s, (m12 + m21) / s, (m02 - m20) / s];
  } else {
    const s = 2 * Math.sqrt(1 + m22 - m00 - m11);
    q = [(m02 + m20) / s, (m12 + m21) / s, 0.25 * s, (m10 - m01) / s];
  }
  return normalizeQuat(q);
}

export function normalizeQuat(q: Quat): Quat {
  const len = Math.sqrt(q[0] * q[0] + q[1] * q[1] + q[2] * q[2] + q[3] * q[3]);
  return len === 0 ? [0, 0, 0, 1] : [q[0] / len, q[1] / len, q[2] / len, q[3] / len];
}

export function quatToMatrix(q: Quat): Mat4 {
  return composeMatrix([0, 0, 0], q, [1, 1, 1]);
}

/**
 * Both XYZ Euler solutions for the rotation of a (scale-free) matrix.
 */
function matrixToEulerXYZPair(m: Mat4): [Vec3, Vec3] {
  const cy = Math.hypot(m[0], m[1]);
  if (cy > 16 * Number.EPSILON) {
    return [
      [Math.atan2(m[6], m[10]), Math.atan2(-m[2], cy), Math.atan2(m[1], m[0])],
      [Math.atan2(-m[6], -m[10]), Math.atan2(-m[2], -cy), Math.atan2(-m[1], -m[0])],
    ];
  }
  const single: Vec3 = [Math.atan2(-m[9], m[5]), Math.atan2(-m[2], cy), 0];
  return [single, [single[0], single[1], single[2]]];
}

export function quatToEuler(q: Quat, order: EulerOrder): Vec3 {
  const m = quatToMatrix(normalizeQuat(q));
  if (order === 'XYZ') {
    return matrixToEulerXYZPair(m)[0];
  }

  // R = Rz * Rx * Ry: row 2 is (-cx*sy, sx, cx*cy)
  const cx = Math.hypot(m[2], m[10]);
  if (cx > 16 * Number.EPSILON) {
    return [Math.atan2(m[6], cx), Math.atan2(-m[2], m[10]), Math.atan2(-m[4], m[5])];
  }
  return [Math.atan2(m[6], cx), 0, Math.atan2(m[1], m[0])];
}

export function eulerToQuat(e: Vec3, order: EulerOrder): Quat {
  const hx = e[0] / 2, hy = e[1] / 2, hz = e[2] / 2;
  const qx: Quat = [Math.sin(hx), 0, 0, Math.cos(hx)];
  const qy: Quat = [0, Math.sin(hy), 0, Math.cos(hy)];
  const qz: Quat = [0, 0, Math.sin(hz), Math.cos(hz)];
  return order === 'XYZ'
    ? multiplyQuats(qz, multiplyQuats(qy, qx))
    : multiplyQuats(qz, multiplyQuats(qx, qy));
}

/**
 * Hamilton product a * b (apply b first).
 */
export function multiplyQuats(a: Quat, b: Quat): Quat {
  const [ax, ay, az, aw] = a;
  const [bx, by, bz, bw] = b;
  return [
    aw * bx + ax * bw + ay * bz - az * by,
    aw * by - ax * bz + ay * bw + az * bx,
    aw * bz + ax * by - ay * bx + az * bw,
    aw * bw - ax * bx - ay * by - az * bz,
  ];
}

/**
 * Shifts each angle of `euler` by multiples of 2*pi so it lies as close
 * as possible to `previous`, and flips single axes that jumped by more
 * than pi while the others stayed put.
 */
export function makeEulerCompatible(euler: Vec3, previous: Vec3): Vec3 {
  const PI_THRESHOLD = 5.1;
  const TWO_PI = 2 * Math.PI;
  const e: Vec3 = [euler[0], euler[1], euler[2]];
  const d: Vec3 = [0, 0, 0];

  for (let i = 0; i < 3; i++) {
    d[i] = e[i] - previous[i];
    if (d[i] > PI_THRESHOLD) {
      e[i] -= Math.floor(d[i] / TWO_PI + 0.5) * TWO_PI;
      d[i] = e[i] - previous[i];
    } else if (d[i] < -PI_THRESHOLD) {
      e[i] += Math.floor(-d[i] / TWO_PI + 0.5) * TWO_PI;
      d[i] = e[i] - previous[i];
    }
  }

  for (let i = 0; i < 3; i++) {
    const j = (i + 1) % 3;
    const k = (i + 2) % 3;
    if (Math.abs(d[i]) > 3.2 && Math.abs(d[j]) < 1.6 && Math.abs(d[k]) < 1.6) {
      e[i] += d[i] > 0 ? -TWO_PI : TWO_PI;
    }
  }
  return e;
}

/**
 * XYZ Euler angles of `m`'s rotation, picking whichever of the two
 * equivalent solutions stays closest to `previous`.
 */
export function matrixToCompatibleEuler(m: Mat4, previous: Vec3): Vec3 {
  const rotation = quatToMatrix(decomposeMatrix(m).rotation);
  const [first, second] = matrixToEulerXYZPair(rotation).map(e => makeEulerCompatible(e, previous));
  const distance = (e: Vec3): number =>
    Math.abs(e[0] - previous[0]) + Math.abs(e[1] - previous[1]) + Math.abs(e[2] - previous[2]);
  return distance(second) < distance(first) ? second : first;
}

export function matrixToEuler(m: Mat4): Vec3 {
  return matrixToEulerXYZPair(quatToMatrix(decomposeMatrix(m).rotation))[0];
}

/**
 * Spherical interpolation along the shorter arc.
 */
export function slerpQuats(a: Quat, b: Quat, t: number): Quat {
  let cos = a[0] * b[0] + a[1] * b[1] + a[2] * b[2] + a[3] * b[3];
  let target: Quat = b;
  if (cos < 0) {
    cos = -cos;
    target = [-b[0], -b[1], -b[2], -b[3]];
  }

  if (cos > 0.9995) {
    return normalizeQuat([
      a[0] + (target[0] - a[0]) * t,
      a[1] + (target[1] - a[1]) * t,
      a[2] + (target[2] - a[2]) * t,
      a[3] + (target[3] - a[3]) * t,
    ]);
  }

  const angle = Math.acos(cos);
  const sin = Math.sin(angle);
  const wa = Math.sin((1 - t) * angle) / sin;
  const wb = Math.sin(t * angle) / sin;
  return [
    wa * a[0] + wb * target[0],
    wa * a[1] + wb * target[1],
    wa * a[2] + wb * target[2],
    wa * a[3] + wb * target[3],
  ];
}
