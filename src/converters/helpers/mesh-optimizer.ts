/**
 * Mesh Optimizer
 *
 * Sweep-line vertex welding. Vertices are sorted by X; each surviving
 * vertex is compared against its successors until their X distance
 * exceeds the coordinate tolerance. Merged vertices move to the midpoint
 * and keep being compared against later neighbors.
 */

import type { Vec2, Vec3 } from '../../types';
import type { Face, OptimizerVertex } from '../shared/mesh-types';
import { ANIMATION } from '../../constants/animation';
import { normalize } from '../../utils/matrix-utils';

export interface OptimizerTolerances {
  maxCoordDelta: number;
  maxUVDelta: number;
  /** Radians */
  maxNormalAngle: number;
}

export interface OptimizeResult {
  /** Sorted vertex list; merged-away entries are null */
  vertices: (OptimizerVertex | null)[];
  /** Original vertex index -> index among the surviving vertices */
  indexMap: number[];
  mergedCount: number;
}

function squaredDistance3(a: Vec3, b: Vec3): number {
  const dx = a[0] - b[0], dy = a[1] - b[1], dz = a[2] - b[2];
  return dx * dx + dy * dy + dz * dz;
}

function squaredDistance2(a: Vec2, b: Vec2): number {
  const du = a[0] - b[0], dv = a[1] - b[1];
  return du * du + dv * dv;
}

/**
 * Angle between two vectors; zero-length input counts as parallel.
 */
export function vectorAngle(a: Vec3, b: Vec3): number {
  const la = Math.hypot(a[0], a[1], a[2]);
  const lb = Math.hypot(b[0], b[1], b[2]);
  if (la === 0 || lb === 0) {
    return 0;
  }
  const cos = (a[0] * b[0] + a[1] * b[1] + a[2] * b[2]) / (la * lb);
  return Math.acos(Math.min(1, Math.max(-1, cos)));
}

function canMerge(a: OptimizerVertex, b: OptimizerVertex, tolerances: OptimizerTolerances): boolean {
  if (a.noMerge || b.noMerge) {
    return false;
  }
  const coord2 = tolerances.maxCoordDelta * tolerances.maxCoordDelta;
  const uv2 = tolerances.maxUVDelta * tolerances.maxUVDelta;
  return squaredDistance3(a.position, b.position) <= coord2
    && squaredDistance2(a.uv1, b.uv1) <= uv2
    && squaredDistance2(a.uv2, b.uv2) <= uv2
    && vectorAngle(a.normal, b.normal) <= tolerances.maxNormalAngle;
}

function midpoint3(a: Vec3, b: Vec3): Vec3 {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2, (a[2] + b[2]) / 2];
}

function midpoint2(a: Vec2, b: Vec2): Vec2 {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2];
}

function nearlyEqual(a: Vec3, b: Vec3): boolean {
  const eps = ANIMATION.NORMAL_EQUALITY_EPSILON;
  return Math.abs(a[0] - b[0]) < eps && Math.abs(a[1] - b[1]) < eps && Math.abs(a[2] - b[2]) < eps;
}

function mergeVertices(a: OptimizerVertex, b: OptimizerVertex): OptimizerVertex {
  let normal: Vec3;
  if (nearlyEqual(a.normal, b.normal)) {
    normal = a.normal;
  } else {
    const na = normalize(a.normal);
    const nb = normalize(b.normal);
    normal = normalize([na[0] + nb[0], na[1] + nb[1], na[2] + nb[2]]);
  }

  return {
    position: midpoint3(a.position, b.position),
    normal,
    uv1: midpoint2(a.uv1, b.uv1),
    uv2: midpoint2(a.uv2, b.uv2),
    originalIndex: a.originalIndex,
    noMerge: false,
  };
}

/**
 * Welds vertices within tolerance. The input is left untouched.
 */
export function optimizeMesh(input: readonly OptimizerVertex[], tolerances: OptimizerTolerances): OptimizeResult {
  // Array.prototype.sort is stable
  const vertices: (OptimizerVertex | null)[] = [...input].sort((a, b) => a.position[0] - b.position[0]);
  const mergedInto = new Map<number, number>();

  for (let i = 0; i < vertices.length; i++) {
    let current = vertices[i];
    if (current === null) continue;

    for (let j = i + 1; j < vertices.length; j++) {
      const candidate = vertices[j];
      if (candidate === null) continue;
      if (candidate.position[0] - current.position[0] > tolerances.maxCoordDelta) break;

      if (canMerge(current, candidate, tolerances)) {
        current = mergeVertices(current, candidate);
        vertices[i] = current;
        vertices[j] = null;
        mergedInto.set(candidate.originalIndex, current.originalIndex);
      }
    }
  }

  const indexMap = new Array<number>(input.length).fill(-1);
  let next = 0;
  for (const vertex of vertices) {
    if (vertex !== null) {
      indexMap[vertex.originalIndex] = next++;
    }
  }
  for (const [removed, survivor] of mergedInto) {
    indexMap[removed] = indexMap[survivor];
  }

  return { vertices, indexMap, mergedCount: mergedInto.size };
}

/**
 * Rewrites faces through an optimizer index map.
 */
export function remapFaces(faces: readonly Face[], indexMap: readonly number[]): Face[] {
  return faces.map(([a, b, c]): Face => [indexMap[a], indexMap[b], indexMap[c]]);
}

/**
 * Surviving vertices in output order.
 */
export function compactVertices(vertices: readonly (OptimizerVertex | null)[]): OptimizerVertex[] {
  return vertices.filter((v): v is OptimizerVertex => v !== null);
}
