import type { Vec2, Vec3 } from '../../types';

/**
 * One LS3 vertex in Zusi coordinates: position, normal and two UV sets
 * (UVs already in the file's top-left origin).
 */
export interface MeshVertex {
  position: Vec3;
  normal: Vec3;
  uv1: Vec2;
  uv2: Vec2;
}

/**
 * Triangle as three vertex indices, in-memory winding.
 */
export type Face = [number, number, number];

/**
 * Vertex as seen by the optimizer: remembers where it came from and
 * whether it lies on an edge that must stay split.
 */
export interface OptimizerVertex extends MeshVertex {
  originalIndex: number;
  noMerge: boolean;
}
