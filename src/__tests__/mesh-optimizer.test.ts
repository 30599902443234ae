import { describe, it, expect } from 'vitest';
import {
  compactVertices,
  optimizeMesh,
  remapFaces,
  vectorAngle,
  type OptimizerTolerances,
} from '../converters/helpers/mesh-optimizer';
import type { OptimizerVertex } from '../converters/shared/mesh-types';
import type { Vec3 } from '../types';

const TOLERANCES: OptimizerTolerances = {
  maxCoordDelta: 0.001,
  maxUVDelta: 0.02,
  maxNormalAngle: (10 / 360) * 2 * Math.PI,
};

function vertex(index: number, position: Vec3, normal: Vec3 = [0, 0, 1], noMerge = false): OptimizerVertex {
  return { position, normal, uv1: [0, 0], uv2: [0, 0], originalIndex: index, noMerge };
}

describe('optimizeMesh', () => {
  it('merges vertices within tolerance at their midpoint', () => {
    const input = [vertex(0, [0, 0, 0]), vertex(1, [0, 0, 0.0005])];
    const result = optimizeMesh(input, TOLERANCES);

    const merged = result.vertices[0];
    expect(merged?.position[0]).toBe(0);
    expect(merged?.position[1]).toBe(0);
    expect(merged?.position[2]).toBeCloseTo(0.00025, 12);
    expect(merged?.normal).toEqual([0, 0, 1]);
    expect(result.vertices[1]).toBeNull();
    expect(result.indexMap).toEqual([0, 0]);
    expect(result.mergedCount).toBe(1);
  });

  it('leaves the input untouched', () => {
    const input = [vertex(0, [0, 0, 0]), vertex(1, [0, 0, 0.0005])];
    optimizeMesh(input, TOLERANCES);
    expect(input[1].position).toEqual([0, 0, 0.0005]);
  });

  it('never merges a vertex flagged as no-merge', () => {
    const input = [vertex(0, [0, 0, 0]), vertex(1, [0, 0, 0], [0, 0, 1], true)];
    const result = optimizeMesh(input, TOLERANCES);

    expect(result.mergedCount).toBe(0);
    expect(result.indexMap).toEqual([0, 1]);
  });

  it('keeps vertices apart when the normals differ too much', () => {
    const result = optimizeMesh([vertex(0, [0, 0, 0]), vertex(1, [0, 0, 0], [0, 1, 0])], TOLERANCES);
    expect(result.mergedCount).toBe(0);
  });

  it('keeps vertices apart when the UVs differ too much', () => {
    const a = vertex(0, [0, 0, 0]);
    const b: OptimizerVertex = { ...vertex(1, [0, 0, 0]), uv1: [0.5, 0] };
    expect(optimizeMesh([a, b], TOLERANCES).mergedCount).toBe(0);
  });

  it('averages differing normals within the angle tolerance', () => {
    const angle = (5 / 180) * Math.PI;
    const input = [vertex(0, [0, 0, 0]), vertex(1, [0, 0, 0], [0, Math.sin(angle), Math.cos(angle)])];
    const normal = optimizeMesh(input, TOLERANCES).vertices[0]?.normal ?? [0, 0, 0];

    expect(normal[0]).toBe(0);
    expect(normal[1]).toBeCloseTo(Math.sin(angle / 2), 10);
    expect(normal[2]).toBeCloseTo(Math.cos(angle / 2), 10);
  });

  it('sorts by x and maps every original index to its survivor', () => {
    const input = [vertex(0, [1, 0, 0]), vertex(1, [0, 0, 0]), vertex(2, [1, 0, 0])];
    const result = optimizeMesh(input, TOLERANCES);

    expect(result.vertices.map(v => v?.originalIndex ?? null)).toEqual([1, 0, null]);
    expect(result.indexMap).toEqual([1, 0, 1]);
    expect(remapFaces([[0, 1, 2]], result.indexMap)).toEqual([[1, 0, 1]]);
    expect(compactVertices(result.vertices)).toHaveLength(2);
  });

  it('does not compare vertices further apart in x than the tolerance', () => {
    const result = optimizeMesh([vertex(0, [0, 0, 0]), vertex(1, [0.002, 0, 0])], TOLERANCES);
    expect(result.mergedCount).toBe(0);
  });

  it('finds nothing more to merge on its own output', () => {
    const input: OptimizerVertex[] = [];
    for (let i = 0; i < 5; i++) {
      input.push(vertex(input.length, [i * 0.01, 0, 0]));
      input.push(vertex(input.length, [i * 0.01, 0, 0.0002]));
    }

    const first = optimizeMesh(input, TOLERANCES);
    expect(first.mergedCount).toBe(5);

    const survivors = compactVertices(first.vertices).map((v, i) => ({ ...v, originalIndex: i }));
    const second = optimizeMesh(survivors, TOLERANCES);
    expect(second.mergedCount).toBe(0);
    expect(second.indexMap).toEqual([0, 1, 2, 3, 4]);
  });
});

describe('vectorAngle', () => {
  it('measures the angle between two vectors', () => {
    expect(vectorAngle([1, 0, 0], [0, 2, 0])).toBeCloseTo(Math.PI / 2, 12);
  });

  it('treats a zero-length vector as parallel', () => {
    expect(vectorAngle([0, 0, 0], [0, 0, 1])).toBe(0);
  });
});
