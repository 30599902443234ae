import { describe, it, expect } from 'vitest';
import { LsbReader, LsbWriter, encodeSubset } from '../converters/shared/lsb-codec';
import type { Face, MeshVertex } from '../converters/shared/mesh-types';
import { Ls3ConversionError, Ls3MalformedRecordError } from '../errors';

function vertex(x: number, y: number, z: number): MeshVertex {
  return { position: [x, y, z], normal: [0, 0, 1], uv1: [0.5, 0.25], uv2: [0, 1] };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

const TRIANGLE: MeshVertex[] = [vertex(1, 2.5, -3), vertex(-0.5, 0, 4), vertex(0.25, 8, 0)];
const FACES: Face[] = [[0, 1, 2]];

describe('encodeSubset', () => {
  it('writes 40 bytes per vertex and 6 bytes per face', () => {
    expect(encodeSubset(TRIANGLE, FACES).length).toBe(126);
  });

  it('writes little-endian float32 vertex records', () => {
    const buffer = encodeSubset(TRIANGLE, FACES);
    expect(buffer.readFloatLE(0)).toBe(1);
    expect(buffer.readFloatLE(4)).toBe(2.5);
    expect(buffer.readFloatLE(8)).toBe(-3);
    expect(buffer.readFloatLE(20)).toBe(1);
    expect(buffer.readFloatLE(24)).toBe(0.5);
    expect(buffer.readFloatLE(28)).toBe(0.25);
    expect(buffer.readFloatLE(36)).toBe(1);
    expect(buffer.readFloatLE(40)).toBe(-0.5);
  });

  it('writes face indices in reverse order', () => {
    const buffer = encodeSubset(TRIANGLE, FACES);
    expect([buffer.readUInt16LE(120), buffer.readUInt16LE(122), buffer.readUInt16LE(124)]).toEqual([2, 1, 0]);
  });

  it('skips vertices merged away by the optimizer', () => {
    expect(encodeSubset([vertex(0, 0, 0), null, vertex(1, 0, 0)], []).length).toBe(80);
  });

  it('rejects indices a 16-bit record cannot hold', () => {
    const error = captureError(() => encodeSubset(TRIANGLE, [[0, 1, 65536]]));
    expect(error).toBeInstanceOf(Ls3ConversionError);
  });
});

describe('LsbReader', () => {
  it('reproduces encoded vertices and faces', () => {
    const reader = new LsbReader(encodeSubset(TRIANGLE, FACES));
    const decoded = reader.readSubset(3, 1);

    expect(decoded.vertices).toEqual(TRIANGLE);
    expect(decoded.faces).toEqual(FACES);
    expect(reader.remaining).toBe(0);
  });

  it('reads consecutive subsets written by LsbWriter', () => {
    const writer = new LsbWriter();
    expect(writer.addSubset(TRIANGLE, FACES)).toEqual({ vertexCount: 3, indexCount: 3 });
    expect(writer.addSubset([vertex(3, 3, 3), null], [])).toEqual({ vertexCount: 1, indexCount: 0 });
    expect(writer.byteLength).toBe(166);

    const reader = new LsbReader(writer.toBuffer());
    expect(reader.readSubset(3, 1).faces).toEqual(FACES);
    expect(reader.readSubset(1, 0).vertices).toEqual([vertex(3, 3, 3)]);
    expect(reader.remaining).toBe(0);
  });

  it('throws a malformed record error when the counts exceed the stream', () => {
    const reader = new LsbReader(encodeSubset([vertex(0, 0, 0)], []));
    const error = captureError(() => reader.readSubset(2, 0));

    expect(error).toBeInstanceOf(Ls3MalformedRecordError);
    if (error instanceof Ls3MalformedRecordError) {
      expect(error.expectedBytes).toBe(80);
      expect(error.availableBytes).toBe(40);
    }
  });

  it('rejects faces that point past the subset vertices', () => {
    const reader = new LsbReader(encodeSubset(TRIANGLE.slice(0, 2), FACES));
    const error = captureError(() => reader.readSubset(2, 1));

    expect(error).toBeInstanceOf(Ls3MalformedRecordError);
    if (error instanceof Ls3MalformedRecordError) {
      expect(error.message).toBe('Face refers to a vertex outside its subset');
      expect(error.expectedBytes).toBe(120);
      expect(error.availableBytes).toBe(80);
    }
  });

  it('reads from a view into a larger buffer', () => {
    const encoded = encodeSubset(TRIANGLE, FACES);
    const padded = new Uint8Array(encoded.length + 8);
    padded.set(encoded, 8);

    const reader = new LsbReader(padded.subarray(8));
    expect(reader.readSubset(3, 1).vertices[1].position).toEqual([-0.5, 0, 4]);
  });
});
