/**
 * LSB Binary Mesh Codec
 *
 * The LSB file is the concatenation of every subset's vertex records
 * followed by its face records, in subset order. All values little-endian:
 *  - vertex: 10 x float32 (position, normal, uv1, uv2)
 *  - face: 3 x uint16, stored in reverse order of the in-memory winding
 * There is no header; record counts come from the LS3 file's SubSet
 * elements.
 */

import { LSB_LAYOUT } from '../../constants/ls3';
import { ERROR_MESSAGES } from '../../constants/errors';
import { Ls3ErrorFactory } from '../../errors';
import type { Face, MeshVertex } from './mesh-types';

export interface SubsetCounts {
  vertexCount: number;
  /** Number of indices, three per face */
  indexCount: number;
}

export interface DecodedSubset {
  vertices: MeshVertex[];
  faces: Face[];
}

/**
 * Encodes one subset's records. Null vertices (merged away by the
 * optimizer) are skipped.
 */
export function encodeSubset(vertices: readonly (MeshVertex | null)[], faces: readonly Face[]): Buffer {
  const present = vertices.filter((v): v is MeshVertex => v !== null);
  const buffer = Buffer.alloc(present.length * LSB_LAYOUT.VERTEX_RECORD_SIZE + faces.length * LSB_LAYOUT.FACE_RECORD_SIZE);
  let offset = 0;

  for (const vertex of present) {
    const values = [...vertex.position, ...vertex.normal, ...vertex.uv1, ...vertex.uv2];
    for (const value of values) {
      buffer.writeFloatLE(value, offset);
      offset += 4;
    }
  }

  for (const face of faces) {
    for (const index of [face[2], face[1], face[0]]) {
      if (!Number.isInteger(index) || index < 0 || index > LSB_LAYOUT.MAX_INDEX) {
        throw Ls3ErrorFactory.conversionError(ERROR_MESSAGES.INDEX_OVERFLOW, 'lsb_encoding', {
          index,
          vertexCount: present.length,
        });
      }
      buffer.writeUInt16LE(index, offset);
      offset += 2;
    }
  }
  return buffer;
}

/**
 * Accumulates the subsets of one LS3 file.
 */
export class LsbWriter {
  private readonly chunks: Buffer[] = [];

  addSubset(vertices: readonly (MeshVertex | null)[], faces: readonly Face[]): SubsetCounts {
    const chunk = encodeSubset(vertices, faces);
    this.chunks.push(chunk);
    return {
      vertexCount: vertices.filter(v => v !== null).length,
      indexCount: faces.length * 3,
    };
  }

  get byteLength(): number {
    return this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Sequential reader over an LSB stream.
 */
export class LsbReader {
  private readonly buffer: Buffer;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readSubset(vertexCount: number, faceCount: number): DecodedSubset {
    const needed = vertexCount * LSB_LAYOUT.VERTEX_RECORD_SIZE + faceCount * LSB_LAYOUT.FACE_RECORD_SIZE;
    if (needed > this.remaining) {
      throw Ls3ErrorFactory.malformedRecord(ERROR_MESSAGES.RECORDS_EXCEED_STREAM, needed, this.remaining, {
        vertexCount,
        faceCount,
        offset: this.offset,
      });
    }

    const vertices: MeshVertex[] = [];
    for (let i = 0; i < vertexCount; i++) {
      const f = (k: number): number => this.buffer.readFloatLE(this.offset + k * 4);
      vertices.push({
        position: [f(0), f(1), f(2)],
        normal: [f(3), f(4), f(5)],
        uv1: [f(6), f(7)],
        uv2: [f(8), f(9)],
      });
      this.offset += LSB_LAYOUT.VERTEX_RECORD_SIZE;
    }

    const faces: Face[] = [];
    for (let i = 0; i < faceCount; i++) {
      const a = this.buffer.readUInt16LE(this.offset);
      const b = this.buffer.readUInt16LE(this.offset + 2);
      const c = this.buffer.readUInt16LE(this.offset + 4);
      const largest = Math.max(a, b, c);
      if (largest >= vertexCount) {
        throw Ls3ErrorFactory.malformedRecord(
          ERROR_MESSAGES.FACE_INDEX_OUT_OF_RANGE,
          (largest + 1) * LSB_LAYOUT.VERTEX_RECORD_SIZE,
          vertexCount * LSB_LAYOUT.VERTEX_RECORD_SIZE,
          { face: i, index: largest, vertexCount }
        );
      }
      faces.push([c, b, a]);
      this.offset += LSB_LAYOUT.FACE_RECORD_SIZE;
    }

    return { vertices, faces };
  }
}
