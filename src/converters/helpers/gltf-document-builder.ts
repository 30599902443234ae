/**
 * glTF Document Builder
 *
 * Creates glTF-Transform meshes, materials and nodes from decoded LS3
 * subsets. Geometry arrives in Zusi coordinates and leaves in the
 * document's axis convention.
 */

import { Buffer as GltfBuffer, Document, Material, Node, Primitive } from '@gltf-transform/core';
import type { LinkMetadataInput, MaterialExtras } from '../../schemas';
import type { AxisConversion } from '../../scene/up-axis';
import { LINK_FLAGS } from '../../constants/ls3';
import { fromZusiRotation, fromZusiScale, fromZusiVector } from '../../utils/zusi-coordinates';
import type { Face, MeshVertex } from '../shared/mesh-types';
import type { Ls3LinkRecord, Ls3SubsetRecord, Rgba } from './ls3-document-reader';

const WHITE: Rgba = [1, 1, 1, 1];

function add3(a: Rgba, b: Rgba | undefined): [number, number, number] {
  const e = b ?? [0, 0, 0, 0];
  return [Math.min(1, a[0] + e[0]), Math.min(1, a[1] + e[1]), Math.min(1, a[2] + e[2])];
}

export interface SubsetTextures {
  /** URI for the base color texture */
  base: string | undefined;
  /** Paths of further textures, stored in extras */
  extra: string[];
}

/**
 * Material from a subset's render attributes. The night color was
 * subtracted from the day colors on export and is added back here.
 */
export function createSubsetMaterial(
  document: Document,
  name: string,
  record: Ls3SubsetRecord,
  textures: SubsetTextures
): Material {
  const diffuse = record.diffuse ?? WHITE;
  const [r, g, b] = add3(diffuse, record.emit);
  const material = document.createMaterial(name)
    .setBaseColorFactor([r, g, b, diffuse[3]])
    .setDoubleSided(record.doubleSided);

  if (record.emit !== undefined) {
    material.setEmissiveFactor([record.emit[0], record.emit[1], record.emit[2]]);
  }

  const extras: Partial<MaterialExtras> = {
    landscapeType: record.landscapeType,
    gfType: record.gfType,
    forceBrightness: record.forceBrightness,
    signalMagnification: record.signalMagnification,
    zOffset: record.zBias,
    texturePreset: record.texturePreset,
    renderState: record.renderState,
    textures: textures.extra.map((path, i) => ({ path, texCoord: i + 1 })),
  };
  if (record.ambient !== undefined) {
    const [ar, ag, ab] = add3(record.ambient, record.emit);
    extras.ambient = [ar, ag, ab, record.ambient[3]];
  }
  material.setExtras({ zusi: extras });

  if (textures.base !== undefined) {
    const texture = document.createTexture(name).setURI(textures.base);
    material.setBaseColorTexture(texture);
  }
  return material;
}

/**
 * Mesh node for one subset.
 */
export function createSubsetNode(
  document: Document,
  buffer: GltfBuffer,
  name: string,
  vertices: readonly MeshVertex[],
  faces: readonly Face[],
  material: Material | null,
  axes: AxisConversion
): Node {
  const positions = new Float32Array(vertices.length * 3);
  const normals = new Float32Array(vertices.length * 3);
  const uv1 = new Float32Array(vertices.length * 2);
  const uv2 = new Float32Array(vertices.length * 2);

  vertices.forEach((vertex, i) => {
    positions.set(axes.vector(fromZusiVector(vertex.position)), i * 3);
    normals.set(axes.vector(fromZusiVector(vertex.normal)), i * 3);
    uv1.set(vertex.uv1, i * 2);
    uv2.set(vertex.uv2, i * 2);
  });

  const indexCount = faces.length * 3;
  const indices = vertices.length > 0xffff ? new Uint32Array(indexCount) : new Uint16Array(indexCount);
  faces.forEach((face, i) => indices.set(face, i * 3));

  const accessor = (type: 'VEC2' | 'VEC3' | 'SCALAR', array: Float32Array | Uint16Array | Uint32Array) =>
    document.createAccessor().setType(type).setArray(array).setBuffer(buffer);

  const primitive = document.createPrimitive()
    .setMode(Primitive.Mode.TRIANGLES)
    .setAttribute('POSITION', accessor('VEC3', positions))
    .setAttribute('NORMAL', accessor('VEC3', normals))
    .setAttribute('TEXCOORD_0', accessor('VEC2', uv1))
    .setAttribute('TEXCOORD_1', accessor('VEC2', uv2))
    .setIndices(accessor('SCALAR', indices));
  if (material !== null) {
    primitive.setMaterial(material);
  }

  const mesh = document.createMesh(name).addPrimitive(primitive);
  return document.createNode(name).setMesh(mesh);
}

/**
 * Applies a Zusi placement (p, phi, sk) to a node.
 */
export function applyPlacement(node: Node, position: [number, number, number], rotation: [number, number, number], scale: [number, number, number], axes: AxisConversion): Node {
  return node
    .setTranslation(axes.vector(fromZusiVector(position)))
    .setRotation(axes.quat(fromZusiRotation(rotation)))
    .setScale(axes.scale(fromZusiScale(scale)));
}

/**
 * Link metadata in the shape export reads back from `extras.zusi.link`.
 */
export function linkMetadata(record: Ls3LinkRecord, file: string): LinkMetadataInput {
  return {
    file,
    groupName: record.groupName,
    visibleFrom: record.visibleFrom,
    visibleTo: record.visibleTo,
    preloadFactor: record.preloadFactor,
    radius: record.radius,
    brightness: record.brightness,
    lodMask: record.lodMask,
    tile: (record.flags & LINK_FLAGS.TILE) !== 0,
    billboard: (record.flags & LINK_FLAGS.BILLBOARD) !== 0,
    readOnly: (record.flags & LINK_FLAGS.READ_ONLY) !== 0,
    detailTile: (record.flags & LINK_FLAGS.DETAIL_TILE) !== 0,
  };
}
