/**
 * Subset Mesh Builder
 *
 * Bakes the polygons of a subset's nodes into file-local Zusi space and
 * produces vertex and face buffers ready for the optimizer and codec.
 */

import type { Mat4, Vec2 } from '../../types';
import type { SceneMaterial, SceneMesh, SceneNode, SceneTexture } from '../../scene/scene-types';
import { edgeKey } from '../../scene/scene-types';
import { isVisible } from '../../scene/variant-visibility';
import { determinant3, normalTransformer, transformPoint } from '../../utils/matrix-utils';
import { horizontalLength, toZusiVector } from '../../utils/zusi-coordinates';
import type { Face, OptimizerVertex } from '../shared/mesh-types';
import { relativeTransform } from './relative-transform';
import { polygonUsesMaterial, type Subset } from './subset-assembler';

/**
 * UV used where a texture's layer is missing, bottom-left origin.
 */
const DEFAULT_UV: Vec2 = [0, 1];

const MAX_TEXTURES = 2;

export interface SubsetMesh {
  vertices: OptimizerVertex[];
  faces: Face[];
  /** Largest horizontal distance of a vertex from the file origin */
  boundingRadius: number;
}

/**
 * Textures written for a material: the first two visible in the active
 * variants.
 */
export function activeTextures(material: SceneMaterial | null, variantIds: readonly number[]): SceneTexture[] {
  if (material === null) {
    return [];
  }
  return material.textures
    .filter(texture => isVisible(texture.visibility, variantIds))
    .slice(0, MAX_TEXTURES);
}

/**
 * Transform baking a subset node into its file: relative to the file root
 * for static subsets, relative to the animating node otherwise (whose own
 * motion goes into keyframes).
 */
export function subsetNodeTransform(node: SceneNode, animatingNode: SceneNode | null, fileRoot: SceneNode | null): Mat4 {
  if (animatingNode === null || animatingNode === fileRoot) {
    return relativeTransform(node, fileRoot, fileRoot);
  }
  return relativeTransform(node, animatingNode, fileRoot);
}

function uvLayerIndex(mesh: SceneMesh, texture: SceneTexture | undefined): number {
  if (texture === undefined) {
    return -1;
  }
  if (texture.uvLayer === '') {
    return mesh.uvLayers.length > 0 ? 0 : -1;
  }
  return mesh.uvLayers.indexOf(texture.uvLayer);
}

export function buildSubsetMesh(
  subset: Subset,
  fileRoot: SceneNode | null,
  variantIds: readonly number[]
): SubsetMesh {
  const { material, animatingNode } = subset.identifier;
  const textures = activeTextures(material, variantIds);
  const vertices: OptimizerVertex[] = [];
  const faces: Face[] = [];
  let boundingRadius = 0;

  for (const node of subset.nodes) {
    const mesh = node.mesh;
    if (mesh === null) continue;

    const matrix = subsetNodeTransform(node, animatingNode, fileRoot);
    const transformNormal = normalTransformer(matrix);
    const mirrored = determinant3(matrix) < 0;
    const layers = [uvLayerIndex(mesh, textures[0]), uvLayerIndex(mesh, textures[1])];

    for (const polygon of mesh.polygons) {
      if (!polygonUsesMaterial(mesh, polygon.materialIndex, material)) continue;

      const corners = polygon.corners;
      const base = vertices.length;
      const sharp = corners.map((corner, i) => {
        const next = corners[(i + 1) % corners.length];
        const previous = corners[(i + corners.length - 1) % corners.length];
        return mesh.sharpEdges.has(edgeKey(corner, next)) || mesh.sharpEdges.has(edgeKey(previous, corner));
      });

      corners.forEach((corner, i) => {
        const position = toZusiVector(transformPoint(matrix, mesh.positions[corner]));
        const [uv1, uv2] = layers.map(layer => layer >= 0 ? polygon.uvs[layer][i] : DEFAULT_UV);
        boundingRadius = Math.max(boundingRadius, horizontalLength(position));

        vertices.push({
          position,
          normal: toZusiVector(transformNormal(polygon.normals[i])),
          uv1: [uv1[0], 1 - uv1[1]],
          uv2: [uv2[0], 1 - uv2[1]],
          originalIndex: vertices.length,
          noMerge: sharp[i],
        });
      });

      // Fan triangulation; mirrored transforms flip the winding back
      for (let k = 1; k < corners.length - 1; k++) {
        faces.push(mirrored ? [base + k + 1, base + k, base] : [base, base + k, base + k + 1]);
      }
    }
  }

  return { vertices, faces, boundingRadius };
}
