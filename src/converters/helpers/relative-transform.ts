/**
 * Relative Transform
 *
 * Each generated file stores geometry relative to its root node. Nodes
 * between a subset's animating node and the file root contribute only their
 * scale; the placement of the animating node itself is carried by keyframes.
 */

import type { Mat4 } from '../../types';
import type { SceneNode } from '../../scene/scene-types';
import { identityMatrix, multiplyMatrices, scaleMatrix, transformToMatrix } from '../../utils/matrix-utils';

/**
 * Transform of `node` relative to `scaleRoot`, evaluated at the host's
 * current frame. Ancestors from `root` up to (excluding) `scaleRoot`
 * contribute scale only; everything strictly below `root` contributes its
 * full local transform. A null `scaleRoot` walks up to the scene root.
 */
export function relativeTransform(node: SceneNode, root: SceneNode | null, scaleRoot: SceneNode | null): Mat4 {
  const chain: Mat4[] = [];
  let reachedRoot = false;

  for (let current: SceneNode | null = node; current !== null && current !== scaleRoot; current = current.parent) {
    if (current === root) {
      reachedRoot = true;
    }
    const local = current.localTransform();
    chain.push(reachedRoot ? scaleMatrix(local.scale) : transformToMatrix(local));
  }

  // chain runs bottom-up; parents multiply from the left
  return chain.reduce((acc, m) => multiplyMatrices(m, acc), identityMatrix());
}

export function worldTransform(node: SceneNode): Mat4 {
  return relativeTransform(node, null, null);
}
