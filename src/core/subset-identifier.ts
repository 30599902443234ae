/**
 * Subset Identifier
 *
 * Geometry that shares a subset name, a material and the node animating it
 * ends up in one SubSet element. The identifier is a value object with a
 * string key for map lookups and a total order for deterministic output.
 */

import type { SceneMaterial, SceneNode } from '../scene/scene-types';

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Orders nullable named entities: null first, then by name, then by id.
 */
function compareNamed<T extends { readonly id: string; readonly name: string }>(a: T | null, b: T | null): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }
  return compareStrings(a.name, b.name) || compareStrings(a.id, b.id);
}

export class SubsetIdentifier {
  readonly key: string;

  constructor(
    readonly subsetName: string,
    readonly material: SceneMaterial | null,
    readonly animatingNode: SceneNode | null
  ) {
    this.key = JSON.stringify([subsetName, material?.id ?? null, animatingNode?.id ?? null]);
  }

  equals(other: SubsetIdentifier): boolean {
    return this.key === other.key;
  }

  static compare(a: SubsetIdentifier, b: SubsetIdentifier): number {
    return compareStrings(a.subsetName, b.subsetName)
      || compareNamed(a.material, b.material)
      || compareNamed(a.animatingNode, b.animatingNode);
  }
}
