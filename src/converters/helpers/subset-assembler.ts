/**
 * Subset Assembler
 *
 * Groups the mesh nodes of one file by subset identifier and applies the
 * export scope. Identifiers are computed for every candidate node, visible
 * or not; visibility only decides which nodes contribute geometry.
 */

import { SubsetIdentifier } from '../../core/subset-identifier';
import type { SceneMaterial, SceneMesh, SceneNode } from '../../scene/scene-types';
import { isVisible } from '../../scene/variant-visibility';
import type { ExportScope } from '../../types';
import type { AnimationResolver } from './animation-resolver';

export interface Subset {
  identifier: SubsetIdentifier;
  /** Nodes contributing geometry, in scene order */
  nodes: SceneNode[];
}

export interface AssemblerOptions {
  scope: ExportScope;
  /** Names of the selected nodes */
  selectedNodes: readonly string[];
  variantIds: readonly number[];
}

/**
 * Materials a mesh actually uses, in slot order. A mesh without slots uses
 * the single null material.
 */
export function usedMaterials(mesh: SceneMesh): (SceneMaterial | null)[] {
  if (mesh.materials.length === 0) {
    return mesh.polygons.length > 0 ? [null] : [];
  }
  const used: (SceneMaterial | null)[] = [];
  const seen = new Set<string>();
  const slots = [...new Set(mesh.polygons.map(p => p.materialIndex))].sort((a, b) => a - b);
  for (const slot of slots) {
    const material = mesh.materials[slot] ?? null;
    const key = material?.id ?? '';
    if (!seen.has(key)) {
      seen.add(key);
      used.push(material);
    }
  }
  return used;
}

/**
 * Whether a polygon's slot maps to the given material.
 */
export function polygonUsesMaterial(mesh: SceneMesh, materialIndex: number, material: SceneMaterial | null): boolean {
  if (mesh.materials.length === 0) {
    return material === null;
  }
  const slotMaterial = mesh.materials[materialIndex] ?? null;
  return (slotMaterial?.id ?? null) === (material?.id ?? null);
}

function materialsOfSelection(nodes: readonly SceneNode[], selected: ReadonlySet<string>): Set<string | null> {
  const materials = new Set<string | null>();
  for (const node of nodes) {
    if (node.mesh === null || !selected.has(node.name)) continue;
    for (const material of usedMaterials(node.mesh)) {
      materials.add(material?.id ?? null);
    }
  }
  return materials;
}

/**
 * Builds the subsets of one file from its member nodes. `allNodes` is the
 * whole scene and only matters for the material-based scope.
 */
export function assembleSubsets(
  members: readonly SceneNode[],
  allNodes: readonly SceneNode[],
  resolver: AnimationResolver,
  options: AssemblerOptions
): Subset[] {
  const selected = new Set(options.selectedNodes);
  const selectedMaterials = options.scope === 'SELECTED_MATERIALS'
    ? materialsOfSelection(allNodes, selected)
    : new Set<string | null>();

  const subsets = new Map<string, Subset>();
  const touched = new Set<string>();

  for (const node of members) {
    if (node.mesh === null) continue;
    const nodeSelected = selected.has(node.name);

    for (const material of usedMaterials(node.mesh)) {
      if (options.scope === 'SELECTED_OBJECTS' && !nodeSelected) continue;
      if (options.scope === 'SELECTED_MATERIALS' && !selectedMaterials.has(material?.id ?? null)) continue;

      const identifier = new SubsetIdentifier(node.subsetName, material, resolver.animatingNode(node));
      let subset = subsets.get(identifier.key);
      if (subset === undefined) {
        subset = { identifier, nodes: [] };
        subsets.set(identifier.key, subset);
      }
      if (nodeSelected) {
        touched.add(identifier.key);
      }
      if (isVisible(node.visibility, options.variantIds)) {
        subset.nodes.push(node);
      }
    }
  }

  return [...subsets.entries()]
    .filter(([key, subset]) =>
      subset.nodes.length > 0 && (options.scope !== 'SUBSETS_OF_SELECTED' || touched.has(key)))
    .map(([, subset]) => subset)
    .sort((a, b) => SubsetIdentifier.compare(a.identifier, b.identifier));
}
