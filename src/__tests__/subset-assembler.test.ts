import { describe, it, expect } from 'vitest';
import { AnimationResolver } from '../converters/helpers/animation-resolver';
import { assembleSubsets, polygonUsesMaterial, usedMaterials } from '../converters/helpers/subset-assembler';
import type { SceneMesh } from '../scene/scene-types';
import type { ExportScope } from '../types';
import { FakeSceneHost, UNIT_TRIANGLE, makeClip, triangleMesh } from './fixtures/fake-scene';

function buildScene() {
  const host = new FakeSceneHost();
  const metal = host.addMaterial('Metal');
  const tiles = host.addMaterial('Tiles');
  const body1 = host.addNode({ name: 'Body1', subsetName: 'Body', mesh: triangleMesh(UNIT_TRIANGLE, metal) });
  const body2 = host.addNode({ name: 'Body2', subsetName: 'Body', mesh: triangleMesh(UNIT_TRIANGLE, metal) });
  const roof = host.addNode({ name: 'Roof', mesh: triangleMesh(UNIT_TRIANGLE, tiles) });
  return { host, metal, tiles, body1, body2, roof };
}

function assemble(scope: ExportScope, selectedNodes: string[] = [], variantIds: number[] = []) {
  const scene = buildScene();
  const subsets = assembleSubsets(scene.host.nodes, scene.host.nodes, new AnimationResolver(false), {
    scope,
    selectedNodes,
    variantIds,
  });
  return { ...scene, subsets };
}

describe('assembleSubsets', () => {
  it('groups nodes sharing subset name and material, sorted by identifier', () => {
    const { subsets, body1, body2, roof, metal, tiles } = assemble('ALL');

    expect(subsets).toHaveLength(2);
    expect(subsets[0].identifier.subsetName).toBe('');
    expect(subsets[0].identifier.material).toBe(tiles);
    expect(subsets[0].nodes).toEqual([roof]);
    expect(subsets[1].identifier.subsetName).toBe('Body');
    expect(subsets[1].identifier.material).toBe(metal);
    expect(subsets[1].nodes).toEqual([body1, body2]);
  });

  it('keeps whole subsets touched by a selected node', () => {
    const { subsets, body1, body2 } = assemble('SUBSETS_OF_SELECTED', ['Body1']);

    expect(subsets).toHaveLength(1);
    expect(subsets[0].nodes).toEqual([body1, body2]);
  });

  it('keeps a subset touched only by a hidden selected node', () => {
    const host = new FakeSceneHost();
    host.addNode({ name: 'Snow', subsetName: 'Roof', mesh: triangleMesh(UNIT_TRIANGLE), visibility: { mode: 'show', ids: [2] } });
    const tiles = host.addNode({ name: 'Tiles', subsetName: 'Roof', mesh: triangleMesh(UNIT_TRIANGLE) });
    host.addNode({ name: 'Wall', subsetName: 'Wall', mesh: triangleMesh(UNIT_TRIANGLE) });

    const subsets = assembleSubsets(host.nodes, host.nodes, new AnimationResolver(false), {
      scope: 'SUBSETS_OF_SELECTED',
      selectedNodes: ['Snow'],
      variantIds: [1],
    });
    expect(subsets).toHaveLength(1);
    expect(subsets[0].identifier.subsetName).toBe('Roof');
    expect(subsets[0].nodes).toEqual([tiles]);
  });

  it('keeps only selected nodes for the object scope', () => {
    const { subsets, body1 } = assemble('SELECTED_OBJECTS', ['Body1']);

    expect(subsets).toHaveLength(1);
    expect(subsets[0].nodes).toEqual([body1]);
  });

  it('keeps every node using a material of the selection', () => {
    const { subsets, roof } = assemble('SELECTED_MATERIALS', ['Roof']);

    expect(subsets).toHaveLength(1);
    expect(subsets[0].nodes).toEqual([roof]);
  });

  it('leaves nodes hidden in the active variants out of the geometry', () => {
    const host = new FakeSceneHost();
    const shown = host.addNode({ name: 'Summer', mesh: triangleMesh(UNIT_TRIANGLE) });
    host.addNode({ name: 'Winter', mesh: triangleMesh(UNIT_TRIANGLE), visibility: { mode: 'show', ids: [2] } });

    const subsets = assembleSubsets(host.nodes, host.nodes, new AnimationResolver(false), {
      scope: 'ALL',
      selectedNodes: [],
      variantIds: [1],
    });
    expect(subsets).toHaveLength(1);
    expect(subsets[0].nodes).toEqual([shown]);
  });

  it('drops subsets whose nodes are all hidden', () => {
    const host = new FakeSceneHost();
    host.addNode({ name: 'Winter', mesh: triangleMesh(UNIT_TRIANGLE), visibility: { mode: 'hide', ids: [1] } });

    const subsets = assembleSubsets(host.nodes, host.nodes, new AnimationResolver(false), {
      scope: 'ALL',
      selectedNodes: [],
      variantIds: [1],
    });
    expect(subsets).toEqual([]);
  });

  it('splits a subset by animating node', () => {
    const host = new FakeSceneHost();
    const door = host.addNode({ name: 'Door', clip: makeClip('open') });
    const panel = host.addNode({ name: 'Panel', parent: door, mesh: triangleMesh(UNIT_TRIANGLE) });
    const frame = host.addNode({ name: 'Frame', mesh: triangleMesh(UNIT_TRIANGLE) });

    const subsets = assembleSubsets(host.nodes, host.nodes, new AnimationResolver(true), {
      scope: 'ALL',
      selectedNodes: [],
      variantIds: [],
    });
    expect(subsets.map(s => s.identifier.animatingNode)).toEqual([null, door]);
    expect(subsets.map(s => s.nodes)).toEqual([[frame], [panel]]);
  });
});

describe('usedMaterials', () => {
  it('lists each material once in slot order', () => {
    const host = new FakeSceneHost();
    const a = host.addMaterial('A');
    const b = host.addMaterial('B');
    const mesh: SceneMesh = {
      ...triangleMesh(UNIT_TRIANGLE),
      polygons: [2, 0, 1, 0].map(materialIndex => ({
        corners: [0, 1, 2],
        normals: [[0, 0, 1], [0, 0, 1], [0, 0, 1]],
        uvs: [],
        materialIndex,
      })),
      materials: [b, a, b],
    };

    expect(usedMaterials(mesh)).toEqual([b, a]);
    expect(polygonUsesMaterial(mesh, 2, b)).toBe(true);
    expect(polygonUsesMaterial(mesh, 1, b)).toBe(false);
  });

  it('uses the null material for meshes without slots', () => {
    const mesh = triangleMesh(UNIT_TRIANGLE);
    expect(usedMaterials(mesh)).toEqual([null]);
    expect(polygonUsesMaterial(mesh, 0, null)).toBe(true);
  });
});
