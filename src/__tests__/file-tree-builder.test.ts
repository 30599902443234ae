import { describe, it, expect } from 'vitest';
import { AnimationResolver } from '../converters/helpers/animation-resolver';
import { postOrderFiles } from '../converters/helpers/bounding-radius-aggregator';
import { FileTreeBuilder, type FileTreeOptions } from '../converters/helpers/file-tree-builder';
import { LinkMetadataSchema } from '../schemas';
import type { SceneNode } from '../scene/scene-types';
import { FakeSceneHost, UNIT_TRIANGLE, makeClip, triangleMesh } from './fixtures/fake-scene';

const OPTIONS: FileTreeOptions = {
  mainFileName: 'crane.lod1.ls3',
  contributesGeometry: (node: SceneNode) => node.mesh !== null,
  includeLink: () => true,
};

function buildCrane() {
  const host = new FakeSceneHost();
  const crane = host.addNode({ name: 'Crane', clip: makeClip('turn') });
  const arm = host.addNode({ name: 'Arm', parent: crane, clip: makeClip('lift') });
  const hook = host.addNode({ name: 'Hook', parent: arm, mesh: triangleMesh(UNIT_TRIANGLE) });
  const cab = host.addNode({ name: 'Cab', parent: crane, mesh: triangleMesh(UNIT_TRIANGLE) });
  const lamp = host.addNode({
    name: 'Lamp',
    parent: cab,
    link: LinkMetadataSchema.parse({ file: 'lamp.ls3' }),
  });
  const base = host.addNode({ name: 'Base', mesh: triangleMesh(UNIT_TRIANGLE) });
  return { host, crane, arm, hook, cab, lamp, base };
}

describe('FileTreeBuilder', () => {
  it('roots a generated file at the second animated node above geometry', () => {
    const { host, crane, hook, cab, base } = buildCrane();
    const builder = new FileTreeBuilder(host.nodes, new AnimationResolver(true));

    expect(builder.fileRoot(hook)).toBe(crane);
    expect(builder.fileRoot(cab)).toBeNull();
    expect(builder.fileRoot(base)).toBeNull();
    expect(builder.fileRoot(crane)).toBeNull();
  });

  it('names generated files after their root and keeps multi-dot extensions', () => {
    const { host } = buildCrane();
    const forest = new FileTreeBuilder(host.nodes, new AnimationResolver(true)).build(OPTIONS);

    expect(forest.files.map(file => file.filename)).toEqual(['crane.lod1.ls3', 'crane_Crane.lod1.ls3']);
    expect(forest.files[0]).toBe(forest.main);
    expect(forest.main.isMainFile).toBe(true);
    expect(forest.files[1].isMainFile).toBe(false);
  });

  it('assigns every node below a file root to that file', () => {
    const { host, crane, arm, hook, cab, lamp, base } = buildCrane();
    const forest = new FileTreeBuilder(host.nodes, new AnimationResolver(true)).build(OPTIONS);
    const craneFile = forest.files[1];

    expect(craneFile.root).toBe(crane);
    expect(craneFile.members).toEqual([crane, arm, hook, cab, lamp]);
    expect(forest.main.members).toEqual([base]);
  });

  it('registers links with the file owning the link node parent', () => {
    const { host, crane, lamp } = buildCrane();
    const forest = new FileTreeBuilder(host.nodes, new AnimationResolver(true)).build(OPTIONS);
    const craneFile = forest.files[1];

    expect(forest.main.links).toHaveLength(1);
    expect(forest.main.links[0].kind).toBe('generated');
    expect(forest.main.links[0].node).toBe(crane);
    expect(craneFile.links.map(link => [link.kind, link.node])).toEqual([['external', lamp]]);
    expect(postOrderFiles(forest)).toEqual([craneFile, forest.main]);
  });

  it('puts everything in the main file when animations are not exported', () => {
    const { host } = buildCrane();
    const forest = new FileTreeBuilder(host.nodes, new AnimationResolver(false)).build(OPTIONS);

    expect(forest.files).toEqual([forest.main]);
    expect(forest.main.members).toHaveLength(6);
    expect(forest.main.links.map(link => link.kind)).toEqual(['external']);
  });

  it('leaves out links the options exclude', () => {
    const { host } = buildCrane();
    const forest = new FileTreeBuilder(host.nodes, new AnimationResolver(false)).build({
      ...OPTIONS,
      includeLink: () => false,
    });
    expect(forest.main.links).toEqual([]);
  });

  it('nests generated files for three animated levels', () => {
    const host = new FakeSceneHost();
    const tower = host.addNode({ name: 'Tower', clip: makeClip('a') });
    const jib = host.addNode({ name: 'Jib', parent: tower, clip: makeClip('b') });
    const trolley = host.addNode({ name: 'Trolley', parent: jib, clip: makeClip('c') });
    host.addNode({ name: 'Load', parent: trolley, mesh: triangleMesh(UNIT_TRIANGLE) });

    const forest = new FileTreeBuilder(host.nodes, new AnimationResolver(true)).build({
      ...OPTIONS,
      mainFileName: 'tower.ls3',
    });

    expect(forest.files.map(file => file.filename)).toEqual(['tower.ls3', 'tower_Tower.ls3', 'tower_Jib.ls3']);
    expect(forest.main.links.map(link => link.node)).toEqual([tower]);
    expect(forest.files[1].links.map(link => link.node)).toEqual([jib]);
  });
});
