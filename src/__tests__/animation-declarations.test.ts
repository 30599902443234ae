import { describe, it, expect } from 'vitest';
import { SubsetIdentifier } from '../core/subset-identifier';
import {
  buildDeclarations,
  collectFileClips,
  numberAnimations,
  type AnimationNumbering,
} from '../converters/helpers/animation-declarations';
import { AnimationResolver } from '../converters/helpers/animation-resolver';
import type { FileNode } from '../converters/helpers/file-tree-builder';
import { LinkMetadataSchema } from '../schemas';
import { FakeSceneHost, UNIT_TRIANGLE, makeClip, triangleMesh } from './fixtures/fake-scene';

function buildFile() {
  const host = new FakeSceneHost();
  const open = makeClip('open');
  const swing = makeClip('swing', { loop: true });
  const door = host.addNode({ name: 'Door', clip: open });
  const panel = host.addNode({ name: 'Panel', parent: door, mesh: triangleMesh(UNIT_TRIANGLE) });
  const frame = host.addNode({ name: 'Frame', mesh: triangleMesh(UNIT_TRIANGLE) });
  const gate = host.addNode({ name: 'Gate', clip: swing, link: LinkMetadataSchema.parse({ file: 'gate.ls3' }) });
  const metadata = LinkMetadataSchema.parse({ file: 'gate.ls3' });

  const file: FileNode = {
    filename: 'station.ls3',
    isMainFile: true,
    root: null,
    members: [door, panel, frame, gate],
    subsets: [
      { identifier: new SubsetIdentifier('', null, null), nodes: [frame] },
      { identifier: new SubsetIdentifier('', null, door), nodes: [panel] },
    ],
    links: [{ kind: 'external', node: gate, metadata }],
    boundingRadius: 0,
  };
  return { file, open, swing, door, gate };
}

describe('numberAnimations', () => {
  it('numbers animated subsets first and continues with links', () => {
    const { file, open, swing } = buildFile();
    const numbering = numberAnimations(file, new AnimationResolver(true));

    expect(numbering.subsets.map(s => [s.number, s.index, s.clip])).toEqual([[1, 1, open]]);
    expect(numbering.links.map(l => [l.number, l.index, l.clip])).toEqual([[2, 0, swing]]);
  });

  it('treats subsets moved by the file root as static', () => {
    const { file, door } = buildFile();
    const numbering = numberAnimations({ ...file, isMainFile: false, root: door }, new AnimationResolver(true));
    expect(numbering.subsets).toEqual([]);
  });

  it('skips links that do not move when animations are not exported', () => {
    const { file } = buildFile();
    expect(numberAnimations(file, new AnimationResolver(false)).links).toEqual([]);
  });
});

describe('collectFileClips', () => {
  it('collects each driving clip once', () => {
    const { file, open, swing } = buildFile();
    expect(collectFileClips(file, new AnimationResolver(true))).toEqual([open, swing]);
  });

  it('includes clips of generated files below', () => {
    const host = new FakeSceneHost();
    const lift = makeClip('lift');
    const arm = host.addNode({ name: 'Arm', clip: lift });
    const child: FileNode = {
      filename: 'crane_Arm.ls3',
      isMainFile: false,
      root: arm,
      members: [arm],
      subsets: [],
      links: [],
      boundingRadius: 0,
    };
    const main: FileNode = {
      filename: 'crane.ls3',
      isMainFile: true,
      root: null,
      members: [],
      subsets: [],
      links: [{ kind: 'generated', node: arm, file: child }],
      boundingRadius: 0,
    };

    const resolver = new AnimationResolver(true);
    expect(collectFileClips(main, resolver)).toEqual([lift]);
    expect(collectFileClips(child, resolver)).toEqual([]);
  });
});

describe('buildDeclarations', () => {
  it('groups clips per type and sorts by type, description and loop', () => {
    const { file, open, swing } = buildFile();
    const numbering = numberAnimations(file, new AnimationResolver(true));

    expect(buildDeclarations([open, swing], numbering)).toEqual([
      { type: '1', description: 'Zeitlich kontinuierlich', loop: false, numbers: [1] },
      { type: '1', description: 'Zeitlich kontinuierlich (loop)', loop: true, numbers: [2] },
    ]);
  });

  it('declares named clips once per name tag', () => {
    const doors = makeClip('doors', { type: '0', nameTags: ['Door right', 'Door left'] });
    const wipers = makeClip('wipers', { type: '3' });
    const horn = makeClip('horn', { type: '3' });
    const { file } = buildFile();
    const numbering: AnimationNumbering = {
      subsets: [
        { number: 1, index: 0, subset: file.subsets[0], clip: doors },
        { number: 2, index: 1, subset: file.subsets[1], clip: horn },
      ],
      links: [{ number: 3, index: 0, link: file.links[0], clip: wipers }],
    };

    expect(buildDeclarations([doors, wipers, horn], numbering)).toEqual([
      { type: '0', description: 'Door left', loop: false, numbers: [1] },
      { type: '0', description: 'Door right', loop: false, numbers: [1] },
      { type: '3', description: 'Geschwindigkeit (gebremst)', loop: false, numbers: [2, 3] },
    ]);
  });

  it('uses the clip description for unknown types', () => {
    const custom = makeClip('custom', { type: '42', description: 'Sonderfall' });
    const declarations = buildDeclarations([custom], { subsets: [], links: [] });
    expect(declarations).toEqual([{ type: '42', description: 'Sonderfall', loop: false, numbers: [] }]);
  });
});
