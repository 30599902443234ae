import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { locateZusiFile, lsbPathFor, splitOutputName, subFileName, toZusiPath } from '../utils/path-utils';

describe('output names', () => {
  it('splits at the first dot', () => {
    expect(splitOutputName('scene.lod1.ls3')).toEqual(['scene', '.lod1.ls3']);
    expect(splitOutputName('scene')).toEqual(['scene', '']);
  });

  it('inserts the root name before all extensions', () => {
    expect(subFileName('scene.lod1.ls3', 'Arm')).toBe('scene_Arm.lod1.ls3');
    expect(subFileName('scene.ls3', 'Door.001')).toBe('scene_Door.001.ls3');
  });

  it('replaces only the last extension for the binary companion', () => {
    expect(lsbPathFor(path.join('out', 'scene.lod1.ls3'))).toBe(path.join('out', 'scene.lod1.lsb'));
  });
});

describe('toZusiPath', () => {
  const base = path.resolve(os.tmpdir(), 'zusi-paths');
  const dataDirectory = path.join(base, 'data');
  const exportDirectory = path.join(dataDirectory, 'export');

  it('writes the bare name for files next to the export', () => {
    expect(toZusiPath(path.join(exportDirectory, 'wall.dds'), exportDirectory, dataDirectory)).toBe('wall.dds');
  });

  it('writes paths below the data directory relative to it with backslashes', () => {
    const texture = path.join(dataDirectory, 'textures', 'brick', 'wall.dds');
    expect(toZusiPath(texture, exportDirectory, dataDirectory)).toBe('textures\\brick\\wall.dds');
  });

  it('writes other paths absolute', () => {
    const texture = path.join(base, 'elsewhere', 'wall.dds');
    expect(toZusiPath(texture, exportDirectory, dataDirectory)).toBe(texture.split(path.sep).join('\\'));
    expect(toZusiPath(texture, exportDirectory, '')).toBe(texture.split(path.sep).join('\\'));
  });
});

describe('locateZusiFile', () => {
  let root = '';

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'zusi-locate-'));
    fs.mkdirSync(path.join(root, 'data', 'signals'), { recursive: true });
    fs.mkdirSync(path.join(root, 'scene'));
    fs.writeFileSync(path.join(root, 'data', 'signals', 'lamp.ls3'), '');
    fs.writeFileSync(path.join(root, 'scene', 'local.ls3'), '');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('finds files next to the referencing file', () => {
    expect(locateZusiFile('local.ls3', path.join(root, 'scene'), '')).toBe(path.join(root, 'scene', 'local.ls3'));
  });

  it('finds backslash paths below the data directory', () => {
    expect(locateZusiFile('signals\\lamp.ls3', path.join(root, 'scene'), path.join(root, 'data')))
      .toBe(path.join(root, 'data', 'signals', 'lamp.ls3'));
  });

  it('returns undefined when no candidate exists', () => {
    expect(locateZusiFile('missing.ls3', path.join(root, 'scene'), path.join(root, 'data'))).toBeUndefined();
  });
});
