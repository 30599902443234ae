import { describe, it, expect } from 'vitest';
import { buildZBiasMap, computeMaterialColors } from '../utils/color-utils';
import { FakeSceneHost } from './fixtures/fake-scene';

describe('computeMaterialColors', () => {
  it('writes only the diffuse color for a plain material', () => {
    const material = new FakeSceneHost().addMaterial('Plain', { diffuse: [1, 0.5, 0] });
    expect(computeMaterialColors(material)).toEqual({ diffuse: 'FFFF8000' });
  });

  it('caps the night color at the day colors and subtracts it from them', () => {
    const material = new FakeSceneHost().addMaterial('Lamp', {
      diffuse: [0.8, 0.8, 0.8],
      ambient: [0.6, 0.6, 0.6, 1],
      emit: [0.2, 0.9, 0],
    });

    expect(computeMaterialColors(material)).toEqual({
      diffuse: 'FF9933CC',
      ambient: 'FF660099',
      emit: '00339900',
    });
  });

  it('ignores a black night color', () => {
    const material = new FakeSceneHost().addMaterial('Dark', { emit: [0, 0, 0] });
    expect(computeMaterialColors(material).emit).toBeUndefined();
  });

  it('adds overexposure and clamps to full brightness', () => {
    const material = new FakeSceneHost().addMaterial('Glare', {
      diffuse: [0.5, 0.9, 0],
      alpha: 0.5,
      overexposure: [0.5, 0.5, 0],
    });
    expect(computeMaterialColors(material).diffuse).toBe('80FFFF00');
  });
});

describe('buildZBiasMap', () => {
  it('buckets positive offsets upwards and negative offsets downwards', () => {
    const host = new FakeSceneHost();
    const materials = [0, 0.5, -1, 2, -0.1, 0.5].map((zOffset, i) => host.addMaterial(`M${i}`, { zOffset }));

    expect([...buildZBiasMap(materials)]).toEqual([
      [0, 0],
      [0.5, 1],
      [2, 2],
      [-0.1, -1],
      [-1, -2],
    ]);
  });
});
