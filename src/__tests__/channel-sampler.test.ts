import { describe, it, expect } from 'vitest';
import { sampleCurve, type ChannelCurve } from '../scene/channel-sampler';
import { isVisible } from '../scene/variant-visibility';

const SLIDE: ChannelCurve = {
  times: [0, 1],
  values: [[0, 0, 0], [10, 20, 30]],
  interpolation: 'LINEAR',
  isRotation: false,
};

describe('sampleCurve', () => {
  it('interpolates linearly between keys', () => {
    expect(sampleCurve(SLIDE, 0.25)).toEqual([2.5, 5, 7.5]);
  });

  it('clamps outside the key range', () => {
    expect(sampleCurve(SLIDE, -1)).toEqual([0, 0, 0]);
    expect(sampleCurve(SLIDE, 5)).toEqual([10, 20, 30]);
  });

  it('holds the previous key for step curves', () => {
    const curve: ChannelCurve = { times: [0, 1, 2], values: [[1], [2], [3]], interpolation: 'STEP', isRotation: false };
    expect(sampleCurve(curve, 0.99)).toEqual([1]);
    expect(sampleCurve(curve, 1.5)).toEqual([2]);
  });

  it('interpolates rotations spherically', () => {
    const curve: ChannelCurve = {
      times: [0, 2],
      values: [[0, 0, 0, 1], [0, 0, Math.SQRT1_2, Math.SQRT1_2]],
      interpolation: 'LINEAR',
      isRotation: true,
    };
    const q = sampleCurve(curve, 1);

    expect(q[0]).toBe(0);
    expect(q[1]).toBe(0);
    expect(q[2]).toBeCloseTo(Math.sin(Math.PI / 8), 10);
    expect(q[3]).toBeCloseTo(Math.cos(Math.PI / 8), 10);
  });

  it('evaluates cubic spline values between keys', () => {
    const curve: ChannelCurve = {
      times: [0, 1],
      values: [[0], [0], [0], [0], [1], [0]],
      interpolation: 'CUBICSPLINE',
      isRotation: false,
    };
    expect(sampleCurve(curve, 0.5)).toEqual([0.5]);
    expect(sampleCurve(curve, 1)).toEqual([1]);
  });

  it('returns nothing for an empty curve', () => {
    expect(sampleCurve({ times: [], values: [], interpolation: 'LINEAR', isRotation: false }, 0)).toEqual([]);
  });
});

describe('isVisible', () => {
  it('shows everything when no variant is requested', () => {
    expect(isVisible({ mode: 'show', ids: [2] }, [])).toBe(true);
  });

  it('limits show lists to the listed variants', () => {
    expect(isVisible({ mode: 'show', ids: [1, 2] }, [2])).toBe(true);
    expect(isVisible({ mode: 'show', ids: [1, 2] }, [3])).toBe(false);
  });

  it('removes objects from hidden variants', () => {
    expect(isVisible({ mode: 'hide', ids: [1] }, [1])).toBe(false);
    expect(isVisible({ mode: 'hide', ids: [1] }, [4])).toBe(true);
  });

  it('shows objects without a setting', () => {
    expect(isVisible(null, [1])).toBe(true);
  });
});
