/**
 * Material color model
 *
 * The simulator always shows the night color (Ce) and adds diffuse (Cd)
 * and ambient (Ca) by day, so the night color is capped at the day colors
 * and subtracted from them.
 */

import type { Vec3 } from '../types';
import type { SceneMaterial } from '../scene/scene-types';
import { formatColor } from './xml-formatter';

export interface MaterialColors {
  diffuse: string;
  ambient?: string;
  emit?: string;
}

const clamp01 = (v: Vec3): Vec3 => [
  Math.min(1, Math.max(0, v[0])),
  Math.min(1, Math.max(0, v[1])),
  Math.min(1, Math.max(0, v[2])),
];

export function computeMaterialColors(material: SceneMaterial): MaterialColors {
  let diffuse: Vec3 = [...material.diffuse];
  let ambient: Vec3 = material.ambient ? [material.ambient[0], material.ambient[1], material.ambient[2]] : [1, 1, 1];
  const useEmit = material.emit !== null && material.emit.some(c => c > 0);

  let emit: Vec3 = [0, 0, 0];
  if (useEmit && material.emit) {
    const e = material.emit;
    emit = [
      Math.min(e[0], diffuse[0], ambient[0]),
      Math.min(e[1], diffuse[1], ambient[1]),
      Math.min(e[2], diffuse[2], ambient[2]),
    ];
    diffuse = [diffuse[0] - emit[0], diffuse[1] - emit[1], diffuse[2] - emit[2]];
    ambient = [ambient[0] - emit[0], ambient[1] - emit[1], ambient[2] - emit[2]];
  }

  if (material.overexposure || material.overexposureAmbient) {
    const add = material.overexposure ?? [0, 0, 0];
    const addAmbient = material.overexposureAmbient ?? [0, 0, 0];
    diffuse = clamp01([diffuse[0] + add[0], diffuse[1] + add[1], diffuse[2] + add[2]]);
    ambient = clamp01([ambient[0] + addAmbient[0], ambient[1] + addAmbient[1], ambient[2] + addAmbient[2]]);
  }

  const colors: MaterialColors = {
    diffuse: formatColor(diffuse[0], diffuse[1], diffuse[2], material.alpha),
  };
  if (material.ambient) {
    colors.ambient = formatColor(ambient[0], ambient[1], ambient[2], material.ambient[3]);
  }
  if (useEmit) {
    // Night color alpha is ignored by the simulator
    colors.emit = formatColor(emit[0], emit[1], emit[2], 0);
  }
  return colors;
}

/**
 * Maps raw depth offsets to integer buckets: positive offsets ascending to
 * 1..n, negative offsets descending to -1..-n, zero to 0.
 */
export function buildZBiasMap(materials: readonly SceneMaterial[]): Map<number, number> {
  const offsets = [...new Set(materials.map(m => m.zOffset))];
  const positive = offsets.filter(o => o > 0).sort((a, b) => a - b);
  const negative = offsets.filter(o => o < 0).sort((a, b) => b - a);

  const map = new Map<number, number>([[0, 0]]);
  positive.forEach((offset, i) => map.set(offset, i + 1));
  negative.forEach((offset, i) => map.set(offset, -(i + 1)));
  return map;
}
