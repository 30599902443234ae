/**
 * XML Value Formatter
 *
 * Formats numbers, vectors and colors into LS3 attribute values.
 */

import type { Quat, Vec3 } from '../types';
import type { XmlNode } from '../core/xml-node';

/**
 * Decimal places used for floating point attributes.
 */
export const LS3_FLOAT_PRECISION = 7;

/**
 * Formats a floating point number with consistent precision.
 * Example: 0.36 -> "0.36" (not "0.36000000000000001")
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return '0';
  }
  const trimmed = value.toFixed(LS3_FLOAT_PRECISION).replace(/\.?0+$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * Sets X/Y/Z attributes on a node, leaving out components that format as 0.
 */
export function setXYZ(node: XmlNode, v: Vec3): XmlNode {
  const names = ['X', 'Y', 'Z'] as const;
  names.forEach((name, i) => {
    const text = formatFloat(v[i]);
    if (text !== '0') {
      node.setAttribute(name, text);
    }
  });
  return node;
}

/**
 * Sets X/Y/Z/W attributes, leaving out components below `epsilon` in magnitude.
 */
export function setXYZW(node: XmlNode, q: Quat, epsilon: number): XmlNode {
  const names = ['X', 'Y', 'Z', 'W'] as const;
  names.forEach((name, i) => {
    if (Math.abs(q[i]) >= epsilon) {
      node.setAttribute(name, formatFloat(q[i]));
    }
  });
  return node;
}

export function isZeroVector(v: Vec3): boolean {
  return v[0] === 0 && v[1] === 0 && v[2] === 0;
}

/**
 * Formats a color as "AARRGGBB" (components in [0, 1]).
 */
export function formatColor(r: number, g: number, b: number, a: number): string {
  return [a, r, g, b]
    .map(c => Math.round(Math.min(1, Math.max(0, c)) * 255).toString(16).toUpperCase().padStart(2, '0'))
    .join('');
}

/**
 * Parses "AARRGGBB" into [r, g, b, a]; malformed input yields undefined.
 */
export function parseColor(text: string): [number, number, number, number] | undefined {
  if (!/^[0-9a-fA-F]{8}$/.test(text)) {
    return undefined;
  }
  const byte = (offset: number): number => parseInt(text.slice(offset, offset + 2), 16) / 255;
  return [byte(2), byte(4), byte(6), byte(0)];
}
