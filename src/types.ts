/**
 * Shared geometric types
 */

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

/**
 * Quaternion stored as (x, y, z, w).
 */
export type Quat = [number, number, number, number];

/**
 * 4x4 matrix, column-major (same layout as glTF node matrices).
 */
export type Mat4 = number[];

/**
 * Translation, rotation and scale of a node relative to its parent.
 */
export interface Transform {
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
}

export type {
  ExportConfig,
  ImportConfig,
  ExportScope,
  LinkedFilesMode,
  UpAxis,
} from './schemas';
