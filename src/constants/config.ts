/**
 * Configuration Constants
 */

/**
 * Default Export Configuration Values
 */
export const DEFAULT_EXPORT_CONFIG = {
  DEBUG: false,
  EXPORT_SCOPE: 'ALL' as const,
  EXPORT_ANIMATIONS: false,
  OPTIMIZE_MESH: true,
  MAX_COORD_DELTA: 0.001,
  MAX_UV_DELTA: 0.02,
  // 10 degrees
  MAX_NORMAL_ANGLE: (10 / 360) * 2 * Math.PI,
  WRITE_LSB: true,
  BEST_EFFORT: false,
  LINE_SEPARATOR: '\r\n' as const,
} as const;

/**
 * Default Import Configuration Values
 */
export const DEFAULT_IMPORT_CONFIG = {
  DEBUG: false,
  LINKED_FILES: 'embed' as const,
  MAX_EMBED_DEPTH: 1,
  LOD_MASK: 15,
  LOAD_AUTHOR_INFORMATION: true,
  WELD_VERTICES: false,
  // Welding on import only restores connectivity, so UVs and normals are ignored.
  WELD_COORD_DELTA: 0.001,
  WELD_UV_DELTA: 2,
  WELD_NORMAL_ANGLE: 2 * Math.PI,
} as const;

/**
 * Default Scene Host Values
 */
export const DEFAULT_HOST_CONFIG = {
  FRAMES_PER_SECOND: 24,
  UP_AXIS: 'Y' as const,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  LS3: '.ls3',
  LSB: '.lsb',
  GLB: '.glb',
  GLTF: '.gltf',
} as const;
