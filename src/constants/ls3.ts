/**
 * LS3-Specific Constants
 *
 * Element and attribute names of the LS3 companion format, plus the fixed
 * values of the file header.
 */

/**
 * LS3 Element Names
 */
export const LS3_ELEMENTS = {
  ROOT: 'Zusi',
  INFO: 'Info',
  AUTHOR: 'AutorEintrag',
  LANDSCAPE: 'Landschaft',
  LINK: 'Verknuepfte',
  FILE: 'Datei',
  LSB: 'lsb',
  SUBSET: 'SubSet',
  RENDER_FLAGS: 'RenderFlags',
  TEXTURE_STAGES: ['SubSetTexFlags', 'SubSetTexFlags2', 'SubSetTexFlags3'],
  TEXTURE: 'Textur',
  VERTEX: 'Vertex',
  FACE: 'Face',
  POSITION: 'p',
  NORMAL: 'n',
  ROTATION: 'phi',
  SCALE: 'sk',
  QUATERNION: 'q',
  ANIMATION: 'Animation',
  ANIMATION_NUMBER: 'AniNrs',
  MESH_ANIMATION: 'MeshAnimation',
  LINK_ANIMATION: 'VerknAnimation',
  KEYFRAME: 'AniPunkt',
  ANCHOR_POINT: 'Ankerpunkt',
} as const;

/**
 * LS3 File Header Values
 */
export const LS3_INFO = {
  FILE_TYPE: 'Landschaft',
  VERSION: 'A.1',
  MIN_VERSION: 'A.1',
} as const;

/**
 * Bits of the Flags attribute on external links
 */
export const LINK_FLAGS = {
  TILE: 4,
  BILLBOARD: 8,
  READ_ONLY: 16,
  DETAIL_TILE: 32,
} as const;

/**
 * Binary record layout of the LSB companion file
 */
export const LSB_LAYOUT = {
  FLOATS_PER_VERTEX: 10,
  VERTEX_RECORD_SIZE: 40,
  FACE_RECORD_SIZE: 6,
  MAX_INDEX: 0xffff,
} as const;

/**
 * Default material values written when a subset has no material
 */
export const MATERIAL_DEFAULTS = {
  LANDSCAPE_TYPE: '0',
  GF_TYPE: '0',
  TEXTURE_PRESET: '1',
  // Presets other than this one select a fixed render state in Zusi
  CUSTOM_TEXTURE_PRESET: '0',
} as const;

/**
 * Direct3D render and sampler state of a custom texture preset
 */
export const RENDER_STATE_DEFAULTS = {
  SHADE_MODE: 2,
  SRC_BLEND: 5,
  DEST_BLEND: 6,
  ALPHA_REF: 0,
  MIN_FILTER: 2,
  MAG_FILTER: 2,
  COLOR_OP: 4,
  ALPHA_OP: 4,
  ARG_DIFFUSE: 0,
  ARG_CURRENT: 1,
  ARG_TEXTURE: 2,
  TEXTURE_STAGE_COUNT: 3,
} as const;

/**
 * Attributes of a SubSetTexFlags element and the texture stage field each holds
 */
export const TEXTURE_STAGE_ATTRIBUTES = [
  ['MINFILTER', 'minFilter'],
  ['MAGFILTER', 'magFilter'],
  ['COLOROP', 'colorOp'],
  ['COLORARG1', 'colorArg1'],
  ['COLORARG2', 'colorArg2'],
  ['COLORARG0', 'colorArg0'],
  ['ALPHAOP', 'alphaOp'],
  ['ALPHAARG1', 'alphaArg1'],
  ['ALPHAARG2', 'alphaArg2'],
  ['ALPHAARG0', 'alphaArg0'],
  ['RESULTARG', 'resultArg'],
] as const;

export const UTF8_BOM = '\uFEFF';
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
