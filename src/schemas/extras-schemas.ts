/**
 * Schemas for LS3 metadata stored in glTF `extras.zusi`
 *
 * Every glTF property may carry a `zusi` object in its extras. Unknown keys
 * are ignored; present keys must match these shapes.
 */

import { z } from 'zod';
import { MATERIAL_DEFAULTS, RENDER_STATE_DEFAULTS } from '../constants/ls3';
import { Vec3Schema, Vec4Schema } from './base-schemas';

/**
 * Variant visibility: `show` limits an object to the listed variants,
 * `hide` removes it from them.
 */
export const VariantVisibilitySchema = z.object({
  mode: z.enum(['show', 'hide']),
  ids: z.array(z.number().int().nonnegative()),
});

/**
 * Reference to a pre-existing LS3 file placed at a marker node
 */
export const LinkMetadataSchema = z.object({
  file: z.string().min(1, 'Linked file path cannot be empty'),
  groupName: z.string().optional().default(''),
  visibleFrom: z.number().optional().default(0),
  visibleTo: z.number().optional().default(0),
  preloadFactor: z.number().optional().default(0),
  radius: z.number().nonnegative().optional().default(0),
  brightness: z.number().optional().default(0),
  lodMask: z.number().int().min(0).max(15).optional().default(15),
  tile: z.boolean().optional().default(false),
  billboard: z.boolean().optional().default(false),
  readOnly: z.boolean().optional().default(false),
  detailTile: z.boolean().optional().default(false),
});

export const AnchorMetadataSchema = z.object({
  category: z.string().optional().default('0'),
  type: z.string().optional().default('0'),
  description: z.string().optional().default(''),
  files: z.array(z.string()).optional().default([]),
});

export const ConstraintMetadataSchema = z.object({
  target: z.string().min(1),
});

/**
 * Node extras
 */
export const NodeExtrasSchema = z.object({
  subsetName: z.string().optional().default(''),
  constraints: z.array(ConstraintMetadataSchema).optional().default([]),
  link: LinkMetadataSchema.optional(),
  anchor: AnchorMetadataSchema.optional(),
  variants: VariantVisibilitySchema.optional(),
});

/**
 * Additional texture beyond the base color texture
 */
export const TextureMetadataSchema = z.object({
  path: z.string().min(1),
  texCoord: z.number().int().nonnegative().optional().default(0),
  variants: VariantVisibilitySchema.optional(),
});

const D3dValueSchema = z.number().int().nonnegative();

/**
 * Sampler and blend arguments of one texture stage
 */
export const TextureStageSchema = z.object({
  minFilter: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.MIN_FILTER),
  magFilter: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.MAG_FILTER),
  colorOp: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.COLOR_OP),
  colorArg0: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_CURRENT),
  colorArg1: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_TEXTURE),
  colorArg2: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_DIFFUSE),
  alphaOp: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ALPHA_OP),
  alphaArg0: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_CURRENT),
  alphaArg1: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_TEXTURE),
  alphaArg2: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_DIFFUSE),
  resultArg: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.ARG_CURRENT),
});

/**
 * Render state written with texture preset "0"; missing stages take the
 * stage defaults.
 */
export const RenderStateSchema = z.object({
  shadeMode: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.SHADE_MODE),
  srcBlend: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.SRC_BLEND),
  destBlend: D3dValueSchema.optional().default(RENDER_STATE_DEFAULTS.DEST_BLEND),
  alphaBlendEnable: z.boolean().optional().default(false),
  alphaRef: z.number().int().min(0).max(255).optional().default(RENDER_STATE_DEFAULTS.ALPHA_REF),
  textureStages: z.array(TextureStageSchema).max(RENDER_STATE_DEFAULTS.TEXTURE_STAGE_COUNT).optional().default([]),
});

/**
 * Material extras
 */
export const MaterialExtrasSchema = z.object({
  landscapeType: z.string().optional().default(MATERIAL_DEFAULTS.LANDSCAPE_TYPE),
  gfType: z.string().optional().default(MATERIAL_DEFAULTS.GF_TYPE),
  forceBrightness: z.number().optional().default(0),
  signalMagnification: z.number().optional().default(0),
  zOffset: z.number().optional().default(0),
  ambient: Vec4Schema.optional(),
  overexposure: Vec3Schema.optional(),
  overexposureAmbient: Vec3Schema.optional(),
  texturePreset: z.string().optional().default(MATERIAL_DEFAULTS.TEXTURE_PRESET),
  renderState: RenderStateSchema.optional().default({}),
  textures: z.array(TextureMetadataSchema).optional().default([]),
  baseTextureVariants: VariantVisibilitySchema.optional(),
});

/**
 * Primitive extras
 */
export const PrimitiveExtrasSchema = z.object({
  // Vertex index pairs (within the primitive) of edges that must stay split
  sharpEdges: z.array(z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])).optional().default([]),
});

/**
 * Animation extras
 */
export const ClipExtrasSchema = z.object({
  type: z.string().optional().default('0'),
  names: z.array(z.string()).optional().default([]),
  speed: z.number().optional().default(0),
  loop: z.boolean().optional().default(false),
  description: z.string().optional(),
});

export const AuthorMetadataSchema = z.object({
  id: z.number().int().nonnegative().optional().default(0),
  name: z.string().optional().default(''),
  email: z.string().optional().default(''),
  effort: z.number().nonnegative().optional().default(0),
  license: z.string().optional().default('0'),
  remarks: z.string().optional().default(''),
});

export const SceneInfoSchema = z.object({
  objectId: z.string().optional().default(''),
  license: z.string().optional().default(''),
  description: z.string().optional().default(''),
  authors: z.array(AuthorMetadataSchema).optional().default([]),
});

/**
 * Scene (or document root) extras
 */
export const SceneExtrasSchema = z.object({
  info: SceneInfoSchema.optional(),
  frameStart: z.number().int().optional(),
  frameEnd: z.number().int().optional(),
});

export type VariantVisibilityMetadata = z.infer<typeof VariantVisibilitySchema>;
export type LinkMetadata = z.infer<typeof LinkMetadataSchema>;
export type LinkMetadataInput = z.input<typeof LinkMetadataSchema>;
export type AnchorMetadata = z.infer<typeof AnchorMetadataSchema>;
export type NodeExtras = z.infer<typeof NodeExtrasSchema>;
export type TextureMetadata = z.infer<typeof TextureMetadataSchema>;
export type TextureStage = z.infer<typeof TextureStageSchema>;
export type RenderState = z.infer<typeof RenderStateSchema>;
export type MaterialExtras = z.infer<typeof MaterialExtrasSchema>;
export type PrimitiveExtras = z.infer<typeof PrimitiveExtrasSchema>;
export type ClipExtras = z.infer<typeof ClipExtrasSchema>;
export type AuthorMetadata = z.infer<typeof AuthorMetadataSchema>;
export type SceneInfo = z.infer<typeof SceneInfoSchema>;
export type SceneExtras = z.infer<typeof SceneExtrasSchema>;
