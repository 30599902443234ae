/**
 * Zod Schemas for the LS3 toolkit
 *
 * Export/import configuration. Metadata read from glTF extras lives in
 * ./extras-schemas.
 */

import { z } from 'zod';
import { DEFAULT_EXPORT_CONFIG, DEFAULT_IMPORT_CONFIG, DEFAULT_HOST_CONFIG } from '../constants/config';
import {
  UpAxisSchema,
  ExportScopeSchema,
  LinkedFilesModeSchema,
  ToleranceSchema,
} from './base-schemas';

/**
 * Export Configuration Schema
 */
export const ExportConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_EXPORT_CONFIG.DEBUG),
  exportScope: ExportScopeSchema.optional().default(DEFAULT_EXPORT_CONFIG.EXPORT_SCOPE),
  exportAnimations: z.boolean().optional().default(DEFAULT_EXPORT_CONFIG.EXPORT_ANIMATIONS),
  optimizeMesh: z.boolean().optional().default(DEFAULT_EXPORT_CONFIG.OPTIMIZE_MESH),
  maxCoordDelta: ToleranceSchema.optional().default(DEFAULT_EXPORT_CONFIG.MAX_COORD_DELTA),
  maxUVDelta: ToleranceSchema.optional().default(DEFAULT_EXPORT_CONFIG.MAX_UV_DELTA),
  maxNormalAngle: ToleranceSchema.max(Math.PI, 'Normal angle must not exceed pi').optional().default(DEFAULT_EXPORT_CONFIG.MAX_NORMAL_ANGLE),
  variantIds: z.array(z.number().int().nonnegative()).optional().default([]),
  selectedNodes: z.array(z.string()).optional().default([]),
  writeLsb: z.boolean().optional().default(DEFAULT_EXPORT_CONFIG.WRITE_LSB),
  dataDirectory: z.string().optional().default(''),
  bestEffort: z.boolean().optional().default(DEFAULT_EXPORT_CONFIG.BEST_EFFORT),
  lineSeparator: z.enum(['\r\n', '\n']).optional().default(DEFAULT_EXPORT_CONFIG.LINE_SEPARATOR),
  upAxis: UpAxisSchema.optional().default(DEFAULT_HOST_CONFIG.UP_AXIS),
  framesPerSecond: z.number().positive().optional().default(DEFAULT_HOST_CONFIG.FRAMES_PER_SECOND),
});

/**
 * Import Configuration Schema
 */
export const ImportConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_IMPORT_CONFIG.DEBUG),
  dataDirectory: z.string().optional().default(''),
  linkedFiles: LinkedFilesModeSchema.optional().default(DEFAULT_IMPORT_CONFIG.LINKED_FILES),
  maxEmbedDepth: z.number().int().nonnegative().optional().default(DEFAULT_IMPORT_CONFIG.MAX_EMBED_DEPTH),
  lodMask: z.number().int().nonnegative().optional().default(DEFAULT_IMPORT_CONFIG.LOD_MASK),
  loadAuthorInformation: z.boolean().optional().default(DEFAULT_IMPORT_CONFIG.LOAD_AUTHOR_INFORMATION),
  weldVertices: z.boolean().optional().default(DEFAULT_IMPORT_CONFIG.WELD_VERTICES),
  weldCoordDelta: ToleranceSchema.optional().default(DEFAULT_IMPORT_CONFIG.WELD_COORD_DELTA),
  weldUVDelta: ToleranceSchema.optional().default(DEFAULT_IMPORT_CONFIG.WELD_UV_DELTA),
  weldNormalAngle: ToleranceSchema.optional().default(DEFAULT_IMPORT_CONFIG.WELD_NORMAL_ANGLE),
  upAxis: UpAxisSchema.optional().default(DEFAULT_HOST_CONFIG.UP_AXIS),
});

/**
 * Type exports for TypeScript inference
 */
export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type ExportConfigInput = z.input<typeof ExportConfigSchema>;
export type ImportConfig = z.infer<typeof ImportConfigSchema>;
export type ImportConfigInput = z.input<typeof ImportConfigSchema>;
export type ExportScope = z.infer<typeof ExportScopeSchema>;
export type LinkedFilesMode = z.infer<typeof LinkedFilesModeSchema>;
export type UpAxis = z.infer<typeof UpAxisSchema>;

// Re-export base schemas
export { UpAxisSchema, ExportScopeSchema, LinkedFilesModeSchema } from './base-schemas';
export * from './extras-schemas';
