/**
 * Base Schemas
 *
 * Small validation schemas shared by the config and extras schemas.
 */

import { z } from 'zod';

/**
 * Supported Up Axes Schema
 */
export const UpAxisSchema = z.enum(['Y', 'Z']);

/**
 * Export Scope Schema
 */
export const ExportScopeSchema = z.enum([
  'ALL',
  'SELECTED_OBJECTS',
  'SUBSETS_OF_SELECTED',
  'SELECTED_MATERIALS',
]);

/**
 * How linked files are treated on import
 */
export const LinkedFilesModeSchema = z.enum(['ignore', 'placeholder', 'embed']);

export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);
export const Vec4Schema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * Tolerance Schema (non-negative, finite)
 */
export const ToleranceSchema = z.number().finite().nonnegative();
