/**
 * Error Constants for the LS3 toolkit
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  SCHEMA_VALIDATION_ERROR: 'LS3_SCHEMA_VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'LS3_CONFIG_VALIDATION_ERROR',
  CONVERSION_ERROR: 'LS3_CONVERSION_ERROR',
  FILE_SYSTEM_ERROR: 'LS3_FILE_SYSTEM_ERROR',
  MISSING_RESOURCE_ERROR: 'LS3_MISSING_RESOURCE_ERROR',
  MALFORMED_RECORD_ERROR: 'LS3_MALFORMED_RECORD_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  INVALID_EXPORT_CONFIG: 'Invalid export configuration',
  INVALID_IMPORT_CONFIG: 'Invalid import configuration',
  INVALID_EXTRAS: 'Invalid zusi extras',
  INDEX_OVERFLOW: 'Subset has more vertices than 16-bit indices can address',
  RECORDS_EXCEED_STREAM: 'Declared record counts exceed the available binary data',
  FACE_INDEX_OUT_OF_RANGE: 'Face refers to a vertex outside its subset',
  MISSING_BINARY_STREAM: 'Subset declares mesh data but no binary stream is available',
  FILE_NOT_FOUND: 'File not found',
} as const;

/**
 * Warning Kinds
 */
export const WARNING_KINDS = {
  MISSING_RESOURCE: 'missing_resource',
  SKIPPED_FILE: 'skipped_file',
  AMBIGUOUS_ANIMATION: 'ambiguous_animation',
} as const;
