/**
 * Error Constants for Build Shape Scaler
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  MALFORMED_INPUT_ERROR: 'SCALER_MALFORMED_INPUT',
  UNSUPPORTED_SCALE_FACTOR_ERROR: 'SCALER_UNSUPPORTED_SCALE_FACTOR',
  TEMPLATE_LOAD_ERROR: 'SCALER_TEMPLATE_LOAD',
  REFERENTIAL_INTEGRITY_ERROR: 'SCALER_REFERENTIAL_INTEGRITY',
  IO_WRITE_ERROR: 'SCALER_IO_WRITE',
  CONFIG_VALIDATION_ERROR: 'SCALER_CONFIG_VALIDATION',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  INVALID_CONFIG: 'Invalid configuration provided',
  TEMPLATE_DIR_MISSING: 'Templates directory does not exist',
  TEMPLATE_DIR_EMPTY: 'No template files found',
  TEMPLATE_SCHEMA: 'Template does not match the template schema',
  TEMPLATE_DUPLICATE_KIND: 'More than one template defines rules for the same document type',
  TEMPLATE_SCALE_CONFLICT: 'Scale tag is declared with different factors',
  TEMPLATE_NO_SCALES: 'Templates declare no scale factors',
  TEMPLATE_OBJECT_WITHOUT_MATERIAL: 'An object template requires a material template',
  NO_SCALES_SELECTED: 'None of the requested scale factors is supported',
  OUTPUT_COLLISION: 'Two outputs of the same group resolve to the same path',
  OUTPUT_CLAIMED: 'Another group already writes an output to this path',
  ASSET_CLAIMED: 'Another file is already copied to this path',
  DIRECTORY_UNREADABLE: 'Cannot read directory',
  GROUP_CANCELLED: 'Batch was cancelled before this group was processed',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
