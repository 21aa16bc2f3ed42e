/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  TEMPLATES_DIR: './templates',
  OUTPUT_DIR: './build-shapes',
  CONCURRENCY: 4,
  LOG_LEVEL: 'info' as const,
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  MATERIAL: '.nl2mat',
  OBJECT: '.nl2sco',
  TEMPLATE: '.xml',
} as const;

/**
 * Placeholder replaced by the scale tag inside a naming suffix
 */
export const SCALE_TAG_PLACEHOLDER = '{tag}';

/**
 * Pattern a scale tag must match to be used as a directory name
 */
export const SCALE_TAG_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Default decimal precision for inverse scaling when the template sets none
 */
export const DEFAULT_INVERSE_PRECISION = 6;
