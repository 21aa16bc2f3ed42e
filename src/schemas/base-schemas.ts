/**
 * Base Schemas
 *
 * Common validation schemas shared by the configuration and template schemas.
 */

import { z } from 'zod';
import { SCALE_TAG_PATTERN } from '../constants/config';

/**
 * Document Kind Schema
 */
export const DocumentKindSchema = z.enum(['material', 'object']);

/**
 * Transform Kind Schema
 */
export const TransformKindNameSchema = z.enum(['identity', 'scale-linear', 'scale-inverse', 'filename-suffix']);

/**
 * Log Level Schema
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Scale Tag Schema
 */
export const ScaleTagSchema = z.string()
  .min(1, 'Scale tag cannot be empty')
  .regex(SCALE_TAG_PATTERN, 'Scale tag must start with a letter or digit and may only contain letters, digits, ".", "_" and "-"');
