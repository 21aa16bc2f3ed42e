/**
 * Zod Schemas for Build Shape Scaler
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { LogLevelSchema, ScaleTagSchema } from './base-schemas';

/**
 * Scaler Configuration Schema
 */
export const ScalerConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  templatesDir: z.string().min(1, 'Templates directory cannot be empty').optional().default(DEFAULT_CONFIG.TEMPLATES_DIR),
  outputDir: z.string().min(1, 'Output directory cannot be empty').optional().default(DEFAULT_CONFIG.OUTPUT_DIR),
  // Restrict the run to these scale tags; all template factors when omitted
  scales: z.array(ScaleTagSchema).min(1, 'At least one scale tag is required when scales are given').optional(),
  concurrency: z.number().int().positive().optional().default(DEFAULT_CONFIG.CONCURRENCY),
  logLevel: LogLevelSchema.optional().default(DEFAULT_CONFIG.LOG_LEVEL),
});

/**
 * Input Paths Schema
 */
export const InputPathsSchema = z.array(z.string().min(1, 'Input path cannot be empty'));

/**
 * Type exports for TypeScript inference
 */
export type ScalerConfig = z.infer<typeof ScalerConfigSchema>;
export type ScalerConfigInput = z.input<typeof ScalerConfigSchema>;
export type LogLevelName = z.infer<typeof LogLevelSchema>;

// Re-export base schemas
export { DocumentKindSchema, TransformKindNameSchema, LogLevelSchema, ScaleTagSchema } from './base-schemas';

// Re-export template schemas
export {
  TemplateDefinitionSchema,
  ScaleFactorValueSchema,
  FieldPathSchema,
  type TemplateDefinition,
  type TemplateDefinitionInput,
} from './template-schemas';
