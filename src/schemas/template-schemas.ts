/**
 * Template Schemas
 *
 * Shape of a template file once its markup has been read into plain values.
 */

import { z } from 'zod';
import { DocumentKindSchema, ScaleTagSchema, TransformKindNameSchema } from './base-schemas';

/**
 * Scale factor written as a decimal (`2`, `0.5`) or a ratio (`1/2`)
 */
export const ScaleFactorValueSchema = z.string()
  .trim()
  .regex(/^\d+(?:\.\d+)?(?:\/\d+(?:\.\d+)?)?$/, 'Scale factor must be a positive number or a ratio such as 1/2')
  .transform(text => {
    const [numerator, denominator] = text.split('/');
    return denominator === undefined ? Number(numerator) : Number(numerator) / Number(denominator);
  })
  .refine(value => Number.isFinite(value) && value > 0, 'Scale factor must be greater than zero');

/**
 * Field path: tags separated by `/`, optionally ending in `@attribute`
 */
export const FieldPathSchema = z.string()
  .trim()
  .regex(
    /^(?:[\w.:-]+|\*)(?:\/(?:[\w.:-]+|\*))*(?:@[\w.:-]+)?$/,
    'Field path must look like "material/renderpass/texunit/map" or "sceneobject/size@x"'
  );

export const TemplateScaleSchema = z.object({
  tag: ScaleTagSchema,
  factor: ScaleFactorValueSchema,
});

export const TemplateRuleSchema = z.object({
  path: FieldPathSchema,
  kind: TransformKindNameSchema,
  precision: z.coerce.number().int().min(0).max(15).optional(),
});

export const TemplateAssetSchema = z.object({
  path: FieldPathSchema,
});

/**
 * Template Definition Schema
 */
export const TemplateDefinitionSchema = z.object({
  document: DocumentKindSchema,
  extension: z.string()
    .regex(/^\.[A-Za-z0-9]+$/, 'Extension must start with a dot, e.g. ".nl2mat"')
    .transform(extension => extension.toLowerCase()),
  naming: z.object({
    suffix: z.string().regex(/^[^/\\]*$/, 'Naming suffix cannot contain path separators').default(''),
  }).default({ suffix: '' }),
  scales: z.array(TemplateScaleSchema).default([]),
  rules: z.array(TemplateRuleSchema).default([]),
  assets: z.array(TemplateAssetSchema).default([]),
});

export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
export type TemplateDefinitionInput = z.input<typeof TemplateDefinitionSchema>;
