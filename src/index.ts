/**
 * Build Shape Scaler
 *
 * Produces scaled variants of material (.nl2mat) and object (.nl2sco) files
 * from template-driven rules.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'buildshape-scaler';
 *
 * const scaler = defineConfig({
 *   templatesDir: './templates',
 *   outputDir: './build-shapes',
 *   scales: ['x2', 'x3']
 * });
 *
 * const report = await scaler.convert(['./shapes']);
 * console.log(report.summary);
 * ```
 */

import { ZodError } from 'zod';
import { BatchOrchestrator } from './batch/batch-orchestrator';
import type { BatchReport } from './batch/report';
import { ERROR_MESSAGES } from './constants/errors';
import { ScalerErrorFactory } from './errors';
import { InputPathsSchema, ScalerConfigSchema, type ScalerConfig, type ScalerConfigInput } from './schemas';
import type { ScaleFactor, ScaleRuleTable } from './templates/rule-table';
import { loadTemplates } from './templates/template-loader';
import { createLogger, Logger, toLogLevel } from './utils/logger';

export interface ConvertOptions {
  /** Aborting stops dispatch of groups that have not started yet */
  signal?: AbortSignal;
}

/**
 * Main framework class
 */
export class BuildShapeScaler {
  readonly config: ScalerConfig;
  private table?: ScaleRuleTable;

  constructor(config: ScalerConfigInput = {}) {
    try {
      this.config = ScalerConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw ScalerErrorFactory.configError(ERROR_MESSAGES.INVALID_CONFIG, 'ScalerConfig', error);
      }
      throw error;
    }
  }

  private logger(prefix: string): Logger {
    return createLogger({ prefix, level: toLogLevel(this.config.debug ? 'debug' : this.config.logLevel) });
  }

  /**
   * Rule table of the configured templates, restricted to the selected scales
   *
   * Loaded once and reused by every conversion.
   *
   * @throws TemplateLoadError when the templates cannot be loaded
   * @throws UnsupportedScaleFactorError when none of the requested scales exist
   */
  ruleTable(): ScaleRuleTable {
    if (!this.table) {
      const loaded = loadTemplates(this.config.templatesDir, this.logger('Scaler-Templates'));
      this.table = this.selectScales(loaded);
    }
    return this.table;
  }

  private selectScales(table: ScaleRuleTable): ScaleRuleTable {
    const requested = this.config.scales;
    if (!requested) return table;

    const logger = this.logger('Scaler-Templates');
    const selected: ScaleFactor[] = [];
    for (const tag of requested) {
      const factor = table.factor(tag);
      if (factor) {
        selected.push(factor);
        continue;
      }
      const error = ScalerErrorFactory.unsupportedScaleFactor(
        `Scale '${tag}' is not defined by the templates and is skipped`,
        tag,
        { supported: table.factors.map(known => known.tag) }
      );
      logger.warn(error.message, { scale: tag, code: error.code });
    }

    if (selected.length === 0) {
      throw ScalerErrorFactory.unsupportedScaleFactor(
        `${ERROR_MESSAGES.NO_SCALES_SELECTED}: ${requested.join(', ')}`,
        requested.join(','),
        { supported: table.factors.map(known => known.tag) }
      );
    }
    return table.withFactors(selected);
  }

  /**
   * Scale every material and object file found in the inputs
   *
   * @param inputs - files or directories; directories are searched recursively
   * @returns report of every group and file; problems inside groups never throw
   */
  async convert(inputs: string | readonly string[], options: ConvertOptions = {}): Promise<BatchReport> {
    const parsed = InputPathsSchema.safeParse(typeof inputs === 'string' ? [inputs] : inputs);
    if (!parsed.success) {
      throw ScalerErrorFactory.configError('Invalid input paths', 'inputs', parsed.error);
    }

    const orchestrator = new BatchOrchestrator(this.ruleTable(), {
      destination: this.config.outputDir,
      concurrency: this.config.concurrency,
      logger: this.logger('Scaler-Batch'),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    return orchestrator.run(parsed.data);
  }
}

/**
 * Create a scaler from a configuration
 */
export function defineConfig(config: ScalerConfigInput = {}): BuildShapeScaler {
  return new BuildShapeScaler(config);
}

/**
 * TypeScript type exports
 */
export type { ScalerConfig, ScalerConfigInput } from './schemas';
export type {
  BatchReport,
  BatchSummary,
  FileResult,
  GroupResult,
  GroupOutcome,
  VariantResult,
  AssetResult,
  ErrorSummary,
} from './batch/report';
export type {
  DocumentKind,
  DocumentRules,
  FieldPath,
  NamingPolicy,
  ScaleFactor,
  TransformKind,
  TransformRule,
} from './templates/rule-table';
export type { SourceDocument, TransformResult, FieldChange, FileReference } from './converters/scale-transform';
export type { MarkupDocument, MarkupElement } from './core/markup-node';

/**
 * Building blocks
 */
export { BatchOrchestrator } from './batch/batch-orchestrator';
export { formatReport } from './batch/report';
export { ScaleRuleTable } from './templates/rule-table';
export { loadTemplates, parseTemplate, compileTemplates } from './templates/template-loader';
export { transformDocument } from './converters/scale-transform';
export { parseMarkup } from './converters/parsers/markup-parser';
export { serializeMarkup } from './converters/serializers/markup-serializer';
export { DocumentParserFactory } from './converters/parsers/document-parser-factory';
export { scaledFileName } from './converters/helpers/file-naming';
export {
  BaseScalerError,
  MalformedInputError,
  UnsupportedScaleFactorError,
  TemplateLoadError,
  ReferentialIntegrityError,
  IOWriteError,
  ScalerConfigError,
  ScalerErrorFactory,
  isScalerError,
  type ScalerError,
} from './errors';
export { Logger, LogLevel, LoggerFactory, configureLogging, createFileSink } from './utils/logger';
