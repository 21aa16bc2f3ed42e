/**
 * Group Processor
 *
 * Runs one batch group through parse -> transform (once per scale factor)
 * -> write, then checks that every material reference of the object file
 * resolves to an output written for the same scale. Errors are turned into
 * result entries here and never propagate further.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ERROR_MESSAGES } from '../constants/errors';
import { DocumentParserFactory } from '../converters/parsers/document-parser-factory';
import { scaledFileName } from '../converters/helpers/file-naming';
import { transformDocument, SourceDocument, TransformResult } from '../converters/scale-transform';
import { serializeMarkup } from '../converters/serializers/markup-serializer';
import { ScalerErrorFactory } from '../errors';
import type { ScaleFactor, ScaleRuleTable } from '../templates/rule-table';
import { copyFileTo, writeTextFile } from '../utils/file-utils';
import { Logger } from '../utils/logger';
import type { BatchGroup, SourceFile } from './discovery';
import type { OutputClaims } from './output-claims';
import {
  AssetResult,
  classifyGroup,
  ErrorSummary,
  FileResult,
  FileStage,
  GroupResult,
  skippedFile,
  summarizeError,
  VariantResult,
} from './report';

export interface GroupProcessorContext {
  readonly table: ScaleRuleTable;
  /** Absolute destination root; outputs go to `<destination>/<scale-tag>/...` */
  readonly destination: string;
  readonly logger: Logger;
  /** Paths claimed across all groups of the batch */
  readonly claims: OutputClaims;
}

function outputLocation(destination: string, relativePath: string, factor: ScaleFactor, fileName: string): string {
  return path.join(destination, factor.tag, path.posix.dirname(relativePath), fileName);
}

/**
 * Path a source file is written to at a scale factor
 */
export function plannedOutputPath(
  destination: string,
  file: SourceFile,
  factor: ScaleFactor,
  table: ScaleRuleTable
): string {
  const naming = table.documentRules(file.kind)?.naming ?? { suffix: '' };
  const fileName = scaledFileName(path.posix.basename(file.relativePath), factor, naming);
  return outputLocation(destination, file.relativePath, factor, fileName);
}

/**
 * Mutable progress of one source file while its group runs
 */
class FileState {
  stage: FileStage = 'discovered';
  failed = false;
  document?: SourceDocument;
  readonly variants: VariantResult[] = [];
  readonly assets: AssetResult[] = [];
  readonly errors: ErrorSummary[] = [];

  constructor(readonly file: SourceFile) {}

  fail(stage: FileStage, error: unknown): void {
    this.failed = true;
    this.stage = stage;
    this.errors.push(summarizeError(error));
  }

  toResult(): FileResult {
    const anyVariantFailed = this.variants.some(variant => variant.status === 'failed');
    const status = this.failed || anyVariantFailed ? 'failed' : 'written';
    return {
      source: this.file.absolutePath,
      relativePath: this.file.relativePath,
      kind: this.file.kind,
      status,
      stage: status === 'written' ? 'done' : this.stage,
      variants: this.variants,
      assets: this.assets,
      errors: this.errors,
    };
  }
}

/**
 * A transformed document waiting to be written
 */
interface PendingOutput {
  readonly state: FileState;
  readonly result: TransformResult;
  readonly outputPath: string;
}

/**
 * Parse every source of the group once
 */
async function parseSources(states: readonly FileState[], logger: Logger): Promise<void> {
  const cache = new Map<string, SourceDocument>();

  for (const state of states) {
    const { absolutePath, kind } = state.file;
    try {
      let document = cache.get(absolutePath);
      if (!document) {
        document = await DocumentParserFactory.parseFile(absolutePath, kind);
        cache.set(absolutePath, document);
      }
      state.document = document;
      state.stage = 'parsed';
      logger.logStage('parsed', { filePath: absolutePath });
    } catch (error) {
      state.fail('parsed', error);
      logger.error(`Cannot parse ${state.file.relativePath}`, { filePath: absolutePath, error: summarizeError(error).message });
    }
  }
}

/**
 * Transform all parsed documents to one factor and assign output paths
 */
function transformForScale(
  states: readonly FileState[],
  factor: ScaleFactor,
  context: GroupProcessorContext
): PendingOutput[] {
  const pending: PendingOutput[] = [];

  for (const state of states) {
    if (!state.document) continue;
    try {
      const result = transformDocument(state.document, factor, context.table);
      const outputPath = outputLocation(context.destination, state.file.relativePath, factor, result.document.fileName);
      pending.push({ state, result, outputPath });
      state.stage = 'transformed';
    } catch (error) {
      state.stage = 'transformed';
      state.variants.push({ scale: factor.tag, status: 'failed', changedFields: 0, error: summarizeError(error) });
      context.logger.warn(`Cannot transform ${state.file.relativePath} to ${factor.tag}`, {
        filePath: state.file.absolutePath,
        scale: factor.tag,
        error: summarizeError(error).message,
      });
    }
  }

  return pending;
}

/**
 * Write the outputs of one factor sequentially
 *
 * A path already used by this group, or claimed by another group, is not
 * written.
 */
async function writeOutputs(
  pending: readonly PendingOutput[],
  factor: ScaleFactor,
  groupId: string,
  context: GroupProcessorContext
): Promise<Set<string>> {
  const { logger, claims } = context;
  const written = new Set<string>();
  const claimed = new Set<string>();

  for (const { state, result, outputPath } of pending) {
    const changedFields = result.changes.filter(change => change.status === 'changed').length;

    const collision = claimed.has(outputPath)
      ? ERROR_MESSAGES.OUTPUT_COLLISION
      : claims.claim(outputPath, groupId) ? undefined : ERROR_MESSAGES.OUTPUT_CLAIMED;
    if (collision) {
      const error = ScalerErrorFactory.ioWrite(`${collision}: ${outputPath}`, outputPath, 'write');
      state.variants.push({ scale: factor.tag, status: 'failed', outputPath, changedFields, error: summarizeError(error) });
      state.stage = 'written';
      logger.error(error.message, { filePath: outputPath, scale: factor.tag, owner: claims.ownerOf(outputPath) });
      continue;
    }
    claimed.add(outputPath);

    try {
      await writeTextFile(outputPath, serializeMarkup(result.document.markup));
      written.add(outputPath);
      state.variants.push({ scale: factor.tag, status: 'written', outputPath, changedFields });
      state.stage = 'written';
      logger.logFileOperation('write', outputPath, { scale: factor.tag, changedFields });
    } catch (error) {
      const ioError = ScalerErrorFactory.ioWrite(
        `Cannot write ${outputPath}: ${error instanceof Error ? error.message : String(error)}`,
        outputPath,
        'write',
        error
      );
      state.variants.push({ scale: factor.tag, status: 'failed', outputPath, changedFields, error: summarizeError(ioError) });
      state.stage = 'written';
      logger.error(ioError.message, { filePath: outputPath, scale: factor.tag });
    }
  }

  return written;
}

/**
 * Copy companion files (textures, previews) next to each written output
 */
async function copyAssets(
  pending: readonly PendingOutput[],
  written: ReadonlySet<string>,
  factor: ScaleFactor,
  context: GroupProcessorContext
): Promise<void> {
  const scaleRoot = path.join(context.destination, factor.tag);
  const copied = new Set<string>();

  for (const { state, result, outputPath } of pending) {
    if (!written.has(outputPath)) continue;

    for (const asset of result.assets) {
      const record = (entry: Omit<AssetResult, 'file' | 'scale'>): void => {
        state.assets.push({ file: asset.file, scale: factor.tag, ...entry });
      };

      if (path.isAbsolute(asset.file)) {
        record({ status: 'missing', message: 'absolute asset paths are not copied' });
        continue;
      }

      const source = path.resolve(path.dirname(state.file.absolutePath), asset.file);
      const target = path.resolve(path.dirname(outputPath), asset.file);
      const relativeToScale = path.relative(scaleRoot, target);
      if (relativeToScale === '..' || relativeToScale.startsWith(`..${path.sep}`) || path.isAbsolute(relativeToScale)) {
        record({ status: 'missing', message: 'asset lies outside the scale directory' });
        continue;
      }
      if (copied.has(target)) {
        record({ status: 'copied', outputPath: target });
        continue;
      }
      if (!context.claims.claim(target, source)) {
        record({ status: 'failed', outputPath: target, message: ERROR_MESSAGES.ASSET_CLAIMED });
        context.logger.warn(`${ERROR_MESSAGES.ASSET_CLAIMED}: ${target}`, { filePath: source, scale: factor.tag });
        continue;
      }
      if (!fs.existsSync(source)) {
        record({ status: 'missing', message: `not found: ${source}` });
        context.logger.warn(`Companion file not found: ${asset.file}`, { filePath: source, scale: factor.tag });
        continue;
      }

      try {
        await copyFileTo(source, target);
        copied.add(target);
        record({ status: 'copied', outputPath: target });
        context.logger.logFileOperation('copy', target, { scale: factor.tag });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        record({ status: 'failed', outputPath: target, message });
        context.logger.warn(`Cannot copy companion file ${asset.file}: ${message}`, { filePath: target, scale: factor.tag });
      }
    }
  }
}

/**
 * Check that every material reference of the written object file has an output
 */
function checkReferences(
  pending: readonly PendingOutput[],
  written: ReadonlySet<string>,
  factor: ScaleFactor,
  context: GroupProcessorContext
): ErrorSummary[] {
  const errors: ErrorSummary[] = [];

  for (const { state, result, outputPath } of pending) {
    if (state.file.kind !== 'object' || !written.has(outputPath)) continue;

    for (const reference of result.references) {
      if (context.table.kindForFile(reference.target) !== 'material') continue;
      const target = path.resolve(path.dirname(outputPath), reference.target);
      if (written.has(target)) continue;

      const error = ScalerErrorFactory.referentialIntegrity(
        `${state.file.relativePath} references '${reference.source}', which has no output at ${factor.tag}`,
        state.file.absolutePath,
        reference.source,
        factor.tag
      );
      errors.push(summarizeError(error));
      context.logger.warn(error.message, { filePath: state.file.absolutePath, scale: factor.tag });
    }
  }

  return errors;
}

/**
 * Process one batch group across all scale factors of the table
 */
export async function processGroup(group: BatchGroup, context: GroupProcessorContext): Promise<GroupResult> {
  const { logger, table } = context;
  const sources = group.objectFile ? [...group.materialFiles, group.objectFile] : [...group.materialFiles];
  const states = sources.map(file => new FileState(file));

  await parseSources(states, logger);

  const integrityErrors: ErrorSummary[] = [];
  for (const factor of table.factors) {
    const pending = transformForScale(states, factor, context);
    const written = await writeOutputs(pending, factor, group.id, context);
    await copyAssets(pending, written, factor, context);
    integrityErrors.push(...checkReferences(pending, written, factor, context));
  }

  const files: FileResult[] = [
    ...states.map(state => state.toResult()),
    ...group.ignoredObjectFiles.map(file =>
      skippedFile(file.absolutePath, file.relativePath, 'only one object file per folder is used', file.kind)
    ),
  ];
  const incomplete = integrityErrors.length > 0;
  const outcome = classifyGroup(files, incomplete);

  logger.info(`Group ${group.folder}: ${outcome}`, {
    filePath: group.folder,
    files: files.length,
    incomplete,
  });

  return { id: group.id, folder: group.folder, outcome, incomplete, files, integrityErrors };
}
