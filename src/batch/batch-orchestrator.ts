/**
 * Batch Orchestrator
 *
 * Discovers groups from the given inputs, runs them through a bounded worker
 * pool and aggregates the per-group results into one report.
 */

import * as path from 'path';
import { DEFAULT_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import type { ScaleRuleTable } from '../templates/rule-table';
import { mapWithConcurrency } from '../utils/concurrency';
import { Logger, LoggerFactory } from '../utils/logger';
import { BatchGroup, discoverGroups } from './discovery';
import { plannedOutputPath, processGroup } from './group-processor';
import { OutputClaims } from './output-claims';
import { BatchReport, classifyGroup, FileResult, GroupResult, skippedFile, summarize, summarizeError } from './report';

export interface BatchOptions {
  /** Root directory; outputs go to `<destination>/<scale-tag>/...` */
  destination: string;
  concurrency?: number;
  logger?: Logger;
  /** Aborting stops dispatch of groups that have not started yet */
  signal?: AbortSignal;
}

/**
 * Result for a group that never started
 */
function cancelledGroup(group: BatchGroup): GroupResult {
  const sources = group.objectFile
    ? [...group.materialFiles, group.objectFile, ...group.ignoredObjectFiles]
    : [...group.materialFiles, ...group.ignoredObjectFiles];
  const files = sources.map(file =>
    skippedFile(file.absolutePath, file.relativePath, ERROR_MESSAGES.GROUP_CANCELLED, file.kind)
  );
  return { id: group.id, folder: group.folder, outcome: 'skipped', incomplete: false, files, integrityErrors: [] };
}

/**
 * Result for a group whose processing threw outside the per-file handling
 */
function crashedGroup(group: BatchGroup, error: unknown): GroupResult {
  const sources = group.objectFile ? [...group.materialFiles, group.objectFile] : [...group.materialFiles];
  const summary = summarizeError(error);
  const files = sources.map((file): FileResult => ({
    source: file.absolutePath,
    relativePath: file.relativePath,
    kind: file.kind,
    status: 'failed',
    stage: 'discovered',
    variants: [],
    assets: [],
    errors: [summary],
  }));
  return { id: group.id, folder: group.folder, outcome: classifyGroup(files, false), incomplete: false, files, integrityErrors: [] };
}

/**
 * Claim the planned outputs of every group in discovery order
 *
 * When two groups map a file to the same output, the earlier group keeps it.
 */
function claimOutputs(
  groups: readonly BatchGroup[],
  table: ScaleRuleTable,
  destination: string,
  logger: Logger
): OutputClaims {
  const claims = new OutputClaims();

  for (const group of groups) {
    const sources = group.objectFile ? [...group.materialFiles, group.objectFile] : group.materialFiles;
    for (const file of sources) {
      for (const factor of table.factors) {
        const outputPath = plannedOutputPath(destination, file, factor, table);
        if (!claims.claim(outputPath, group.id)) {
          logger.warn(`${file.relativePath} maps to an output of another group at ${factor.tag}`, {
            filePath: file.absolutePath,
            scale: factor.tag,
            outputPath,
          });
        }
      }
    }
  }

  return claims;
}

export class BatchOrchestrator {
  private readonly table: ScaleRuleTable;
  private readonly destination: string;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;

  constructor(table: ScaleRuleTable, options: BatchOptions) {
    this.table = table;
    this.destination = path.resolve(options.destination);
    this.concurrency = options.concurrency ?? DEFAULT_CONFIG.CONCURRENCY;
    this.logger = options.logger ?? LoggerFactory.forBatch();
    this.signal = options.signal;
  }

  /**
   * Run a batch; never throws for problems inside groups
   */
  async run(inputs: readonly string[]): Promise<BatchReport> {
    return this.logger.withTiming('batch', async () => {
      const { groups, rejected } = discoverGroups(inputs, this.table, this.logger);
      this.logger.info(`Processing ${groups.length} group(s) at ${this.table.factors.length} scale(s)`, {
        scales: this.table.factors.map(factor => factor.tag),
        destination: this.destination,
      });

      const claims = claimOutputs(groups, this.table, this.destination, this.logger);
      const context = { table: this.table, destination: this.destination, logger: this.logger, claims };
      const results = await mapWithConcurrency(groups, this.concurrency, async group => {
        if (this.signal?.aborted) {
          return cancelledGroup(group);
        }
        try {
          return await processGroup(group, context);
        } catch (error) {
          this.logger.error(`Group ${group.folder} stopped unexpectedly`, { filePath: group.folder, error: summarizeError(error).message });
          return crashedGroup(group, error);
        }
      });

      const cancelled = this.signal?.aborted ?? false;
      if (cancelled) {
        this.logger.warn('Batch cancelled; groups that had not started were skipped');
      }

      return {
        destination: this.destination,
        scales: this.table.factors.map(factor => factor.tag),
        groups: results,
        ungrouped: rejected,
        cancelled,
        summary: summarize(results, rejected),
      };
    });
  }
}
