/**
 * Batch Report
 *
 * Result types returned to front ends, outcome classification and a plain
 * text rendering of the final summary.
 */

import { describeError, isScalerError } from '../errors';
import type { DocumentKind } from '../templates/rule-table';

/**
 * Stages a source file moves through
 */
export type FileStage = 'discovered' | 'parsed' | 'transformed' | 'written' | 'done';

export type FileStatus = 'written' | 'skipped' | 'failed';

export type GroupOutcome = 'succeeded' | 'partial' | 'failed' | 'skipped';

export interface ErrorSummary {
  readonly tag: string;
  readonly code: string;
  readonly message: string;
}

/**
 * One scale variant of a source file
 */
export interface VariantResult {
  readonly scale: string;
  readonly status: 'written' | 'failed';
  readonly outputPath?: string;
  readonly changedFields: number;
  readonly error?: ErrorSummary;
}

/**
 * One companion file copied next to a variant
 */
export interface AssetResult {
  readonly file: string;
  readonly scale: string;
  readonly status: 'copied' | 'missing' | 'failed';
  readonly outputPath?: string;
  readonly message?: string;
}

export interface FileResult {
  readonly source: string;
  readonly relativePath: string;
  readonly kind?: DocumentKind;
  readonly status: FileStatus;
  /** Last stage reached; for failed files the stage that failed */
  readonly stage: FileStage;
  readonly variants: readonly VariantResult[];
  readonly assets: readonly AssetResult[];
  readonly errors: readonly ErrorSummary[];
  readonly reason?: string;
}

export interface GroupResult {
  readonly id: string;
  readonly folder: string;
  readonly outcome: GroupOutcome;
  /** Some material reference has no output at some scale */
  readonly incomplete: boolean;
  readonly files: readonly FileResult[];
  readonly integrityErrors: readonly ErrorSummary[];
}

export interface BatchSummary {
  readonly groups: Record<GroupOutcome, number>;
  readonly files: Record<FileStatus, number>;
  readonly outputsWritten: number;
}

export interface BatchReport {
  readonly destination: string;
  readonly scales: readonly string[];
  readonly groups: readonly GroupResult[];
  /** Inputs rejected before grouping, e.g. unsupported file types */
  readonly ungrouped: readonly FileResult[];
  readonly cancelled: boolean;
  readonly summary: BatchSummary;
}

/**
 * Reduce any thrown value to a serializable summary
 */
export function summarizeError(error: unknown): ErrorSummary {
  if (isScalerError(error)) {
    return { tag: error._tag, code: error.code, message: error.message };
  }
  const name = error instanceof Error ? error.name : 'Error';
  return { tag: name, code: 'SCALER_UNEXPECTED', message: describeError(error) };
}

/**
 * Result for a file that was not processed
 */
export function skippedFile(
  source: string,
  relativePath: string,
  reason: string,
  kind?: DocumentKind
): FileResult {
  return {
    source,
    relativePath,
    ...(kind ? { kind } : {}),
    status: 'skipped',
    stage: 'discovered',
    variants: [],
    assets: [],
    errors: [],
    reason,
  };
}

/**
 * Outcome of a group from its file results
 *
 * A parse failure or a group without any written output is a failure;
 * failed variants or broken references make it partial.
 */
export function classifyGroup(files: readonly FileResult[], incomplete: boolean): GroupOutcome {
  if (files.length === 0 || files.every(file => file.status === 'skipped')) {
    return 'skipped';
  }

  const parseFailed = files.some(file => file.status === 'failed' && file.stage === 'parsed');
  const anyWritten = files.some(file => file.variants.some(variant => variant.status === 'written'));
  if (parseFailed || !anyWritten) {
    return 'failed';
  }

  const variantFailed = files.some(file => file.variants.some(variant => variant.status === 'failed'));
  return variantFailed || incomplete ? 'partial' : 'succeeded';
}

/**
 * Count outcomes across groups and files
 */
export function summarize(groups: readonly GroupResult[], ungrouped: readonly FileResult[]): BatchSummary {
  const groupCounts: Record<GroupOutcome, number> = { succeeded: 0, partial: 0, failed: 0, skipped: 0 };
  const fileCounts: Record<FileStatus, number> = { written: 0, skipped: 0, failed: 0 };
  let outputsWritten = 0;

  for (const group of groups) {
    groupCounts[group.outcome]++;
  }
  for (const file of [...groups.flatMap(group => group.files), ...ungrouped]) {
    fileCounts[file.status]++;
    outputsWritten += file.variants.filter(variant => variant.status === 'written').length;
  }

  return { groups: groupCounts, files: fileCounts, outputsWritten };
}

/**
 * Human readable summary lines
 */
export function formatReport(report: BatchReport): string[] {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`Destination: ${report.destination}`);
  lines.push(`Scales: ${report.scales.join(', ')}`);
  if (report.cancelled) {
    lines.push('Batch was cancelled; groups not started were skipped.');
  }

  for (const group of report.groups) {
    const marker = group.incomplete ? ' (incomplete)' : '';
    lines.push(`[${group.outcome}] ${group.folder}${marker}`);
    for (const file of group.files) {
      lines.push(`  ${file.status.padEnd(7)} ${file.relativePath}${file.reason ? ` - ${file.reason}` : ''}`);
      for (const error of file.errors) {
        lines.push(`    ${error.tag}: ${error.message}`);
      }
    }
    for (const error of group.integrityErrors) {
      lines.push(`  ${error.tag}: ${error.message}`);
    }
  }

  for (const file of report.ungrouped) {
    lines.push(`  ${file.status.padEnd(7)} ${file.relativePath}${file.reason ? ` - ${file.reason}` : ''}`);
  }

  lines.push(
    `Groups: ${summary.groups.succeeded} succeeded, ${summary.groups.partial} partial, ` +
    `${summary.groups.failed} failed, ${summary.groups.skipped} skipped`
  );
  lines.push(
    `Files: ${summary.files.written} written, ${summary.files.skipped} skipped, ` +
    `${summary.files.failed} failed (${summary.outputsWritten} outputs)`
  );

  return lines;
}
