/**
 * File Naming
 *
 * The one place that decides the file name of a scaled output. The writer
 * uses it for output paths and the transform engine for rewritten material
 * references, so both always agree.
 */

import { SCALE_TAG_PLACEHOLDER } from '../../constants/config';
import type { NamingPolicy, ScaleFactor } from '../../templates/rule-table';

/**
 * Suffix appended to a file stem for a scale factor
 */
export function scaleSuffix(factor: ScaleFactor, naming: NamingPolicy): string {
  return naming.suffix.split(SCALE_TAG_PLACEHOLDER).join(factor.tag);
}

/**
 * Output name of a file (or a relative reference) at a scale factor
 *
 * Only the last path segment changes; directories are kept as written,
 * with either separator.
 * Example: `rail.nl2mat` with suffix `_{tag}` at x2 -> `rail_x2.nl2mat`
 */
export function scaledFileName(fileName: string, factor: ScaleFactor, naming: NamingPolicy): string {
  const separator = Math.max(fileName.lastIndexOf('/'), fileName.lastIndexOf('\\'));
  const directory = fileName.slice(0, separator + 1);
  const baseName = fileName.slice(separator + 1);

  const dot = baseName.lastIndexOf('.');
  const stem = dot > 0 ? baseName.slice(0, dot) : baseName;
  const extension = dot > 0 ? baseName.slice(dot) : '';

  return `${directory}${stem}${scaleSuffix(factor, naming)}${extension}`;
}

/**
 * Lower-cased extension of a file name including the dot, or ''
 */
export function fileExtension(fileName: string): string {
  const separator = Math.max(fileName.lastIndexOf('/'), fileName.lastIndexOf('\\'));
  const baseName = fileName.slice(separator + 1);
  const dot = baseName.lastIndexOf('.');
  return dot > 0 ? baseName.slice(dot).toLowerCase() : '';
}
