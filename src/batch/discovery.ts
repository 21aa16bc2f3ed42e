/**
 * Batch Group Discovery
 *
 * Turns the paths handed over by a front end into batch groups: one group
 * per folder, holding at most one object file and the material files next
 * to it. Directories are walked recursively; files of types no template
 * covers are left alone.
 */

import * as path from 'path';
import { FILE_EXTENSIONS } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import type { DocumentKind, ScaleRuleTable } from '../templates/rule-table';
import { isDirectory, isFile, readDirectoryEntries, toPosixRelative } from '../utils/file-utils';
import { Logger, LoggerFactory } from '../utils/logger';
import { FileResult, skippedFile } from './report';

export interface SourceFile {
  readonly absolutePath: string;
  /** Path below the scale-tag directory, forward slashes */
  readonly relativePath: string;
  readonly kind: DocumentKind;
}

export interface BatchGroup {
  readonly id: string;
  readonly folder: string;
  readonly objectFile?: SourceFile;
  readonly materialFiles: readonly SourceFile[];
  /** Extra object files of the folder; only one object file is used per group */
  readonly ignoredObjectFiles: readonly SourceFile[];
}

export interface DiscoveryResult {
  readonly groups: readonly BatchGroup[];
  readonly rejected: readonly FileResult[];
}

interface FolderEntry {
  readonly files: Map<string, SourceFile>;
}

class GroupCollector {
  private readonly folders = new Map<string, FolderEntry>();
  private readonly seen = new Set<string>();

  add(file: SourceFile): void {
    if (this.seen.has(file.absolutePath)) return;
    this.seen.add(file.absolutePath);

    const folder = path.dirname(file.absolutePath);
    let entry = this.folders.get(folder);
    if (!entry) {
      entry = { files: new Map() };
      this.folders.set(folder, entry);
    }
    entry.files.set(file.absolutePath, file);
  }

  build(logger: Logger): BatchGroup[] {
    const groups: BatchGroup[] = [];
    const byPath = (a: SourceFile, b: SourceFile): number =>
      a.absolutePath < b.absolutePath ? -1 : a.absolutePath > b.absolutePath ? 1 : 0;

    for (const [folder, entry] of this.folders) {
      const files = [...entry.files.values()];
      const objects = files.filter(file => file.kind === 'object').sort(byPath);
      const materials = files.filter(file => file.kind === 'material').sort(byPath);
      const [objectFile, ...ignoredObjectFiles] = objects;

      if (ignoredObjectFiles.length > 0 && objectFile) {
        logger.warn(
          `Found more than one object file in '${folder}'; only '${path.basename(objectFile.absolutePath)}' is used`,
          { filePath: folder, ignored: ignoredObjectFiles.map(file => file.relativePath) }
        );
      }

      groups.push({
        id: `group-${groups.length + 1}`,
        folder,
        ...(objectFile ? { objectFile } : {}),
        materialFiles: materials,
        ignoredObjectFiles,
      });
    }

    return groups;
  }
}

interface WalkContext {
  readonly base: string;
  readonly table: ScaleRuleTable;
  readonly collector: GroupCollector;
  readonly rejected: FileResult[];
  readonly logger: Logger;
}

/**
 * Collect supported files below a directory
 *
 * A directory that cannot be read is listed as rejected; the walk goes on
 * with its siblings.
 */
function walkDirectory(directory: string, walk: WalkContext): void {
  const { base, table, collector } = walk;
  let entries: { files: string[]; directories: string[] };
  try {
    entries = readDirectoryEntries(directory);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    walk.logger.warn(`${ERROR_MESSAGES.DIRECTORY_UNREADABLE}: ${directory}`, { filePath: directory, error: message });
    walk.rejected.push(skippedFile(directory, toPosixRelative(base, directory), `${ERROR_MESSAGES.DIRECTORY_UNREADABLE}: ${message}`));
    return;
  }

  const { files, directories } = entries;
  for (const file of files) {
    const kind = table.kindForFile(file);
    if (kind) {
      collector.add({ absolutePath: file, relativePath: toPosixRelative(base, file), kind });
    }
  }
  for (const subdirectory of directories) {
    walkDirectory(subdirectory, walk);
  }
}

/**
 * Discover batch groups from input files and directories
 *
 * A directory keeps its own name in the output paths (`shapes/rail.nl2mat`);
 * a file given directly lands at the top of each scale directory.
 */
export function discoverGroups(
  inputs: readonly string[],
  table: ScaleRuleTable,
  logger: Logger = LoggerFactory.forBatch()
): DiscoveryResult {
  const collector = new GroupCollector();
  const rejected: FileResult[] = [];

  for (const input of inputs) {
    const absolute = path.resolve(input);

    if (isDirectory(absolute)) {
      walkDirectory(absolute, { base: path.dirname(absolute), table, collector, rejected, logger });
      continue;
    }

    if (!isFile(absolute)) {
      logger.warn(`Input does not exist: ${input}`, { filePath: absolute });
      rejected.push(skippedFile(absolute, input, 'input does not exist'));
      continue;
    }

    const kind = table.kindForFile(absolute);
    if (!kind) {
      const known = table.documentKinds()
        .map(documentKind => table.documentRules(documentKind)?.extension ?? '')
        .join(', ');
      logger.warn(`No template covers ${path.basename(absolute)}`, { filePath: absolute, supported: known });
      rejected.push(skippedFile(absolute, path.basename(absolute), `no template for this file type (supported: ${known || FILE_EXTENSIONS.MATERIAL})`));
      continue;
    }

    collector.add({ absolutePath: absolute, relativePath: path.basename(absolute), kind });
  }

  const groups = collector.build(logger);
  logger.debug(`Discovered ${groups.length} group(s)`, { groups: groups.map(group => group.folder) });
  return { groups, rejected };
}
