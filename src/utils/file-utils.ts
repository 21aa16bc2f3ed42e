/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Check if a path is a directory
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file
 */
export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Entries of a directory split into files and subdirectories, sorted by name
 */
export function readDirectoryEntries(dirPath: string): { files: string[]; directories: string[] } {
  const entries = fs.readdirSync(dirPath, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return {
    files: entries.filter(entry => entry.isFile()).map(entry => path.join(dirPath, entry.name)),
    directories: entries.filter(entry => entry.isDirectory()).map(entry => path.join(dirPath, entry.name)),
  };
}

/**
 * Write a text file, creating parent directories as needed
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf8');
}

/**
 * Copy a file, creating parent directories of the destination as needed
 */
export async function copyFileTo(source: string, destination: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(destination), { recursive: true });
  await fs.promises.copyFile(source, destination);
}

/**
 * Path relative to a base, always with forward slashes
 * Example: ("/in", "/in/shapes/rail.nl2mat") -> "shapes/rail.nl2mat"
 */
export function toPosixRelative(base: string, filePath: string): string {
  return path.relative(base, filePath).split(path.sep).join('/');
}
