/**
 * File system helpers for document ingestion
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathNotDirectoryError, pathNotFoundError, validationError } from '../server/errors.js';

export type PathKind = 'file' | 'directory' | 'other' | 'missing';

/**
 * Get file extension (normalized, lowercase, without dot)
 *
 * @returns Extension like 'pdf' (without dot, lowercase)
 */
export function getFileExtension(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return ext.startsWith('.') ? ext.slice(1) : ext;
}

export async function pathKind(target: string): Promise<PathKind> {
  try {
    const stats = await fs.stat(target);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 'missing';
    throw error;
  }
}

/**
 * @throws MCPError PATH_NOT_FOUND / PATH_NOT_DIRECTORY
 */
export async function assertDirectory(dirPath: string): Promise<void> {
  const kind = await pathKind(dirPath);
  if (kind === 'missing') throw pathNotFoundError(dirPath);
  if (kind !== 'directory') throw pathNotDirectoryError(dirPath);
}

/**
 * @throws MCPError PATH_NOT_FOUND, or VALIDATION_ERROR when the path is not a regular file
 */
export async function assertFile(filePath: string): Promise<void> {
  const kind = await pathKind(filePath);
  if (kind === 'missing') throw pathNotFoundError(filePath);
  if (kind !== 'file') throw validationError(`Path is not a file: ${filePath}`, { path: filePath });
}

/**
 * Regular files directly inside a directory with the given extension
 * (case-insensitive), sorted by name. Subdirectories are not descended into.
 *
 * @returns Filenames, not paths
 */
export async function listFilesWithExtension(dirPath: string, extension: string): Promise<string[]> {
  const wanted = (extension.startsWith('.') ? extension.slice(1) : extension).toLowerCase();
  const entries = await fs.readdir(dirPath, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && getFileExtension(entry.name) === wanted)
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
