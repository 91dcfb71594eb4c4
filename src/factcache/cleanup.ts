/**
 * @fileoverview Ansible fact cache cleanup
 *
 * The jsonfile fact cache plugin writes one file per host and never expires
 * them on its own. This module finds cache files older than a number of days
 * (by modification time, with `find -mtime +N` day rounding) and removes them.
 *
 * @packageDocumentation
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { hasErrorCode } from '../utils/errors.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

export interface CacheFile {
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
  /** Whole days since last modification, rounded down */
  ageDays: number;
}

export interface CacheStats {
  files: number;
  bytes: number;
}

export interface CleanupOptions {
  cacheDir: string;
  maxAgeDays: number;
  dryRun: boolean;
  now?: Date;
  /** Called with the number of stale files before any is removed */
  onDeleteStart?: (count: number) => void;
  /** Called after each file is removed */
  onDelete?: (file: CacheFile) => void;
}

export interface CleanupReport {
  cacheDir: string;
  exists: boolean;
  dryRun: boolean;
  maxAgeDays: number;
  before: CacheStats;
  stale: CacheFile[];
  deleted: number;
  /** Null when nothing was deleted */
  after: CacheStats | null;
  removedDirs: number;
}

// ============================================================================
// SCANNING
// ============================================================================

/**
 * Every regular file under `cacheDir` (dotfiles included), sorted by path.
 */
export async function scanCache(cacheDir: string, now: Date = new Date()): Promise<CacheFile[]> {
  const paths = await glob('**/*', { cwd: cacheDir, nodir: true, dot: true, absolute: true });
  const files: CacheFile[] = [];

  for (const filePath of paths.sort()) {
    const stats = await lstatOrNull(filePath);
    // null: removed between listing and stat
    if (!stats?.isFile()) continue;
    files.push({
      path: filePath,
      sizeBytes: stats.size,
      modifiedAt: stats.mtime,
      ageDays: Math.floor((now.getTime() - stats.mtime.getTime()) / DAY_MS),
    });
  }

  return files;
}

export function summarize(files: CacheFile[]): CacheStats {
  return {
    files: files.length,
    bytes: files.reduce((total, file) => total + file.sizeBytes, 0),
  };
}

/**
 * `find -mtime +N`: strictly more than N whole days old.
 */
export function isStale(file: CacheFile, maxAgeDays: number): boolean {
  return file.ageDays > maxAgeDays;
}

// ============================================================================
// CLEANUP
// ============================================================================

export async function cleanupFactCache(options: CleanupOptions): Promise<CleanupReport> {
  const { cacheDir, maxAgeDays, dryRun } = options;
  const now = options.now ?? new Date();

  const report: CleanupReport = {
    cacheDir,
    exists: await isDirectory(cacheDir),
    dryRun,
    maxAgeDays,
    before: { files: 0, bytes: 0 },
    stale: [],
    deleted: 0,
    after: null,
    removedDirs: 0,
  };

  if (!report.exists) {
    return report;
  }

  const files = await scanCache(cacheDir, now);
  report.before = summarize(files);
  report.stale = files.filter((file) => isStale(file, maxAgeDays));

  if (report.stale.length === 0 || dryRun) {
    return report;
  }

  options.onDeleteStart?.(report.stale.length);
  for (const file of report.stale) {
    if (await deleteIfRegularFile(file.path)) {
      report.deleted++;
      options.onDelete?.(file);
    }
  }

  if (report.deleted > 0) {
    report.after = summarize(await scanCache(cacheDir, now));
  }
  report.removedDirs = await removeEmptyDirectories(cacheDir);
  return report;
}

async function deleteIfRegularFile(filePath: string): Promise<boolean> {
  const stats = await lstatOrNull(filePath);
  if (!stats?.isFile()) return false;
  await fs.rm(filePath, { force: true });
  return true;
}

async function lstatOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.lstat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}

/**
 * Remove empty directories below `root`, deepest first. `root` itself stays.
 *
 * @returns number of directories removed
 */
export async function removeEmptyDirectories(root: string): Promise<number> {
  let removed = 0;

  const visit = async (dir: string): Promise<boolean> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    let remaining = entries.length;
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const child = path.join(dir, entry.name);
      if (await visit(child)) {
        await fs.rmdir(child);
        removed++;
        remaining--;
      }
    }
    return remaining === 0;
  };

  await visit(root);
  return removed;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
}
