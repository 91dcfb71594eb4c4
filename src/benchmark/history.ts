/**
 * @fileoverview Stored benchmark runs
 *
 * Runs are stored as `results-<YYYYMMDD-HHMMSS>.txt` with a
 * `benchmark-<same stamp>.json` summary next to it. The stamp sorts
 * chronologically, so name order is run order.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';

export const RESULTS_PREFIX = 'results-';
export const SUMMARY_PREFIX = 'benchmark-';

export function resultsFileName(stamp: string): string {
  return `${RESULTS_PREFIX}${stamp}.txt`;
}

export function summaryFileName(stamp: string): string {
  return `${SUMMARY_PREFIX}${stamp}.json`;
}

/**
 * Results files in `dir`, oldest first.
 */
export async function listResultFiles(dir: string): Promise<string[]> {
  const files = await glob(`${RESULTS_PREFIX}*.txt`, { cwd: dir, nodir: true, absolute: true });
  // Same directory, so full-path order is file-name order
  return files.sort();
}

/**
 * The newest results file other than `currentFile`, or null.
 */
export async function findPreviousResult(dir: string, currentFile: string): Promise<string | null> {
  const currentName = path.basename(currentFile);
  const others = (await listResultFiles(dir)).filter((file) => path.basename(file) !== currentName);
  return others.length > 0 ? others[others.length - 1] : null;
}

/**
 * Keep the newest `keep` runs and delete the rest, JSON summaries included.
 *
 * @returns number of runs removed
 */
export async function pruneResults(dir: string, keep: number): Promise<number> {
  const files = await listResultFiles(dir);
  if (files.length <= keep) return 0;

  const doomed = files.slice(0, files.length - keep);
  for (const file of doomed) {
    const stamp = path.basename(file).slice(RESULTS_PREFIX.length, -'.txt'.length);
    await fs.rm(file, { force: true });
    await fs.rm(path.join(dir, summaryFileName(stamp)), { force: true });
  }
  return doomed.length;
}
