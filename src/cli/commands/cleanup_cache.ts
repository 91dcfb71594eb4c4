/**
 * @fileoverview cleanup-cache command - expire old Ansible fact cache files
 */

import * as path from 'node:path';
import { cleanupFactCache, type CleanupReport } from '../../factcache/cleanup.js';
import { formatLocalDateTime } from '../../utils/format.js';
import { countOption, flag, parseCommandArgs, type CommandContext } from '../args.js';
import {
  createProgressBar,
  formatBytes,
  printKeyValue,
  printStatus,
  printStep,
  type ProgressBarHandle,
} from '../progress.js';

export interface CleanupCacheCommandOptions extends CommandContext {
  now?: Date;
  /** Draw a progress bar while deleting (default: stdout is a TTY) */
  progress?: boolean;
}

export async function cleanupCacheCommand(options: CleanupCacheCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(options.args, {
    age: { type: 'string' },
    'dry-run': { type: 'boolean', default: false },
  });
  const maxAgeDays = countOption(values, 'age', options.config.factCache.maxAgeDays);
  const dryRun = flag(values, 'dry-run');
  const cacheDir = options.config.factCache.dir;
  const showProgress = !options.json && (options.progress ?? process.stdout.isTTY === true);

  if (!options.json) {
    printStep('Ansible Fact Cache Cleanup');
    printKeyValue([
      { key: 'Cache directory', value: cacheDir },
      { key: 'Max age', value: `${maxAgeDays} days` },
      { key: 'Dry run', value: dryRun },
    ]);
  }

  const progress: { bar: ProgressBarHandle | null } = { bar: null };
  const report = await cleanupFactCache({
    cacheDir,
    maxAgeDays,
    dryRun,
    now: options.now,
    onDeleteStart: showProgress
      ? (count) => {
          progress.bar = createProgressBar({ total: count });
        }
      : undefined,
    onDelete: showProgress
      ? (file) => progress.bar?.increment(1, { task: path.relative(cacheDir, file.path) })
      : undefined,
  });
  progress.bar?.stop();

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }
  process.exitCode = 0;
}

function printReport(report: CleanupReport): void {
  if (!report.exists) {
    printStatus('warn', `Cache directory does not exist: ${report.cacheDir}`);
    printStatus('info', 'Nothing to clean up');
    return;
  }

  printStatus('info', `Current cache: ${report.before.files} files, ${formatBytes(report.before.bytes)}`);

  if (report.stale.length === 0) {
    printStatus('ok', `No files older than ${report.maxAgeDays} days found`);
    return;
  }

  printStatus('info', `Found ${report.stale.length} files older than ${report.maxAgeDays} days`);

  if (report.dryRun) {
    printStatus('warn', 'DRY RUN - no files will be deleted');
    for (const file of report.stale) {
      console.log(`  ${file.path} (${formatBytes(file.sizeBytes)}, modified ${formatLocalDateTime(file.modifiedAt)})`);
    }
    return;
  }

  printStatus('ok', `Deleted ${report.deleted} old cache files`);
  if (report.after) {
    printStatus('info', `Remaining cache: ${report.after.files} files, ${formatBytes(report.after.bytes)}`);
  }
  if (report.removedDirs > 0) {
    printStatus('info', `Removed ${report.removedDirs} empty directories`);
  }
}
