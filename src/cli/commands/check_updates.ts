/**
 * @fileoverview check-updates command - report new commits on the tracked branch
 *
 * Exit codes: 0 up to date or not due, 1 check failed, 2 updates available.
 */

import * as path from 'node:path';
import {
  checkForUpdates,
  decideThrottle,
  exitCodeFor,
  readStamp,
  UPDATE_EXIT_CODES,
  type RepositoryInfo,
  type UpdateCheckResult,
} from '../../updates/check.js';
import { silentReporter } from '../../core/interaction.js';
import { createExecaRunner } from '../../utils/exec.js';
import { formatLocalDateTime } from '../../utils/format.js';
import { countOption, flag, parseCommandArgs, type CommandContext } from '../args.js';
import { createConsoleReporter, printBanner, printKeyValue, printStatus, printStep } from '../progress.js';

export interface CheckUpdatesCommandOptions extends CommandContext {
  now?: Date;
}

export async function checkUpdatesCommand(options: CheckUpdatesCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(options.args, {
    force: { type: 'boolean', default: false },
    interval: { type: 'string' },
  });
  const settings = options.config.updates;
  const intervalDays = countOption(values, 'interval', settings.intervalDays);
  const now = options.now ?? new Date();

  const decision = decideThrottle(await readStamp(settings.stampFile), intervalDays, now, flag(values, 'force'));
  if (!decision.due) {
    if (options.json) {
      console.log(JSON.stringify({ status: 'not_due', ...decision }, null, 2));
    } else if (options.verbose && decision.nextCheck !== null) {
      printStatus('info', 'Update check not needed yet');
      printStatus('info', `Next check: ${formatLocalDateTime(new Date(decision.nextCheck * 1000))}`);
    }
    process.exitCode = UPDATE_EXIT_CODES.upToDate;
    return;
  }

  if (!options.json) {
    printBanner('Checking for Repository Updates');
  }

  const result = await checkForUpdates(
    {
      repoDir: path.resolve(options.workspace),
      remote: settings.remote,
      branch: settings.branch,
      stampFile: settings.stampFile,
      now,
      onRepositoryInfo: options.json ? undefined : printRepositoryInfo,
    },
    options.runner ?? createExecaRunner(),
    options.json ? silentReporter : createConsoleReporter()
  );

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printUpdates(result, settings.remote, settings.branch);
  }
  process.exitCode = exitCodeFor(result);
}

function printRepositoryInfo(info: RepositoryInfo, localChanges: string[]): void {
  printStep('Version Information');
  printKeyValue([
    { key: 'Repository', value: info.repoDir },
    { key: 'Branch', value: info.branch },
    { key: 'Commit', value: info.commit?.shortHash ?? null },
    { key: 'Date', value: info.commit?.date ?? null },
    { key: 'Message', value: info.commit?.subject ?? null },
  ]);

  if (localChanges.length > 0) {
    printStep('Local Changes');
    for (const line of localChanges) {
      console.log(`  ${line}`);
    }
  }
  console.log('');
}

function printUpdates(result: UpdateCheckResult, remote: string, branch: string): void {
  if (result.status !== 'updates_available') return;

  printBanner('Updates Available!');
  printStatus('warn', `You are ${result.behind} commit(s) behind ${remote}/${branch}`);
  console.log('');
  console.log('Recent changes:');
  for (const line of result.recentChanges) {
    console.log(`  ${line}`);
  }
  console.log('');
  console.log('To update:');
  console.log(`  git pull ${remote} ${branch}`);
  console.log('  devenv verify');
}
