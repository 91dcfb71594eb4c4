/**
 * @fileoverview Keys command - copy SSH keys and import GPG keys from Windows
 */

import { silentReporter } from '../../core/interaction.js';
import { findWindowsHome, syncKeys } from '../../keys/copy.js';
import { createExecaRunner } from '../../utils/exec.js';
import { flag, parseCommandArgs, type CommandContext } from '../args.js';
import { createConsoleReporter, printKeyValue, printStatus, printStep } from '../progress.js';

export async function keysCommand(options: CommandContext): Promise<void> {
  const { values } = parseCommandArgs(options.args, {
    force: { type: 'boolean', default: false },
    'dry-run': { type: 'boolean', default: false },
  });
  const settings = options.config.keys;
  const dryRun = flag(values, 'dry-run');

  const windowsHome = settings.windowsHome ?? (await findWindowsHome(settings.usersRoot));
  if (!options.json) {
    printStatus('info', `Windows profile: ${windowsHome}`);
    if (dryRun) printStatus('warn', 'DRY RUN - nothing will be written');
  }

  const report = await syncKeys(
    {
      windowsHome,
      sshDir: settings.sshDir,
      gpgDir: settings.gpgDir,
      force: flag(values, 'force'),
      dryRun,
    },
    { runner: options.runner ?? createExecaRunner(), reporter: options.json ? silentReporter : createConsoleReporter() }
  );

  process.exitCode = 0;
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  printStep('Summary');
  printKeyValue([
    { key: 'SSH files copied', value: report.copied },
    { key: 'SSH files skipped', value: report.skipped },
    { key: 'GPG keys imported', value: report.imported },
  ]);
}
