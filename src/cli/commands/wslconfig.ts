/**
 * @fileoverview wslconfig command - merge resource limits into %USERPROFILE%\.wslconfig
 */

import * as fs from 'node:fs/promises';
import { findWindowsHome } from '../../keys/copy.js';
import { buildWslConfig } from '../../wsl/wslconfig.js';
import { flag, parseCommandArgs, type CommandContext } from '../args.js';
import { printStatus } from '../progress.js';

export async function wslconfigCommand(options: CommandContext): Promise<void> {
  const { values } = parseCommandArgs(options.args, {
    write: { type: 'boolean', default: false },
  });
  const windowsHome = options.config.keys.windowsHome ?? (await findWindowsHome(options.config.keys.usersRoot));
  const { file, content, existed } = await buildWslConfig(windowsHome, options.config.wsl);
  const write = flag(values, 'write');

  if (write) {
    await fs.writeFile(file, content);
  }
  process.exitCode = 0;

  if (options.json) {
    console.log(JSON.stringify({ file, existed, written: write, content }, null, 2));
    return;
  }

  if (!write) {
    process.stdout.write(content.replaceAll('\r\n', '\n'));
    printStatus('info', `Preview only; re-run with --write to update ${file}`);
    return;
  }
  printStatus('ok', `${existed ? 'Updated' : 'Created'} ${file}`);
  printStatus('info', 'Run `wsl --shutdown` from Windows for the new limits to take effect');
}
