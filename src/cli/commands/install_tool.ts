/**
 * @fileoverview install-tool command - download, verify and install a tool binary
 */

import { silentReporter } from '../../core/interaction.js';
import { getTool, listTools } from '../../tools/catalog.js';
import { installTool, type FetchLike } from '../../tools/installer.js';
import { getErrorMessage } from '../../utils/errors.js';
import { flag, parseCommandArgs, stringOption, type CommandContext } from '../args.js';
import { createError } from '../errors.js';
import { createConsoleReporter, printStatus, printTable } from '../progress.js';

export interface InstallToolCommandOptions extends CommandContext {
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  arch?: string;
}

export async function installToolCommand(options: InstallToolCommandOptions): Promise<void> {
  const { values, positionals } = parseCommandArgs(options.args, {
    version: { type: 'string' },
    list: { type: 'boolean', default: false },
  });
  const { config } = options;

  if (flag(values, 'list') || positionals.length === 0) {
    printTable(
      ['Tool', 'Version', 'Description'],
      listTools().map((tool) => [tool.name, config.tools[tool.name]?.version ?? '-', tool.description])
    );
    process.exitCode = 0;
    return;
  }

  const name = positionals[0];
  const tool = getTool(name);
  if (!tool) {
    throw createError('EINVALID_ARGUMENT', `Unknown tool: ${name}`, {
      available: listTools().map((entry) => entry.name),
    });
  }
  const version = stringOption(values, 'version') ?? config.tools[name]?.version;
  if (!version) {
    throw createError('EINVALID_ARGUMENT', `No version configured for ${name}; pass --version`);
  }

  const reporter = options.json ? silentReporter : createConsoleReporter();
  const result = await installTool(
    { tool, version, installDir: config.downloads.installDir, arch: options.arch },
    {
      attempts: config.downloads.attempts,
      delayMs: config.downloads.delayMs,
      fetch: options.fetch,
      sleep: options.sleep,
      onRetry: (error, attempt) =>
        reporter.warn(`Attempt ${attempt} failed (${getErrorMessage(error)}), retrying...`),
    },
    reporter
  );

  process.exitCode = 0;
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printStatus('ok', `${result.tool} ${result.version} installed to ${result.path}`);
  }
}
