/**
 * @fileoverview Command table and argument dispatch for the devenv CLI
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig } from '../config/index.js';
import { logDebug, logError } from '../telemetry/logger.js';
import { GLOBAL_OPTIONS, type CommandContext } from './args.js';
import { showHelp } from './help.js';
import { benchmarkCommand } from './commands/benchmark.js';
import { bootstrapCommand } from './commands/bootstrap.js';
import { checkUpdatesCommand } from './commands/check_updates.js';
import { cleanupCacheCommand } from './commands/cleanup_cache.js';
import { installToolCommand } from './commands/install_tool.js';
import { keysCommand } from './commands/keys.js';
import { verifyCommand } from './commands/verify.js';
import { wslconfigCommand } from './commands/wslconfig.js';
import {
  classifyError,
  formatErrorWithHints,
  formatErrorJson,
  getExitCode,
  createErrorEnvelope,
  type ErrorEnvelope,
} from './errors.js';

export type Command =
  | 'bootstrap'
  | 'verify'
  | 'cleanup-cache'
  | 'benchmark'
  | 'check-updates'
  | 'keys'
  | 'wslconfig'
  | 'install-tool'
  | 'help';

export interface CommandEntry {
  description: string;
  usage: string;
  run?: (context: CommandContext) => Promise<void>;
}

/**
 * Output a structured error for agent consumption
 */
export function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  logError(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

export const COMMANDS: Record<Command, CommandEntry> = {
  'bootstrap': {
    description: 'Install Ansible, its Python helpers and lint tools',
    usage: 'devenv bootstrap [--yes] [--skip-upgrade]',
    run: bootstrapCommand,
  },
  'verify': {
    description: 'Check that the Ansible setup is complete',
    usage: 'devenv verify [--json]',
    run: verifyCommand,
  },
  'cleanup-cache': {
    description: 'Remove old Ansible fact cache files',
    usage: 'devenv cleanup-cache [--age <days>] [--dry-run]',
    run: cleanupCacheCommand,
  },
  'benchmark': {
    description: 'Time a playbook run and compare with the last run',
    usage: 'devenv benchmark [--playbook <path>] [--real-run] [--keep <n>] [--yes]',
    run: benchmarkCommand,
  },
  'check-updates': {
    description: 'Check the repository for new upstream commits',
    usage: 'devenv check-updates [--force] [--interval <days>]',
    run: checkUpdatesCommand,
  },
  'keys': {
    description: 'Copy SSH keys and import GPG keys from Windows',
    usage: 'devenv keys [--force] [--dry-run]',
    run: keysCommand,
  },
  'wslconfig': {
    description: 'Merge resource limits into the Windows .wslconfig',
    usage: 'devenv wslconfig [--write]',
    run: wslconfigCommand,
  },
  'install-tool': {
    description: 'Download, verify and install a tool binary',
    usage: 'devenv install-tool <name> [--version <x.y.z>] | --list',
    run: installToolCommand,
  },
  'help': {
    description: 'Show help information',
    usage: 'devenv help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/**
 * Run one CLI invocation. `args` is argv without the node and script paths.
 *
 * Global flags are read from the whole line, except `-v/--version`, which
 * only counts before the command name (install-tool takes its own
 * `--version <x.y.z>`).
 */
export async function runCli(args: string[]): Promise<void> {
  const { values, positionals, tokens } = parseArgs({
    args,
    options: GLOBAL_OPTIONS,
    allowPositionals: true,
    strict: false,
    tokens: true,
  });

  const commandToken = tokens.find((token) => token.kind === 'positional');
  const commandIndex = commandToken ? commandToken.index : args.length;
  const versionRequested = tokens.some(
    (token) => token.kind === 'option' && token.name === 'version' && token.index < commandIndex
  );

  if (versionRequested) {
    const { DEVENV_VERSION } = await import('../index.js');
    console.log(`devenv ${DEVENV_VERSION.string}`);
    return;
  }

  const command = positionals[0];
  const jsonMode = values.json === true;

  if (!command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : undefined);
    return;
  }
  if (values.help === true) {
    showHelp(command);
    return;
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'devenv help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  const entry = COMMANDS[command];
  if (!entry.run) return;

  try {
    const { config, source } = await loadConfig({
      configPath: typeof values.config === 'string' ? values.config : undefined,
    });
    logDebug('[cli] dispatch', { command, configSource: source });

    await entry.run({
      workspace: path.resolve(typeof values.workspace === 'string' ? values.workspace : process.cwd()),
      // Everything after the command name, flags included
      args: args.slice(commandIndex + 1),
      config,
      verbose: values.verbose === true,
      json: jsonMode,
    });
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}
