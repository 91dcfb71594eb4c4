/**
 * @fileoverview Subprocess execution
 *
 * All shell-outs (apt, git, ansible, gpg) go through a CommandRunner so that
 * commands can be scripted in tests. The default runner is backed by execa.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { execa } from 'execa';
import { CommandFailedError } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RunOptions {
  cwd?: string;
  /** Extra variables merged over process.env */
  env?: Record<string, string>;
  /** Attach stdin/stdout/stderr to the terminal (apt, sudo prompts) */
  inherit?: boolean;
  /** Receives interleaved stdout/stderr chunks as they arrive */
  onOutput?: (chunk: string) => void;
  timeoutMs?: number;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
}

// ============================================================================
// EXECA RUNNER
// ============================================================================

export function createExecaRunner(): CommandRunner {
  return {
    async run(command, args, options = {}) {
      const subprocess = execa(command, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeoutMs,
        reject: false,
        all: options.onOutput !== undefined,
        stdio: options.inherit ? 'inherit' : 'pipe',
      });

      const onOutput = options.onOutput;
      if (onOutput && subprocess.all) {
        subprocess.all.setEncoding('utf8');
        subprocess.all.on('data', (chunk: string) => onOutput(chunk));
      }

      const result = await subprocess;
      return {
        // execa leaves exitCode undefined when the binary could not be spawned
        exitCode: result.exitCode ?? 127,
        stdout: typeof result.stdout === 'string' ? result.stdout : '',
        stderr: typeof result.stderr === 'string' ? result.stderr : '',
      };
    },
  };
}

/**
 * Run a command and throw CommandFailedError on a non-zero exit.
 */
export async function runChecked(
  runner: CommandRunner,
  step: string,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<RunResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(step, formatCommand(command, args), result.exitCode, result.stderr);
  }
  return result;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `'${part}'` : part)).join(' ');
}

/**
 * First line of a command's stdout, or null when it failed or printed nothing.
 */
export async function readFirstLine(
  runner: CommandRunner,
  command: string,
  args: string[]
): Promise<string | null> {
  const result = await runner.run(command, args);
  if (result.exitCode !== 0) return null;
  const output = result.stdout || result.stderr;
  const line = output.split('\n')[0]?.trim();
  return line ? line : null;
}

// ============================================================================
// PATH LOOKUP
// ============================================================================

/**
 * Resolve an executable on PATH, the way `command -v` does for binaries.
 */
export async function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  if (name.includes('/')) {
    return (await isExecutableFile(name)) ? name : null;
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return false;
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export type ExecutableLookup = (name: string) => Promise<string | null>;
