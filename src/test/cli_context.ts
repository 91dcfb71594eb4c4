/**
 * @fileoverview CommandContext builder and console capture for command tests
 */

import { vi } from 'vitest';
import type { CommandContext } from '../cli/args.js';
import { resolveConfig, type DevenvConfigFile } from '../config/index.js';

/**
 * Context with configuration resolved against `homeDir`, so every `~` path
 * lands in the test's temp directory.
 */
export function createTestContext(
  homeDir: string,
  overrides: Partial<Omit<CommandContext, 'config'>> & { config?: DevenvConfigFile } = {}
): CommandContext {
  const { config, ...rest } = overrides;
  return {
    workspace: homeDir,
    args: [],
    verbose: false,
    json: false,
    ...rest,
    config: resolveConfig(config ?? {}, homeDir),
  };
}

export interface ConsoleCapture {
  /** Every console.log call, arguments joined by spaces */
  lines(): string[];
  /** Parsed JSON from the single console.log call */
  json(): unknown;
  /** Everything passed to process.stdout.write */
  written(): string;
  restore(): void;
}

export function captureConsole(): ConsoleCapture {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const lines = (): string[] => log.mock.calls.map((args) => args.map(String).join(' '));
  return {
    lines,
    json: () => {
      const all = lines();
      if (all.length !== 1) throw new Error(`expected one line of JSON output, got ${all.length}`);
      const parsed: unknown = JSON.parse(all[0]);
      return parsed;
    },
    written: () => write.mock.calls.map((args) => String(args[0])).join(''),
    restore: () => {
      log.mockRestore();
      write.mockRestore();
    },
  };
}
