/**
 * @fileoverview Shared argument handling for commands
 *
 * Commands parse their own flags with `node:util` parseArgs in non-strict
 * mode, with the global flags such as `--json` declared alongside. Values
 * therefore come back loosely typed and are read through these helpers.
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';
import type { DevenvConfig } from '../config/index.js';
import type { CommandRunner } from '../utils/exec.js';
import { createError } from './errors.js';

/** What every command receives from the dispatcher. */
export interface CommandContext {
  workspace: string;
  /** Arguments after the command name */
  args: string[];
  config: DevenvConfig;
  verbose: boolean;
  json: boolean;
  /** Overrides the execa-backed runner (tests) */
  runner?: CommandRunner;
}

/** Options every command accepts, so their values are not taken as positionals */
export const GLOBAL_OPTIONS = {
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
  workspace: { type: 'string', short: 'w' },
  config: { type: 'string', short: 'c' },
  verbose: { type: 'boolean', default: false },
  json: { type: 'boolean', default: false },
} satisfies NonNullable<ParseArgsConfig['options']>;

export type ParsedValues = Record<string, string | boolean | Array<string | boolean> | undefined>;

/**
 * Parse a command's arguments. The parse itself is non-strict so option
 * values that look like flags survive, but any option neither global nor
 * declared by the command is rejected.
 */
export function parseCommandArgs(
  args: string[],
  options: NonNullable<ParseArgsConfig['options']>
): { values: ParsedValues; positionals: string[] } {
  const known: NonNullable<ParseArgsConfig['options']> = { ...GLOBAL_OPTIONS, ...options };
  const { values, positionals, tokens } = parseArgs({
    args,
    options: known,
    allowPositionals: true,
    strict: false,
    tokens: true,
  });
  for (const token of tokens) {
    if (token.kind === 'option' && !Object.hasOwn(known, token.name)) {
      throw createError('EINVALID_ARGUMENT', `Unknown option: ${token.rawName}`, { option: token.rawName });
    }
  }
  return { values, positionals };
}

export function flag(values: ParsedValues, name: string): boolean {
  return values[name] === true;
}

export function stringOption(values: ParsedValues, name: string): string | undefined {
  const value = values[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Integer option (`--age 30`) of at least `min`, or `fallback` when absent.
 */
export function countOption(values: ParsedValues, name: string, fallback: number, min = 0): number {
  const raw = values[name];
  if (raw === undefined) return fallback;
  const value = typeof raw === 'string' && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!(value >= min)) {
    const expected = min === 0 ? 'a non-negative integer' : `an integer of at least ${min}`;
    throw createError('EINVALID_ARGUMENT', `--${name} must be ${expected}`, { option: name });
  }
  return value;
}
