/**
 * @fileoverview Configuration loading
 *
 * Resolves the config file (`--config`, then `$DEVENV_CONFIG`, then
 * `~/.config/wsl-devenv/config.yaml`), validates it and merges it over the
 * defaults.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../core/errors.js';
import { getErrorMessage, hasErrorCode } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_RELATIVE_PATH } from './defaults.js';
import { DevenvConfigFileSchema, type DevenvConfig, type DevenvConfigFile } from './schema.js';

export interface LoadConfigOptions {
  /** Explicit path from `--config`; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export interface LoadedConfig {
  config: DevenvConfig;
  /** File the values came from, or null when only defaults apply */
  source: string | null;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  const explicit = options.configPath ?? env.DEVENV_CONFIG;
  const candidate = explicit
    ? expandHome(explicit, homeDir)
    : path.join(homeDir, DEFAULT_CONFIG_RELATIVE_PATH);

  const text = await readIfExists(candidate);
  if (text === null) {
    if (explicit) {
      throw new ConfigError('config file not found', candidate);
    }
    logDebug('[config] no config file, using defaults', { candidate });
    return { config: resolveConfig({}, homeDir), source: null };
  }

  const overrides = parseConfigText(text, candidate);
  logDebug('[config] loaded', { source: candidate });
  return { config: resolveConfig(overrides, homeDir), source: candidate };
}

export function parseConfigText(text: string, source?: string): DevenvConfigFile {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`invalid YAML: ${getErrorMessage(error)}`, source);
  }

  const parsed = DevenvConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ConfigError(`invalid configuration (${issues.join('; ')})`, source, issues);
  }
  return parsed.data;
}

/**
 * Merge file overrides over the defaults and expand `~` in path settings.
 */
export function resolveConfig(overrides: DevenvConfigFile, homeDir: string): DevenvConfig {
  const merged: DevenvConfig = {
    factCache: { ...DEFAULT_CONFIG.factCache, ...overrides.factCache },
    benchmark: { ...DEFAULT_CONFIG.benchmark, ...overrides.benchmark },
    updates: { ...DEFAULT_CONFIG.updates, ...overrides.updates },
    verify: { ...DEFAULT_CONFIG.verify, ...overrides.verify },
    keys: { ...DEFAULT_CONFIG.keys, ...overrides.keys },
    wsl: { ...DEFAULT_CONFIG.wsl, ...overrides.wsl },
    downloads: { ...DEFAULT_CONFIG.downloads, ...overrides.downloads },
    tools: { ...DEFAULT_CONFIG.tools, ...overrides.tools },
  };

  const expand = (value: string): string => expandHome(value, homeDir);
  const expandNullable = (value: string | null): string | null => (value === null ? null : expand(value));

  return {
    ...merged,
    factCache: { ...merged.factCache, dir: expand(merged.factCache.dir) },
    benchmark: { ...merged.benchmark, dir: expand(merged.benchmark.dir) },
    updates: { ...merged.updates, stampFile: expand(merged.updates.stampFile) },
    keys: {
      windowsHome: expandNullable(merged.keys.windowsHome),
      usersRoot: expand(merged.keys.usersRoot),
      sshDir: expand(merged.keys.sshDir),
      gpgDir: expandNullable(merged.keys.gpgDir),
    },
    downloads: { ...merged.downloads, installDir: expand(merged.downloads.installDir) },
  };
}

export function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/')) return path.join(homeDir, value.slice(2));
  return value;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw new ConfigError(`cannot read config file: ${getErrorMessage(error)}`, filePath);
  }
}
