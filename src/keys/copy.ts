/**
 * @fileoverview SSH and GPG key import from the Windows profile
 *
 * Copies `~/.ssh` from the Windows user profile into WSL with Linux
 * permissions and imports exported GPG keys.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { PreconditionError } from '../core/errors.js';
import type { StatusReporter } from '../core/interaction.js';
import { hasErrorCode } from '../utils/errors.js';
import { runChecked, type CommandRunner } from '../utils/exec.js';

/** Profiles under C:\Users that never belong to a person */
export const IGNORED_PROFILES = new Set(['Public', 'Default', 'Default User', 'All Users']);

/** Non-secret files in ~/.ssh */
const PUBLIC_SSH_FILES = new Set(['known_hosts', 'config']);

export const SSH_DIR_MODE = 0o700;
export const PRIVATE_FILE_MODE = 0o600;
export const PUBLIC_FILE_MODE = 0o644;

export const GPG_EXPORT_DIR = '.gnupg-export';

// ============================================================================
// TYPES
// ============================================================================

export type SshCopyAction = 'copied' | 'would_copy' | 'unchanged' | 'conflict';

export interface SshCopyEntry {
  name: string;
  action: SshCopyAction;
  mode: number;
}

export interface KeySyncOptions {
  windowsHome: string;
  sshDir: string;
  /** Defaults to `<windowsHome>/.gnupg-export` */
  gpgDir: string | null;
  force: boolean;
  dryRun: boolean;
}

export interface KeySyncReport {
  windowsHome: string;
  ssh: SshCopyEntry[];
  gpgDir: string;
  gpgFiles: string[];
  copied: number;
  skipped: number;
  imported: number;
}

// ============================================================================
// WINDOWS HOME
// ============================================================================

/**
 * The single profile under `usersRoot` that has a `.ssh` directory.
 */
export async function findWindowsHome(usersRoot: string): Promise<string> {
  const candidates: string[] = [];
  for (const entry of await readProfiles(usersRoot)) {
    if (IGNORED_PROFILES.has(entry)) continue;
    const home = path.join(usersRoot, entry);
    if (await isDirectory(path.join(home, '.ssh'))) {
      candidates.push(home);
    }
  }

  if (candidates.length === 1) return candidates[0];
  if (candidates.length === 0) {
    throw new PreconditionError(
      'missing_directory',
      `No Windows profile with a .ssh directory under ${usersRoot}; set keys.windowsHome`
    );
  }
  throw new PreconditionError(
    'ambiguous_windows_home',
    `Several Windows profiles have a .ssh directory (${candidates.join(', ')}); set keys.windowsHome`
  );
}

async function readProfiles(usersRoot: string): Promise<string[]> {
  try {
    return (await fs.readdir(usersRoot)).sort();
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new PreconditionError('missing_directory', `Windows users directory not found: ${usersRoot}`);
    }
    throw error;
  }
}

// ============================================================================
// SSH
// ============================================================================

export function sshFileMode(name: string): number {
  return name.endsWith('.pub') || PUBLIC_SSH_FILES.has(name) ? PUBLIC_FILE_MODE : PRIVATE_FILE_MODE;
}

export async function copySshKeys(
  sourceDir: string,
  targetDir: string,
  options: { force: boolean; dryRun: boolean },
  reporter: StatusReporter
): Promise<SshCopyEntry[]> {
  if (!(await isDirectory(sourceDir))) {
    throw new PreconditionError('missing_directory', `SSH directory not found: ${sourceDir}`);
  }

  const names = await glob('*', { cwd: sourceDir, nodir: true, dot: true });
  names.sort();

  if (!options.dryRun) {
    await fs.mkdir(targetDir, { recursive: true, mode: SSH_DIR_MODE });
    await fs.chmod(targetDir, SSH_DIR_MODE);
  }

  const entries: SshCopyEntry[] = [];
  for (const name of names) {
    const source = path.join(sourceDir, name);
    const target = path.join(targetDir, name);
    const mode = sshFileMode(name);
    const action = await planCopy(source, target, options);

    if (action === 'copied') {
      await writeWithMode(source, target, mode);
      reporter.success(`Copied ${name} (${mode.toString(8)})`);
    } else if (action === 'unchanged' && !options.dryRun) {
      if (await ensureMode(target, mode)) {
        reporter.info(`Set ${name} to ${mode.toString(8)}`);
      }
    } else if (action === 'would_copy') {
      reporter.info(`Would copy ${name} (${mode.toString(8)})`);
    } else if (action === 'conflict') {
      reporter.warn(`${name} differs from the existing file, skipping (use --force to overwrite)`);
    }
    entries.push({ name, action, mode });
  }
  return entries;
}

async function planCopy(
  source: string,
  target: string,
  options: { force: boolean; dryRun: boolean }
): Promise<SshCopyAction> {
  const existing = await readOptional(target);
  if (existing !== null) {
    if (existing.equals(await fs.readFile(source))) return 'unchanged';
    if (!options.force) return 'conflict';
  }
  return options.dryRun ? 'would_copy' : 'copied';
}

/**
 * Write through a temp file created with `mode`, so the key never sits at
 * the target path with the source's (often 0777 on DrvFs) permissions.
 */
async function writeWithMode(source: string, target: string, mode: number): Promise<void> {
  const temp = `${target}.devenv-tmp`;
  try {
    await fs.writeFile(temp, await fs.readFile(source), { mode });
    // umask may have dropped bits from the create mode
    await fs.chmod(temp, mode);
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
}

/** Returns true when the mode had to be changed */
async function ensureMode(target: string, mode: number): Promise<boolean> {
  const current = (await fs.stat(target)).mode & 0o777;
  if (current === mode) return false;
  await fs.chmod(target, mode);
  return true;
}

// ============================================================================
// GPG
// ============================================================================

/**
 * Import every `*.asc` / `*.gpg` file in `gpgDir`. A missing directory
 * imports nothing.
 */
export async function importGpgKeys(
  gpgDir: string,
  runner: CommandRunner,
  options: { dryRun: boolean },
  reporter: StatusReporter
): Promise<string[]> {
  if (!(await isDirectory(gpgDir))) {
    reporter.info(`No GPG export directory at ${gpgDir}, skipping GPG import`);
    return [];
  }

  const files = (await glob('*.{asc,gpg}', { cwd: gpgDir, nodir: true, absolute: true })).sort();
  for (const file of files) {
    if (options.dryRun) {
      reporter.info(`Would import ${path.basename(file)}`);
      continue;
    }
    await runChecked(runner, 'GPG key import', 'gpg', ['--batch', '--import', file]);
    reporter.success(`Imported ${path.basename(file)}`);
  }
  return files;
}

// ============================================================================
// SYNC
// ============================================================================

export async function syncKeys(
  options: KeySyncOptions,
  deps: { runner: CommandRunner; reporter: StatusReporter }
): Promise<KeySyncReport> {
  const { runner, reporter } = deps;

  reporter.step('Copying SSH keys...');
  const ssh = await copySshKeys(path.join(options.windowsHome, '.ssh'), options.sshDir, options, reporter);

  reporter.step('Importing GPG keys...');
  const gpgDir = options.gpgDir ?? path.join(options.windowsHome, GPG_EXPORT_DIR);
  const gpgFiles = await importGpgKeys(gpgDir, runner, options, reporter);

  return {
    windowsHome: options.windowsHome,
    ssh,
    gpgDir,
    gpgFiles,
    copied: ssh.filter((entry) => entry.action === 'copied').length,
    skipped: ssh.filter((entry) => entry.action === 'unchanged' || entry.action === 'conflict').length,
    imported: options.dryRun ? 0 : gpgFiles.length,
  };
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function readOptional(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}
