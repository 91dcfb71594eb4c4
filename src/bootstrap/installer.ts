/**
 * @fileoverview Ansible bootstrap
 *
 * Installs Ansible, its Python helpers and the lint tools on a fresh WSL2
 * Ubuntu. Runs front to back and aborts on the first failing apt step.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { glob } from 'glob';
import { PreconditionError } from '../core/errors.js';
import type { Prompter, StatusReporter } from '../core/interaction.js';
import { isRoot as processIsRoot, isWsl, PROC_VERSION_PATH } from '../system/environment.js';
import {
  findExecutable as lookupOnPath,
  readFirstLine,
  runChecked,
  type CommandRunner,
  type ExecutableLookup,
} from '../utils/exec.js';
import { hasErrorCode } from '../utils/errors.js';

// ============================================================================
// PACKAGES
// ============================================================================

export const PREREQUISITE_PACKAGES = [
  'software-properties-common',
  'python3',
  'python3-pip',
  'python3-dev',
  'git',
  'curl',
  'wget',
  'build-essential',
  'libffi-dev',
  'libssl-dev',
  'libyaml-dev',
  'python3-apt',
] as const;

export const PYTHON_APT_PACKAGES = ['python3-jmespath', 'python3-netaddr', 'python3-passlib'] as const;

export const LINT_TOOLS = ['ansible-lint', 'yamllint'] as const;

export const ANSIBLE_PPA = 'ppa:ansible/ansible';

export const PATH_BLOCK = '\n# Ansible bootstrap: Add pip user bin to PATH\nexport PATH="$HOME/.local/bin:$PATH"\n';

const PIP_USER_INSTALL = ['install', '--user', '--break-system-packages'];

// ============================================================================
// TYPES
// ============================================================================

export interface BootstrapOptions {
  skipUpgrade: boolean;
  homeDir?: string;
  /** Value of $PATH to inspect for ~/.local/bin */
  pathEnv?: string;
  aptSourcesList?: string;
  aptSourcesDir?: string;
  procVersionPath?: string;
}

export interface BootstrapDeps {
  runner: CommandRunner;
  prompter: Prompter;
  reporter: StatusReporter;
  findExecutable?: ExecutableLookup;
  isRoot?: () => boolean;
}

export interface InstalledVersions {
  ansible: string | null;
  python: string | null;
  ansibleLint: string | null;
  yamllint: string | null;
}

export type BootstrapOutcome =
  | { status: 'cancelled' }
  | {
      status: 'completed';
      ansibleInstalled: boolean;
      ppaAdded: boolean;
      pathConfigured: boolean;
      createdDirs: string[];
      versions: InstalledVersions;
    };

// ============================================================================
// BOOTSTRAP
// ============================================================================

export async function runBootstrap(options: BootstrapOptions, deps: BootstrapDeps): Promise<BootstrapOutcome> {
  const { runner, prompter, reporter } = deps;
  const which = deps.findExecutable ?? ((name: string) => lookupOnPath(name));
  const homeDir = options.homeDir ?? os.homedir();
  const sudo = (step: string, args: string[]) => runChecked(runner, step, 'sudo', args, { inherit: true });

  if ((deps.isRoot ?? processIsRoot)()) {
    throw new PreconditionError(
      'running_as_root',
      'This command should NOT be run as root. Run as a regular user; sudo is used when needed.'
    );
  }

  if (await isWsl(options.procVersionPath ?? PROC_VERSION_PATH)) {
    reporter.success('Running in WSL environment');
  } else {
    reporter.warn('This command is designed for WSL2 Ubuntu');
    if (!(await prompter.confirm('Continue anyway?'))) {
      reporter.info('Installation cancelled');
      return { status: 'cancelled' };
    }
  }

  reporter.step('Updating package lists...');
  await sudo('Package list update', ['apt', 'update']);
  reporter.success('Package lists updated');

  if (options.skipUpgrade) {
    reporter.info('Skipping package upgrade');
  } else {
    reporter.step('Upgrading existing packages...');
    reporter.warn('This may take a while...');
    await sudo('Package upgrade', ['apt', 'upgrade', '-y']);
    reporter.success('Packages upgraded');
  }

  reporter.step('Installing prerequisites...');
  reporter.info(`Installing: ${PREREQUISITE_PACKAGES.join(' ')}`);
  await sudo('Prerequisite installation', ['apt', 'install', '-y', ...PREREQUISITE_PACKAGES]);
  reporter.success('Prerequisites installed');

  reporter.step('Adding Ansible PPA...');
  const ppaPresent = await hasAnsiblePpa(
    options.aptSourcesList ?? '/etc/apt/sources.list',
    options.aptSourcesDir ?? '/etc/apt/sources.list.d'
  );
  if (ppaPresent) {
    reporter.warn('Ansible PPA already added, skipping...');
  } else {
    await sudo('Ansible PPA', ['add-apt-repository', '--yes', '--update', ANSIBLE_PPA]);
    reporter.success('Ansible PPA added');
  }

  reporter.step('Installing Ansible...');
  const ansibleInstalled = await installAnsible(deps, which);

  reporter.step('Installing Python dependencies...');
  await installPythonDeps(deps, which);

  reporter.step('Configuring PATH...');
  const pathConfigured = await configurePath(homeDir, options.pathEnv ?? process.env.PATH ?? '', reporter);

  reporter.step('Setting up Ansible directories...');
  const createdDirs = await setupDirectories(homeDir, reporter);
  reporter.success('Directories ready');

  reporter.step('Verifying installation...');
  const versions = await verifyInstallation(deps, which);

  return {
    status: 'completed',
    ansibleInstalled,
    ppaAdded: !ppaPresent,
    pathConfigured,
    createdDirs,
    versions,
  };
}

// ============================================================================
// STEPS
// ============================================================================

/**
 * True when any apt source line mentions the Ansible PPA.
 */
export async function hasAnsiblePpa(sourcesList: string, sourcesDir: string): Promise<boolean> {
  const files = [sourcesList, ...(await glob('*', { cwd: sourcesDir, absolute: true, nodir: true }))];
  for (const file of files) {
    const text = await readOptional(file);
    if (text?.includes('ansible/ansible')) return true;
  }
  return false;
}

async function installAnsible(deps: BootstrapDeps, which: ExecutableLookup): Promise<boolean> {
  const { runner, prompter, reporter } = deps;
  if (await which('ansible')) {
    const current = await readFirstLine(runner, 'ansible', ['--version']);
    reporter.warn(`Ansible already installed: ${current ?? 'unknown version'}`);
    if (!(await prompter.confirm('Reinstall/Upgrade?'))) {
      reporter.info('Skipping Ansible installation');
      return false;
    }
  }
  await runChecked(runner, 'Ansible installation', 'sudo', ['apt', 'install', '-y', 'ansible'], { inherit: true });
  reporter.success('Ansible installed');
  return true;
}

async function installPythonDeps(deps: BootstrapDeps, which: ExecutableLookup): Promise<void> {
  const { runner, reporter } = deps;

  reporter.info(`Installing Python packages from apt: ${PYTHON_APT_PACKAGES.join(' ')}`);
  const apt = await runner.run('sudo', ['apt', 'install', '-y', ...PYTHON_APT_PACKAGES]);
  if (apt.exitCode !== 0) {
    reporter.warn('Some apt packages not available');
  }

  if (!(await which('pipx'))) {
    reporter.info('Installing pipx for isolated package management...');
    const aptPipx = await runner.run('sudo', ['apt', 'install', '-y', 'pipx']);
    if (aptPipx.exitCode !== 0) {
      reporter.warn('pipx not available via apt, falling back to pip');
      await runChecked(runner, 'pipx installation', 'pip3', [...PIP_USER_INSTALL, 'pipx']);
    }
    // Fails harmlessly when pipx landed outside PATH
    await runner.run('pipx', ['ensurepath']);
  }

  reporter.info(`Installing Python packages via pipx: ${LINT_TOOLS.join(' ')}`);
  for (const tool of LINT_TOOLS) {
    const pipUpgrade = [...PIP_USER_INSTALL, '--upgrade', tool];
    if (await which('pipx')) {
      if ((await runner.run('pipx', ['install', tool])).exitCode === 0) continue;
      if ((await runner.run('pipx', ['upgrade', tool])).exitCode === 0) continue;
      reporter.warn(`pipx install failed for ${tool}, trying pip fallback`);
    }
    await runChecked(runner, `${tool} installation`, 'pip3', pipUpgrade);
  }

  reporter.success('Python dependencies installed');
}

async function configurePath(homeDir: string, pathEnv: string, reporter: StatusReporter): Promise<boolean> {
  const pipBin = path.join(homeDir, '.local', 'bin');
  if (pathEnv.split(path.delimiter).includes(pipBin)) {
    reporter.info('PATH already configured');
    return false;
  }
  reporter.info(`Adding ${pipBin} to PATH in ~/.bashrc`);
  await fs.appendFile(path.join(homeDir, '.bashrc'), PATH_BLOCK);
  reporter.success('PATH configured (restart shell or source ~/.bashrc)');
  return true;
}

async function setupDirectories(homeDir: string, reporter: StatusReporter): Promise<string[]> {
  const created: string[] = [];
  for (const relative of ['.ansible', '.ansible/tmp', '.ansible/roles']) {
    const dir = path.join(homeDir, relative);
    if (await fs.mkdir(dir, { recursive: true })) {
      created.push(dir);
      reporter.info(`Created: ${dir}`);
    }
  }
  return created;
}

async function verifyInstallation(deps: BootstrapDeps, which: ExecutableLookup): Promise<InstalledVersions> {
  const { runner, reporter } = deps;

  if (!(await which('ansible'))) {
    throw new PreconditionError('missing_tool', 'Ansible not found in PATH after installation');
  }
  const ansible = await readFirstLine(runner, 'ansible', ['--version']);
  reporter.success(`Ansible: ${ansible ?? 'unknown'}`);
  const python = await readFirstLine(runner, 'python3', ['--version']);
  reporter.success(`Python: ${python ?? 'unknown'}`);

  const lintVersions: Array<string | null> = [];
  for (const tool of LINT_TOOLS) {
    if (await which(tool)) {
      const version = await readFirstLine(runner, tool, ['--version']);
      reporter.success(`${tool}: ${version ?? 'unknown'}`);
      lintVersions.push(version);
    } else {
      reporter.warn(`${tool} not in PATH (may need to source ~/.bashrc)`);
      lintVersions.push(null);
    }
  }

  reporter.success('Verification complete');
  return { ansible, python, ansibleLint: lintVersions[0] ?? null, yamllint: lintVersions[1] ?? null };
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EACCES') || hasErrorCode(error, 'EISDIR')) {
      return null;
    }
    throw error;
  }
}
