/**
 * @fileoverview Setup verification
 *
 * Checks that the Ansible toolchain is installed and the project layout is
 * complete. Each check passes, warns (optional or environmental) or fails
 * (blocks running playbooks).
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { isWsl as detectWsl } from '../system/environment.js';
import {
  findExecutable as lookupOnPath,
  readFirstLine,
  type CommandRunner,
  type ExecutableLookup,
} from '../utils/exec.js';
import { formatBytes } from '../utils/format.js';

// ============================================================================
// TYPES
// ============================================================================

export type CheckOutcome = 'pass' | 'warn' | 'fail';

export interface VerificationCheck {
  section: string;
  outcome: CheckOutcome;
  message: string;
  /** Command to run to investigate a failure */
  hint?: string;
}

export interface VerificationReport {
  timestamp: string;
  workspace: string;
  checks: VerificationCheck[];
  summary: {
    passed: number;
    warnings: number;
    failed: number;
  };
  /** True when no check failed */
  ok: boolean;
}

export interface VerifyOptions {
  workspace: string;
  roles: readonly string[];
  optionalTools: readonly string[];
}

export interface VerifyDeps {
  runner: CommandRunner;
  findExecutable?: ExecutableLookup;
  isWsl?: () => Promise<boolean>;
  resources?: () => { totalMemoryBytes: number; cpuCores: number };
  now?: () => Date;
}

export const REQUIRED_FILES = [
  'ansible.cfg',
  'inventory/hosts',
  'playbooks/main.yml',
  'vars/user_environment.yml',
] as const;

export const SECTIONS = {
  environment: 'Environment Check',
  ansible: 'Ansible Installation',
  python: 'Python Environment',
  layout: 'Directory Structure',
  roles: 'Ansible Roles',
  playbook: 'Playbook Validation',
  inventory: 'Inventory Check',
  resources: 'System Resources',
  tools: 'Optional Development Tools',
} as const;

// ============================================================================
// VERIFICATION
// ============================================================================

class CheckCollector {
  readonly checks: VerificationCheck[] = [];
  private section = '';

  enter(section: string): void {
    this.section = section;
  }

  pass(message: string): void {
    this.checks.push({ section: this.section, outcome: 'pass', message });
  }

  warn(message: string): void {
    this.checks.push({ section: this.section, outcome: 'warn', message });
  }

  fail(message: string, hint?: string): void {
    this.checks.push({ section: this.section, outcome: 'fail', message, ...(hint ? { hint } : {}) });
  }
}

export async function runVerification(options: VerifyOptions, deps: VerifyDeps): Promise<VerificationReport> {
  const { workspace } = options;
  const { runner } = deps;
  const which = deps.findExecutable ?? ((name: string) => lookupOnPath(name));
  const has = async (name: string): Promise<boolean> => (await which(name)) !== null;
  const inWorkspace = (relative: string): string => path.join(workspace, relative);
  const c = new CheckCollector();

  c.enter(SECTIONS.environment);
  if (await (deps.isWsl ?? detectWsl)()) {
    c.pass('Running in WSL environment');
  } else {
    c.warn('Not running in WSL (this is okay if testing elsewhere)');
  }

  c.enter(SECTIONS.ansible);
  const hasAnsible = await has('ansible');
  if (hasAnsible) {
    const version = await readFirstLine(runner, 'ansible', ['--version']);
    c.pass(`Ansible installed: ${version ?? 'unknown version'}`);
  } else {
    c.fail('Ansible not found - run `devenv bootstrap`');
  }

  c.enter(SECTIONS.python);
  if (await has('python3')) {
    const version = await readFirstLine(runner, 'python3', ['--version']);
    c.pass(`Python installed: ${version ?? 'unknown version'}`);
  } else {
    c.fail('Python3 not found');
  }
  if (await has('pip3')) {
    c.pass('pip3 installed');
  } else {
    c.fail('pip3 not found');
  }
  for (const linter of ['ansible-lint', 'yamllint']) {
    if (await has(linter)) {
      c.pass(`${linter} installed`);
    } else {
      c.warn(`${linter} not found (optional but recommended)`);
    }
  }

  c.enter(SECTIONS.layout);
  for (const file of REQUIRED_FILES) {
    if (await isFile(inWorkspace(file))) {
      c.pass(`${file} found`);
    } else {
      c.fail(`${file} not found`);
    }
  }

  c.enter(SECTIONS.roles);
  for (const role of options.roles) {
    if (!(await isDirectory(inWorkspace(path.join('roles', role))))) {
      c.fail(`Role '${role}' not found`);
      continue;
    }
    c.pass(`Role '${role}' exists`);
    if (await isFile(inWorkspace(path.join('roles', role, 'tasks', 'main.yml')))) {
      c.pass(`  - ${role}/tasks/main.yml exists`);
    } else {
      c.fail(`  - ${role}/tasks/main.yml missing`);
    }
  }

  c.enter(SECTIONS.playbook);
  const hasMainPlaybook = await isFile(inWorkspace('playbooks/main.yml'));
  if (hasMainPlaybook && (await has('ansible-playbook'))) {
    const syntax = await runner.run('ansible-playbook', ['--syntax-check', 'playbooks/main.yml'], { cwd: workspace });
    if (syntax.exitCode === 0) {
      c.pass('Main playbook syntax is valid');
    } else {
      c.fail('Main playbook has syntax errors', 'ansible-playbook --syntax-check playbooks/main.yml');
    }
  }

  c.enter(SECTIONS.inventory);
  if (hasAnsible && (await isFile(inWorkspace('inventory/hosts')))) {
    const ping = await runner.run('ansible', ['local', '-m', 'ping', '--become=false'], { cwd: workspace });
    if (ping.exitCode === 0) {
      c.pass('Localhost connectivity verified');
    } else {
      c.warn('Cannot connect to localhost (may require password for become)');
    }
  }

  c.enter(SECTIONS.resources);
  const resources = (deps.resources ?? hostResources)();
  c.pass(`Total Memory: ${formatBytes(resources.totalMemoryBytes)}`);
  c.pass(`CPU Cores: ${resources.cpuCores}`);

  c.enter(SECTIONS.tools);
  for (const tool of options.optionalTools) {
    if (await has(tool)) {
      c.pass(`${tool} installed`);
    } else {
      c.warn(`${tool} not installed (will be installed by playbook if enabled)`);
    }
  }

  const summary = {
    passed: c.checks.filter((check) => check.outcome === 'pass').length,
    warnings: c.checks.filter((check) => check.outcome === 'warn').length,
    failed: c.checks.filter((check) => check.outcome === 'fail').length,
  };

  return {
    timestamp: (deps.now ?? (() => new Date()))().toISOString(),
    workspace,
    checks: c.checks,
    summary,
    ok: summary.failed === 0,
  };
}

function hostResources(): { totalMemoryBytes: number; cpuCores: number } {
  return { totalMemoryBytes: os.totalmem(), cpuCores: os.cpus().length };
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
