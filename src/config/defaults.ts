/**
 * @fileoverview Built-in defaults
 *
 * Paths may start with `~`; they are expanded against the home directory when
 * the configuration is resolved.
 */

import type { DevenvConfig } from './schema.js';

export const DEFAULT_ROLES = [
  'common',
  'ssh-keys',
  'gpg-keys',
  'development',
  'kubernetes-tools',
  'docker',
] as const;

export const DEFAULT_OPTIONAL_TOOLS = [
  'git',
  'curl',
  'wget',
  'vim',
  'docker',
  'node',
  'npm',
  'go',
  'rustc',
  'ruby',
  'terraform',
  'kubectl',
  'talosctl',
  'doppler',
  'gpg',
] as const;

export const DEFAULT_CONFIG: DevenvConfig = {
  factCache: {
    dir: '~/.ansible/facts_cache',
    maxAgeDays: 30,
  },
  benchmark: {
    dir: '~/.ansible-benchmarks',
    playbook: 'playbooks/main.yml',
    keep: 10,
  },
  updates: {
    stampFile: '~/.ansible-last-update-check',
    intervalDays: 7,
    remote: 'origin',
    branch: 'main',
  },
  verify: {
    roles: [...DEFAULT_ROLES],
    optionalTools: [...DEFAULT_OPTIONAL_TOOLS],
  },
  keys: {
    windowsHome: null,
    usersRoot: '/mnt/c/Users',
    sshDir: '~/.ssh',
    gpgDir: null,
  },
  wsl: {
    memory: '8GB',
    processors: 4,
    swap: '2GB',
    localhostForwarding: true,
  },
  downloads: {
    attempts: 3,
    delayMs: 2000,
    installDir: '~/.local/bin',
  },
  tools: {
    kubectl: { version: '1.31.2' },
    talosctl: { version: '1.8.3' },
    sops: { version: '3.9.1' },
  },
};

export const DEFAULT_CONFIG_RELATIVE_PATH = '.config/wsl-devenv/config.yaml';
