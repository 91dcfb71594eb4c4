/**
 * @fileoverview Host environment probes
 *
 * WSL detection, privilege checks and the system summary written at the top
 * of benchmark reports.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { hasErrorCode } from '../utils/errors.js';

export const PROC_VERSION_PATH = '/proc/version';
export const OS_RELEASE_PATH = '/etc/os-release';

export interface SystemInfo {
  hostname: string;
  os: string;
  kernel: string;
  cpuModel: string;
  cpuCores: number;
  totalMemoryBytes: number;
  /** Free space on `/` available to unprivileged users; null if unknown */
  diskFreeBytes: number | null;
}

/**
 * True when the kernel identifies itself as a Microsoft (WSL) build.
 */
export async function isWsl(procVersionPath: string = PROC_VERSION_PATH): Promise<boolean> {
  const text = await readOptional(procVersionPath);
  return text !== null && /microsoft/i.test(text);
}

export function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

/**
 * PRETTY_NAME from an os-release file, or null when absent.
 */
export function parseOsRelease(text: string): string | null {
  for (const line of text.split('\n')) {
    const match = /^PRETTY_NAME=(.*)$/.exec(line.trim());
    if (match) {
      const value = match[1].replace(/^(["'])(.*)\1$/, '$2').trim();
      return value || null;
    }
  }
  return null;
}

export async function collectSystemInfo(osReleasePath: string = OS_RELEASE_PATH): Promise<SystemInfo> {
  const osRelease = await readOptional(osReleasePath);
  const cpus = os.cpus();

  return {
    hostname: os.hostname(),
    os: (osRelease && parseOsRelease(osRelease)) || 'Unknown',
    kernel: os.release(),
    cpuModel: cpus[0]?.model.trim() || 'Unknown',
    cpuCores: cpus.length,
    totalMemoryBytes: os.totalmem(),
    diskFreeBytes: await diskFree('/'),
  };
}

async function diskFree(mountPoint: string): Promise<number | null> {
  try {
    const stats = await fs.statfs(mountPoint);
    return stats.bavail * stats.bsize;
  } catch {
    return null;
  }
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EACCES')) return null;
    throw error;
  }
}
