/**
 * @fileoverview Repository update check
 *
 * Compares the local checkout with its remote branch at most once per
 * interval. The last check time lives in a stamp file as epoch seconds.
 *
 * Outcomes map to the process exit code: 0 up to date (or not due), 1 check
 * failed, 2 updates available.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PreconditionError } from '../core/errors.js';
import type { StatusReporter } from '../core/interaction.js';
import { hasErrorCode } from '../utils/errors.js';
import type { CommandRunner } from '../utils/exec.js';
import { GitClient, type GitCommitInfo } from '../utils/git.js';

export const SECONDS_PER_DAY = 86_400;
export const RECENT_CHANGES_LIMIT = 10;

export const UPDATE_EXIT_CODES = {
  upToDate: 0,
  failed: 1,
  updatesAvailable: 2,
} as const;

// ============================================================================
// THROTTLE
// ============================================================================

export interface ThrottleDecision {
  due: boolean;
  /** Epoch seconds of the previous check, when known */
  lastCheck: number | null;
  /** Epoch seconds when the next check becomes due, when known */
  nextCheck: number | null;
}

export async function readStamp(stampFile: string): Promise<number | null> {
  let text: string;
  try {
    text = await fs.readFile(stampFile, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

export async function writeStamp(stampFile: string, now: Date): Promise<void> {
  await fs.mkdir(path.dirname(stampFile), { recursive: true });
  await fs.writeFile(stampFile, `${toEpochSeconds(now)}\n`);
}

/**
 * A check is due when forced, when there is no readable stamp, or when
 * strictly more than `intervalDays` have passed since the stamp.
 */
export function decideThrottle(
  lastCheck: number | null,
  intervalDays: number,
  now: Date,
  force: boolean
): ThrottleDecision {
  const interval = intervalDays * SECONDS_PER_DAY;
  const nextCheck = lastCheck === null ? null : lastCheck + interval;
  if (force || lastCheck === null) {
    return { due: true, lastCheck, nextCheck };
  }
  return { due: toEpochSeconds(now) - lastCheck > interval, lastCheck, nextCheck };
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

// ============================================================================
// CHECK
// ============================================================================

export interface UpdateCheckOptions {
  repoDir: string;
  remote: string;
  branch: string;
  stampFile: string;
  now?: Date;
  /** Called with the repository state before anything is fetched */
  onRepositoryInfo?: (info: RepositoryInfo, localChanges: string[]) => void;
}

export interface RepositoryInfo {
  repoDir: string;
  branch: string | null;
  commit: GitCommitInfo | null;
}

export type UpdateCheckResult =
  | { status: 'fetch_failed'; info: RepositoryInfo; localChanges: string[] }
  | { status: 'remote_unknown'; info: RepositoryInfo; localChanges: string[] }
  | { status: 'up_to_date'; info: RepositoryInfo; localChanges: string[] }
  | {
      status: 'updates_available';
      info: RepositoryInfo;
      localChanges: string[];
      behind: number;
      recentChanges: string[];
    };

export function exitCodeFor(result: UpdateCheckResult): number {
  switch (result.status) {
    case 'fetch_failed':
      return UPDATE_EXIT_CODES.failed;
    case 'updates_available':
      return UPDATE_EXIT_CODES.updatesAvailable;
    case 'remote_unknown':
    case 'up_to_date':
      return UPDATE_EXIT_CODES.upToDate;
  }
}

export async function checkForUpdates(
  options: UpdateCheckOptions,
  runner: CommandRunner,
  reporter: StatusReporter
): Promise<UpdateCheckResult> {
  const { repoDir, remote, branch } = options;
  const upstream = `${remote}/${branch}`;

  if (!(await exists(path.join(repoDir, '.git')))) {
    throw new PreconditionError('not_a_git_repo', `Not a git repository: ${repoDir}`);
  }

  const git = new GitClient(runner, repoDir);
  const info: RepositoryInfo = {
    repoDir,
    branch: await git.currentBranch(),
    commit: await git.lastCommit(),
  };

  const localChanges = (await git.hasLocalChanges()) ? await git.shortStatus() : [];
  options.onRepositoryInfo?.(info, localChanges);
  if (localChanges.length > 0) {
    reporter.warn('You have uncommitted local changes');
  }

  reporter.info('Fetching latest changes from remote...');
  if (!(await git.fetch(remote, branch))) {
    reporter.warn('Failed to fetch updates (network issue or no remote configured)');
    return { status: 'fetch_failed', info, localChanges };
  }
  reporter.success('Fetched latest changes');

  const result = await compareWithRemote(git, upstream, reporter);
  await writeStamp(options.stampFile, options.now ?? new Date());

  if (result.behind === null) {
    return { status: 'remote_unknown', info, localChanges };
  }
  if (result.behind === 0) {
    return { status: 'up_to_date', info, localChanges };
  }
  return {
    status: 'updates_available',
    info,
    localChanges,
    behind: result.behind,
    recentChanges: await git.onelineLog(`HEAD..${upstream}`, RECENT_CHANGES_LIMIT),
  };
}

async function compareWithRemote(
  git: GitClient,
  upstream: string,
  reporter: StatusReporter
): Promise<{ behind: number | null }> {
  const current = await git.revParse('HEAD');
  const remote = await git.revParse(upstream);

  if (!remote) {
    reporter.warn('Could not determine remote commit');
    return { behind: null };
  }
  if (current === remote) {
    reporter.success('Your repository is up to date!');
    return { behind: 0 };
  }

  // Diverged or ahead-only checkouts count zero commits behind
  const behind = await git.countCommits(`HEAD..${upstream}`);
  if (behind === 0) {
    reporter.success('No new commits on the remote branch');
  }
  return { behind };
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
