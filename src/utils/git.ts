/**
 * @fileoverview Git Utilities
 * Git plumbing used by the update check, run through a CommandRunner.
 */

import type { CommandRunner } from './exec.js';

export interface GitCommitInfo {
  shortHash: string;
  date: string;
  subject: string;
}

export class GitClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly cwd: string,
  ) {}

  private async git(args: string[]): Promise<{ ok: boolean; stdout: string }> {
    const result = await this.runner.run('git', args, { cwd: this.cwd });
    return { ok: result.exitCode === 0, stdout: result.stdout };
  }

  async revParse(ref: string): Promise<string | null> {
    const { ok, stdout } = await this.git(['rev-parse', ref]);
    return ok && stdout ? stdout : null;
  }

  async currentBranch(): Promise<string | null> {
    const { ok, stdout } = await this.git(['branch', '--show-current']);
    return ok ? stdout : null;
  }

  async lastCommit(): Promise<GitCommitInfo | null> {
    const { ok, stdout } = await this.git(['log', '-1', '--date=short', '--format=%h%x09%cd%x09%s']);
    if (!ok || !stdout) return null;
    const [shortHash = '', date = '', ...subject] = stdout.split('\t');
    return { shortHash, date, subject: subject.join('\t') };
  }

  async fetch(remote: string, branch: string): Promise<boolean> {
    const { ok } = await this.git(['fetch', remote, branch, '--quiet']);
    return ok;
  }

  /** Number of commits in `range`; 0 when git cannot answer. */
  async countCommits(range: string): Promise<number> {
    const { ok, stdout } = await this.git(['rev-list', '--count', range]);
    if (!ok) return 0;
    const count = Number.parseInt(stdout, 10);
    return Number.isNaN(count) ? 0 : count;
  }

  async onelineLog(range: string, limit: number): Promise<string[]> {
    const { ok, stdout } = await this.git(['log', '--oneline', '--decorate', `-${limit}`, range]);
    if (!ok) return [];
    return stdout.split('\n').filter(Boolean);
  }

  /** True when tracked files differ from HEAD. */
  async hasLocalChanges(): Promise<boolean> {
    const { ok } = await this.git(['diff-index', '--quiet', 'HEAD', '--']);
    return !ok;
  }

  async shortStatus(): Promise<string[]> {
    const { ok, stdout } = await this.git(['status', '--short']);
    if (!ok) return [];
    return stdout.split('\n').filter(Boolean);
  }
}
