/**
 * @fileoverview Playbook benchmark
 *
 * Times one `ansible-playbook` run with the profile_tasks and timer callbacks
 * enabled, appends the timing to a results file, compares it with the previous
 * run and prunes old runs.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CommandFailedError } from '../core/errors.js';
import type { Prompter, StatusReporter } from '../core/interaction.js';
import { collectSystemInfo, type SystemInfo } from '../system/environment.js';
import { formatCommand, type CommandRunner } from '../utils/exec.js';
import { formatFileTimestamp } from '../utils/format.js';
import {
  compareDurations,
  extractProfileSection,
  formatPercent,
  parseTotalDuration,
  renderAnalysis,
  renderComparison,
  renderHeader,
  renderResults,
  type DurationComparison,
} from './report.js';
import {
  findPreviousResult,
  listResultFiles,
  pruneResults,
  resultsFileName,
  summaryFileName,
} from './history.js';

export const PROFILING_ENV: Readonly<Record<string, string>> = {
  ANSIBLE_CALLBACKS_ENABLED: 'profile_tasks,timer',
  ANSIBLE_CALLBACK_RESULT_FORMAT: 'json',
};

// ============================================================================
// TYPES
// ============================================================================

export interface BenchmarkOptions {
  /** Directory holding results files */
  benchmarkDir: string;
  /** Playbook path, relative to `workspace` */
  playbook: string;
  workspace: string;
  /** `--check` run (default) instead of a real run */
  checkMode: boolean;
  /** Number of runs to keep after pruning */
  keep: number;
}

export interface BenchmarkDeps {
  runner: CommandRunner;
  prompter: Prompter;
  reporter: StatusReporter;
  /** Receives playbook output as it streams */
  output?: (chunk: string) => void;
  now?: () => Date;
  systemInfo?: () => Promise<SystemInfo>;
}

export interface ComparisonResult extends DurationComparison {
  previousFile: string;
}

export interface BenchmarkSummary {
  timestamp: string;
  playbook: string;
  checkMode: boolean;
  durationSeconds: number;
  startedAt: string;
  endedAt: string;
  resultsFile: string;
  comparison: ComparisonResult | null;
}

export type BenchmarkOutcome =
  | { status: 'cancelled' }
  | {
      status: 'completed';
      resultsFile: string;
      summaryFile: string;
      summary: BenchmarkSummary;
      profileFound: boolean;
      pruned: number;
    };

// ============================================================================
// BENCHMARK
// ============================================================================

export async function runBenchmark(options: BenchmarkOptions, deps: BenchmarkDeps): Promise<BenchmarkOutcome> {
  const { runner, prompter, reporter } = deps;
  const now = deps.now ?? (() => new Date());
  const timestamp = now();
  const stamp = formatFileTimestamp(timestamp);
  const resultsFile = path.join(options.benchmarkDir, resultsFileName(stamp));
  const summaryFile = path.join(options.benchmarkDir, summaryFileName(stamp));

  reporter.info(`Results file: ${resultsFile}`);
  await ensureDirectory(options.benchmarkDir, reporter);

  // System information
  reporter.step('Capturing system information...');
  const info = await (deps.systemInfo ?? collectSystemInfo)();
  const ansibleVersion = await runner.run('ansible', ['--version']);
  const versionText = ansibleVersion.exitCode === 0 ? ansibleVersion.stdout : 'ansible not available';
  await fs.writeFile(resultsFile, renderHeader(timestamp, info, versionText));
  reporter.success('System information captured');

  // Playbook run
  reporter.step('Running playbook with performance profiling...');
  reporter.info(`Playbook: ${options.playbook}`);
  reporter.info(`Check mode: ${options.checkMode}`);

  if (options.checkMode) {
    reporter.warn('Running in check mode (dry run)');
  } else {
    reporter.warn('Running playbook (this will make changes!)');
    if (!(await prompter.confirm('Continue?'))) {
      reporter.info('Benchmark cancelled');
      await fs.rm(resultsFile, { force: true });
      return { status: 'cancelled' };
    }
  }

  const args = options.checkMode ? ['--check', options.playbook] : [options.playbook];
  const chunks: string[] = [];
  const startedAt = now();
  const result = await runner.run('ansible-playbook', args, {
    cwd: options.workspace,
    env: { ...PROFILING_ENV },
    onOutput: (chunk) => {
      chunks.push(chunk);
      deps.output?.(chunk);
    },
  });
  const endedAt = now();
  const playbookOutput = chunks.join('');
  await fs.appendFile(resultsFile, playbookOutput);

  if (result.exitCode !== 0) {
    throw new CommandFailedError('Benchmark playbook run', formatCommand('ansible-playbook', args), result.exitCode);
  }

  // `date +%s` granularity: whole seconds on both ends
  const durationSeconds = Math.floor(endedAt.getTime() / 1000) - Math.floor(startedAt.getTime() / 1000);
  await fs.appendFile(resultsFile, renderResults(durationSeconds, startedAt, endedAt));
  reporter.success(`Playbook execution completed in ${durationSeconds}s`);

  // Profile analysis
  reporter.step('Analyzing results...');
  const profile = extractProfileSection(playbookOutput);
  if (profile) {
    await fs.appendFile(resultsFile, renderAnalysis(profile));
    reporter.success('Performance analysis added to results');
  } else {
    reporter.warn('Profile data not found. Enable profile_tasks callback for detailed analysis.');
  }

  // Comparison
  reporter.step('Comparing with previous benchmarks...');
  const comparison = await compareWithPrevious(options.benchmarkDir, resultsFile, reporter);

  const summary: BenchmarkSummary = {
    timestamp: timestamp.toISOString(),
    playbook: options.playbook,
    checkMode: options.checkMode,
    durationSeconds,
    startedAt: startedAt.toISOString(),
    endedAt: endedAt.toISOString(),
    resultsFile,
    comparison,
  };
  await fs.writeFile(summaryFile, `${JSON.stringify(summary, null, 2)}\n`);

  // Pruning
  reporter.step(`Cleaning up old benchmarks (keeping last ${options.keep})...`);
  const pruned = await pruneResults(options.benchmarkDir, options.keep);
  if (pruned > 0) {
    reporter.success(`Removed ${pruned} old benchmark files`);
  } else {
    const stored = (await listResultFiles(options.benchmarkDir)).length;
    reporter.info(`No cleanup needed (only ${stored} benchmarks stored)`);
  }

  return {
    status: 'completed',
    resultsFile,
    summaryFile,
    summary,
    profileFound: profile !== null,
    pruned,
  };
}

async function compareWithPrevious(
  benchmarkDir: string,
  resultsFile: string,
  reporter: StatusReporter
): Promise<ComparisonResult | null> {
  const runs = await listResultFiles(benchmarkDir);
  if (runs.length <= 1) {
    reporter.info('No previous benchmarks to compare');
    return null;
  }
  reporter.info(`Found ${runs.length} previous benchmark runs`);

  const previousFile = await findPreviousResult(benchmarkDir, resultsFile);
  if (!previousFile) return null;

  const previous = parseTotalDuration(await fs.readFile(previousFile, 'utf8'));
  const current = parseTotalDuration(await fs.readFile(resultsFile, 'utf8'));
  if (previous === null || current === null) return null;

  const comparison = compareDurations(previous, current);
  await fs.appendFile(resultsFile, renderComparison(comparison));

  switch (comparison.trend) {
    case 'improved':
      reporter.success(
        `Performance improved by ${-comparison.diffSeconds}s (${formatPercent(comparison.percent, true)})`
      );
      break;
    case 'degraded':
      reporter.warn(`Performance degraded by ${comparison.diffSeconds}s (${formatPercent(comparison.percent)})`);
      break;
    case 'unchanged':
      reporter.info('Performance unchanged');
      break;
  }

  return { previousFile, ...comparison };
}

async function ensureDirectory(dir: string, reporter: StatusReporter): Promise<void> {
  const created = await fs.mkdir(dir, { recursive: true });
  if (created !== undefined) {
    reporter.info(`Created benchmark directory: ${dir}`);
  }
}
