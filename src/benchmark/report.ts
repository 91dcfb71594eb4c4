/**
 * @fileoverview Benchmark results file layout
 *
 * The results file is plain text meant for humans and for the next run's
 * comparison, which reads the `Total Duration: <N>s` line back.
 */

import type { SystemInfo } from '../system/environment.js';
import { formatBytes, formatClock, formatLocalDateTime } from '../utils/format.js';

export const RULE = '='.repeat(50);
export const PROFILE_MARKER = 'Playbook run took';
export const PROFILE_CONTEXT_LINES = 50;

const TOTAL_DURATION_PATTERN = /^Total Duration:\s+(\d+)s\b/m;

export type DurationTrend = 'improved' | 'degraded' | 'unchanged';

export interface DurationComparison {
  previousSeconds: number;
  currentSeconds: number;
  diffSeconds: number;
  /** `diff / previous * 100` with two decimals; null when previous is 0 */
  percent: string | null;
  trend: DurationTrend;
}

function block(title: string, lines: string[]): string {
  return ['', RULE, title, RULE, ...lines, RULE, ''].join('\n');
}

export function renderHeader(timestamp: Date, info: SystemInfo, ansibleVersion: string): string {
  return [
    RULE,
    'Ansible Playbook Performance Benchmark',
    RULE,
    `Timestamp: ${timestamp.toISOString()}`,
    `Hostname: ${info.hostname}`,
    '',
    'System Information:',
    '-------------------',
    `OS: ${info.os}`,
    `Kernel: ${info.kernel}`,
    `CPU: ${info.cpuModel}`,
    `CPU Cores: ${info.cpuCores}`,
    `Memory: ${formatBytes(info.totalMemoryBytes)}`,
    `Disk Space: ${info.diskFreeBytes === null ? 'Unknown' : formatBytes(info.diskFreeBytes)}`,
    '',
    'Ansible Version:',
    '---------------',
    ansibleVersion,
    '',
    RULE,
    '',
    '',
  ].join('\n');
}

export function renderResults(durationSeconds: number, startedAt: Date, endedAt: Date): string {
  return block('Benchmark Results', [
    `Total Duration: ${durationSeconds}s (${formatClock(durationSeconds)})`,
    `Start Time: ${formatLocalDateTime(startedAt)}`,
    `End Time: ${formatLocalDateTime(endedAt)}`,
  ]);
}

/**
 * The timer callback's summary line and the profile_tasks table that follows.
 */
export function extractProfileSection(output: string): string[] | null {
  const lines = output.split('\n');
  const start = lines.findIndex((line) => line.includes(PROFILE_MARKER));
  if (start === -1) return null;
  return lines.slice(start, start + 1 + PROFILE_CONTEXT_LINES);
}

export function renderAnalysis(profileLines: string[]): string {
  return ['', RULE, 'Performance Analysis', RULE, ...profileLines, ''].join('\n');
}

export function parseTotalDuration(text: string): number | null {
  const match = TOTAL_DURATION_PATTERN.exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function compareDurations(previousSeconds: number, currentSeconds: number): DurationComparison {
  const diffSeconds = currentSeconds - previousSeconds;
  return {
    previousSeconds,
    currentSeconds,
    diffSeconds,
    percent: previousSeconds === 0 ? null : ((diffSeconds / previousSeconds) * 100).toFixed(2),
    trend: diffSeconds < 0 ? 'improved' : diffSeconds > 0 ? 'degraded' : 'unchanged',
  };
}

export function formatPercent(percent: string | null, absolute = false): string {
  if (percent === null) return 'n/a';
  const value = absolute ? percent.replace(/^-/, '') : percent;
  return `${value}%`;
}

export function renderComparison(comparison: DurationComparison): string {
  return block('Comparison with Previous Run', [
    `Previous Duration: ${comparison.previousSeconds}s`,
    `Current Duration: ${comparison.currentSeconds}s`,
    `Difference: ${comparison.diffSeconds}s (${formatPercent(comparison.percent)})`,
  ]);
}
