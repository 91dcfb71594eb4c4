/**
 * @fileoverview Terminal output for CLI commands
 *
 * Status lines, banners, spinner and progress bar. Everything here writes to
 * stdout; diagnostics go through the telemetry logger on stderr.
 */

import cliProgress from 'cli-progress';
import type { StatusReporter } from '../core/interaction.js';
import { formatBytes } from '../utils/format.js';

export { formatBytes };

// Spinner frames for text-based spinner
const SPINNER_FRAMES = ['|', '/', '-', '\\'];
const SPINNER_INTERVAL_MS = 100;

const BANNER_WIDTH = 40;

export type StatusLevel = 'info' | 'ok' | 'warn' | 'error';

const STATUS_PREFIX: Record<StatusLevel, string> = {
  info: '[INFO]',
  ok: '[OK]',
  warn: '[WARN]',
  error: '[ERROR]',
};

// ============================================================================
// STATUS LINES
// ============================================================================

export function printStatus(level: StatusLevel, message: string): void {
  console.log(`${STATUS_PREFIX[level]} ${message}`);
}

export function printStep(message: string): void {
  console.log(`\n==> ${message}`);
}

export function printBanner(title: string): void {
  const rule = '='.repeat(BANNER_WIDTH);
  console.log('');
  console.log(rule);
  console.log(`  ${title}`);
  console.log(rule);
  console.log('');
}

/** StatusReporter that prints to the terminal. */
export function createConsoleReporter(): StatusReporter {
  return {
    step: printStep,
    info: (message) => printStatus('info', message),
    success: (message) => printStatus('ok', message),
    warn: (message) => printStatus('warn', message),
  };
}

// ============================================================================
// SPINNER
// ============================================================================

export interface SpinnerHandle {
  update(message: string): void;
  succeed(message?: string): void;
  fail(message?: string): void;
  stop(): void;
}

export function createSpinner(initialMessage: string): SpinnerHandle {
  let frameIndex = 0;
  let message = initialMessage;
  let running = true;
  let intervalId: NodeJS.Timeout | null = null;

  const render = (): void => {
    if (!running) return;
    const frame = SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length];
    process.stdout.write(`\r${frame} ${message}`);
    frameIndex++;
  };

  // Clear current line
  const clearLine = (): void => {
    process.stdout.write('\r' + ' '.repeat(message.length + 4) + '\r');
  };

  const halt = (): void => {
    running = false;
    if (intervalId) clearInterval(intervalId);
    clearLine();
  };

  intervalId = setInterval(render, SPINNER_INTERVAL_MS);
  render();

  return {
    update(newMessage: string): void {
      clearLine();
      message = newMessage;
      render();
    },

    succeed(finalMessage?: string): void {
      halt();
      printStatus('ok', finalMessage || message);
    },

    fail(finalMessage?: string): void {
      halt();
      printStatus('error', finalMessage || message);
    },

    stop: halt,
  };
}

// ============================================================================
// PROGRESS BAR
// ============================================================================

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      forceRedraw: true,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0, { task: '' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

// ============================================================================
// FORMATTING
// ============================================================================

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] || '').length));
    return Math.max(h.length, maxRowWidth);
  });

  console.log(headers.map((h, i) => h.padEnd(widths[i])).join(' | '));
  console.log(widths.map((w) => '-'.repeat(w)).join('-+-'));
  for (const row of rows) {
    console.log(row.map((cell, i) => (cell || '').padEnd(widths[i])).join(' | '));
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
