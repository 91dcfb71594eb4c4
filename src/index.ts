/**
 * @fileoverview wsl-devenv - provisioning and maintenance for a WSL2 Ubuntu
 * development environment driven by Ansible
 *
 * Every CLI command is also available as a function. Side effects go through
 * injectable seams: a CommandRunner for subprocesses, a Prompter for
 * confirmations and a StatusReporter for progress.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadConfig, runVerification, createExecaRunner } from 'wsl-devenv';
 *
 * const { config } = await loadConfig();
 * const report = await runVerification(
 *   { workspace: '/home/dev/wsl-setup/ansible', ...config.verify },
 *   { runner: createExecaRunner() },
 * );
 * console.log(report.summary);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// OPERATIONS
// ============================================================================

export {
  runBootstrap,
  hasAnsiblePpa,
  PREREQUISITE_PACKAGES,
  PYTHON_APT_PACKAGES,
  LINT_TOOLS,
  type BootstrapOptions,
  type BootstrapDeps,
  type BootstrapOutcome,
  type InstalledVersions,
} from './bootstrap/installer.js';

export {
  runVerification,
  REQUIRED_FILES,
  type CheckOutcome,
  type VerificationCheck,
  type VerificationReport,
  type VerifyOptions,
  type VerifyDeps,
} from './verify/checks.js';

export {
  cleanupFactCache,
  scanCache,
  isStale,
  removeEmptyDirectories,
  type CacheFile,
  type CacheStats,
  type CleanupOptions,
  type CleanupReport,
} from './factcache/cleanup.js';

export {
  runBenchmark,
  PROFILING_ENV,
  type BenchmarkOptions,
  type BenchmarkDeps,
  type BenchmarkOutcome,
  type BenchmarkSummary,
} from './benchmark/runner.js';
export { compareDurations, parseTotalDuration, type DurationComparison } from './benchmark/report.js';

export {
  checkForUpdates,
  decideThrottle,
  exitCodeFor,
  readStamp,
  writeStamp,
  UPDATE_EXIT_CODES,
  type UpdateCheckOptions,
  type UpdateCheckResult,
  type ThrottleDecision,
} from './updates/check.js';

export {
  syncKeys,
  findWindowsHome,
  copySshKeys,
  importGpgKeys,
  sshFileMode,
  type KeySyncOptions,
  type KeySyncReport,
  type SshCopyEntry,
} from './keys/copy.js';

export {
  parseIni,
  renderIni,
  mergeWslConfig,
  buildWslConfig,
  type IniDocument,
  type WslSettings,
} from './wsl/wslconfig.js';

export { TOOL_CATALOG, getTool, listTools, type ToolDefinition } from './tools/catalog.js';
export {
  installTool,
  download,
  mapArch,
  type InstallToolRequest,
  type InstallToolResult,
  type DownloadOptions,
} from './tools/installer.js';

// ============================================================================
// INFRASTRUCTURE
// ============================================================================

export * from './config/index.js';
export * from './core/errors.js';
export { silentReporter, assumeYesPrompter, type Prompter, type StatusReporter } from './core/interaction.js';
export { createExecaRunner, runChecked, findExecutable, type CommandRunner, type RunOptions, type RunResult } from './utils/exec.js';
export { withRetry } from './utils/async.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

export const DEVENV_VERSION = {
  major: 0,
  minor: 3,
  patch: 0,
  string: '0.3.0',
} as const;
