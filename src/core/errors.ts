/**
 * @fileoverview devenv error hierarchy
 *
 * Every failure that aborts an operation is one of these typed errors, so the
 * CLI can map it to an exit code and recovery hints without string matching.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class DevenvError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// SUBPROCESS ERRORS
// ============================================================================

export class CommandFailedError extends DevenvError {
  readonly code = 'COMMAND_FAILED';
  readonly retryable = false;

  constructor(
    readonly step: string,
    readonly command: string,
    readonly exitCode: number,
    readonly stderr = '',
  ) {
    super(`${step} failed: \`${command}\` exited with code ${exitCode}`);
    this.name = 'CommandFailedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        step: this.step,
        command: this.command,
        exitCode: this.exitCode,
        stderr: this.stderr || undefined,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends DevenvError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly configPath?: string,
    readonly issues: string[] = [],
  ) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configPath: this.configPath,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// PRECONDITION ERRORS
// ============================================================================

export type PreconditionReason =
  | 'running_as_root'
  | 'not_a_git_repo'
  | 'missing_directory'
  | 'missing_tool'
  | 'ambiguous_windows_home'
  | 'unsupported_platform';

export class PreconditionError extends DevenvError {
  readonly code = 'PRECONDITION_FAILED';
  readonly retryable = false;

  constructor(
    readonly reason: PreconditionReason,
    message: string,
  ) {
    super(message);
    this.name = 'PreconditionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { reason: this.reason },
    };
  }
}

// ============================================================================
// DOWNLOAD ERRORS
// ============================================================================

export class DownloadError extends DevenvError {
  readonly code = 'DOWNLOAD_FAILED';
  readonly retryable = true;

  constructor(
    readonly url: string,
    readonly status: number | null,
    message: string,
  ) {
    super(`Download of ${url} failed: ${message}`);
    this.name = 'DownloadError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { url: this.url, status: this.status },
    };
  }
}

export class ChecksumMismatchError extends DevenvError {
  readonly code = 'CHECKSUM_MISMATCH';
  readonly retryable = false;

  constructor(
    readonly file: string,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Checksum mismatch for ${file}: expected ${expected}, got ${actual}`);
    this.name = 'ChecksumMismatchError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { file: this.file, expected: this.expected, actual: this.actual },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isDevenvError(error: unknown): error is DevenvError {
  return error instanceof DevenvError;
}

export function isRetryableError(error: unknown): boolean {
  return isDevenvError(error) && error.retryable;
}
