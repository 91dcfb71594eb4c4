/**
 * @fileoverview CLI error handling with recovery hints
 *
 * Every failure reaching the top of the CLI is turned into an ErrorEnvelope:
 * a machine-readable code, a retryability flag, recovery hints and context.
 * `--json` prints the envelope as JSON on stderr; otherwise it is formatted
 * for humans.
 */

import {
  ChecksumMismatchError,
  CommandFailedError,
  ConfigError,
  DevenvError,
  DownloadError,
  PreconditionError,
  type PreconditionReason,
} from '../core/errors.js';

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  EINVALID_ARGUMENT: 'Invalid command or option',
  ECONFIG_INVALID: 'Configuration file is missing or invalid',
  ECOMMAND_FAILED: 'An external command exited with a non-zero status',
  ERUNNING_AS_ROOT: 'Command must not run as root',
  ENOT_GIT_REPO: 'Workspace is not a git repository',
  EMISSING_DIRECTORY: 'A required directory does not exist',
  EMISSING_TOOL: 'A required tool is not installed',
  EWINDOWS_HOME_AMBIGUOUS: 'Windows profile could not be determined',
  EUNSUPPORTED_PLATFORM: 'Platform or architecture is not supported',
  EDOWNLOAD_FAILED: 'Download failed',
  ECHECKSUM_MISMATCH: 'Downloaded file failed checksum verification',
  EFILE_NOT_FOUND: 'File or directory not found',
  EPERMISSION_DENIED: 'Permission denied',
  EUNKNOWN: 'Unexpected error',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export interface ErrorEnvelope {
  code: string;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export const ErrorMetadata: Record<ErrorCode, { retryable: boolean; recoveryHints: string[] }> = {
  EINVALID_ARGUMENT: {
    retryable: false,
    recoveryHints: ['Run `devenv help <command>` for usage information'],
  },
  ECONFIG_INVALID: {
    retryable: false,
    recoveryHints: [
      'Compare the file with config/devenv.example.yaml',
      'Run with --config pointing at a valid file, or remove the file to use defaults',
    ],
  },
  ECOMMAND_FAILED: {
    retryable: false,
    recoveryHints: ['Read the command output above', 'Re-run the failing command by hand to inspect the error'],
  },
  ERUNNING_AS_ROOT: {
    retryable: false,
    recoveryHints: ['Run as a regular user; sudo is used when needed'],
  },
  ENOT_GIT_REPO: {
    retryable: false,
    recoveryHints: ['Pass the repository root with --workspace <dir>'],
  },
  EMISSING_DIRECTORY: {
    retryable: false,
    recoveryHints: ['Check the path settings in your configuration file'],
  },
  EMISSING_TOOL: {
    retryable: false,
    recoveryHints: ['Run `devenv bootstrap` to install Ansible and its tooling', 'Run `source ~/.bashrc` to refresh PATH'],
  },
  EWINDOWS_HOME_AMBIGUOUS: {
    retryable: false,
    recoveryHints: ['Set keys.windowsHome in your configuration file'],
  },
  EUNSUPPORTED_PLATFORM: {
    retryable: false,
    recoveryHints: ['Install the tool with your package manager instead'],
  },
  EDOWNLOAD_FAILED: {
    retryable: true,
    recoveryHints: ['Check network connectivity', 'Check that the requested version exists', 'Retry later'],
  },
  ECHECKSUM_MISMATCH: {
    retryable: false,
    recoveryHints: ['Retry the download; the file may have been truncated', 'Verify the release page lists this version'],
  },
  EFILE_NOT_FOUND: {
    retryable: false,
    recoveryHints: ['Check the path and your --workspace setting'],
  },
  EPERMISSION_DENIED: {
    retryable: false,
    recoveryHints: ['Check file ownership and permissions'],
  },
  EUNKNOWN: {
    retryable: false,
    recoveryHints: ['Re-run with DEVENV_DEBUG=1 for more detail'],
  },
};

/** Process exit codes; codes not listed exit with 1. */
export const ExitCodes: Partial<Record<ErrorCode, number>> = {
  EINVALID_ARGUMENT: 64,
  ECONFIG_INVALID: 78,
};

const PRECONDITION_CODES: Record<PreconditionReason, ErrorCode> = {
  running_as_root: 'ERUNNING_AS_ROOT',
  not_a_git_repo: 'ENOT_GIT_REPO',
  missing_directory: 'EMISSING_DIRECTORY',
  missing_tool: 'EMISSING_TOOL',
  ambiguous_windows_home: 'EWINDOWS_HOME_AMBIGUOUS',
  unsupported_platform: 'EUNSUPPORTED_PLATFORM',
};

// ============================================================================
// CLI ERROR
// ============================================================================

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }

  toEnvelope(): ErrorEnvelope {
    return createErrorEnvelope(this.code, this.message, { context: this.details });
  }
}

export function createError(code: ErrorCode, message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, code, details);
}

// ============================================================================
// ENVELOPES
// ============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: {
    retryable?: boolean;
    recoveryHints?: string[];
    context?: Record<string, unknown>;
  } = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.recoveryHints],
    context: { ...overrides.context, timestamp: new Date().toISOString() },
  };
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'recoveryHints' in value &&
    Array.isArray(value.recoveryHints)
  );
}

/**
 * Map anything thrown to an envelope. Typed errors map by class; plain errors
 * by their errno code.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) return error;
  if (error instanceof CliError) return error.toEnvelope();
  if (error instanceof DevenvError) return classifyDevenvError(error);

  if (error instanceof Error) {
    const errno = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (errno === 'ENOENT') {
      return createErrorEnvelope('EFILE_NOT_FOUND', error.message);
    }
    if (errno === 'EACCES' || errno === 'EPERM') {
      return createErrorEnvelope('EPERMISSION_DENIED', error.message);
    }
    return createErrorEnvelope('EUNKNOWN', error.message, { context: { name: error.name } });
  }

  return createErrorEnvelope('EUNKNOWN', String(error));
}

function classifyDevenvError(error: DevenvError): ErrorEnvelope {
  if (error instanceof CommandFailedError) {
    return createErrorEnvelope('ECOMMAND_FAILED', error.message, {
      context: { step: error.step, command: error.command, exitCode: error.exitCode },
    });
  }
  if (error instanceof ConfigError) {
    const hints = [...error.issues, ...ErrorMetadata.ECONFIG_INVALID.recoveryHints];
    return createErrorEnvelope('ECONFIG_INVALID', error.message, {
      recoveryHints: hints,
      context: { configPath: error.configPath },
    });
  }
  if (error instanceof PreconditionError) {
    return createErrorEnvelope(PRECONDITION_CODES[error.reason], error.message, {
      context: { reason: error.reason },
    });
  }
  if (error instanceof DownloadError) {
    return createErrorEnvelope('EDOWNLOAD_FAILED', error.message, {
      context: { url: error.url, status: error.status },
    });
  }
  if (error instanceof ChecksumMismatchError) {
    return createErrorEnvelope('ECHECKSUM_MISMATCH', error.message, {
      context: { file: error.file, expected: error.expected, actual: error.actual },
    });
  }
  return createErrorEnvelope('EUNKNOWN', error.message, { retryable: error.retryable, context: { code: error.code } });
}

export function isRetryableError(envelope: ErrorEnvelope): boolean {
  return envelope.retryable;
}

export function getExitCode(envelope: ErrorEnvelope): number {
  const known: string = envelope.code;
  return isErrorCode(known) ? (ExitCodes[known] ?? 1) : 1;
}

function isErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ErrorCodes, code);
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.retryable) {
    lines.push('(This error is retryable)');
  }
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
