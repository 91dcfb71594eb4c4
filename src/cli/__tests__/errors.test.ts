/**
 * @fileoverview Tests for structured error contracts
 *
 * Every failure reaching the CLI must map to a machine-readable code with
 * retryability, recovery hints and an exit code.
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCodes,
  ErrorMetadata,
  CliError,
  createError,
  createErrorEnvelope,
  classifyError,
  isRetryableError,
  getExitCode,
  isErrorEnvelope,
  formatErrorWithHints,
  formatErrorJson,
  type ErrorCode,
} from '../errors.js';
import {
  ChecksumMismatchError,
  CommandFailedError,
  ConfigError,
  DownloadError,
  PreconditionError,
} from '../../core/errors.js';

describe('ErrorEnvelope', () => {
  describe('createErrorEnvelope', () => {
    it('fills retryability and hints from ErrorMetadata', () => {
      const envelope = createErrorEnvelope('EDOWNLOAD_FAILED', 'Download failed');

      expect(envelope.code).toBe('EDOWNLOAD_FAILED');
      expect(envelope.message).toBe('Download failed');
      expect(envelope.retryable).toBe(true);
      expect(envelope.recoveryHints).toEqual(ErrorMetadata.EDOWNLOAD_FAILED.recoveryHints);
      expect(typeof envelope.context?.timestamp).toBe('string');
    });

    it('allows overriding default values', () => {
      const envelope = createErrorEnvelope('EMISSING_TOOL', 'gpg not found', {
        retryable: true,
        recoveryHints: ['Install gnupg'],
        context: { tool: 'gpg' },
      });

      expect(envelope.retryable).toBe(true);
      expect(envelope.recoveryHints).toEqual(['Install gnupg']);
      expect(envelope.context?.tool).toBe('gpg');
    });

    it('copies the default hints', () => {
      const envelope = createErrorEnvelope('EUNKNOWN', 'boom');
      envelope.recoveryHints.push('extra');

      expect(ErrorMetadata.EUNKNOWN.recoveryHints).not.toContain('extra');
    });
  });

  describe('ErrorMetadata', () => {
    it('has an entry for every error code', () => {
      for (const code of Object.keys(ErrorCodes)) {
        expect(ErrorMetadata).toHaveProperty(code);
      }
    });

    it('marks only download failures as retryable', () => {
      const retryable = Object.entries(ErrorMetadata)
        .filter(([, meta]) => meta.retryable)
        .map(([code]) => code);
      expect(retryable).toEqual(['EDOWNLOAD_FAILED']);
    });
  });

  describe('isErrorEnvelope', () => {
    it('accepts an envelope', () => {
      expect(isErrorEnvelope(createErrorEnvelope('EUNKNOWN', 'x'))).toBe(true);
    });

    it('rejects partial objects', () => {
      expect(isErrorEnvelope({ code: 'EUNKNOWN', message: 'x' })).toBe(false);
      expect(isErrorEnvelope(null)).toBe(false);
      expect(isErrorEnvelope('EUNKNOWN')).toBe(false);
    });
  });
});

describe('CliError', () => {
  it('carries its code and details into the envelope', () => {
    const error = createError('EINVALID_ARGUMENT', 'Unknown tool: helm', { available: ['kubectl'] });

    expect(error).toBeInstanceOf(CliError);
    expect(error.name).toBe('CliError');
    const envelope = error.toEnvelope();
    expect(envelope.code).toBe('EINVALID_ARGUMENT');
    expect(envelope.message).toBe('Unknown tool: helm');
    expect(envelope.context?.available).toEqual(['kubectl']);
  });
});

describe('classifyError', () => {
  it('returns envelopes unchanged', () => {
    const envelope = createErrorEnvelope('EMISSING_TOOL', 'missing');
    expect(classifyError(envelope)).toBe(envelope);
  });

  it('maps CommandFailedError to ECOMMAND_FAILED with the step', () => {
    const envelope = classifyError(new CommandFailedError('Ansible installation', 'sudo apt install -y ansible', 100));

    expect(envelope.code).toBe('ECOMMAND_FAILED');
    expect(envelope.message).toBe('Ansible installation failed: `sudo apt install -y ansible` exited with code 100');
    expect(envelope.context?.step).toBe('Ansible installation');
    expect(envelope.context?.exitCode).toBe(100);
  });

  it('puts config issues ahead of the generic hints', () => {
    const envelope = classifyError(
      new ConfigError('invalid configuration', '/home/dev/config.yaml', ['factCache.maxAgeDays: Expected number'])
    );

    expect(envelope.code).toBe('ECONFIG_INVALID');
    expect(envelope.message).toBe('/home/dev/config.yaml: invalid configuration');
    expect(envelope.recoveryHints[0]).toBe('factCache.maxAgeDays: Expected number');
    expect(envelope.recoveryHints.slice(1)).toEqual(ErrorMetadata.ECONFIG_INVALID.recoveryHints);
  });

  it.each<[PreconditionError, ErrorCode]>([
    [new PreconditionError('running_as_root', 'root'), 'ERUNNING_AS_ROOT'],
    [new PreconditionError('not_a_git_repo', 'no repo'), 'ENOT_GIT_REPO'],
    [new PreconditionError('missing_directory', 'no dir'), 'EMISSING_DIRECTORY'],
    [new PreconditionError('missing_tool', 'no tool'), 'EMISSING_TOOL'],
    [new PreconditionError('ambiguous_windows_home', 'two homes'), 'EWINDOWS_HOME_AMBIGUOUS'],
    [new PreconditionError('unsupported_platform', 'ia32'), 'EUNSUPPORTED_PLATFORM'],
  ])('maps precondition %#', (error, code) => {
    expect(classifyError(error).code).toBe(code);
  });

  it('maps download and checksum failures', () => {
    const download = classifyError(new DownloadError('https://example.test/kubectl', 503, 'HTTP 503'));
    expect(download.code).toBe('EDOWNLOAD_FAILED');
    expect(download.retryable).toBe(true);
    expect(download.context?.status).toBe(503);

    const checksum = classifyError(new ChecksumMismatchError('kubectl', 'aa', 'bb'));
    expect(checksum.code).toBe('ECHECKSUM_MISMATCH');
    expect(checksum.retryable).toBe(false);
  });

  it('maps errno codes of plain errors', () => {
    const missing = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });

    expect(classifyError(missing).code).toBe('EFILE_NOT_FOUND');
    expect(classifyError(denied).code).toBe('EPERMISSION_DENIED');
  });

  it('falls back to EUNKNOWN', () => {
    expect(classifyError(new Error('boom')).code).toBe('EUNKNOWN');
    expect(classifyError('plain string').message).toBe('plain string');
  });
});

describe('exit codes', () => {
  it('uses sysexits values for usage and config errors', () => {
    expect(getExitCode(createErrorEnvelope('EINVALID_ARGUMENT', 'x'))).toBe(64);
    expect(getExitCode(createErrorEnvelope('ECONFIG_INVALID', 'x'))).toBe(78);
  });

  it('exits 1 for everything else', () => {
    expect(getExitCode(createErrorEnvelope('ECOMMAND_FAILED', 'x'))).toBe(1);
    expect(getExitCode({ code: 'ESOMETHING_ELSE', message: 'x', retryable: false, recoveryHints: [] })).toBe(1);
  });

  it('reads retryability from the envelope', () => {
    expect(isRetryableError(createErrorEnvelope('EDOWNLOAD_FAILED', 'x'))).toBe(true);
    expect(isRetryableError(createErrorEnvelope('EMISSING_TOOL', 'x'))).toBe(false);
  });
});

describe('formatting', () => {
  it('formats an envelope with hints for humans', () => {
    const envelope = createErrorEnvelope('EDOWNLOAD_FAILED', 'HTTP 503', {
      recoveryHints: ['Retry later'],
    });

    expect(formatErrorWithHints(envelope)).toBe(
      ['Error [EDOWNLOAD_FAILED]: HTTP 503', '(This error is retryable)', '', 'Recovery suggestions:', '  - Retry later'].join(
        '\n'
      )
    );
  });

  it('omits the hint block when there are no hints', () => {
    const envelope = createErrorEnvelope('EUNKNOWN', 'boom', { recoveryHints: [] });
    expect(formatErrorWithHints(envelope)).toBe('Error [EUNKNOWN]: boom');
  });

  it('wraps the envelope under "error" for JSON output', () => {
    const envelope = createErrorEnvelope('EMISSING_TOOL', 'gpg not found');
    const parsed: unknown = JSON.parse(formatErrorJson(envelope));

    expect(parsed).toEqual({ error: envelope });
  });
});
