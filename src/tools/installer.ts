/**
 * @fileoverview Download, verify and install a tool binary
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ChecksumMismatchError, DownloadError, PreconditionError, isRetryableError } from '../core/errors.js';
import type { StatusReporter } from '../core/interaction.js';
import { withRetry } from '../utils/async.js';
import { computeSha256, parseChecksumFile } from '../utils/checksums.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { expandTemplate, type ToolDefinition } from './catalog.js';

export const EXECUTABLE_MODE = 0o755;

const GO_ARCH: Readonly<Record<string, string>> = {
  x64: 'amd64',
  arm64: 'arm64',
};

// ============================================================================
// TYPES
// ============================================================================

export type FetchLike = (url: string) => Promise<Response>;

export interface DownloadOptions {
  attempts: number;
  delayMs: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number) => void;
}

export interface InstallToolRequest {
  tool: ToolDefinition;
  version: string;
  installDir: string;
  /** Node-style architecture; defaults to process.arch */
  arch?: string;
}

export interface InstallToolResult {
  tool: string;
  version: string;
  arch: string;
  path: string;
  sha256: string;
  sizeBytes: number;
}

// ============================================================================
// DOWNLOAD
// ============================================================================

export function mapArch(arch: string = process.arch): string {
  const mapped = Object.hasOwn(GO_ARCH, arch) ? GO_ARCH[arch] : undefined;
  if (!mapped) {
    throw new PreconditionError('unsupported_platform', `Unsupported architecture: ${arch}`);
  }
  return mapped;
}

/**
 * GET `url` into memory, retrying network errors and non-2xx responses with a
 * fixed delay.
 */
export async function download(url: string, options: DownloadOptions): Promise<Buffer> {
  const fetchImpl = options.fetch ?? fetch;
  return withRetry(
    async (attempt) => {
      logDebug('[tools] download', { url, attempt });
      let response: Response;
      try {
        response = await fetchImpl(url);
      } catch (error) {
        throw new DownloadError(url, null, getErrorMessage(error));
      }
      if (!response.ok) {
        throw new DownloadError(url, response.status, `HTTP ${response.status}`);
      }
      return Buffer.from(await response.arrayBuffer());
    },
    {
      attempts: options.attempts,
      delayMs: options.delayMs,
      shouldRetry: isRetryableError,
      onRetry: options.onRetry,
      sleep: options.sleep,
    }
  );
}

// ============================================================================
// INSTALL
// ============================================================================

export async function installTool(
  request: InstallToolRequest,
  downloadOptions: DownloadOptions,
  reporter: StatusReporter
): Promise<InstallToolResult> {
  const { tool, version } = request;
  const arch = mapArch(request.arch);
  const binaryUrl = expandTemplate(tool.binaryUrl, { version, arch });
  const checksumUrl = expandTemplate(tool.checksumUrl, { version, arch });
  const assetName = path.posix.basename(new URL(binaryUrl).pathname);

  reporter.step(`Installing ${tool.name} ${version} (${arch})...`);
  reporter.info(`Downloading ${binaryUrl}`);
  const binary = await download(binaryUrl, downloadOptions);
  reporter.info(`Downloading ${checksumUrl}`);
  const checksumText = (await download(checksumUrl, downloadOptions)).toString('utf8');

  const expected = parseChecksumFile(checksumText, assetName);
  if (!expected) {
    throw new ChecksumMismatchError(assetName, 'an entry in the checksum file', 'none');
  }
  const actual = computeSha256(binary);
  if (actual !== expected) {
    throw new ChecksumMismatchError(assetName, expected, actual);
  }
  reporter.success(`Checksum verified (${actual})`);

  await fs.mkdir(request.installDir, { recursive: true });
  const target = path.join(request.installDir, tool.name);
  const temp = path.join(request.installDir, `.${tool.name}.${process.pid}.tmp`);
  try {
    await fs.writeFile(temp, binary, { mode: EXECUTABLE_MODE });
    await fs.chmod(temp, EXECUTABLE_MODE);
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
  reporter.success(`Installed ${target}`);

  return { tool: tool.name, version, arch, path: target, sha256: actual, sizeBytes: binary.length };
}
