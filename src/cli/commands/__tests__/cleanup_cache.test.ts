import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { cleanupCacheCommand } from '../cleanup_cache.js';
import { DAY_MS } from '../../../factcache/cleanup.js';
import { captureConsole, createTestContext, type ConsoleCapture } from '../../../test/cli_context.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('cleanupCacheCommand', () => {
  let root: string;
  let cacheDir: string;
  let oldFile: string;
  let freshFile: string;
  let output: ConsoleCapture;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'devenv-cleanup-cmd-'));
    cacheDir = path.join(root, '.ansible', 'facts_cache');
    await fs.mkdir(cacheDir, { recursive: true });
    oldFile = path.join(cacheDir, 'old-host');
    freshFile = path.join(cacheDir, 'fresh-host');
    await fs.writeFile(oldFile, '{"ansible_hostname":"old"}');
    await fs.writeFile(freshFile, '{"ansible_hostname":"fresh"}');
    const oldTime = new Date(NOW.getTime() - 40 * DAY_MS);
    const freshTime = new Date(NOW.getTime() - DAY_MS);
    await fs.utimes(oldFile, oldTime, oldTime);
    await fs.utimes(freshFile, freshTime, freshTime);
    output = captureConsole();
    process.exitCode = undefined;
  });

  afterEach(async () => {
    output.restore();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it('reports stale files as JSON without deleting on --dry-run', async () => {
    await cleanupCacheCommand({
      ...createTestContext(root, { args: ['--dry-run'], json: true }),
      now: NOW,
    });

    expect(output.json()).toMatchObject({
      cacheDir,
      exists: true,
      dryRun: true,
      maxAgeDays: 30,
      before: { files: 2 },
      stale: [{ path: oldFile, ageDays: 40 }],
      deleted: 0,
      after: null,
    });
    await expect(fs.access(oldFile)).resolves.toBeUndefined();
    expect(process.exitCode).toBe(0);
  });

  it('deletes stale files and prints a summary', async () => {
    await cleanupCacheCommand({ ...createTestContext(root), now: NOW, progress: false });

    const lines = output.lines();
    expect(lines).toContain('[INFO] Found 1 files older than 30 days');
    expect(lines).toContain('[OK] Deleted 1 old cache files');
    await expect(fs.access(oldFile)).rejects.toThrow();
    await expect(fs.access(freshFile)).resolves.toBeUndefined();
  });

  it('takes the age limit from --age', async () => {
    await cleanupCacheCommand({
      ...createTestContext(root, { args: ['--age', '0', '--dry-run'], json: true }),
      now: NOW,
    });

    expect(output.json()).toMatchObject({ maxAgeDays: 0, stale: [{ path: freshFile }, { path: oldFile }] });
  });

  it('rejects a non-numeric --age', async () => {
    await expect(
      cleanupCacheCommand({ ...createTestContext(root, { args: ['--age', 'soon'] }), now: NOW })
    ).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT' });
  });

  it('rejects a mistyped flag without deleting anything', async () => {
    await expect(
      cleanupCacheCommand({ ...createTestContext(root, { args: ['--dryrun'] }), now: NOW, progress: false })
    ).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT', message: 'Unknown option: --dryrun' });

    await expect(fs.access(oldFile)).resolves.toBeUndefined();
  });

  it('warns when the cache directory is missing', async () => {
    const missing = path.join(root, 'nowhere');

    await cleanupCacheCommand({
      ...createTestContext(root, { config: { factCache: { dir: missing } } }),
      now: NOW,
      progress: false,
    });

    expect(output.lines()).toContain(`[WARN] Cache directory does not exist: ${missing}`);
    expect(process.exitCode).toBe(0);
  });
});
