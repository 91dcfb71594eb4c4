import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { checkUpdatesCommand } from '../check_updates.js';
import { SECONDS_PER_DAY } from '../../../updates/check.js';
import { FakeRunner } from '../../../test/fake_runner.js';
import { captureConsole, createTestContext, type ConsoleCapture } from '../../../test/cli_context.js';

const NOW = new Date('2026-03-10T00:00:00.000Z');
const NOW_SECONDS = NOW.getTime() / 1000;

describe('checkUpdatesCommand', () => {
  let root: string;
  let stampFile: string;
  let output: ConsoleCapture;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'devenv-updates-cmd-'));
    await fs.mkdir(path.join(root, '.git'));
    stampFile = path.join(root, '.ansible-last-update-check');
    output = captureConsole();
    process.exitCode = undefined;
  });

  afterEach(async () => {
    output.restore();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  function behindRunner(): FakeRunner {
    return new FakeRunner()
      .on('git branch --show-current', { stdout: 'main' })
      .on('git rev-parse HEAD', { stdout: 'aaaa' })
      .on('git rev-parse origin/main', { stdout: 'bbbb' })
      .on('git rev-list --count HEAD..origin/main', { stdout: '2' })
      .on('git log --oneline --decorate -10 HEAD..origin/main', { stdout: 'bbbb Add sops role\ncccc Bump kubectl' });
  }

  it('skips the check when the interval has not passed', async () => {
    const last = NOW_SECONDS - SECONDS_PER_DAY;
    await fs.writeFile(stampFile, `${last}\n`);
    const runner = new FakeRunner();

    await checkUpdatesCommand({ ...createTestContext(root, { json: true, runner }), now: NOW });

    expect(output.json()).toEqual({
      status: 'not_due',
      due: false,
      lastCheck: last,
      nextCheck: last + 7 * SECONDS_PER_DAY,
    });
    expect(runner.calls).toEqual([]);
    expect(process.exitCode).toBe(0);
  });

  it('prints nothing when not due unless verbose', async () => {
    await fs.writeFile(stampFile, `${NOW_SECONDS}\n`);

    await checkUpdatesCommand({ ...createTestContext(root, { runner: new FakeRunner() }), now: NOW });
    expect(output.lines()).toEqual([]);

    await checkUpdatesCommand({ ...createTestContext(root, { verbose: true, runner: new FakeRunner() }), now: NOW });
    expect(output.lines()[0]).toBe('[INFO] Update check not needed yet');
  });

  it('exits 2 and lists the new commits when behind', async () => {
    await checkUpdatesCommand({ ...createTestContext(root, { json: true, runner: behindRunner() }), now: NOW });

    expect(output.json()).toMatchObject({
      status: 'updates_available',
      behind: 2,
      recentChanges: ['bbbb Add sops role', 'cccc Bump kubectl'],
    });
    expect(process.exitCode).toBe(2);
    expect(await fs.readFile(stampFile, 'utf8')).toBe(`${NOW_SECONDS}\n`);
  });

  it('checks regardless of the stamp with --force', async () => {
    await fs.writeFile(stampFile, `${NOW_SECONDS}\n`);

    await checkUpdatesCommand({
      ...createTestContext(root, { args: ['--force'], runner: behindRunner() }),
      now: NOW,
    });

    const lines = output.lines();
    expect(lines).toContain('[WARN] You are 2 commit(s) behind origin/main');
    expect(lines).toContain('  git pull origin main');
    expect(process.exitCode).toBe(2);
  });

  it('prints repository info and local changes before fetching', async () => {
    const runner = behindRunner()
      .on('git diff-index --quiet HEAD --', { exitCode: 1 })
      .on('git status --short', { stdout: '?? notes.txt' });

    await checkUpdatesCommand({ ...createTestContext(root, { runner }), now: NOW });

    const lines = output.lines();
    const infoAt = lines.indexOf('\n==> Version Information');
    const changesAt = lines.indexOf('  ?? notes.txt');
    const fetchAt = lines.indexOf('[INFO] Fetching latest changes from remote...');
    expect(infoAt).toBeGreaterThan(-1);
    expect(lines[infoAt + 2]).toBe('  Branch    : main');
    expect(changesAt).toBeGreaterThan(infoAt);
    expect(fetchAt).toBeGreaterThan(changesAt);
  });

  it('exits 1 when the fetch fails', async () => {
    const runner = new FakeRunner().on('git fetch origin main --quiet', { exitCode: 128 });

    await checkUpdatesCommand({ ...createTestContext(root, { json: true, runner }), now: NOW });

    expect(output.json()).toMatchObject({ status: 'fetch_failed' });
    expect(process.exitCode).toBe(1);
    await expect(fs.access(stampFile)).rejects.toThrow();
  });

  it('fails outside a git repository', async () => {
    await fs.rm(path.join(root, '.git'), { recursive: true });

    await expect(
      checkUpdatesCommand({ ...createTestContext(root, { runner: new FakeRunner() }), now: NOW })
    ).rejects.toMatchObject({ reason: 'not_a_git_repo' });
  });
});
