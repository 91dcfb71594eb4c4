import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { benchmarkCommand } from '../benchmark.js';
import { FakeRunner, createScriptedPrompter } from '../../../test/fake_runner.js';
import { captureConsole, createTestContext, type ConsoleCapture } from '../../../test/cli_context.js';

describe('benchmarkCommand', () => {
  let root: string;
  let output: ConsoleCapture;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'devenv-bench-cmd-'));
    output = captureConsole();
    process.exitCode = undefined;
  });

  afterEach(async () => {
    output.restore();
    process.exitCode = undefined;
    await fs.rm(root, { recursive: true, force: true });
  });

  it('rejects --keep 0 before running anything', async () => {
    const runner = new FakeRunner();

    await expect(
      benchmarkCommand({
        ...createTestContext(root, { args: ['--keep', '0'], runner }),
        prompter: createScriptedPrompter(),
      })
    ).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT', message: '--keep must be an integer of at least 1' });

    expect(runner.calls).toEqual([]);
    expect(output.lines()).toEqual([]);
  });

  it('rejects options it does not know', async () => {
    const runner = new FakeRunner();

    await expect(
      benchmarkCommand({ ...createTestContext(root, { args: ['--realrun'], runner }) })
    ).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT', message: 'Unknown option: --realrun' });

    expect(runner.calls).toEqual([]);
  });
});
