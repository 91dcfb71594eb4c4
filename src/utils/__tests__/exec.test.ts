import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { findExecutable, formatCommand, readFirstLine, runChecked } from '../exec.js';
import { CommandFailedError } from '../../core/errors.js';
import { FakeRunner } from '../../test/fake_runner.js';

describe('runChecked', () => {
  it('returns the result of a successful command', async () => {
    const runner = new FakeRunner().on('ansible --version', { stdout: 'ansible [core 2.17.5]' });

    const result = await runChecked(runner, 'Version check', 'ansible', ['--version']);

    expect(result.stdout).toBe('ansible [core 2.17.5]');
  });

  it('throws CommandFailedError with the step and quoted command', async () => {
    const runner = new FakeRunner().on(/^sudo apt-add-repository/, { exitCode: 2, stderr: 'no network' });

    const error = await runChecked(runner, 'PPA setup', 'sudo', ['apt-add-repository', '--yes', 'ppa:ansible/ansible']).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({
      step: 'PPA setup',
      command: 'sudo apt-add-repository --yes ppa:ansible/ansible',
      exitCode: 2,
      stderr: 'no network',
    });
  });
});

describe('formatCommand', () => {
  it('quotes arguments containing whitespace', () => {
    expect(formatCommand('git', ['commit', '-m', 'two words'])).toBe("git commit -m 'two words'");
  });
});

describe('readFirstLine', () => {
  it('reads the first stdout line', async () => {
    const runner = new FakeRunner().on('ansible --version', { stdout: 'ansible [core 2.17.5]\n  config file = None' });

    expect(await readFirstLine(runner, 'ansible', ['--version'])).toBe('ansible [core 2.17.5]');
  });

  it('falls back to stderr when stdout is empty', async () => {
    const runner = new FakeRunner().on('python3 --version', { stderr: 'Python 3.12.3\n' });

    expect(await readFirstLine(runner, 'python3', ['--version'])).toBe('Python 3.12.3');
  });

  it('returns null on failure', async () => {
    const runner = new FakeRunner().on('yamllint --version', { exitCode: 127, stdout: 'ignored' });

    expect(await readFirstLine(runner, 'yamllint', ['--version'])).toBeNull();
  });
});

describe('findExecutable', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'devenv-exec-'));
    await fs.mkdir(path.join(root, 'a'));
    await fs.mkdir(path.join(root, 'b'));
    await fs.writeFile(path.join(root, 'a', 'kubectl'), 'data', { mode: 0o644 });
    await fs.writeFile(path.join(root, 'b', 'kubectl'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.mkdir(path.join(root, 'a', 'sops'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const searchPath = (): string => [path.join(root, 'a'), '', path.join(root, 'b')].join(path.delimiter);

  it('returns the first executable regular file on the search path', async () => {
    expect(await findExecutable('kubectl', searchPath())).toBe(path.join(root, 'b', 'kubectl'));
  });

  it('ignores directories and missing names', async () => {
    expect(await findExecutable('sops', searchPath())).toBeNull();
    expect(await findExecutable('talosctl', searchPath())).toBeNull();
  });

  it('checks paths containing a slash directly', async () => {
    expect(await findExecutable(path.join(root, 'b', 'kubectl'), '')).toBe(path.join(root, 'b', 'kubectl'));
  });
});
