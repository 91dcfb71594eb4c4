import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  hasAnsiblePpa,
  runBootstrap,
  PATH_BLOCK,
  type BootstrapDeps,
  type BootstrapOptions,
} from '../installer.js';
import { CommandFailedError, PreconditionError } from '../../core/errors.js';
import { FakeRunner, createRecordingReporter, createScriptedPrompter } from '../../test/fake_runner.js';

describe('hasAnsiblePpa', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'devenv-apt-'));
    await fs.mkdir(path.join(root, 'sources.list.d'));
    await fs.writeFile(path.join(root, 'sources.list'), 'deb http://archive.ubuntu.com/ubuntu noble main\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('is false when no source mentions the PPA', async () => {
    expect(await hasAnsiblePpa(path.join(root, 'sources.list'), path.join(root, 'sources.list.d'))).toBe(false);
  });

  it('finds the PPA in a sources.list.d entry', async () => {
    await fs.writeFile(
      path.join(root, 'sources.list.d', 'ansible-ubuntu-ansible-noble.sources'),
      'URIs: https://ppa.launchpadcontent.net/ansible/ansible/ubuntu/\n'
    );

    expect(await hasAnsiblePpa(path.join(root, 'sources.list'), path.join(root, 'sources.list.d'))).toBe(true);
  });

  it('tolerates missing files', async () => {
    expect(await hasAnsiblePpa(path.join(root, 'none.list'), path.join(root, 'none.d'))).toBe(false);
  });
});

describe('runBootstrap', () => {
  let root: string;
  let home: string;
  let options: BootstrapOptions;
  let runner: FakeRunner;
  let onPath: Set<string>;

  function deps(answers: boolean[] = []): BootstrapDeps & {
    reporter: ReturnType<typeof createRecordingReporter>;
    prompter: ReturnType<typeof createScriptedPrompter>;
  } {
    return {
      runner,
      prompter: createScriptedPrompter(answers),
      reporter: createRecordingReporter(),
      findExecutable: async (name) => (onPath.has(name) ? `/usr/bin/${name}` : null),
      isRoot: () => false,
    };
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'devenv-bootstrap-'));
    home = path.join(root, 'home');
    await fs.mkdir(home);
    await fs.writeFile(path.join(root, 'proc-version'), 'Linux version 5.15.153.1-microsoft-standard-WSL2\n');
    await fs.writeFile(path.join(root, 'sources.list'), '');
    options = {
      skipUpgrade: false,
      homeDir: home,
      pathEnv: '/usr/local/bin:/usr/bin',
      aptSourcesList: path.join(root, 'sources.list'),
      aptSourcesDir: path.join(root, 'sources.list.d'),
      procVersionPath: path.join(root, 'proc-version'),
    };
    runner = new FakeRunner()
      .on('ansible --version', { stdout: 'ansible [core 2.17.1]' })
      .on('python3 --version', { stdout: 'Python 3.12.3' })
      .on('ansible-lint --version', { stdout: 'ansible-lint 24.7.0' })
      .on('yamllint --version', { stdout: 'yamllint 1.35.1' });
    // Installed by the apt steps
    onPath = new Set(['ansible', 'python3', 'pipx', 'ansible-lint', 'yamllint']);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('refuses to run as root', async () => {
    await expect(runBootstrap(options, { ...deps(), isRoot: () => true })).rejects.toBeInstanceOf(
      PreconditionError
    );
    expect(runner.calls).toEqual([]);
  });

  it('cancels outside WSL when the user declines', async () => {
    await fs.writeFile(path.join(root, 'proc-version'), 'Linux version 6.8.0-generic\n');
    const d = deps([false]);

    const outcome = await runBootstrap(options, d);

    expect(outcome).toEqual({ status: 'cancelled' });
    expect(d.prompter.questions).toEqual(['Continue anyway?']);
    expect(runner.calls).toEqual([]);
  });

  it('runs the install steps in order', async () => {
    onPath.delete('ansible');
    let ansibleInstalled = false;
    const base = deps();
    const d: BootstrapDeps = {
      ...base,
      findExecutable: async (name) =>
        onPath.has(name) || (name === 'ansible' && ansibleInstalled) ? `/usr/bin/${name}` : null,
    };
    runner.on('sudo apt install -y ansible', () => {
      ansibleInstalled = true;
      return {};
    });

    const outcome = await runBootstrap(options, d);

    expect(runner.lines()).toEqual([
      'sudo apt update',
      'sudo apt upgrade -y',
      'sudo apt install -y software-properties-common python3 python3-pip python3-dev git curl wget ' +
        'build-essential libffi-dev libssl-dev libyaml-dev python3-apt',
      'sudo add-apt-repository --yes --update ppa:ansible/ansible',
      'sudo apt install -y ansible',
      'sudo apt install -y python3-jmespath python3-netaddr python3-passlib',
      'pipx install ansible-lint',
      'pipx install yamllint',
      'ansible --version',
      'python3 --version',
      'ansible-lint --version',
      'yamllint --version',
    ]);
    expect(outcome).toEqual({
      status: 'completed',
      ansibleInstalled: true,
      ppaAdded: true,
      pathConfigured: true,
      createdDirs: [
        path.join(home, '.ansible'),
        path.join(home, '.ansible/tmp'),
        path.join(home, '.ansible/roles'),
      ],
      versions: {
        ansible: 'ansible [core 2.17.1]',
        python: 'Python 3.12.3',
        ansibleLint: 'ansible-lint 24.7.0',
        yamllint: 'yamllint 1.35.1',
      },
    });
    expect(await fs.readFile(path.join(home, '.bashrc'), 'utf8')).toBe(PATH_BLOCK);
  });

  it('streams apt steps to the terminal', async () => {
    await runBootstrap(options, deps([true]));

    expect(runner.calls[0]).toMatchObject({ line: 'sudo apt update', options: { inherit: true } });
  });

  it('skips the upgrade, the PPA and the reinstall when asked', async () => {
    await fs.writeFile(path.join(root, 'sources.list'), 'deb https://ppa.launchpadcontent.net/ansible/ansible/ubuntu noble main\n');
    const d = deps([false]);

    const outcome = await runBootstrap(
      { ...options, skipUpgrade: true, pathEnv: `/usr/bin:${path.join(home, '.local', 'bin')}` },
      d
    );

    expect(runner.lines()).not.toContain('sudo apt upgrade -y');
    expect(runner.lines()).not.toContain('sudo apt install -y ansible');
    expect(d.prompter.questions).toEqual(['Reinstall/Upgrade?']);
    expect(d.reporter.messages).toContain('WARN Ansible already installed: ansible [core 2.17.1]');
    expect(d.reporter.messages).toContain('INFO PATH already configured');
    expect(outcome).toMatchObject({ status: 'completed', ansibleInstalled: false, ppaAdded: false, pathConfigured: false });
  });

  it('aborts when an apt step fails', async () => {
    runner.on('sudo apt update', { exitCode: 100 });

    const error = await runBootstrap(options, deps()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({ step: 'Package list update', exitCode: 100 });
    expect(runner.lines()).toEqual(['sudo apt update']);
  });

  it('installs pipx and falls back to pip for the lint tools', async () => {
    onPath.delete('pipx');
    runner.on('sudo apt install -y pipx', { exitCode: 100 });
    const d = deps([true]);

    await runBootstrap({ ...options, skipUpgrade: true }, d);

    const lines = runner.lines();
    const start = lines.indexOf('sudo apt install -y pipx');
    expect(lines.slice(start, start + 5)).toEqual([
      'sudo apt install -y pipx',
      'pip3 install --user --break-system-packages pipx',
      'pipx ensurepath',
      'pip3 install --user --break-system-packages --upgrade ansible-lint',
      'pip3 install --user --break-system-packages --upgrade yamllint',
    ]);
    expect(d.reporter.messages).toContain('WARN pipx not available via apt, falling back to pip');
  });

  it('upgrades through pipx when the tool is already installed', async () => {
    runner.on('pipx install yamllint', { exitCode: 1 });

    await runBootstrap(options, deps([true]));

    expect(runner.lines()).toContain('pipx upgrade yamllint');
    expect(runner.lines()).not.toContain('pip3 install --user --break-system-packages --upgrade yamllint');
  });

  it('warns when the Python apt packages are unavailable', async () => {
    runner.on('sudo apt install -y python3-jmespath python3-netaddr python3-passlib', { exitCode: 100 });
    const d = deps([true]);

    await runBootstrap(options, d);

    expect(d.reporter.messages).toContain('WARN Some apt packages not available');
  });

  it('fails verification when ansible is still missing', async () => {
    onPath.delete('ansible');

    await expect(runBootstrap(options, deps())).rejects.toMatchObject({ reason: 'missing_tool' });
  });

  it('warns about lint tools that are not on PATH', async () => {
    onPath.delete('yamllint');
    const d = deps([true]);

    const outcome = await runBootstrap(options, d);

    expect(d.reporter.messages).toContain('WARN yamllint not in PATH (may need to source ~/.bashrc)');
    expect(outcome).toMatchObject({ versions: { yamllint: null } });
  });
});
