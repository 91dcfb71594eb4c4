/**
 * @fileoverview Bootstrap command - install Ansible and its tooling on WSL2 Ubuntu
 */

import type { Prompter } from '../../core/interaction.js';
import { runBootstrap } from '../../bootstrap/installer.js';
import { createExecaRunner } from '../../utils/exec.js';
import { flag, parseCommandArgs, type CommandContext } from '../args.js';
import { createPrompter } from '../prompts.js';
import { createConsoleReporter, formatDuration, printBanner, printStatus } from '../progress.js';

export interface BootstrapCommandOptions extends CommandContext {
  prompter?: Prompter;
}

export async function bootstrapCommand(options: BootstrapCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(options.args, {
    yes: { type: 'boolean', short: 'y', default: false },
    'skip-upgrade': { type: 'boolean', default: false },
  });

  if (!options.json) {
    printBanner('Ansible Bootstrap for WSL2');
  }
  const startedAt = Date.now();

  const outcome = await runBootstrap(
    { skipUpgrade: flag(values, 'skip-upgrade') },
    {
      runner: options.runner ?? createExecaRunner(),
      prompter: options.prompter ?? createPrompter({ assumeYes: flag(values, 'yes') }),
      reporter: createConsoleReporter(),
    }
  );

  process.exitCode = 0;
  if (outcome.status === 'cancelled') return;

  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2));
    return;
  }

  printBanner('Ansible Bootstrap Complete!');
  printStatus('info', `Ansible is now ready to use! (${formatDuration(Date.now() - startedAt)})`);
  console.log(`
Quick Start:
  1. Reload shell or source ~/.bashrc:
     source ~/.bashrc

  2. Verify the setup:
     devenv verify

  3. Run playbooks from the repository ansible directory:
     ansible-playbook -K playbooks/main.yml
     ansible-playbook -K playbooks/ssh-keys.yml

Useful Commands:
  Check syntax:        ansible-playbook --syntax-check <playbook.yml>
  List tasks:          ansible-playbook --list-tasks <playbook.yml>
  Dry run:             ansible-playbook --check <playbook.yml>
  Lint playbook:       ansible-lint <playbook.yml>
  Lint YAML:           yamllint <file.yml>
`);
}
