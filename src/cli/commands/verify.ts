/**
 * @fileoverview Verify command - check that the Ansible setup is complete
 */

import { runVerification, type VerificationReport } from '../../verify/checks.js';
import { createExecaRunner, type ExecutableLookup } from '../../utils/exec.js';
import { parseCommandArgs, type CommandContext } from '../args.js';
import { createSpinner, printBanner, printKeyValue, printStatus, printStep } from '../progress.js';

export interface VerifyCommandOptions extends CommandContext {
  findExecutable?: ExecutableLookup;
  isWsl?: () => Promise<boolean>;
}

export async function verifyCommand(options: VerifyCommandOptions): Promise<void> {
  parseCommandArgs(options.args, {});
  const spinner = !options.json && process.stdout.isTTY === true ? createSpinner('Running checks...') : null;
  const report = await runVerification(
    {
      workspace: options.workspace,
      roles: options.config.verify.roles,
      optionalTools: options.config.verify.optionalTools,
    },
    {
      runner: options.runner ?? createExecaRunner(),
      findExecutable: options.findExecutable,
      isWsl: options.isWsl,
    }
  ).finally(() => spinner?.stop());

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }

  process.exitCode = report.ok ? 0 : 1;
}

function printReport(report: VerificationReport): void {
  printBanner('Ansible Setup Verification');

  let section: string | null = null;
  for (const check of report.checks) {
    if (check.section !== section) {
      section = check.section;
      printStep(section);
    }
    switch (check.outcome) {
      case 'pass':
        printStatus('ok', check.message);
        break;
      case 'warn':
        printStatus('warn', check.message);
        break;
      case 'fail':
        printStatus('error', check.message);
        if (check.hint) console.log(`  Run: ${check.hint}`);
        break;
    }
  }

  printStep('Summary');
  printKeyValue([
    { key: 'Passed', value: report.summary.passed },
    { key: 'Warnings', value: report.summary.warnings },
    { key: 'Failed', value: report.summary.failed },
  ]);
  console.log('');

  if (!report.ok) {
    printStatus('error', 'Setup verification failed. Fix the errors above and re-run `devenv verify`.');
    return;
  }

  printStatus('ok', 'Setup verification passed!');
  console.log('');
  console.log('Next steps:');
  console.log('  1. Review variables:  vars/user_environment.yml');
  console.log('  2. Dry run:           ansible-playbook --check playbooks/main.yml');
  console.log('  3. Apply:             ansible-playbook -K playbooks/main.yml');
  console.log('  4. Benchmark:         devenv benchmark');
}
