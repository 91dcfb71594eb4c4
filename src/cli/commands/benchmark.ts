/**
 * @fileoverview Benchmark command - time a playbook run and compare it with the last one
 */

import * as path from 'node:path';
import { silentReporter, type Prompter } from '../../core/interaction.js';
import { runBenchmark } from '../../benchmark/runner.js';
import { createExecaRunner } from '../../utils/exec.js';
import { formatClock } from '../../utils/format.js';
import { countOption, flag, parseCommandArgs, stringOption, type CommandContext } from '../args.js';
import { createPrompter } from '../prompts.js';
import { createConsoleReporter, printBanner, printKeyValue, printStatus } from '../progress.js';

export interface BenchmarkCommandOptions extends CommandContext {
  prompter?: Prompter;
}

export async function benchmarkCommand(options: BenchmarkCommandOptions): Promise<void> {
  const { values } = parseCommandArgs(options.args, {
    playbook: { type: 'string' },
    'real-run': { type: 'boolean', default: false },
    keep: { type: 'string' },
    yes: { type: 'boolean', short: 'y', default: false },
  });
  const settings = options.config.benchmark;
  const playbook = stringOption(values, 'playbook') ?? settings.playbook;
  const checkMode = !flag(values, 'real-run');
  // Pruning to zero would delete the run just written
  const keep = countOption(values, 'keep', settings.keep, 1);

  if (!options.json) {
    printBanner('Ansible Performance Benchmark');
  }

  const outcome = await runBenchmark(
    {
      benchmarkDir: settings.dir,
      playbook,
      workspace: path.resolve(options.workspace),
      checkMode,
      keep,
    },
    {
      runner: options.runner ?? createExecaRunner(),
      prompter: options.prompter ?? createPrompter({ assumeYes: flag(values, 'yes') }),
      reporter: options.json ? silentReporter : createConsoleReporter(),
      output: options.json ? undefined : (chunk) => process.stdout.write(chunk),
    }
  );

  process.exitCode = 0;
  if (outcome.status === 'cancelled') return;

  if (options.json) {
    console.log(JSON.stringify(outcome.summary, null, 2));
    return;
  }

  printBanner('Benchmark Complete!');
  printKeyValue([
    { key: 'Results saved to', value: outcome.resultsFile },
    { key: 'Summary', value: outcome.summaryFile },
    {
      key: 'Total duration',
      value: `${outcome.summary.durationSeconds}s (${formatClock(outcome.summary.durationSeconds)})`,
    },
  ]);
  console.log('');
  printStatus('info', `View results: cat ${outcome.resultsFile}`);
}
