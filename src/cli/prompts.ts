/**
 * @fileoverview Interactive confirmation
 */

import { confirm } from '@inquirer/prompts';
import { assumeYesPrompter, type Prompter } from '../core/interaction.js';

/**
 * Prompter for the terminal. `--yes`, or a stdin that is not a TTY, answers
 * every question without asking: yes for `--yes`, no otherwise.
 */
export function createPrompter(options: { assumeYes: boolean }): Prompter {
  if (options.assumeYes) return assumeYesPrompter;
  if (!process.stdin.isTTY) {
    return { confirm: async () => false };
  }
  return {
    confirm: (message) => confirm({ message, default: false }),
  };
}
