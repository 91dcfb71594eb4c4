/**
 * @fileoverview Seams between operations and the terminal
 *
 * Operations report progress through a StatusReporter and ask questions
 * through a Prompter, so they run unchanged under the CLI and in tests.
 */

export interface StatusReporter {
  /** Start of a new phase (`==> ...`) */
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export interface Prompter {
  /** Yes/no question; the default answer is no */
  confirm(message: string): Promise<boolean>;
}

export const silentReporter: StatusReporter = {
  step: () => {},
  info: () => {},
  success: () => {},
  warn: () => {},
};

/** Answers every question with yes (`--yes`). */
export const assumeYesPrompter: Prompter = {
  confirm: async () => true,
};
