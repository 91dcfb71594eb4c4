#!/usr/bin/env node
/**
 * @fileoverview devenv CLI
 *
 * Commands:
 *   devenv bootstrap        - Install Ansible, its Python helpers and lint tools
 *   devenv verify           - Check that the Ansible setup is complete
 *   devenv cleanup-cache    - Remove old Ansible fact cache files
 *   devenv benchmark        - Time a playbook run
 *   devenv check-updates    - Check the repository for upstream commits
 *   devenv keys             - Copy SSH keys and import GPG keys from Windows
 *   devenv wslconfig        - Merge resource limits into .wslconfig
 *   devenv install-tool     - Download, verify and install a tool binary
 *
 * @packageDocumentation
 */

import { classifyError, getExitCode } from './errors.js';
import { outputStructuredError, runCli } from './dispatch.js';

runCli(process.argv.slice(2)).catch((error) => {
  const jsonMode = process.argv.includes('--json');
  const envelope = classifyError(error);
  outputStructuredError(envelope, jsonMode);
  process.exitCode = getExitCode(envelope);
});
