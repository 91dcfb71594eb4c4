/**
 * @fileoverview Detailed help text for devenv CLI commands
 */

const HELP_TEXT = {
  main: `
devenv - Provision and maintain a WSL2 Ubuntu development environment with Ansible

USAGE:
    devenv <command> [options]

COMMANDS:
    bootstrap           Install Ansible, its Python helpers and lint tools
    verify              Check that the Ansible setup is complete
    cleanup-cache       Remove old Ansible fact cache files
    benchmark           Time a playbook run and compare with the last run
    check-updates       Check the repository for new upstream commits
    keys                Copy SSH keys and import GPG keys from Windows
    wslconfig           Merge resource limits into the Windows .wslconfig
    install-tool <name> Download, verify and install a tool binary
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information (before the command)
    -w, --workspace     Ansible project directory (default: current directory)
    -c, --config        Configuration file (default: ~/.config/wsl-devenv/config.yaml)
    --verbose           Enable verbose output
    --json              Print results and errors as JSON

ERROR HANDLING:
    With --json, errors are printed to stderr as a structured envelope:
    {
      "error": {
        "code": "ECOMMAND_FAILED",    // Machine-readable error code
        "message": "...",             // Human-readable description
        "retryable": false,           // Whether retrying may help
        "recoveryHints": [...],       // Suggested recovery actions
        "context": { ... }            // Additional error context
      }
    }

    Exit codes: 0 success, 1 failure, 64 invalid arguments,
    78 invalid configuration. check-updates exits 2 when updates exist.

ENVIRONMENT:
    DEVENV_CONFIG       Configuration file used when --config is not given
    DEVENV_DEBUG        Print debug logs to stderr

EXAMPLES:
    devenv bootstrap --yes
    devenv verify
    devenv cleanup-cache --age 7 --dry-run
    devenv benchmark --playbook playbooks/development.yml
    devenv check-updates --force
    devenv install-tool kubectl

For more information on a specific command, run:
    devenv help <command>
`,

  bootstrap: `
devenv bootstrap - Install Ansible and its tooling

USAGE:
    devenv bootstrap [options]

OPTIONS:
    -y, --yes           Answer yes to every confirmation
    --skip-upgrade      Skip 'apt upgrade'

DESCRIPTION:
    Must run as a regular user; sudo is used for apt. Steps:
    1. apt update and upgrade
    2. Install prerequisites (python3, pip, build tools, ...)
    3. Add the ansible/ansible PPA unless already present
    4. Install Ansible (asks before reinstalling)
    5. Install jmespath, netaddr, passlib, ansible-lint and yamllint
    6. Add ~/.local/bin to PATH in ~/.bashrc
    7. Create ~/.ansible, ~/.ansible/tmp and ~/.ansible/roles
    8. Verify the installed versions

EXAMPLES:
    devenv bootstrap
    devenv bootstrap --yes --skip-upgrade
`,

  verify: `
devenv verify - Check that the Ansible setup is complete

USAGE:
    devenv verify [options]

OPTIONS:
    --json              Print the report as JSON

DESCRIPTION:
    Checks the environment, Ansible and Python tooling, the project layout
    under the workspace, the configured roles, playbook syntax, localhost
    connectivity and optional development tools. Warnings do not fail the
    run; any failed check exits with code 1.

    Roles and optional tools are configured under 'verify' in the
    configuration file.

EXAMPLES:
    devenv verify
    devenv verify -w ~/src/wsl-setup/ansible --json
`,

  'cleanup-cache': `
devenv cleanup-cache - Remove old Ansible fact cache files

USAGE:
    devenv cleanup-cache [options]

OPTIONS:
    --age <days>        Delete files older than this many days (default: 30)
    --dry-run           List the files that would be deleted

DESCRIPTION:
    A file is old when its modification time is more than <days> whole days
    ago. Empty directories left behind are removed; the cache directory
    itself is kept. The directory is 'factCache.dir' in the configuration
    (default: ~/.ansible/facts_cache).

EXAMPLES:
    devenv cleanup-cache
    devenv cleanup-cache --age 7 --dry-run
`,

  benchmark: `
devenv benchmark - Time a playbook run

USAGE:
    devenv benchmark [options]

OPTIONS:
    --playbook <path>   Playbook relative to the workspace (default: playbooks/main.yml)
    --real-run          Apply changes instead of running with --check
    --keep <n>          Number of past runs to keep (default: 10)
    -y, --yes           Do not ask before a real run

DESCRIPTION:
    Runs ansible-playbook with the profile_tasks and timer callbacks and
    writes results-<timestamp>.txt plus a benchmark-<timestamp>.json summary
    to ~/.ansible-benchmarks. The duration is compared with the previous run.

EXAMPLES:
    devenv benchmark
    devenv benchmark --real-run --yes
`,

  'check-updates': `
devenv check-updates - Check the repository for new upstream commits

USAGE:
    devenv check-updates [options]

OPTIONS:
    --force             Check even if the interval has not passed
    --interval <days>   Days between checks (default: 7)
    --verbose           Report when a check is not due yet

DESCRIPTION:
    Fetches the configured remote branch and counts commits the workspace
    checkout is missing. The time of the last successful check is stored in
    ~/.ansible-last-update-check.

    Exit codes:
      0  up to date, or no check due
      1  check failed (fetch error)
      2  updates available

EXAMPLES:
    devenv check-updates
    devenv check-updates --force
`,

  keys: `
devenv keys - Copy SSH keys and import GPG keys from Windows

USAGE:
    devenv keys [options]

OPTIONS:
    --force             Overwrite SSH files that differ from the Windows copy
    --dry-run           Report what would be copied and imported

DESCRIPTION:
    The Windows profile is 'keys.windowsHome', or the only profile under
    /mnt/c/Users with a .ssh directory. Private keys get mode 600; *.pub,
    known_hosts and config get 644; ~/.ssh gets 700. GPG keys (*.asc, *.gpg)
    are imported from <profile>/.gnupg-export unless 'keys.gpgDir' is set.

EXAMPLES:
    devenv keys --dry-run
    devenv keys --force
`,

  wslconfig: `
devenv wslconfig - Merge resource limits into .wslconfig

USAGE:
    devenv wslconfig [options]

OPTIONS:
    --write             Write the merged file instead of printing it

DESCRIPTION:
    Sets memory, processors, swap and localhostForwarding in the [wsl2]
    section of <Windows profile>/.wslconfig from the 'wsl' configuration
    section. Other keys, sections and comments are kept. Run
    'wsl --shutdown' from Windows afterwards.

EXAMPLES:
    devenv wslconfig
    devenv wslconfig --write
`,

  'install-tool': `
devenv install-tool - Download, verify and install a tool binary

USAGE:
    devenv install-tool <name> [options]
    devenv install-tool --list

OPTIONS:
    --version <x.y.z>   Version to install (default: from configuration)
    --list              List the available tools

DESCRIPTION:
    Downloads the linux binary for this architecture, checks it against the
    published SHA-256 and installs it to ~/.local/bin with mode 755.
    Downloads are retried (downloads.attempts, downloads.delayMs).

EXAMPLES:
    devenv install-tool kubectl
    devenv install-tool talosctl --version 1.8.3
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  return command && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getHelpText(command));
}
