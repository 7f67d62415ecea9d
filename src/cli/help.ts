/**
 * @fileoverview Detailed help text for tierscan CLI commands
 */

const HELP_TEXT = {
  main: `
tierscan - Tiered codebase analysis with a local LLM

USAGE:
    tierscan <command> [options]

COMMANDS:
    scan                Classify the project with a crowd of quick model calls
    analyze <tier>      Run a tier (quick, detailed, deep, full) and write knowledge files
    status              Show which tiers are analyzed and whether they are fresh
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Set project directory (default: current directory)
    --json              Print results and errors as JSON on stdout
    --yes               Grant permission requests without asking

ENVIRONMENT:
    TIERSCAN_LMSTUDIO_URL   Inference server (default http://localhost:1234)
    TIERSCAN_DEBUG=true     Debug logging and intermediate artifacts

CONFIGURATION:
    .tierscan/config.jsonc, .tierscan/config.json or .tierscan/config.yaml
    String values may reference environment variables as $VAR or \${VAR}.
`,

  scan: `
tierscan scan - Classify the project

USAGE:
    tierscan scan [--force] [--debug] [--json] [--yes]

DESCRIPTION:
    Sends the tracked file list to a crowd of parallel model calls, reduces
    their answers to one classification (type, language, framework, purpose)
    and stores it in .tierscan/state/startup_scan.json. Each scan refines the
    previous one and increments its iteration.

OPTIONS:
    --force             Do not show the previous answer to the crowd
    --debug             Write crowd and adjudication artifacts under .tierscan/debug

EXAMPLES:
    tierscan scan
    tierscan scan --force --json
`,

  analyze: `
tierscan analyze - Run an analysis tier

USAGE:
    tierscan analyze <quick|detailed|deep|full> [options]

DESCRIPTION:
    Runs the tier and writes its knowledge files to .tierscan/knowledge/<tier>/.
    A tier whose record matches the current content hash and model is served
    from the record without model calls. Each tier refines the knowledge of
    the tier below it.

OPTIONS:
    --force                 Ignore stored records and reprocess everything
    --continue              Continue through every tier above the requested one
    --continue-to <tier>    Continue up to and including <tier>

EXAMPLES:
    tierscan analyze quick
    tierscan analyze quick --continue-to deep
    tierscan analyze detailed --force --yes
`,

  status: `
tierscan status - Show tier state

USAGE:
    tierscan status [--json]

DESCRIPTION:
    Lists each tier with its last analysis time, whether the stored record is
    fresh for the current files, and the reasons when it is not.
`,

  help: `
tierscan help - Show help

USAGE:
    tierscan help [command]
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}
