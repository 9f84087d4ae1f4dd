/**
 * @fileoverview Detailed help text for openapi-warden commands
 */

const HELP_TEXT = {
  main: `
openapi-warden - keeps generated OpenAPI documents in step with code and history

USAGE:
    openapi-warden <command> [options]

COMMANDS:
    check               Report whether documents are up to date
    generate            Write every fixable change, then check again
    diff                Show how working-tree documents differ from blessed ones
    list                List managed APIs and their versions
    debug               Show what each source contains, per API
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help              Show help information
    -v, --version           Show version information
    -w, --workspace <dir>   Repository root (default: the configuration file's directory)
    --config <path>         Configuration file (default: ./openapi-warden.yaml)
    --blessed-from <rev>    Read blessed documents at the merge base with <rev>
                            (default: $OPENAPI_WARDEN_UPSTREAM or origin/main)
    --api <glob>            Only these APIs (repeatable)
    --json                  Machine-readable output
    --verbose               Show warnings, notes and debug logging

EXIT CODES:
    0     Everything is up to date
    4     Documents need updating: run \`openapi-warden generate\`
    100   Problems that need manual attention, or an error
    2     Invalid arguments
`,

  check: `
openapi-warden check - Report whether documents are up to date

USAGE:
    openapi-warden check [--api <glob>] [--json] [--verbose]

Compares the blessed documents (from the upstream branch), the documents
generated from code, and the documents in the working tree. Nothing is
written.
`,

  generate: `
openapi-warden generate - Write every fixable change, then check again

USAGE:
    openapi-warden generate [--api <glob>] [--dry-run] [--json]

OPTIONS:
    --dry-run           Print the planned changes without applying them

Problems that cannot be fixed automatically (for example an incompatible
change to a blessed version) are reported and make the command fail, after
all fixable changes have been written.
`,

  diff: `
openapi-warden diff - Show how working-tree documents differ from blessed ones

USAGE:
    openapi-warden diff [--api <glob>] [--json]

Prints a unified diff for every version whose working-tree document is not
the blessed one: versions added locally (against the previous blessed
version), versions removed locally, and modified versions. Lockstep APIs
are skipped. Always exits 0.
`,

  list: `
openapi-warden list - List managed APIs and their versions

USAGE:
    openapi-warden list [--verbose] [--json]
`,

  debug: `
openapi-warden debug - Show what each source contains, per API

USAGE:
    openapi-warden debug [--api <glob>] [--json]
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(topic: string): topic is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, topic);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
