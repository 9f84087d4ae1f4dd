/**
 * @fileoverview Command dispatch
 *
 * `runCli` is the whole CLI minus the process: it takes argv, prints to
 * stdout/stderr and returns the exit code. Programs that define their APIs
 * in code call it directly with their own `ManagedApis`.
 */

import { parseArgs } from 'node:util';
import { EXIT_CODES } from '../resolve/status.js';
import { configureLogging } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { WARDEN_VERSION } from '../version.js';
import { checkCommand } from './commands/check.js';
import { debugCommand } from './commands/debug.js';
import { diffCommand } from './commands/diff.js';
import { generateCommand } from './commands/generate.js';
import { listCommand } from './commands/list.js';
import { createCommandContext, type CommandContext, type GlobalOptions, type RunCliOptions } from './context.js';
import { createError, formatError, USAGE_EXIT_CODE } from './errors.js';
import { showHelp } from './help.js';

type Command = 'check' | 'generate' | 'diff' | 'list' | 'debug' | 'help';

export const COMMANDS: Record<Command, { description: string; usage: string }> = {
  check: {
    description: 'Report whether documents are up to date',
    usage: 'openapi-warden check [--api <glob>] [--json] [--verbose]',
  },
  generate: {
    description: 'Write every fixable change, then check again',
    usage: 'openapi-warden generate [--api <glob>] [--dry-run] [--json]',
  },
  diff: {
    description: 'Show how working-tree documents differ from blessed ones',
    usage: 'openapi-warden diff [--api <glob>] [--json]',
  },
  list: {
    description: 'List managed APIs and their versions',
    usage: 'openapi-warden list [--verbose] [--json]',
  },
  debug: {
    description: 'Show what each source contains, per API',
    usage: 'openapi-warden debug [--api <glob>] [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'openapi-warden help [command]',
  },
};

const HANDLERS: Record<Exclude<Command, 'help'>, (ctx: CommandContext) => Promise<number>> = {
  check: checkCommand,
  generate: generateCommand,
  diff: diffCommand,
  list: listCommand,
  debug: debugCommand,
};

function isCommand(name: string): name is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

function parseGlobalArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
      config: { type: 'string' },
      'blessed-from': { type: 'string' },
      api: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  let parsed: ReturnType<typeof parseGlobalArgs>;
  try {
    parsed = parseGlobalArgs(args);
  } catch (error) {
    console.error(formatError(createError('INVALID_ARGUMENT', getErrorMessage(error))));
    return USAGE_EXIT_CODE;
  }
  const { values, positionals } = parsed;

  if (values.version === true) {
    console.log(`openapi-warden ${WARDEN_VERSION.string}`);
    return 0;
  }

  const [command, ...commandArgs] = positionals;
  if (values.help === true || command === undefined) {
    showHelp(command);
    return 0;
  }

  if (!isCommand(command)) {
    const error = createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      available: Object.keys(COMMANDS),
    });
    console.error(formatError(error));
    return USAGE_EXIT_CODE;
  }
  if (command === 'help') {
    showHelp(commandArgs[0]);
    return 0;
  }
  if (commandArgs.length > 0) {
    console.error(formatError(createError('INVALID_ARGUMENT', `Unexpected argument: ${commandArgs.join(' ')}`)));
    return USAGE_EXIT_CODE;
  }

  if (values.verbose === true) {
    configureLogging({ level: 'debug' });
  }

  const globals: GlobalOptions = {
    workspace: values.workspace,
    config: values.config,
    blessedFrom: values['blessed-from'],
    apiGlobs: values.api ?? [],
    json: values.json === true,
    verbose: values.verbose === true,
    dryRun: values['dry-run'] === true,
  };

  try {
    const ctx = await createCommandContext(globals, options);
    return await HANDLERS[command](ctx);
  } catch (error) {
    console.error(formatError(error));
    return EXIT_CODES.failure;
  }
}
