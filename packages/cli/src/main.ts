/**
 * @fileoverview CLI main
 *
 * Parses process arguments, loads the rc file and runs the commands given
 * on the command line. Commands are separated by ';' tokens, e.g.
 * `rudder set tui.poll 10 \; dump`.
 */

import { existsSync } from 'fs';
import { parseArgs } from 'util';
import { Chalk, type ChalkInstance } from 'chalk';
import {
  NAME,
  VERSION,
  createContext,
  createLogger,
  defaultRcFile,
  errorMessage,
  joinArgs,
  setLogLevel,
  splitCommands,
  type CommandIO,
  type RuntimeContext,
  type TransferApi,
} from '@rudder/core';
import { createOfflineApi } from './offline-api.js';

const log = createLogger('cli');

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  output?: CliOutput;
  api?: TransferApi;
  env?: Readonly<Record<string, string | undefined>>;
  /** Color error messages; defaults to what the terminal supports */
  color?: boolean;
}

export interface ParsedCliArgs {
  rcfile: string | null;
  norcfile: boolean;
  debug: boolean;
  help: boolean;
  version: boolean;
  commands: string[][];
}

const OPTIONS_WITH_VALUE = new Set(['-c', '--rcfile']);

/**
 * Options come before the first command; everything after it belongs to the
 * commands, including arguments like "-=1"
 */
function splitArgv(argv: readonly string[]): [string[], string[]] {
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? '';
    if (arg === '--') {
      return [argv.slice(0, i), argv.slice(i + 1)];
    }
    if (!arg.startsWith('-') || arg === '-') break;
    i += OPTIONS_WITH_VALUE.has(arg) ? 2 : 1;
  }
  return [argv.slice(0, i), argv.slice(i)];
}

/**
 * @throws TypeError for unknown options or a missing option value
 */
export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const [optionArgs, commandArgs] = splitArgv(argv);
  const { values } = parseArgs({
    args: optionArgs,
    options: {
      rcfile: { type: 'string', short: 'c' },
      norcfile: { type: 'boolean', short: 'C' },
      debug: { type: 'boolean', short: 'd' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
    },
    allowPositionals: false,
    strict: true,
  });

  return {
    rcfile: values.rcfile ?? null,
    norcfile: values.norcfile ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
    commands: splitCommands(commandArgs),
  };
}

export function helpText(commands: readonly string[]): string {
  return `${NAME} - torrent daemon client

USAGE:
  ${NAME} [options] [<COMMAND> [<ARGUMENT>...] [; <COMMAND> ...]]

OPTIONS:
  -c, --rcfile <FILE>   Run commands from FILE first (default: ${defaultRcFile()})
  -C, --norcfile        Don't run any rc file
  -d, --debug           Log debug messages to stderr
  -h, --help            Show this help message, or a command's usage
  --version             Show version number

COMMANDS:
${commands.map(line => `  ${line}`).join('\n')}

  Run '${NAME} --help <COMMAND>' for the usage of a command.

EXAMPLES:
  ${NAME} set unit.bandwidth bit \; ratelimit up show
  ${NAME} -C dump ./rc.current
`;
}

function printHelp(
  context: RuntimeContext,
  commandName: string | undefined,
  output: CliOutput,
  colors: ChalkInstance
): number {
  if (commandName === undefined) {
    output.stdout(helpText(context.router.describeCommands()));
    return 0;
  }
  const help = context.router.getHelp(commandName);
  if (help === null) {
    output.stderr(colors.red(`Unknown command: ${commandName}`));
    return 1;
  }
  output.stdout(help);
  return 0;
}

const defaultOutput: CliOutput = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * Run the CLI
 * @returns Process exit code
 */
export async function main(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const output = options.output ?? defaultOutput;
  const colors: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : new Chalk();

  let args: ParsedCliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    output.stderr(colors.red(errorMessage(error)));
    return 1;
  }

  if (args.version) {
    output.stdout(`${NAME} v${VERSION}`);
    return 0;
  }
  if (args.debug) {
    setLogLevel('debug');
  }

  const io: CommandIO = {
    info: (message) => output.stdout(message),
    output: (message) => output.stdout(message),
    error: (message) => output.stderr(colors.red(message)),
  };
  const context = createContext({ api: options.api ?? createOfflineApi(), io, interface: 'cli' });

  try {
    if (args.help) {
      return printHelp(context, args.commands[0]?.[0], output, colors);
    }

    if (!args.norcfile) {
      const rcfile = args.rcfile ?? defaultRcFile(options.env);
      // A missing default rc file is fine, a missing explicit one is not
      if (args.rcfile !== null || existsSync(rcfile)) {
        log.debug('Loading rc file', { rcfile });
        if ((await context.run(joinArgs(['rc', rcfile]))) === false) {
          return 1;
        }
      }
    }

    for (const command of args.commands) {
      const result = await context.run(joinArgs(command));
      if (result === false) {
        return 1;
      }
    }
    return 0;
  } finally {
    context.dispose();
  }
}
