/**
 * @fileoverview Command Router
 *
 * Resolves command names and aliases to built-in handlers and runs
 * command lines. Failures never escape run(); they are reported through
 * CommandIO and turned into a `false` result.
 */

import { CommandError, errorMessage, isRudderError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { getDefaultBuiltInCommands } from './builtins.js';
import { parseCommand, suggestCommands } from './parser.js';
import type {
  BuiltInCommand,
  CommandContext,
  CommandRouterConfig,
  ParsedCommand,
  RunResult,
} from './types.js';

const log = createLogger('commands:router');

/**
 * Context handed to the router; `run` is filled in by the router itself
 */
export type RouterContext = Omit<CommandContext, 'run'>;

export class CommandRouter {
  private builtInCommands: Map<string, BuiltInCommand> = new Map();
  private aliases: Map<string, string> = new Map();
  private context: CommandContext;

  constructor(context: RouterContext, config: CommandRouterConfig = {}) {
    this.context = { ...context, run: (line) => this.run(line) };

    for (const cmd of getDefaultBuiltInCommands()) {
      this.registerBuiltIn(cmd);
    }
    for (const cmd of config.customCommands ?? []) {
      this.registerBuiltIn(cmd);
    }
  }

  /**
   * Register a built-in command; a command with the same name is replaced
   */
  registerBuiltIn(command: BuiltInCommand): void {
    const name = command.name.toLowerCase();
    this.builtInCommands.set(name, command);
    for (const alias of command.aliases ?? []) {
      this.aliases.set(alias.toLowerCase(), name);
    }
    log.debug('Built-in command registered', { command: command.name });
  }

  /**
   * Look up a command by name or alias
   */
  getCommand(name: string): BuiltInCommand | null {
    const normalized = name.toLowerCase();
    const resolved = this.aliases.get(normalized) ?? normalized;
    return this.builtInCommands.get(resolved) ?? null;
  }

  parse(input: string): ParsedCommand {
    return parseCommand(input);
  }

  /**
   * Run a command line
   *
   * @returns true on success, false on failure, null if the command doesn't
   * run on the active interface
   */
  async run(line: string): Promise<RunResult> {
    return this.execute(this.parse(line));
  }

  async execute(parsed: ParsedCommand): Promise<RunResult> {
    const { io } = this.context;
    if (!parsed.command) {
      return true;
    }

    const command = this.getCommand(parsed.command);
    if (!command) {
      log.debug('Unknown command', { command: parsed.command });
      const suggestions = suggestCommands(parsed.command, this.listCommands());
      io.error(suggestions.length > 0
        ? `Unknown command: ${parsed.command} (did you mean: ${suggestions.join(', ')}?)`
        : `Unknown command: ${parsed.command}`);
      return false;
    }

    if (command.interfaces && !command.interfaces.includes(this.context.interface)) {
      log.debug('Command not available on this interface', {
        command: command.name,
        interface: this.context.interface,
      });
      return null;
    }

    log.debug('Executing command', { command: command.name, args: parsed.args });
    try {
      await command.handler(parsed.args, this.context);
      return true;
    } catch (error) {
      if (error instanceof CommandError) {
        // An empty message means the handler has reported already
        if (error.message) io.error(error.message);
      } else if (isRudderError(error)) {
        io.error(error.message);
      } else {
        log.error('Command failed', error instanceof Error ? error : { error: String(error) });
        io.error(`${command.name}: ${errorMessage(error)}`);
      }
      return false;
    }
  }

  /**
   * Get help for a specific command
   */
  getHelp(name: string): string | null {
    const command = this.getCommand(name);
    if (!command) {
      return null;
    }

    const lines = [`${command.name} - ${command.description}`, '', 'USAGE:'];
    lines.push(...command.usage.map(usage => `  ${usage}`));
    if (command.aliases && command.aliases.length > 0) {
      lines.push('', `ALIASES: ${command.aliases.join(', ')}`);
    }
    return lines.join('\n');
  }

  /**
   * List all available commands
   */
  listCommands(): string[] {
    return Array.from(this.builtInCommands.keys()).sort();
  }

  /**
   * One line per command: name and description, aligned
   */
  describeCommands(): string[] {
    const names = this.listCommands();
    const width = Math.max(0, ...names.map(name => name.length)) + 2;
    return names.map(name => {
      const description = this.builtInCommands.get(name)?.description ?? '';
      return `${name.padEnd(width)}${description}`;
    });
  }
}
