/**
 * @fileoverview Command Types
 */

import type { TransferApi } from '../api/index.js';
import type { KeymapProvider } from '../keymap/index.js';
import type { CombinedSettings } from '../settings/index.js';
import type { DataCountConverter } from '../values/index.js';

/** Where commands are typed in */
export type InterfaceName = 'cli' | 'tui';

/**
 * Result of running one command line: true on success, false on failure,
 * null if the command doesn't apply to the active interface
 */
export type RunResult = boolean | null;

/**
 * Sinks for user-visible messages
 */
export interface CommandIO {
  /** Status messages, e.g. "Global upload rate limit: 1MB" */
  info(message: string): void;
  error(message: string): void;
  /** Requested data, e.g. a setting listing */
  output(message: string): void;
}

/**
 * Everything a command handler may touch
 */
export interface CommandContext {
  settings: CombinedSettings;
  api: TransferApi;
  /** Converts bandwidth to the unit chosen by unit.bandwidth/unitprefix.bandwidth */
  converter: DataCountConverter;
  keymap: KeymapProvider | null;
  io: CommandIO;
  interface: InterfaceName;
  /** Run another command line, e.g. from an rc file */
  run(line: string): Promise<RunResult>;
}

/**
 * Command line split into a name and its arguments
 */
export interface ParsedCommand {
  command: string;
  args: string[];
  original: string;
}

/**
 * Command definition. Handlers signal failure by throwing CommandError
 * (or any RudderError).
 */
export interface BuiltInCommand {
  name: string;
  aliases?: readonly string[];
  description: string;
  usage: readonly string[];
  /** Interfaces the command runs on; all when omitted */
  interfaces?: readonly InterfaceName[];
  handler: (args: string[], context: CommandContext) => Promise<void>;
}

export interface CommandRouterConfig {
  /** Commands registered after the built-ins */
  customCommands?: BuiltInCommand[];
}
