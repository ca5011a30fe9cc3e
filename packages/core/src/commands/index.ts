/**
 * @fileoverview Command exports
 */

export { CommandRouter, type RouterContext } from './router.js';
export { getDefaultBuiltInCommands } from './builtins.js';
export {
  tokenizeArgs,
  parseCommand,
  splitCommands,
  quoteArg,
  joinArgs,
  suggestCommands,
} from './parser.js';
export {
  OPERATORS,
  setSettingValue,
  parseSettingName,
  evalShellCommand,
  listifyArgs,
  detectOperator,
  adjustValue,
  stringifyValue,
  type Operator,
  type Adjustment,
} from './resolve-value.js';
export { buildRcContent, formatTimestamp } from './config/dump.js';
export { parseDirections } from './config/ratelimit.js';
export type {
  BuiltInCommand,
  CommandContext,
  CommandIO,
  CommandRouterConfig,
  InterfaceName,
  ParsedCommand,
  RunResult,
} from './types.js';
