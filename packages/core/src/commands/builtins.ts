/**
 * @fileoverview Built-in Commands
 */

import { dumpCommand } from './config/dump.js';
import { ratelimitCommand } from './config/ratelimit.js';
import { rcCommand } from './config/rc.js';
import { resetCommand } from './config/reset.js';
import { setCommand } from './config/set.js';
import type { BuiltInCommand } from './types.js';

/**
 * Commands every router starts with
 */
export function getDefaultBuiltInCommands(): BuiltInCommand[] {
  return [setCommand, resetCommand, ratelimitCommand, rcCommand, dumpCommand];
}
