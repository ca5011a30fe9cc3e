/**
 * @fileoverview rc command
 */

import { CommandError, RcFileError } from '../../errors/index.js';
import { createLogger } from '../../logging/index.js';
import { readRcFile, resolveRcPath } from '../../settings/index.js';
import type { BuiltInCommand } from '../types.js';

const log = createLogger('commands:rc');

export const rcCommand: BuiltInCommand = {
  name: 'rc',
  aliases: ['source'],
  description: 'Run commands in rc file',
  usage: ['rc <FILE>'],
  handler: async (args, context) => {
    const [file] = args;
    if (file === undefined || args.length > 1) {
      throw new CommandError('Expected exactly one FILE');
    }

    const filepath = resolveRcPath(file);
    let lines: string[];
    try {
      lines = await readRcFile(filepath);
    } catch (error) {
      if (error instanceof RcFileError) {
        throw new CommandError(`Loading rc file failed: ${error.message}`);
      }
      throw error;
    }

    log.debug('Running commands from rc file', { filepath, count: lines.length });
    for (const line of lines) {
      // null means the command doesn't run on this interface, which is fine
      const result = await context.run(line);
      if (result === false) {
        throw new CommandError();
      }
    }
  },
};
