/**
 * @fileoverview reset command
 */

import { CommandError, RemoteResetError, SettingNotFoundError } from '../../errors/index.js';
import { listifyArgs } from '../resolve-value.js';
import type { BuiltInCommand } from '../types.js';

export const resetCommand: BuiltInCommand = {
  name: 'reset',
  description: 'Reset settings to their default values',
  usage: ['reset <NAME> <NAME> <NAME> ...'],
  handler: async (args, { settings, io }) => {
    const names = listifyArgs(args);
    if (names.length === 0) {
      throw new CommandError('Missing setting name');
    }

    // Every name gets a try before the command fails
    let success = true;
    for (const name of names) {
      try {
        settings.reset(name);
      } catch (error) {
        if (!(error instanceof RemoteResetError || error instanceof SettingNotFoundError)) {
          throw error;
        }
        io.error(error.message);
        success = false;
      }
    }

    if (!success) {
      throw new CommandError();
    }
  },
};
