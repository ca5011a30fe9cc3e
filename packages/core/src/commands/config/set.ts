/**
 * @fileoverview set command
 */

import { CommandError, errorMessage, isConnectivityError } from '../../errors/index.js';
import { setSettingValue } from '../resolve-value.js';
import type { BuiltInCommand, CommandContext } from '../types.js';

const UNAVAILABLE = '<unavailable>';

/**
 * Print every setting as "NAME = VALUE". Remote settings are refreshed
 * first; if that fails they show as unavailable and the command fails after
 * listing.
 */
async function listSettings(context: CommandContext): Promise<void> {
  const { settings, io } = context;

  let updateError: string | null = null;
  try {
    await settings.update();
  } catch (error) {
    if (!isConnectivityError(error)) throw error;
    updateError = error.message;
  }

  const names = settings.names();
  const width = Math.max(...names.map(name => name.length));
  for (const name of names) {
    let value: string;
    try {
      value = settings.get(name).toString();
    } catch (error) {
      if (!isConnectivityError(error)) throw new CommandError(errorMessage(error));
      value = UNAVAILABLE;
    }
    io.output(`${name.padEnd(width)} = ${value}`);
  }

  if (updateError !== null) {
    throw new CommandError(updateError);
  }
}

export const setCommand: BuiltInCommand = {
  name: 'set',
  description: 'Change or list settings',
  usage: ['set [<NAME>[:eval]] [<VALUE>...]'],
  handler: async (args, context) => {
    const [name, ...values] = args;
    if (name === undefined) {
      await listSettings(context);
      return;
    }
    await setSettingValue(context.settings, name, values);
  },
};
