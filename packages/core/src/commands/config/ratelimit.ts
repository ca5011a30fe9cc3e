/**
 * @fileoverview ratelimit command
 *
 * Global limits are the srv.limit.rate.* settings and go through the same
 * resolution as `set`. Limits for torrents matching a filter are sent to the
 * daemon as they are, relative changes included.
 */

import { DIRECTIONS, type Direction, type TorrentResponse } from '../../api/index.js';
import { CommandError, isRudderError } from '../../errors/index.js';
import { createLogger } from '../../logging/index.js';
import { repr } from '../../values/index.js';
import { setSettingValue } from '../resolve-value.js';
import type { BuiltInCommand, CommandContext } from '../types.js';

const log = createLogger('commands:ratelimit');

const DIRECTION_ALIASES: Readonly<Record<string, Direction>> = { up: 'up', down: 'down', dn: 'down' };

const GLOBAL_FILTER = 'global';

const TORRENT_KEYS = ['name', 'limit-rate-up', 'limit-rate-down'] as const;

interface RateLimitArgs {
  directions: Direction[];
  limit: string | null;
  filter: string[];
  quiet: boolean;
}

/**
 * Parse "up,dn" into directions
 * @throws CommandError for anything but up, down and dn
 */
export function parseDirections(spec: string): Direction[] {
  const directions: Direction[] = [];
  for (const part of spec.toLowerCase().split(',')) {
    const direction = DIRECTION_ALIASES[part.trim()];
    if (!direction) {
      throw new CommandError(`Invalid direction: ${repr(part.trim())}`);
    }
    if (!directions.includes(direction)) directions.push(direction);
  }
  return directions;
}

function parseArgs(args: readonly string[]): RateLimitArgs {
  const positionals: string[] = [];
  let quiet = false;
  for (const arg of args) {
    if (arg === '--quiet' || arg === '-q') {
      quiet = true;
    } else {
      positionals.push(arg);
    }
  }

  const [direction = DIRECTIONS.join(','), limit = null, ...filter] = positionals;
  return { directions: parseDirections(direction), limit, filter, quiet };
}

function isGlobal(filter: readonly string[]): boolean {
  return filter.length === 0 || (filter.length === 1 && filter[0] === GLOBAL_FILTER);
}

/**
 * Forward daemon messages and report whether the request succeeded
 */
function report(response: TorrentResponse, { io }: CommandContext, quiet: boolean): boolean {
  if (!quiet) {
    for (const message of response.messages ?? []) io.info(message);
  }
  for (const error of response.errors ?? []) io.error(error);
  return response.success;
}

async function showLimits(context: CommandContext, { directions, filter }: RateLimitArgs): Promise<void> {
  const { api, converter, io } = context;

  if (isGlobal(filter)) {
    for (const direction of directions) {
      const limit = await api.settings.getLimitRate(direction);
      io.output(`Global ${direction}load rate limit: ${converter.convert(limit).toString()}`);
    }
    return;
  }

  const response = await api.torrent.torrents(filter.join(' '), TORRENT_KEYS);
  if (!report(response, context, true)) {
    throw new CommandError();
  }
  for (const torrent of response.torrents) {
    for (const direction of directions) {
      io.output(`${torrent.name} ${direction}load rate limit: ${String(torrent[`limit-rate-${direction}`])}`);
    }
  }
}

async function setGlobalLimits(context: CommandContext, { directions, limit, quiet }: RateLimitArgs): Promise<void> {
  let success = true;
  for (const direction of directions) {
    log.debug('Setting global rate limit', { direction, limit });
    try {
      const value = await setSettingValue(context.settings, `srv.limit.rate.${direction}`, [limit ?? '']);
      if (!quiet) {
        context.io.info(`Global ${direction}load rate limit: ${value.toString()}`);
      }
    } catch (error) {
      if (!isRudderError(error)) throw error;
      if (error.message) context.io.error(error.message);
      success = false;
    }
  }
  if (!success) {
    throw new CommandError();
  }
}

async function setTorrentLimits(context: CommandContext, { directions, limit, filter, quiet }: RateLimitArgs): Promise<void> {
  const spec = (limit ?? '').trim();
  // '+=1M' is sent as '+1M'
  const adjust = spec.startsWith('+=') || spec.startsWith('-=');
  const value = adjust ? spec.charAt(0) + spec.slice(2) : spec;
  const torrentFilter = filter.join(' ');

  log.debug('Setting torrent rate limits', { directions, filter: torrentFilter, limit: value, adjust });

  let success = true;
  for (const direction of directions) {
    try {
      const response = adjust
        ? await context.api.torrent.adjustLimitRate(torrentFilter, direction, value)
        : await context.api.torrent.setLimitRate(torrentFilter, direction, value);
      success = report(response, context, quiet) && success;
    } catch (error) {
      if (!isRudderError(error)) throw error;
      context.io.error(error.message);
      success = false;
    }
  }
  if (!success) {
    throw new CommandError();
  }
}

export const ratelimitCommand: BuiltInCommand = {
  name: 'ratelimit',
  aliases: ['rate', 'rl'],
  description: 'Limit transfer rates per torrent or globally',
  usage: [
    'ratelimit',
    'ratelimit <DIRECTION>',
    'ratelimit <DIRECTION> <LIMIT>',
    'ratelimit <DIRECTION> <LIMIT> <TORRENT FILTER> <TORRENT FILTER> ...',
  ],
  handler: async (args, context) => {
    const parsed = parseArgs(args);
    if (parsed.limit === null || parsed.limit === 'show') {
      await showLimits(context, parsed);
    } else if (isGlobal(parsed.filter)) {
      await setGlobalLimits(context, parsed);
    } else {
      await setTorrentLimits(context, parsed);
    }
  },
};
