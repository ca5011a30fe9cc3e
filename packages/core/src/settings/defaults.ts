/**
 * @fileoverview Default Settings
 *
 * Catalog of local settings and their defaults.
 */

import {
  BoolValue,
  FloatValue,
  IntegerValue,
  OptionValue,
  PathValue,
  StringValue,
  TupleValue,
} from '../values/index.js';
import { defaultHistoryFile, defaultThemeFile } from './paths.js';
import type { LocalSettingDefinition } from './types.js';

export const TORRENT_COLUMNS = [
  'activity', 'added', 'completed', 'connections', 'created', 'downloaded',
  'error', 'eta', 'limit-rate-down', 'limit-rate-up', 'marked', 'name', 'path',
  'peers', 'progress', 'rate-down', 'rate-up', 'ratio', 'seeds', 'size',
  'started', 'status', 'tracker', 'uploaded',
] as const;

export const PEER_COLUMNS = [
  'client', 'country', 'eta', 'ip', 'port', 'progress', 'rate-down', 'rate-est',
  'rate-up', 'torrent',
] as const;

export const FILE_COLUMNS = [
  'downloaded', 'marked', 'name', 'priority', 'progress', 'size', 'uploaded',
] as const;

export const TORRENT_SORT_ORDERS = [
  'added', 'completed', 'connections', 'created', 'dir', 'downloaded', 'eta',
  'name', 'peers', 'progress', 'rate', 'rate-down', 'rate-up', 'ratio', 'seeds',
  'size', 'status', 'tracker', 'uploaded',
] as const;

export const PEER_SORT_ORDERS = [
  'client', 'country', 'eta', 'ip', 'progress', 'rate', 'rate-down', 'rate-est',
  'rate-up', 'torrent',
] as const;

export const DEFAULT_TORRENT_COLUMNS = [
  'marked', 'size', 'downloaded', 'uploaded', 'ratio', 'seeds', 'connections',
  'status', 'eta', 'progress', 'rate-down', 'rate-up', 'name',
];
export const DEFAULT_PEER_COLUMNS = ['progress', 'rate-down', 'rate-up', 'rate-est', 'eta', 'ip', 'client'];
export const DEFAULT_FILE_COLUMNS = ['marked', 'priority', 'progress', 'downloaded', 'size', 'name'];
export const DEFAULT_TORRENT_SORT = ['name'];
export const DEFAULT_PEER_SORT = ['torrent'];

/**
 * Sort orders may be inverted with a leading '!'
 */
function sortOrderOptions(orders: readonly string[]): string[] {
  return [...orders, ...orders.map(order => `!${order}`)];
}

const UNITS = ['bit', 'byte'];
const UNIT_PREFIXES = ['metric', 'binary'];

export function localSettingDefinitions(): LocalSettingDefinition[] {
  return [
    {
      name: 'connect.host',
      type: StringValue.type({ minlen: 1 }),
      default: 'localhost',
      description: 'Hostname or IP of the daemon RPC interface',
    },
    {
      name: 'connect.port',
      type: IntegerValue.type({ min: 1, max: 65535, precise: true }),
      default: 9091,
      description: 'Port of the daemon RPC interface',
    },
    {
      name: 'connect.path',
      type: StringValue.type(),
      default: '/transmission/rpc',
      description: 'Path of the daemon RPC interface',
    },
    {
      name: 'connect.user',
      type: StringValue.type(),
      default: '',
      description: 'Username to authenticate as',
    },
    {
      name: 'connect.password',
      type: StringValue.type(),
      default: '',
      description: 'Password to authenticate with',
    },
    {
      name: 'connect.tls',
      type: BoolValue.type(),
      default: false,
      description: 'Whether to connect via HTTPS',
    },
    {
      name: 'connect.timeout',
      type: FloatValue.type({ min: 0 }),
      default: 10,
      description: 'Number of seconds before connecting to the daemon fails',
    },

    {
      name: 'columns.torrents',
      type: TupleValue.type({ options: TORRENT_COLUMNS }),
      default: DEFAULT_TORRENT_COLUMNS,
      description: 'List of columns in new torrent lists',
    },
    {
      name: 'columns.peers',
      type: TupleValue.type({ options: PEER_COLUMNS }),
      default: DEFAULT_PEER_COLUMNS,
      description: 'List of columns in new peer lists',
    },
    {
      name: 'columns.files',
      type: TupleValue.type({ options: FILE_COLUMNS }),
      default: DEFAULT_FILE_COLUMNS,
      description: 'List of columns in new torrent file lists',
    },

    {
      name: 'sort.torrents',
      type: TupleValue.type({ options: sortOrderOptions(TORRENT_SORT_ORDERS), dedup: true }),
      default: DEFAULT_TORRENT_SORT,
      description: 'List of torrent list sort orders',
    },
    {
      name: 'sort.peers',
      type: TupleValue.type({ options: sortOrderOptions(PEER_SORT_ORDERS), dedup: true }),
      default: DEFAULT_PEER_SORT,
      description: 'List of peer list sort orders',
    },

    {
      name: 'tui.theme',
      type: PathValue.type(),
      default: defaultThemeFile(),
      description: 'Path to theme file',
    },
    {
      name: 'tui.log.height',
      type: IntegerValue.type({ min: 1 }),
      default: 10,
      description: 'Maximum height of the log section',
    },
    {
      name: 'tui.log.autohide',
      type: FloatValue.type({ min: 0 }),
      default: 10,
      description: 'If the log is hidden, show it for this many seconds for new log entries before hiding it again',
    },
    {
      name: 'tui.cli.history-file',
      type: PathValue.type(),
      default: defaultHistoryFile(),
      description: 'Path to TUI command line history file',
    },
    {
      name: 'tui.poll',
      type: FloatValue.type({ min: 0.1 }),
      default: 5,
      description: 'Interval in seconds between TUI updates',
    },
    {
      name: 'tui.marked.on',
      type: StringValue.type({ minlen: 1, maxlen: 1 }),
      default: '✔',
      description: 'Character displayed in "marked" column for marked list items',
    },
    {
      name: 'tui.marked.off',
      type: StringValue.type({ minlen: 1, maxlen: 1 }),
      default: ' ',
      description: 'Character displayed in "marked" column for unmarked list items',
    },

    {
      name: 'unit.bandwidth',
      type: OptionValue.type({ options: UNITS }),
      default: 'byte',
      description: "Unit for bandwidth rates ('bit' or 'byte')",
    },
    {
      name: 'unitprefix.bandwidth',
      type: OptionValue.type({ options: UNIT_PREFIXES }),
      default: 'metric',
      description: "Unit prefix for bandwidth rates ('metric' or 'binary')",
    },
    {
      name: 'unit.size',
      type: OptionValue.type({ options: UNITS }),
      default: 'byte',
      description: "Unit for sizes ('bit' or 'byte')",
    },
    {
      name: 'unitprefix.size',
      type: OptionValue.type({ options: UNIT_PREFIXES }),
      default: 'binary',
      description: "Unit prefix for sizes ('metric' or 'binary')",
    },
  ];
}
