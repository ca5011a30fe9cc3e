/**
 * @fileoverview Transfer API contracts
 *
 * The narrow facets of the daemon client that settings and commands use.
 * Implementations own the transport; they throw ConnectivityError for
 * transport failures and ValidationError for values the daemon rejects.
 */

import type { NumberValue } from '../values/index.js';
import type { DaemonSettingKey, DaemonSettings } from './schemas.js';

export type Direction = 'up' | 'down';

export const DIRECTIONS: readonly Direction[] = ['up', 'down'];

/**
 * Daemon-wide settings
 */
export interface SettingsApi {
  /** Fetch every daemon setting in one round trip; the payload is validated by the caller */
  fetch(): Promise<unknown>;
  set<K extends DaemonSettingKey>(key: K, value: DaemonSettings[K]): Promise<void>;
  /** Current global rate limit, infinite when unlimited */
  getLimitRate(direction: Direction): Promise<NumberValue>;
  setLimitRate(direction: Direction, value: NumberValue): Promise<void>;
}

export interface TorrentSummary {
  name: string;
  [key: string]: unknown;
}

export interface TorrentResponse {
  success: boolean;
  torrents: TorrentSummary[];
  /** Messages for the user, e.g. which torrents were changed */
  messages?: string[];
  errors?: string[];
}

/**
 * Per-torrent requests; `filter` is an opaque torrent filter expression
 */
export interface TorrentApi {
  torrents(filter: string, keys: readonly string[]): Promise<TorrentResponse>;
  setLimitRate(filter: string, direction: Direction, limit: string): Promise<TorrentResponse>;
  /** Change limits relative to their current value; `delta` carries its sign */
  adjustLimitRate(filter: string, direction: Direction, delta: string): Promise<TorrentResponse>;
}

export interface TransferApi {
  settings: SettingsApi;
  torrent: TorrentApi;
}
