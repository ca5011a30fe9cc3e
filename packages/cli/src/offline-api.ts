/**
 * @fileoverview Offline Transfer API
 *
 * Stand-in used when no daemon transport is available. Every request fails
 * with a ConnectivityError, so local settings and rc files still work.
 */

import {
  ConnectivityError,
  type DaemonSettingKey,
  type DaemonSettings,
  type Direction,
  type NumberValue,
  type SettingsApi,
  type TorrentApi,
  type TorrentResponse,
  type TransferApi,
} from '@rudder/core';

export const OFFLINE_MESSAGE = 'Not connected to a daemon';

function offline(): Promise<never> {
  return Promise.reject(new ConnectivityError(OFFLINE_MESSAGE));
}

class OfflineSettingsApi implements SettingsApi {
  fetch(): Promise<unknown> {
    return offline();
  }

  set<K extends DaemonSettingKey>(_key: K, _value: DaemonSettings[K]): Promise<void> {
    return offline();
  }

  getLimitRate(_direction: Direction): Promise<NumberValue> {
    return offline();
  }

  setLimitRate(_direction: Direction, _value: NumberValue): Promise<void> {
    return offline();
  }
}

class OfflineTorrentApi implements TorrentApi {
  torrents(_filter: string, _keys: readonly string[]): Promise<TorrentResponse> {
    return offline();
  }

  setLimitRate(_filter: string, _direction: Direction, _limit: string): Promise<TorrentResponse> {
    return offline();
  }

  adjustLimitRate(_filter: string, _direction: Direction, _delta: string): Promise<TorrentResponse> {
    return offline();
  }
}

export function createOfflineApi(): TransferApi {
  return {
    settings: new OfflineSettingsApi(),
    torrent: new OfflineTorrentApi(),
  };
}
