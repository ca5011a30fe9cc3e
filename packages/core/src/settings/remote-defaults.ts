/**
 * @fileoverview Remote Setting Catalog
 *
 * Daemon settings exposed under the "srv." namespace. Each entry maps a
 * field of the daemon settings snapshot to a typed value and back.
 */

import {
  ENCRYPTION_MODES,
  daemonSettingsSchema,
  type DaemonSettings,
  type Direction,
  type SettingsApi,
  type TransferApi,
} from '../api/index.js';
import {
  BoolValue,
  DataCountConverter,
  FloatValue,
  IntegerValue,
  OptionValue,
  PathValue,
  type RawValue,
  type ValueType,
} from '../values/index.js';
import type { RemoteSettingDefinition } from './types.js';

/** Literals that lift a rate limit */
export const UNLIMITED_LITERALS = ['off', 'unlimited', 'none'] as const;

function isUnlimited(raw: RawValue): boolean {
  return typeof raw === 'string' && UNLIMITED_LITERALS.some(literal => literal === raw.trim().toLowerCase());
}

/**
 * Bandwidth limit in the converter's current unit and prefix; infinite when
 * unlimited
 */
export function rateLimitType(converter: DataCountConverter): ValueType<FloatValue> {
  return {
    typename: 'rate limit',
    create: (raw) => {
      const converted = converter.convert(isUnlimited(raw) ? Infinity : raw);
      return new FloatValue(converted, { min: 0 });
    },
  };
}

/** Range a "random" peer port is picked from */
export const RANDOM_PORT_RANGE = [49152, 65535] as const;

/**
 * Peer port; the literal "random" picks one from the dynamic port range
 */
export function peerPortType(): ValueType<IntegerValue> {
  const type = IntegerValue.type({ min: 1, max: 65535, precise: true });
  return {
    typename: 'port',
    create: (raw) => {
      if (typeof raw === 'string' && raw.trim().toLowerCase() === 'random') {
        const [low, high] = RANDOM_PORT_RANGE;
        return type.create(low + Math.floor(Math.random() * (high - low + 1)));
      }
      return type.create(raw);
    },
  };
}

type KeysOfType<T> = { [K in keyof T]: T[K] extends boolean ? K : never }[keyof T];

function boolSetting(
  api: SettingsApi,
  name: string,
  key: KeysOfType<DaemonSettings>,
  description: string
): RemoteSettingDefinition<BoolValue> {
  return {
    name,
    type: BoolValue.type(),
    description,
    accessor: {
      read: (snapshot) => snapshot[key],
      push: (value) => api.set(key, value.isTrue),
    },
  };
}

function rateLimitSetting(
  api: SettingsApi,
  converter: DataCountConverter,
  direction: Direction
): RemoteSettingDefinition<FloatValue> {
  const field = direction === 'up' ? 'rateLimitUp' : 'rateLimitDown';
  return {
    name: `srv.limit.rate.${direction}`,
    type: rateLimitType(converter),
    description: direction === 'up' ? 'Combined upload rate limit' : 'Combined download rate limit',
    accessor: {
      read: (snapshot) => new FloatValue(snapshot[field] ?? Infinity, { unit: 'B' }),
      push: (value) => api.setLimitRate(direction, value),
    },
  };
}

export function remoteSettingDefinitions(
  transfer: TransferApi,
  converter: DataCountConverter
): RemoteSettingDefinition[] {
  const api = transfer.settings;
  return [
    boolSetting(api, 'srv.utp', 'utp',
      'Whether to use Micro Transport Protocol to mitigate latency issues'),
    boolSetting(api, 'srv.dht', 'dht',
      'Whether to use Distributed Hash Tables to discover peers for public torrents'),
    boolSetting(api, 'srv.lpd', 'lpd',
      'Whether to use Local Peer Discovery to discover peers for public torrents'),
    boolSetting(api, 'srv.pex', 'pex',
      'Whether to use Peer Exchange to discover peers for public torrents'),
    {
      name: 'srv.port',
      type: peerPortType(),
      description: 'Port used to communicate with peers or "random" to use a random port',
      accessor: {
        read: (snapshot) => snapshot.port,
        push: (value: IntegerValue) => api.set('port', value.value),
      },
    },
    boolSetting(api, 'srv.port-forwarding', 'portForwarding',
      'Whether to instruct your router to forward the peer port via UPnP or NAT-PMP'),
    {
      name: 'srv.encryption',
      type: OptionValue.type({ options: ENCRYPTION_MODES }),
      description: 'Protocol encryption policy; "required", "preferred" or "tolerated"',
      accessor: {
        read: (snapshot) => snapshot.encryption,
        push: (value: OptionValue) => api.set('encryption', daemonSettingsSchema.shape.encryption.parse(value.value)),
      },
    },
    {
      name: 'srv.limit.peers.global',
      type: IntegerValue.type({ min: 0 }),
      description: 'Maximum number of connections for all torrents combined',
      accessor: {
        read: (snapshot) => snapshot.peerLimitGlobal,
        push: (value: IntegerValue) => api.set('peerLimitGlobal', value.value),
      },
    },
    {
      name: 'srv.limit.peers.torrent',
      type: IntegerValue.type({ min: 0 }),
      description: 'Maximum number of connections for a single torrent',
      accessor: {
        read: (snapshot) => snapshot.peerLimitTorrent,
        push: (value: IntegerValue) => api.set('peerLimitTorrent', value.value),
      },
    },
    rateLimitSetting(api, converter, 'up'),
    rateLimitSetting(api, converter, 'down'),
    boolSetting(api, 'srv.part-files', 'partFiles',
      'Whether to append ".part" to incomplete file names'),
    {
      name: 'srv.path.complete',
      type: PathValue.type(),
      description: 'Where to put torrent files',
      accessor: {
        read: (snapshot) => snapshot.pathComplete,
        push: (value: PathValue) => api.set('pathComplete', value.value),
      },
    },
    {
      name: 'srv.path.incomplete',
      type: PathValue.type(),
      description: 'Where to put incomplete torrent files',
      accessor: {
        read: (snapshot) => snapshot.pathIncomplete,
        push: (value: PathValue) => api.set('pathIncomplete', value.value),
      },
    },
    boolSetting(api, 'srv.autostart-torrents', 'autostartTorrents',
      'Automatically start torrents when they are added'),
  ];
}
