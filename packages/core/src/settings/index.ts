/**
 * @fileoverview Settings exports
 */

export { LocalSettings } from './local.js';
export { RemoteSettings } from './remote.js';
export { CombinedSettings } from './combined.js';
export {
  localSettingDefinitions,
  TORRENT_COLUMNS,
  PEER_COLUMNS,
  FILE_COLUMNS,
  TORRENT_SORT_ORDERS,
  PEER_SORT_ORDERS,
} from './defaults.js';
export { remoteSettingDefinitions, rateLimitType, UNLIMITED_LITERALS } from './remote-defaults.js';
export {
  configDir,
  cacheDir,
  defaultRcFile,
  defaultHistoryFile,
  defaultThemeFile,
} from './paths.js';
export type {
  LocalSettingDefinition,
  RemoteAccessor,
  RemoteSettingDefinition,
  SettingsView,
  ChangeListener,
} from './types.js';
export { readRcFile, parseRcContent, resolveRcPath } from './rcfile.js';
