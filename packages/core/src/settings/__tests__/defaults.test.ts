/**
 * @fileoverview Tests for the setting catalogs
 */

import { describe, it, expect } from 'vitest';
import { createFakeTransferApi } from '../../__tests__/helpers/fake-transfer-api.js';
import { DataCountConverter } from '../../values/index.js';
import { localSettingDefinitions } from '../defaults.js';
import { LocalSettings } from '../local.js';
import { configDir, defaultHistoryFile, defaultRcFile, defaultThemeFile } from '../paths.js';
import { remoteSettingDefinitions } from '../remote-defaults.js';

describe('localSettingDefinitions', () => {
  function load(): LocalSettings {
    const local = new LocalSettings();
    local.load(...localSettingDefinitions());
    return local;
  }

  it('should have valid defaults', () => {
    const local = load();
    expect(local.get('connect.port').toString()).toBe('9091');
    expect(local.get('connect.tls').toString()).toBe('disabled');
    expect(local.get('sort.torrents').toString()).toBe('name');
    expect(local.get('tui.marked.on').toString()).toBe('✔');
  });

  it('should cover every namespace', () => {
    const prefixes = new Set(load().names().map(name => name.split('.')[0]));
    expect([...prefixes].sort()).toEqual(['columns', 'connect', 'sort', 'tui', 'unit', 'unitprefix']);
  });

  it('should accept inverted sort orders and drop duplicates', () => {
    const local = load();
    expect(local.set('sort.torrents', ['!size', 'name', 'name']).toString()).toBe('!size, name');
    expect(() => local.set('sort.peers', ['size'])).toThrow('Invalid option: size');
  });

  it('should limit marker characters to one', () => {
    expect(() => load().set('tui.marked.on', 'xx')).toThrow();
  });
});

describe('remoteSettingDefinitions', () => {
  it('should put every daemon setting under srv.', () => {
    const definitions = remoteSettingDefinitions(createFakeTransferApi(), new DataCountConverter());
    expect(definitions).toHaveLength(15);
    expect(definitions.every(definition => definition.name.startsWith('srv.'))).toBe(true);
  });
});

describe('paths', () => {
  const env = { XDG_CONFIG_HOME: '/cfg', XDG_CACHE_HOME: '/cache' };

  it('should follow the XDG variables', () => {
    expect(configDir(env)).toBe('/cfg/rudder');
    expect(defaultRcFile(env)).toBe('/cfg/rudder/rc');
    expect(defaultThemeFile(env)).toBe('/cfg/rudder/default.theme');
    expect(defaultHistoryFile(env)).toBe('/cache/rudder/history');
  });
});
