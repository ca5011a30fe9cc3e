/**
 * @fileoverview Runtime Context
 *
 * Builds the settings registries, bandwidth converter and command router
 * for one process. The entry point owns the context; nothing here is a
 * module-level singleton.
 */

import type { TransferApi } from '../api/index.js';
import { CommandRouter } from '../commands/router.js';
import type { BuiltInCommand, CommandIO, InterfaceName, RunResult } from '../commands/types.js';
import type { KeymapProvider } from '../keymap/index.js';
import { createLogger } from '../logging/index.js';
import {
  CombinedSettings,
  LocalSettings,
  RemoteSettings,
  localSettingDefinitions,
  remoteSettingDefinitions,
} from '../settings/index.js';
import { DataCountConverter } from '../values/index.js';

const log = createLogger('runtime:context');

export interface RuntimeContextConfig {
  api: TransferApi;
  io: CommandIO;
  keymap?: KeymapProvider | null;
  interface?: InterfaceName;
  /** Extra commands, e.g. ones only the TUI provides */
  customCommands?: BuiltInCommand[];
}

export interface RuntimeContext {
  local: LocalSettings;
  remote: RemoteSettings;
  settings: CombinedSettings;
  /** Bandwidth converter following unit.bandwidth and unitprefix.bandwidth */
  converter: DataCountConverter;
  router: CommandRouter;
  run(line: string): Promise<RunResult>;
  /** Detach listeners registered on the settings */
  dispose(): void;
}

export function createContext(config: RuntimeContextConfig): RuntimeContext {
  const local = new LocalSettings();
  local.load(...localSettingDefinitions());

  const converter = new DataCountConverter(
    local.get('unit.bandwidth').toString(),
    local.get('unitprefix.bandwidth').toString()
  );
  const unsubscribe = local.onChange((name, value) => {
    if (name === 'unit.bandwidth') {
      converter.unit = value.toString();
    } else if (name === 'unitprefix.bandwidth') {
      converter.prefix = value.toString();
    }
  });

  const remote = new RemoteSettings(config.api.settings);
  remote.load(...remoteSettingDefinitions(config.api, converter));

  const settings = new CombinedSettings(local, remote);

  const router = new CommandRouter(
    {
      settings,
      api: config.api,
      converter,
      keymap: config.keymap ?? null,
      io: config.io,
      interface: config.interface ?? 'cli',
    },
    { customCommands: config.customCommands }
  );

  log.debug('Context created', { interface: config.interface ?? 'cli' });

  return {
    local,
    remote,
    settings,
    converter,
    router,
    run: (line) => router.run(line),
    dispose: unsubscribe,
  };
}
