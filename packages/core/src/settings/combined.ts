/**
 * @fileoverview Combined Settings
 *
 * One namespace over local and remote settings. Lookups try local settings
 * first. Remote values come from the last update(); call it before reading
 * when a fresh value matters.
 */

import { RemoteResetError, SettingNotFoundError } from '../errors/index.js';
import type { RawValue, Stringable } from '../values/index.js';
import type { LocalSettings } from './local.js';
import type { RemoteSettings } from './remote.js';
import type { SettingsView } from './types.js';

export class CombinedSettings implements SettingsView {
  constructor(
    readonly local: LocalSettings,
    readonly remote: RemoteSettings
  ) {
    const duplicates = local.names().filter(name => remote.has(name));
    if (duplicates.length > 0) {
      throw new Error(`Settings defined locally and remotely: ${duplicates.join(', ')}`);
    }
  }

  has(name: string): boolean {
    return this.local.has(name) || this.remote.has(name);
  }

  /**
   * Whether `name` belongs to the daemon
   */
  isRemote(name: string): boolean {
    return !this.local.has(name) && this.remote.has(name);
  }

  private registry(name: string): LocalSettings | RemoteSettings {
    if (this.local.has(name)) return this.local;
    if (this.remote.has(name)) return this.remote;
    throw new SettingNotFoundError(name);
  }

  get(name: string): Stringable {
    return this.registry(name).get(name);
  }

  /**
   * Write through to the owning registry. ValidationError and
   * ConnectivityError propagate unchanged.
   */
  async set(name: string, raw: RawValue): Promise<Stringable> {
    if (this.local.has(name)) {
      return this.local.set(name, raw);
    }
    if (this.remote.has(name)) {
      return this.remote.set(name, raw);
    }
    throw new SettingNotFoundError(name);
  }

  /**
   * Restore a local setting's default
   * @throws RemoteResetError for remote settings, which have no default
   * @throws SettingNotFoundError for unknown names
   */
  reset(name: string): Stringable {
    if (this.local.has(name)) {
      return this.local.reset(name);
    }
    if (this.remote.has(name)) {
      throw new RemoteResetError(name);
    }
    throw new SettingNotFoundError(name);
  }

  /**
   * Default value, or null for remote settings
   */
  default(name: string): Stringable | null {
    if (this.isRemote(name)) return null;
    return this.local.default(name);
  }

  description(name: string): string {
    return this.registry(name).description(name);
  }

  syntax(name: string): string {
    return this.registry(name).syntax(name);
  }

  async update(): Promise<void> {
    await this.remote.update();
  }

  names(): string[] {
    return [...this.local.names(), ...this.remote.names()].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.names()[Symbol.iterator]();
  }
}
