/**
 * @fileoverview Setting Types
 */

import type { DaemonSettings } from '../api/index.js';
import type { RawValue, Stringable, ValueType } from '../values/index.js';

/**
 * A setting stored in process
 */
export interface LocalSettingDefinition<V extends Stringable = Stringable> {
  /** Dotted name, e.g. "connect.host" */
  name: string;
  type: ValueType<V>;
  default: RawValue;
  description: string;
}

/**
 * How a remote setting is read from a settings snapshot and written back
 */
export interface RemoteAccessor<V extends Stringable = Stringable> {
  read(snapshot: DaemonSettings): RawValue;
  push(value: V): Promise<void>;
}

/**
 * A setting that lives on the daemon
 */
export interface RemoteSettingDefinition<V extends Stringable = Stringable> {
  name: string;
  type: ValueType<V>;
  description: string;
  accessor: RemoteAccessor<V>;
}

/**
 * Read-only view of a registry, shared by local, remote and combined settings
 */
export interface SettingsView {
  has(name: string): boolean;
  get(name: string): Stringable;
  names(): string[];
  description(name: string): string;
  syntax(name: string): string;
}

export type ChangeListener = (name: string, value: Stringable) => void;
