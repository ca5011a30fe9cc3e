/**
 * @fileoverview Remote Settings
 *
 * Settings that live on the daemon. Values are fetched in bulk by update()
 * and served from that snapshot until the next update; writes go through
 * each setting's accessor and replace the cached value on success.
 */

import { daemonSettingsSchema, formatSchemaIssues, type SettingsApi } from '../api/index.js';
import {
  ConnectivityError,
  SettingNotFoundError,
  errorMessage,
  isRudderError,
} from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { RawValue, Stringable } from '../values/index.js';
import type { RemoteSettingDefinition, SettingsView } from './types.js';

const log = createLogger('settings:remote');

export class RemoteSettings implements SettingsView {
  private definitions: Map<string, RemoteSettingDefinition> = new Map();
  private values: Map<string, Stringable> = new Map();
  private updatedAt: Date | null = null;

  constructor(private readonly api: SettingsApi) {}

  load(...definitions: RemoteSettingDefinition[]): void {
    for (const definition of definitions) {
      if (this.definitions.has(definition.name)) {
        throw new Error(`Setting already exists: ${definition.name}`);
      }
      this.definitions.set(definition.name, definition);
    }
    log.debug('Remote settings loaded', { count: definitions.length });
  }

  private definition(name: string): RemoteSettingDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new SettingNotFoundError(name);
    }
    return definition;
  }

  /** Time of the last successful update, null before the first one */
  get lastUpdate(): Date | null {
    return this.updatedAt;
  }

  /**
   * Refresh every remote value with a single request
   */
  async update(): Promise<void> {
    let payload: unknown;
    try {
      payload = await log.timed('Fetching remote settings', () => this.api.fetch());
    } catch (error) {
      throw isRudderError(error) ? error : new ConnectivityError(errorMessage(error));
    }

    const parsed = daemonSettingsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ConnectivityError(`Unexpected settings from daemon: ${formatSchemaIssues(parsed.error)}`);
    }

    const values = new Map<string, Stringable>();
    for (const [name, definition] of this.definitions) {
      try {
        values.set(name, definition.type.create(definition.accessor.read(parsed.data)));
      } catch (error) {
        throw new ConnectivityError(`Unexpected value for ${name} from daemon: ${errorMessage(error)}`);
      }
    }

    this.values = values;
    this.updatedAt = new Date();
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /**
   * Value from the last update
   * @throws ConnectivityError if no update has succeeded yet
   */
  get(name: string): Stringable {
    this.definition(name);
    const value = this.values.get(name);
    if (!value) {
      throw new ConnectivityError(`Remote setting has not been fetched: ${name}`);
    }
    return value;
  }

  /**
   * Update, then return the fresh value
   */
  async fetch(name: string): Promise<Stringable> {
    this.definition(name);
    await this.update();
    return this.get(name);
  }

  /**
   * Validate `raw`, push it to the daemon and cache it
   * @throws ValidationError for values the type or the daemon rejects
   * @throws ConnectivityError when the daemon can't be reached
   */
  async set(name: string, raw: RawValue): Promise<Stringable> {
    const definition = this.definition(name);
    const value = definition.type.create(raw);
    try {
      await definition.accessor.push(value);
    } catch (error) {
      throw isRudderError(error) ? error : new ConnectivityError(errorMessage(error));
    }
    this.values.set(name, value);
    log.debug('Remote setting changed', { setting: name, value: value.toString() });
    return value;
  }

  description(name: string): string {
    return this.definition(name).description;
  }

  syntax(name: string): string {
    const value = this.values.get(name);
    return value ? value.syntax : this.definition(name).type.typename;
  }

  typename(name: string): string {
    return this.definition(name).type.typename;
  }

  names(): string[] {
    return [...this.definitions.keys()].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.names()[Symbol.iterator]();
  }
}
