/**
 * @fileoverview Local Settings
 *
 * In-process registry of typed settings with defaults. Every write builds a
 * new value through the setting's type; values are never mutated.
 */

import { EventEmitter } from 'events';
import { SettingNotFoundError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { RawValue, Stringable } from '../values/index.js';
import type { ChangeListener, LocalSettingDefinition, SettingsView } from './types.js';

const log = createLogger('settings:local');

interface LocalEntry {
  definition: LocalSettingDefinition;
  defaultValue: Stringable;
  value: Stringable;
}

export class LocalSettings extends EventEmitter implements SettingsView {
  private entries: Map<string, LocalEntry> = new Map();

  /**
   * Register settings; their defaults must be valid for their type
   */
  load(...definitions: LocalSettingDefinition[]): void {
    for (const definition of definitions) {
      if (this.entries.has(definition.name)) {
        throw new Error(`Setting already exists: ${definition.name}`);
      }
      const defaultValue = definition.type.create(definition.default);
      this.entries.set(definition.name, { definition, defaultValue, value: defaultValue });
    }
    log.debug('Local settings loaded', { count: definitions.length });
  }

  private entry(name: string): LocalEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new SettingNotFoundError(name);
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): Stringable {
    return this.entry(name).value;
  }

  /**
   * Replace a setting's value
   * @throws ValidationError if `raw` is not valid for the setting's type
   */
  set(name: string, raw: RawValue): Stringable {
    const entry = this.entry(name);
    const value = entry.definition.type.create(raw);
    this.entries.set(name, { ...entry, value });
    log.debug('Setting changed', { setting: name, value: value.toString() });
    this.emit('change', name, value);
    return value;
  }

  reset(name: string): Stringable {
    return this.set(name, this.entry(name).defaultValue);
  }

  default(name: string): Stringable {
    return this.entry(name).defaultValue;
  }

  description(name: string): string {
    return this.entry(name).definition.description;
  }

  syntax(name: string): string {
    return this.entry(name).value.syntax;
  }

  typename(name: string): string {
    return this.entry(name).definition.type.typename;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Subscribe to value changes; returns an unsubscribe function
   */
  onChange(listener: ChangeListener): () => void {
    this.on('change', listener);
    return () => {
      this.off('change', listener);
    };
  }

  [Symbol.iterator](): Iterator<string> {
    return this.names()[Symbol.iterator]();
  }
}
