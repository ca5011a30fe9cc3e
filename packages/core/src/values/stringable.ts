/**
 * @fileoverview Stringable value base
 *
 * A stringable is an immutable, validated value with a canonical string
 * form that its own type re-parses to an equal value. Construction either
 * succeeds completely or throws a ValidationError.
 */

export type ValueKind = 'string' | 'bool' | 'path' | 'tuple' | 'option' | 'float' | 'integer';

/**
 * Anything a value constructor accepts
 */
export type RawValue = string | number | boolean | Stringable | readonly RawValue[];

export abstract class Stringable {
  abstract readonly kind: ValueKind;

  /** Human-readable grammar of accepted input, for help text */
  abstract get syntax(): string;

  abstract toString(): string;

  abstract equals(other: unknown): boolean;

  toJSON(): string {
    return this.toString();
  }
}

/**
 * Factory that builds values of one configured type from raw input
 */
export interface ValueType<V extends Stringable = Stringable> {
  /** Type name for help output, e.g. "integer" */
  readonly typename: string;
  create(raw: RawValue): V;
}

/**
 * Quote strings the way error messages show user input
 */
export function repr(value: unknown): string {
  if (typeof value !== 'string') {
    return value instanceof Stringable ? repr(value.toString()) : String(value);
  }
  if (value.includes("'") && !value.includes('"')) {
    return `"${value}"`;
  }
  return `'${value.replace(/'/g, "\\'")}'`;
}

/**
 * Flatten raw input to text: values print canonically, lists join with spaces
 */
export function rawToString(raw: RawValue): string {
  if (typeof raw === 'string') return raw;
  if (raw instanceof Stringable) return raw.toString();
  if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
  return raw.map(item => rawToString(item)).join(' ');
}

/**
 * Format a numeric bound for messages
 */
export function formatBound(bound: number): string {
  if (Number.isFinite(bound)) return String(bound);
  return bound < 0 ? '-∞' : '∞';
}

/**
 * Resolve a value through an alias map, keeping it when it has no alias
 */
export function resolveAlias(value: string, aliases: Readonly<Record<string, string>>): string {
  return Object.prototype.hasOwnProperty.call(aliases, value) ? aliases[value] ?? value : value;
}
