/**
 * @fileoverview Lists of items
 *
 * TupleValue splits text on a separator, resolves aliases and optionally
 * restricts and deduplicates its items.
 */

import { ValidationError } from '../errors/index.js';
import { Stringable, resolveAlias, type RawValue, type ValueType } from './stringable.js';

export interface TupleOptions {
  /** Separator between items when parsing and printing */
  sep?: string;
  /** Valid items; anything else is rejected */
  options?: readonly string[];
  /** <alias> -> <item> replacements */
  aliases?: Readonly<Record<string, string>>;
  /** Drop repeated items, keeping the first occurrence */
  dedup?: boolean;
}

function* flatten(raw: RawValue, sep: string | RegExp): Generator<string> {
  if (typeof raw === 'string') {
    for (const item of raw.split(sep)) {
      const trimmed = item.trim();
      if (trimmed) yield trimmed;
    }
  } else if (raw instanceof TupleValue) {
    yield* raw.items;
  } else if (raw instanceof Stringable || typeof raw === 'number' || typeof raw === 'boolean') {
    yield raw.toString();
  } else {
    for (const item of raw) {
      yield* flatten(item, sep);
    }
  }
}

/**
 * Immutable list of strings
 */
export class TupleValue extends Stringable {
  readonly kind = 'tuple' as const;
  readonly items: readonly string[];
  readonly sep: string;
  readonly options: readonly string[] | null;
  readonly aliases: Readonly<Record<string, string>>;
  readonly dedup: boolean;

  constructor(raw: RawValue, options: TupleOptions = {}) {
    super();
    const sep = options.sep ?? ', ';
    const aliases = options.aliases ?? {};
    const dedup = options.dedup ?? false;

    let items = [...flatten(raw, sep.trim() || /\s+/)].map(item => resolveAlias(item, aliases));
    if (dedup) {
      items = [...new Set(items)];
    }

    if (options.options) {
      const valid = options.options;
      const invalid = items.filter(item => !valid.includes(item));
      if (invalid.length > 0) {
        const plural = invalid.length === 1 ? '' : 's';
        throw new ValidationError(`Invalid option${plural}: ${invalid.join(sep)}`, raw);
      }
    }

    this.items = items;
    this.sep = sep;
    this.options = options.options ?? null;
    this.aliases = aliases;
    this.dedup = dedup;
  }

  static type(options: TupleOptions = {}): ValueType<TupleValue> {
    return { typename: 'list', create: (raw) => new TupleValue(raw, options) };
  }

  get syntax(): string {
    const sep = this.sep.trim();
    return `<OPTION>${sep}<OPTION>${sep}...`;
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.items[Symbol.iterator]();
  }

  toString(): string {
    return this.items.join(this.sep);
  }

  equals(other: unknown): boolean {
    const items = other instanceof TupleValue
      ? other.items
      : Array.isArray(other) ? other : null;
    if (!items || items.length !== this.items.length) return false;
    return this.items.every((item, i) => item === items[i]);
  }
}
