/**
 * @fileoverview String setting values
 */

import { ValidationError } from '../errors/index.js';
import { Stringable, rawToString, type RawValue, type ValueType } from './stringable.js';

export interface StringOptions {
  /** Minimum length in characters */
  minlen?: number;
  /** Maximum length in characters */
  maxlen?: number;
}

/**
 * Length-bounded text
 */
export class StringValue extends Stringable {
  readonly kind = 'string' as const;
  readonly value: string;
  readonly minlen: number;
  readonly maxlen: number;

  constructor(raw: RawValue, options: StringOptions = {}) {
    super();
    const value = rawToString(raw);
    const minlen = options.minlen ?? 0;
    const maxlen = options.maxlen ?? Infinity;

    // Count code points, not UTF-16 units
    const length = [...value].length;
    if (length > maxlen) {
      throw new ValidationError(`Too long (maximum length is ${maxlen})`, raw);
    }
    if (length < minlen) {
      throw new ValidationError(`Too short (minimum length is ${minlen})`, raw);
    }

    this.value = value;
    this.minlen = minlen;
    this.maxlen = maxlen;
  }

  static type(options: StringOptions = {}): ValueType<StringValue> {
    return { typename: 'string', create: (raw) => new StringValue(raw, options) };
  }

  get syntax(): string {
    const { minlen, maxlen } = this;
    const singular = (minlen === 1 || minlen <= 0) && (maxlen === 1 || maxlen >= Infinity);
    const chars = singular ? 'character' : 'characters';

    if (minlen > 0 && maxlen < Infinity) {
      return minlen === maxlen
        ? `string (${minlen} ${chars})`
        : `string (${minlen}-${maxlen} ${chars})`;
    }
    if (minlen > 0) return `string (at least ${minlen} ${chars})`;
    if (maxlen < Infinity) return `string (at most ${maxlen} ${chars})`;
    return 'string';
  }

  toString(): string {
    return this.value;
  }

  equals(other: unknown): boolean {
    if (typeof other === 'string') return other === this.value;
    return other instanceof Stringable && other.toString() === this.value;
  }
}
