/**
 * @fileoverview Boolean setting values
 *
 * Accepts a configurable set of true/false literals and prints the first
 * literal of the matching set.
 */

import { ValidationError } from '../errors/index.js';
import { Stringable, repr, rawToString, type RawValue, type ValueType } from './stringable.js';

export const DEFAULT_TRUE_LITERALS = ['enabled', 'yes', 'on', 'true', '1'] as const;
export const DEFAULT_FALSE_LITERALS = ['disabled', 'no', 'off', 'false', '0'] as const;

export interface BoolOptions {
  /** Literals that mean true; the first one is the canonical form */
  truthy?: readonly string[];
  /** Literals that mean false; the first one is the canonical form */
  falsy?: readonly string[];
}

/**
 * Boolean that remembers how to spell itself
 */
export class BoolValue extends Stringable {
  readonly kind = 'bool' as const;
  readonly isTrue: boolean;
  readonly truthy: readonly string[];
  readonly falsy: readonly string[];

  constructor(raw: RawValue, options: BoolOptions = {}) {
    super();
    this.truthy = options.truthy ?? DEFAULT_TRUE_LITERALS;
    this.falsy = options.falsy ?? DEFAULT_FALSE_LITERALS;

    if (typeof raw === 'boolean') {
      this.isTrue = raw;
    } else if (raw instanceof BoolValue) {
      this.isTrue = raw.isTrue;
    } else {
      const literal = rawToString(raw);
      if (this.truthy.includes(literal)) {
        this.isTrue = true;
      } else if (this.falsy.includes(literal)) {
        this.isTrue = false;
      } else {
        throw new ValidationError(`Not a boolean value: ${repr(literal)}`, raw);
      }
    }
  }

  static type(options: BoolOptions = {}): ValueType<BoolValue> {
    return { typename: 'boolean', create: (raw) => new BoolValue(raw, options) };
  }

  get syntax(): string {
    const pairs: string[] = [];
    const count = Math.min(this.truthy.length, this.falsy.length);
    for (let i = 0; i < count; i++) {
      const pair = `${this.truthy[i]}/${this.falsy[i]}`;
      if (!pairs.includes(pair)) pairs.push(pair);
    }
    return pairs.join('|');
  }

  valueOf(): boolean {
    return this.isTrue;
  }

  toString(): string {
    return (this.isTrue ? this.truthy[0] : this.falsy[0]) ?? String(this.isTrue);
  }

  equals(other: unknown): boolean {
    if (typeof other === 'boolean') return other === this.isTrue;
    return other instanceof BoolValue && other.isTrue === this.isTrue;
  }
}
