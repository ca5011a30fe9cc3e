/**
 * @fileoverview Values restricted to a fixed set of options
 */

import { ValidationError } from '../errors/index.js';
import { Stringable, rawToString, resolveAlias, type RawValue, type ValueType } from './stringable.js';

export interface OptionOptions {
  options: readonly string[];
  aliases?: Readonly<Record<string, string>>;
}

/**
 * Single string restricted to a fixed set
 */
export class OptionValue extends Stringable {
  readonly kind = 'option' as const;
  readonly value: string;
  readonly options: readonly string[];
  readonly aliases: Readonly<Record<string, string>>;

  constructor(raw: RawValue, { options, aliases = {} }: OptionOptions) {
    super();
    const value = resolveAlias(rawToString(raw), aliases);
    if (!options.includes(value)) {
      throw new ValidationError(`Not one of: ${options.join(', ')}`, raw);
    }
    this.value = value;
    this.options = options;
    this.aliases = aliases;
  }

  static type(options: OptionOptions): ValueType<OptionValue> {
    return { typename: 'option', create: (raw) => new OptionValue(raw, options) };
  }

  get syntax(): string {
    return this.options.join('|');
  }

  toString(): string {
    return this.value;
  }

  equals(other: unknown): boolean {
    if (typeof other === 'string') return other === this.value;
    return other instanceof Stringable && other.toString() === this.value;
  }
}
