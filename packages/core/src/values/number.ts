/**
 * @fileoverview Numbers with units and magnitude prefixes
 *
 * FloatValue and IntegerValue parse input like "1.5Mi", "100kB" or "inf",
 * optionally convert between bits and bytes, enforce bounds, and print
 * themselves with the largest fitting prefix ("1.5Ki", "20M").
 *
 * Arithmetic goes through explicit methods. Every result carries the
 * receiver's configuration and is an IntegerValue whenever it is a finite
 * whole number, a FloatValue otherwise.
 */

import { ValidationError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { Stringable, repr, formatBound, type RawValue, type ValueType } from './stringable.js';

const log = createLogger('values:number');

// =============================================================================
// Prefixes and units
// =============================================================================

export type UnitPrefix = 'metric' | 'binary';

type PrefixTable = ReadonlyArray<readonly [prefix: string, size: number]>;

export const BINARY_PREFIXES: PrefixTable = [
  ['Ti', 1024 ** 4],
  ['Gi', 1024 ** 3],
  ['Mi', 1024 ** 2],
  ['Ki', 1024],
];

export const METRIC_PREFIXES: PrefixTable = [
  ['T', 1000 ** 4],
  ['G', 1000 ** 3],
  ['M', 1000 ** 2],
  ['k', 1000],
];

const PREFIX_SIZES: ReadonlyMap<string, number> = new Map(
  [...BINARY_PREFIXES, ...METRIC_PREFIXES].map(([prefix, size]) => [prefix.toLowerCase(), size])
);

// Binary prefixes come before their metric counterpart so "Mi" is not read as "M" + unit "i"
const PREFIX_ALTERNATION = BINARY_PREFIXES
  .flatMap(([binary], i) => [binary, METRIC_PREFIXES[i]?.[0] ?? ''])
  .join('|');

const NUMBER_REGEX = new RegExp(
  `^([-+]?(?:\\d+\\.\\d+|\\d+|\\.\\d+|inf)) ?(${PREFIX_ALTERNATION}|)([^\\s0-9]*?)$`,
  'i'
);

const UNIT_ALIASES: Readonly<Record<string, string>> = {
  bit: 'b',
  bits: 'b',
  byte: 'B',
  bytes: 'B',
};

const UNIT_CONVERTERS: Readonly<Record<string, Readonly<Record<string, (n: number) => number>>>> = {
  B: { b: (n) => n * 8 },
  b: { B: (n) => n / 8 },
};

/**
 * Map long unit names to their short form; unknown units pass through
 */
export function normalizeUnit(unit: string | null | undefined): string | null {
  if (unit === null || unit === undefined || unit === '') return null;
  return UNIT_ALIASES[unit] ?? unit;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * `toFixed` that rounds exact ties to the even neighbour ("0.125" -> "0.12")
 */
export function toFixedEven(n: number, digits: number): string {
  const fixed = n.toFixed(digits);
  const abs = Math.abs(n);
  if (!Number.isFinite(n) || abs >= 1e21) return fixed;

  // Exact decimal expansion; a tie ends in a single 5 after the kept digits
  const exact = abs.toFixed(100);
  const point = exact.indexOf('.');
  if (!/^50*$/.test(exact.slice(point + 1 + digits))) return fixed;

  const truncated = exact.slice(0, digits > 0 ? point + 1 + digits : point);
  if (Number(truncated.charAt(truncated.length - 1)) % 2 !== 0) return fixed;
  return n < 0 && Number(truncated) !== 0 ? `-${truncated}` : truncated;
}

/**
 * Round to whole number or to `digits` decimals, ties to even
 */
export function roundEven(n: number, digits = 0): number {
  if (digits < 0) {
    const factor = 10 ** -digits;
    return roundEven(n / factor) * factor;
  }
  return Number(toFixedEven(n, digits));
}

function roundTo(n: number, digits: number): number {
  return roundEven(n, digits);
}

function stripZeros(text: string): string {
  if (!text.includes('.') || /e/i.test(text)) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Print a number with precision that shrinks as it grows
 */
export function prettyFloat(n: number): string {
  const abs = Math.abs(n);
  if (abs === Infinity) return `${n < 0 ? '-' : ''}∞`;
  if (abs === 0) return '0';

  const rounded2 = roundTo(abs, 2);
  if (rounded2 === Math.trunc(abs)) return toFixedEven(n, 0);
  if (rounded2 < 10) return stripZeros(toFixedEven(n, 2));
  if (roundTo(abs, 1) < 100) return stripZeros(toFixedEven(n, 1));
  return toFixedEven(n, 0);
}

// =============================================================================
// NumberValue
// =============================================================================

export interface NumberOptions {
  /** Unit of the value; a unit in string input takes precedence */
  unit?: string | null;
  /** Convert the parsed value to this unit */
  convertTo?: string | null;
  /** Prefix table for printing; string input with a prefix overrides it */
  prefix?: UnitPrefix;
  /** Leave the unit out of the string form */
  hideUnit?: boolean;
  min?: number | null;
  max?: number | null;
  /** Print all digits instead of a prefixed, rounded form */
  precise?: boolean;
}

/**
 * Configuration every NumberValue carries and passes on to arithmetic results
 */
export interface NumberConfig {
  unit: string | null;
  prefix: UnitPrefix;
  hideUnit: boolean;
  min: number | null;
  max: number | null;
  precise: boolean;
}

export interface NumberStringOptions {
  unit?: boolean;
  precise?: boolean;
}

type Operand = NumberValue | number;

function parseNumeric(text: string): number {
  const unsigned = text.replace(/^[-+]/, '');
  if (unsigned.toLowerCase() === 'inf') {
    return text.startsWith('-') ? -Infinity : Infinity;
  }
  return Number(text);
}

function operandValue(operand: Operand): number {
  return typeof operand === 'number' ? operand : operand.value;
}

function nonZero(operand: Operand): number {
  const value = operandValue(operand);
  if (value === 0) {
    throw new ValidationError('Division by zero', value);
  }
  return value;
}

export abstract class NumberValue extends Stringable {
  abstract readonly kind: 'float' | 'integer';
  readonly value: number;
  readonly unit: string | null;
  readonly prefix: UnitPrefix;
  readonly hideUnit: boolean;
  readonly min: number | null;
  readonly max: number | null;
  readonly precise: boolean;

  protected constructor(raw: RawValue, options: NumberOptions, integer: boolean) {
    super();
    let unit = normalizeUnit(options.unit);
    let prefix = options.prefix;
    let hideUnit = options.hideUnit;
    let value: number;

    if (raw instanceof NumberValue) {
      // The other number's configuration fills in what wasn't given
      unit = unit ?? raw.unit;
      prefix = prefix ?? raw.prefix;
      hideUnit = hideUnit ?? raw.hideUnit;
      value = raw.value;
    } else if (typeof raw === 'number') {
      value = raw;
    } else if (typeof raw === 'string') {
      const match = NUMBER_REGEX.exec(raw);
      if (!match) {
        throw new ValidationError(`Not a number: ${repr(raw)}`, raw);
      }
      const [, digits = '', prefixText = '', unitText = ''] = match;
      value = parseNumeric(digits);
      unit = normalizeUnit(unitText) ?? unit;
      if (prefixText) {
        value *= PREFIX_SIZES.get(prefixText.toLowerCase()) ?? 1;
        prefix = prefixText.length === 2 ? 'binary' : 'metric';
      }
    } else {
      throw new ValidationError(`Not a number: ${repr(raw)}`, raw);
    }

    if (Number.isNaN(value)) {
      throw new ValidationError(`Not a number: ${repr(raw)}`, raw);
    }

    const convertTo = normalizeUnit(options.convertTo);
    if (convertTo !== null && unit !== convertTo) {
      if (unit === null) {
        // No unit given: assume the value already is in the target unit
        unit = convertTo;
      } else {
        const converter = UNIT_CONVERTERS[unit]?.[convertTo];
        if (!converter) {
          throw new ValidationError(`Cannot convert ${unit} to ${convertTo}`, raw);
        }
        log.trace('Converting number', { value, from: unit, to: convertTo });
        value = converter(value);
        unit = convertTo;
      }
    }

    if (integer) {
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Not an integer: ${repr(raw)}`, raw);
      }
      value = roundEven(value);
    }

    const min = options.min ?? null;
    const max = options.max ?? null;
    if (min !== null && value < min) {
      throw new ValidationError(`Too small (minimum is ${formatBound(min)})`, raw);
    }
    if (max !== null && value > max) {
      throw new ValidationError(`Too big (maximum is ${formatBound(max)})`, raw);
    }

    prefix = prefix ?? 'metric';
    if (prefix !== 'metric' && prefix !== 'binary') {
      throw new ValidationError(`prefix must be 'binary' or 'metric', not ${repr(prefix)}`, raw);
    }

    this.value = value;
    this.unit = unit;
    this.prefix = prefix;
    this.hideUnit = hideUnit ?? false;
    this.min = min;
    this.max = max;
    this.precise = options.precise ?? false;
  }

  /**
   * Wrap an arithmetic result, narrowing whole finite numbers to IntegerValue
   */
  static from(value: number, options: NumberOptions = {}): NumberValue {
    if (Number.isFinite(value) && Number.isInteger(value)) {
      return new IntegerValue(value, options);
    }
    return new FloatValue(value, options);
  }

  get config(): NumberConfig {
    return {
      unit: this.unit,
      prefix: this.prefix,
      hideUnit: this.hideUnit,
      min: this.min,
      max: this.max,
      precise: this.precise,
    };
  }

  get isInfinite(): boolean {
    return Math.abs(this.value) === Infinity;
  }

  get syntax(): string {
    const prefixes = [...BINARY_PREFIXES, ...METRIC_PREFIXES].map(([prefix]) => prefix);
    return `[+|-]<NUMBER>[${prefixes.join('|')}]`;
  }

  /**
   * Copy of this number with some options replaced
   */
  abstract withOptions(overrides: NumberOptions): NumberValue;

  valueOf(): number {
    return this.value;
  }

  toNumber(): number {
    return this.value;
  }

  toString(): string {
    return this.string();
  }

  string(options: NumberStringOptions = {}): string {
    const withUnit = options.unit ?? !this.hideUnit;
    const precise = options.precise ?? this.precise;
    const unit = withUnit && this.unit !== null ? this.unit : '';
    const abs = Math.abs(this.value);

    if (this.value === 0) return '0';
    if (abs === Infinity) return prettyFloat(this.value);
    if (precise) return stripZeros(String(this.value)) + unit;

    const table = this.prefix === 'binary' ? BINARY_PREFIXES : METRIC_PREFIXES;
    for (const [prefix, size] of table) {
      if (abs >= size) {
        return prettyFloat(this.value / size) + prefix + unit;
      }
    }
    return prettyFloat(this.value) + unit;
  }

  equals(other: unknown): boolean {
    if (typeof other === 'number') return other === this.value;
    return other instanceof NumberValue && other.value === this.value;
  }

  compare(other: Operand): number {
    const value = operandValue(other);
    if (this.value === value) return 0;
    return this.value < value ? -1 : 1;
  }

  // ===========================================================================
  // Arithmetic
  // ===========================================================================

  private compute(fn: (value: number) => number): NumberValue {
    // Native infinity doesn't survive the integer variant, so +∞ stays +∞
    const result = this.value >= Infinity ? Infinity : fn(this.value);
    return NumberValue.from(result, this.config);
  }

  add(other: Operand): NumberValue {
    return this.compute(a => a + operandValue(other));
  }

  subtract(other: Operand): NumberValue {
    return this.compute(a => a - operandValue(other));
  }

  multiply(other: Operand): NumberValue {
    return this.compute(a => a * operandValue(other));
  }

  divide(other: Operand): NumberValue {
    const divisor = nonZero(other);
    return this.compute(a => a / divisor);
  }

  floorDivide(other: Operand): NumberValue {
    const divisor = nonZero(other);
    return this.compute(a => Math.floor(a / divisor));
  }

  /** Modulo with the sign of the divisor */
  modulo(other: Operand): NumberValue {
    const b = nonZero(other);
    return this.compute(a => ((a % b) + b) % b);
  }

  power(other: Operand): NumberValue {
    return this.compute(a => a ** operandValue(other));
  }

  floor(): NumberValue {
    return this.compute(Math.floor);
  }

  ceil(): NumberValue {
    return this.compute(Math.ceil);
  }

  round(digits = 0): NumberValue {
    return this.compute(a => roundEven(a, digits));
  }
}

/**
 * Floating point number
 */
export class FloatValue extends NumberValue {
  readonly kind = 'float' as const;

  constructor(raw: RawValue, options: NumberOptions = {}) {
    super(raw, options, false);
  }

  static type(options: NumberOptions = {}): ValueType<FloatValue> {
    return { typename: 'number', create: (raw) => new FloatValue(raw, options) };
  }

  withOptions(overrides: NumberOptions): FloatValue {
    return new FloatValue(this.value, { ...this.config, ...overrides });
  }
}

/**
 * Integer number; input is rounded to the nearest whole number
 */
export class IntegerValue extends NumberValue {
  readonly kind = 'integer' as const;

  constructor(raw: RawValue, options: NumberOptions = {}) {
    super(raw, options, true);
  }

  static type(options: NumberOptions = {}): ValueType<IntegerValue> {
    return { typename: 'integer', create: (raw) => new IntegerValue(raw, options) };
  }

  withOptions(overrides: NumberOptions): IntegerValue {
    return new IntegerValue(this.value, { ...this.config, ...overrides });
  }
}
