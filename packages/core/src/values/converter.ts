/**
 * @fileoverview Bandwidth and data size converter
 */

import { ValidationError } from '../errors/index.js';
import { FloatValue, NumberValue, normalizeUnit, type UnitPrefix } from './number.js';
import { repr, type RawValue } from './stringable.js';

const SHORT_UNITS: Readonly<Record<string, string>> = { bit: 'b', byte: 'B' };
const KNOWN_UNITS = ['bit', 'byte', 'b', 'B'];

function isUnitPrefix(prefix: string): prefix is UnitPrefix {
  return prefix === 'metric' || prefix === 'binary';
}

/**
 * Turns data counts into FloatValues in one configured unit (bits or
 * bytes) and prefix table, e.g. to show every bandwidth rate the same way.
 */
export class DataCountConverter {
  private _unit = 'B';
  private _prefix: UnitPrefix = 'metric';

  constructor(unit: string = 'byte', prefix: string = 'metric') {
    this.unit = unit;
    this.prefix = prefix;
  }

  /** 'b' (bits) or 'B' (bytes) */
  get unit(): string {
    return this._unit;
  }

  set unit(unit: string) {
    if (!KNOWN_UNITS.includes(unit)) {
      throw new ValidationError("Unit must be 'bit' or 'byte'", unit);
    }
    this._unit = SHORT_UNITS[unit] ?? unit;
  }

  get prefix(): UnitPrefix {
    return this._prefix;
  }

  set prefix(prefix: string) {
    if (!isUnitPrefix(prefix)) {
      throw new ValidationError("Prefix must be 'binary' or 'metric'", prefix);
    }
    this._prefix = prefix;
  }

  /**
   * Make a FloatValue from `num` in this converter's unit and prefix.
   *
   * The source unit is taken from `num` if it is a NumberValue with a unit,
   * then from `unit`, then assumed to be the converter's own unit.
   */
  convert(num: RawValue, unit?: string): FloatValue {
    const sourceUnit = normalizeUnit(unit);
    const value = num instanceof NumberValue
      ? num
      : new FloatValue(num, { prefix: this._prefix, unit: sourceUnit ?? this._unit });

    const given = value.unit ?? this._unit;
    if (!KNOWN_UNITS.includes(given)) {
      throw new ValidationError(`Unit must be 'b' (bit) or 'B' (byte), not ${repr(given)}`, num);
    }
    return new FloatValue(value, { convertTo: this._unit, prefix: this._prefix });
  }
}
