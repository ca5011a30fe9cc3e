/**
 * @fileoverview Tests for FloatValue and IntegerValue
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors/index.js';
import { FloatValue, IntegerValue, NumberValue, normalizeUnit, prettyFloat } from '../number.js';

describe('prettyFloat', () => {
  it('should print whole numbers without decimals', () => {
    expect(prettyFloat(5)).toBe('5');
    expect(prettyFloat(-120)).toBe('-120');
  });

  it('should use two decimals below 10 and strip zeros', () => {
    expect(prettyFloat(1.5)).toBe('1.5');
    expect(prettyFloat(2.3456)).toBe('2.35');
  });

  it('should use one decimal below 100', () => {
    expect(prettyFloat(12.34)).toBe('12.3');
  });

  it('should not leave a dangling point', () => {
    expect(prettyFloat(1.999)).toBe('2');
  });

  it('should round exact ties to even', () => {
    expect(prettyFloat(0.125)).toBe('0.12');
    expect(prettyFloat(0.375)).toBe('0.38');
    expect(prettyFloat(100.5)).toBe('100');
    expect(prettyFloat(101.5)).toBe('102');
    expect(prettyFloat(-100.5)).toBe('-100');
  });

  it('should print infinity as a symbol', () => {
    expect(prettyFloat(Infinity)).toBe('∞');
    expect(prettyFloat(-Infinity)).toBe('-∞');
  });
});

describe('normalizeUnit', () => {
  it('should shorten long unit names', () => {
    expect(normalizeUnit('bytes')).toBe('B');
    expect(normalizeUnit('bit')).toBe('b');
  });

  it('should pass unknown units through', () => {
    expect(normalizeUnit('s')).toBe('s');
  });

  it('should map empty units to null', () => {
    expect(normalizeUnit('')).toBeNull();
    expect(normalizeUnit(undefined)).toBeNull();
  });
});

describe('FloatValue', () => {
  describe('parsing', () => {
    it('should scale metric prefixes by 1000', () => {
      const value = new FloatValue('1k');
      expect(value.value).toBe(1000);
      expect(value.prefix).toBe('metric');
    });

    it('should scale binary prefixes by 1024', () => {
      const value = new FloatValue('1Ki');
      expect(value.value).toBe(1024);
      expect(value.prefix).toBe('binary');
    });

    it('should accept prefixes case-insensitively', () => {
      expect(new FloatValue('2mi').value).toBe(2 * 1024 ** 2);
      expect(new FloatValue('3K').value).toBe(3000);
    });

    it('should parse a unit after the prefix', () => {
      const value = new FloatValue('100kB');
      expect(value.value).toBe(100000);
      expect(value.unit).toBe('B');
    });

    it('should allow a space between number and prefix', () => {
      expect(new FloatValue('5 M').value).toBe(5000000);
    });

    it('should parse signs, leading dots and infinity', () => {
      expect(new FloatValue('-2.5').value).toBe(-2.5);
      expect(new FloatValue('.5').value).toBe(0.5);
      expect(new FloatValue('inf').value).toBe(Infinity);
      expect(new FloatValue('-inf').value).toBe(-Infinity);
    });

    it('should reject garbage', () => {
      expect(() => new FloatValue('abc')).toThrow(ValidationError);
      expect(() => new FloatValue('abc')).toThrow("Not a number: 'abc'");
      expect(() => new FloatValue('1.2.3')).toThrow("Not a number: '1.2.3'");
    });

    it('should reject NaN', () => {
      expect(() => new FloatValue(NaN)).toThrow('Not a number: NaN');
    });

    it('should keep the raw input on validation errors', () => {
      try {
        new FloatValue('x1');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error instanceof ValidationError && error.input).toBe('x1');
      }
    });
  });

  describe('unit conversion', () => {
    it('should convert bytes to bits', () => {
      const value = new FloatValue('1k', { unit: 'byte', convertTo: 'bit' });
      expect(value.value).toBe(8000);
      expect(value.unit).toBe('b');
    });

    it('should convert bits to bytes', () => {
      expect(new FloatValue('80b', { convertTo: 'B' }).value).toBe(10);
    });

    it('should assume the target unit when no unit is given', () => {
      const value = new FloatValue('10', { convertTo: 'B' });
      expect(value.value).toBe(10);
      expect(value.unit).toBe('B');
    });

    it('should reject conversions between unrelated units', () => {
      expect(() => new FloatValue('10s', { convertTo: 'B' })).toThrow('Cannot convert s to B');
    });
  });

  describe('bounds', () => {
    it('should enforce the minimum', () => {
      expect(() => new FloatValue(-1, { min: 0 })).toThrow('Too small (minimum is 0)');
    });

    it('should enforce the maximum', () => {
      expect(() => new FloatValue(11, { max: 10 })).toThrow('Too big (maximum is 10)');
    });

    it('should check bounds after conversion', () => {
      expect(() => new FloatValue('2B', { convertTo: 'b', max: 10 })).toThrow('Too big (maximum is 10)');
    });
  });

  describe('inheritance', () => {
    it('should take unit, prefix and hideUnit from another number', () => {
      const source = new FloatValue('1Ki', { unit: 'B', hideUnit: true });
      const copy = new FloatValue(source);
      expect(copy.unit).toBe('B');
      expect(copy.prefix).toBe('binary');
      expect(copy.hideUnit).toBe(true);
    });

    it('should let explicit options win', () => {
      const copy = new FloatValue(new FloatValue('1Ki'), { prefix: 'metric' });
      expect(copy.prefix).toBe('metric');
    });
  });

  describe('string form', () => {
    it('should print zero plainly', () => {
      expect(new FloatValue(0, { unit: 'B' }).toString()).toBe('0');
    });

    it('should print infinity without a unit', () => {
      expect(new FloatValue(Infinity, { unit: 'B' }).toString()).toBe('∞');
    });

    it('should pick the largest fitting prefix', () => {
      expect(new FloatValue(1536, { prefix: 'binary' }).toString()).toBe('1.5Ki');
      expect(new FloatValue(2500000, { unit: 'B' }).toString()).toBe('2.5MB');
    });

    it('should not use a prefix below 1000', () => {
      expect(new FloatValue(999).toString()).toBe('999');
      expect(new FloatValue(999.999).toString()).toBe('1000');
    });

    it('should hide the unit when asked', () => {
      expect(new FloatValue('5kB', { hideUnit: true }).toString()).toBe('5k');
      expect(new FloatValue('5kB').string({ unit: false })).toBe('5k');
    });

    it('should print all digits in precise mode', () => {
      expect(new FloatValue(1536.25, { precise: true }).toString()).toBe('1536.25');
    });

    it('should parse its own string form back to the same value', () => {
      const original = new FloatValue('2Mi', { prefix: 'binary' });
      expect(original.toString()).toBe('2Mi');
      expect(new FloatValue(original.toString()).equals(original)).toBe(true);
    });
  });

  describe('arithmetic', () => {
    it('should narrow whole results to IntegerValue', () => {
      const sum = new FloatValue(2).add(new FloatValue(3));
      expect(sum).toBeInstanceOf(IntegerValue);
      expect(sum.toString()).toBe('5');
    });

    it('should keep fractional results as FloatValue', () => {
      const quotient = new FloatValue(1).divide(4);
      expect(quotient).toBeInstanceOf(FloatValue);
      expect(quotient.value).toBe(0.25);
    });

    it('should carry the receiver configuration', () => {
      const result = new FloatValue('1KiB').multiply(2);
      expect(result.unit).toBe('B');
      expect(result.prefix).toBe('binary');
      expect(result.toString()).toBe('2KiB');
    });

    it('should enforce bounds on results', () => {
      expect(() => new IntegerValue(3, { max: 3 }).add(1)).toThrow('Too big (maximum is 3)');
    });

    it('should keep positive infinity without computing', () => {
      const result = new FloatValue(Infinity).subtract(5);
      expect(result.value).toBe(Infinity);
      expect(result).toBeInstanceOf(FloatValue);
    });

    it('should floor-divide and take the modulo sign from the divisor', () => {
      expect(new FloatValue(7).floorDivide(2).value).toBe(3);
      expect(new FloatValue(-7).modulo(3).value).toBe(2);
      expect(new FloatValue(7).modulo(-3).value).toBe(-2);
    });

    it('should refuse to divide by zero', () => {
      expect(() => new FloatValue(5).divide(0)).toThrow(new ValidationError('Division by zero'));
      expect(() => new FloatValue(5).floorDivide(new FloatValue(0))).toThrow('Division by zero');
      expect(() => new FloatValue(5).modulo(0)).toThrow('Division by zero');
    });

    it('should raise to a power', () => {
      expect(new FloatValue(2).power(10).value).toBe(1024);
    });

    it('should round, floor and ceil', () => {
      expect(new FloatValue(2.567).round(2).value).toBe(2.57);
      expect(new FloatValue(2.5).floor().value).toBe(2);
      expect(new FloatValue(2.1).ceil().value).toBe(3);
    });

    it('should round ties to even', () => {
      expect(new FloatValue(2.5).round().value).toBe(2);
      expect(new FloatValue(3.5).round().value).toBe(4);
      expect(new FloatValue(0.125).round(2).value).toBe(0.12);
    });

    it('should compare by magnitude', () => {
      expect(new FloatValue(1).compare(2)).toBe(-1);
      expect(new FloatValue('1k').compare(new FloatValue(1000))).toBe(0);
      expect(new FloatValue(3).compare(2)).toBe(1);
    });
  });

  describe('withOptions', () => {
    it('should copy with new bounds', () => {
      const bounded = new IntegerValue(3, { min: 0, max: 3 });
      const unbound = bounded.withOptions({ min: -Infinity, max: Infinity });
      expect(unbound.add(10).value).toBe(13);
      expect(unbound).toBeInstanceOf(IntegerValue);
    });
  });

  it('should describe its syntax', () => {
    expect(new FloatValue(1).syntax).toBe('[+|-]<NUMBER>[Ti|Gi|Mi|Ki|T|G|M|k]');
  });
});

describe('IntegerValue', () => {
  it('should round input', () => {
    expect(new IntegerValue('2.6').value).toBe(3);
  });

  it('should round ties to even', () => {
    expect(new IntegerValue(2.5).value).toBe(2);
    expect(new IntegerValue('3.5').value).toBe(4);
    expect(new IntegerValue(-2.5).value).toBe(-2);
  });

  it('should reject infinity', () => {
    expect(() => new IntegerValue('inf')).toThrow(new ValidationError("Not an integer: 'inf'"));
    expect(() => new IntegerValue(-Infinity)).toThrow('Not an integer: -Infinity');
    expect(() => new IntegerValue(new FloatValue(Infinity))).toThrow("Not an integer: '∞'");
  });

  it('should reject out-of-bounds values', () => {
    expect(() => new IntegerValue(5, { min: 0, max: 3 })).toThrow('Too big (maximum is 3)');
  });

  it('should build typed values through its factory', () => {
    const type = IntegerValue.type({ min: 1 });
    expect(type.typename).toBe('integer');
    expect(type.create('7').value).toBe(7);
  });
});

describe('NumberValue.from', () => {
  it('should pick the variant by value', () => {
    expect(NumberValue.from(4)).toBeInstanceOf(IntegerValue);
    expect(NumberValue.from(4.5)).toBeInstanceOf(FloatValue);
    expect(NumberValue.from(Infinity)).toBeInstanceOf(FloatValue);
  });
});
