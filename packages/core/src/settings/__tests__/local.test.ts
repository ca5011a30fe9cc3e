/**
 * @fileoverview Tests for LocalSettings
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SettingNotFoundError, ValidationError } from '../../errors/index.js';
import { IntegerValue, StringValue, TupleValue } from '../../values/index.js';
import { LocalSettings } from '../local.js';

describe('LocalSettings', () => {
  let settings: LocalSettings;

  beforeEach(() => {
    settings = new LocalSettings();
    settings.load(
      { name: 'b.height', type: IntegerValue.type({ min: 1 }), default: 10, description: 'Height' },
      { name: 'a.name', type: StringValue.type(), default: 'foo', description: 'Name' },
      { name: 'c.list', type: TupleValue.type({ options: ['x', 'y'] }), default: ['x'], description: 'List' }
    );
  });

  it('should serve defaults after loading', () => {
    expect(settings.get('b.height').toString()).toBe('10');
    expect(settings.get('a.name').equals('foo')).toBe(true);
  });

  it('should list names sorted', () => {
    expect(settings.names()).toEqual(['a.name', 'b.height', 'c.list']);
    expect([...settings]).toEqual(['a.name', 'b.height', 'c.list']);
  });

  it('should reject duplicate names', () => {
    expect(() =>
      settings.load({ name: 'a.name', type: StringValue.type(), default: '', description: '' })
    ).toThrow('Setting already exists: a.name');
  });

  it('should validate new values through the type', () => {
    expect(settings.set('b.height', '20').toString()).toBe('20');
    expect(() => settings.set('b.height', '0')).toThrow(ValidationError);
    expect(settings.get('b.height').toString()).toBe('20');
  });

  it('should reset to the default', () => {
    settings.set('c.list', 'x,y');
    expect(settings.reset('c.list').toString()).toBe('x');
    expect(settings.get('c.list').equals(settings.default('c.list'))).toBe(true);
  });

  it('should throw for unknown names', () => {
    expect(() => settings.get('nope')).toThrow(SettingNotFoundError);
    expect(() => settings.set('nope', 1)).toThrow('Unknown setting: nope');
    expect(settings.has('nope')).toBe(false);
  });

  it('should describe settings', () => {
    expect(settings.description('a.name')).toBe('Name');
    expect(settings.syntax('c.list')).toBe('<OPTION>,<OPTION>,...');
    expect(settings.typename('b.height')).toBe('integer');
  });

  it('should notify listeners until they unsubscribe', () => {
    const listener = vi.fn();
    const unsubscribe = settings.onChange(listener);

    settings.set('a.name', 'bar');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toBe('a.name');
    expect(String(listener.mock.calls[0]?.[1])).toBe('bar');

    unsubscribe();
    settings.set('a.name', 'baz');
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
