/**
 * @fileoverview Tests for the command line parser
 */

import { describe, it, expect } from 'vitest';
import {
  suggestCommands,
  joinArgs,
  parseCommand,
  quoteArg,
  splitCommands,
  tokenizeArgs,
} from '../parser.js';

describe('tokenizeArgs', () => {
  it('should split on whitespace', () => {
    expect(tokenizeArgs('  set   tui.poll  10 ')).toEqual(['set', 'tui.poll', '10']);
  });

  it('should group quoted words', () => {
    expect(tokenizeArgs(`set connect.path "a b" 'c d'`)).toEqual(['set', 'connect.path', 'a b', 'c d']);
  });

  it('should keep empty quoted tokens', () => {
    expect(tokenizeArgs(`a '' b`)).toEqual(['a', '', 'b']);
    expect(tokenizeArgs('""')).toEqual(['']);
  });

  it('should join quoted and unquoted parts of one word', () => {
    expect(tokenizeArgs(`pre"fix suf"fix`)).toEqual(['prefix suffix']);
  });

  it('should unescape quotes and backslashes', () => {
    expect(tokenizeArgs(`it\\'s`)).toEqual(["it's"]);
    expect(tokenizeArgs(`"a\\"b"`)).toEqual(['a"b']);
    expect(tokenizeArgs('a\\\\b')).toEqual(['a\\b']);
  });

  it('should keep other backslashes', () => {
    expect(tokenizeArgs('a\\nb')).toEqual(['a\\nb']);
  });
});

describe('parseCommand', () => {
  it('should separate command and arguments', () => {
    expect(parseCommand('set tui.poll 10')).toEqual({
      command: 'set',
      args: ['tui.poll', '10'],
      original: 'set tui.poll 10',
    });
  });

  it('should return an empty command for blank input', () => {
    expect(parseCommand('   ').command).toBe('');
  });
});

describe('splitCommands', () => {
  it('should split on the separator and drop empty commands', () => {
    expect(splitCommands(['set', 'a', '1', ';', ';', 'rc', 'x', ';'])).toEqual([
      ['set', 'a', '1'],
      ['rc', 'x'],
    ]);
  });

  it('should take a custom separator', () => {
    expect(splitCommands(['a', 'and', 'b'], 'and')).toEqual([['a'], ['b']]);
  });
});

describe('quoteArg', () => {
  it('should leave plain words alone', () => {
    expect(quoteArg('tui.poll')).toBe('tui.poll');
  });

  it('should quote words with spaces or quotes', () => {
    expect(quoteArg('a b')).toBe(`'a b'`);
    expect(quoteArg("it's")).toBe(`"it's"`);
    expect(quoteArg(`say "it's"`)).toBe(`'say "it\\'s"'`);
    expect(quoteArg('')).toBe(`''`);
  });

  it('should produce lines that tokenize back to the arguments', () => {
    const args = ['set', 'connect.path', 'a b', '', "it's", 'back\\slash', `mixed "it's"`];
    expect(tokenizeArgs(joinArgs(args))).toEqual(args);
  });
});

describe('suggestCommands', () => {
  const commands = ['set', 'reset', 'rc', 'ratelimit', 'dump'];

  it('should suggest nothing for empty input', () => {
    expect(suggestCommands('', commands)).toEqual([]);
  });

  it('should suggest commands the input abbreviates', () => {
    expect(suggestCommands('rat', commands)).toEqual(['ratelimit']);
  });

  it('should suggest commands within a few typos', () => {
    expect(suggestCommands('sett', commands)).toEqual(['set']);
    expect(suggestCommands('dupm', commands)).toEqual(['dump']);
  });

  it('should allow one typo in short names', () => {
    expect(suggestCommands('rx', commands)).toEqual(['rc']);
    expect(suggestCommands('xyz', commands)).toEqual([]);
  });
});
