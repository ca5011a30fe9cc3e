/**
 * @fileoverview Command Line Parser
 *
 * Splits command lines into tokens. Single and double quotes group words,
 * a backslash escapes a quote or another backslash.
 */

import type { ParsedCommand } from './types.js';

const ESCAPABLE = new Set(['"', "'", '\\']);

/**
 * Split arguments string into tokens
 * Respects quoted strings; `''` is an empty token
 */
export function tokenizeArgs(argsString: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let started = false;
  let quoteChar = '';

  for (let i = 0; i < argsString.length; i++) {
    const char = argsString.charAt(i);
    const next = argsString.charAt(i + 1);

    if (char === '\\' && ESCAPABLE.has(next)) {
      current += next;
      started = true;
      i++;
    } else if (quoteChar) {
      if (char === quoteChar) {
        quoteChar = '';
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quoteChar = char;
      started = true;
    } else if (/\s/.test(char)) {
      if (started) {
        tokens.push(current);
        current = '';
        started = false;
      }
    } else {
      current += char;
      started = true;
    }
  }

  if (started) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Parse a command line into command name and arguments
 */
export function parseCommand(input: string): ParsedCommand {
  const [command = '', ...args] = tokenizeArgs(input);
  return { command, args, original: input };
}

/**
 * Split a sequence of commands on a separator token, e.g. ['set', 'a', '1', ';', 'rc', 'x']
 */
export function splitCommands(args: readonly string[], separator = ';'): string[][] {
  const commands: string[][] = [[]];
  for (const arg of args) {
    if (arg === separator) {
      commands.push([]);
    } else {
      commands[commands.length - 1]?.push(arg);
    }
  }
  return commands.filter(command => command.length > 0);
}

/**
 * Quote an argument so tokenizeArgs returns it unchanged
 */
export function quoteArg(arg: string): string {
  if (/^[^\s'"\\]+$/.test(arg)) {
    return arg;
  }
  const quote = arg.includes("'") && !arg.includes('"') ? '"' : "'";
  return quote + arg.replace(/\\/g, '\\\\').replace(new RegExp(quote, 'g'), `\\${quote}`) + quote;
}

/**
 * Join tokens into a command line that tokenizes back to them
 */
export function joinArgs(args: readonly string[]): string {
  return args.map(quoteArg).join(' ');
}

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      row.push(Math.min((previous[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, substitution));
    }
    previous = row;
  }
  return previous[b.length] ?? 0;
}

/**
 * Names that `input` is likely a typo or an abbreviation of, closest first
 */
export function suggestCommands(input: string, names: readonly string[]): string[] {
  const normalized = input.toLowerCase().trim();
  if (!normalized) return [];

  // Short names tolerate one typo, longer ones two
  const tolerance = normalized.length <= 3 ? 1 : 2;
  return names
    .map(name => ({ name, distance: name.startsWith(normalized) ? 0 : editDistance(normalized, name) }))
    .filter(({ distance }) => distance <= tolerance)
    .sort((a, b) => a.distance - b.distance || a.name.localeCompare(b.name))
    .map(({ name }) => name);
}
