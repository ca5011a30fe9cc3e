/**
 * @fileoverview dump command
 *
 * Writes an rc file that reproduces the current local settings and key
 * bindings. Entries that equal their default are commented out.
 */

import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { NAME, VERSION } from '../../constants.js';
import { CommandError, errorMessage } from '../../errors/index.js';
import type { KeyBinding, KeymapProvider } from '../../keymap/index.js';
import { createLogger } from '../../logging/index.js';
import type { LocalSettings } from '../../settings/index.js';
import { resolveRcPath } from '../../settings/index.js';
import { wrapText } from '../../utils/index.js';
import { TupleValue, repr, type Stringable } from '../../values/index.js';
import { quoteArg } from '../parser.js';
import type { BuiltInCommand } from '../types.js';

const log = createLogger('commands:dump');

export const DUMP_WIDTH = 79;

const DEFAULT_LABEL = '# Default: ';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

function formatSettingValue(value: Stringable): string {
  if (value instanceof TupleValue) {
    return value.items.join(' ');
  }
  const text = value.toString();
  return text.includes(' ') ? repr(text) : text;
}

export function wrapDescription(description: string): string[] {
  return wrapText(`# ${description}`, { width: DUMP_WIDTH, subsequentIndent: '# ' });
}

export function wrapDefault(value: string): string[] {
  const indent = '# ' + ' '.repeat(DEFAULT_LABEL.length - 2);
  const lines = wrapText(DEFAULT_LABEL + value, { width: DUMP_WIDTH, subsequentIndent: indent });
  // The first line always starts the value, however long it is
  const [first, second, ...rest] = lines;
  if (first !== undefined && second !== undefined && first.trim() === DEFAULT_LABEL.trim()) {
    return [first + second.slice(indent.length - 1), ...rest];
  }
  return lines;
}

export function wrapSetCommand(name: string, value: string, commentOut: boolean): string[] {
  const cmd = 'set';
  let lines = wrapText(`${cmd} ${name} ${value}`, {
    width: DUMP_WIDTH,
    subsequentIndent: ' '.repeat(cmd.length + name.length + 2),
  });

  // The first line always holds command, name and the start of the value
  const [first = '', second, third, ...rest] = lines;
  if (second !== undefined && third !== undefined && first.trim() === cmd) {
    lines = [`${first} ${second.trim()} ${third.trim()}`, ...rest];
  } else if (second !== undefined && first.trim() === `${cmd} ${name}`) {
    lines = [`${first} ${second.trim()}`, ...(third === undefined ? [] : [third]), ...rest];
  }

  const continued = lines.map((line, i) => (i < lines.length - 1 ? `${line} \\` : line));
  return commentOut ? continued.map(line => `#${line}`) : continued;
}

export function dumpSettings(local: LocalSettings): string {
  const blocks = local.names().map((name) => {
    const value = local.get(name);
    const defaultValue = local.default(name);
    return [
      ...wrapDescription(local.description(name)),
      ...wrapDefault(defaultValue.toString()),
      ...wrapSetCommand(name, formatSettingValue(value), value.equals(defaultValue)),
    ].join('\n');
  });
  return blocks.join('\n\n');
}

export function formatBindCommand(binding: KeyBinding, keymap: KeymapProvider): string[] {
  const lines: string[][] = [['bind']];
  if (binding.description) {
    lines.push([' '.repeat('bind'.length)]);
    lines[0]?.push('--description', quoteArg(binding.description), '\\');
  }
  const last = lines[lines.length - 1] ?? [];
  if (binding.context !== keymap.defaultContext) {
    last.push('--context', quoteArg(binding.context));
  }
  last.push(quoteArg(binding.key), binding.action);

  const prefix = keymap.isDefault(binding) ? '#' : '';
  return lines.map(line => prefix + line.join(' '));
}

export function dumpKeybindings(keymap: KeymapProvider): string {
  const contexts = [...keymap.contexts()].sort();
  return contexts
    .map(context => keymap.bindings(context).flatMap(binding => formatBindCommand(binding, keymap)).join('\n'))
    .join('\n\n');
}

/**
 * Full rc file content
 */
export function buildRcContent(local: LocalSettings, keymap: KeymapProvider | null, now: Date = new Date()): string {
  const sections = [
    `# This is an rc file for ${NAME} ${VERSION}.`,
    `# This file was created on ${formatTimestamp(now)}.`,
    '', '',
    '### SETTINGS',
    '',
    dumpSettings(local),
  ];
  if (keymap) {
    sections.push('', '', '### KEYBINDINGS', '', dumpKeybindings(keymap));
  }
  return sections.join('\n') + '\n';
}

export const dumpCommand: BuiltInCommand = {
  name: 'dump',
  description: 'Generate commands that reproduce current settings and keybindings',
  usage: ['dump [--force|-f] [<FILE>]'],
  handler: async (args, { settings, keymap, io }) => {
    const force = args.includes('--force') || args.includes('-f');
    const files = args.filter(arg => arg !== '--force' && arg !== '-f');
    if (files.length > 1) {
      throw new CommandError('Expected at most one FILE');
    }

    const content = buildRcContent(settings.local, keymap);
    const [file] = files;
    if (file === undefined) {
      io.output(content.trimEnd());
      return;
    }

    const filepath = resolveRcPath(file);
    if (existsSync(filepath) && !force) {
      throw new CommandError(`File exists: ${filepath}`);
    }
    try {
      await writeFile(filepath, content, 'utf8');
    } catch (error) {
      throw new CommandError(`Unable to write ${filepath}: ${errorMessage(error)}`);
    }
    log.info('Wrote rc file', { filepath });
    io.info(`Wrote rc file: ${filepath}`);
  },
};
