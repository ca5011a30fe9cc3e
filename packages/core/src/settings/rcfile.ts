/**
 * @fileoverview rc files
 *
 * An rc file is a list of commands, one per line. Lines starting with '#'
 * are comments and a trailing backslash continues a command on the next
 * line.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { RcFileError } from '../errors/index.js';
import { normalizePath } from '../values/index.js';
import { configDir } from './paths.js';

const ERROR_DESCRIPTIONS: Readonly<Record<string, string>> = {
  ENOENT: 'No such file or directory',
  EACCES: 'Permission denied',
  EISDIR: 'Is a directory',
};

function describeFsError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
    return ERROR_DESCRIPTIONS[code] ?? error.message;
  }
  return String(error);
}

/**
 * Where `file` refers to. Relative names that don't exist and don't start
 * with "/", "./" or "~" live in the config directory.
 */
export function resolveRcPath(file: string, env: Readonly<Record<string, string | undefined>> = process.env): string {
  const explicit = file.startsWith(path.sep) || file.startsWith(`.${path.sep}`) || file.startsWith('~');
  if (explicit || existsSync(file)) {
    return normalizePath(file);
  }
  return path.join(configDir(env), file);
}

/**
 * Split rc file content into command lines
 */
export function parseRcContent(content: string): string[] {
  const commands: string[] = [];
  let pending = '';

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('#')) continue;

    if (line.endsWith('\\')) {
      pending += `${line.slice(0, -1).trimEnd()} `;
      continue;
    }

    const command = (pending + line).trim();
    pending = '';
    if (command) commands.push(command);
  }

  const rest = pending.trim();
  if (rest) commands.push(rest);
  return commands;
}

/**
 * Read the command lines of an rc file
 * @throws RcFileError if the file can't be read
 */
export async function readRcFile(filepath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filepath, 'utf8');
  } catch (error) {
    throw new RcFileError(`${filepath}: ${describeFsError(error)}`);
  }
  return parseRcContent(content);
}
