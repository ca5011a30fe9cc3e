/**
 * @fileoverview Well-known file locations
 */

import * as os from 'os';
import * as path from 'path';
import { NAME } from '../constants.js';

type Env = Readonly<Record<string, string | undefined>>;

export function configDir(env: Env = process.env): string {
  const base = env['XDG_CONFIG_HOME'] || path.join(os.homedir(), '.config');
  return path.join(base, NAME);
}

export function cacheDir(env: Env = process.env): string {
  const base = env['XDG_CACHE_HOME'] || path.join(os.homedir(), '.cache');
  return path.join(base, NAME);
}

export function defaultRcFile(env: Env = process.env): string {
  return path.join(configDir(env), 'rc');
}

export function defaultHistoryFile(env: Env = process.env): string {
  return path.join(cacheDir(env), 'history');
}

export function defaultThemeFile(env: Env = process.env): string {
  return path.join(configDir(env), 'default.theme');
}
