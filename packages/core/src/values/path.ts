/**
 * @fileoverview File system path values
 *
 * Paths are normalized with "~" expanded; existence is only checked when
 * requested.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ValidationError } from '../errors/index.js';
import { Stringable, rawToString, type RawValue, type ValueType } from './stringable.js';

export interface PathOptions {
  /** Whether the path must exist on the local file system */
  mustexist?: boolean;
}

/**
 * Collapse `.`/`..`, drop trailing separators and expand a leading `~`
 */
export function normalizePath(raw: string): string {
  let normalized = path.normalize(raw);
  while (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }
  if (normalized === '~' || normalized.startsWith(`~${path.sep}`)) {
    normalized = os.homedir() + normalized.slice(1);
  }
  return normalized;
}

/**
 * Replace the home directory prefix with `~`
 */
export function abbreviateHome(value: string): string {
  const home = os.homedir();
  if (!home || home === path.sep) return value;
  if (value === home) return '~';
  if (value.startsWith(home + path.sep)) return `~${value.slice(home.length)}`;
  return value;
}

/**
 * File system path
 */
export class PathValue extends Stringable {
  readonly kind = 'path' as const;
  /** Normalized path with `~` expanded */
  readonly value: string;
  readonly mustexist: boolean;

  constructor(raw: RawValue, options: PathOptions = {}) {
    super();
    const value = normalizePath(raw instanceof PathValue ? raw.value : rawToString(raw));
    const mustexist = options.mustexist ?? false;

    if (mustexist && !fs.existsSync(value)) {
      throw new ValidationError('No such file or directory', raw);
    }

    this.value = value;
    this.mustexist = mustexist;
  }

  static type(options: PathOptions = {}): ValueType<PathValue> {
    return { typename: 'path', create: (raw) => new PathValue(raw, options) };
  }

  get syntax(): string {
    return 'file system path';
  }

  toString(): string {
    return abbreviateHome(this.value);
  }

  equals(other: unknown): boolean {
    if (other instanceof PathValue) return other.value === this.value;
    return typeof other === 'string' && normalizePath(other) === this.value;
  }
}
