/**
 * @fileoverview Value Resolution
 *
 * Turns the arguments of `set NAME[:eval] VALUE...` into a stored setting:
 * optional shell evaluation, list splitting, relative adjustment with
 * `+=`/`-=` and the final write through the combined settings.
 */

import { spawn } from 'child_process';
import {
  CommandError,
  ShellEvalError,
  isConnectivityError,
  isValidationError,
} from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { CombinedSettings } from '../settings/index.js';
import {
  FloatValue,
  NumberValue,
  Stringable,
  TupleValue,
  rawToString,
  type RawValue,
} from '../values/index.js';

const log = createLogger('commands:resolve-value');

const EVAL_SUFFIX = ':eval';

export type Operator = 'add' | 'subtract';

export const OPERATORS: Readonly<Record<Operator, (a: NumberValue, b: NumberValue) => NumberValue>> = {
  add: (a, b) => a.add(b),
  subtract: (a, b) => a.subtract(b),
};

const OPERATOR_PREFIXES: ReadonlyArray<readonly [string, Operator]> = [
  ['+=', 'add'],
  ['-=', 'subtract'],
];

export interface Adjustment {
  operator: Operator;
  delta: FloatValue;
}

/**
 * Strip `:eval` and make sure the setting exists
 * @throws CommandError for unknown settings
 */
export function parseSettingName(settings: CombinedSettings, name: string): string {
  const bare = name.endsWith(EVAL_SUFFIX) ? name.slice(0, -EVAL_SUFFIX.length) : name;
  if (!settings.has(bare)) {
    throw new CommandError(`Unknown setting: ${bare}`);
  }
  return bare;
}

function trimNewlines(text: string): string {
  return text.replace(/^\n+|\n+$/g, '');
}

/**
 * Run `command` with `sh -c` and return its stdout. There is no timeout; a
 * command that never exits blocks the caller.
 * @throws ShellEvalError if the command wrote anything to stderr, whatever its exit code
 */
export function evalShellCommand(command: string): Promise<string> {
  log.debug('Running shell command', { command });
  return new Promise((resolve, reject) => {
    const child = spawn('sh', ['-c', command], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', reject);
    child.on('close', (exitCode) => {
      const errors = trimNewlines(stderr);
      if (errors) {
        reject(new ShellEvalError(errors, exitCode));
      } else {
        resolve(trimNewlines(stdout));
      }
    });
  });
}

/**
 * Flatten tokens into list items, splitting on commas
 */
export function listifyArgs(args: readonly string[]): string[] {
  return args
    .flatMap(arg => arg.split(','))
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Detect a leading `+=` or `-=`
 * @returns null if `literal` is not a relative adjustment
 * @throws ValidationError if the delta is not a number
 */
export function detectOperator(literal: RawValue): Adjustment | null {
  if (typeof literal !== 'string') return null;
  const stripped = literal.trim();
  if (stripped.length < 3) return null;

  for (const [prefix, operator] of OPERATOR_PREFIXES) {
    if (stripped.startsWith(prefix)) {
      return { operator, delta: new FloatValue(stripped.slice(prefix.length)) };
    }
  }
  return null;
}

/**
 * Printable form of a value for messages; lists are comma separated
 */
export function stringifyValue(value: RawValue): string {
  if (value instanceof TupleValue) return value.items.join(', ');
  if (value instanceof Stringable || typeof value !== 'object') return rawToString(value);
  return value.map(item => stringifyValue(item)).join(', ');
}

/**
 * Apply an adjustment to the current value of a numeric setting. Results
 * keep the current value's unit, prefix and bounds.
 *
 * @returns null if `current` is not numeric
 * @throws CommandError naming the attempted value if it is out of bounds
 */
export function adjustValue(
  name: string,
  current: Stringable,
  { operator, delta }: Adjustment
): NumberValue | null {
  if (!(current instanceof NumberValue)) return null;

  // Unlimited counts as zero; infinity can't take part in integer arithmetic
  const base = current.value >= Infinity
    ? new FloatValue(0, { unit: current.unit, prefix: current.prefix, hideUnit: current.hideUnit })
    : current;

  let operand: NumberValue = delta;
  if (base.unit !== null && delta.unit !== null && base.unit !== delta.unit) {
    try {
      operand = new FloatValue(delta, { convertTo: base.unit });
    } catch (error) {
      if (!isValidationError(error)) throw error;
      throw new CommandError(`${name} = ${delta.toString()}: ${error.message}`);
    }
  }

  const apply = OPERATORS[operator];
  try {
    return apply(base, operand);
  } catch (error) {
    if (!isValidationError(error)) throw error;
    // Redo the arithmetic without bounds to show what was attempted
    const unbound = base.withOptions({ min: -Infinity, max: Infinity });
    const invalid = apply(unbound, operand);
    throw new CommandError(`${name} = ${stringifyValue(invalid)}: ${error.message}`);
  }
}

/**
 * Resolve `set` arguments and store the result
 *
 * @param nameArg - Setting name, optionally with `:eval` appended
 * @param valueArgs - Value tokens, or the shell command if `:eval` is given
 * @returns The stored value
 * @throws CommandError with a user-facing message on any failure
 */
export async function setSettingValue(
  settings: CombinedSettings,
  nameArg: string,
  valueArgs: readonly string[]
): Promise<Stringable> {
  const name = parseSettingName(settings, nameArg);

  if (settings.isRemote(name)) {
    try {
      await settings.update();
    } catch (error) {
      if (isConnectivityError(error)) throw new CommandError(error.message);
      throw error;
    }
  }

  let tokens = valueArgs;
  if (nameArg.endsWith(EVAL_SUFFIX)) {
    try {
      tokens = [await evalShellCommand(valueArgs.join(' '))];
    } catch (error) {
      if (error instanceof ShellEvalError) throw new CommandError(`${name}: ${error.message}`);
      throw error;
    }
  }

  const current = settings.get(name);
  const literal: RawValue = current instanceof TupleValue ? listifyArgs(tokens) : tokens.join(' ');

  let adjustment: Adjustment | null;
  try {
    adjustment = detectOperator(literal);
  } catch (error) {
    if (!isValidationError(error)) throw error;
    throw new CommandError(`${name} = ${stringifyValue(literal)}: ${error.message}`);
  }

  const value: RawValue = (adjustment && adjustValue(name, current, adjustment)) ?? literal;

  try {
    return await settings.set(name, value);
  } catch (error) {
    if (isValidationError(error)) {
      throw new CommandError(`${name} = ${stringifyValue(value)}: ${error.message}`);
    }
    if (isConnectivityError(error)) {
      throw new CommandError(error.message);
    }
    throw error;
  }
}
