/**
 * @fileoverview Stringable value exports
 */

export {
  Stringable,
  repr,
  rawToString,
  formatBound,
  resolveAlias,
  type RawValue,
  type ValueKind,
  type ValueType,
} from './stringable.js';
export { StringValue, type StringOptions } from './string.js';
export {
  BoolValue,
  DEFAULT_TRUE_LITERALS,
  DEFAULT_FALSE_LITERALS,
  type BoolOptions,
} from './bool.js';
export { PathValue, normalizePath, abbreviateHome, type PathOptions } from './path.js';
export { TupleValue, type TupleOptions } from './tuple.js';
export { OptionValue, type OptionOptions } from './option.js';
export {
  NumberValue,
  FloatValue,
  IntegerValue,
  BINARY_PREFIXES,
  METRIC_PREFIXES,
  normalizeUnit,
  prettyFloat,
  type UnitPrefix,
  type NumberOptions,
  type NumberConfig,
  type NumberStringOptions,
} from './number.js';
export { DataCountConverter } from './converter.js';
