// ============================================================================
// @odlkit/core - Public API
// ============================================================================

// Encoder
export {
  LabelEncoder,
  createEncoder,
  encodeLabel,
  encodeBlock,
  createContext,
  defaultQuoterFor,
} from './encoder.js';
export type { EncodeContext, EncoderOptions } from './encoder.js';
export { encodeValue, represent } from './values.js';
export { assignmentColumn } from './align.js';

// Dialects
export {
  DEFAULT_DIALECT,
  CUBE_DIALECT,
  PDS3_DIALECT,
  DIALECTS,
  defineDialect,
  getDialect,
} from './dialects.js';
export type { Dialect, DialectOptions, EndLineStyle, TokenTable } from './dialects.js';

// Quoting
export {
  PVL_GRAMMAR,
  ODL_GRAMMAR,
  ISIS_GRAMMAR,
  OMNI_GRAMMAR,
  GRAMMARS,
  PVL_QUOTER,
  ODL_QUOTER,
  ISIS_QUOTER,
  OMNI_QUOTER,
  createQuoter,
  getGrammar,
  looksNumeric,
  needsQuotes,
  quoteString,
} from './quoting.js';
export type { Grammar, TextQuoter } from './quoting.js';

// Sinks
export { StringSink } from './sink.js';
export type { LabelSink } from './sink.js';

// Building trees
export {
  bool,
  group,
  int,
  isMapping,
  isScalar,
  mapping,
  nullValue,
  object,
  real,
  sequence,
  set,
  text,
  units,
} from './label.js';
export type { MappingInput } from './label.js';
export { fromPlain, labelFromPlain } from './plain.js';

// Errors
export {
  LabelError,
  LabelEncodeError,
  UnsupportedValueError,
  EncodingRejectedError,
  LabelConfigError,
  LabelInputError,
} from './errors.js';

// Logging
export * as logger from './logger.js';
export type { LogEntry, LogLevel, LogCallback } from './logger.js';

// Types
export type {
  LabelValue,
  LabelKind,
  LabelScalar,
  LabelMapping,
  LabelEntry,
  NullValue,
  BooleanValue,
  IntegerValue,
  RealValue,
  TextValue,
  UnitsValue,
  SequenceValue,
  SetValue,
  ObjectValue,
  GroupValue,
} from './types.js';
