// @picklesmith/core entry point
//
// - Non-throwing facades Generate/GenerateFromBytes/GenerateBatch via ./api.js.
// - PickleGenerator for callers that configure one generator and reuse it.
// - Building blocks (protocol table, entropy sources, mutators, VM model)
//   for harnesses and tests that need to look inside a pass.

export * from './api.js';

export * from './generator/index.js';

// Protocol
export {
  PROTOCOL_VERSIONS,
  HIGHEST_PROTOCOL,
  HEADER_MIN_VERSION,
  FRAME_MIN_VERSION,
  isProtocolVersion,
  toProtocolVersion,
  type ProtocolVersion,
} from './protocol/version.js';
export {
  OPCODES,
  OPCODE_NAMES,
  INTEGER_OPCODES,
  isOpcodeName,
  opcodeByte,
  opcodeByByte,
  introducedIn,
  operandShape,
  type OpcodeName,
  type OperandShape,
} from './protocol/opcodes.js';
export {
  PROTOCOL_TABLE,
  opcodesForVersion,
  integerOpcodesForVersion,
  isOpcodeInVersion,
} from './protocol/table.js';

// Entropy
export type { EntropySource } from './entropy/source.js';
export { SeededEntropySource } from './entropy/seeded-source.js';
export { ByteCursorSource } from './entropy/byte-source.js';
export {
  MAX_SEED,
  normalizeSeed,
  parseSeed,
  randomSeed,
  type Seed,
} from './entropy/seed.js';

// Mutators
export {
  MUTATOR_NAMES,
  createMutators,
  expandMutatorKinds,
  isMutatorKind,
  parseMutatorKinds,
  type Mutator,
  type MutatorKind,
  type MutatorName,
} from './mutators/index.js';

// VM model
export { VmState } from './vm/state.js';
export type { Handle, StackValue, ValueKind } from './vm/values.js';

// Configuration
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  type GeneratorOptions,
  type ResolvedOptions,
} from './types/options.js';
export {
  CONFIG_FILE_SCHEMA,
  parseConfigFile,
  type ConfigFile,
  type LoadedConfig,
} from './config/options-schema.js';

// Errors
export { ErrorCode, EXIT_CODES, type Severity, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
export {
  PicklesmithError,
  ConfigError,
  GenerationError,
  OutputError,
  InternalError,
  isPicklesmithError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { Ok, Err, ok, err, isOk, isErr, type Result } from './types/result.js';

// Metrics
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsVerbosity,
  type MetricsSnapshot,
} from './util/metrics.js';
