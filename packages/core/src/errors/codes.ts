/**
 * Error Code Infrastructure
 * Stable error codes and process exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Configuration Errors (E100–E199)
  CONFIGURATION_ERROR = 'E100',
  INVALID_PROTOCOL_VERSION = 'E101',
  INVALID_OPCODE_RANGE = 'E102',
  UNKNOWN_MUTATOR = 'E103',
  INVALID_SEED = 'E104',
  INVALID_CONFIG_FILE = 'E105',

  // Generation Errors (E200–E299)
  GENERATION_FAILED = 'E200',
  UNSUPPORTED_PROTOCOL = 'E201',
  FRAME_LENGTH_OVERFLOW = 'E202',

  // Output Errors (E400–E499)
  OUTPUT_WRITE_FAILED = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.CONFIGURATION_ERROR]: 10,
  [ErrorCode.INVALID_PROTOCOL_VERSION]: 11,
  [ErrorCode.INVALID_OPCODE_RANGE]: 12,
  [ErrorCode.UNKNOWN_MUTATOR]: 13,
  [ErrorCode.INVALID_SEED]: 14,
  [ErrorCode.INVALID_CONFIG_FILE]: 15,
  [ErrorCode.GENERATION_FAILED]: 20,
  [ErrorCode.UNSUPPORTED_PROTOCOL]: 21,
  [ErrorCode.FRAME_LENGTH_OVERFLOW]: 22,
  [ErrorCode.OUTPUT_WRITE_FAILED]: 40,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
