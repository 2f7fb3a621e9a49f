import { ConfigError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';

export const PROTOCOL_VERSIONS = [0, 1, 2, 3, 4, 5] as const;

export type ProtocolVersion = (typeof PROTOCOL_VERSIONS)[number];

export const HIGHEST_PROTOCOL: ProtocolVersion = 5;

/** First version that carries the PROTO header. */
export const HEADER_MIN_VERSION: ProtocolVersion = 2;

/** First version where the FRAME wrapper exists. */
export const FRAME_MIN_VERSION: ProtocolVersion = 4;

export function isProtocolVersion(value: unknown): value is ProtocolVersion {
  return (
    typeof value === 'number' &&
    PROTOCOL_VERSIONS.some((version) => version === value)
  );
}

/**
 * Validate an ordinal supplied by a caller. Anything outside 0–5 is
 * rejected before a generator exists.
 */
export function toProtocolVersion(value: number): ProtocolVersion {
  if (isProtocolVersion(value)) {
    return value;
  }
  throw new ConfigError({
    message: `protocol version must be 0-5, got ${String(value)}`,
    errorCode: ErrorCode.INVALID_PROTOCOL_VERSION,
    context: {
      setting: 'version',
      value,
      suggestion: 'Pass an integer between 0 and 5',
    },
  });
}
