import { ErrorCode } from '../errors/codes.js';
import { GenerationError } from '../types/errors.js';
import {
  OPCODE_NAMES,
  OPCODES,
  isIntegerOpcode,
  type IntegerOpcode,
  type OpcodeName,
} from './opcodes.js';
import { PROTOCOL_VERSIONS, type ProtocolVersion } from './version.js';

function buildTable(): ReadonlyMap<ProtocolVersion, readonly OpcodeName[]> {
  const table = new Map<ProtocolVersion, readonly OpcodeName[]>();
  for (const version of PROTOCOL_VERSIONS) {
    table.set(
      version,
      Object.freeze(OPCODE_NAMES.filter((name) => OPCODES[name].since <= version))
    );
  }
  return table;
}

/** version → ordered legal instruction set, cumulative across versions. */
export const PROTOCOL_TABLE = buildTable();

export function opcodesForVersion(version: ProtocolVersion): readonly OpcodeName[] {
  const entry = PROTOCOL_TABLE.get(version);
  if (!entry) {
    throw new GenerationError({
      message: `no instruction table for protocol ${String(version)}`,
      errorCode: ErrorCode.UNSUPPORTED_PROTOCOL,
      context: { value: version },
    });
  }
  return entry;
}

export function integerOpcodesForVersion(
  version: ProtocolVersion
): readonly IntegerOpcode[] {
  return opcodesForVersion(version).filter(isIntegerOpcode);
}

export function isOpcodeInVersion(
  name: OpcodeName,
  version: ProtocolVersion
): boolean {
  return OPCODES[name].since <= version;
}
