/**
 * Generator module exports
 */

export { PickleGenerator } from './pickle-generator.js';
export { Emitter, type EmitterOptions, type EmitOptions } from './emitter.js';
export {
  canEmit,
  describeState,
  legalInstructions,
  type LegalityPolicy,
  type StackView,
} from './legality.js';
export { simulate, type SimulationEffect } from './simulate.js';
export {
  encodeInstruction,
  encodeLong,
  decodeLong,
  formatFloatText,
  SHORT_LENGTH_LIMIT,
} from './encoding.js';
export {
  DEFAULT_GLOBAL,
  loadWordList,
  randomGlobal,
  splitGlobal,
  type GlobalName,
} from './globals.js';
export type { Instruction } from './instruction.js';
