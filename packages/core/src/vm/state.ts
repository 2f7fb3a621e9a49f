import type { ProtocolVersion } from '../protocol/version.js';
import { ValueHeap } from './heap.js';
import { ReferenceTable } from './memo.js';
import { VmStack } from './stack.js';
import { MARK, NONE, type Handle, type StackValue } from './values.js';

/** Everything one generation pass simulates. */
export class VmState {
  readonly heap = new ValueHeap();
  readonly stack = new VmStack(this.heap);
  readonly memo = new ReferenceTable();
  headerEmitted = false;

  constructor(readonly version: ProtocolVersion) {}

  pushValue(value: StackValue): Handle {
    const handle = this.heap.alloc(value);
    this.stack.push(handle);
    return handle;
  }

  pushMark(): Handle {
    return this.pushValue(MARK);
  }

  pushNone(): Handle {
    return this.pushValue(NONE);
  }

  reset(): void {
    this.stack.clear();
    this.memo.clear();
    this.heap.clear();
    this.headerEmitted = false;
  }
}
