import type { ValueHeap } from './heap.js';
import type { Handle, ValueKind } from './values.js';

/**
 * Simulated VM stack. Depth 0 is the top. The marker queries are what the
 * legality oracle leans on, so they are answered from the topmost marker
 * only: items below it are invisible to everything but the instructions
 * that consume a marked group.
 */
export class VmStack {
  private readonly items: Handle[] = [];

  constructor(private readonly heap: ValueHeap) {}

  get depth(): number {
    return this.items.length;
  }

  push(handle: Handle): void {
    this.items.push(handle);
  }

  pop(): Handle | undefined {
    return this.items.pop();
  }

  peek(): Handle | undefined {
    return this.peekAt(0);
  }

  peekAt(depth: number): Handle | undefined {
    return this.items[this.items.length - 1 - depth];
  }

  kindAt(depth: number): ValueKind | undefined {
    return this.heap.kindOf(this.peekAt(depth));
  }

  /** Bottom-based index of the topmost marker, -1 when there is none. */
  topmostMarkIndex(): number {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.heap.kindOf(this.items[i]) === 'mark') return i;
    }
    return -1;
  }

  hasMark(): boolean {
    return this.topmostMarkIndex() !== -1;
  }

  /** Items strictly above the topmost marker; undefined without one. */
  countAboveMark(): number | undefined {
    const idx = this.topmostMarkIndex();
    return idx === -1 ? undefined : this.items.length - idx - 1;
  }

  /** Items reachable without crossing a marker. */
  available(): number {
    return this.countAboveMark() ?? this.items.length;
  }

  kindBelowMark(): ValueKind | undefined {
    const idx = this.topmostMarkIndex();
    return idx <= 0 ? undefined : this.heap.kindOf(this.items[idx - 1]);
  }

  kindAboveMark(): ValueKind | undefined {
    const idx = this.topmostMarkIndex();
    return idx === -1 ? undefined : this.heap.kindOf(this.items[idx + 1]);
  }

  /**
   * Remove the topmost marker and everything above it. Returns the removed
   * items in push order, or undefined (stack untouched) without a marker.
   */
  popToMark(): Handle[] | undefined {
    const idx = this.topmostMarkIndex();
    if (idx === -1) return undefined;
    const group = this.items.splice(idx);
    group.shift();
    return group;
  }

  clear(): void {
    this.items.length = 0;
  }
}
