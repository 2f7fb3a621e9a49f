import type { Handle } from './values.js';

/**
 * Reference table ("memo"). Grows within a pass; writing an index that is
 * already present overwrites it.
 */
export class ReferenceTable {
  private readonly entries = new Map<number, Handle>();

  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  get(index: number): Handle | undefined {
    return this.entries.get(index);
  }

  has(index: number): boolean {
    return this.entries.has(index);
  }

  put(index: number, handle: Handle): void {
    this.entries.set(index, handle);
  }

  /** Indices in ascending order. */
  indices(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  clear(): void {
    this.entries.clear();
  }
}
