export const DEFAULT_LABEL_CACHE_CAPACITY = 50_000;

/**
 * Bounded label → id map with least-recently-used eviction. A `Map` keeps
 * insertion order, so re-inserting on read moves an entry to the young end
 * and the first key is always the eviction candidate.
 */
export class LabelCache {
  private readonly entries = new Map<string, number>();

  constructor(readonly capacity: number = DEFAULT_LABEL_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `LabelCache capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  get(label: string): number | undefined {
    const id = this.entries.get(label);
    if (id !== undefined) {
      this.entries.delete(label);
      this.entries.set(label, id);
    }
    return id;
  }

  set(label: string, id: number): void {
    this.entries.delete(label);
    this.entries.set(label, id);
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
