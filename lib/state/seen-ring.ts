/**
 * Fixed-capacity set of identities. Eviction follows insertion order:
 * re-adding an identity that is already present does not move it.
 */
export class SeenRing {
  private readonly slots: Array<string | undefined>;

  private readonly members = new Set<string>();

  private head = 0;

  constructor(
    readonly capacity: number,
    initial: Iterable<string> = [],
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`SeenRing capacity must be a positive integer: ${capacity}`);
    }
    this.slots = new Array<string | undefined>(capacity);
    for (const id of initial) {
      this.add(id);
    }
  }

  get size(): number {
    return this.members.size;
  }

  has(id: string): boolean {
    return this.members.has(id);
  }

  /** Returns false when the identity was already present. */
  add(id: string): boolean {
    if (this.members.has(id)) {
      return false;
    }
    const slot = (this.head + this.members.size) % this.capacity;
    if (this.members.size === this.capacity) {
      const evicted = this.slots[this.head];
      if (evicted !== undefined) {
        this.members.delete(evicted);
      }
      this.head = (this.head + 1) % this.capacity;
    }
    this.slots[slot] = id;
    this.members.add(id);
    return true;
  }

  addAll(ids: Iterable<string>): void {
    for (const id of ids) {
      this.add(id);
    }
  }

  /** Oldest first. */
  toArray(): string[] {
    const ids: string[] = [];
    for (let offset = 0; offset < this.members.size; offset += 1) {
      const id = this.slots[(this.head + offset) % this.capacity];
      if (id !== undefined) ids.push(id);
    }
    return ids;
  }

  values(): IterableIterator<string> {
    return this.members.values();
  }
}
