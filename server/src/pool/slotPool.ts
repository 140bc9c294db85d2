export const SLOT_COUNT = 8;

/**
 * The global set of simulator identities (0-7). A slot is held by at most
 * one session at a time and is always either free or assigned.
 */
export class SlotPool {
  private readonly free = new Set<number>();
  private readonly assigned = new Map<string, number>();

  constructor(readonly size: number = SLOT_COUNT) {
    for (let slot = 0; slot < size; slot += 1) {
      this.free.add(slot);
    }
  }

  /** Claims the lowest free slot for `owner`, or returns `undefined` when none are left. */
  acquire(owner: string): number | undefined {
    if (this.assigned.has(owner)) {
      return this.assigned.get(owner);
    }
    if (this.free.size === 0) return undefined;
    const slot = Math.min(...this.free);
    this.free.delete(slot);
    this.assigned.set(owner, slot);
    return slot;
  }

  /** Returns `owner`'s slot to the pool. Releasing twice is a no-op. */
  release(owner: string): number | undefined {
    const slot = this.assigned.get(owner);
    if (slot === undefined) return undefined;
    this.assigned.delete(owner);
    this.free.add(slot);
    return slot;
  }

  freeSlots(): number[] {
    return [...this.free].sort((a, b) => a - b);
  }
}
