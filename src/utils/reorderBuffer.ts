/**
 * Holds out-of-order completions and releases them strictly by ascending
 * index. `deliver` runs synchronously inside `push`, so whoever owns the
 * consumer never sees concurrent calls.
 */
export class ReorderBuffer<T> {
  private pending = new Map<number, { item: T }>();
  private next: number;

  constructor(
    private readonly deliver: (index: number, item: T) => void,
    startIndex = 0
  ) {
    this.next = startIndex;
  }

  push(index: number, item: T): number {
    if (index < this.next || this.pending.has(index)) {
      throw new Error(`Index ${index} was already delivered or is pending`);
    }

    this.pending.set(index, { item });

    let delivered = 0;
    let ready = this.pending.get(this.next);
    while (ready) {
      this.pending.delete(this.next);
      this.deliver(this.next, ready.item);
      this.next++;
      delivered++;
      ready = this.pending.get(this.next);
    }

    return delivered;
  }

  get nextIndex(): number {
    return this.next;
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
