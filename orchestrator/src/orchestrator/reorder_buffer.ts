/**
 * Releases values in sequence order however they arrive. Values whose
 * predecessors never arrive are held until `flush()`.
 */
export class ReorderBuffer<T> {
  private readonly pending = new Map<number, { value: T }>();

  constructor(private nextSeq = 0) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Stores `value` and returns every value now releasable, in order. */
  accept(seq: number, value: T): T[] {
    if (seq < this.nextSeq || this.pending.has(seq)) {
      throw new RangeError(`Sequence ${seq} was already accepted`);
    }
    this.pending.set(seq, { value });

    const released: T[] = [];
    for (let entry = this.pending.get(this.nextSeq); entry; entry = this.pending.get(this.nextSeq)) {
      this.pending.delete(this.nextSeq);
      released.push(entry.value);
      this.nextSeq += 1;
    }
    return released;
  }

  /** Releases everything still held, in order, skipping missing sequence numbers. */
  flush(): T[] {
    const entries = Array.from(this.pending.entries()).sort((a, b) => a[0] - b[0]);
    this.pending.clear();
    const last = entries[entries.length - 1];
    if (last) {
      this.nextSeq = last[0] + 1;
    }
    return entries.map(([, entry]) => entry.value);
  }
}
