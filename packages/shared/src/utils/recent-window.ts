/** Fixed-capacity most-recent-first series of numbers backed by a ring buffer. */
export interface RecentWindow {
  readonly capacity: number;
  readonly size: number;
  push(value: number): void;
  /** Most recent first. */
  toArray(): number[];
  /** Independent copy holding the same samples. */
  clone(): RecentWindow;
}

export function createRecentWindow(capacity: number): RecentWindow {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Window capacity must be a positive integer, got ${String(capacity)}`);
  }

  const slots = new Array<number>(capacity).fill(0);
  let head = 0;
  let size = 0;

  function toArray(): number[] {
    const out: number[] = [];
    for (let i = 0; i < size; i++) {
      out.push(slots[(head + i) % capacity]);
    }
    return out;
  }

  return {
    capacity,

    get size(): number {
      return size;
    },

    push(value: number): void {
      head = (head - 1 + capacity) % capacity;
      slots[head] = value;
      if (size < capacity) size += 1;
    },

    toArray,

    clone(): RecentWindow {
      const copy = createRecentWindow(capacity);
      for (const value of toArray().reverse()) {
        copy.push(value);
      }
      return copy;
    },
  };
}
