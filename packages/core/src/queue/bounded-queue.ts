export interface BoundedQueue<T> {
  readonly capacity: number;
  readonly size: number;
  /** Suspends while the queue is full. */
  put(item: T): Promise<void>;
  /** Suspends while the queue is empty. */
  get(): Promise<T>;
  /**
   * Appends without waiting for room. Reserved for a consumer handing work
   * back to its own queue, which would otherwise wait on itself.
   */
  requeue(item: T): void;
}

interface PendingPut<T> {
  readonly item: T;
  readonly resolve: () => void;
}

export function createBoundedQueue<T>(capacity: number): BoundedQueue<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Queue capacity must be a positive integer, got ${String(capacity)}`);
  }

  const items: T[] = [];
  const takers: ((item: T) => void)[] = [];
  const putters: PendingPut<T>[] = [];

  function handOff(item: T): boolean {
    const taker = takers.shift();
    if (taker === undefined) return false;
    taker(item);
    return true;
  }

  function admitWaitingPutter(): void {
    if (items.length >= capacity) return;
    const pending = putters.shift();
    if (pending === undefined) return;
    items.push(pending.item);
    pending.resolve();
  }

  return {
    capacity,

    get size(): number {
      return items.length;
    },

    put(item: T): Promise<void> {
      if (handOff(item)) return Promise.resolve();
      if (items.length < capacity) {
        items.push(item);
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        putters.push({ item, resolve });
      });
    },

    get(): Promise<T> {
      if (items.length > 0) {
        const [item] = items.splice(0, 1);
        admitWaitingPutter();
        return Promise.resolve(item);
      }
      return new Promise<T>((resolve) => {
        takers.push(resolve);
      });
    },

    requeue(item: T): void {
      if (handOff(item)) return;
      items.push(item);
    },
  };
}
