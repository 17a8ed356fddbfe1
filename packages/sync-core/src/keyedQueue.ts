type QueueTask<T> = () => Promise<T>;

/**
 * FIFO execution per key. Tasks sharing a key never overlap; tasks on
 * different keys run concurrently. A failed task does not block its
 * successors.
 */
export class KeyedQueue {
  private readonly queues = new Map<string, Promise<void>>();

  async run<T>(key: string, task: QueueTask<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();

    const next = previous.catch(() => undefined).then(task);
    const settled = next.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, settled);

    try {
      return await next;
    } finally {
      if (this.queues.get(key) === settled) {
        this.queues.delete(key);
      }
    }
  }

  isIdle(key: string): boolean {
    return !this.queues.has(key);
  }
}
