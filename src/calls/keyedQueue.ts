import { log } from '../log';

export interface WorkItem {
  name: string;
  run: () => Promise<void> | void;
}

interface QueueState {
  items: WorkItem[];
  running: boolean;
}

/**
 * FIFO task runner per key. Tasks for one key run strictly one after the
 * other in enqueue order; different keys drain independently.
 */
export class KeyedQueue {
  private readonly queues = new Map<string, QueueState>();
  private readonly idleWaiters = new Map<string, Array<() => void>>();

  public enqueue(key: string, task: WorkItem): void {
    const queue = this.queues.get(key) ?? { items: [], running: false };
    queue.items.push(task);
    this.queues.set(key, queue);

    if (!queue.running) {
      queue.running = true;
      setImmediate(() => {
        void this.runQueue(key, queue);
      });
    }
  }

  public depth(key: string): number {
    return this.queues.get(key)?.items.length ?? 0;
  }

  public isBusy(key: string): boolean {
    return this.queues.has(key);
  }

  public size(): number {
    return this.queues.size;
  }

  /** Resolves once the key's queue has drained. */
  public whenIdle(key: string): Promise<void> {
    if (!this.queues.has(key)) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const waiters = this.idleWaiters.get(key) ?? [];
      waiters.push(resolve);
      this.idleWaiters.set(key, waiters);
    });
  }

  public clear(key: string): void {
    const queue = this.queues.get(key);
    if (!queue) {
      return;
    }

    queue.items.length = 0;
    if (!queue.running) {
      this.queues.delete(key);
      this.notifyIdle(key);
    }
  }

  private async runQueue(key: string, queue: QueueState): Promise<void> {
    while (queue.items.length > 0) {
      const task = queue.items.shift();
      if (!task) {
        continue;
      }

      try {
        await task.run();
      } catch (error) {
        log.error({ err: error, key, task: task.name, event: 'keyed_task_failed' }, 'queued task failed');
      }
    }

    queue.running = false;
    if (this.queues.get(key) === queue) {
      this.queues.delete(key);
    }
    this.notifyIdle(key);
  }

  private notifyIdle(key: string): void {
    const waiters = this.idleWaiters.get(key);
    if (!waiters) {
      return;
    }
    this.idleWaiters.delete(key);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
