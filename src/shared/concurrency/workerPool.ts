export class WorkerPoolFullError extends Error {
  readonly code = "worker_pool_full";
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Worker pool is full (capacity=${capacity})`);
    this.name = "WorkerPoolFullError";
    this.capacity = capacity;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type WorkerPoolOptions = {
  concurrency: number;
  // running + waiting tasks
  capacity: number;
  onTaskError?: (err: unknown) => void;
};

// A held place in the pool: exactly one of submit() or release() may be called.
export type WorkerSlot = {
  submit: (task: () => Promise<void>) => void;
  release: () => void;
};

export type WorkerPool = {
  submit: (task: () => Promise<void>) => void;
  reserve: () => WorkerSlot;
  hasCapacity: () => boolean;
  size: () => { active: number; queued: number; reserved: number };
  drain: () => Promise<void>;
};

/**
 * Bounded worker pool fed by an in-process FIFO queue.
 * Usage:
 *   const pool = createWorkerPool({ concurrency: 4, capacity: 100 });
 *   pool.submit(() => doWork());   // throws WorkerPoolFullError when full
 *   const slot = pool.reserve();   // hold a place across an await
 *   slot.submit(() => doWork());   // or slot.release()
 */
export const createWorkerPool = (opts: WorkerPoolOptions): WorkerPool => {
  const { concurrency, capacity, onTaskError } = opts;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }
  if (!Number.isInteger(capacity) || capacity < concurrency) {
    throw new Error("capacity must be an integer >= concurrency");
  }

  let active = 0;
  let reserved = 0;
  const queue: Array<() => Promise<void>> = [];
  let idleWaiters: Array<() => void> = [];

  const notifyIfIdle = () => {
    if (active > 0 || queue.length > 0 || reserved > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  };

  const next = () => {
    if (active >= concurrency) return;
    const task = queue.shift();
    if (!task) {
      notifyIfIdle();
      return;
    }
    active += 1;
    // Defer so submit() never runs the task on the caller's stack.
    setImmediate(() => {
      void Promise.resolve()
        .then(task)
        .catch((err: unknown) => {
          onTaskError?.(err);
        })
        .finally(() => {
          active -= 1;
          next();
        });
    });
  };

  const used = () => active + queue.length + reserved;

  const reserve = (): WorkerSlot => {
    if (used() >= capacity) {
      throw new WorkerPoolFullError(capacity);
    }
    reserved += 1;
    let settled = false;
    const settle = () => {
      if (settled) throw new Error("worker slot already used");
      settled = true;
      reserved -= 1;
    };
    return {
      submit: (task) => {
        settle();
        queue.push(task);
        next();
      },
      release: () => {
        settle();
        notifyIfIdle();
      }
    };
  };

  return {
    submit: (task) => reserve().submit(task),
    reserve,
    hasCapacity: () => used() < capacity,
    size: () => ({ active, queued: queue.length, reserved }),
    drain: () =>
      new Promise<void>((resolve) => {
        if (used() === 0) {
          resolve();
          return;
        }
        idleWaiters.push(resolve);
      })
  };
};
