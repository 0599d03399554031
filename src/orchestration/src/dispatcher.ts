/**
 * Bounded-concurrency dispatcher for calls to external services.
 * Tasks wait in FIFO order for a free slot; each running task gets an AbortSignal
 * that fires when its timeout elapses or the caller cancels.
 */

import { CancelledError, ConfigError, TimeoutError } from './errors';
import { logger } from './logger';

export type DispatchTask<T> = (signal: AbortSignal) => Promise<T>;

export interface DispatchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  label?: string;
}

interface QueuedJob {
  start: () => Promise<void>;
}

export class Dispatcher {
  private readonly queue: QueuedJob[] = [];
  private active = 0;

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError('concurrency', `must be an integer >= 1, got ${concurrency}`);
    }
  }

  get running(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  run<T>(task: DispatchTask<T>, options: DispatchOptions = {}): Promise<T> {
    const { signal, label = 'task' } = options;

    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError(label));
        return;
      }

      const onAbortWhileQueued = (): void => {
        const position = this.queue.indexOf(job);
        if (position >= 0) {
          this.queue.splice(position, 1);
          logger.debug(`Dispatcher: ${label} cancelled before start`);
          reject(new CancelledError(label));
        }
      };

      const job: QueuedJob = {
        start: () => {
          signal?.removeEventListener('abort', onAbortWhileQueued);
          return this.execute(task, options).then(resolve, reject);
        }
      };

      signal?.addEventListener('abort', onAbortWhileQueued, { once: true });
      this.queue.push(job);
      this.pump();
    });
  }

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }

      this.active++;
      void job.start().finally(() => {
        this.active--;
        this.pump();
      });
    }
  }

  private async execute<T>(task: DispatchTask<T>, options: DispatchOptions): Promise<T> {
    const { signal, timeoutMs, label = 'task' } = options;
    if (signal?.aborted) {
      throw new CancelledError(label);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const error = new TimeoutError(label, timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }

      if (signal) {
        onAbort = () => {
          const error = new CancelledError(label);
          controller.abort(error);
          reject(error);
        };
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });

    try {
      const work = Promise.resolve().then(() => task(controller.signal));
      return await Promise.race([work, guard]);
    } finally {
      clearTimeout(timer);
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }
}
