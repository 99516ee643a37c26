import { TaskCancelledError, TaskTimeoutError } from '../core/errors';
import { createLogger } from './logger';

const logger = createLogger('TaskQueue');

/**
 * Task function type; the signal is aborted on timeout or cancellation
 */
export type TaskFunction<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Queued task. `start` settles the caller's promise itself and never rejects.
 */
interface QueuedTask {
  id: string;
  start: () => Promise<void>;
  cancel: (error: Error) => void;
}

/**
 * Options for a single task
 */
export interface AddTaskOptions {
  id?: string;
  /** Timeout in ms, 0 disables it */
  timeout?: number;
  /** External cancellation */
  signal?: AbortSignal;
}

/**
 * Task queue options
 */
export interface TaskQueueOptions {
  /** Maximum concurrent tasks */
  maxConcurrent?: number;
  /** Default timeout in ms, 0 disables it */
  defaultTimeout?: number;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * FIFO task queue with a concurrency bound and per-task timeouts
 */
export class TaskQueue {
  private queue: QueuedTask[] = [];
  private running = 0;
  private maxConcurrent: number;
  private defaultTimeout: number;
  private debug: boolean;
  private taskCounter = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: TaskQueueOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 3;
    this.defaultTimeout = options.defaultTimeout ?? 0;
    this.debug = options.debug ?? false;
  }

  /**
   * Add a task to the queue
   */
  add<T>(fn: TaskFunction<T>, options: AddTaskOptions = {}): Promise<T> {
    const { timeout = this.defaultTimeout, id = `task-${++this.taskCounter}`, signal } = options;

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        id,
        start: () =>
          this.executeWithTimeout(id, fn, timeout, signal).then(resolve, (error: unknown) => {
            reject(error instanceof Error ? error : new Error(String(error)));
          }),
        cancel: reject,
      });

      this.log(`Task ${id} added (queue size: ${this.queue.length})`);
      this.processNext();
    });
  }

  /**
   * Start queued tasks while slots are free
   */
  private processNext(): void {
    while (this.running < this.maxConcurrent && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) return;

      this.running++;
      const startTime = Date.now();
      this.log(`Task ${task.id} started (running: ${this.running})`);

      void task.start().finally(() => {
        this.running--;
        this.log(`Task ${task.id} settled after ${Date.now() - startTime}ms`);
        this.processNext();
        this.notifyIdle();
      });
    }
  }

  /**
   * Execute task with timeout and external cancellation
   */
  private executeWithTimeout<T>(
    id: string,
    fn: TaskFunction<T>,
    timeout: number,
    external?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const finish = (): boolean => {
        if (settled) return false;
        settled = true;
        if (timeoutId) clearTimeout(timeoutId);
        external?.removeEventListener('abort', onAbort);
        return true;
      };

      const onAbort = (): void => {
        if (!finish()) return;
        const error = new TaskCancelledError(id);
        controller.abort(error);
        reject(error);
      };

      const timeoutId = timeout
        ? setTimeout(() => {
            if (!finish()) return;
            const error = new TaskTimeoutError(id, timeout);
            controller.abort(error);
            reject(error);
          }, timeout)
        : null;

      if (external?.aborted) {
        onAbort();
        return;
      }
      external?.addEventListener('abort', onAbort, { once: true });

      let pending: Promise<T>;
      try {
        pending = fn(controller.signal);
      } catch (error) {
        pending = Promise.reject(error);
      }

      void pending.then(
        (result) => {
          if (finish()) resolve(result);
        },
        (error: unknown) => {
          if (finish()) reject(error);
        }
      );
    });
  }

  /**
   * Clear all pending tasks
   */
  clear(): void {
    const cleared = this.queue.length;
    this.queue.forEach((task) => {
      task.cancel(new Error('Task queue cleared'));
    });
    this.queue = [];
    this.log(`Queue cleared (${cleared} tasks removed)`);
    this.notifyIdle();
  }

  /**
   * Get current queue status
   */
  getStatus(): { pending: number; running: number; maxConcurrent: number } {
    return {
      pending: this.queue.length,
      running: this.running,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Wait for all tasks to settle
   */
  drain(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private log(message: string): void {
    if (this.debug) {
      logger.debug(message);
    }
  }
}
