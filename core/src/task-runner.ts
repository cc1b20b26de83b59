import { Logger } from './logger';

export interface TaskHandle {
  readonly id: number;
}

export type Task<T> = () => T | Promise<T>;

/**
 * Runs blocking gateway calls off the caller's stack and hands the outcome
 * back through callbacks. Exactly one of onResult/onError fires per task,
 * unless the task was cancelled first.
 */
export class BackgroundTaskRunner {
  private log: Logger;
  private nextId = 1;
  private queued = new Map<number, NodeJS.Immediate>();
  private running = new Set<number>();
  private cancelled = new Set<number>();

  constructor(logger: Logger) {
    this.log = logger.child({ component: 'task-runner' });
  }

  /** Tasks scheduled but not yet started. */
  get pending(): number {
    return this.queued.size;
  }

  run<T>(task: Task<T>, onResult: (value: T) => void, onError?: (error: Error) => void): TaskHandle {
    const id = this.nextId++;

    const immediate = setImmediate(() => {
      this.queued.delete(id);
      this.running.add(id);

      void Promise.resolve()
        .then(task)
        .then(
          value => this.deliver(id, () => onResult(value)),
          (error: unknown) => this.deliver(id, () => this.fail(id, error, onError)),
        );
    });

    this.queued.set(id, immediate);
    return { id };
  }

  runAsync<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.run(task, resolve, reject);
    });
  }

  /**
   * A queued task is dropped outright. A task already running still finishes,
   * but its callbacks are skipped. Returns false for unknown or finished tasks.
   */
  cancel(handle: TaskHandle): boolean {
    const immediate = this.queued.get(handle.id);
    if (immediate) {
      clearImmediate(immediate);
      this.queued.delete(handle.id);
      return true;
    }
    if (this.running.has(handle.id)) {
      this.cancelled.add(handle.id);
      return true;
    }
    return false;
  }

  private deliver(id: number, callback: () => void): void {
    this.running.delete(id);
    if (this.cancelled.delete(id)) {
      this.log.debug({ taskId: id }, 'Skipping callbacks of cancelled task');
      return;
    }
    try {
      callback();
    } catch (err) {
      this.log.error({ err, taskId: id }, 'Task callback threw');
    }
  }

  private fail(id: number, error: unknown, onError?: (error: Error) => void): void {
    const err = error instanceof Error ? error : new Error(String(error));
    if (onError) {
      onError(err);
    } else {
      this.log.error({ err, taskId: id }, 'Background task failed');
    }
  }
}
