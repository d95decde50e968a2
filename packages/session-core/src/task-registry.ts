import { errorMessage } from './errors.js';
import type { Logger } from './types.js';
import { noopLogger } from './types.js';

export type TaskStatus = 'running' | 'succeeded' | 'failed' | 'cancelled';

export type TaskOutcome<T> =
  | { readonly status: 'succeeded'; readonly value: T }
  | { readonly status: 'failed'; readonly error: string }
  | { readonly status: 'cancelled' };

export interface TaskHandle<T> {
  readonly id: string;
  readonly signal: AbortSignal;
  readonly startedAt: string;
  status(): TaskStatus;
  /** Never rejects. */
  result(): Promise<TaskOutcome<T>>;
}

interface TaskRecord {
  readonly id: string;
  readonly controller: AbortController;
  readonly startedAt: string;
  status: TaskStatus;
  readonly done: Promise<TaskOutcome<unknown>>;
}

export class TaskCancelledError extends Error {
  public constructor(taskId: string) {
    super(`Task ${taskId} cancelled`);
    this.name = 'TaskCancelledError';
  }
}

/**
 * Background tasks addressed by id. Cancellation is cooperative: the task's
 * signal aborts and the task stops at its next check.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly logger: Logger;

  public constructor(logger: Logger = noopLogger) {
    this.logger = logger;
  }

  /** Starts `run` under `id`; a still-running task with the same id is cancelled first. */
  public spawn<T>(id: string, run: (signal: AbortSignal) => Promise<T>): TaskHandle<T> {
    this.cancel(id);

    const controller = new AbortController();
    const startedAt = new Date().toISOString();
    let record: TaskRecord | null = null;

    const settle = (status: TaskStatus): void => {
      if (record && record.status === 'running') record.status = status;
    };

    const done: Promise<TaskOutcome<T>> = Promise.resolve()
      .then(() => run(controller.signal))
      .then(
        (value): TaskOutcome<T> => {
          if (controller.signal.aborted) {
            settle('cancelled');
            return { status: 'cancelled' };
          }
          settle('succeeded');
          return { status: 'succeeded', value };
        },
        (err: unknown): TaskOutcome<T> => {
          if (controller.signal.aborted) {
            settle('cancelled');
            return { status: 'cancelled' };
          }
          settle('failed');
          this.logger.warn('background_task_failed', { taskId: id, message: errorMessage(err) });
          return { status: 'failed', error: errorMessage(err) };
        }
      );

    const created: TaskRecord = { id, controller, startedAt, status: 'running', done };
    record = created;
    this.tasks.set(id, created);

    return {
      id,
      signal: controller.signal,
      startedAt,
      status: () => created.status,
      result: () => done,
    };
  }

  /** Returns false when the task is unknown or already finished. */
  public cancel(id: string): boolean {
    const record = this.tasks.get(id);
    if (!record || record.status !== 'running') return false;
    record.status = 'cancelled';
    record.controller.abort(new TaskCancelledError(id));
    return true;
  }

  public status(id: string): TaskStatus | undefined {
    return this.tasks.get(id)?.status;
  }

  public async wait(id: string): Promise<TaskOutcome<unknown> | undefined> {
    return this.tasks.get(id)?.done;
  }

  public isRunning(id: string): boolean {
    return this.tasks.get(id)?.status === 'running';
  }

  /** Drops finished tasks from the registry. */
  public prune(): number {
    let removed = 0;
    for (const [id, record] of this.tasks) {
      if (record.status !== 'running') {
        this.tasks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  public cancelAll(): void {
    for (const id of this.tasks.keys()) {
      this.cancel(id);
    }
  }
}
