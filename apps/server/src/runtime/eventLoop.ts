export type LoopWork<T> = () => Promise<T>;

export type TaskOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export interface TaskHandle<T> {
  readonly id: number;
  /** Settles when the work finishes. Never rejects. */
  readonly done: Promise<TaskOutcome<T>>;
}

export interface LoopHandle {
  isClosed(): boolean;
  /** Thread-safe handoff onto the loop. Throws LoopClosedError once closed. */
  submit<T>(work: LoopWork<T>): TaskHandle<T>;
}

export class LoopClosedError extends Error {
  constructor() {
    super("Bot event loop is closed");
    this.name = "LoopClosedError";
  }
}

type LoopOptions = {
  concurrency?: number;
  onError?: (error: unknown, taskId: number) => void;
};

type PendingTask = {
  id: number;
  run: () => Promise<void>;
};

/**
 * The bot's cooperative scheduler. Everything that talks to the chat
 * platform runs here; other parts of the process hand work over through
 * `submit` and never touch the bot directly.
 */
export class BotEventLoop implements LoopHandle {
  private readonly queue: PendingTask[] = [];
  private readonly concurrency: number;
  private readonly onError?: (error: unknown, taskId: number) => void;
  private readonly idleWaiters: Array<() => void> = [];
  private inFlight = 0;
  private nextId = 1;
  private closed = false;

  constructor(options: LoopOptions = {}) {
    this.concurrency = options.concurrency ?? 1;
    this.onError = options.onError;
  }

  isClosed(): boolean {
    return this.closed;
  }

  submit<T>(work: LoopWork<T>): TaskHandle<T> {
    if (this.closed) {
      throw new LoopClosedError();
    }

    const id = this.nextId;
    this.nextId += 1;

    let settle: (outcome: TaskOutcome<T>) => void = () => undefined;
    const done = new Promise<TaskOutcome<T>>((resolve) => {
      settle = resolve;
    });

    this.queue.push({
      id,
      run: async () => {
        try {
          settle({ ok: true, value: await work() });
        } catch (error) {
          settle({ ok: false, error });
          this.reportError(error, id);
        }
      }
    });
    this.drain();

    return { id, done };
  }

  /** Stops accepting work and resolves once queued and running tasks finish. */
  async close(): Promise<void> {
    this.closed = true;
    await this.whenIdle();
  }

  whenIdle(): Promise<void> {
    if (this.inFlight === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.inFlight < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (task === undefined) continue;

      this.inFlight += 1;

      // Work never starts inside the submitter's call stack.
      void Promise.resolve()
        .then(() => task.run())
        .finally(() => {
          this.inFlight -= 1;
          this.drain();
          this.notifyIdle();
        });
    }
  }

  private reportError(error: unknown, taskId: number): void {
    if (!this.onError) return;

    try {
      this.onError(error, taskId);
    } catch (hookError) {
      // A failing hook must not stall the loop or leak a rejection.
      process.emitWarning(
        `Bot loop onError hook failed for task ${taskId}: ${String(hookError)}`,
        "BotEventLoopWarning"
      );
    }
  }

  private notifyIdle(): void {
    if (this.inFlight > 0 || this.queue.length > 0) return;

    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
