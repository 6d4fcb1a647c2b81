import type { LoopHandle, LoopWork, TaskHandle } from "./eventLoop";

export type TicketState = "created" | "submitted" | "disposed";

export class TicketStateError extends Error {
  constructor(state: TicketState) {
    super(`Dispatch ticket cannot be submitted in state "${state}"`);
    this.name = "TicketStateError";
  }
}

/**
 * One unit of work bound for the bot loop. A ticket leaves the `created`
 * state exactly once: it is either submitted or disposed.
 */
export class DispatchTicket<T> {
  private work: LoopWork<T> | null;
  private current: TicketState = "created";

  constructor(work: LoopWork<T>) {
    this.work = work;
  }

  get state(): TicketState {
    return this.current;
  }

  submitTo(loop: LoopHandle): TaskHandle<T> {
    if (this.current !== "created" || this.work === null) {
      throw new TicketStateError(this.current);
    }

    const handle = loop.submit(this.work);
    this.current = "submitted";
    this.work = null;
    return handle;
  }

  /** Releases unsubmitted work. No-op after submission. */
  dispose(): void {
    if (this.current !== "created") return;

    this.current = "disposed";
    this.work = null;
  }
}
