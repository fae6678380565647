/**
 * Debounce scheduler: one cancellable delayed task per request id.
 *
 * Each handle goes scheduled -> fired | cancelled. A fired handle stays in the
 * table until its onFire promise settles, so cancel() on it is a no-op rather
 * than a miss.
 *
 * All table mutations run synchronously on the event loop. A message handled
 * before the timer callback runs cancels the handle and merges; once the
 * callback has run the handle is fired and the next message starts a new
 * request. When both land on the same tick, the event that Node dequeues first
 * wins.
 */
import { log } from "../utils/log.js";

const logger = log.scope("scheduler");

export type TimerState = "scheduled" | "fired" | "cancelled";

export type FireHandler = (id: string) => void | Promise<void>;

interface TimerHandle {
  state: TimerState;
  timer: ReturnType<typeof setTimeout>;
}

export class DebounceScheduler {
  private readonly handles = new Map<string, TimerHandle>();

  schedule(id: string, delayMs: number, onFire: FireHandler): void {
    this.cancel(id);

    const handle: TimerHandle = {
      state: "scheduled",
      timer: setTimeout(() => {
        void this.fire(id, handle, onFire);
      }, delayMs),
    };
    this.handles.set(id, handle);
    logger.debug(`Scheduled ${id} in ${delayMs}ms`);
  }

  /** Returns true if a scheduled handle was cancelled. */
  cancel(id: string): boolean {
    const handle = this.handles.get(id);
    if (!handle || handle.state !== "scheduled") return false;
    clearTimeout(handle.timer);
    handle.state = "cancelled";
    this.handles.delete(id);
    logger.debug(`Cancelled ${id}`);
    return true;
  }

  /** Current state of a live handle; undefined once retired. */
  state(id: string): TimerState | undefined {
    return this.handles.get(id)?.state;
  }

  get size(): number {
    return this.handles.size;
  }

  /** Cancels every scheduled handle. In-flight fires run to completion. */
  shutdown(): number {
    let cancelled = 0;
    for (const id of [...this.handles.keys()]) {
      if (this.cancel(id)) cancelled++;
    }
    return cancelled;
  }

  private async fire(id: string, handle: TimerHandle, onFire: FireHandler): Promise<void> {
    if (handle.state !== "scheduled" || this.handles.get(id) !== handle) return;
    handle.state = "fired";
    try {
      await onFire(id);
    } catch (err) {
      logger.error(`Fire handler for ${id} failed:`, err);
    } finally {
      if (this.handles.get(id) === handle) {
        this.handles.delete(id);
      }
    }
  }
}
