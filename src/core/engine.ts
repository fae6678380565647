/**
 * Batch engine: the inbound surface of the core.
 * Merges each owner's messages within the quiet period into one request and
 * hands it to the dispatcher when the period elapses without new input.
 */
import { log } from "../utils/log.js";
import type { GenerationClient } from "../llm/gemini.js";
import { Dispatcher, type DispatchOutcome } from "./dispatch.js";
import { KeyRotator } from "./keyRotator.js";
import { PendingRequestStore } from "./pendingStore.js";
import { DebounceScheduler } from "./scheduler.js";
import type { Notifier, OwnerId, RequestSummary } from "./types.js";

const logger = log.scope("engine");

export interface BatchEngineOptions {
  store: PendingRequestStore;
  scheduler: DebounceScheduler;
  dispatcher: Dispatcher;
  quietPeriodMs: number;
  /** Called after every dispatch attempt settles. */
  onDispatched?: (owner: OwnerId, id: string, outcome: DispatchOutcome) => void;
}

export interface AcceptedText {
  id: string;
  merged: boolean;
}

export class BatchEngine {
  constructor(private readonly options: BatchEngineOptions) {}

  get quietPeriodMs(): number {
    return this.options.quietPeriodMs;
  }

  /**
   * Stores or merges `text` and (re)arms the owner's timer. The retired id's
   * timer is cancelled and the new one installed in the same synchronous turn,
   * so at most one timer per owner is ever live.
   */
  onText(owner: OwnerId, text: string, now: number = Date.now()): AcceptedText {
    const { store, scheduler, quietPeriodMs } = this.options;

    const { id, merged, retiredId } = store.upsert(owner, text, now);
    if (retiredId) {
      scheduler.cancel(retiredId);
      logger.info(`Merged request ${retiredId} into ${id} for ${owner}`);
    } else {
      logger.info(`New request ${id} for ${owner}`);
    }
    scheduler.schedule(id, quietPeriodMs, (firedId) => this.fire(owner, firedId));

    return { id, merged };
  }

  onStatusQuery(owner: OwnerId): RequestSummary[] {
    return this.options.store.peekAll(owner);
  }

  /** Cancels the owner's pending request, if any. Returns how many were cancelled. */
  onCancel(owner: OwnerId): number {
    const removed = this.options.store.clear(owner);
    if (!removed) return 0;
    this.options.scheduler.cancel(removed.id);
    logger.info(`Cancelled request ${removed.id} for ${owner}`);
    return 1;
  }

  get pendingCount(): number {
    return this.options.store.size;
  }

  /** Stops every pending timer; requests already being dispatched finish. */
  shutdown(): number {
    return this.options.scheduler.shutdown();
  }

  private async fire(owner: OwnerId, id: string): Promise<void> {
    const outcome = await this.options.dispatcher.dispatch(owner, id);
    this.options.onDispatched?.(owner, id, outcome);
  }
}

export interface CreateEngineOptions {
  credentials: readonly string[];
  client: GenerationClient;
  notifier: Notifier;
  quietPeriodMs: number;
  timeoutMs: number;
  promptPrefix?: string;
  onDispatched?: BatchEngineOptions["onDispatched"];
}

/** Wires a store, scheduler, rotator and dispatcher into an engine. */
export function createBatchEngine(options: CreateEngineOptions): BatchEngine {
  const store = new PendingRequestStore();
  const dispatcher = new Dispatcher({
    store,
    rotator: new KeyRotator(options.credentials),
    client: options.client,
    notifier: options.notifier,
    timeoutMs: options.timeoutMs,
    promptPrefix: options.promptPrefix,
  });
  return new BatchEngine({
    store,
    scheduler: new DebounceScheduler(),
    dispatcher,
    quietPeriodMs: options.quietPeriodMs,
    onDispatched: options.onDispatched,
  });
}
