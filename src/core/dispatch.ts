/**
 * Dispatch step: take a finished request from the store, spend one credential
 * on a single generation call and deliver the outcome to the owner.
 * Every per-request failure ends here as a notice to that owner.
 */
import type { GenerationClient } from "../llm/gemini.js";
import {
  GenerationError,
  TimeoutError,
  UpstreamError,
  toGenerationError,
} from "../llm/errors.js";
import { log } from "../utils/log.js";
import type { KeyRotator } from "./keyRotator.js";
import type { PendingRequestStore } from "./pendingStore.js";
import type { Notifier, OwnerId } from "./types.js";

const logger = log.scope("dispatch");

export type DispatchOutcome = "superseded" | "delivered" | "failed";

export interface DispatcherOptions {
  store: PendingRequestStore;
  rotator: KeyRotator;
  client: GenerationClient;
  notifier: Notifier;
  timeoutMs: number;
  /** Instruction text placed before every aggregated request. */
  promptPrefix?: string;
}

export function buildPrompt(text: string, prefix?: string): string {
  return prefix ? `${prefix}\n\n${text}` : text;
}

export function formatStarted(id: string): string {
  return `🔄 Processing request ${id}`;
}

export function formatResponse(id: string, text: string): string {
  return `✨【Response to request ${id}】✨\n\n${text}\n\n📌 End of response`;
}

const FAILURE_REASONS: Record<GenerationError["kind"], string> = {
  upstream: "the generation service returned an error",
  network: "the generation service could not be reached",
  malformed: "the generation service sent an unreadable response",
  timeout: "the generation service did not answer in time",
};

export function formatFailure(id: string, err: GenerationError): string {
  const status = err instanceof UpstreamError ? ` (${err.status})` : "";
  return `❌ Request ${id} failed: ${FAILURE_REASONS[err.kind]}${status}.`;
}

/**
 * Runs `call` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with TimeoutError at the deadline even if `call` ignores the
 * signal.
 */
export function withTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);

    Promise.resolve()
      .then(() => call(controller.signal))
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(controller.signal.aborted ? new TimeoutError(timeoutMs) : err);
        }
      );
  });
}

export class Dispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  async dispatch(owner: OwnerId, id: string): Promise<DispatchOutcome> {
    const { store, rotator, client, timeoutMs, promptPrefix } = this.options;

    const request = store.take(owner, id);
    if (!request) {
      logger.debug(`Request ${id} was superseded, skipping`);
      return "superseded";
    }

    await this.safeNotify(owner, formatStarted(id));

    const keyIndex = rotator.cursor;
    const credential = rotator.next();
    const prompt = buildPrompt(request.text, promptPrefix);
    logger.info(`Sending request ${id} (${prompt.length} chars, key #${keyIndex + 1}/${rotator.size})`);

    let answer: string;
    try {
      answer = await withTimeout(
        (signal) => client.generate({ text: prompt, credential }, { signal }),
        timeoutMs
      );
    } catch (err) {
      const failure = toGenerationError(err);
      logger.error(`Request ${id} failed (${failure.kind}): ${failure.message}`);
      await this.safeNotify(owner, formatFailure(id, failure));
      return "failed";
    }

    logger.info(`Request ${id} answered (${answer.length} chars)`);
    await this.safeNotify(owner, formatResponse(id, answer));
    return "delivered";
  }

  private async safeNotify(owner: OwnerId, text: string): Promise<void> {
    try {
      await this.options.notifier.notify(owner, text);
    } catch (err) {
      logger.warn(`Notification to ${owner} dropped:`, err);
    }
  }
}
