/**
 * Shared types for the batching core.
 */

/** Stable identity of a message sender (the Telegram user id). */
export type OwnerId = number | string;

/** Merged prompt text awaiting dispatch for one owner. */
export interface AggregatedRequest {
  owner: OwnerId;
  id: string;
  text: string;
  /** Epoch ms at which the current id was minted. */
  createdAt: number;
}

export interface RequestSummary {
  id: string;
  preview: string;
  createdAt: number;
  status: "awaiting processing";
}

/** Outbound channel to the user. Implementations throw NotificationError. */
export interface Notifier {
  notify(owner: OwnerId, text: string): Promise<void>;
}

export class NotificationError extends Error {
  constructor(readonly owner: OwnerId, cause: unknown) {
    super(
      `Failed to notify ${owner}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "NotificationError";
  }
}
