/**
 * Per-owner pending request store.
 * Holds at most one aggregated request per owner. A merge mints a new id and
 * reports the retired one; cancelling the retired id's timer is the caller's job.
 */
import type { AggregatedRequest, OwnerId, RequestSummary } from "./types.js";

export const MERGE_SEPARATOR = "\n\nAddendum:\n";
const PREVIEW_LENGTH = 50;

export interface UpsertResult {
  id: string;
  merged: boolean;
  /** Id superseded by this merge, if any. */
  retiredId?: string;
}

/**
 * Request ids are `<owner>_<unix seconds>`. When that equals the owner's
 * previously issued id (two requests within the same second) a `-<n>` suffix
 * keeps the new id distinct.
 */
export function makeRequestId(owner: OwnerId, now: number, previousId?: string): string {
  const base = `${owner}_${Math.floor(now / 1000)}`;
  if (!previousId) return base;
  if (previousId === base) return `${base}-2`;
  if (previousId.startsWith(`${base}-`)) {
    const n = Number(previousId.slice(base.length + 1));
    return `${base}-${Number.isInteger(n) ? n + 1 : 2}`;
  }
  return base;
}

/** First 50 code points, so a surrogate pair is never split. */
export function previewText(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join("")}...` : text;
}

export class PendingRequestStore {
  private readonly byOwner = new Map<OwnerId, AggregatedRequest>();
  // Outlives take() and clear() so a later request never reuses an id
  private readonly lastIssued = new Map<OwnerId, string>();

  upsert(owner: OwnerId, text: string, now: number): UpsertResult {
    const existing = this.byOwner.get(owner);
    const id = makeRequestId(owner, now, this.lastIssued.get(owner));
    this.lastIssued.set(owner, id);

    if (!existing) {
      this.byOwner.set(owner, { owner, id, text, createdAt: now });
      return { id, merged: false };
    }

    this.byOwner.set(owner, {
      owner,
      id,
      text: existing.text + MERGE_SEPARATOR + text,
      createdAt: now,
    });
    return { id, merged: true, retiredId: existing.id };
  }

  /** Removes the owner's entry only if its current id is `id`. */
  take(owner: OwnerId, id: string): AggregatedRequest | undefined {
    const entry = this.byOwner.get(owner);
    if (!entry || entry.id !== id) return undefined;
    this.byOwner.delete(owner);
    return entry;
  }

  get(owner: OwnerId): AggregatedRequest | undefined {
    const entry = this.byOwner.get(owner);
    return entry ? { ...entry } : undefined;
  }

  peekAll(owner: OwnerId): RequestSummary[] {
    const entry = this.byOwner.get(owner);
    if (!entry) return [];
    return [
      {
        id: entry.id,
        preview: previewText(entry.text),
        createdAt: entry.createdAt,
        status: "awaiting processing",
      },
    ];
  }

  /** Removes and returns the owner's entry so its timer can be cancelled. */
  clear(owner: OwnerId): AggregatedRequest | undefined {
    const entry = this.byOwner.get(owner);
    if (!entry) return undefined;
    this.byOwner.delete(owner);
    return entry;
  }

  get size(): number {
    return this.byOwner.size;
  }
}
