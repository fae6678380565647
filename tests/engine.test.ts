/**
 * End-to-end tests of batching, rotation and cancellation through the engine.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { BatchEngine, createBatchEngine } from "../src/core/engine.js";
import { Dispatcher, type DispatchOutcome } from "../src/core/dispatch.js";
import { KeyRotator } from "../src/core/keyRotator.js";
import { PendingRequestStore } from "../src/core/pendingStore.js";
import { DebounceScheduler } from "../src/core/scheduler.js";
import type { OwnerId } from "../src/core/types.js";
import { RecordingNotifier, fakeClient, flush, type GenerateImpl } from "./fakes.js";

const QUIET_MS = 60_000;
const TIMEOUT_MS = 30_000;

function setup(keys: string[], impl?: GenerateImpl) {
  const store = new PendingRequestStore();
  const scheduler = new DebounceScheduler();
  const rotator = new KeyRotator(keys);
  const notifier = new RecordingNotifier();
  const { client, generate } = fakeClient(impl);
  const outcomes: Array<{ owner: OwnerId; id: string; outcome: DispatchOutcome }> = [];
  const engine = new BatchEngine({
    store,
    scheduler,
    dispatcher: new Dispatcher({ store, rotator, client, notifier, timeoutMs: TIMEOUT_MS }),
    quietPeriodMs: QUIET_MS,
    onDispatched: (owner, id, outcome) => outcomes.push({ owner, id, outcome }),
  });
  return { engine, store, scheduler, rotator, notifier, generate, outcomes };
}

/** Advance fake time, then let dispatches run to completion. */
async function advance(ms: number) {
  await vi.advanceTimersByTimeAsync(ms);
  await flush();
}

describe("BatchEngine", () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0, toFake: ["setTimeout", "clearTimeout", "Date"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("merges a follow-up within the quiet period and dispatches once with the next key", async () => {
    const { engine, scheduler, rotator, generate, notifier } = setup(["K1", "K2"]);

    // An earlier request from someone else consumes K1
    engine.onText("U0", "warmup");
    await advance(QUIET_MS);
    expect(generate.mock.calls[0]?.[0]).toEqual({ text: "warmup", credential: "K1" });

    // t = 60s
    expect(engine.onText("U1", "A")).toEqual({ id: "U1_60", merged: false });
    await advance(10_000);
    expect(engine.onText("U1", "B")).toEqual({ id: "U1_70", merged: true });
    expect(scheduler.state("U1_60")).toBeUndefined();
    expect(scheduler.state("U1_70")).toBe("scheduled");

    await advance(QUIET_MS - 1);
    expect(generate).toHaveBeenCalledTimes(1);

    await advance(1);
    expect(generate).toHaveBeenCalledTimes(2);
    expect(generate.mock.calls[1]?.[0]).toEqual({ text: "A\n\nAddendum:\nB", credential: "K2" });
    expect(notifier.textsFor("U1")).toEqual([
      "🔄 Processing request U1_70",
      "✨【Response to request U1_70】✨\n\nanswer to: A\n\nAddendum:\nB\n\n📌 End of response",
    ]);
    expect(rotator.cursor).toBe(0);
    expect(scheduler.size).toBe(0);
  });

  it("folds any number of messages in one window into a single dispatch", async () => {
    const { engine, generate } = setup(["K1"]);

    engine.onText(5, "one");
    await advance(20_000);
    engine.onText(5, "two");
    await advance(20_000);
    engine.onText(5, "three");
    await advance(QUIET_MS);

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0].text).toBe("one\n\nAddendum:\ntwo\n\nAddendum:\nthree");
  });

  it("dispatches each group separated by a quiet period on its own", async () => {
    const { engine, generate } = setup(["K1", "K2"]);

    engine.onText(5, "first");
    engine.onText(5, "group");
    await advance(QUIET_MS);
    engine.onText(5, "second");
    await advance(QUIET_MS);

    expect(generate.mock.calls.map((c) => c[0])).toEqual([
      { text: "first\n\nAddendum:\ngroup", credential: "K1" },
      { text: "second", credential: "K2" },
    ]);
  });

  it("shares a single credential across owners firing on the same tick", async () => {
    const { engine, rotator, generate } = setup(["ONLY"]);

    engine.onText("a", "x");
    engine.onText("b", "y");
    await advance(QUIET_MS);

    expect(generate.mock.calls.map((c) => c[0].credential)).toEqual(["ONLY", "ONLY"]);
    expect(rotator.cursor).toBe(0);
  });

  it("merges a message handled just before expiry", async () => {
    const { engine, generate } = setup(["K1"]);

    engine.onText(1, "A");
    await advance(QUIET_MS - 1);
    expect(engine.onText(1, "B").merged).toBe(true);
    await advance(QUIET_MS);

    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0].text).toBe("A\n\nAddendum:\nB");
  });

  it("starts a new request for a message handled after the timer fired", async () => {
    const { engine, generate } = setup(["K1"]);

    engine.onText(1, "A");
    await vi.advanceTimersByTimeAsync(QUIET_MS);
    expect(engine.onText(1, "B")).toEqual({ id: "1_60", merged: false });
    await advance(QUIET_MS);

    expect(generate.mock.calls.map((c) => c[0].text)).toEqual(["A", "B"]);
  });

  it("gives a request sent again after /cancel a fresh id", async () => {
    const { engine, generate, notifier } = setup(["K1"]);

    expect(engine.onText(1, "A").id).toBe("1_0");
    engine.onCancel(1);
    expect(engine.onText(1, "B")).toEqual({ id: "1_0-2", merged: false });
    await advance(QUIET_MS);

    expect(generate.mock.calls.map((c) => c[0].text)).toEqual(["B"]);
    expect(notifier.textsFor(1)[0]).toBe("🔄 Processing request 1_0-2");
  });

  it("keeps ids apart when a short quiet period fires within the same second", async () => {
    let release: (text: string) => void = () => {};
    const notifier = new RecordingNotifier();
    const { client } = fakeClient((req) =>
      req.text === "A" ? new Promise<string>((resolve) => { release = resolve; }) : Promise.resolve("quick")
    );
    const engine = createBatchEngine({
      credentials: ["K1"],
      client,
      notifier,
      quietPeriodMs: 200,
      timeoutMs: TIMEOUT_MS,
    });

    engine.onText(1, "A");
    await advance(200);
    expect(engine.onText(1, "B")).toEqual({ id: "1_0-2", merged: false });
    await advance(200);
    release("slow");
    await flush();

    expect(notifier.textsFor(1)).toEqual([
      "🔄 Processing request 1_0",
      "🔄 Processing request 1_0-2",
      "✨【Response to request 1_0-2】✨\n\nquick\n\n📌 End of response",
      "✨【Response to request 1_0】✨\n\nslow\n\n📌 End of response",
    ]);
  });

  it("reports pending requests for status queries", () => {
    const { engine } = setup(["K1"]);

    engine.onText("u", "x".repeat(60));
    expect(engine.onStatusQuery("u")).toEqual([
      { id: "u_0", preview: `${"x".repeat(50)}...`, createdAt: 0, status: "awaiting processing" },
    ]);
    expect(engine.onStatusQuery("nobody")).toEqual([]);
  });

  it("cancels a pending request so it is never sent", async () => {
    const { engine, generate, notifier, scheduler } = setup(["K1"]);

    engine.onText(1, "A");
    expect(engine.onCancel(1)).toBe(1);
    expect(scheduler.size).toBe(0);
    await advance(QUIET_MS * 2);

    expect(generate).not.toHaveBeenCalled();
    expect(notifier.sent).toEqual([]);
    expect(engine.pendingCount).toBe(0);
  });

  it("cancel with nothing pending returns 0 and leaves other state alone", () => {
    const { engine, rotator, scheduler } = setup(["K1", "K2"]);

    engine.onText("other", "keep me");
    expect(engine.onCancel("idle")).toBe(0);
    expect(engine.onCancel("idle")).toBe(0);

    expect(engine.pendingCount).toBe(1);
    expect(scheduler.state("other_0")).toBe("scheduled");
    expect(rotator.cursor).toBe(0);
  });

  it("cancel after the timer fired does not disturb the in-flight dispatch", async () => {
    let release: (text: string) => void = () => {};
    const { engine, notifier, outcomes } = setup(["K1"], () =>
      new Promise<string>((resolve) => { release = resolve; })
    );

    engine.onText(1, "A");
    await advance(QUIET_MS);
    expect(engine.onCancel(1)).toBe(0);

    release("late answer");
    await flush();

    expect(notifier.textsFor(1)).toEqual([
      "🔄 Processing request 1_0",
      "✨【Response to request 1_0】✨\n\nlate answer\n\n📌 End of response",
    ]);
    expect(outcomes).toEqual([{ owner: 1, id: "1_0", outcome: "delivered" }]);
  });

  it("sends one failure notice when the upstream call times out", async () => {
    const { engine, store, rotator, notifier, outcomes } = setup(["K1", "K2"], () =>
      new Promise<string>(() => {})
    );

    engine.onText(9, "slow");
    await advance(QUIET_MS);
    await advance(TIMEOUT_MS);

    expect(notifier.textsFor(9)).toEqual([
      "🔄 Processing request 9_0",
      "❌ Request 9_0 failed: the generation service did not answer in time.",
    ]);
    expect(store.get(9)).toBeUndefined();
    expect(rotator.cursor).toBe(1);
    expect(outcomes).toEqual([{ owner: 9, id: "9_0", outcome: "failed" }]);
  });

  it("shutdown drops every pending timer", async () => {
    const { engine, generate } = setup(["K1"]);

    engine.onText(1, "A");
    engine.onText(2, "B");
    expect(engine.shutdown()).toBe(2);
    await advance(QUIET_MS);

    expect(generate).not.toHaveBeenCalled();
  });
});

describe("createBatchEngine", () => {
  beforeEach(() => {
    vi.useFakeTimers({ now: 0, toFake: ["setTimeout", "clearTimeout", "Date"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("wires the parts together with the given prefix", async () => {
    const notifier = new RecordingNotifier();
    const { client, generate } = fakeClient();
    const engine = createBatchEngine({
      credentials: ["K1"],
      client,
      notifier,
      quietPeriodMs: 1_000,
      timeoutMs: 500,
      promptPrefix: "Reply in French.",
    });

    engine.onText(3, "hello");
    await advance(1_000);

    expect(generate.mock.calls[0]?.[0]).toEqual({ text: "Reply in French.\n\nhello", credential: "K1" });
    expect(engine.quietPeriodMs).toBe(1_000);
  });
});
