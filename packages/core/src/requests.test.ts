import { afterEach, describe, expect, it, vi } from "vitest";
import { isAbortError } from "./errors.js";
import { RequestTracker } from "./requests.js";

describe("RequestTracker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("aborts the in-flight request when the same kind starts again", () => {
    const tracker = new RequestTracker();
    const first = tracker.startRequest("logs", 0);
    const second = tracker.startRequest("logs", 0);

    expect(first.signal.aborted).toBe(true);
    expect(isAbortError(first.signal.reason)).toBe(true);
    expect(second.signal.aborted).toBe(false);
    expect(second.id).toBeGreaterThan(first.id);
    expect(tracker.isCurrent("logs", second.id)).toBe(true);
    expect(tracker.isCurrent("logs", first.id)).toBe(false);
  });

  it("leaves other kinds alone", () => {
    const tracker = new RequestTracker();
    const logs = tracker.startRequest("logs", 0);
    const spans = tracker.startRequest("spans", 0);
    tracker.startRequest("logs", 0);

    expect(logs.signal.aborted).toBe(true);
    expect(spans.signal.aborted).toBe(false);
  });

  it("only clears its own handle on done", () => {
    const tracker = new RequestTracker();
    const first = tracker.startRequest("metricsAgg", 0);
    const second = tracker.startRequest("metricsAgg", 0);

    first.done();
    expect(tracker.has("metricsAgg")).toBe(true);
    expect(tracker.isCurrent("metricsAgg", second.id)).toBe(true);

    second.done();
    expect(tracker.has("metricsAgg")).toBe(false);
    expect(second.signal.aborted).toBe(true);
  });

  it("tolerates repeated done calls", () => {
    const tracker = new RequestTracker();
    const first = tracker.startRequest("chat", 0);
    first.done();
    const second = tracker.startRequest("chat", 0);
    first.done();
    expect(tracker.isCurrent("chat", second.id)).toBe(true);
    expect(second.signal.aborted).toBe(false);
  });

  it("aborts with a timeout reason when the deadline passes", () => {
    vi.useFakeTimers();
    const tracker = new RequestTracker();
    const handle = tracker.startRequest("fieldCaps", 1000);

    vi.advanceTimersByTime(999);
    expect(handle.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(handle.signal.aborted).toBe(true);
    expect(isAbortError(handle.signal.reason)).toBe(true);
    expect(handle.signal.reason).toMatchObject({ name: "TimeoutError" });
  });

  it("clears the timeout when done before the deadline", () => {
    vi.useFakeTimers();
    const tracker = new RequestTracker();
    const handle = tracker.startRequest("logs", 1000);
    handle.done();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("follows the parent signal", () => {
    const parent = new AbortController();
    const tracker = new RequestTracker(parent.signal);
    const handle = tracker.startRequest("perspective", 0);
    parent.abort();
    expect(handle.signal.aborted).toBe(true);

    const late = tracker.startRequest("perspective", 0);
    expect(late.signal.aborted).toBe(true);
  });

  it("cancels everything on cancelAll", () => {
    const tracker = new RequestTracker();
    const a = tracker.startRequest("logs", 0);
    const b = tracker.startRequest("spans", 0);
    tracker.cancelAll();
    expect(a.signal.aborted).toBe(true);
    expect(b.signal.aborted).toBe(true);
    expect(tracker.size).toBe(0);
  });
});
