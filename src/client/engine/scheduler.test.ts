import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RecomputeScheduler, shouldRecomputeImmediately } from "./scheduler";

describe("shouldRecomputeImmediately", () => {
  it("fires for heading and list prefixes under the cursor", () => {
    expect(shouldRecomputeImmediately("# ", 2)).toBe(true);
    expect(shouldRecomputeImmediately("- ", 2)).toBe(true);
    expect(shouldRecomputeImmediately("1. x", 4)).toBe(true);
    expect(shouldRecomputeImmediately("  - [ ] nested", 14)).toBe(true);
  });

  it("waits for plain text", () => {
    expect(shouldRecomputeImmediately("hello", 5)).toBe(false);
    expect(shouldRecomputeImmediately("#tag", 4)).toBe(false);
  });

  it("looks only at the line holding the cursor", () => {
    expect(shouldRecomputeImmediately("plain\n- a", 1)).toBe(false);
    expect(shouldRecomputeImmediately("plain\n- a", 9)).toBe(true);
  });
});

describe("RecomputeScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("debounces ordinary edits", () => {
    const recompute = vi.fn();
    const scheduler = new RecomputeScheduler(recompute, { debounceMs: 50 });

    expect(scheduler.textChanged("h", 1)).toBe("debounced");
    expect(scheduler.pending).toBe(true);
    vi.advanceTimersByTime(49);
    expect(recompute).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(recompute).toHaveBeenCalledTimes(1);
    expect(scheduler.pending).toBe(false);
  });

  it("restarts the timer on every edit so only the last one runs", () => {
    const recompute = vi.fn();
    const scheduler = new RecomputeScheduler(recompute, { debounceMs: 50 });

    scheduler.textChanged("h", 1);
    vi.advanceTimersByTime(30);
    scheduler.textChanged("he", 2);
    vi.advanceTimersByTime(30);
    expect(recompute).not.toHaveBeenCalled();
    vi.advanceTimersByTime(20);
    expect(recompute).toHaveBeenCalledTimes(1);
  });

  it("runs heading and list edits at once and drops the pending timer", () => {
    const recompute = vi.fn();
    const scheduler = new RecomputeScheduler(recompute, { debounceMs: 50 });

    scheduler.textChanged("h", 1);
    expect(scheduler.textChanged("# h", 3)).toBe("immediate");
    expect(recompute).toHaveBeenCalledTimes(1);
    expect(scheduler.pending).toBe(false);
    vi.advanceTimersByTime(100);
    expect(recompute).toHaveBeenCalledTimes(1);
  });

  it("recomputes immediately when only the selection moves", () => {
    const recompute = vi.fn();
    const scheduler = new RecomputeScheduler(recompute);
    scheduler.selectionChanged();
    expect(recompute).toHaveBeenCalledTimes(1);
  });

  it("uses the default debounce when none is given", () => {
    const recompute = vi.fn();
    const scheduler = new RecomputeScheduler(recompute);
    scheduler.textChanged("x", 1);
    vi.advanceTimersByTime(49);
    expect(recompute).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(recompute).toHaveBeenCalledTimes(1);
  });

  it("never fires after cancel or dispose", () => {
    const recompute = vi.fn();
    const scheduler = new RecomputeScheduler(recompute, { debounceMs: 50 });

    scheduler.textChanged("a", 1);
    scheduler.cancel();
    scheduler.textChanged("ab", 2);
    scheduler.dispose();
    vi.advanceTimersByTime(200);
    expect(recompute).not.toHaveBeenCalled();
    expect(scheduler.pending).toBe(false);
  });
});
