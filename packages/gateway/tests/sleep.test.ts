import { describe, it, expect, vi, afterEach } from "vitest";
import { sleep, throwIfCanceled } from "../src/resilience/sleep.js";
import { CanceledError } from "../src/types/errors.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("rejects with CanceledError when the signal fires", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CanceledError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects immediately for an already aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(CanceledError);
  });
});

describe("throwIfCanceled", () => {
  it("throws only when aborted", () => {
    expect(() => throwIfCanceled(undefined)).not.toThrow();
    expect(() => throwIfCanceled(new AbortController().signal)).not.toThrow();
    expect(() => throwIfCanceled(AbortSignal.abort())).toThrow(CanceledError);
  });
});
