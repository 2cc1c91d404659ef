import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  FatalProviderError,
  TransientProviderError,
} from "../../errors/index.js";
import { abortableSleep, computeBackoffDelay, withRetry } from "../retry.js";
import type { RetryPolicy } from "../retry.js";

const policy: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 150,
  multiplier: 2,
};

describe("withRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("backs off exponentially up to the cap", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new TransientProviderError("rate limited", { status: 429 });
      }
      return "ok";
    });

    await expect(withRetry(operation, policy, { sleep })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 150]);
  });

  it("rethrows the last transient error once attempts run out", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => undefined);
    const operation = vi.fn(async () => {
      throw new TransientProviderError("still down", { status: 503 });
    });

    await expect(withRetry(operation, policy, { sleep })).rejects.toThrow("still down");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry other errors", async () => {
    const operation = vi.fn(async () => {
      throw new FatalProviderError("bad key", { status: 401 });
    });

    await expect(withRetry(operation, policy)).rejects.toBeInstanceOf(FatalProviderError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops before the first attempt when aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => "never");

    await expect(
      withRetry(operation, policy, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });
});

describe("computeBackoffDelay", () => {
  it("doubles per attempt", () => {
    expect(computeBackoffDelay({ ...policy, maxDelayMs: 1_000 }, 1)).toBe(100);
    expect(computeBackoffDelay({ ...policy, maxDelayMs: 1_000 }, 3)).toBe(400);
  });
});

describe("abortableSleep", () => {
  it("rejects when the signal aborts mid-wait", async () => {
    const controller = new AbortController();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
