import { describe, expect, it, vi } from "vitest";
import { TransientNetworkError } from "../../src/errors.ts";
import { retryable, withRetry, type RetryEvent } from "../../src/retry.ts";

const noSleep = () => vi.fn(async (_ms: number) => {});

describe("withRetry", () => {
  it("retries transient failures with growing delays", async () => {
    const sleep = noSleep();
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientNetworkError("ECONNRESET"))
      .mockRejectedValueOnce(new TransientNetworkError("ETIMEDOUT"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(operation, "get_instance", { sleep })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("surfaces the last failure once attempts run out", async () => {
    const operation = vi.fn(async () => {
      throw new TransientNetworkError("connection refused");
    });

    await expect(withRetry(operation, "get_instance", { sleep: noSleep(), maxAttempts: 4 })).rejects.toThrow(
      "connection refused"
    );
    expect(operation).toHaveBeenCalledTimes(4);
  });

  it("rethrows anything else immediately", async () => {
    const operation = vi.fn(async () => {
      throw new Error("bad json");
    });

    await expect(withRetry(operation, "get_instance", { sleep: noSleep() })).rejects.toThrow("bad json");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("reports each retry with the operation name", async () => {
    const events: RetryEvent[] = [];
    const failure = new TransientNetworkError("ECONNRESET");
    const operation = vi.fn<() => Promise<number>>().mockRejectedValueOnce(failure).mockResolvedValueOnce(1);

    await withRetry(operation, "GET /instances/vm-1", {
      sleep: noSleep(),
      delayMs: 50,
      onRetry: (e) => events.push(e),
    });

    expect(events).toEqual([{ operationName: "GET /instances/vm-1", attempt: 1, delayMs: 50, error: failure }]);
  });

  it("tries at least once even with a zero attempt budget", async () => {
    const operation = vi.fn(async () => 7);

    await expect(withRetry(operation, "noop", { maxAttempts: 0 })).resolves.toBe(7);
  });
});

describe("retryable", () => {
  it("wraps a function so every call shares the policy", async () => {
    let calls = 0;
    const lookup = retryable(
      async (id: string, suffix: string) => {
        calls++;
        if (calls === 1) throw new TransientNetworkError("timeout");
        return `${id}${suffix}`;
      },
      "lookup",
      { sleep: noSleep() }
    );

    await expect(lookup("vm-1", "!")).resolves.toBe("vm-1!");
    expect(calls).toBe(2);
  });
});
