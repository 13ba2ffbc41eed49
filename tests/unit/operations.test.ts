import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { OperationPoller, advancePoll, DEFAULT_POLL_POLICY } from "../../src/compute/operations.ts";
import { ProviderRequestError } from "../../src/errors.ts";
import type { ApiResponse, OperationData } from "../../src/providers/types.ts";
import { FakeComputeApi, fail, mockLogger, ok } from "../mocks/index.ts";

describe("advancePoll", () => {
  it("stays pending while the budget lasts", () => {
    expect(advancePoll(0, false)).toEqual({ state: "PENDING", elapsedSeconds: 2 });
    expect(advancePoll(596, false)).toEqual({ state: "PENDING", elapsedSeconds: 598 });
  });

  it("times out when elapsed reaches the ceiling", () => {
    expect(advancePoll(598, false)).toEqual({ state: "TIMED_OUT", elapsedSeconds: 600 });
  });

  it("prefers completion over timeout on the last tick", () => {
    expect(advancePoll(598, true)).toEqual({ state: "DONE", elapsedSeconds: 600 });
  });

  it("honours a custom policy", () => {
    expect(advancePoll(0, false, { intervalSeconds: 5, timeoutSeconds: 5 })).toEqual({
      state: "TIMED_OUT",
      elapsedSeconds: 5,
    });
  });

  it("defaults to 2s intervals and a 600s ceiling", () => {
    expect(DEFAULT_POLL_POLICY).toEqual({ intervalSeconds: 2, timeoutSeconds: 600 });
  });
});

describe("OperationPoller", () => {
  let api: FakeComputeApi;
  let logger: ReturnType<typeof mockLogger>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let sleepSync: Mock<(ms: number) => void>;
  let poller: OperationPoller;

  /** Operation that reports done on the given poll (1-based), never if omitted */
  function doneOnPoll(poll?: number): void {
    let polls = 0;
    api.getOperation.mockImplementation(async (id): Promise<ApiResponse<OperationData>> => {
      polls++;
      return ok({ id, description: "Stop instance", done: poll !== undefined && polls >= poll });
    });
  }

  beforeEach(() => {
    api = new FakeComputeApi();
    logger = mockLogger();
    sleep = vi.fn(async (_ms: number) => {});
    sleepSync = vi.fn((_ms: number) => {});
    poller = new OperationPoller(api, logger, { sleep, sleepSync });
  });

  it("completes when the 300th poll reports done", async () => {
    doneOnPoll(300);

    const result = await poller.wait("op-1");

    expect(result?.state).toBe("DONE");
    expect(result?.elapsedSeconds).toBe(600);
    expect(result?.message).toBe("Operation Stop instance with ID op-1 completed");
    expect(api.getOperation).toHaveBeenCalledTimes(300);
    expect(logger.info).toHaveBeenCalledWith("Operation Stop instance with ID op-1 completed");
  });

  it("times out at exactly 600s when no poll reports done", async () => {
    doneOnPoll();

    const result = await poller.wait("op-1");

    expect(result?.state).toBe("TIMED_OUT");
    expect(result?.elapsedSeconds).toBe(600);
    expect(result?.message).toBe("Operation Stop instance with ID op-1 running too long.");
    expect(api.getOperation).toHaveBeenCalledTimes(300);
    expect(logger.warn).toHaveBeenCalledWith("Operation Stop instance with ID op-1 running too long.");
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("waits one interval after every poll, including the last", async () => {
    doneOnPoll(3);

    await poller.wait("op-1");

    expect(sleepSync).toHaveBeenCalledTimes(3);
    expect(sleepSync).toHaveBeenCalledWith(2000);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("uses the cooperative sleep in non-blocking mode", async () => {
    doneOnPoll(2);

    const result = await poller.watch("op-1");

    expect(result?.state).toBe("DONE");
    expect(result?.elapsedSeconds).toBe(4);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleepSync).not.toHaveBeenCalled();
  });

  it.each([undefined, ""])("returns nothing for an absent operation id (%j)", async (id) => {
    expect(await poller.wait(id)).toBeUndefined();
    expect(await poller.watch(id)).toBeUndefined();
    expect(api.getOperation).not.toHaveBeenCalled();
  });

  it("logs an operation that finished with an error at error level", async () => {
    api.operations.set("op-1", {
      id: "op-1",
      description: "Create snapshot",
      done: true,
      error: { code: 8, message: "Quota exceeded" },
    });

    const result = await poller.watch("op-1");

    expect(result?.state).toBe("DONE");
    expect(result?.message).toBe("Operation Create snapshot with ID op-1 completed with error: Quota exceeded");
    expect(logger.error).toHaveBeenCalledWith(result?.message);
  });

  it("raises when the status fetch itself fails", async () => {
    api.getOperation.mockResolvedValueOnce(fail(404, "Operation op-1 not found"));

    await expect(poller.watch("op-1")).rejects.toThrow(ProviderRequestError);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("polls several operations side by side without mixing them up", async () => {
    const polls = new Map<string, number>();
    api.getOperation.mockImplementation(async (id): Promise<ApiResponse<OperationData>> => {
      const n = (polls.get(id) ?? 0) + 1;
      polls.set(id, n);
      return ok({ id, description: id, done: n >= (id === "op-a" ? 2 : 5) });
    });

    const results = await poller.watchAll(["op-a", undefined, "op-b"]);

    expect(results.map((r) => r?.elapsedSeconds)).toEqual([4, undefined, 10]);
    expect(results.map((r) => r?.state)).toEqual(["DONE", undefined, "DONE"]);
  });

  it("rejects a non-positive interval", () => {
    expect(() => new OperationPoller(api, logger, { policy: { intervalSeconds: 0 } })).toThrow(RangeError);
  });
});

describe("OperationPoller execution modes", () => {
  const policy = { intervalSeconds: 0.01, timeoutSeconds: 1 };

  function pollerWithTimerProbe() {
    const api = new FakeComputeApi();
    api.operations.set("op-1", { id: "op-1", description: "Start instance", done: true });
    return new OperationPoller(api, mockLogger(), { policy });
  }

  it("blocking mode holds the thread, so timers cannot fire mid-wait", async () => {
    const poller = pollerWithTimerProbe();
    let fired = false;
    setTimeout(() => (fired = true), 0);

    await poller.wait("op-1");

    expect(fired).toBe(false);
  });

  it("non-blocking mode yields, so timers fire during the wait", async () => {
    const poller = pollerWithTimerProbe();
    let fired = false;
    setTimeout(() => (fired = true), 0);

    await poller.watch("op-1");

    expect(fired).toBe(true);
  });
});
