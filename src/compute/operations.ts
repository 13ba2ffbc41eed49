import { ProviderRequestError } from "../errors.ts";
import type { Logger } from "../logger.ts";
import type { ComputeApi, OperationData } from "../providers/types.ts";
import { sleep, sleepSync } from "../sleep.ts";

export type PollState = "PENDING" | "DONE" | "TIMED_OUT";

export interface PollPolicy {
  intervalSeconds: number;
  timeoutSeconds: number;
}

/** 2s between polls, give up after 600s (300 polls) */
export const DEFAULT_POLL_POLICY: PollPolicy = {
  intervalSeconds: 2,
  timeoutSeconds: 600,
};

export interface PollStep {
  state: PollState;
  elapsedSeconds: number;
}

/**
 * One tick of the polling state machine, applied after each fetch-and-wait.
 * Completion wins over timeout when both happen on the same tick.
 */
export function advancePoll(elapsedSeconds: number, done: boolean, policy: PollPolicy = DEFAULT_POLL_POLICY): PollStep {
  const elapsed = elapsedSeconds + policy.intervalSeconds;
  if (done) return { state: "DONE", elapsedSeconds: elapsed };
  if (elapsed >= policy.timeoutSeconds) return { state: "TIMED_OUT", elapsedSeconds: elapsed };
  return { state: "PENDING", elapsedSeconds: elapsed };
}

export interface PollResult {
  state: Exclude<PollState, "PENDING">;
  message: string;
  elapsedSeconds: number;
  operation: OperationData;
}

export interface OperationPollerOptions {
  policy?: Partial<PollPolicy>;
  /** Cooperative wait used by {@link OperationPoller.watch} */
  sleep?: (ms: number) => Promise<void>;
  /** Thread-parking wait used by {@link OperationPoller.wait} */
  sleepSync?: (ms: number) => void;
}

export class OperationPoller {
  private readonly policy: PollPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly sleepSync: (ms: number) => void;

  constructor(
    private readonly api: Pick<ComputeApi, "getOperation">,
    private readonly logger: Logger,
    opts: OperationPollerOptions = {}
  ) {
    this.policy = { ...DEFAULT_POLL_POLICY, ...opts.policy };
    if (this.policy.intervalSeconds <= 0) {
      throw new RangeError("intervalSeconds must be positive");
    }
    this.sleep = opts.sleep ?? sleep;
    this.sleepSync = opts.sleepSync ?? sleepSync;
  }

  /**
   * Blocking mode: the thread is parked between polls, so nothing else in
   * the process makes progress until this operation settles.
   */
  wait(operationId: string | undefined): Promise<PollResult | undefined> {
    return this.poll(operationId, async (ms) => this.sleepSync(ms));
  }

  /**
   * Non-blocking mode: each wait yields to the event loop, so any number of
   * pollers can run side by side.
   */
  watch(operationId: string | undefined): Promise<PollResult | undefined> {
    return this.poll(operationId, this.sleep);
  }

  /** Watch several operations concurrently; skipped ids yield undefined */
  watchAll(operationIds: ReadonlyArray<string | undefined>): Promise<Array<PollResult | undefined>> {
    return Promise.all(operationIds.map((id) => this.watch(id)));
  }

  private async poll(
    operationId: string | undefined,
    pause: (ms: number) => Promise<void>
  ): Promise<PollResult | undefined> {
    if (!operationId) return undefined;

    let elapsedSeconds = 0;
    for (;;) {
      const operation = await this.fetch(operationId);
      await pause(this.policy.intervalSeconds * 1000);

      const step = advancePoll(elapsedSeconds, operation.done === true, this.policy);
      elapsedSeconds = step.elapsedSeconds;

      if (step.state === "DONE") {
        return this.settle("DONE", operationId, operation, elapsedSeconds);
      }
      if (step.state === "TIMED_OUT") {
        return this.settle("TIMED_OUT", operationId, operation, elapsedSeconds);
      }
    }
  }

  private async fetch(operationId: string): Promise<OperationData> {
    const res = await this.api.getOperation(operationId);
    if (!res.ok) {
      throw new ProviderRequestError(res.status, "operation_status", res.error.message);
    }
    return res.data;
  }

  private settle(
    state: PollResult["state"],
    operationId: string,
    operation: OperationData,
    elapsedSeconds: number
  ): PollResult {
    const { description } = operation;
    let message: string;

    if (state === "TIMED_OUT") {
      message = `Operation ${description} with ID ${operationId} running too long.`;
      this.logger.warn(message);
    } else if (operation.error) {
      message = `Operation ${description} with ID ${operationId} completed with error: ${operation.error.message}`;
      this.logger.error(message);
    } else {
      message = `Operation ${description} with ID ${operationId} completed`;
      this.logger.info(message);
    }

    return { state, message, elapsedSeconds, operation };
  }
}
