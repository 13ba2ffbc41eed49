import type { Logger } from "../logger.ts";
import {
  NEGATIVE_STATES,
  POSITIVE_STATES,
  UNKNOWN,
  type ComputeApi,
  type LifecycleAction,
} from "../providers/types.ts";
import type { ComputeInstance } from "./instance.ts";

type Refusal = { level: "info" | "warn" | "error"; reason: string };

const PROGRESS: Record<LifecycleAction, string> = {
  start: "Starting",
  stop: "Stopping",
  restart: "Restarting",
};

/**
 * Guard for each action. Returns why the action must not be sent, or null
 * when it may go ahead.
 */
export function refusal(action: LifecycleAction, status: string, name: string | undefined): Refusal | null {
  if (status === UNKNOWN) {
    return { level: "error", reason: `Can't ${action} instance ${name}: current status could not be read.` };
  }
  const invalid: Refusal = { level: "warn", reason: `Instance ${name} has an invalid state for this operation.` };

  switch (action) {
    case "start":
      return POSITIVE_STATES.has(status) ? invalid : null;
    case "stop":
      if (status === "STOPPED") return { level: "info", reason: `Instance ${name} already stopped.` };
      return NEGATIVE_STATES.has(status) ? invalid : null;
    case "restart":
      return NEGATIVE_STATES.has(status) ? invalid : null;
  }
}

export class LifecycleController {
  constructor(
    private readonly instance: ComputeInstance,
    private readonly api: ComputeApi,
    private readonly logger: Logger
  ) {}

  start(): Promise<string | undefined> {
    return this.run("start");
  }

  stop(): Promise<string | undefined> {
    return this.run("stop");
  }

  restart(): Promise<string | undefined> {
    return this.run("restart");
  }

  /** Resolves to the operation id, or undefined when nothing was accepted */
  private async run(action: LifecycleAction): Promise<string | undefined> {
    const { instance } = this;
    const status = await instance.status();

    const refused = refusal(action, status, instance.name);
    if (refused) {
      this.logger[refused.level](refused.reason);
      return undefined;
    }

    const res = await this.api.instanceAction(instance.instanceId, action);
    if (!res.ok) {
      this.logger.error(`${res.status} Error in ${action}_instance: ${res.error.message}`);
      return undefined;
    }

    this.logger.info(`${PROGRESS[action]} instance ${instance.name} (${instance.instanceId})`);
    return res.data.id;
  }
}
