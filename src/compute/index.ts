import type { Logger } from "../logger.ts";
import type { ComputeApi } from "../providers/types.ts";
import { ComputeInstance } from "./instance.ts";
import { LifecycleController } from "./lifecycle.ts";
import { SnapshotManager } from "./snapshots.ts";

export interface ManagedInstance {
  instance: ComputeInstance;
  lifecycle: LifecycleController;
  snapshots: SnapshotManager;
}

export interface OpenInstanceOptions {
  api: ComputeApi;
  logger: Logger;
  lifetimeDays: number;
}

/** Fetch the instance once and wire its controllers to the same cached view */
export async function openInstance(instanceId: string, opts: OpenInstanceOptions): Promise<ManagedInstance> {
  const { api, logger, lifetimeDays } = opts;
  const instance = await ComputeInstance.load(instanceId, { api, logger });
  return {
    instance,
    lifecycle: new LifecycleController(instance, api, logger),
    snapshots: new SnapshotManager(instance, api, logger, { lifetimeDays }),
  };
}

export { ComputeInstance } from "./instance.ts";
export type { InstanceSummary } from "./instance.ts";
export { LifecycleController, refusal } from "./lifecycle.ts";
export { SnapshotManager, deleteSnapshot, snapshotAgeDays, snapshotTimestamp, isOld } from "./snapshots.ts";
export type { DeleteSnapshotTarget } from "./snapshots.ts";
export { OperationPoller, advancePoll, DEFAULT_POLL_POLICY } from "./operations.ts";
export type { PollPolicy, PollResult, PollState } from "./operations.ts";
