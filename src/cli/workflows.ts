import type { ManagedInstance } from "../compute/index.ts";
import type { OperationPoller, PollResult } from "../compute/operations.ts";
import type { Logger } from "../logger.ts";

export interface Outcome {
  results: Array<PollResult | undefined>;
  /** False when anything failed, timed out, or never started */
  ok: boolean;
}

/** True when every operation settled cleanly */
export function allSucceeded(results: ReadonlyArray<PollResult | undefined>): boolean {
  return results.every((r) => !r || (r.state === "DONE" && !r.operation.error));
}

/** A single operation holds the thread; several are polled side by side */
export async function settle(
  poller: OperationPoller,
  operationIds: ReadonlyArray<string | undefined>
): Promise<Array<PollResult | undefined>> {
  if (operationIds.length === 1) return [await poller.wait(operationIds[0])];
  return poller.watchAll(operationIds);
}

/** Delete old snapshots of every instance, waiting for all deletions concurrently */
export async function prune(managed: ReadonlyArray<ManagedInstance>, poller: OperationPoller): Promise<Outcome> {
  const outcomes = await Promise.all(
    managed.map(async ({ snapshots }): Promise<Outcome> => {
      const operationIds = await snapshots.pruneOldSnapshots();
      if (!operationIds) return { results: [], ok: false };
      const results = await poller.watchAll(operationIds);
      return { results, ok: allSucceeded(results) };
    })
  );
  return merge(outcomes);
}

/**
 * Fresh boot-disk snapshot per instance, then prune. Old snapshots are
 * only pruned once the new one has completed without error.
 */
export async function rotate(
  managed: ReadonlyArray<ManagedInstance>,
  poller: OperationPoller,
  logger: Logger
): Promise<Outcome> {
  const rotateOne = async ({ instance, snapshots }: ManagedInstance): Promise<Outcome> => {
    const created = await poller.watch(await snapshots.createSnapshot());
    if (!created || !allSucceeded([created])) {
      logger.warn(`Skipping prune for ${instance.name ?? instance.instanceId}: new snapshot did not complete`);
      return { results: [created], ok: false };
    }

    const operationIds = await snapshots.pruneOldSnapshots();
    if (!operationIds) return { results: [created], ok: false };

    const results = [created, ...(await poller.watchAll(operationIds))];
    return { results, ok: allSucceeded(results) };
  };

  return merge(await Promise.all(managed.map(rotateOne)));
}

function merge(outcomes: Outcome[]): Outcome {
  return {
    results: outcomes.flatMap((o) => o.results),
    ok: outcomes.every((o) => o.ok),
  };
}
