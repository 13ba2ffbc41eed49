import type { Logger } from "../logger.ts";
import type { ComputeApi, SnapshotData } from "../providers/types.ts";
import type { ComputeInstance } from "./instance.ts";

const SECONDS_PER_DAY = 86_400;
const QUOTA_EXCEEDED = 429;

const CREATED_AT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?[zZ]$/;

/** Parse a provider `createdAt` (UTC). NaN when unparseable. */
export function parseCreatedAt(createdAt: string): number {
  const m = CREATED_AT.exec(createdAt);
  if (!m) return Date.parse(createdAt);
  const [, year, month, day, hour, minute, second] = m.map(Number);
  return Date.UTC(year ?? 0, (month ?? 1) - 1, day, hour, minute, second);
}

/** Whole days between `createdAt` and `now`, rounded down */
export function snapshotAgeDays(createdAt: string, now: Date = new Date()): number {
  const seconds = Math.floor((now.getTime() - parseCreatedAt(createdAt)) / 1000);
  return Math.floor(seconds / SECONDS_PER_DAY);
}

export function isOld(snapshot: SnapshotData, lifetimeDays: number, now: Date = new Date()): boolean {
  return snapshotAgeDays(snapshot.createdAt, now) >= lifetimeDays;
}

/** `DD-MM-YYYY-HH-MM-SS` in local time */
export function snapshotTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return [
    pad(date.getDate()),
    pad(date.getMonth() + 1),
    date.getFullYear(),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("-");
}

/** Exactly one of the two must be given */
export interface DeleteSnapshotTarget {
  snapshot?: Pick<SnapshotData, "id" | "name">;
  snapshotId?: string;
}

/**
 * Delete one snapshot by descriptor or bare id. Needs no instance, so
 * `snapshot rm` and pruning share it.
 */
export async function deleteSnapshot(
  api: Pick<ComputeApi, "deleteSnapshot">,
  logger: Logger,
  target: DeleteSnapshotTarget
): Promise<string | undefined> {
  const { snapshot, snapshotId } = target;
  if ((snapshot && snapshotId) || (!snapshot && !snapshotId)) {
    logger.error("Configuration error: exactly one of snapshot or snapshotId is required");
    return undefined;
  }

  const id = snapshot ? snapshot.id : snapshotId;
  const label = snapshot ? snapshot.name : snapshotId;
  if (!id) {
    logger.error("Configuration error: snapshot descriptor has no id");
    return undefined;
  }

  const res = await api.deleteSnapshot(id);
  if (!res.ok) {
    logger.error(`${res.status} Error in delete_snapshot: ${res.error.message}`);
    return undefined;
  }

  logger.info(`Starting delete snapshot ${label}`);
  return res.data.id;
}

type Listing =
  | { kind: "listed"; snapshots: SnapshotData[] }
  | { kind: "no-data" }
  | { kind: "failed" };

export interface SnapshotManagerOptions {
  lifetimeDays: number;
  /** Clock for snapshot names and ages */
  now?: () => Date;
}

export class SnapshotManager {
  private readonly lifetimeDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly instance: ComputeInstance,
    private readonly api: ComputeApi,
    private readonly logger: Logger,
    opts: SnapshotManagerOptions
  ) {
    if (!Number.isInteger(opts.lifetimeDays) || opts.lifetimeDays < 0) {
      throw new RangeError(`lifetimeDays must be a non-negative integer, got ${opts.lifetimeDays}`);
    }
    this.lifetimeDays = opts.lifetimeDays;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Snapshots of the instance's boot disk. Undefined when there is nothing
   * to look them up by, or the listing failed.
   */
  async listSnapshots(): Promise<SnapshotData[] | undefined> {
    const listing = await this.list();
    return listing.kind === "listed" ? listing.snapshots : undefined;
  }

  /**
   * Boot-disk snapshots at least `lifetimeDays` old. Empty when there are
   * none or the instance has no data; undefined only when the listing failed.
   */
  async listOldSnapshots(): Promise<SnapshotData[] | undefined> {
    const listing = await this.list();
    if (listing.kind === "failed") return undefined;
    if (listing.kind === "no-data") return [];

    const now = this.now();
    return listing.snapshots.filter((s) => {
      if (Number.isNaN(parseCreatedAt(s.createdAt))) {
        this.logger.warn(`Snapshot ${s.name} (${s.id}) has unreadable createdAt "${s.createdAt}", skipping`);
        return false;
      }
      return isOld(s, this.lifetimeDays, now);
    });
  }

  private async list(): Promise<Listing> {
    const { instance } = this;
    if (!instance.exists || !instance.folderId) {
      this.logger.warn(`Can't find snapshots for non-existent instance ${instance.instanceId}`);
      return { kind: "no-data" };
    }
    const bootDiskId = instance.bootDiskId;
    if (!bootDiskId) {
      this.logger.info(`Snapshots for ${instance.name} not found.`);
      return { kind: "no-data" };
    }

    const all: SnapshotData[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.api.listSnapshots(instance.folderId, pageToken);
      if (!res.ok) {
        this.logger.error(`${res.status} Error in list_snapshots: ${res.error.message}`);
        return { kind: "failed" };
      }
      all.push(...(res.data.snapshots ?? []));
      pageToken = res.data.nextPageToken || undefined;
    } while (pageToken);

    return { kind: "listed", snapshots: all.filter((s) => s.sourceDiskId === bootDiskId) };
  }

  async createSnapshot(diskId: string | undefined = this.instance.bootDiskId): Promise<string | undefined> {
    const { instance } = this;
    if (!instance.folderId || !diskId) {
      this.logger.warn(`Can't create snapshot for non-existent instance ${instance.instanceId}`);
      return undefined;
    }

    const res = await this.api.createSnapshot({
      folderId: instance.folderId,
      diskId,
      name: `${instance.name}-${snapshotTimestamp(this.now())}`,
    });

    if (!res.ok) {
      if (res.status === QUOTA_EXCEEDED) {
        this.logger.error(`QUOTA ERROR: snapshot NOT CREATED for instance ${instance.name}: ${res.error.message}`);
      } else {
        this.logger.error(`${res.status} Error in create_snapshot: ${res.error.message}`);
      }
      return undefined;
    }

    this.logger.info(`Starting create snapshot for disk ${diskId} on ${instance.name}`);
    return res.data.id;
  }

  deleteSnapshot(target: DeleteSnapshotTarget): Promise<string | undefined> {
    return deleteSnapshot(this.api, this.logger, target);
  }

  /**
   * Delete every old snapshot; returns the operation ids the provider
   * accepted, or undefined when the snapshots could not be listed.
   */
  async pruneOldSnapshots(): Promise<string[] | undefined> {
    const old = await this.listOldSnapshots();
    if (!old) return undefined;

    const operations: string[] = [];
    for (const snapshot of old) {
      const operationId = await this.deleteSnapshot({ snapshot });
      if (operationId) operations.push(operationId);
    }
    return operations;
  }
}
