import type { Logger } from "../logger.ts";
import { NON_EXISTENT, UNKNOWN, type ApiResponse, type ComputeApi, type InstanceData } from "../providers/types.ts";

export interface InstanceDeps {
  api: ComputeApi;
  logger: Logger;
}

export interface InstanceSummary {
  InstanceID: string;
  FolderID: string | undefined;
  Name: string | undefined;
  BootDisk: string | undefined;
  Status: string;
}

/**
 * One compute instance as last seen by the provider.
 *
 * Metadata (name, folder, disks) is cached from the last {@link refresh};
 * {@link status} goes back to the provider on every call.
 */
export class ComputeInstance {
  private snapshot: InstanceData | undefined;

  constructor(
    readonly instanceId: string,
    private readonly deps: InstanceDeps
  ) {}

  /** Construct and take the initial metadata snapshot */
  static async load(instanceId: string, deps: InstanceDeps): Promise<ComputeInstance> {
    const instance = new ComputeInstance(instanceId, deps);
    await instance.refresh();
    return instance;
  }

  async refresh(): Promise<InstanceData | undefined> {
    const res = await this.fetch();
    this.snapshot = res.ok ? res.data : undefined;
    return this.snapshot;
  }

  private async fetch(): Promise<ApiResponse<InstanceData>> {
    const res = await this.deps.api.getInstance(this.instanceId);
    if (res.ok) return res;

    if (res.status === 404) {
      this.deps.logger.warn(`Instance with ID ${this.instanceId} not exist`);
    } else {
      this.deps.logger.error(`${res.status} Error in get_instance: ${res.error.message}`);
    }
    return res;
  }

  get exists(): boolean {
    return this.snapshot !== undefined;
  }

  get data(): InstanceData | undefined {
    return this.snapshot;
  }

  get folderId(): string | undefined {
    return this.snapshot?.folderId;
  }

  get name(): string | undefined {
    return this.snapshot?.name;
  }

  get bootDiskId(): string | undefined {
    return this.snapshot?.bootDisk?.diskId;
  }

  get secondaryDiskIds(): string[] | undefined {
    if (!this.snapshot) return undefined;
    return (this.snapshot.secondaryDisks ?? []).map((d) => d.diskId);
  }

  /**
   * Live status. Never cached, and never contacts the provider for an
   * instance that was not found. A failed read other than 404 is UNKNOWN.
   */
  async status(): Promise<string> {
    if (!this.snapshot) return NON_EXISTENT;

    const res = await this.fetch();
    if (res.ok) return res.data.status;
    return res.status === 404 ? NON_EXISTENT : UNKNOWN;
  }

  async describe(): Promise<InstanceSummary> {
    return {
      InstanceID: this.instanceId,
      FolderID: this.folderId,
      Name: this.name,
      BootDisk: this.bootDiskId,
      Status: await this.status(),
    };
  }

  async render(): Promise<string> {
    if (!this.snapshot) {
      const message = `Instance with ID ${this.instanceId} not found.`;
      this.deps.logger.info(message);
      return message;
    }
    const summary = await this.describe();
    return Object.entries(summary)
      .map(([key, value]) => `${key}: ${value}`)
      .join(", ");
  }
}
