export type InstanceStatus =
  | "PROVISIONING"
  | "CREATING"
  | "RUNNING"
  | "STARTING"
  | "STOPPING"
  | "STOPPED"
  | "RESTARTING"
  | "UPDATING"
  | "ERROR"
  | "CRASHED"
  | "DELETING"
  | "NON-EXISTENT"
  | "UNKNOWN";

/** Local sentinel: no instance data, or the provider answered 404 */
export const NON_EXISTENT = "NON-EXISTENT" satisfies InstanceStatus;

/** Local sentinel: the live status read failed for any other reason */
export const UNKNOWN = "UNKNOWN" satisfies InstanceStatus;

/** Active, or on its way to active */
export const POSITIVE_STATES: ReadonlySet<string> = new Set<InstanceStatus>([
  "RUNNING",
  "PROVISIONING",
  "CREATING",
]);

/** Inactive or failed */
export const NEGATIVE_STATES: ReadonlySet<string> = new Set<InstanceStatus>([
  "STOPPED",
  "STOPPING",
  "ERROR",
  "CRASHED",
]);

// --- Compute API response shapes ---

export interface AttachedDisk {
  diskId: string;
  deviceName?: string;
  autoDelete?: boolean;
  mode?: string;
}

export interface InstanceData {
  id: string;
  folderId: string;
  name: string;
  description?: string;
  zoneId?: string;
  platformId?: string;
  /** Provider value; may be outside {@link InstanceStatus} */
  status: string;
  bootDisk?: AttachedDisk;
  secondaryDisks?: AttachedDisk[];
  createdAt?: string;
  labels?: Record<string, string>;
}

export interface SnapshotData {
  id: string;
  folderId: string;
  name: string;
  description?: string;
  sourceDiskId: string;
  /** UTC, `YYYY-MM-DDTHH:MM:SSZ` */
  createdAt: string;
  status?: "CREATING" | "READY" | "ERROR" | "DELETING";
  diskSize?: string;
  storageSize?: string;
}

export interface OperationData {
  id: string;
  description?: string;
  createdAt?: string;
  createdBy?: string;
  modifiedAt?: string;
  done?: boolean;
  error?: { code?: number; message?: string };
  metadata?: Record<string, unknown>;
  response?: Record<string, unknown>;
}

export interface SnapshotPage {
  snapshots?: SnapshotData[];
  nextPageToken?: string;
}

export interface CreateSnapshotRequest {
  folderId: string;
  diskId: string;
  name: string;
  description?: string;
  labels?: Record<string, string>;
}

export interface ApiErrorBody {
  code?: number;
  message: string;
}

/**
 * Every call resolves with the provider's status code; only transport
 * failures reject. Callers decide what a 404 or 429 means for them.
 */
export type ApiResponse<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: ApiErrorBody };

export type LifecycleAction = "start" | "stop" | "restart";

export interface ComputeApi {
  getInstance(instanceId: string): Promise<ApiResponse<InstanceData>>;
  instanceAction(instanceId: string, action: LifecycleAction): Promise<ApiResponse<OperationData>>;

  listSnapshots(folderId: string, pageToken?: string): Promise<ApiResponse<SnapshotPage>>;
  createSnapshot(req: CreateSnapshotRequest): Promise<ApiResponse<OperationData>>;
  deleteSnapshot(snapshotId: string): Promise<ApiResponse<OperationData>>;

  getOperation(operationId: string): Promise<ApiResponse<OperationData>>;
}
