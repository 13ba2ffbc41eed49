import { withRetry, type RetryConfig } from "../retry.ts";
import { requestJson, type FetchLike } from "./http.ts";
import type {
  ApiResponse,
  ComputeApi,
  CreateSnapshotRequest,
  InstanceData,
  LifecycleAction,
  OperationData,
  SnapshotPage,
} from "./types.ts";

export const COMPUTE_API = "https://compute.api.cloud.yandex.net/compute/v1";
export const OPERATION_API = "https://operation.api.cloud.yandex.net/operations";

const SNAPSHOT_PAGE_SIZE = 1000;

export interface YandexComputeConfig {
  iamToken: string;
  requestTimeoutMs?: number;
  retry?: Partial<RetryConfig>;
  fetch?: FetchLike;
}

export class YandexComputeClient implements ComputeApi {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly retry: Partial<RetryConfig>;

  constructor(config: YandexComputeConfig) {
    if (!config.iamToken) {
      throw new Error("Yandex Cloud IAM token is required");
    }
    this.headers = { Authorization: `Bearer ${config.iamToken}` };
    this.timeoutMs = config.requestTimeoutMs ?? 30_000;
    this.fetchImpl = config.fetch ?? fetch;
    this.retry = config.retry ?? {};
  }

  /** Single request path, so every provider call shares the retry policy */
  private request<T>(method: string, url: string, body?: unknown): Promise<ApiResponse<T>> {
    return withRetry(
      () => requestJson<T>(this.fetchImpl, method, url, { headers: this.headers, body, timeoutMs: this.timeoutMs }),
      `${method} ${url}`,
      this.retry
    );
  }

  getInstance(instanceId: string): Promise<ApiResponse<InstanceData>> {
    return this.request<InstanceData>("GET", `${COMPUTE_API}/instances/${encodeURIComponent(instanceId)}`);
  }

  instanceAction(instanceId: string, action: LifecycleAction): Promise<ApiResponse<OperationData>> {
    return this.request<OperationData>(
      "POST",
      `${COMPUTE_API}/instances/${encodeURIComponent(instanceId)}:${action}`
    );
  }

  listSnapshots(folderId: string, pageToken?: string): Promise<ApiResponse<SnapshotPage>> {
    const params = new URLSearchParams({ folderId, pageSize: String(SNAPSHOT_PAGE_SIZE) });
    if (pageToken) params.set("pageToken", pageToken);
    return this.request<SnapshotPage>("GET", `${COMPUTE_API}/snapshots?${params}`);
  }

  createSnapshot(req: CreateSnapshotRequest): Promise<ApiResponse<OperationData>> {
    return this.request<OperationData>("POST", `${COMPUTE_API}/snapshots`, req);
  }

  deleteSnapshot(snapshotId: string): Promise<ApiResponse<OperationData>> {
    return this.request<OperationData>("DELETE", `${COMPUTE_API}/snapshots/${encodeURIComponent(snapshotId)}`);
  }

  getOperation(operationId: string): Promise<ApiResponse<OperationData>> {
    return this.request<OperationData>("GET", `${OPERATION_API}/${encodeURIComponent(operationId)}`);
  }
}
