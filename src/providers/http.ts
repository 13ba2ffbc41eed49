import { TransientNetworkError, errorMessage } from "../errors.ts";
import type { ApiErrorBody, ApiResponse } from "./types.ts";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonRequest {
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

/**
 * One JSON round trip. Transport failures (refused, reset, DNS, timeout)
 * reject with {@link TransientNetworkError}; any HTTP status resolves.
 */
export async function requestJson<T>(
  fetchImpl: FetchLike,
  method: string,
  url: string,
  opts: JsonRequest
): Promise<ApiResponse<T>> {
  let res: Response;
  let text: string;
  try {
    res = await fetchImpl(url, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...opts.headers,
      },
      body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
    text = await res.text();
  } catch (err) {
    throw new TransientNetworkError(`${method} ${url} failed: ${errorMessage(err)}`, { cause: err });
  }

  const payload = parsePayload(text);
  if (res.ok) {
    return { ok: true, status: res.status, data: payload as T };
  }
  return { ok: false, status: res.status, error: toErrorBody(payload, res.statusText) };
}

function parsePayload(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { message: text };
  }
}

function toErrorBody(payload: unknown, fallback: string): ApiErrorBody {
  if (typeof payload === "object" && payload !== null && "message" in payload) {
    const message = payload.message;
    const code = "code" in payload ? payload.code : undefined;
    return {
      message: typeof message === "string" ? message : String(message),
      ...(typeof code === "number" ? { code } : {}),
    };
  }
  return { message: fallback || "unknown error" };
}
