import { AuthenticationError } from "../errors.ts";
import { retryable, type RetryConfig } from "../retry.ts";
import { requestJson, type FetchLike } from "../providers/http.ts";

export const IAM_URL = "https://iam.api.cloud.yandex.net/iam/v1/tokens";

export interface ExchangeOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
}

interface IamTokenResponse {
  iamToken: string;
  expiresAt?: string;
}

/**
 * Trade the long-lived OAuth token for a short-lived IAM bearer token.
 * A refused exchange is not recoverable; callers are expected to exit.
 */
export async function exchangeToken(oauthToken: string, opts: ExchangeOptions = {}): Promise<string> {
  const fetchImpl = opts.fetch ?? fetch;
  const post = retryable(
    (token: string) =>
      requestJson<IamTokenResponse>(fetchImpl, "POST", IAM_URL, {
        body: { yandexPassportOauthToken: token },
        timeoutMs: opts.timeoutMs ?? 30_000,
      }),
    "get_iam",
    opts.retry
  );

  const res = await post(oauthToken);
  if (!res.ok) {
    throw new AuthenticationError(res.status, res.error.message);
  }
  if (!res.data.iamToken) {
    throw new AuthenticationError(res.status, "response carried no iamToken");
  }
  return res.data.iamToken;
}
