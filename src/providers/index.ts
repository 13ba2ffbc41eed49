import { exchangeToken } from "../auth/iam.ts";
import type { Config } from "../config.ts";
import type { Logger } from "../logger.ts";
import type { RetryConfig } from "../retry.ts";
import { errorMessage } from "../errors.ts";
import { YandexComputeClient } from "./yandex.ts";
import type { FetchLike } from "./http.ts";

export function retryPolicy(config: Config, logger: Logger): Partial<RetryConfig> {
  return {
    maxAttempts: config.retryAttempts,
    delayMs: config.retryDelayMs,
    onRetry: ({ operationName, attempt, delayMs, error }) =>
      logger.warn(`${operationName} failed (attempt ${attempt}): ${errorMessage(error)}. Retrying in ${delayMs}ms`),
  };
}

/** Exchange the OAuth token and build a client carrying the IAM token */
export async function createComputeClient(
  config: Config,
  logger: Logger,
  fetchImpl?: FetchLike
): Promise<YandexComputeClient> {
  const retry = retryPolicy(config, logger);
  const iamToken = await exchangeToken(config.oauthToken, {
    fetch: fetchImpl,
    timeoutMs: config.requestTimeoutMs,
    retry,
  });
  logger.debug("IAM token acquired");
  return new YandexComputeClient({
    iamToken,
    requestTimeoutMs: config.requestTimeoutMs,
    retry,
    fetch: fetchImpl,
  });
}

export { YandexComputeClient, COMPUTE_API, OPERATION_API } from "./yandex.ts";
export type { FetchLike } from "./http.ts";
export * from "./types.ts";
