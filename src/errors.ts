export class VmkeepError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** IAM token exchange was refused. Nothing downstream can work without it. */
export class AuthenticationError extends VmkeepError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(`${status} Error in get_iam: ${message}`);
    this.status = status;
  }
}

/** Connection refused/reset, DNS failure or request timeout. Safe to retry. */
export class TransientNetworkError extends VmkeepError {}

/** Non-2xx answer where the caller cannot degrade to an absent result. */
export class ProviderRequestError extends VmkeepError {
  readonly status: number;

  constructor(status: number, context: string, message: string) {
    super(`${status} Error in ${context}: ${message}`);
    this.status = status;
  }
}

export class ConfigurationError extends VmkeepError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
