import { z } from "zod";
import { getStore } from "./auth/index.ts";
import { ConfigurationError } from "./errors.ts";
import { LOG_LEVELS } from "./logger.ts";

const MISSING_TOKEN = 'YC_OAUTH_TOKEN is not set. Add it to .env or run "vmkeep auth set YC_OAUTH_TOKEN <token>"';

const configSchema = z.object({
  oauthToken: z.string({ required_error: MISSING_TOKEN }).min(1, MISSING_TOKEN),
  lifetimeDays: z.coerce.number().int().nonnegative().default(7),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  retryAttempts: z.coerce.number().int().positive().default(3),
  retryDelayMs: z.coerce.number().int().nonnegative().default(1000),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
});

export type Config = z.infer<typeof configSchema>;

/** Env name for each config field. The OAuth token also falls back to the credential store. */
export const CONFIG_ENV = {
  oauthToken: "YC_OAUTH_TOKEN",
  lifetimeDays: "VMKEEP_LIFETIME_DAYS",
  logLevel: "VMKEEP_LOG_LEVEL",
  retryAttempts: "VMKEEP_RETRY_ATTEMPTS",
  retryDelayMs: "VMKEEP_RETRY_DELAY_MS",
  requestTimeoutMs: "VMKEEP_REQUEST_TIMEOUT_MS",
} as const satisfies Record<keyof Config, string>;

export type ConfigOverrides = Partial<Record<keyof Config, string | number>>;

export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Config {
  const pick = (key: keyof Config): string | number | undefined => {
    const value = overrides[key] ?? env[CONFIG_ENV[key]];
    // An exported-but-empty variable means "unset", not zero
    return value === "" ? undefined : value;
  };

  const raw = {
    oauthToken: pick("oauthToken") ?? getStore().get("YC_OAUTH_TOKEN") ?? undefined,
    lifetimeDays: pick("lifetimeDays"),
    logLevel: pick("logLevel"),
    retryAttempts: pick("retryAttempts"),
    retryDelayMs: pick("retryDelayMs"),
    requestTimeoutMs: pick("requestTimeoutMs"),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = issue.path.join(".");
      const envName = Object.entries(CONFIG_ENV).find(([key]) => key === field)?.[1] ?? field;
      return `${envName}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  return parsed.data;
}
