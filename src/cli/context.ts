import { loadConfig, type Config, type ConfigOverrides } from "../config.ts";
import { logger, setLogLevel } from "../logger.ts";
import { createComputeClient } from "../providers/index.ts";
import type { ComputeApi } from "../providers/types.ts";
import { OperationPoller } from "../compute/operations.ts";
import { openInstance, type ManagedInstance } from "../compute/index.ts";

// --- Lazy singletons ---

let _config: Config | null = null;
let _api: Promise<ComputeApi> | null = null;
let _poller: OperationPoller | null = null;

/** Tier 1: validated config. Overrides only apply on first load. */
export function config(overrides: ConfigOverrides = {}): Config {
  if (!_config) {
    _config = loadConfig(overrides);
    setLogLevel(_config.logLevel);
  }
  return _config;
}

/** Tier 2: authenticated client. The IAM exchange happens once per process. */
export function api(): Promise<ComputeApi> {
  if (!_api) _api = createComputeClient(config(), logger());
  return _api;
}

export async function poller(): Promise<OperationPoller> {
  const client = await api();
  if (!_poller) _poller = new OperationPoller(client, logger());
  return _poller;
}

/** Tier 3: one instance with its lifecycle and snapshot controllers */
export async function instance(instanceId: string): Promise<ManagedInstance> {
  return openInstance(instanceId, {
    api: await api(),
    logger: logger(),
    lifetimeDays: config().lifetimeDays,
  });
}

export function parseLifetime(value: string | undefined): ConfigOverrides {
  return value === undefined ? {} : { lifetimeDays: value };
}
