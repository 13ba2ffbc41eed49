import type { CredentialKey, CredentialStore } from "./types.ts";
import { CREDENTIAL_KEYS } from "./types.ts";
import { KeychainStore } from "./keychain.ts";
import { SecretServiceStore } from "./secret-service.ts";
import { EncryptedFileStore } from "./encrypted-file.ts";

let _store: CredentialStore | null = null;

/** Best available credential store for this platform, encrypted file as fallback */
export function getStore(): CredentialStore {
  if (_store) return _store;

  const candidates: CredentialStore[] = [];
  if (process.platform === "darwin") candidates.push(new KeychainStore());
  if (process.platform === "linux") candidates.push(new SecretServiceStore());

  _store = candidates.find((s) => s.isAvailable()) ?? new EncryptedFileStore();
  return _store;
}

/** Swap the backend; tests use an in-memory store */
export function setStore(store: CredentialStore | null): void {
  _store = store;
}

/**
 * Get a single credential. process.env takes precedence over the store.
 */
export function getCredential(key: CredentialKey): string | null {
  const envValue = process.env[key];
  if (envValue) return envValue;

  return getStore().get(key);
}

export type CredentialSource = "env" | "store" | "not set";

export interface CredentialStatus {
  key: CredentialKey;
  source: CredentialSource;
}

export function getCredentialStatuses(): CredentialStatus[] {
  const store = getStore();

  return CREDENTIAL_KEYS.map((key): CredentialStatus => {
    if (process.env[key]) return { key, source: "env" };
    if (store.get(key)) return { key, source: "store" };
    return { key, source: "not set" };
  });
}
