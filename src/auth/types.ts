export type CredentialKey = "YC_OAUTH_TOKEN";

export const CREDENTIAL_KEYS: readonly CredentialKey[] = ["YC_OAUTH_TOKEN"];

export function isCredentialKey(key: string): key is CredentialKey {
  return CREDENTIAL_KEYS.some((k) => k === key);
}

export interface CredentialStore {
  /** Human-readable backend name (e.g. "macOS Keychain") */
  name: string;

  get(key: CredentialKey): string | null;
  set(key: CredentialKey, value: string): void;
  delete(key: CredentialKey): void;

  /** Returns true if this backend is available on the current system */
  isAvailable(): boolean;
}
