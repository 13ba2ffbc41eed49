import { exec } from "./exec.ts";
import type { CredentialKey, CredentialStore } from "./types.ts";

const APP = "vmkeep";

export class SecretServiceStore implements CredentialStore {
  name = "Linux Secret Service";

  get(key: CredentialKey): string | null {
    const found = exec("secret-tool", ["lookup", "application", APP, "key", key]);
    if (!found.ok) return null;
    return found.stdout.trim() || null;
  }

  set(key: CredentialKey, value: string): void {
    // Value goes through stdin, never argv
    const stored = exec("secret-tool", ["store", "--label", `vmkeep ${key}`, "application", APP, "key", key], value);
    if (!stored.ok) {
      throw new Error(`Failed to store credential in Secret Service: ${stored.stderr}`);
    }
  }

  delete(key: CredentialKey): void {
    exec("secret-tool", ["clear", "application", APP, "key", key]);
  }

  isAvailable(): boolean {
    if (!exec("which", ["secret-tool"]).ok) return false;
    return !!process.env.DBUS_SESSION_BUS_ADDRESS;
  }
}
