import { exec } from "./exec.ts";
import type { CredentialKey, CredentialStore } from "./types.ts";

const SERVICE = "vmkeep";

export class KeychainStore implements CredentialStore {
  name = "macOS Keychain";

  get(key: CredentialKey): string | null {
    const found = exec("security", ["find-generic-password", "-s", SERVICE, "-a", key, "-w"]);
    if (!found.ok) return null;
    return found.stdout.trim() || null;
  }

  set(key: CredentialKey, value: string): void {
    const added = exec("security", ["add-generic-password", "-s", SERVICE, "-a", key, "-w", value, "-U"]);
    if (!added.ok) {
      throw new Error(`Failed to store credential in Keychain: ${added.stderr}`);
    }
  }

  delete(key: CredentialKey): void {
    // Exits non-zero when the item is already gone
    exec("security", ["delete-generic-password", "-s", SERVICE, "-a", key]);
  }

  isAvailable(): boolean {
    return exec("security", ["help"]).ok;
  }
}
