import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir, hostname, userInfo } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { CredentialKey, CredentialStore } from "./types.ts";

export const DEFAULT_CREDENTIALS_PATH = join(homedir(), ".config", "vmkeep", "credentials.enc");

const ALGORITHM = "aes-256-gcm";
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const SALT_LENGTH = 16;

// All fields base64
const envelopeSchema = z.object({
  salt: z.string(),
  iv: z.string(),
  ciphertext: z.string(),
  tag: z.string(),
});

type Envelope = z.infer<typeof envelopeSchema>;

const credentialsSchema = z.record(z.string());

function machineSecret(): string {
  let machineId = "";
  try {
    machineId = readFileSync("/etc/machine-id", "utf-8").trim();
  } catch {
    // Not on Linux; host and user still bind the key to this machine
    machineId = "";
  }
  return `vmkeep:${hostname()}:${userInfo().username}:${machineId}`;
}

function seal(plaintext: string): Envelope {
  const salt = randomBytes(SALT_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, scryptSync(machineSecret(), salt, KEY_LENGTH), iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);

  return {
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    ciphertext: ciphertext.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
  };
}

function open(envelope: Envelope): string {
  const key = scryptSync(machineSecret(), Buffer.from(envelope.salt, "base64"), KEY_LENGTH);
  const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(envelope.iv, "base64"));
  decipher.setAuthTag(Buffer.from(envelope.tag, "base64"));
  return Buffer.concat([
    decipher.update(Buffer.from(envelope.ciphertext, "base64")),
    decipher.final(),
  ]).toString("utf-8");
}

export class EncryptedFileStore implements CredentialStore {
  name = "Encrypted File";

  constructor(private readonly path: string = DEFAULT_CREDENTIALS_PATH) {}

  private load(): Record<string, string> {
    if (!existsSync(this.path)) return {};
    try {
      const envelope = envelopeSchema.parse(JSON.parse(readFileSync(this.path, "utf-8")));
      return credentialsSchema.parse(JSON.parse(open(envelope)));
    } catch {
      // Corrupt, or sealed on another machine: start over
      return {};
    }
  }

  private save(data: Record<string, string>): void {
    mkdirSync(dirname(this.path), { recursive: true, mode: 0o700 });
    writeFileSync(this.path, JSON.stringify(seal(JSON.stringify(data)), null, 2), { mode: 0o600 });
  }

  get(key: CredentialKey): string | null {
    return this.load()[key] ?? null;
  }

  set(key: CredentialKey, value: string): void {
    this.save({ ...this.load(), [key]: value });
  }

  delete(key: CredentialKey): void {
    const data = this.load();
    delete data[key];
    this.save(data);
  }

  isAvailable(): boolean {
    return true;
  }
}
