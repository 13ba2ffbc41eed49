import { createInterface } from "node:readline";
import pc from "picocolors";
import { CREDENTIAL_KEYS, getCredentialStatuses, getStore, isCredentialKey } from "../auth/index.ts";
import type { CredentialKey } from "../auth/index.ts";

const TOKEN_META: Record<CredentialKey, { label: string; url: string; pattern?: RegExp; hint?: string }> = {
  YC_OAUTH_TOKEN: {
    label: "Yandex Cloud OAuth token",
    url: "https://yandex.cloud/en/docs/iam/concepts/authorization/oauth-token",
    pattern: /^y[0-3]_/,
    hint: "should start with y0_, y1_, y2_ or y3_",
  },
};

async function readHiddenInput(prompt: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr, terminal: true });
  process.stderr.write(prompt);

  // Swallow echo while the token is typed
  const originalWrite = process.stderr.write.bind(process.stderr);
  process.stderr.write = () => true;

  return new Promise((resolve) => {
    rl.question("", (answer) => {
      process.stderr.write = originalWrite;
      process.stderr.write("\n");
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function login(): Promise<void> {
  const store = getStore();
  const statuses = getCredentialStatuses();

  console.log(pc.bold("\nvmkeep setup\n"));

  for (const { key, source } of statuses) {
    const meta = TOKEN_META[key];
    if (source !== "not set") {
      console.log(`${pc.green("✓")} ${meta.label} ${pc.dim(`(${key} already set via ${source})`)}`);
      continue;
    }

    console.log(`  ${pc.bold(meta.label)}`);
    console.log(`  ${pc.dim(meta.url)}\n`);

    const value = await readHiddenInput("  Paste token: ");
    if (!value) {
      console.log(pc.dim("  Skipped"));
      continue;
    }
    if (meta.pattern && !meta.pattern.test(value)) {
      console.log(pc.yellow(`  Warning: ${meta.hint}`));
    }

    store.set(key, value);
    console.log(pc.green(`  Saved to ${store.name}`));
  }

  console.log();
  status();
}

function logout(): void {
  const store = getStore();
  for (const key of CREDENTIAL_KEYS) {
    store.delete(key);
  }
  console.log(`All credentials removed from ${store.name}.`);
}

function status(): void {
  const store = getStore();

  console.log(`Backend: ${pc.cyan(store.name)}\n`);

  const keyWidth = Math.max(...CREDENTIAL_KEYS.map((k) => k.length)) + 2;
  for (const { key, source } of getCredentialStatuses()) {
    const label = key.padEnd(keyWidth);
    switch (source) {
      case "env":
        console.log(`  ${label} ${pc.green("set")} ${pc.dim("(via env)")}`);
        break;
      case "store":
        console.log(`  ${label} ${pc.green("set")} ${pc.dim(`(via ${store.name.toLowerCase()})`)}`);
        break;
      case "not set":
        console.log(`  ${label} ${pc.dim("not set")}`);
        break;
    }
  }
}

function requireKey(key: string | undefined, usage: string): CredentialKey {
  if (!key) {
    console.error(`Usage: ${usage}`);
    process.exit(1);
  }
  if (!isCredentialKey(key)) {
    console.error(`Unknown credential key: ${key}`);
    console.error(`Valid keys: ${CREDENTIAL_KEYS.join(", ")}`);
    process.exit(1);
  }
  return key;
}

export async function authCommand(argv: string[]): Promise<void> {
  const sub = argv[0];

  if (sub === "--help" || sub === "-h") {
    console.log(`vmkeep auth — manage credentials

Usage:
  vmkeep auth                       Guided setup (skips what's already set)
  vmkeep auth status                Show configured credentials and their source
  vmkeep auth set <KEY> <VALUE>     Store a single credential
  vmkeep auth get <KEY>             Read a credential to stdout
  vmkeep auth logout                Remove all stored credentials

Keys: ${CREDENTIAL_KEYS.join(", ")}

Precedence: environment variables (.env) > credential store`);
    return;
  }

  switch (sub) {
    case undefined:
    case "login":
      return login();
    case "logout":
      return logout();
    case "status":
      return status();
    case "set": {
      const key = requireKey(argv[1], "vmkeep auth set <KEY> <VALUE>");
      const value = argv[2];
      if (!value) {
        console.error("Usage: vmkeep auth set <KEY> <VALUE>");
        process.exit(1);
      }
      const store = getStore();
      store.set(key, value);
      console.log(`${key} stored in ${store.name}.`);
      return;
    }
    case "get": {
      const key = requireKey(argv[1], "vmkeep auth get <KEY>");
      // env > store, same as config loading
      const value = process.env[key] || getStore().get(key);
      if (!value) process.exit(1);
      process.stdout.write(value);
      return;
    }
    default:
      console.error(`Unknown auth command: ${sub}`);
      console.log("Available: login, logout, status, set, get");
      process.exit(1);
  }
}
