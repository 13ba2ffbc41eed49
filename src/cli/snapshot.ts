import { parseArgs } from "node:util";
import pc from "picocolors";
import { deleteSnapshot, snapshotAgeDays } from "../compute/snapshots.ts";
import { logger } from "../logger.ts";
import { api, config, instance, parseLifetime, poller } from "./context.ts";
import { printOperation, printPollResult } from "./ui.ts";
import { allSucceeded, prune, rotate } from "./workflows.ts";

export async function snapshotCommand(argv: string[]): Promise<void> {
  // "snapshot rm" is a two-word subcommand
  if (argv[0] === "rm") return snapshotRm(argv.slice(1));

  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      disk: { type: "string", short: "d" },
      wait: { type: "boolean", short: "w", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep snapshot — snapshot an instance disk

Usage:
  vmkeep snapshot <instance-id> [options]
  vmkeep snapshot rm <snapshot-id> [options]

Options:
  -d, --disk <disk-id>    Disk to snapshot (default: the boot disk)
  -w, --wait              Poll until the snapshot is ready
  -h, --help              Show this help

Snapshots are named <instance-name>-<DD-MM-YYYY-HH-MM-SS> (local time).`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  const { instance: vm, snapshots } = await instance(positionals[0] ?? "");
  const operationId = await snapshots.createSnapshot(values.disk ?? vm.bootDiskId);
  printOperation(vm.name ?? vm.instanceId, operationId);
  if (!operationId) {
    process.exitCode = 1;
    return;
  }

  if (values.wait) {
    const result = await (await poller()).wait(operationId);
    printPollResult(result);
    if (!allSucceeded([result])) process.exitCode = 1;
  }
}

async function snapshotRm(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      wait: { type: "boolean", short: "w", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep snapshot rm — delete snapshots

Usage:
  vmkeep snapshot rm <snapshot-id...> [options]

Options:
  -w, --wait              Poll until the deletions finish
  -h, --help              Show this help`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  const client = await api();
  const operationIds: Array<string | undefined> = [];
  for (const snapshotId of positionals) {
    const operationId = await deleteSnapshot(client, logger(), { snapshotId });
    printOperation(snapshotId, operationId);
    operationIds.push(operationId);
  }

  if (values.wait) {
    const results = await (await poller()).watchAll(operationIds);
    results.forEach(printPollResult);
    if (!allSucceeded(results)) process.exitCode = 1;
  }
}

export async function snapshotsCommand(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      old: { type: "boolean", default: false },
      lifetime: { type: "string", short: "l" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep snapshots — list boot-disk snapshots of an instance

Usage:
  vmkeep snapshots <instance-id> [options]

Options:
  --old                   Only snapshots at or past the retention lifetime
  -l, --lifetime <days>   Retention lifetime (default: VMKEEP_LIFETIME_DAYS or 7)
  --json                  Print raw snapshot objects
  -h, --help              Show this help`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  const { lifetimeDays } = config(parseLifetime(values.lifetime));
  const { instance: vm, snapshots } = await instance(positionals[0] ?? "");
  const list = values.old ? await snapshots.listOldSnapshots() : await snapshots.listSnapshots();

  if (!list) {
    process.exitCode = 1;
    return;
  }
  if (values.json) {
    console.log(JSON.stringify(list, null, 2));
    return;
  }
  if (list.length === 0) {
    console.log(values.old ? `No snapshots older than ${lifetimeDays} days.` : `No snapshots for ${vm.name}.`);
    return;
  }

  const now = new Date();
  console.log(pc.dim(`${"ID".padEnd(22)} ${"NAME".padEnd(40)} ${"CREATED".padEnd(22)} AGE`));
  for (const s of list) {
    const age = snapshotAgeDays(s.createdAt, now);
    const ageText = `${age}d`;
    console.log(
      `${s.id.padEnd(22)} ${s.name.padEnd(40)} ${s.createdAt.padEnd(22)} ${age >= lifetimeDays ? pc.yellow(ageText) : ageText}`
    );
  }
}

export async function pruneCommand(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      lifetime: { type: "string", short: "l" },
      "dry-run": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep prune — delete boot-disk snapshots past the retention lifetime

Usage:
  vmkeep prune <instance-id...> [options]

Options:
  -l, --lifetime <days>   Retention lifetime (default: VMKEEP_LIFETIME_DAYS or 7)
  --dry-run               List what would be deleted
  -h, --help              Show this help

A snapshot is old once its age in whole days reaches the lifetime.`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  config(parseLifetime(values.lifetime));
  const managed = await Promise.all(positionals.map((id) => instance(id)));

  if (values["dry-run"]) {
    for (const { instance: vm, snapshots } of managed) {
      const old = await snapshots.listOldSnapshots();
      if (!old) {
        process.exitCode = 1;
        continue;
      }
      for (const s of old) {
        console.log(`${pc.dim(vm.name ?? vm.instanceId)} would delete ${s.name} (${s.id})`);
      }
    }
    return;
  }

  const { results, ok } = await prune(managed, await poller());
  results.forEach(printPollResult);
  if (results.length === 0 && ok) console.log("Nothing to prune.");
  if (!ok) process.exitCode = 1;
}

export async function rotateCommand(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      lifetime: { type: "string", short: "l" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep rotate — fresh boot-disk snapshot, then prune old ones

Usage:
  vmkeep rotate <instance-id...> [options]

Options:
  -l, --lifetime <days>   Retention lifetime (default: VMKEEP_LIFETIME_DAYS or 7)
  -h, --help              Show this help

Instances are rotated concurrently. Old snapshots are only pruned once the
new snapshot has completed without error.`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  config(parseLifetime(values.lifetime));
  const managed = await Promise.all(positionals.map((id) => instance(id)));
  const { results, ok } = await rotate(managed, await poller(), logger());
  results.forEach(printPollResult);
  if (!ok) process.exitCode = 1;
}
