import { parseArgs } from "node:util";
import pc from "picocolors";
import type { LifecycleAction } from "../providers/types.ts";
import { instance, poller } from "./context.ts";
import { printOperation, printPollResult, statusPad } from "./ui.ts";
import { allSucceeded, settle } from "./workflows.ts";

export async function statusCommand(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep status — show instance state

Usage:
  vmkeep status <instance-id...> [options]

Options:
  --json                  Print one JSON object per instance
  -h, --help              Show this help

Status is always fetched live; name, folder and disks come from the same fetch.`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  const managed = await Promise.all(positionals.map((id) => instance(id)));

  if (values.json) {
    for (const { instance: vm } of managed) {
      console.log(JSON.stringify({ ...(await vm.describe()), SecondaryDisks: vm.secondaryDiskIds ?? [] }));
    }
    return;
  }

  console.log(pc.dim(`${"ID".padEnd(22)} ${"NAME".padEnd(24)} ${"STATUS".padEnd(14)} BOOT DISK`));
  for (const { instance: vm } of managed) {
    if (!vm.exists) {
      console.log(pc.dim(await vm.render()));
      continue;
    }
    const status = await vm.status();
    console.log(
      `${vm.instanceId.padEnd(22)} ${(vm.name ?? "").padEnd(24)} ${statusPad(status, 14)} ${vm.bootDiskId ?? "-"}`
    );
  }
}

const ACTION_HELP: Record<LifecycleAction, string> = {
  start: "start stopped instances",
  stop: "stop running instances",
  restart: "restart running instances",
};

export async function lifecycleCommand(action: LifecycleAction, argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      wait: { type: "boolean", short: "w", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(`vmkeep ${action} — ${ACTION_HELP[action]}

Usage:
  vmkeep ${action} <instance-id...> [options]

Options:
  -w, --wait              Poll until the operation finishes (up to 10 min)
  -h, --help              Show this help

Instances already in the requested state are skipped with a log line.`);
    if (positionals.length === 0 && !values.help) process.exit(1);
    return;
  }

  const managed = await Promise.all(positionals.map((id) => instance(id)));

  const operationIds: Array<string | undefined> = [];
  for (const { instance: vm, lifecycle } of managed) {
    const operationId = await lifecycle[action]();
    printOperation(vm.name ?? vm.instanceId, operationId);
    operationIds.push(operationId);
  }

  if (!values.wait) return;

  const results = await settle(await poller(), operationIds);

  results.forEach(printPollResult);
  if (!allSucceeded(results)) process.exitCode = 1;
}
