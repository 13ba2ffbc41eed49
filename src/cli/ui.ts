import pc from "picocolors";
import { NEGATIVE_STATES, NON_EXISTENT, POSITIVE_STATES, UNKNOWN } from "../providers/types.ts";
import type { PollResult } from "../compute/operations.ts";

// ── Status colors ───────────────────────────────────────────────────

function colorFor(status: string): (s: string) => string {
  if (status === "RUNNING") return pc.green;
  if (status === "ERROR" || status === "CRASHED" || status === UNKNOWN) return pc.red;
  if (POSITIVE_STATES.has(status)) return pc.yellow;
  if (NEGATIVE_STATES.has(status) || status === NON_EXISTENT) return pc.dim;
  return (s) => s;
}

/** Pad status to width, then colorize */
export function statusPad(status: string, width: number): string {
  return colorFor(status)(status.padEnd(width));
}

// ── Operation results ───────────────────────────────────────────────

export function printOperation(label: string, operationId: string | undefined): void {
  if (operationId) {
    console.log(`${pc.dim(label.padEnd(24))} ${operationId}`);
  } else {
    console.log(`${pc.dim(label.padEnd(24))} ${pc.yellow("no operation started")}`);
  }
}

export function printPollResult(result: PollResult | undefined): void {
  if (!result) return;
  if (result.state === "TIMED_OUT") {
    console.log(`${pc.yellow("timed out")}  ${result.message}`);
  } else if (result.operation.error) {
    console.log(`${pc.red("failed")}     ${result.message}`);
  } else {
    console.log(`${pc.green("done")}       ${result.message}`);
  }
}
