#!/usr/bin/env -S node --import tsx
import "dotenv/config";
import { AuthenticationError, ConfigurationError, errorMessage } from "../errors.ts";
import { logger } from "../logger.ts";
import { authCommand } from "./auth.ts";
import { printHelp } from "./help.ts";
import { lifecycleCommand, statusCommand } from "./instance.ts";
import { pruneCommand, rotateCommand, snapshotCommand, snapshotsCommand } from "./snapshot.ts";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const command = argv[0];
  const rest = argv.slice(1);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  switch (command) {
    case "status":
    case "get":
      return statusCommand(rest);
    case "start":
    case "stop":
    case "restart":
      return lifecycleCommand(command, rest);
    case "snapshot":
      return snapshotCommand(rest);
    case "snapshots":
      return snapshotsCommand(rest);
    case "prune":
      return pruneCommand(rest);
    case "rotate":
      return rotateCommand(rest);
    case "auth":
      return authCommand(rest);
    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "vmkeep --help" for usage.');
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(err.message);
  } else if (err instanceof AuthenticationError) {
    // Nothing can be done without an IAM token
    logger().error(err.message);
  } else {
    logger().error(errorMessage(err));
  }
  process.exit(1);
});
