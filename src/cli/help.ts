const HELP = `
vmkeep — lifecycle and snapshot rotation for Yandex Cloud instances

Usage:
  vmkeep <command> [options]

Instances:
  vmkeep status <id...> [--json]          Live status, name, folder, boot disk
  vmkeep start <id...> [-w]               Start instances
  vmkeep stop <id...> [-w]                Stop instances
  vmkeep restart <id...> [-w]             Restart instances

Snapshots:
  vmkeep snapshot <id> [-d <disk>] [-w]   Snapshot the boot (or given) disk
  vmkeep snapshot rm <snap-id...> [-w]    Delete snapshots
  vmkeep snapshots <id> [--old]           List boot-disk snapshots with age
  vmkeep prune <id...> [--dry-run]        Delete snapshots past the lifetime
  vmkeep rotate <id...>                   Snapshot, wait, then prune

Auth:
  vmkeep auth login                       Store the OAuth token interactively
  vmkeep auth logout                      Remove stored credentials
  vmkeep auth status                      Show where the token comes from
  vmkeep auth set <KEY> <VALUE>           Store a credential
  vmkeep auth get <KEY>                   Read a credential to stdout

Options:
  -h, --help                              Show this help
  -l, --lifetime <days>                   Override VMKEEP_LIFETIME_DAYS

Environment:
  YC_OAUTH_TOKEN                          OAuth token (or "vmkeep auth login")
  VMKEEP_LIFETIME_DAYS                    Snapshot retention in days (default: 7)
  VMKEEP_LOG_LEVEL                        debug, info, warn, error (default: info)
  VMKEEP_RETRY_ATTEMPTS                   Attempts per request on network errors (default: 3)
  VMKEEP_RETRY_DELAY_MS                   First retry delay, doubled each time (default: 1000)
  VMKEEP_REQUEST_TIMEOUT_MS               Per-request timeout (default: 30000)

Polling waits up to 10 minutes per operation, checking every 2 seconds.
`.trim();

export function printHelp(): void {
  console.log(HELP);
}
