import { spawnSync } from "node:child_process";

export interface ExecResult {
  ok: boolean;
  stdout: string;
  stderr: string;
}

export function exec(cmd: string, args: string[], input?: string): ExecResult {
  const result = spawnSync(cmd, args, {
    input,
    encoding: "utf-8",
    stdio: ["pipe", "pipe", "pipe"],
  });
  return {
    // error is set when the binary itself is missing
    ok: !result.error && result.status === 0,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
  };
}
