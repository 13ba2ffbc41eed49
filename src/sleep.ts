export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const idle = new Int32Array(new SharedArrayBuffer(4));

/** Parks the current thread. Nothing else on the event loop runs meanwhile. */
export function sleepSync(ms: number): void {
  if (ms <= 0) return;
  Atomics.wait(idle, 0, 0, ms);
}
