import { setTimeout as sleep } from "node:timers/promises";

export const HEARTBEAT_MARKER = ".";

export type CancelSignal = { wait: Promise<void> };

/** Anything that accepts output chunks; process.stdout in production. */
export type OutputSink = {
  write(chunk: string): unknown;
};

export type HeartbeatOptions = {
  intervalMs: number;
  output: OutputSink;
  cancelSignal?: CancelSignal | null;
  onBeat?: (count: number) => void;
};

/** Resolve after `intervalMs`, or as soon as `cancelSignal` settles. */
export function waitForIntervalOrCancel(
  intervalMs: number,
  cancelSignal?: CancelSignal | null,
): Promise<void> {
  if (!cancelSignal) {
    return sleep(intervalMs);
  }

  const { wait } = cancelSignal;
  return new Promise<void>((resolve) => {
    const timer = setTimeout(resolve, intervalMs);
    void wait.then(() => {
      clearTimeout(timer);
      resolve();
    });
  });
}

/**
 * Write a marker after every interval. Without a cancel signal this never
 * resolves; the process ends on an external signal.
 * Returns the number of markers written.
 */
export async function runHeartbeat(options: HeartbeatOptions): Promise<number> {
  const { intervalMs, output, cancelSignal, onBeat } = options;
  let cancelled = false;
  void cancelSignal?.wait.then(() => {
    cancelled = true;
  });

  let count = 0;
  while (!cancelled) {
    await waitForIntervalOrCancel(intervalMs, cancelSignal);
    if (cancelled) {
      break;
    }
    output.write(HEARTBEAT_MARKER);
    count += 1;
    onBeat?.(count);
  }
  return count;
}
