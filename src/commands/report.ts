import { captureEnvSnapshot, resolveWorkingDirectory } from "../env";
import type { EnvSnapshot, ProcessEnv, ReporterSettings } from "../env";
import { runHeartbeat } from "../heartbeat";
import type { CancelSignal, OutputSink } from "../heartbeat";
import {
  logHeartbeat,
  logReportEmitted,
  logSnapshot,
  logStartup,
} from "../logger";
import { formatReport } from "../report";

export type RunReportOptions = {
  settings: ReporterSettings;
  output?: OutputSink;
  env?: ProcessEnv;
  readCwd?: () => string;
  /** Ends the idle loop early. The CLI never passes one. */
  cancelSignal?: CancelSignal | null;
};

export type ReportResult = {
  cwd: string;
  snapshot: EnvSnapshot;
  heartbeats: number;
};

export async function runReport(
  options: RunReportOptions,
): Promise<ReportResult> {
  const { settings, cancelSignal } = options;
  const output = options.output ?? process.stdout;

  const cwd = resolveWorkingDirectory(options.readCwd);
  const snapshot = captureEnvSnapshot(options.env);
  logStartup(cwd, settings.intervalMs, settings.once);
  logSnapshot(snapshot);

  // One write, so a tailing observer sees the whole report at once.
  const report = formatReport(cwd, snapshot);
  output.write(settings.once ? `${report}\n` : report);
  logReportEmitted(report.split("\n").length);

  if (settings.once) {
    return { cwd, snapshot, heartbeats: 0 };
  }

  const heartbeats = await runHeartbeat({
    intervalMs: settings.intervalMs,
    output,
    cancelSignal,
    onBeat: logHeartbeat,
  });
  return { cwd, snapshot, heartbeats };
}
