/**
 * File-based debug logger.
 * Appends lifecycle events to ~/.config/env-report/debug.log while debug mode is on.
 * Variable values are never written, only whether each one is set.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { EnvSnapshot } from "./env";

let debugMode = false;

/**
 * Enable or disable debug logging.
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Check if debug mode is enabled.
 */
export function isDebugMode(): boolean {
  return debugMode;
}

export function getLogDir(): string {
  return path.join(os.homedir(), ".config", "env-report");
}

export function getLogFilePath(): string {
  return path.join(getLogDir(), "debug.log");
}

function getTimestamp(): string {
  return new Date().toISOString();
}

function safeAppendLine(line: string): void {
  try {
    fs.mkdirSync(getLogDir(), { recursive: true });
    fs.appendFileSync(getLogFilePath(), line);
  } catch {
    // Best-effort logging; never fail the caller.
  }
}

function logEvent(event: string, detail: string): void {
  if (!isDebugMode()) {
    return;
  }
  safeAppendLine(`[${getTimestamp()}] ${event} ${detail}\n`);
}

export function logStartup(
  cwd: string,
  intervalMs: number,
  once: boolean,
): void {
  logEvent(
    "STARTUP",
    `cwd=${cwd} intervalMs=${intervalMs} mode=${once ? "once" : "continuous"}`,
  );
}

export function logSnapshot(snapshot: EnvSnapshot): void {
  if (!isDebugMode()) {
    return;
  }
  const states = snapshot.map(
    (entry) => `${entry.name}=${entry.isSet ? "set" : "unset"}`,
  );
  logEvent("SNAPSHOT", states.join(" "));
}

export function logReportEmitted(lineCount: number): void {
  logEvent("REPORT", `lines=${lineCount}`);
}

export function logHeartbeat(count: number): void {
  logEvent("HEARTBEAT", `#${count}`);
}

export function logFatal(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  logEvent("FATAL", message);
}
