/**
 * Environment loading.
 * Captures the working directory and the reported variables once at startup,
 * and resolves the reporter's own settings from flags and ENV_REPORT_DEBUG.
 */
import path from "node:path";
import { CliError } from "./cli";
import { ENV_KEYS, NOT_SET, REPORTED_ENV_KEYS } from "./env-keys";
import type { ReportedEnvKey } from "./env-keys";

export type EnvEntry = {
  name: ReportedEnvKey;
  value: string;
  isSet: boolean;
};

/** Values observed at startup, in display order. Never re-read. */
export type EnvSnapshot = ReadonlyArray<Readonly<EnvEntry>>;

export type ProcessEnv = Record<string, string | undefined>;

export const DEFAULT_INTERVAL_SECONDS = 10;
/** Longest delay a Node timer holds; larger values fire after 1ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

export type LoadSettingsOptions = {
  interval?: number;
  once?: boolean;
  debug?: boolean;
};

export type ReporterSettings = {
  intervalMs: number;
  once: boolean;
  debug: boolean;
};

export function captureEnvSnapshot(env: ProcessEnv = process.env): EnvSnapshot {
  return Object.freeze(
    REPORTED_ENV_KEYS.map((name) => {
      const raw = env[name];
      const isSet = typeof raw === "string";
      return Object.freeze({
        name,
        value: isSet ? raw : NOT_SET,
        isSet,
      });
    }),
  );
}

export function resolveWorkingDirectory(
  readCwd: () => string = () => process.cwd(),
): string {
  let cwd: string;
  try {
    cwd = readCwd();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError("Unable to resolve the current working directory.", [
      `Check that the directory still exists (${reason}).`,
    ]);
  }
  return path.resolve(cwd);
}

export function loadSettings(
  options: LoadSettingsOptions = {},
  env: ProcessEnv = process.env,
): ReporterSettings {
  return {
    intervalMs: parseIntervalSeconds(options.interval) * 1000,
    once: Boolean(options.once),
    debug:
      typeof options.debug === "boolean"
        ? options.debug
        : getDebugDefault(env),
  };
}

/**
 * Returns true if ENV_REPORT_DEBUG is set to "true" or "1".
 * Used when --debug is not passed explicitly.
 */
export function getDebugDefault(env: ProcessEnv = process.env): boolean {
  const rawDebug = normalizeOptionalString(env[ENV_KEYS.ENV_REPORT_DEBUG]);
  return rawDebug ? parseBooleanFlag(rawDebug) : false;
}

function parseIntervalSeconds(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_INTERVAL_SECONDS;
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new CliError("Invalid --interval.", [
      "Use a positive number of seconds, e.g. --interval 10.",
    ]);
  }
  if (value * 1000 > MAX_INTERVAL_MS) {
    throw new CliError("Invalid --interval.", [
      `Use at most ${MAX_INTERVAL_MS / 1000} seconds.`,
    ]);
  }
  return value;
}

function parseBooleanFlag(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
}

function normalizeOptionalString(
  value: string | undefined,
): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}
