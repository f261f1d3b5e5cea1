#!/usr/bin/env tsx
/**
 * CLI entry point for env-report.
 * Prints the working directory and the monitored variables, then idles with a
 * heartbeat until interrupted.
 */
import fs from "node:fs";
import yargs from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { CliError, getScriptName, handleCliError } from "./cli";
import { runReport } from "./commands/report";
import { DEFAULT_INTERVAL_SECONDS, loadSettings } from "./env";
import { logFatal, setDebugMode } from "./logger";

const VERSION = readPackageVersion();

async function main(): Promise<void> {
  const rawArgs = hideBin(process.argv);
  const parser = yargs(rawArgs)
    .scriptName(getScriptName())
    .usage("Usage: $0 [options]")
    .option("interval", {
      type: "number",
      describe: `Seconds between heartbeat markers [default: ${DEFAULT_INTERVAL_SECONDS}]`,
    })
    .option("once", {
      type: "boolean",
      default: false,
      describe: "Print the report and exit instead of idling",
    })
    .option("debug", {
      type: "boolean",
      describe: "Log lifecycle events to ~/.config/env-report/debug.log",
    })
    .command(
      "$0",
      "Report the working directory and environment, then idle",
      (yargsInstance) => yargsInstance,
      async (argv) => {
        // --debug/--no-debug wins; otherwise ENV_REPORT_DEBUG decides.
        const debugExplicitlyPassed = rawArgs.some(
          (arg) => arg === "--debug" || arg === "--no-debug",
        );
        const settings = loadSettings({
          interval: typeof argv.interval === "number" ? argv.interval : undefined,
          once: Boolean(argv.once),
          debug: debugExplicitlyPassed ? Boolean(argv.debug) : undefined,
        });
        setDebugMode(settings.debug);
        await runReport({ settings });
      },
    )
    .version("version", `Show version (${VERSION})`, VERSION)
    .alias("version", "v")
    .strict()
    .help()
    .fail((message, error) => {
      if (error) {
        throw error;
      }
      throw new CliError(message, ["Run with --help to see usage."]);
    });

  await parser.parseAsync();
}

function readPackageVersion(): string {
  try {
    const raw = fs.readFileSync(
      new URL("../package.json", import.meta.url),
      "utf8",
    );
    const parsed: unknown = JSON.parse(raw);
    if (
      parsed &&
      typeof parsed === "object" &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch {
    // Fall through to the placeholder below.
  }
  return "0.0.0";
}

main().catch((error: unknown) => {
  logFatal(error);
  handleCliError(error);
  process.exitCode = 1;
});
