/**
 * Failure reporting for env-report.
 * Stdout carries only the report and heartbeats, so diagnostics are written to stderr.
 */
import path from "node:path";

const DEFAULT_SCRIPT_NAME = "env-report";
const FALLBACK_MESSAGE = "Unexpected error.";

/** An anticipated failure, with follow-up hints for the operator. */
export class CliError extends Error {
  public readonly hints: readonly string[];

  constructor(message: string, hints: readonly string[] = []) {
    super(message);
    this.name = "CliError";
    this.hints = [...hints];
  }
}

export function getScriptName(argv: string[] = process.argv): string {
  const invoked = argv[1];
  if (!invoked) {
    return DEFAULT_SCRIPT_NAME;
  }
  const base = path.basename(invoked);
  return base === "index.ts" ? DEFAULT_SCRIPT_NAME : base;
}

/** One `ERROR:` line, then a `HINT:` line per hint. */
export function formatCliError(err: unknown): string[] {
  const message =
    err instanceof Error && err.message ? err.message : FALLBACK_MESSAGE;
  const hints = err instanceof CliError ? err.hints : [];
  return [`ERROR: ${message}`, ...hints.map((hint) => `HINT: ${hint}`)];
}

export function handleCliError(err: unknown): void {
  for (const line of formatCliError(err)) {
    console.error(line);
  }
}
