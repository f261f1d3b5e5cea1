import type { EnvSnapshot } from "./env";

export const REPORT_TITLE = "=== Environment Variables Test ===";
export const VARIABLES_BANNER = "--- .env variables (should be loaded) ---";
export const IDLE_BANNER = "--- Running continuously, press Ctrl+C to stop ---";

/**
 * Render the startup report.
 * The idle banner carries no trailing newline: heartbeats continue on its line.
 */
export function formatReport(cwd: string, snapshot: EnvSnapshot): string {
  const lines = [
    REPORT_TITLE,
    `Current working directory: ${cwd}`,
    "",
    VARIABLES_BANNER,
    ...snapshot.map((entry) => `${entry.name}: ${entry.value}`),
    "",
    IDLE_BANNER,
  ];
  return lines.join("\n");
}
