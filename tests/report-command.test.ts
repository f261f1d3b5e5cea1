import { afterEach, describe, expect, test, vi } from "vitest";
import { CliError } from "../src/cli";
import { runReport } from "../src/commands/report";
import { formatReport } from "../src/report";
import { captureEnvSnapshot } from "../src/env";
import { createCancelSignal, createRecordingSink } from "./helpers.output";

const continuous = { intervalMs: 10_000, once: false, debug: false };

afterEach(() => {
  vi.useRealTimers();
});

describe("runReport", () => {
  test("prints the report with a trailing newline and exits in once mode", async () => {
    const output = createRecordingSink();

    const result = await runReport({
      settings: { ...continuous, once: true },
      output,
      env: { DEBUG: "true", PORT: "8080" },
      readCwd: () => "/srv/app",
    });

    expect(result.heartbeats).toBe(0);
    expect(result.cwd).toBe("/srv/app");
    expect(output.chunks).toEqual([
      `${formatReport("/srv/app", captureEnvSnapshot({ DEBUG: "true", PORT: "8080" }))}\n`,
    ]);
  });

  test("writes the whole report in one chunk, then only markers", async () => {
    vi.useFakeTimers();
    const output = createRecordingSink();
    const { signal, cancel } = createCancelSignal();

    const run = runReport({
      settings: continuous,
      output,
      env: {},
      readCwd: () => "/srv/app",
      cancelSignal: signal,
    });
    expect(output.chunks).toHaveLength(1);
    expect(output.chunks[0]).toBe(formatReport("/srv/app", captureEnvSnapshot({})));

    await vi.advanceTimersByTimeAsync(25_000);
    cancel();
    const result = await run;

    expect(result.heartbeats).toBe(2);
    expect(output.chunks.slice(1)).toEqual([".", "."]);
    expect(output.chunks.join("")).toMatch(
      /--- Running continuously, press Ctrl\+C to stop ---\.\.$/,
    );
  });

  test("reports the values captured at startup", async () => {
    vi.useFakeTimers();
    const output = createRecordingSink();
    const { signal, cancel } = createCancelSignal();
    const env: Record<string, string | undefined> = { OVERRIDE_TEST: "first" };

    const run = runReport({
      settings: continuous,
      output,
      env,
      readCwd: () => "/srv/app",
      cancelSignal: signal,
    });
    env.OVERRIDE_TEST = "second";
    await vi.advanceTimersByTimeAsync(30_000);
    cancel();
    const result = await run;

    expect(result.snapshot[6]?.value).toBe("first");
    expect(output.chunks.filter((chunk) => chunk.includes("OVERRIDE_TEST"))).toEqual([
      output.chunks[0],
    ]);
    expect(output.chunks[0]).toContain("OVERRIDE_TEST: first");
  });

  test("fails before writing anything when the directory is gone", async () => {
    const output = createRecordingSink();

    await expect(
      runReport({
        settings: continuous,
        output,
        env: {},
        readCwd: () => {
          throw new Error("ENOENT");
        },
      }),
    ).rejects.toBeInstanceOf(CliError);
    expect(output.chunks).toEqual([]);
  });
});
