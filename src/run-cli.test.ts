import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryProbeStore } from "./__fixtures__/in-memory-store.fixture";
import { createProbeFixture } from "./__fixtures__/probe-record.fixture";
import { FileProbeStore } from "./store";
import { runCli } from "./run-cli";

type LogLine = Record<string, unknown>;

describe("runCli", () => {
  let directory: string;
  let storeLocation: string;
  let lines: LogLine[];
  let logger: pino.Logger;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "cli-"));
    storeLocation = join(directory, "stats.json");
    lines = [];
    logger = pino(
      { level: "info" },
      {
        write: (line: string) => {
          lines.push(JSON.parse(line));
        },
      },
    );
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const fatal = (): LogLine | undefined =>
    lines.find((line) => line.msg === "aborted");

  it("should run a cycle and exit with 0", async () => {
    // WHEN
    const code = await runCli(
      [
        "run",
        storeLocation,
        "--network",
        "memory",
        "--target-population",
        "2",
        "--settle-interval",
        "0",
      ],
      { env: {}, logger },
    );

    // THEN
    expect(code).toBe(0);
    expect((await new FileProbeStore(storeLocation).load()).size).toBe(2);
    expect(lines.find((line) => line.msg === "done")).toMatchObject({
      created: 2,
    });
    expect(fatal()).toBeUndefined();
  });

  it("should exit with 2 and log the reason for an invalid configuration", async () => {
    // WHEN
    const code = await runCli(
      [
        storeLocation,
        "--network",
        "memory",
        "--payload-min",
        "10",
        "--payload-max",
        "5",
      ],
      { env: {}, logger },
    );

    // THEN
    expect(code).toBe(2);
    expect(fatal()).toMatchObject({
      level: 60,
      error: "ConfigError",
      reason:
        "Invalid configuration: payloadMaxBytes: payloadMaxBytes must not be smaller than payloadMinBytes",
    });
  });

  it("should exit with 2 for an unknown option", async () => {
    // WHEN
    const code = await runCli([storeLocation, "--bogus"], { env: {}, logger });

    // THEN
    expect(code).toBe(2);
    expect(fatal()).toMatchObject({ level: 60, error: "ConfigError" });
    expect(fatal()?.reason).toContain("Unknown argument: bogus");
  });

  it("should exit with 1 and log the reason when the store is corrupt", async () => {
    // GIVEN
    await writeFile(storeLocation, "{ not json", "utf8");

    // WHEN
    const code = await runCli(
      [storeLocation, "--network", "memory", "--settle-interval", "0"],
      { env: {}, logger },
    );

    // THEN
    expect(code).toBe(1);
    expect(fatal()).toMatchObject({ level: 60, error: "CorruptStoreError" });
  });

  it("should print the lifetime report as JSON", async () => {
    // GIVEN
    const store = new InMemoryProbeStore(
      new Map([["VLD0:kept", createProbeFixture("VLD0:kept")]]),
    );
    const printed: string[] = [];

    // WHEN
    const code = await runCli(["report", "--json"], {
      env: {},
      logger,
      store,
      print: (text) => printed.push(text),
    });

    // THEN
    expect(code).toBe(0);
    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0] ?? "")).toMatchObject({ total: 1 });
  });
});
