import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CycleInProgressError } from "../errors/probe-errors";
import { CycleLock } from "./cycle-lock";

const exists = (path: string): Promise<boolean> =>
  access(path).then(
    () => true,
    () => false,
  );

describe("CycleLock", () => {
  let directory: string;
  let storePath: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "cycle-lock-"));
    storePath = join(directory, "stats.json");
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("should create the lock file next to the store and remove it on release", async () => {
    // GIVEN
    const lock = new CycleLock(storePath, { now: () => 5_000 });

    // WHEN
    await lock.acquire();

    // THEN
    expect(lock.path).toBe(`${storePath}.lock`);
    expect(lock.isHeld).toBe(true);
    expect(JSON.parse(await readFile(lock.path, "utf8"))).toEqual({
      pid: process.pid,
      acquiredAt: 5_000,
    });

    await lock.release();
    expect(lock.isHeld).toBe(false);
    expect(await exists(lock.path)).toBe(false);
  });

  it("should refuse a second holder while the lock is fresh", async () => {
    // GIVEN
    const first = new CycleLock(storePath, { now: () => 10_000 });
    const second = new CycleLock(storePath, {
      now: () => 20_000,
      staleAfter: 60_000,
    });
    await first.acquire();

    // WHEN
    const error = await second.acquire().catch((err: unknown) => err);

    // THEN
    expect(error).toBeInstanceOf(CycleInProgressError);
    expect(error).toMatchObject({ lockPath: first.path, heldSince: new Date(10_000) });
    expect(second.isHeld).toBe(false);
    expect(await exists(first.path)).toBe(true);
  });

  it("should take over a lock older than the stale threshold", async () => {
    // GIVEN
    const abandoned = new CycleLock(storePath, { now: () => 1_000 });
    await abandoned.acquire();
    const next = new CycleLock(storePath, { now: () => 100_000, staleAfter: 50_000 });

    // WHEN
    await next.acquire();

    // THEN
    expect(next.isHeld).toBe(true);
    expect(JSON.parse(await readFile(next.path, "utf8")).acquiredAt).toBe(100_000);
  });

  it("should fall back to the file time when the lock contents are unreadable", async () => {
    // GIVEN
    await writeFile(`${storePath}.lock`, "garbage", "utf8");
    const lock = new CycleLock(storePath, { staleAfter: 60 * 60 * 1000 });

    // WHEN
    const acquiring = lock.acquire();

    // THEN
    await expect(acquiring).rejects.toBeInstanceOf(CycleInProgressError);
  });

  it("should be acquirable again after release", async () => {
    // GIVEN
    const first = new CycleLock(storePath);
    await first.acquire();
    await first.release();

    // WHEN
    const second = new CycleLock(storePath);
    await second.acquire();

    // THEN
    expect(second.isHeld).toBe(true);
    await second.release();
  });
});
