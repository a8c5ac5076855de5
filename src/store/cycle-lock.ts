import { mkdir, open, readFile, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { CycleInProgressError } from "../errors/probe-errors";
import { type Logger, createLogger } from "../logger";

export const DEFAULT_STALE_LOCK = 6 * 60 * 60 * 1000; // 6 hours

export type CycleLockOptions = {
  /** A lock older than this is considered abandoned and taken over (milliseconds) */
  staleAfter?: number;
  /** Current time in milliseconds, for tests */
  now?: () => number;
};

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Exclusive lock file next to a local store, held for the duration of one
 * maintenance cycle so that overlapping invocations cannot overwrite each
 * other's results.
 */
export class CycleLock {
  readonly path: string;
  private readonly staleAfter: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private held = false;

  constructor(storePath: string, options: CycleLockOptions = {}) {
    this.path = `${storePath}.lock`;
    this.staleAfter = options.staleAfter ?? DEFAULT_STALE_LOCK;
    this.now = options.now ?? Date.now;
    this.log = createLogger("cycle-lock").child({ path: this.path });
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * @throws CycleInProgressError if a fresh lock is held by another cycle
   */
  async acquire(): Promise<void> {
    if (this.held) {
      return;
    }

    await mkdir(dirname(this.path), { recursive: true });

    if (await this.tryCreate()) {
      this.held = true;
      return;
    }

    const heldSince = await this.lockTime();
    if (heldSince === null) {
      // Released between our attempt and the check
      if (await this.tryCreate()) {
        this.held = true;
        return;
      }
      throw new CycleInProgressError(this.path, new Date(this.now()));
    }

    if (this.now() - heldSince < this.staleAfter) {
      throw new CycleInProgressError(this.path, new Date(heldSince));
    }

    this.log.warn(
      { heldSince: new Date(heldSince).toISOString() },
      "taking_over_stale_lock",
    );
    await rm(this.path, { force: true });

    if (!(await this.tryCreate())) {
      throw new CycleInProgressError(this.path, new Date(this.now()));
    }
    this.held = true;
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }

    await rm(this.path, { force: true });
    this.held = false;
  }

  private async tryCreate(): Promise<boolean> {
    try {
      const handle = await open(this.path, "wx");
      try {
        await handle.writeFile(
          JSON.stringify({ pid: process.pid, acquiredAt: this.now() }),
          "utf8",
        );
      } finally {
        await handle.close();
      }
      return true;
    } catch (err) {
      if (hasCode(err, "EEXIST")) {
        return false;
      }
      throw err;
    }
  }

  /**
   * Time the current lock was taken, from its contents or else its mtime;
   * null when no lock exists.
   */
  private async lockTime(): Promise<number | null> {
    try {
      const body = await readFile(this.path, "utf8");
      const acquiredAt: unknown = JSON.parse(body).acquiredAt;
      if (typeof acquiredAt === "number") {
        return acquiredAt;
      }
    } catch (err) {
      if (hasCode(err, "ENOENT")) {
        return null;
      }
      this.log.debug({ err }, "unreadable_lock_contents");
    }

    try {
      return (await stat(this.path)).mtimeMs;
    } catch (err) {
      if (hasCode(err, "ENOENT")) {
        return null;
      }
      throw err;
    }
  }
}
