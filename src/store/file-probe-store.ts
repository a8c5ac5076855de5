import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { type ProbeRecordMap, encodeDocument } from "../core";
import { type Logger, createLogger } from "../logger";
import { parseSnapshot } from "./parse-snapshot";
import type { ProbeStore } from "./probe-store.types";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Snapshot kept in a local JSON file. Saves go to a temporary file in the
 * same directory which is then renamed over the target.
 */
export class FileProbeStore implements ProbeStore {
  private readonly log: Logger;

  constructor(readonly location: string) {
    this.log = createLogger("file-store").child({ location });
  }

  async load(): Promise<ProbeRecordMap> {
    let body: string;
    try {
      body = await readFile(this.location, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        this.log.info("no_snapshot_found");
        return new Map();
      }
      throw err;
    }

    const records = parseSnapshot(this.location, body);
    this.log.debug({ records: records.size }, "snapshot_loaded");
    return records;
  }

  async save(records: ProbeRecordMap): Promise<void> {
    const directory = dirname(this.location);
    const tempPath = join(
      directory,
      `.${basename(this.location)}.${process.pid}.${Date.now()}.tmp`,
    );

    await mkdir(directory, { recursive: true });

    try {
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(JSON.stringify(encodeDocument(records)), "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.location);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }

    this.log.debug({ records: records.size }, "snapshot_saved");
  }
}
