import { ZodError } from "zod";
import { type ProbeRecordMap, decodeDocument, describeIssues } from "../core";
import { CorruptStoreError } from "../errors/probe-errors";

/**
 * Parse a snapshot body into records.
 * @throws CorruptStoreError when the body is not JSON or does not match the schema
 */
export function parseSnapshot(location: string, body: string): ProbeRecordMap {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    throw new CorruptStoreError(
      location,
      err instanceof Error ? err.message : "invalid JSON",
    );
  }

  try {
    return decodeDocument(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new CorruptStoreError(location, describeIssues(err).join("; "));
    }
    throw err;
  }
}
