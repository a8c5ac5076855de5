import { FileProbeStore } from "./file-probe-store";
import { HttpProbeStore, type HttpProbeStoreOptions } from "./http-probe-store";
import type { ProbeStore } from "./probe-store.types";

export { CycleLock, DEFAULT_STALE_LOCK } from "./cycle-lock";
export type { CycleLockOptions } from "./cycle-lock";
export { FileProbeStore } from "./file-probe-store";
export { HttpProbeStore } from "./http-probe-store";
export type { HttpProbeStoreOptions } from "./http-probe-store";
export type { ProbeStore } from "./probe-store.types";

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/**
 * Pick the store implementation for a file path or http(s) URL
 */
export function createProbeStore(
  location: string,
  httpOptions: HttpProbeStoreOptions = {},
): ProbeStore {
  return isRemoteLocation(location)
    ? new HttpProbeStore(location, httpOptions)
    : new FileProbeStore(location);
}
