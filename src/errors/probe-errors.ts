/**
 * Base class for all probe-related errors
 */
export class ProbeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProbeError" as const;
  }
}

/**
 * Thrown when any network-layer call (create/open/read/write/close/inspect) fails
 */
export class TransportError extends ProbeError {
  constructor(
    public readonly operation: string,
    public readonly reason: string,
  ) {
    super(`${operation} failed: ${reason}`);
    this.name = "TransportError" as const;
  }
}

/**
 * Thrown when a read succeeded but the value is not the one that was written
 */
export class DataIntegrityError extends ProbeError {
  constructor(
    public readonly recordKey: string,
    public readonly reason: string,
  ) {
    super(reason);
    this.name = "DataIntegrityError" as const;
  }
}

/**
 * Thrown by a single settle poll while offline subkeys remain.
 * Retried by the settle waiter, never surfaced past it.
 */
export class RecordNotSettledError extends ProbeError {
  constructor(public readonly remainingSubkeys: number) {
    super(`${remainingSubkeys} subkeys not yet propagated`);
    this.name = "RecordNotSettledError" as const;
  }
}

/**
 * Thrown when a freshly written record never reports full propagation
 */
export class SettleTimeoutError extends ProbeError {
  constructor(
    public readonly recordKey: string,
    public readonly attempts: number,
    public readonly remainingSubkeys: number,
  ) {
    super(
      `Record ${recordKey} did not settle after ${attempts} attempts (${remainingSubkeys} subkeys offline)`,
    );
    this.name = "SettleTimeoutError" as const;
  }
}

/**
 * Thrown when a persisted snapshot exists but cannot be parsed
 */
export class CorruptStoreError extends ProbeError {
  constructor(
    public readonly location: string,
    public readonly reason: string,
  ) {
    super(`Store at ${location} is corrupt: ${reason}`);
    this.name = "CorruptStoreError" as const;
  }
}

/**
 * Thrown when no session to the network layer can be established
 */
export class ConnectionUnavailableError extends ProbeError {
  constructor(
    public readonly endpoint: string,
    public readonly reason: string,
  ) {
    super(`Unable to connect to ${endpoint}: ${reason}`);
    this.name = "ConnectionUnavailableError" as const;
  }
}

/**
 * Thrown when another maintenance cycle holds the store lock
 */
export class CycleInProgressError extends ProbeError {
  constructor(
    public readonly lockPath: string,
    public readonly heldSince: Date,
  ) {
    super(
      `Maintenance cycle already running (${lockPath} held since ${heldSince.toISOString()})`,
    );
    this.name = "CycleInProgressError" as const;
  }
}

/**
 * Thrown when configuration fails validation
 */
export class ConfigError extends ProbeError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError" as const;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
