import { z } from "zod";
import {
  DEFAULT_EVALUATION_INTERVALS_H,
  DEFAULT_PAYLOAD_MAX_BYTES,
  DEFAULT_PAYLOAD_MIN_BYTES,
  describeIssues,
} from "../core";
import { ConfigError } from "../errors/probe-errors";
import {
  DEFAULT_RPC_TIMEOUT,
  DEFAULT_VEILID_HOST,
  DEFAULT_VEILID_PORT,
} from "../network/network-client.constants";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_SETTLE_MAX_ATTEMPTS,
  DEFAULT_SETTLE_POLL_INTERVAL,
  DEFAULT_TARGET_POPULATION,
} from "../probe/probe.constants";
import { DEFAULT_STALE_LOCK } from "../store/cycle-lock";

export const DEFAULT_STORE_LOCATION = "./dht-probe-stats.json";

/** Comma-separated lists are accepted wherever an array is expected */
const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z.preprocess(
    (value) =>
      typeof value === "string"
        ? value
            .split(",")
            .map((entry) => entry.trim())
            .filter(Boolean)
        : value,
    z.array(item),
  );

const flag = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return value;
}, z.boolean());

const count = z.coerce.number().int();

export const probeConfigSchema = z
  .object({
    storeLocation: z.string().min(1).default(DEFAULT_STORE_LOCATION),
    targetPopulation: count.nonnegative().default(DEFAULT_TARGET_POPULATION),
    evaluationIntervalsH: listOf(count.positive())
      .refine((intervals) => intervals.length > 0, {
        message: "at least one interval is required",
      })
      .default([...DEFAULT_EVALUATION_INTERVALS_H]),
    payloadMinBytes: count.positive().default(DEFAULT_PAYLOAD_MIN_BYTES),
    payloadMaxBytes: count.positive().default(DEFAULT_PAYLOAD_MAX_BYTES),
    concurrency: count.positive().default(DEFAULT_CONCURRENCY),
    settlePollIntervalMs: count.nonnegative().default(DEFAULT_SETTLE_POLL_INTERVAL),
    settleMaxAttempts: count.positive().default(DEFAULT_SETTLE_MAX_ATTEMPTS),
    connectAttempts: count.positive().default(DEFAULT_CONNECT_ATTEMPTS),
    purgeRoutes: flag.default(true),
    network: z.enum(["veilid", "memory"]).default("veilid"),
    veilidHost: z.string().min(1).default(DEFAULT_VEILID_HOST),
    veilidPort: count.min(1).max(65_535).default(DEFAULT_VEILID_PORT),
    rpcTimeoutMs: count.positive().default(DEFAULT_RPC_TIMEOUT),
    staleLockMs: count.positive().default(DEFAULT_STALE_LOCK),
    logLevel: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info"),
  })
  .refine((config) => config.payloadMaxBytes >= config.payloadMinBytes, {
    message: "payloadMaxBytes must not be smaller than payloadMinBytes",
    path: ["payloadMaxBytes"],
  });

export type ProbeConfig = z.output<typeof probeConfigSchema>;
export type ProbeConfigKey = keyof ProbeConfig;

/**
 * Environment variable read for each setting
 */
export const CONFIG_ENV_VARS: Record<ProbeConfigKey, string> = {
  storeLocation: "DHT_PROBE_STORE",
  targetPopulation: "DHT_PROBE_TARGET_POPULATION",
  evaluationIntervalsH: "DHT_PROBE_INTERVALS_H",
  payloadMinBytes: "DHT_PROBE_PAYLOAD_MIN_BYTES",
  payloadMaxBytes: "DHT_PROBE_PAYLOAD_MAX_BYTES",
  concurrency: "DHT_PROBE_CONCURRENCY",
  settlePollIntervalMs: "DHT_PROBE_SETTLE_POLL_INTERVAL_MS",
  settleMaxAttempts: "DHT_PROBE_SETTLE_MAX_ATTEMPTS",
  connectAttempts: "DHT_PROBE_CONNECT_ATTEMPTS",
  purgeRoutes: "DHT_PROBE_PURGE_ROUTES",
  network: "DHT_PROBE_NETWORK",
  veilidHost: "DHT_PROBE_VEILID_HOST",
  veilidPort: "DHT_PROBE_VEILID_PORT",
  rpcTimeoutMs: "DHT_PROBE_RPC_TIMEOUT_MS",
  staleLockMs: "DHT_PROBE_STALE_LOCK_MS",
  logLevel: "LOG_LEVEL",
};

/**
 * Settings given explicitly, e.g. from the command line. Undefined entries
 * fall through to the environment and then to the defaults.
 */
export type ConfigOverrides = {
  [K in ProbeConfigKey]?: ProbeConfig[K] | string;
};

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, name] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Resolve configuration: defaults, then environment, then overrides.
 * @throws ConfigError listing every invalid setting
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ProbeConfig {
  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const parsed = probeConfigSchema.safeParse({ ...readEnv(env), ...explicit });
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }
  return parsed.data;
}
