export {
  CONFIG_ENV_VARS,
  DEFAULT_STORE_LOCATION,
  loadConfig,
  probeConfigSchema,
} from "./config";
export type { ConfigOverrides, ProbeConfig, ProbeConfigKey } from "./config";
