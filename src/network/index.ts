export { MemoryNetwork, MemorySession } from "./memory-network";
export type {
  MemoryNetworkOptions,
  MemoryNetworkStats,
  MemoryOperation,
} from "./memory-network";
export { countOfflineSubkeys } from "./network-client.types";
export type {
  NetworkClient,
  NetworkSession,
  OfflineRange,
  PurgeScope,
  RecordHandle,
  RecordSchema,
} from "./network-client.types";
export { VeilidClient, VeilidSession } from "./veilid/veilid-client";
export type { VeilidClientOptions } from "./veilid/veilid-client";
