export const DEFAULT_VEILID_HOST = "127.0.0.1";
export const DEFAULT_VEILID_PORT = 5959;
export const DEFAULT_RPC_TIMEOUT = 30_000; // 30 seconds
export const DEFAULT_CONNECT_TIMEOUT = 10_000; // 10 seconds
