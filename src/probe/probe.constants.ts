export const DEFAULT_TARGET_POPULATION = 10;
export const DEFAULT_CONCURRENCY = 32; // Cap on simultaneous evaluations or creations
export const DEFAULT_SETTLE_POLL_INTERVAL = 1000; // 1 second
export const DEFAULT_SETTLE_MAX_ATTEMPTS = 120;
export const DEFAULT_CONNECT_ATTEMPTS = 3;
export const DEFAULT_CONNECT_RETRY_DELAY = 2000; // 2 seconds, doubled per attempt
