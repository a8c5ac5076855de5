import pino from "pino";

const IS_TEST = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);

export type Logger = pino.Logger;

let root: Logger | null = null;

/**
 * The process-wide logger. Pretty-printed on a terminal, JSON in production
 * or when piped, silent under the test runner. Only one pino-pretty
 * transport is ever started.
 */
function rootLogger(): Logger {
  if (!root) {
    root = pino({
      level: IS_TEST ? "silent" : (process.env.LOG_LEVEL ?? "info"),
      transport:
        process.env.NODE_ENV === "production" || IS_TEST || !process.stdout.isTTY
          ? undefined
          : {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:standard",
              },
            },
    });
  }
  return root;
}

/**
 * Component logger, a child of the root logger tagged with `name`
 */
export function createLogger(name: string): Logger {
  return rootLogger().child({ name });
}

/**
 * Set the level for loggers created from now on.
 */
export function setLogLevel(level: string): void {
  process.env.LOG_LEVEL = level;
  if (root && !IS_TEST) {
    root.level = level;
  }
}
