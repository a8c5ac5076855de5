import yargs from "yargs";
import { type ConfigOverrides, loadConfig } from "./config";
import { ConfigError, toError } from "./errors/probe-errors";
import { createLogger, setLogLevel } from "./logger";
import { buildLifetimeReport, formatLifetimeReport } from "./report";
import {
  type MaintenanceDependencies,
  exitCodeFor,
  runMaintenance,
} from "./run-maintenance";
import { createProbeStore } from "./store";

export type CliDependencies = MaintenanceDependencies & {
  /** Environment read for settings not given on the command line */
  env?: NodeJS.ProcessEnv;
  /** Output for reports (default: stdout) */
  print?: (text: string) => void;
};

/**
 * Parse the arguments and run the selected command.
 * Resolves to the process exit code; errors are logged, never thrown.
 */
export async function runCli(
  argv: string[],
  dependencies: CliDependencies = {},
): Promise<number> {
  const { env = process.env, print = console.log, ...maintenance } =
    dependencies;
  const logger = () => maintenance.logger ?? createLogger("dht-probe");

  try {
    await yargs(argv)
      .scriptName("dht-probe")
      .exitProcess(false)
      .fail((message, error, parser) => {
        if (error) {
          throw error;
        }
        parser.showHelp("error");
        throw new ConfigError([message]);
      })
      .option("log-level", {
        type: "string",
        choices: ["trace", "debug", "info", "warn", "error", "fatal", "silent"],
        describe: "Log verbosity",
      })
      .command(
        ["run [store]", "$0 [store]"],
        "Run one maintenance cycle: evaluate due probes and top up the population",
        (y) =>
          y
            .positional("store", {
              type: "string",
              describe: "Path or http(s) URL of the JSON result document",
            })
            .option("target-population", {
              type: "number",
              describe: "Number of active probes to maintain",
            })
            .option("intervals", {
              type: "string",
              describe: "Comma-separated evaluation intervals in hours",
            })
            .option("payload-min", {
              type: "number",
              describe: "Smallest payload in bytes",
            })
            .option("payload-max", {
              type: "number",
              describe: "Largest payload in bytes",
            })
            .option("concurrency", {
              type: "number",
              describe: "Maximum evaluations or creations in flight",
            })
            .option("settle-interval", {
              type: "number",
              describe: "Milliseconds between propagation checks",
            })
            .option("settle-attempts", {
              type: "number",
              describe: "Propagation checks before a new probe is dropped",
            })
            .option("connect-attempts", {
              type: "number",
              describe: "Connection attempts before the cycle is aborted",
            })
            .option("purge-routes", {
              type: "string",
              choices: ["true", "false"],
              describe: "Purge stale routes after connecting",
            })
            .option("network", {
              type: "string",
              choices: ["veilid", "memory"],
              describe: "veilid-server, or an in-memory network for a dry run",
            })
            .option("host", {
              type: "string",
              describe: "veilid-server host",
            })
            .option("port", {
              type: "number",
              describe: "veilid-server JSON API port",
            }),
        async (args) => {
          const overrides: ConfigOverrides = {
            storeLocation: args.store,
            targetPopulation: args["target-population"],
            evaluationIntervalsH: args.intervals,
            payloadMinBytes: args["payload-min"],
            payloadMaxBytes: args["payload-max"],
            concurrency: args.concurrency,
            settlePollIntervalMs: args["settle-interval"],
            settleMaxAttempts: args["settle-attempts"],
            connectAttempts: args["connect-attempts"],
            purgeRoutes: args["purge-routes"],
            network: args.network,
            veilidHost: args.host,
            veilidPort: args.port,
            logLevel: args["log-level"],
          };
          const config = loadConfig(overrides, env);
          setLogLevel(config.logLevel);

          const result = await runMaintenance(config, maintenance);

          if (result.status === "skipped") {
            logger().info({ reason: result.reason }, "done_without_cycle");
          } else {
            logger().info(result.summary, "done");
          }
        },
      )
      .command(
        "report [store]",
        "Summarise probe lifetimes from a result document",
        (y) =>
          y
            .positional("store", {
              type: "string",
              describe: "Path or http(s) URL of the JSON result document",
            })
            .option("json", {
              type: "boolean",
              default: false,
              describe: "Print the report as JSON",
            }),
        async (args) => {
          const config = loadConfig(
            { storeLocation: args.store, logLevel: args["log-level"] },
            env,
          );
          setLogLevel(config.logLevel);

          const store =
            maintenance.store ??
            createProbeStore(config.storeLocation, {
              timeout: config.rpcTimeoutMs,
            });
          const report = buildLifetimeReport((await store.load()).values());

          print(
            args.json
              ? JSON.stringify(report, null, 2)
              : formatLifetimeReport(report),
          );
        },
      )
      .strict()
      .help()
      .parseAsync();
  } catch (err) {
    const error = toError(err);
    logger().fatal({ error: error.name, reason: error.message }, "aborted");
    return exitCodeFor(error);
  }

  return 0;
}
