#!/usr/bin/env tsx
import "dotenv/config";
import { hideBin } from "yargs/helpers";
import { runCli } from "./run-cli";

process.exitCode = await runCli(hideBin(process.argv));
