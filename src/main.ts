#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli/run";
import { buildRuntime } from "./composition/container";

runCli(hideBin(process.argv), buildRuntime()).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
);
