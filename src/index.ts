#!/usr/bin/env node
import { Command } from "commander";
import { registerCheckCommand } from "./commands/check.js";
import { registerDiscoverCommand } from "./commands/discover.js";
import { registerExtractCommand } from "./commands/extract.js";
import { logger } from "./lib/logger.js";

interface GlobalOptions {
  quiet?: boolean;
  json?: boolean;
  verbose?: boolean;
}

async function main() {
  const program = new Command();

  program
    .name("service-topology")
    .description("Discover service-to-service call topology and export it as an edge list")
    .version("1.0.0")
    .option("--quiet", "Only print errors")
    .option("--json", "Print log lines as JSON objects")
    .option("--verbose", "Print debug output and progress snapshots")
    .hook("preAction", (thisCommand) => {
      const { quiet, json, verbose } = thisCommand.opts<GlobalOptions>();
      logger.setOptions({ quiet: quiet === true, json: json === true, verbose: verbose === true });
    });

  registerDiscoverCommand(program);
  registerExtractCommand(program);
  registerCheckCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  logger.error("Error: Unexpected failure", e);
  process.exit(1);
});
