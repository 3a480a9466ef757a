import type { Command } from "commander";
import { CancellationToken } from "../lib/cancellation.js";
import type { ConnectionOptions } from "../lib/config.js";
import { runDiscovery } from "../services/discovery.js";
import {
  DEFAULT_OUTPUT,
  addConnectionOptions,
  formatsOrExit,
  loggerObserver,
  reportOutcome,
  resolveConfigOrExit,
  withInterrupt,
  type Env,
} from "./common.js";

interface ExtractOptions extends ConnectionOptions {
  output?: string;
  format?: string;
}

export interface ExtractCommandDeps {
  runDiscovery?: typeof runDiscovery;
  env?: Env;
}

/** Pages through every service in the environment and exports both call directions. */
export async function cmdExtract(options: ExtractOptions, deps: ExtractCommandDeps = {}): Promise<void> {
  const formats = formatsOrExit(options.format || "csv");
  const config = resolveConfigOrExit(options, deps.env);

  const token = new CancellationToken();
  const outcome = await withInterrupt(token, () =>
    (deps.runDiscovery ?? runDiscovery)(
      config,
      { mode: { kind: "full-scan" }, outputPath: options.output || DEFAULT_OUTPUT, formats },
      token,
      loggerObserver,
    ),
  );
  reportOutcome(outcome);
}

export function registerExtractCommand(program: Command): void {
  const command = program
    .command("extract")
    .description("Scan every service in the environment and export the full call topology")
    .option("--output <path>", "Output base path; the format extension is appended", DEFAULT_OUTPUT)
    .option("--format <list>", "Comma-separated export formats: xlsx, csv, graphml", "csv");
  addConnectionOptions(command).action((options: ExtractOptions) => cmdExtract(options));
}
