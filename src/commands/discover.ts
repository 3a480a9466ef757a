import fs from "node:fs/promises";
import type { Command } from "commander";
import { CancellationToken } from "../lib/cancellation.js";
import type { ConnectionOptions } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { normalizeRootIds } from "../services/root-bfs-strategy.js";
import { runDiscovery } from "../services/discovery.js";
import {
  DEFAULT_OUTPUT,
  EXIT_USAGE,
  addConnectionOptions,
  formatsOrExit,
  loggerObserver,
  reportOutcome,
  resolveConfigOrExit,
  withInterrupt,
  type Env,
} from "./common.js";

interface DiscoverOptions extends ConnectionOptions {
  root?: string[];
  rootsFile?: string;
  output?: string;
  format?: string;
}

export interface DiscoverCommandDeps {
  runDiscovery?: typeof runDiscovery;
  readFile?: (path: string) => Promise<string>;
  env?: Env;
}

async function readRootsFile(path: string, readFile: (path: string) => Promise<string>): Promise<string[]> {
  try {
    const content = await readFile(path);
    return content.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.length > 0);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Error: Cannot read --roots-file ${path}: ${message}`);
    process.exit(EXIT_USAGE);
  }
}

export async function cmdDiscover(options: DiscoverOptions, deps: DiscoverCommandDeps = {}): Promise<void> {
  const readFile = deps.readFile ?? ((path: string) => fs.readFile(path, "utf-8"));

  const rootIds = [...(options.root ?? [])];
  if (options.rootsFile) {
    rootIds.push(...(await readRootsFile(options.rootsFile, readFile)));
  }
  if (normalizeRootIds(rootIds).length === 0) {
    logger.error("Error: --root or --roots-file is required");
    process.exit(EXIT_USAGE);
  }

  const formats = formatsOrExit(options.format || "xlsx");
  const config = resolveConfigOrExit(options, deps.env);

  const token = new CancellationToken();
  const outcome = await withInterrupt(token, () =>
    (deps.runDiscovery ?? runDiscovery)(
      config,
      { mode: { kind: "roots", rootIds }, outputPath: options.output || DEFAULT_OUTPUT, formats },
      token,
      loggerObserver,
    ),
  );
  reportOutcome(outcome);
}

export function registerDiscoverCommand(program: Command): void {
  const command = program
    .command("discover")
    .description("Walk the service call graph breadth-first from one or more root services")
    .option("--root <id...>", "Root service entity id (repeatable)")
    .option("--roots-file <path>", "File with one root service id per line")
    .option("--output <path>", "Output base path; the format extension is appended", DEFAULT_OUTPUT)
    .option("--format <list>", "Comma-separated export formats: xlsx, csv, graphml", "xlsx");
  addConnectionOptions(command).action((options: DiscoverOptions) => cmdDiscover(options));
}
