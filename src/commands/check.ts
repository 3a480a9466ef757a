import type { Command } from "commander";
import { CancellationToken } from "../lib/cancellation.js";
import type { ClientConfig, ConnectionOptions } from "../lib/config.js";
import { HttpEntityGateway, type EntityGateway } from "../lib/entity-gateway.js";
import { describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { EXIT_FAILURE, addConnectionOptions, loggerObserver, resolveConfigOrExit, type Env } from "./common.js";

export interface CheckCommandDeps {
  createGateway?: (config: ClientConfig) => EntityGateway;
  env?: Env;
}

export async function cmdCheck(options: ConnectionOptions, deps: CheckCommandDeps = {}): Promise<void> {
  const config = resolveConfigOrExit(options, deps.env);
  const gateway = deps.createGateway?.(config) ?? new HttpEntityGateway(config, { observer: loggerObserver });

  logger.info(`Testing API connection to ${config.baseUrl} ...`);
  try {
    const page = await gateway.testConnection(new CancellationToken());
    const total = page.totalCount ?? page.entities.length;
    logger.info(`✓ API connection successful. Total services: ${total}`, { totalServices: total });
  } catch (err) {
    logger.error(`Error: API connection failed: ${describeError(err)}`);
    process.exit(EXIT_FAILURE);
  } finally {
    await gateway.close();
  }
}

export function registerCheckCommand(program: Command): void {
  const command = program
    .command("check")
    .description("Verify the API URL and token by requesting a single service");
  addConnectionOptions(command).action((options: ConnectionOptions) => cmdCheck(options));
}
