import type { Command } from "commander";
import type { CancellationToken } from "../lib/cancellation.js";
import { BASE_URL_ENV_VAR, resolveClientConfig, type ClientConfig, type ConnectionOptions } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import type { TopologyObserver } from "../lib/observer.js";
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from "../exporters/index.js";
import type { DiscoveryOutcome } from "../services/discovery.js";

export type Env = Record<string, string | undefined>;

export const DEFAULT_OUTPUT = "service_topology";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

/** Connection, batching and retry flags shared by every command that talks to the API. */
export function addConnectionOptions(command: Command): Command {
  return command
    .option("--base-url <url>", `Entity API base URL, e.g. https://{tenant}/api/v2 (default: $${BASE_URL_ENV_VAR})`)
    .option("--token <token>", "API token (default: $DYNATRACE_API_TOKEN)")
    .option("--profile <name>", "Deployment profile: saas or managed", "saas")
    .option("--verify-ssl", "Verify TLS certificates (default for saas)")
    .option("--no-verify-ssl", "Skip TLS certificate verification (default for managed)")
    .option("--batch-size <n>", "Service ids per by-id request (10-100)")
    .option("--page-size <n>", "Entities per page in a full scan (1-500)")
    .option("--from <time>", "Start of the timeframe, e.g. now-7d")
    .option("--to <time>", "End of the timeframe")
    .option("--max-retries <n>", "Retries for 429, 5xx and connection failures")
    .option("--initial-backoff <seconds>", "First retry delay")
    .option("--max-backoff <seconds>", "Retry delay cap")
    .option("--timeout <seconds>", "Per-request timeout");
}

/** Forwards core log lines to the CLI logger; progress only shows with --verbose. */
export const loggerObserver: TopologyObserver = {
  onLog(message, level = "info") {
    logger[level](message);
  },
  onProgress(snapshot) {
    logger.debug(
      `[depth ${snapshot.depth}] discovered=${snapshot.discovered} edges=${snapshot.edges} queue=${snapshot.frontier} ${snapshot.status}`,
    );
  },
};

export function resolveConfigOrExit(options: ConnectionOptions, env: Env = process.env): ClientConfig {
  const result = resolveClientConfig(options, env);
  if (!result.ok) {
    for (const message of result.errors) {
      logger.error(`Error: ${message}`);
    }
    process.exit(EXIT_USAGE);
  }

  for (const warning of result.warnings) {
    logger.warn(`⚠ ${warning}`);
  }
  return result.config;
}

/** Comma-separated format list; `undefined` when any entry is unknown. */
export function parseFormats(raw: string): ExportFormat[] | undefined {
  const formats: ExportFormat[] = [];
  for (const part of raw.split(",")) {
    const value = part.trim().toLowerCase();
    if (!value) continue;
    if (!isExportFormat(value)) return undefined;
    if (!formats.includes(value)) formats.push(value);
  }
  return formats.length > 0 ? formats : undefined;
}

export function formatsOrExit(raw: string): ExportFormat[] {
  const formats = parseFormats(raw);
  if (!formats) {
    logger.error(`Error: Invalid --format: ${raw}. Use a comma-separated list of ${EXPORT_FORMATS.join(", ")}.`);
    process.exit(EXIT_USAGE);
  }
  return formats;
}

/**
 * Runs `task` with Ctrl+C wired to `token`. A second Ctrl+C falls through to
 * the default handler.
 */
export async function withInterrupt<T>(token: CancellationToken, task: () => Promise<T>): Promise<T> {
  const onInterrupt = (): void => {
    logger.warn("⚠ Cancelling after the current request... (Ctrl+C again to abort)");
    token.cancel();
  };
  process.once("SIGINT", onInterrupt);
  try {
    return await task();
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

export function reportOutcome(outcome: DiscoveryOutcome): void {
  const data = {
    services: outcome.totalServices,
    edges: outcome.totalEdges,
    unknownEdges: outcome.unknownEdges,
    maxDepth: outcome.maxDepth,
    outputFiles: outcome.outputFiles,
  };

  switch (outcome.status) {
    case "success":
      logger.info(`✓ ${outcome.message}`, data);
      return;
    case "empty":
      logger.warn(`⚠ ${outcome.message}`);
      return;
    case "cancelled":
      logger.warn(`⚠ ${outcome.message}`, data);
      process.exit(EXIT_CANCELLED);
    case "failure":
      logger.error(`Error: ${outcome.message}`);
      process.exit(EXIT_FAILURE);
  }
}
