import type { CancellationToken } from "../lib/cancellation.js";
import type { ClientConfig } from "../lib/config.js";
import { HttpEntityGateway, type EntityGateway } from "../lib/entity-gateway.js";
import { describeError } from "../lib/errors.js";
import { nullObserver, type TopologyObserver } from "../lib/observer.js";
import { writeExports, type ExportFormat, type TopologyExport } from "../exporters/index.js";
import { countUnknownEdges } from "./edge-materializer.js";
import { FullScanStrategy } from "./full-scan-strategy.js";
import { RootBfsStrategy } from "./root-bfs-strategy.js";
import { TraversalEngine, type TraversalStrategy } from "./traversal.js";

export type DiscoveryMode = { kind: "roots"; rootIds: readonly string[] } | { kind: "full-scan" };

export interface DiscoveryRequest {
  mode: DiscoveryMode;
  outputPath: string;
  formats: readonly ExportFormat[];
}

/**
 * - `success`: services found and exported
 * - `empty`: nothing matched; not a failure. A full scan still writes header-only files
 * - `cancelled`: stopped on request; whatever was found is exported
 * - `failure`: the run or the export failed; `message` says why
 */
export type DiscoveryStatus = "success" | "empty" | "cancelled" | "failure";

export interface DiscoveryOutcome {
  status: DiscoveryStatus;
  message: string;
  totalServices: number;
  totalEdges: number;
  unknownEdges: number;
  maxDepth: number;
  outputFiles: string[];
}

export interface DiscoveryDeps {
  createGateway?: (config: ClientConfig, observer: TopologyObserver) => EntityGateway;
  writeExports?: (topology: TopologyExport, basePath: string, formats: readonly ExportFormat[]) => Promise<string[]>;
}

const RULE = "=".repeat(60);

function defaultGateway(config: ClientConfig, observer: TopologyObserver): EntityGateway {
  return new HttpEntityGateway(config, { observer });
}

function emptyOutcome(status: DiscoveryStatus, message: string): DiscoveryOutcome {
  return { status, message, totalServices: 0, totalEdges: 0, unknownEdges: 0, maxDepth: 0, outputFiles: [] };
}

function strategyFor(mode: DiscoveryMode): TraversalStrategy {
  return mode.kind === "roots" ? new RootBfsStrategy(mode.rootIds) : new FullScanStrategy();
}

/**
 * Runs one discovery end to end: traversal, edge materialization and export.
 * Never rejects. The gateway it creates is closed on every path.
 */
export async function runDiscovery(
  config: ClientConfig,
  request: DiscoveryRequest,
  token: CancellationToken,
  observer: TopologyObserver = nullObserver,
  deps: DiscoveryDeps = {},
): Promise<DiscoveryOutcome> {
  const strategy = strategyFor(request.mode);
  if (strategy instanceof RootBfsStrategy && strategy.rootIds.length === 0) {
    return emptyOutcome("failure", "No valid root service IDs provided");
  }

  observer.onLog(RULE);
  observer.onLog(strategy instanceof RootBfsStrategy ? "🚀 RECURSIVE TOPOLOGY DISCOVERY" : "🚀 FULL TOPOLOGY SCAN");
  observer.onLog(RULE);

  let gateway: EntityGateway;
  try {
    gateway = (deps.createGateway ?? defaultGateway)(config, observer);
  } catch (err) {
    return emptyOutcome("failure", `Unexpected error: ${describeError(err)}`);
  }

  try {
    const engine = new TraversalEngine(gateway, strategy, { observer, batchSize: config.batchSize });
    const result = await engine.run(token);
    const counts = {
      totalServices: result.discoveredCount,
      totalEdges: result.edges.length,
      unknownEdges: countUnknownEdges(result.edges),
      maxDepth: result.maxDepth,
    };

    if (result.status === "failed") {
      const message = describeError(result.error);
      observer.onLog(`❌ API Error: ${message}`, "error");
      return { status: "failure", message, ...counts, outputFiles: [] };
    }

    const exportTopology = async (): Promise<string[]> => {
      const files = await (deps.writeExports ?? writeExports)(
        { edges: result.edges, nodes: result.nodes },
        request.outputPath,
        request.formats,
      );
      for (const file of files) {
        observer.onLog(`💾 Exported: ${file}`);
      }
      return files;
    };
    const exportFailure = (err: unknown): DiscoveryOutcome => {
      const message = `Failed to write output file: ${describeError(err)}`;
      observer.onLog(`❌ File Error: ${message}`, "error");
      return { status: "failure", message, ...counts, outputFiles: [] };
    };

    if (result.discoveredCount === 0) {
      if (result.status === "cancelled") {
        return { status: "cancelled", message: "Discovery cancelled before any service was found", ...counts, outputFiles: [] };
      }
      if (strategy instanceof RootBfsStrategy) {
        observer.onLog("⚠ No services discovered!", "warn");
        return { status: "empty", message: "No services found. Check if root IDs are valid.", ...counts, outputFiles: [] };
      }

      // A scan of an empty environment still leaves a header-only export behind
      observer.onLog("⚠ No services discovered! The output file will be empty (header only)", "warn");
      try {
        return { status: "empty", message: "No services found.", ...counts, outputFiles: await exportTopology() };
      } catch (err) {
        return exportFailure(err);
      }
    }

    if (counts.unknownEdges > 0) {
      observer.onLog(`⚠ ${counts.unknownEdges} edges have UNKNOWN entity names`, "warn");
    }

    let outputFiles: string[];
    try {
      outputFiles = await exportTopology();
    } catch (err) {
      return exportFailure(err);
    }

    if (result.status === "cancelled") {
      observer.onLog("⚠ Discovery cancelled; partial results exported", "warn");
      return { status: "cancelled", message: "Discovery cancelled; partial results exported", ...counts, outputFiles };
    }

    observer.onLog(RULE);
    observer.onLog("✅ EXPORT COMPLETED SUCCESSFULLY");
    observer.onLog(`   Services Discovered: ${counts.totalServices}`);
    observer.onLog(`   Edges: ${counts.totalEdges}`);
    observer.onLog(`   Max Traversal Depth: ${counts.maxDepth}`);
    observer.onLog(`   Output Files: ${outputFiles.length}`);
    observer.onLog(RULE);
    return { status: "success", message: "Export completed successfully", ...counts, outputFiles };
  } catch (err) {
    return emptyOutcome("failure", `Unexpected error: ${describeError(err)}`);
  } finally {
    await gateway.close().catch((err: unknown) => {
      observer.onLog(`⚠ Failed to release the HTTP session: ${describeError(err)}`, "warn");
    });
  }
}
