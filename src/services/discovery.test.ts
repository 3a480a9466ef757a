import { describe, it, expect, vi } from "vitest";
import { CancellationToken } from "../lib/cancellation.js";
import type { ClientConfig } from "../lib/config.js";
import type { EntityGateway } from "../lib/entity-gateway.js";
import { EntityApiError } from "../lib/errors.js";
import type { TopologyObserver } from "../lib/observer.js";
import { runDiscovery, type DiscoveryDeps, type DiscoveryRequest } from "./discovery.js";

const config: ClientConfig = {
  baseUrl: "https://tenant.example.com/e/env-1/api/v2",
  apiToken: "test-token",
  verifySsl: true,
  batchSize: 50,
  pageSize: 500,
  maxRetries: 5,
  initialBackoffMs: 1000,
  maxBackoffMs: 60000,
  requestTimeoutMs: 60000,
};

function entity(id: string, calls: string[] = []) {
  return {
    entityId: id,
    displayName: id.toLowerCase(),
    fromRelationships: { calls: calls.map((target) => ({ id: target, type: "SERVICE" })) },
  };
}

function makeGateway(graph: Record<string, string[]>, overrides: Partial<EntityGateway> = {}): EntityGateway {
  const known = new Map(Object.entries(graph));
  return {
    fetchPage: vi.fn(async () => ({ entities: [] })),
    fetchByIds: vi.fn(async (ids: readonly string[]) =>
      ids.flatMap((id) => {
        const calls = known.get(id);
        return calls ? [entity(id, calls)] : [];
      }),
    ),
    fetchById: vi.fn(async () => null),
    testConnection: vi.fn(async () => ({ entities: [] })),
    close: vi.fn(async () => {}),
    ...overrides,
  };
}

type CreateGateway = NonNullable<DiscoveryDeps["createGateway"]>;
type WriteExports = NonNullable<DiscoveryDeps["writeExports"]>;

function makeDeps(gateway: EntityGateway, files: string[] = ["/out/topology.xlsx"]) {
  return {
    createGateway: vi.fn<CreateGateway>(() => gateway),
    writeExports: vi.fn<WriteExports>(async () => files),
  };
}

function makeObserver(): TopologyObserver {
  return { onLog: vi.fn(), onProgress: vi.fn() };
}

function bfsRequest(rootIds: string[]): DiscoveryRequest {
  return { mode: { kind: "roots", rootIds }, outputPath: "/out/topology", formats: ["xlsx"] };
}

describe("runDiscovery", () => {
  it("discovers, exports and reports the counts", async () => {
    const gateway = makeGateway({ A: ["B"], B: [] });
    const deps = makeDeps(gateway);

    const outcome = await runDiscovery(config, bfsRequest(["A"]), new CancellationToken(), makeObserver(), deps);

    expect(outcome).toEqual({
      status: "success",
      message: "Export completed successfully",
      totalServices: 2,
      totalEdges: 1,
      unknownEdges: 0,
      maxDepth: 1,
      outputFiles: ["/out/topology.xlsx"],
    });
    expect(deps.createGateway).toHaveBeenCalledWith(config, expect.anything());
    const [topology, basePath, formats] = deps.writeExports.mock.calls[0];
    expect(topology.edges).toHaveLength(1);
    expect([...topology.nodes.keys()]).toEqual(["A", "B"]);
    expect(basePath).toBe("/out/topology");
    expect(formats).toEqual(["xlsx"]);
    expect(gateway.close).toHaveBeenCalledOnce();
  });

  it("treats an unknown root as an empty result", async () => {
    const gateway = makeGateway({});
    const deps = makeDeps(gateway);

    const outcome = await runDiscovery(config, bfsRequest(["NOPE"]), new CancellationToken(), makeObserver(), deps);

    expect(outcome.status).toBe("empty");
    expect(outcome.message).toBe("No services found. Check if root IDs are valid.");
    expect(deps.writeExports).not.toHaveBeenCalled();
    expect(gateway.close).toHaveBeenCalledOnce();
  });

  it("writes a header-only export when a full scan finds nothing", async () => {
    const gateway = makeGateway({});
    const deps = makeDeps(gateway, ["/out/topology.csv"]);
    const request: DiscoveryRequest = { mode: { kind: "full-scan" }, outputPath: "/out/topology", formats: ["csv"] };

    const outcome = await runDiscovery(config, request, new CancellationToken(), makeObserver(), deps);

    expect(outcome).toEqual({
      status: "empty",
      message: "No services found.",
      totalServices: 0,
      totalEdges: 0,
      unknownEdges: 0,
      maxDepth: 0,
      outputFiles: ["/out/topology.csv"],
    });
    const [topology, basePath, formats] = deps.writeExports.mock.calls[0];
    expect(topology.edges).toEqual([]);
    expect(basePath).toBe("/out/topology");
    expect(formats).toEqual(["csv"]);
    expect(gateway.close).toHaveBeenCalledOnce();
  });

  it("fails without opening a session when no root id is usable", async () => {
    const deps = makeDeps(makeGateway({}));

    const outcome = await runDiscovery(config, bfsRequest(["  ", ""]), new CancellationToken(), makeObserver(), deps);

    expect(outcome.status).toBe("failure");
    expect(outcome.message).toBe("No valid root service IDs provided");
    expect(deps.createGateway).not.toHaveBeenCalled();
  });

  it("exports partial results when cancelled mid-run", async () => {
    const token = new CancellationToken();
    const gateway = makeGateway(
      {},
      {
        fetchByIds: vi.fn(async () => {
          token.cancel();
          return [entity("A", ["B"])];
        }),
      },
    );
    const deps = makeDeps(gateway);

    const outcome = await runDiscovery(config, bfsRequest(["A"]), token, makeObserver(), deps);

    expect(outcome.status).toBe("cancelled");
    expect(outcome.totalServices).toBe(1);
    expect(outcome.unknownEdges).toBe(1);
    expect(deps.writeExports).toHaveBeenCalledOnce();
    expect(gateway.close).toHaveBeenCalledOnce();
  });

  it("reports a failed scan with the API message", async () => {
    const gateway = makeGateway(
      {},
      {
        fetchPage: vi.fn(async () => {
          throw new EntityApiError("Rate limit exceeded after 5 retries", "exhausted", "rate-limit", 429);
        }),
      },
    );
    const deps = makeDeps(gateway);
    const request: DiscoveryRequest = { mode: { kind: "full-scan" }, outputPath: "/out/topology", formats: ["csv"] };

    const outcome = await runDiscovery(config, request, new CancellationToken(), makeObserver(), deps);

    expect(outcome.status).toBe("failure");
    expect(outcome.message).toBe("HTTP 429: Rate limit exceeded after 5 retries");
    expect(deps.writeExports).not.toHaveBeenCalled();
    expect(gateway.close).toHaveBeenCalledOnce();
  });

  it("turns an export failure into a failure that keeps the counts", async () => {
    const gateway = makeGateway({ A: ["B"], B: [] });
    const deps = {
      createGateway: vi.fn<CreateGateway>(() => gateway),
      writeExports: vi.fn<WriteExports>(async () => {
        throw new Error("EACCES: permission denied");
      }),
    };

    const outcome = await runDiscovery(config, bfsRequest(["A"]), new CancellationToken(), makeObserver(), deps);

    expect(outcome.status).toBe("failure");
    expect(outcome.message).toBe("Failed to write output file: EACCES: permission denied");
    expect(outcome.totalServices).toBe(2);
    expect(outcome.totalEdges).toBe(1);
    expect(gateway.close).toHaveBeenCalledOnce();
  });

  it("still returns the outcome when releasing the session fails", async () => {
    const observer = makeObserver();
    const gateway = makeGateway(
      { A: [] },
      {
        close: vi.fn(async () => {
          throw new Error("already destroyed");
        }),
      },
    );

    const outcome = await runDiscovery(config, bfsRequest(["A"]), new CancellationToken(), observer, makeDeps(gateway));

    expect(outcome.status).toBe("success");
    expect(observer.onLog).toHaveBeenCalledWith("⚠ Failed to release the HTTP session: already destroyed", "warn");
  });

  it("never rejects when the gateway cannot be created", async () => {
    const deps: DiscoveryDeps = {
      createGateway: () => {
        throw new TypeError("Invalid URL");
      },
    };

    const outcome = await runDiscovery(config, bfsRequest(["A"]), new CancellationToken(), makeObserver(), deps);

    expect(outcome).toMatchObject({ status: "failure", message: "Unexpected error: Invalid URL" });
  });
});
