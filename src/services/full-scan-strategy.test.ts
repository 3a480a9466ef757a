import { describe, it, expect, vi } from "vitest";
import { CancellationToken } from "../lib/cancellation.js";
import type { EntityGateway } from "../lib/entity-gateway.js";
import { EntityApiError } from "../lib/errors.js";
import type { TopologyObserver } from "../lib/observer.js";
import type { EntityPage, RawEntity } from "../lib/types.js";
import { FullScanStrategy } from "./full-scan-strategy.js";
import { TraversalEngine, type TraversalResult } from "./traversal.js";

function scanEntity(id: string, calls: string[] = [], calledBy: string[] = []): RawEntity {
  return {
    entityId: id,
    displayName: `${id.toLowerCase()}-service`,
    fromRelationships: { calls: calls.map((target) => ({ id: target, type: "SERVICE" })) },
    toRelationships: { called_by: calledBy.map((source) => ({ id: source, type: "SERVICE" })) },
  };
}

function makeGateway(pages: Record<string, EntityPage>, lookups: Record<string, RawEntity> = {}, overrides: Partial<EntityGateway> = {}): EntityGateway {
  return {
    fetchPage: vi.fn(async (cursor: string | undefined) => pages[cursor ?? "first"] ?? { entities: [] }),
    fetchByIds: vi.fn(async () => []),
    fetchById: vi.fn(async (id: string) => lookups[id] ?? null),
    testConnection: vi.fn(async () => ({ entities: [] })),
    close: vi.fn(async () => {}),
    ...overrides,
  };
}

function makeObserver(): TopologyObserver {
  return { onLog: vi.fn(), onProgress: vi.fn() };
}

function describeEdges(result: TraversalResult): string[] {
  return result.edges.map((edge) => `${edge.source.name}(${edge.source.id}) ${edge.relation} ${edge.target.name}(${edge.target.id})`);
}

async function runScan(gateway: EntityGateway, observer?: TopologyObserver, token = new CancellationToken()) {
  return new TraversalEngine(gateway, new FullScanStrategy(), { observer }).run(token);
}

const twoPages: Record<string, EntityPage> = {
  first: { entities: [scanEntity("A", ["B"], ["X"])], nextPageKey: "page-2", totalCount: 2 },
  "page-2": { entities: [scanEntity("B", ["GHOST"], ["A"])], totalCount: 2 },
};

describe("FullScanStrategy", () => {
  it("follows the cursor until a page has none", async () => {
    const gateway = makeGateway(twoPages);

    const result = await runScan(gateway);

    const cursors = vi.mocked(gateway.fetchPage).mock.calls.map(([cursor]) => cursor);
    expect(cursors).toEqual([undefined, "page-2"]);
    expect(result.discoveredCount).toBe(2);
  });

  it("stops paging when the server repeats a cursor", async () => {
    const observer = makeObserver();
    const gateway = makeGateway({
      first: { entities: [scanEntity("A")], nextPageKey: "loop" },
      loop: { entities: [scanEntity("B")], nextPageKey: "loop" },
    });

    const result = await runScan(gateway, observer);

    const cursors = vi.mocked(gateway.fetchPage).mock.calls.map(([cursor]) => cursor);
    expect(cursors).toEqual([undefined, "loop"]);
    expect(result.status).toBe("completed");
    expect(result.discoveredCount).toBe(2);
    expect(observer.onLog).toHaveBeenCalledWith("⚠ Server repeated page cursor loop; stopping pagination", "warn");
  });

  it("emits both call directions and names endpoints found by lookup", async () => {
    const gateway = makeGateway(twoPages, {
      X: { entityId: "X", displayName: "x-service", fromRelationships: { calls: [{ id: "Y", type: "SERVICE" }] } },
    });

    const result = await runScan(gateway);

    expect(result.status).toBe("completed");
    expect(describeEdges(result)).toEqual([
      "a-service(A) CALLS b-service(B)",
      "b-service(B) CALLS UNKNOWN(GHOST)",
      "x-service(X) CALLED_BY a-service(A)",
    ]);
    expect(result.unresolvedIds).toEqual(["GHOST"]);
    expect(result.nodes.size).toBe(3);
  });

  it("looks up each unknown id once and does not follow their relationships", async () => {
    const gateway = makeGateway(twoPages, {
      X: { entityId: "X", displayName: "x-service", fromRelationships: { calls: [{ id: "Y", type: "SERVICE" }] } },
    });

    const result = await runScan(gateway);

    const lookedUp = vi.mocked(gateway.fetchById).mock.calls.map(([id]) => id);
    expect(lookedUp).toEqual(["GHOST", "X"]);
    expect(result.edges.some((edge) => edge.target.id === "Y")).toBe(false);
  });

  it("keeps a lookup failure as UNKNOWN and warns", async () => {
    const observer = makeObserver();
    const gateway = makeGateway({ first: { entities: [scanEntity("A", [], ["SECRET"])] } }, {}, {
      fetchById: vi.fn(async () => {
        throw new EntityApiError("Token lacks scope", "non-retryable", "client-error", 403);
      }),
    });

    const result = await runScan(gateway, observer);

    expect(result.status).toBe("completed");
    expect(describeEdges(result)).toEqual(["UNKNOWN(SECRET) CALLED_BY a-service(A)"]);
    expect(observer.onLog).toHaveBeenCalledWith("⚠ Could not resolve ID SECRET: HTTP 403: Token lacks scope", "warn");
  });

  it("fails the run when a page cannot be fetched", async () => {
    const error = new EntityApiError("Rate limit exceeded after 5 retries", "exhausted", "rate-limit", 429);
    const gateway = makeGateway({}, {}, {
      fetchPage: vi.fn(async () => {
        throw error;
      }),
    });

    const result = await runScan(gateway);

    expect(result.status).toBe("failed");
    expect(result.error).toBe(error);
  });

  it("stops resolving when cancelled and keeps the edges", async () => {
    const token = new CancellationToken();
    const gateway = makeGateway({ first: { entities: [scanEntity("A", ["B", "C"])] } }, {}, {
      fetchById: vi.fn(async () => {
        token.cancel();
        return null;
      }),
    });

    const result = await runScan(gateway, undefined, token);

    expect(result.status).toBe("cancelled");
    expect(gateway.fetchById).toHaveBeenCalledOnce();
    expect(result.edges).toHaveLength(2);
  });

  it("succeeds with no services", async () => {
    const gateway = makeGateway({});

    const result = await runScan(gateway);

    expect(result.status).toBe("completed");
    expect(result.edges).toEqual([]);
    expect(gateway.fetchById).not.toHaveBeenCalled();
  });
});
