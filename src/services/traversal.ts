import type { CancellationToken } from "../lib/cancellation.js";
import type { EntityGateway } from "../lib/entity-gateway.js";
import { isCancellation } from "../lib/errors.js";
import { nullObserver, type ProgressSnapshot, type TopologyObserver } from "../lib/observer.js";
import { DEFAULT_BATCH_SIZE } from "../lib/config.js";
import { materializeEdges, mergeCandidate, type EdgeCandidate } from "./edge-materializer.js";
import type { ResolvedEdge } from "./edge-schema.js";
import type { ServiceNode } from "./entity-model.js";

export type TraversalStatus = "idle" | "running" | "completed" | "cancelled" | "failed";

export interface FrontierEntry {
  readonly nodeId: string;
  readonly depth: number;
}

/** FIFO of pending entries. */
export class Frontier {
  private entries: FrontierEntry[] = [];
  private head = 0;

  get size(): number {
    return this.entries.length - this.head;
  }

  push(entry: FrontierEntry): void {
    this.entries.push(entry);
  }

  /** Removes and returns up to `limit` entries in queue order. */
  take(limit: number): FrontierEntry[] {
    const batch = this.entries.slice(this.head, this.head + limit);
    this.head += batch.length;
    if (this.head === this.entries.length) {
      this.entries = [];
      this.head = 0;
    }
    return batch;
  }

  clear(): void {
    this.entries = [];
    this.head = 0;
  }
}

/**
 * Working set of a single run. Cleared at the start of every run and owned by
 * exactly one engine.
 */
export class TraversalState {
  /** Every id ever enqueued; an id enters the frontier at most once. */
  readonly visited = new Set<string>();
  readonly frontier = new Frontier();
  /** Depth assigned on first discovery, never revised. */
  readonly depths = new Map<string, number>();
  /** Nodes fetched with their relationships. */
  readonly discovered = new Map<string, ServiceNode>();
  /** Nodes looked up only to name an edge endpoint; their relationships are not followed. */
  readonly resolved = new Map<string, ServiceNode>();
  private readonly edgeSet = new Map<string, EdgeCandidate>();
  maxDepth = 0;

  get edgeCount(): number {
    return this.edgeSet.size;
  }

  get edges(): Iterable<EdgeCandidate> {
    return this.edgeSet.values();
  }

  /** Marks `nodeId` visited and queues it; returns false when it was already visited. */
  enqueue(nodeId: string, depth: number): boolean {
    if (this.visited.has(nodeId)) return false;
    this.visited.add(nodeId);
    this.depths.set(nodeId, depth);
    this.frontier.push({ nodeId, depth });
    return true;
  }

  addEdge(candidate: EdgeCandidate): void {
    mergeCandidate(this.edgeSet, candidate);
  }

  /** Discovered nodes first, then lookup-only nodes not already discovered. */
  knownNodes(): Map<string, ServiceNode> {
    const nodes = new Map(this.discovered);
    for (const [id, node] of this.resolved) {
      if (!nodes.has(id)) nodes.set(id, node);
    }
    return nodes;
  }

  reset(): void {
    this.visited.clear();
    this.frontier.clear();
    this.depths.clear();
    this.discovered.clear();
    this.resolved.clear();
    this.edgeSet.clear();
    this.maxDepth = 0;
  }
}

export interface TraversalContext {
  readonly gateway: EntityGateway;
  readonly state: TraversalState;
  readonly token: CancellationToken;
  readonly observer: TopologyObserver;
  readonly batchSize: number;
  /** Emits a snapshot of `state` with the given status text. */
  progress(status: string, depth?: number): void;
}

/** How a run walks the remote graph. Cancellation surfaces as a thrown cancellation error. */
export interface TraversalStrategy {
  readonly name: string;
  execute(context: TraversalContext): Promise<void>;
}

export interface TraversalResult {
  status: Exclude<TraversalStatus, "idle" | "running">;
  /** Discovered and lookup-only nodes together. */
  nodes: ReadonlyMap<string, ServiceNode>;
  discoveredCount: number;
  depths: ReadonlyMap<string, number>;
  /** Materialized even when the run was cancelled or failed. */
  edges: ResolvedEdge[];
  maxDepth: number;
  /** Edge endpoints that never resolved to a node, sorted. */
  unresolvedIds: string[];
  error?: unknown;
}

export interface TraversalEngineOptions {
  observer?: TopologyObserver;
  batchSize?: number;
}

export class TraversalEngine {
  private readonly state = new TraversalState();
  private readonly observer: TopologyObserver;
  private readonly batchSize: number;
  private currentStatus: TraversalStatus = "idle";

  constructor(
    private readonly gateway: EntityGateway,
    private readonly strategy: TraversalStrategy,
    options: TraversalEngineOptions = {},
  ) {
    this.observer = options.observer ?? nullObserver;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  get status(): TraversalStatus {
    return this.currentStatus;
  }

  /**
   * Runs the strategy over a freshly reset state. Never rejects for a
   * traversal failure; the outcome is carried in `status` and `error`.
   */
  async run(token: CancellationToken): Promise<TraversalResult> {
    if (this.currentStatus === "running") {
      throw new Error("Traversal is already running");
    }

    this.state.reset();
    this.currentStatus = "running";

    const context: TraversalContext = {
      gateway: this.gateway,
      state: this.state,
      token,
      observer: this.observer,
      batchSize: this.batchSize,
      progress: (status, depth) => this.emitProgress(status, depth),
    };

    let error: unknown;
    try {
      await this.strategy.execute(context);
      this.currentStatus = "completed";
    } catch (err) {
      if (isCancellation(err)) {
        this.currentStatus = "cancelled";
      } else {
        this.currentStatus = "failed";
        error = err;
      }
    }

    const result = this.buildResult();
    this.emitProgress(this.finalStatusText());
    return error === undefined ? result : { ...result, error };
  }

  private buildResult(): TraversalResult {
    const nodes = this.state.knownNodes();
    const edges = materializeEdges(nodes, this.state.edges);

    const unresolved = new Set<string>();
    for (const edge of edges) {
      if (!nodes.has(edge.source.id)) unresolved.add(edge.source.id);
      if (!nodes.has(edge.target.id)) unresolved.add(edge.target.id);
    }

    return {
      status: this.terminalStatus(),
      nodes,
      discoveredCount: this.state.discovered.size,
      depths: new Map(this.state.depths),
      edges,
      maxDepth: this.state.maxDepth,
      unresolvedIds: [...unresolved].sort(),
    };
  }

  private terminalStatus(): TraversalResult["status"] {
    switch (this.currentStatus) {
      case "cancelled":
      case "failed":
        return this.currentStatus;
      default:
        return "completed";
    }
  }

  private finalStatusText(): string {
    switch (this.currentStatus) {
      case "cancelled":
        return "Cancelled";
      case "failed":
        return "Failed";
      default:
        return "Completed";
    }
  }

  private emitProgress(status: string, depth = this.state.maxDepth): void {
    const snapshot: ProgressSnapshot = {
      depth,
      discovered: this.state.discovered.size,
      edges: this.state.edgeCount,
      frontier: this.state.frontier.size,
      status,
    };
    this.observer.onProgress(snapshot);
  }
}
