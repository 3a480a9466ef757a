import { EntityApiError, describeError, isCancellation } from "../lib/errors.js";
import { outgoingCandidates } from "./edge-materializer.js";
import { decodeBatch } from "./entity-model.js";
import type { TraversalContext, TraversalStrategy } from "./traversal.js";

const LOGGED_ROOTS = 5;

/** Trims ids, drops blanks and repeats; first occurrence keeps its position. */
export function normalizeRootIds(rootIds: readonly string[]): string[] {
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const raw of rootIds) {
    const id = raw.trim();
    if (id && !seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Breadth-first walk of outgoing calls from a set of root services, fetching
 * the frontier in batches. A batch that fails with an API error is logged and
 * skipped; its ids stay visited and are not retried.
 */
export class RootBfsStrategy implements TraversalStrategy {
  readonly name = "root-bfs";
  readonly rootIds: readonly string[];

  constructor(rootIds: readonly string[]) {
    this.rootIds = normalizeRootIds(rootIds);
  }

  async execute({ gateway, state, token, observer, batchSize, progress }: TraversalContext): Promise<void> {
    for (const id of this.rootIds) {
      state.enqueue(id, 0);
    }

    progress("Starting BFS traversal...", 0);
    observer.onLog("🔍 Starting BFS traversal...");
    observer.onLog(`   Root services: ${this.rootIds.length}`);
    for (const id of this.rootIds.slice(0, LOGGED_ROOTS)) {
      observer.onLog(`      • ${id}`, "debug");
    }
    if (this.rootIds.length > LOGGED_ROOTS) {
      observer.onLog(`      ... and ${this.rootIds.length - LOGGED_ROOTS} more`, "debug");
    }

    while (state.frontier.size > 0) {
      token.throwIfCancelled();

      const batch = state.frontier.take(batchSize);
      const requested = new Map(batch.map((entry) => [entry.nodeId, entry.depth]));
      const batchDepth = Math.max(...batch.map((entry) => entry.depth));
      state.maxDepth = Math.max(state.maxDepth, batchDepth);

      observer.onLog(`   Depth ${batchDepth}: Fetching ${batch.length} services...`);

      let raws: unknown[];
      try {
        raws = await gateway.fetchByIds([...requested.keys()], token);
      } catch (err) {
        if (isCancellation(err) || !(err instanceof EntityApiError)) throw err;
        observer.onLog(`   ⚠ API error fetching batch: ${describeError(err)}`, "warn");
        progress(`Depth ${batchDepth}: batch failed, continuing`, batchDepth);
        continue;
      }

      let accepted = 0;
      for (const node of decodeBatch(raws, observer)) {
        const depth = requested.get(node.id);
        if (depth === undefined) {
          observer.onLog(`      Ignoring unrequested entity ${node.id}`, "debug");
          continue;
        }
        if (state.discovered.has(node.id)) continue;

        state.discovered.set(node.id, node);
        accepted += 1;
        for (const candidate of outgoingCandidates([node])) {
          state.addEdge(candidate);
          state.enqueue(candidate.targetId, depth + 1);
        }
      }

      observer.onLog(`      Retrieved: ${accepted} services, Queue: ${state.frontier.size}`);
      progress(`Depth ${batchDepth}: retrieved ${accepted} of ${batch.length} services`, batchDepth);
    }

    observer.onLog(`✓ BFS traversal complete. Max depth: ${state.maxDepth}`);
  }
}
