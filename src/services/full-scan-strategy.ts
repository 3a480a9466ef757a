import { EntityApiError, EntityDecodeError, describeError, isCancellation } from "../lib/errors.js";
import { outgoingCandidates } from "./edge-materializer.js";
import { decodeBatch, decodeServiceNode } from "./entity-model.js";
import type { TraversalContext, TraversalStrategy } from "./traversal.js";

/**
 * Pages through every service with both call directions, then looks up each
 * edge endpoint that no page returned.
 *
 * Looked-up services only contribute their name and properties. Their own
 * relationships are not scanned, so the result is complete for one hop
 * outside the paged set and no further.
 */
export class FullScanStrategy implements TraversalStrategy {
  readonly name = "full-scan";

  async execute(context: TraversalContext): Promise<void> {
    await this.scanPages(context);
    await this.resolveUnknownIds(context);
  }

  private async scanPages({ gateway, state, token, observer, progress }: TraversalContext): Promise<void> {
    observer.onLog("Starting to fetch SERVICE entities...");

    let cursor: string | undefined;
    let pageCount = 0;
    do {
      token.throwIfCancelled();
      pageCount += 1;
      observer.onLog(`Fetching page ${pageCount}${cursor ? " (using nextPageKey)" : " (initial request)"}...`, "debug");

      const page = await gateway.fetchPage(cursor, token);
      const nodes = decodeBatch(page.entities, observer);
      for (const node of nodes) {
        if (!state.discovered.has(node.id)) state.discovered.set(node.id, node);
      }
      for (const candidate of outgoingCandidates(nodes)) {
        state.addEdge(candidate);
      }
      for (const node of nodes) {
        for (const sourceId of node.incomingCalls) {
          state.addEdge({ sourceId, targetId: node.id, relation: "CALLED_BY" });
        }
      }

      const total = page.totalCount === undefined ? "" : ` of ${page.totalCount}`;
      observer.onLog(`Page ${pageCount}: retrieved ${page.entities.length} entities (total: ${state.discovered.size}${total})`);
      progress(`Page ${pageCount}: ${state.discovered.size}${total} services`, 0);
      if (cursor !== undefined && page.nextPageKey === cursor) {
        observer.onLog(`⚠ Server repeated page cursor ${cursor}; stopping pagination`, "warn");
        break;
      }
      cursor = page.nextPageKey;
    } while (cursor);

    observer.onLog(`Pagination complete. Total pages: ${pageCount}, Total services: ${state.discovered.size}`);
  }

  private async resolveUnknownIds({ gateway, state, token, observer, progress }: TraversalContext): Promise<void> {
    const unknown = new Set<string>();
    for (const edge of state.edges) {
      if (!state.discovered.has(edge.sourceId)) unknown.add(edge.sourceId);
      if (!state.discovered.has(edge.targetId)) unknown.add(edge.targetId);
    }
    if (unknown.size === 0) return;

    observer.onLog(`Resolving ${unknown.size} unknown entity IDs...`);
    let resolvedCount = 0;
    for (const id of [...unknown].sort()) {
      token.throwIfCancelled();
      try {
        const raw = await gateway.fetchById(id, token);
        if (raw === null) continue;
        state.resolved.set(id, decodeServiceNode(raw));
        resolvedCount += 1;
      } catch (err) {
        if (isCancellation(err)) throw err;
        if (!(err instanceof EntityApiError) && !(err instanceof EntityDecodeError)) throw err;
        observer.onLog(`⚠ Could not resolve ID ${id}: ${describeError(err)}`, "warn");
      }
    }

    observer.onLog(`Resolved ${resolvedCount} unknown IDs. Remaining unknown: ${unknown.size - resolvedCount}`);
    progress(`Resolved ${resolvedCount} of ${unknown.size} unknown services`, 0);
  }
}
