import { EMPTY_PROPERTIES, UNKNOWN, type ServiceNode } from "./entity-model.js";
import type { EdgeEndpoint, Relation, ResolvedEdge } from "./edge-schema.js";

/** A relationship observed during traversal, before names are attached. */
export interface EdgeCandidate {
  readonly sourceId: string;
  readonly targetId: string;
  readonly relation: Relation;
}

/**
 * Adds `candidate` to a set keyed by (source, target). When a pair is seen
 * with both relations, `CALLS` wins.
 */
export function mergeCandidate(set: Map<string, EdgeCandidate>, candidate: EdgeCandidate): void {
  const key = `${candidate.sourceId}\u0000${candidate.targetId}`;
  const existing = set.get(key);
  if (!existing || (existing.relation === "CALLED_BY" && candidate.relation === "CALLS")) {
    set.set(key, candidate);
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function compareEdges(a: ResolvedEdge, b: ResolvedEdge): number {
  return (
    compareText(a.source.id, b.source.id) ||
    compareText(a.source.name, b.source.name) ||
    compareText(a.target.id, b.target.id) ||
    compareText(a.target.name, b.target.name) ||
    compareText(a.relation, b.relation)
  );
}

function endpoint(id: string, nodes: ReadonlyMap<string, ServiceNode>): EdgeEndpoint {
  const node = nodes.get(id);
  if (!node) return { id, name: UNKNOWN, properties: EMPTY_PROPERTIES };
  return { id, name: node.displayName, properties: node.properties };
}

/**
 * One CALLS candidate per outgoing call of every node, in map order.
 */
export function outgoingCandidates(nodes: Iterable<ServiceNode>): EdgeCandidate[] {
  const candidates: EdgeCandidate[] = [];
  for (const node of nodes) {
    for (const targetId of node.outgoingCalls) {
      candidates.push({ sourceId: node.id, targetId, relation: "CALLS" });
    }
  }
  return candidates;
}

/**
 * Attaches source and target snapshots to every candidate, keeps one edge per
 * (source, target) pair and returns them sorted by
 * (sourceId, sourceName, targetId, targetName, relation). Ids absent from
 * `nodes` get the `UNKNOWN` name and empty properties.
 */
export function materializeEdges(
  nodes: ReadonlyMap<string, ServiceNode>,
  candidates: Iterable<EdgeCandidate>,
): ResolvedEdge[] {
  const unique = new Map<string, EdgeCandidate>();
  for (const candidate of candidates) {
    mergeCandidate(unique, candidate);
  }

  const edges: ResolvedEdge[] = [];
  for (const candidate of unique.values()) {
    edges.push({
      source: endpoint(candidate.sourceId, nodes),
      relation: candidate.relation,
      target: endpoint(candidate.targetId, nodes),
    });
  }
  return edges.sort(compareEdges);
}

export function countUnknownEdges(edges: readonly ResolvedEdge[]): number {
  return edges.filter((edge) => edge.source.name === UNKNOWN || edge.target.name === UNKNOWN).length;
}
