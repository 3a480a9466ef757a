import { describe, it, expect } from "vitest";
import { decodeServiceNode, type ServiceNode } from "./entity-model.js";
import { countUnknownEdges, materializeEdges, outgoingCandidates } from "./edge-materializer.js";
import { EDGE_COLUMNS, toEdgeRow, toEdgeValues } from "./edge-schema.js";

function service(id: string, name: string, calls: string[] = []): ServiceNode {
  return decodeServiceNode({
    entityId: id,
    displayName: name,
    properties: { webApplicationId: `${name}-app` },
    fromRelationships: { calls: calls.map((target) => ({ id: target, type: "SERVICE" })) },
  });
}

function nodeMap(...nodes: ServiceNode[]): Map<string, ServiceNode> {
  return new Map(nodes.map((node) => [node.id, node]));
}

describe("materializeEdges", () => {
  it("attaches source and target snapshots", () => {
    const nodes = nodeMap(service("S-A", "alpha", ["S-B"]), service("S-B", "beta"));

    const [edge] = materializeEdges(nodes, outgoingCandidates(nodes.values()));

    expect(toEdgeRow(edge)).toEqual({
      Source_ID: "S-A",
      Source_Name: "alpha",
      Source_PG: "",
      Source_WebAppID: "alpha-app",
      Source_RemoteName: "",
      Source_WebServer: "",
      RELATION: "CALLS",
      Target_ID: "S-B",
      Target_Name: "beta",
      Target_PG: "",
      Target_WebAppID: "beta-app",
      Target_RemoteName: "",
      Target_WebServer: "",
    });
  });

  it("uses UNKNOWN placeholders for targets never fetched", () => {
    const nodes = nodeMap(service("S-A", "alpha", ["S-GHOST"]));

    const edges = materializeEdges(nodes, outgoingCandidates(nodes.values()));

    expect(toEdgeValues(edges[0])).toEqual(["S-A", "alpha", "", "alpha-app", "", "", "CALLS", "S-GHOST", "UNKNOWN", "", "", "", ""]);
    expect(countUnknownEdges(edges)).toBe(1);
  });

  it("keeps one edge per source and target pair", () => {
    const nodes = nodeMap(service("S-A", "alpha"), service("S-B", "beta"));

    const edges = materializeEdges(nodes, [
      { sourceId: "S-A", targetId: "S-B", relation: "CALLS" },
      { sourceId: "S-A", targetId: "S-B", relation: "CALLS" },
      { sourceId: "S-B", targetId: "S-A", relation: "CALLS" },
    ]);

    expect(edges.map((edge) => `${edge.source.id}>${edge.target.id}`)).toEqual(["S-A>S-B", "S-B>S-A"]);
  });

  it("prefers CALLS over CALLED_BY for the same pair in either order", () => {
    const nodes = nodeMap(service("S-A", "alpha"), service("S-B", "beta"));

    const calledFirst = materializeEdges(nodes, [
      { sourceId: "S-A", targetId: "S-B", relation: "CALLED_BY" },
      { sourceId: "S-A", targetId: "S-B", relation: "CALLS" },
    ]);
    const callsFirst = materializeEdges(nodes, [
      { sourceId: "S-A", targetId: "S-B", relation: "CALLS" },
      { sourceId: "S-A", targetId: "S-B", relation: "CALLED_BY" },
    ]);

    expect(calledFirst.map((edge) => edge.relation)).toEqual(["CALLS"]);
    expect(callsFirst.map((edge) => edge.relation)).toEqual(["CALLS"]);
  });

  it("sorts by source id, then target id", () => {
    const nodes = nodeMap(service("S-C", "gamma", ["S-A"]), service("S-A", "alpha", ["S-C", "S-B"]), service("S-B", "beta"));

    const edges = materializeEdges(nodes, outgoingCandidates(nodes.values()));

    expect(edges.map((edge) => `${edge.source.id}>${edge.target.id}`)).toEqual(["S-A>S-B", "S-A>S-C", "S-C>S-A"]);
  });

  it("returns nothing for no candidates", () => {
    expect(materializeEdges(new Map(), [])).toEqual([]);
  });
});

describe("EDGE_COLUMNS", () => {
  it("has a stable order", () => {
    expect(EDGE_COLUMNS.join(",")).toBe(
      "Source_ID,Source_Name,Source_PG,Source_WebAppID,Source_RemoteName,Source_WebServer,RELATION," +
        "Target_ID,Target_Name,Target_PG,Target_WebAppID,Target_RemoteName,Target_WebServer",
    );
  });
});
