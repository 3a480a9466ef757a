import type { ServiceProperties } from "./entity-model.js";

/** Outbound column order. Downstream spreadsheets and graph tools key on these names. */
export const EDGE_COLUMNS = [
  "Source_ID",
  "Source_Name",
  "Source_PG",
  "Source_WebAppID",
  "Source_RemoteName",
  "Source_WebServer",
  "RELATION",
  "Target_ID",
  "Target_Name",
  "Target_PG",
  "Target_WebAppID",
  "Target_RemoteName",
  "Target_WebServer",
] as const;

export type EdgeColumn = (typeof EDGE_COLUMNS)[number];

/**
 * `CALLS` is reported by the caller, `CALLED_BY` only by the callee. Both
 * describe the same direction: source calls target.
 */
export type Relation = "CALLS" | "CALLED_BY";

export interface EdgeEndpoint {
  readonly id: string;
  readonly name: string;
  readonly properties: ServiceProperties;
}

export interface ResolvedEdge {
  readonly source: EdgeEndpoint;
  readonly relation: Relation;
  readonly target: EdgeEndpoint;
}

export type EdgeRow = Record<EdgeColumn, string>;

export function toEdgeRow(edge: ResolvedEdge): EdgeRow {
  const { source, target } = edge;
  return {
    Source_ID: source.id,
    Source_Name: source.name,
    Source_PG: source.properties.processGroup,
    Source_WebAppID: source.properties.webApplicationId,
    Source_RemoteName: source.properties.remoteEndpoint,
    Source_WebServer: source.properties.webServerName,
    RELATION: edge.relation,
    Target_ID: target.id,
    Target_Name: target.name,
    Target_PG: target.properties.processGroup,
    Target_WebAppID: target.properties.webApplicationId,
    Target_RemoteName: target.properties.remoteEndpoint,
    Target_WebServer: target.properties.webServerName,
  };
}

/** Row values in column order. */
export function toEdgeValues(edge: ResolvedEdge): string[] {
  const row = toEdgeRow(edge);
  return EDGE_COLUMNS.map((column) => row[column]);
}
