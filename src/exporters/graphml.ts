import fs from "node:fs/promises";
import { UNKNOWN, type ServiceNode } from "../services/entity-model.js";
import type { ResolvedEdge } from "../services/edge-schema.js";

type NodeAttribute = "label" | "displayName" | "processGroup" | "webApplicationId" | "webServerName" | "remoteEndpoint" | "serviceType";

const NODE_ATTRIBUTES: readonly NodeAttribute[] = [
  "label",
  "displayName",
  "processGroup",
  "webApplicationId",
  "webServerName",
  "remoteEndpoint",
  "serviceType",
];

const RELATION_KEY = `d${NODE_ATTRIBUTES.length}`;

// Code points XML 1.0 does not allow in a document, even as references
const NON_XML_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

function escapeXml(value: string): string {
  return value
    .replace(NON_XML_CHARACTERS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function nodeAttributes(node: ServiceNode): Record<NodeAttribute, string> {
  return {
    label: node.displayName,
    displayName: node.displayName,
    ...node.properties,
  };
}

function dataElements(values: Partial<Record<NodeAttribute, string>>): string[] {
  const elements: string[] = [];
  NODE_ATTRIBUTES.forEach((attribute, index) => {
    const value = values[attribute];
    if (value !== undefined) elements.push(`      <data key="d${index}">${escapeXml(value)}</data>`);
  });
  return elements;
}

function nodeElement(id: string, values: Partial<Record<NodeAttribute, string>>): string[] {
  return [`    <node id="${escapeXml(id)}">`, ...dataElements(values), "    </node>"];
}

/**
 * Directed graph with one node per known service, a label-only node for
 * every edge endpoint that never resolved, and one edge per resolved edge.
 */
export function formatGraphml(edges: readonly ResolvedEdge[], nodes: ReadonlyMap<string, ServiceNode>): string {
  const lines = [
    "<?xml version='1.0' encoding='utf-8'?>",
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xsi:schemaLocation="http://graphml.graphdrawing.org/xmlns http://graphml.graphdrawing.org/xmlns/1.0/graphml.xsd">',
    ...NODE_ATTRIBUTES.map(
      (attribute, index) => `  <key id="d${index}" for="node" attr.name="${attribute}" attr.type="string" />`,
    ),
    `  <key id="${RELATION_KEY}" for="edge" attr.name="relation" attr.type="string" />`,
    '  <graph edgedefault="directed">',
  ];

  const ids = [...nodes.keys()].sort();
  for (const id of ids) {
    const node = nodes.get(id);
    if (node) lines.push(...nodeElement(id, nodeAttributes(node)));
  }

  const placeholders = new Set<string>();
  for (const edge of edges) {
    for (const endpoint of [edge.source, edge.target]) {
      if (!nodes.has(endpoint.id) && !placeholders.has(endpoint.id)) {
        placeholders.add(endpoint.id);
        lines.push(...nodeElement(endpoint.id, { label: UNKNOWN, displayName: UNKNOWN }));
      }
    }
  }

  for (const edge of edges) {
    lines.push(
      `    <edge source="${escapeXml(edge.source.id)}" target="${escapeXml(edge.target.id)}">`,
      `      <data key="${RELATION_KEY}">${edge.relation}</data>`,
      "    </edge>",
    );
  }

  lines.push("  </graph>", "</graphml>");
  return `${lines.join("\n")}\n`;
}

export async function writeGraphml(
  edges: readonly ResolvedEdge[],
  nodes: ReadonlyMap<string, ServiceNode>,
  filePath: string,
): Promise<void> {
  await fs.writeFile(filePath, formatGraphml(edges, nodes), "utf-8");
}
