import fs from "node:fs/promises";
import { EDGE_COLUMNS, toEdgeValues, type ResolvedEdge } from "../services/edge-schema.js";

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvLine(values: readonly string[]): string {
  return values.map(csvField).join(",");
}

/** Header plus one line per edge, newline terminated. */
export function formatCsv(edges: readonly ResolvedEdge[]): string {
  const lines = [csvLine(EDGE_COLUMNS), ...edges.map((edge) => csvLine(toEdgeValues(edge)))];
  return `${lines.join("\n")}\n`;
}

export async function writeCsv(edges: readonly ResolvedEdge[], filePath: string): Promise<void> {
  await fs.writeFile(filePath, formatCsv(edges), "utf-8");
}
