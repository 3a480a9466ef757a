import type { ResolvedEdge } from "../services/edge-schema.js";
import type { ServiceNode } from "../services/entity-model.js";
import { writeCsv } from "./csv.js";
import { writeGraphml } from "./graphml.js";
import { writeXlsx } from "./xlsx.js";

export const EXPORT_FORMATS = ["xlsx", "csv", "graphml"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface TopologyExport {
  readonly edges: readonly ResolvedEdge[];
  readonly nodes: ReadonlyMap<string, ServiceNode>;
}

const KNOWN_EXTENSION = new RegExp(`\\.(${EXPORT_FORMATS.join("|")})$`, "i");

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/** `topology.csv` with format `xlsx` becomes `topology.xlsx`; unknown extensions are kept. */
export function resolveOutputPath(basePath: string, format: ExportFormat): string {
  return `${basePath.replace(KNOWN_EXTENSION, "")}.${format}`;
}

/** Writes every requested format in the given order, once each, and returns the paths written. */
export async function writeExports(
  topology: TopologyExport,
  basePath: string,
  formats: readonly ExportFormat[],
): Promise<string[]> {
  const written: string[] = [];
  for (const format of new Set(formats)) {
    const filePath = resolveOutputPath(basePath, format);
    switch (format) {
      case "xlsx":
        await writeXlsx(topology.edges, filePath);
        break;
      case "csv":
        await writeCsv(topology.edges, filePath);
        break;
      case "graphml":
        await writeGraphml(topology.edges, topology.nodes, filePath);
        break;
    }
    written.push(filePath);
  }
  return written;
}
