import ExcelJS from "exceljs";
import { EDGE_COLUMNS, toEdgeRow, type ResolvedEdge } from "../services/edge-schema.js";

export const XLSX_SHEET_NAME = "Topology";

export function buildWorkbook(edges: readonly ResolvedEdge[]) {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(XLSX_SHEET_NAME);
  sheet.columns = EDGE_COLUMNS.map((column) => ({ header: column, key: column }));
  sheet.addRows(edges.map(toEdgeRow));
  return workbook;
}

export async function writeXlsx(edges: readonly ResolvedEdge[], filePath: string): Promise<void> {
  await buildWorkbook(edges).xlsx.writeFile(filePath);
}
