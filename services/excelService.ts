// services/excelService.ts
import * as XLSX from "xlsx";
import { promises as fs } from "node:fs";
import path from "node:path";
import { EXPORT_COLUMNS } from "../types.js";
import type { BomTable, CellValue, ExportRow } from "../types.js";
import { SchemaError } from "./errors.js";
import { logger } from "../lib/logger.js";

function isBlankCell(cell: CellValue): boolean {
  return cell === null || cell === undefined || String(cell).trim() === "";
}

function isBlankRow(row: readonly CellValue[]): boolean {
  return row.every(isBlankCell);
}

/**
 * Reads the first sheet of an xlsx/xls/csv file. The first non-empty row is
 * the header row; fully empty rows below it are dropped.
 */
export async function readBomTable(source: Buffer | string): Promise<BomTable> {
  const data = typeof source === "string" ? await fs.readFile(source) : source;

  // raw: CSV cells stay text, so "0603" is not read as 603.
  const workbook = XLSX.read(data, { type: "buffer", raw: true, cellDates: true });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    throw new SchemaError("Workbook has no sheets");
  }

  const worksheet = workbook.Sheets[firstSheetName];
  const grid = XLSX.utils.sheet_to_json<CellValue[]>(worksheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false
  });

  const headerIndex = grid.findIndex(row => !isBlankRow(row));
  if (headerIndex === -1) {
    throw new SchemaError(`Sheet "${firstSheetName}" is empty`);
  }

  const headers = grid[headerIndex];
  const rows = grid.slice(headerIndex + 1).filter(row => !isBlankRow(row));

  logger.info("[excel] BOM sheet read", {
    sheet: firstSheetName,
    columns: headers.length,
    rows: rows.length
  });

  return { headers, rows };
}

export function writeExportWorkbook(rows: readonly ExportRow[]): Buffer {
  const worksheet = XLSX.utils.json_to_sheet([...rows], { header: [...EXPORT_COLUMNS] });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, "BOM");

  const output: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return output;
}

export function exportFileName(now: Date = new Date()): string {
  const timestamp = now.toISOString().replace("T", "_").slice(0, 16).replace(/:/g, "-");
  return `BOM_Export_${timestamp}.xlsx`;
}

// Writes the export workbook into `dir` and returns the file path.
export async function exportToExcel(rows: readonly ExportRow[], dir: string): Promise<string> {
  const filePath = path.join(dir, exportFileName());
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(filePath, writeExportWorkbook(rows));

  logger.info("[excel] export written", { path: filePath, rows: rows.length });
  return filePath;
}
