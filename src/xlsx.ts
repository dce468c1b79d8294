import * as XLSX from "xlsx";
import type { Cell, RawRow } from "./types.js";

export interface WorksheetTable {
  sheetName: string;
  header: Cell[];
  rows: RawRow[];
}

/**
 * Read the first worksheet of a workbook into a header row and positional data rows.
 * Cells keep their types (text, number, boolean); empty cells become `null`.
 * Times are Excel day fractions, as the workbook stores them.
 */
export function readWorkbookTable(fileBytes: Uint8Array): WorksheetTable {
  const workbook = XLSX.read(fileBytes, { type: "array" });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) return { sheetName: "", header: [], rows: [] };
  const sheet = workbook.Sheets[sheetName];

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true,
  });
  const [header = [], ...rows] = grid.map((row) => row.map(toCell));
  return { sheetName, header, rows };
}

function toCell(v: unknown): Cell {
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (v instanceof Date) return v.toISOString();
  return null;
}

/** A row whose first cell is empty is a trailing blank row (LibreOffice appends them). */
export function isBlankRow(row: RawRow): boolean {
  const first = row[0];
  return first === null || first === undefined || (typeof first === "string" && first.trim() === "");
}
