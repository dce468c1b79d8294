import type { RawRow } from "./types.js";

export interface CsvTable {
  header: string[];
  rows: RawRow[];
}

const QUOTE = `"`;
const DELIMITER = ",";

interface ScannedField {
  value: string;
  next: number;        // index after the field's terminator
  endOfRow: boolean;
}

/**
 * Read one field starting at `pos`. Quoted fields may contain delimiters,
 * newlines and doubled quotes; unquoted fields end at a delimiter or line end.
 * Carriage returns outside quotes are dropped.
 */
function scanField(text: string, pos: number): ScannedField {
  let value = "";
  let i = pos;
  while (i < text.length) {
    const c = text[i];
    if (c === QUOTE) {
      const close = closingQuote(text, i + 1);
      value += text.slice(i + 1, close).split(QUOTE + QUOTE).join(QUOTE);
      i = close + 1;
      continue;
    }
    if (c === DELIMITER) return { value, next: i + 1, endOfRow: false };
    if (c === "\n") return { value, next: i + 1, endOfRow: true };
    if (c !== "\r") value += c;
    i++;
  }
  return { value, next: text.length, endOfRow: true };
}

/** Index of the quote closing a quoted section opened before `from`; unterminated runs to the end. */
function closingQuote(text: string, from: number): number {
  let i = text.indexOf(QUOTE, from);
  while (i !== -1 && text[i + 1] === QUOTE) i = text.indexOf(QUOTE, i + 2);
  return i === -1 ? text.length : i;
}

/**
 * Parse CSV text into positional rows. A leading UTF-8 BOM is ignored, the
 * first row is the header and a final empty line is not a row.
 */
export function parseCsvTable(csvText: string): CsvTable {
  const text = csvText.startsWith("\uFEFF") ? csvText.slice(1) : csvText;
  const table: string[][] = [];
  let row: string[] = [];
  let pos = 0;
  do {
    const field = scanField(text, pos);
    row.push(field.value);
    pos = field.next;
    if (field.endOfRow) {
      table.push(row);
      row = [];
    }
  } while (pos < text.length);
  // A delimiter right before the end leaves one more empty field
  if (row.length) table.push([...row, ""]);

  const last = table[table.length - 1];
  if (last && last.every((v) => v === "")) table.pop();

  const [header = [], ...rows] = table;
  return { header: header.map((h) => h.trim()), rows };
}
