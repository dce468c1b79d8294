import type { Cell, HeaderDiagnostic, HeaderSpec, ResolvedHeader } from "./types.js";
import { log } from "./logger.js";
import { foldKey } from "./sanitize.js";

/**
 * Module: Header Resolution
 * Purpose: Map localized source column labels to canonical field names by
 * column position, reporting every expected label the header row lacks.
 */

/**
 * Resolve a header row against the expected label table.
 * - Labels and cells are compared after trimming, whitespace collapsing (newlines included),
 *   lower-casing and folding "ß" to "ss".
 * - When a label occurs in more than one column, the first column wins.
 * - The same label may be listed twice in `spec` to feed two fields from one column.
 * - A label missing from the header yields a diagnostic, never an exception.
 */
export function resolveHeaderMap(headerRow: readonly Cell[], spec: HeaderSpec): ResolvedHeader {
  if (!Array.isArray(headerRow)) {
    throw new TypeError("header row must be an array of cells");
  }
  const positions = new Map<string, number>();
  headerRow.forEach((cell, idx) => {
    const key = foldKey(cell);
    if (key && !positions.has(key)) positions.set(key, idx);
  });

  const map: Record<string, number> = {};
  const diagnostics: HeaderDiagnostic[] = [];
  for (const { label, field } of spec) {
    const idx = positions.get(foldKey(label));
    if (idx === undefined) {
      const message = `header "${label}" for field "${field}" not found`;
      log.headers(message);
      diagnostics.push({ label, field, message });
      continue;
    }
    if (map[field] === undefined) map[field] = idx;
  }
  return { map, diagnostics };
}
