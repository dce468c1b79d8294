import { parseGermanBoolean, parseTimeOfDay } from "./sanitize.js";

/**
 * Module: Opening Hours
 * Purpose: Build an OSM `opening_hours` string from the six begin/end columns
 * and the 24/7 flag of the reference tables.
 */

export const OPENING_TIME_FIELDS = [
  "opening_hours_is_24_7",
  "opening_hours_weekday_begin",
  "opening_hours_weekday_end",
  "opening_hours_saturday_begin",
  "opening_hours_saturday_end",
  "opening_hours_sunday_begin",
  "opening_hours_sunday_end",
] as const;

export type OpeningTimeField = (typeof OPENING_TIME_FIELDS)[number];
export type OpeningTimeInput = Partial<Record<OpeningTimeField, unknown>>;

export type OpeningHoursResult =
  | { ok: true; value?: string }
  | { ok: false; issues: Array<{ field: string; message: string }> };

const DAY_GROUPS = [
  { label: "Mo-Fr", begin: "opening_hours_weekday_begin", end: "opening_hours_weekday_end" },
  { label: "Sa", begin: "opening_hours_saturday_begin", end: "opening_hours_saturday_end" },
  { label: "Su", begin: "opening_hours_sunday_begin", end: "opening_hours_sunday_end" },
] as const;

/** Both spellings mean all day; downstream only accepts the second one. */
export function fixAllDayRange(hours: string): string {
  return hours.split("00:00-00:00").join("00:00-24:00");
}

/**
 * Format opening times.
 * - 24/7 flag set: `"24/7"`.
 * - Otherwise `"Mo-Fr 08:00-18:00; Sa 09:00-14:00"` for every day group with both times.
 * - No times at all: `{ ok: true }` without value.
 * - A day group with only one of begin/end, or an unreadable time, is an issue.
 */
export function formatOpeningHours(input: OpeningTimeInput): OpeningHoursResult {
  if (parseGermanBoolean(input.opening_hours_is_24_7) === true) {
    return { ok: true, value: "24/7" };
  }
  const issues: Array<{ field: string; message: string }> = [];
  const parts: string[] = [];
  for (const group of DAY_GROUPS) {
    const begin = parseTimeOfDay(input[group.begin]);
    const end = parseTimeOfDay(input[group.end]);
    if (begin === null) issues.push({ field: group.begin, message: `invalid time "${String(input[group.begin])}"` });
    if (end === null) issues.push({ field: group.end, message: `invalid time "${String(input[group.end])}"` });
    if (begin === null || end === null) continue;
    if (begin === undefined && end === undefined) continue;
    if (begin === undefined || end === undefined) {
      const missing = begin === undefined ? group.begin : group.end;
      issues.push({ field: missing, message: `${group.label} needs both begin and end` });
      continue;
    }
    parts.push(`${group.label} ${begin}-${end}`);
  }
  if (issues.length) return { ok: false, issues };
  if (!parts.length) return { ok: true };
  return { ok: true, value: fixAllDayRange(parts.join("; ")) };
}
