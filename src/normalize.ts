import type { Cell, Clock, HeaderMap, NormalizedRecord, RawRow } from "./types.js";
import type { ConverterProfile, FieldRule } from "./profiles.js";
import type { ValidationIssue } from "./schema.js";
import {
  collapseLines,
  digitsOnlyInteger,
  germanDurationSeconds,
  heightCentimeters,
  mapEnum,
  nonEmptyText,
  parseDecimal,
  parseGermanBoolean,
} from "./sanitize.js";
import { formatOpeningHours, OPENING_TIME_FIELDS, type OpeningTimeInput } from "./openingHours.js";

/**
 * Module: Row Normalization
 * Purpose: Turn one positional row into a canonical record using the header
 * map and the field rules of a converter profile.
 * Design:
 * - Missing or unusable optional values are omitted, never set to "" or null.
 * - `prefilter` profiles drop rows without uid/lat/lon here; `validator`
 *   profiles pass them on so schema validation reports them.
 * - Problems found while composing fields (opening hours, geometry text) are
 *   returned as `issues` next to the record.
 */

export interface NormalizeContext {
  now: Clock;
  hasRealtimeData: boolean;
}

export type NormalizeOutcome =
  | { kind: "record"; record: NormalizedRecord; issues: ValidationIssue[] }
  | { kind: "drop"; reason: string };

type RawFields = Record<string, Cell>;

/** Pick the mapped cells of a row by canonical field name. */
export function pickFields(row: RawRow, map: HeaderMap): RawFields {
  const raw: RawFields = {};
  for (const [field, idx] of Object.entries(map)) {
    raw[field] = row[idx] ?? null;
  }
  return raw;
}

export function normalizeRow(
  row: RawRow,
  map: HeaderMap,
  profile: ConverterProfile,
  context: NormalizeContext
): NormalizeOutcome {
  const raw = pickFields(row, map);
  const record: NormalizedRecord = {};
  const issues: ValidationIssue[] = [];

  const uid = nonEmptyText(raw.uid);
  const lat = parseDecimal(raw.lat);
  const lon = parseDecimal(raw.lon);
  if (profile.dropPolicy === "prefilter") {
    if (!uid) return { kind: "drop", reason: `Attribute 'uid' missing in row ${JSON.stringify(raw)}` };
    if (lat === undefined || lon === undefined) {
      return { kind: "drop", reason: `Attributes 'lat'/'lon' missing in row ${JSON.stringify(raw)}` };
    }
  }
  if (uid) record.uid = uid;
  // Unparseable coordinates stay raw so the schema names the offending value
  const latValue = lat ?? nonEmptyText(raw.lat);
  const lonValue = lon ?? nonEmptyText(raw.lon);
  if (latValue !== undefined) record.lat = latValue;
  if (lonValue !== undefined) record.lon = lonValue;

  for (const [field, rule] of Object.entries(profile.fields)) {
    applyFieldRule(record, issues, field, rule, raw[field]);
  }

  if (profile.address) {
    const [streetField, localityField] = profile.address;
    const parts = [nonEmptyText(raw[streetField]), nonEmptyText(raw[localityField])].filter(
      (p): p is string => p !== undefined
    );
    if (parts.length) record.address = parts.join(", ");
  }

  let hours: string | undefined;
  if (profile.openingHours) {
    const input: OpeningTimeInput = {};
    for (const k of OPENING_TIME_FIELDS) input[k] = raw[k];
    const result = formatOpeningHours(input);
    if (result.ok) hours = result.value;
    else issues.push(...result.issues.map((i) => ({ path: i.field, message: i.message })));
  }
  if (profile.openingHours === "opening_hours" && hours) {
    record.opening_hours = hours;
  }
  if (profile.openingHours === "restricted_to") {
    const typeField = profile.restrictedToTypeField;
    const restrictedType = typeField ? record[typeField] : undefined;
    if (typeField) delete record[typeField];
    const restriction: Record<string, unknown> = {};
    if (restrictedType !== undefined) restriction.type = restrictedType;
    if (hours) restriction.hours = hours;
    if (Object.keys(restriction).length) record.restricted_to = [restriction];
  }

  if (profile.realtimeFlag) record.has_realtime_data = context.hasRealtimeData;
  if (profile.stampUpdatedAt) record.static_data_updated_at = context.now().toISOString();

  return { kind: "record", record, issues };
}

function applyFieldRule(
  record: NormalizedRecord,
  issues: ValidationIssue[],
  field: string,
  rule: FieldRule,
  value: Cell | undefined
): void {
  const set = (v: unknown) => {
    if (v !== undefined) record[field] = v;
  };
  switch (rule.kind) {
    case "text":
      return set(nonEmptyText(value));
    case "lines":
      return set(collapseLines(value));
    case "integer":
      return set(digitsOnlyInteger(value));
    case "height":
      return set(heightCentimeters(value));
    case "duration":
      return set(germanDurationSeconds(value));
    case "boolean":
      return set(parseGermanBoolean(value));
    case "list": {
      const text = nonEmptyText(value);
      return set(text === undefined ? undefined : [text]);
    }
    case "enum": {
      const mapped = mapEnum(rule.table, value) ?? rule.fallback;
      return set(mapped !== undefined && rule.list ? [mapped] : mapped);
    }
    case "identifier": {
      const text = nonEmptyText(value);
      if (text !== undefined) record[rule.target] = [{ type: rule.type, value: text }];
      return;
    }
    case "json": {
      const text = nonEmptyText(value);
      if (text === undefined) return;
      const parsed = parseJsonObject(text);
      if (parsed === undefined) issues.push({ path: field, message: "expected a GeoJSON geometry object" });
      return set(parsed);
    }
  }
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return undefined;
  return Object.fromEntries(Object.entries(parsed));
}
