import type {
  Cell,
  ConversionResult,
  ConvertOptions,
  ImportError,
  ParkingFeature,
  RawRow,
  RowDrop,
  Variant,
} from "./types.js";
import { resolveHeaderMap } from "./headers.js";
import { normalizeRow } from "./normalize.js";
import { getProfile } from "./profiles.js";
import { issuesByField, validateRecord } from "./schema.js";
import { assembleFeature, featureCollection } from "./feature.js";
import { isBlankRow } from "./xlsx.js";
import { HAS_REALTIME_DATA } from "./config.js";
import { log } from "./logger.js";

interface ConvertRowsInput {
  variant: Variant;
  header: readonly Cell[];
  rows: readonly RawRow[];
  options?: ConvertOptions;
}

/**
 * Module: Conversion Pipeline
 * Purpose: Header resolution -> row normalization -> validation -> feature assembly
 * for one table. Bad rows are collected as drops or import errors and never abort the run.
 * Design:
 * - The converter profile is chosen by `variant`; no per-variant code paths here.
 * - All rows share one clock reading function; each row is stamped when it is normalized.
 */
export function convertRows(input: ConvertRowsInput): ConversionResult {
  const profile = getProfile(input.variant);
  const sourceUid = input.options?.sourceUid ?? input.variant;
  const context = {
    now: input.options?.now ?? (() => new Date()),
    hasRealtimeData: input.options?.hasRealtimeData ?? HAS_REALTIME_DATA,
  };
  const { map, diagnostics } = resolveHeaderMap(input.header, profile.headers);

  const features: ParkingFeature[] = [];
  const errors: ImportError[] = [];
  const drops: RowDrop[] = [];

  for (let i = 0; i < input.rows.length; i++) {
    const row = input.rows[i];
    const rowNumber = i + 2;
    if (profile.dropPolicy === "prefilter" ? row.every(isEmptyCell) : isBlankRow(row)) continue;

    const outcome = normalizeRow(row, map, profile, context);
    if (outcome.kind === "drop") {
      log.rows("row %d dropped: %s", rowNumber, outcome.reason);
      drops.push({ row: rowNumber, reason: outcome.reason });
      continue;
    }

    const { record } = outcome;
    const result = validateRecord(profile.schema, record);
    const issues = [...outcome.issues, ...(result.ok ? [] : result.issues)];
    if (!result.ok || issues.length) {
      const recordUid = typeof record.uid === "string" ? record.uid : undefined;
      log.validate("row %d rejected with %d issues", rowNumber, issues.length);
      errors.push({
        sourceUid,
        ...(recordUid !== undefined ? { recordUid } : {}),
        message: `invalid ${profile.entity} data ${JSON.stringify(record)}: ${JSON.stringify(issuesByField(issues))}`,
      });
      continue;
    }
    features.push(assembleFeature(result.value, { coordinatesInProperties: profile.coordinatesInProperties }));
  }

  return {
    collection: featureCollection(features),
    errors,
    drops,
    headerDiagnostics: diagnostics,
  };
}

const isEmptyCell = (c: Cell | undefined): boolean =>
  c === null || c === undefined || (typeof c === "string" && c.trim() === "");
