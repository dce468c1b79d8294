import { existsSync, readFileSync, statSync } from "node:fs";
import { basename, extname, join } from "node:path";
import { convertRows } from "./pipeline.js";
import { parseCsvTable } from "./csv.js";
import { readWorkbookTable } from "./xlsx.js";
import { outputPathFor, writeFeatureCollection } from "./writer.js";
import { ConversionInputError } from "./errors.js";
import { SOURCES_DIR } from "./config.js";
import { SOURCE_GROUPS, type ConversionResult, type ConvertOptions, type SourceGroup } from "./types.js";

export * from "./types.js";
export * from "./sanitize.js";
export { resolveHeaderMap } from "./headers.js";
export { normalizeRow, type NormalizeContext, type NormalizeOutcome } from "./normalize.js";
export { getProfile, type ConverterProfile, type FieldRule } from "./profiles.js";
export { validateRecord, type ValidationIssue, type ValidationResult } from "./schema.js";
export { formatOpeningHours, fixAllDayRange } from "./openingHours.js";
export { assembleFeature, featureCollection, stripEmpty } from "./feature.js";
export { outputPathFor, serializeFeatureCollection, writeFeatureCollection } from "./writer.js";
export { parseCsvTable } from "./csv.js";
export { readWorkbookTable } from "./xlsx.js";
export { ConversionInputError } from "./errors.js";
export { convertRows };

/**
 * Module: Converter Entry Point
 * Purpose: File-level API used by the CLI: read an input file, convert it and
 * write `<input>.geojson` beside it.
 */

export interface FileConversion extends ConversionResult {
  inputPath: string;
  outputPath: string;
}

const isFile = (p: string): boolean => existsSync(p) && statSync(p).isFile();

export function isSourceGroup(value: string): value is SourceGroup {
  return SOURCE_GROUPS.some((g) => g === value);
}

/** `sources/<source_group>/<source_uid>.xlsx` */
export function resolveSourcePath(sourceUid: string, sourceGroup: SourceGroup, sourcesDir: string = SOURCES_DIR): string {
  return join(sourcesDir, sourceGroup, `${sourceUid}.xlsx`);
}

/**
 * Convert a CSV file with a `uid,lat,lon,…` header.
 * Rows without uid or coordinates are reported in `drops`.
 */
export function convertCsvFile(inputPath: string, options?: ConvertOptions): FileConversion {
  if (!isFile(inputPath)) {
    throw new ConversionInputError(`Error: please add a CSV file with name '${inputPath}'`);
  }
  const { header, rows } = parseCsvTable(readFileSync(inputPath, "utf-8"));
  const sourceUid = options?.sourceUid ?? basename(inputPath, extname(inputPath));
  const result = convertRows({ variant: "csv", header, rows, options: { ...options, sourceUid } });
  const outputPath = writeFeatureCollection(outputPathFor(inputPath), result.collection);
  return { ...result, inputPath, outputPath };
}

/**
 * Convert the first worksheet of `<sourcesDir>/<sourceGroup>/<sourceUid>.xlsx`.
 * Rows failing validation are reported in `errors`.
 */
export function convertWorkbookFile(
  sourceUid: string,
  sourceGroup: string,
  options?: ConvertOptions & { sourcesDir?: string }
): FileConversion {
  if (!isSourceGroup(sourceGroup)) {
    throw new ConversionInputError(
      `Error: please add a source_group e.g. ${SOURCE_GROUPS.join(", ")} (got '${sourceGroup}')`
    );
  }
  const inputPath = resolveSourcePath(sourceUid, sourceGroup, options?.sourcesDir);
  if (!isFile(inputPath)) {
    throw new ConversionInputError(`Error: please add an Excel file with name '${inputPath}'`);
  }
  const { header, rows } = readWorkbookTable(readFileSync(inputPath));
  const result = convertRows({ variant: sourceGroup, header, rows, options: { ...options, sourceUid } });
  const outputPath = writeFeatureCollection(outputPathFor(inputPath), result.collection);
  return { ...result, inputPath, outputPath };
}
