import { existsSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import type { ParkingFeatureCollection } from "./types.js";
import { log } from "./logger.js";

/**
 * Module: Collection Writer
 * Purpose: Serialize a feature collection next to its input file.
 * Output is UTF-8, 4-space indented, non-ASCII characters unescaped.
 */

export const GEOJSON_INDENT = 4;

/** `sources/a/b.xlsx` -> `sources/a/b.geojson`; a path without extension gets one appended. */
export function outputPathFor(inputPath: string): string {
  const ext = extname(inputPath);
  const stem = ext ? inputPath.slice(0, -ext.length) : inputPath;
  return `${stem}.geojson`;
}

export function serializeFeatureCollection(collection: ParkingFeatureCollection): string {
  return JSON.stringify(collection, null, GEOJSON_INDENT);
}

/**
 * Write the collection to `outputPath` through a temporary sibling file and a rename,
 * so an interrupted run never leaves a truncated `.geojson` behind.
 */
export function writeFeatureCollection(outputPath: string, collection: ParkingFeatureCollection): string {
  const tmpPath = join(dirname(outputPath), `.${basename(outputPath)}.${process.pid}.tmp`);
  try {
    writeFileSync(tmpPath, serializeFeatureCollection(collection), { encoding: "utf-8" });
    renameSync(tmpPath, outputPath);
  } catch (err) {
    if (existsSync(tmpPath)) rmSync(tmpPath, { force: true });
    throw err;
  }
  log.writer("wrote %d features to %s", collection.features.length, outputPath);
  return outputPath;
}
