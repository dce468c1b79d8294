/**
 * Configuration read once from the environment.
 *
 * @module config
 */

/**
 * Directory holding `<source_group>/<source_uid>.xlsx` workbooks.
 *
 * @default "sources"
 * @env PARKING_SOURCES_DIR
 */
export const SOURCES_DIR = process.env.PARKING_SOURCES_DIR ?? "sources";

/**
 * Value stamped as `has_realtime_data` on spreadsheet records.
 *
 * @default true
 * @env PARKING_HAS_REALTIME_DATA
 */
export const HAS_REALTIME_DATA = parseFlag(process.env.PARKING_HAS_REALTIME_DATA, true);

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  return !/^(0|false|no|off)$/i.test(raw.trim());
}
