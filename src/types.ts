import type { Feature, FeatureCollection, Point } from "geojson";

/**
 * Module: Public Types
 * Purpose: Row, header, record and result shapes shared by the CSV and XLSX
 * converters, plus the variant tags that select a converter profile.
 */

// A single cell as handed over by the CSV or workbook reader.
export type Cell = string | number | boolean | null;
export type RawRow = readonly Cell[];

export type Variant = "csv" | "parking-sites" | "parking-spots";
export type SourceGroup = Exclude<Variant, "csv">;

export const SOURCE_GROUPS: readonly SourceGroup[] = ["parking-sites", "parking-spots"];

export interface HeaderSpecEntry {
  label: string; // Source column label, e.g. "Einfahrtshöhe (cm)"
  field: string; // Canonical field, e.g. "max_height"
}
export type HeaderSpec = readonly HeaderSpecEntry[];

// Canonical field name -> column index
export type HeaderMap = Readonly<Record<string, number>>;

export interface HeaderDiagnostic {
  label: string;
  field: string;
  message: string;
}

export interface ResolvedHeader {
  map: HeaderMap;
  diagnostics: HeaderDiagnostic[];
}

export type NormalizedRecord = Record<string, unknown>;
export type ParkingProperties = Record<string, unknown>;

export type ParkingFeature = Feature<Point, ParkingProperties>;
export type ParkingFeatureCollection = FeatureCollection<Point, ParkingProperties>;

export interface ImportError {
  sourceUid: string;
  recordUid?: string;
  message: string;
}

export interface RowDrop {
  row: number;    // 1-based, header row included
  reason: string;
}

export interface ConversionResult {
  collection: ParkingFeatureCollection;
  errors: ImportError[];
  drops: RowDrop[];
  headerDiagnostics: HeaderDiagnostic[];
}

export type Clock = () => Date;

export interface ConvertOptions {
  sourceUid?: string;
  now?: Clock;
  hasRealtimeData?: boolean;
}
