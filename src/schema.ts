import { z } from "zod";
import type { NormalizedRecord, ParkingProperties } from "./types.js";

/**
 * Module: Property Schemas & Validation
 * Purpose: Zod schemas for the properties each converter emits, and a
 * result-typed `validateRecord` that never throws for bad rows.
 * Object key order here is the key order of the written GeoJSON properties.
 */

export const SITE_TYPES = ["ON_STREET", "OFF_STREET_PARKING_GROUND", "UNDERGROUND", "CAR_PARK", "OTHER"] as const;
export const PURPOSES = ["CAR", "BIKE", "MOTORCYCLE"] as const;
export const SUPERVISION_TYPES = ["YES", "NO", "VIDEO", "ATTENDED"] as const;
export const PARK_AND_RIDE_TYPES = ["YES", "NO", "TRAIN", "BUS", "TRAM", "CARPOOL"] as const;
export const RESTRICTED_TO_TYPES = ["CHARGING", "FAMILY", "DISABLED", "WOMEN", "CARSHARING"] as const;

export type SiteType = (typeof SITE_TYPES)[number];
export type Purpose = (typeof PURPOSES)[number];
export type SupervisionType = (typeof SUPERVISION_TYPES)[number];
export type ParkAndRideType = (typeof PARK_AND_RIDE_TYPES)[number];
export type RestrictedToType = (typeof RESTRICTED_TO_TYPES)[number];

export type ParkingSchema = z.ZodType<ParkingProperties, z.ZodTypeDef, unknown>;

const uid = z.string().min(1).max(256);
const lat = z.number().min(-90).max(90);
const lon = z.number().min(-180).max(180);
const count = z.number().int().min(0);
const text = z.string().min(1).max(4096);

const externalIdentifier = z.object({
  type: z.string().min(1),
  value: z.string().min(1),
});

export const csvPropertiesSchema = z.object({
  uid,
  name: text.optional(),
  address: text.optional(),
  type: text.optional(),
  max_height: count.optional(),
  max_width: count.optional(),
  max_depth: count.optional(),
  park_and_ride_type: z.array(z.string().min(1)).min(1).optional(),
  external_identifiers: z.array(externalIdentifier).min(1).optional(),
  lat,
  lon,
});

export const parkingSiteSchema = z.object({
  uid,
  name: z.string().min(1).max(256),
  operator_name: text.optional(),
  public_url: z.string().url().optional(),
  address: text.optional(),
  description: text.optional(),
  type: z.enum(SITE_TYPES),
  max_stay: count.optional(),
  max_height: count.positive().optional(),
  has_fee: z.boolean().optional(),
  fee_description: text.optional(),
  has_realtime_data: z.boolean(),
  park_and_ride_type: z.array(z.enum(PARK_AND_RIDE_TYPES)).min(1).optional(),
  supervision_type: z.enum(SUPERVISION_TYPES).optional(),
  purpose: z.enum(PURPOSES).optional(),
  opening_hours: z.string().min(1).optional(),
  static_data_updated_at: z.string().datetime(),
  lat,
  lon,
  capacity: count,
  capacity_disabled: count.optional(),
  capacity_woman: count.optional(),
  capacity_family: count.optional(),
  capacity_charging: count.optional(),
  capacity_carsharing: count.optional(),
  capacity_truck: count.optional(),
  capacity_bus: count.optional(),
});

const restrictedTo = z.object({
  type: z.enum(RESTRICTED_TO_TYPES).optional(),
  hours: z.string().min(1).optional(),
});

const spotGeometry = z.object({
  type: z.enum(["Point", "LineString", "Polygon", "MultiPolygon"]),
  coordinates: z.array(z.unknown()).min(1),
});

export const parkingSpotSchema = z.object({
  uid,
  name: z.string().min(1).max(256).optional(),
  purpose: z.enum(PURPOSES).optional(),
  max_stay: count.optional(),
  has_realtime_data: z.boolean(),
  restricted_to: z.array(restrictedTo).min(1).optional(),
  geojson: spotGeometry.optional(),
  static_data_updated_at: z.string().datetime(),
  lat,
  lon,
});

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult =
  | { ok: true; value: ParkingProperties }
  | { ok: false; issues: ValidationIssue[] };

export function validateRecord(schema: ParkingSchema, record: NormalizedRecord): ValidationResult {
  const parsed = schema.safeParse(record);
  if (parsed.success) return { ok: true, value: parsed.data };
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => ({
      path: issue.path.length ? issue.path.join(".") : "(root)",
      message: issue.message,
    })),
  };
}

/** Group issue messages by field path, in first-seen order. */
export function issuesByField(issues: readonly ValidationIssue[]): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const { path, message } of issues) {
    (out[path] ??= []).push(message);
  }
  return out;
}
