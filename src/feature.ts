import type { ParkingFeature, ParkingFeatureCollection, ParkingProperties } from "./types.js";

/**
 * Module: Feature Assembly
 * Purpose: Wrap validated properties into GeoJSON point features.
 * GeoJSON positions are `[lon, lat]`.
 */

export interface AssembleOptions {
  coordinatesInProperties: boolean;
}

/** Remove null/undefined values from objects and arrays, at any depth. */
export function stripEmpty<T>(value: T): T;
export function stripEmpty(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null && item !== undefined).map((item) => stripEmpty(item));
  }
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (v === null || v === undefined) continue;
      out[k] = stripEmpty(v);
    }
    return out;
  }
  return value;
}

export function assembleFeature(properties: ParkingProperties, options: AssembleOptions): ParkingFeature {
  const { lat, lon } = properties;
  if (typeof lat !== "number" || typeof lon !== "number") {
    throw new TypeError("validated properties must carry numeric lat/lon");
  }
  const cleaned = stripEmpty(properties);
  if (!options.coordinatesInProperties) {
    delete cleaned.lat;
    delete cleaned.lon;
  }
  return {
    type: "Feature",
    properties: cleaned,
    geometry: { type: "Point", coordinates: [lon, lat] },
  };
}

export function featureCollection(features: ParkingFeature[]): ParkingFeatureCollection {
  return { type: "FeatureCollection", features };
}
