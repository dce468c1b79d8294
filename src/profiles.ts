import type { HeaderSpec, HeaderSpecEntry, Variant } from "./types.js";
import { enumTable, type EnumTable } from "./sanitize.js";
import {
  csvPropertiesSchema,
  parkingSiteSchema,
  parkingSpotSchema,
  type ParkAndRideType,
  type ParkingSchema,
  type Purpose,
  type RestrictedToType,
  type SiteType,
  type SupervisionType,
} from "./schema.js";

/**
 * Module: Converter Profiles
 * Purpose: Header tables, enum tables and field rules for each converter
 * variant. Profiles are plain frozen values shared by every conversion;
 * `getProfile` selects one by tag.
 */

export type FieldRule =
  | { kind: "text" }
  | { kind: "lines" }
  | { kind: "integer" }
  | { kind: "height" }
  | { kind: "duration" }
  | { kind: "boolean" }
  | { kind: "list" }
  | { kind: "json" }
  | { kind: "enum"; table: EnumTable<string>; fallback?: string; list?: boolean }
  | { kind: "identifier"; type: string; target: string };

export type DropPolicy = "prefilter" | "validator";

export interface ConverterProfile {
  readonly variant: Variant;
  readonly entity: string;                 // Used in error messages, e.g. "parking site"
  readonly headers: HeaderSpec;
  readonly fields: Readonly<Record<string, FieldRule>>;
  readonly dropPolicy: DropPolicy;
  readonly address?: readonly [street: string, locality: string];
  readonly openingHours?: "opening_hours" | "restricted_to";
  readonly restrictedToTypeField?: string;
  readonly stampUpdatedAt: boolean;
  readonly realtimeFlag: boolean;
  readonly coordinatesInProperties: boolean;
  readonly schema: ParkingSchema;
}

/** Freeze a profile together with its header entries, field rules and address pair. */
function defineProfile(profile: ConverterProfile): ConverterProfile {
  profile.headers.forEach((entry) => Object.freeze(entry));
  Object.values(profile.fields).forEach((rule) => Object.freeze(rule));
  if (profile.address) Object.freeze(profile.address);
  Object.freeze(profile.headers);
  Object.freeze(profile.fields);
  return Object.freeze(profile);
}

export const DEFAULT_SITE_TYPE: SiteType = "OFF_STREET_PARKING_GROUND";

export const SITE_TYPE_MAPPING = enumTable<SiteType>({
  Parkplatz: "OFF_STREET_PARKING_GROUND",
  Parkfläche: "OFF_STREET_PARKING_GROUND",
  Parkhaus: "CAR_PARK",
  Parkdeck: "CAR_PARK",
  Tiefgarage: "UNDERGROUND",
  Straßenrand: "ON_STREET",
  "Am Straßenrand": "ON_STREET",
  Sonstige: "OTHER",
  ON_STREET: "ON_STREET",
  OFF_STREET_PARKING_GROUND: "OFF_STREET_PARKING_GROUND",
  UNDERGROUND: "UNDERGROUND",
  CAR_PARK: "CAR_PARK",
  OTHER: "OTHER",
});

export const PURPOSE_MAPPING = enumTable<Purpose>({
  Auto: "CAR",
  Fahrrad: "BIKE",
});

export const SUPERVISION_TYPE_MAPPING = enumTable<SupervisionType>({
  true: "YES",
  false: "NO",
  Ja: "YES",
  Nein: "NO",
  Video: "VIDEO",
  Videoüberwacht: "VIDEO",
  Bewacht: "ATTENDED",
});

export const PARK_AND_RIDE_MAPPING = enumTable<ParkAndRideType>({
  Ja: "YES",
  Nein: "NO",
  Bahn: "TRAIN",
  Zug: "TRAIN",
  Bus: "BUS",
  Straßenbahn: "TRAM",
  Fahrgemeinschaft: "CARPOOL",
});

export const RESTRICTED_TO_MAPPING = enumTable<RestrictedToType>({
  Ladesäule: "CHARGING",
  Familie: "FAMILY",
  Handicap: "DISABLED",
});

const same = (...fields: string[]): HeaderSpecEntry[] => fields.map((f) => ({ label: f, field: f }));
const labelled = (table: Record<string, string>): HeaderSpecEntry[] =>
  Object.entries(table).map(([label, field]) => ({ label, field }));

const OPENING_TIME_HEADERS = labelled({
  "24/7 geöffnet?": "opening_hours_is_24_7",
  "Öffnungszeiten Mo-Fr Beginn": "opening_hours_weekday_begin",
  "Öffnungszeiten Mo-Fr Ende": "opening_hours_weekday_end",
  "Öffnungszeiten Sa Beginn": "opening_hours_saturday_begin",
  "Öffnungszeiten Sa Ende": "opening_hours_saturday_end",
  "Öffnungszeiten So Beginn": "opening_hours_sunday_begin",
  "Öffnungszeiten So Ende": "opening_hours_sunday_end",
});

const text = { kind: "text" } as const;
const integer = { kind: "integer" } as const;

const CSV_PROFILE = defineProfile({
  variant: "csv",
  entity: "csv row",
  headers: same("uid", "lat", "lon", "name", "address", "type", "max_height", "max_width", "max_depth", "park_and_ride_type", "DHID"),
  fields: {
    name: text,
    address: text,
    type: text,
    max_height: integer,
    max_width: integer,
    max_depth: integer,
    park_and_ride_type: { kind: "list" },
    DHID: { kind: "identifier", type: "DHID", target: "external_identifiers" },
  },
  dropPolicy: "prefilter",
  stampUpdatedAt: false,
  realtimeFlag: false,
  coordinatesInProperties: false,
  schema: csvPropertiesSchema,
});

const PARKING_SITE_PROFILE = defineProfile({
  variant: "parking-sites",
  entity: "static parking site",
  headers: [
    ...labelled({
      ID: "uid",
      Name: "name",
      "Art der Anlage": "type",
      "Betreiber Name": "operator_name",
      Längengrad: "lon",
      Breitengrad: "lat",
      "Adresse - Straße und Nummer": "address_street",
      "Adresse - PLZ und Stadt": "address_locality",
      "Maximale Parkdauer": "max_stay",
      "Anzahl Stellplätze": "capacity",
      "Anzahl Stellplätze Behinderte": "capacity_disabled",
      "Anzahl Stellplätze Frauen": "capacity_woman",
      "Anzahl Stellplätze Familien": "capacity_family",
      "Anzahl Stellplätze Lademöglichkeit": "capacity_charging",
      "Anzahl Stellplätze Carsharing": "capacity_carsharing",
      "Anzahl Stellplätze Lastwagen": "capacity_truck",
      "Anzahl Stellplätze Bus": "capacity_bus",
      "Gebührenpflichtig?": "has_fee",
      "Gebühren (Beschreibung)": "fee_description",
      "Einfahrtshöhe (cm)": "max_height",
      Webseite: "public_url",
      Beschreibung: "description",
      "Park&Ride": "park_and_ride_type",
      "Überwacht?": "supervision_type",
      "Zweck der Anlage": "purpose",
    }),
    ...OPENING_TIME_HEADERS,
  ],
  fields: {
    name: text,
    type: { kind: "enum", table: SITE_TYPE_MAPPING, fallback: DEFAULT_SITE_TYPE },
    operator_name: text,
    max_stay: { kind: "duration" },
    capacity: integer,
    capacity_disabled: integer,
    capacity_woman: integer,
    capacity_family: integer,
    capacity_charging: integer,
    capacity_carsharing: integer,
    capacity_truck: integer,
    capacity_bus: integer,
    has_fee: { kind: "boolean" },
    fee_description: { kind: "lines" },
    max_height: { kind: "height" },
    public_url: text,
    description: { kind: "lines" },
    park_and_ride_type: { kind: "enum", table: PARK_AND_RIDE_MAPPING, list: true },
    supervision_type: { kind: "enum", table: SUPERVISION_TYPE_MAPPING },
    purpose: { kind: "enum", table: PURPOSE_MAPPING },
  },
  dropPolicy: "validator",
  address: ["address_street", "address_locality"],
  openingHours: "opening_hours",
  stampUpdatedAt: true,
  realtimeFlag: true,
  coordinatesInProperties: true,
  schema: parkingSiteSchema,
});

const PARKING_SPOT_PROFILE = defineProfile({
  variant: "parking-spots",
  entity: "static parking spot",
  headers: [
    ...labelled({
      ID: "uid",
      Name: "name",
      Widmung: "restricted_to_type",
      Längengrad: "lon",
      Breitengrad: "lat",
      "Zweck der Anlage": "purpose",
      Geometry: "geojson",
      "Maximale Parkdauer": "max_stay",
    }),
    ...OPENING_TIME_HEADERS,
  ],
  fields: {
    name: text,
    purpose: { kind: "enum", table: PURPOSE_MAPPING },
    geojson: { kind: "json" },
    max_stay: { kind: "duration" },
    restricted_to_type: { kind: "enum", table: RESTRICTED_TO_MAPPING },
  },
  dropPolicy: "validator",
  openingHours: "restricted_to",
  restrictedToTypeField: "restricted_to_type",
  stampUpdatedAt: true,
  realtimeFlag: true,
  coordinatesInProperties: true,
  schema: parkingSpotSchema,
});

const PROFILES: Readonly<Record<Variant, ConverterProfile>> = Object.freeze({
  csv: CSV_PROFILE,
  "parking-sites": PARKING_SITE_PROFILE,
  "parking-spots": PARKING_SPOT_PROFILE,
});

export function getProfile(variant: Variant): ConverterProfile {
  return PROFILES[variant];
}
