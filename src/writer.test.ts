import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { outputPathFor, serializeFeatureCollection, writeFeatureCollection } from "./writer.js";
import { featureCollection } from "./feature.js";
import type { ParkingFeatureCollection } from "./types.js";

const collection: ParkingFeatureCollection = featureCollection([
  {
    type: "Feature",
    properties: { uid: "1", name: "Müllerstraße" },
    geometry: { type: "Point", coordinates: [9.1, 48.7] },
  },
]);

describe("outputPathFor", () => {
  it("replaces the extension with .geojson", () => {
    expect(outputPathFor("sources/parking-sites/abc.xlsx")).toBe("sources/parking-sites/abc.geojson");
    expect(outputPathFor("data/stops.csv")).toBe("data/stops.geojson");
  });

  it("appends .geojson to paths without extension", () => {
    expect(outputPathFor("dir.v2/stops")).toBe("dir.v2/stops.geojson");
  });
});

describe("serializeFeatureCollection", () => {
  it("indents with four spaces", () => {
    expect(serializeFeatureCollection(featureCollection([]))).toBe(
      '{\n    "type": "FeatureCollection",\n    "features": []\n}'
    );
  });

  it("keeps non-ASCII characters unescaped", () => {
    expect(serializeFeatureCollection(collection)).toContain('"name": "Müllerstraße"');
  });
});

describe("writeFeatureCollection", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "parking-geojson-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the file and leaves no temporary file behind", () => {
    const target = join(dir, "out.geojson");
    expect(writeFeatureCollection(target, collection)).toBe(target);
    expect(readFileSync(target, "utf-8")).toBe(serializeFeatureCollection(collection));
    expect(readdirSync(dir)).toEqual(["out.geojson"]);
  });

  it("overwrites an existing output", () => {
    const target = join(dir, "out.geojson");
    writeFeatureCollection(target, collection);
    writeFeatureCollection(target, featureCollection([]));
    expect(JSON.parse(readFileSync(target, "utf-8"))).toEqual({ type: "FeatureCollection", features: [] });
  });
});
