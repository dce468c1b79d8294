import { describe, expect, it } from "vitest";
import { assembleFeature, featureCollection, stripEmpty } from "./feature.js";

describe("assembleFeature", () => {
  it("puts longitude first in the point coordinates", () => {
    const feature = assembleFeature({ uid: "1", lat: 48.1, lon: 11.5 }, { coordinatesInProperties: true });
    expect(feature.geometry).toEqual({ type: "Point", coordinates: [11.5, 48.1] });
    expect(feature.properties).toEqual({ uid: "1", lat: 48.1, lon: 11.5 });
  });

  it("removes lat/lon from properties when the profile asks for it", () => {
    const feature = assembleFeature({ uid: "42", max_height: 200, lat: 48.1, lon: 11.5 }, { coordinatesInProperties: false });
    expect(JSON.stringify(feature)).toBe(
      '{"type":"Feature","properties":{"uid":"42","max_height":200},"geometry":{"type":"Point","coordinates":[11.5,48.1]}}'
    );
  });

  it("strips null and undefined values, also inside lists of objects", () => {
    const feature = assembleFeature(
      { uid: "1", note: null, restricted_to: [{ type: "FAMILY", hours: undefined }], lat: 1, lon: 2 },
      { coordinatesInProperties: true }
    );
    expect(feature.properties).toEqual({ uid: "1", restricted_to: [{ type: "FAMILY" }], lat: 1, lon: 2 });
  });

  it("rejects properties without numeric coordinates", () => {
    expect(() => assembleFeature({ uid: "1", lat: "48.1", lon: 11.5 }, { coordinatesInProperties: true })).toThrow(TypeError);
  });
});

describe("stripEmpty", () => {
  it("leaves scalars alone and drops null list items", () => {
    expect(stripEmpty(0)).toBe(0);
    expect(stripEmpty(["a", null, "b"])).toEqual(["a", "b"]);
  });
});

describe("featureCollection", () => {
  it("wraps features", () => {
    expect(featureCollection([])).toEqual({ type: "FeatureCollection", features: [] });
  });
});
