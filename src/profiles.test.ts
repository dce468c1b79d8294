import { describe, expect, it } from "vitest";
import { getProfile } from "./profiles.js";
import type { Variant } from "./types.js";

describe("getProfile", () => {
  const variants: Variant[] = ["csv", "parking-sites", "parking-spots"];

  it.each(variants)("hands out a frozen %s profile", (variant) => {
    const profile = getProfile(variant);
    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.headers)).toBe(true);
    expect(Object.isFrozen(profile.fields)).toBe(true);
    expect(profile.headers.every((entry) => Object.isFrozen(entry))).toBe(true);
    expect(Object.values(profile.fields).every((rule) => Object.isFrozen(rule))).toBe(true);
  });

  it("ignores attempts to change a shared profile", () => {
    const profile = getProfile("csv");
    expect(Reflect.set(profile, "dropPolicy", "validator")).toBe(false);
    expect(Reflect.set(profile.fields, "name", { kind: "integer" })).toBe(false);
    expect(getProfile("csv").dropPolicy).toBe("prefilter");
    expect(getProfile("csv").fields.name).toEqual({ kind: "text" });
  });
});
