import { describe, expect, it } from "vitest";
import { fixAllDayRange, formatOpeningHours } from "./openingHours.js";

describe("formatOpeningHours", () => {
  it("returns 24/7 when the flag is set", () => {
    expect(formatOpeningHours({ opening_hours_is_24_7: "Ja", opening_hours_weekday_begin: "08:00" })).toEqual({
      ok: true,
      value: "24/7",
    });
  });

  it("joins the day groups that have both times", () => {
    const result = formatOpeningHours({
      opening_hours_is_24_7: false,
      opening_hours_weekday_begin: "08:00",
      opening_hours_weekday_end: "18:00",
      opening_hours_saturday_begin: 0.375,
      opening_hours_saturday_end: "14:00",
    });
    expect(result).toEqual({ ok: true, value: "Mo-Fr 08:00-18:00; Sa 09:00-14:00" });
  });

  it("rewrites 00:00-00:00 to 00:00-24:00", () => {
    const result = formatOpeningHours({
      opening_hours_weekday_begin: "00:00",
      opening_hours_weekday_end: "00:00",
      opening_hours_sunday_begin: 0,
      opening_hours_sunday_end: 0,
    });
    expect(result).toEqual({ ok: true, value: "Mo-Fr 00:00-24:00; Su 00:00-24:00" });
  });

  it("reports a begin without end", () => {
    expect(formatOpeningHours({ opening_hours_weekday_begin: "08:00" })).toEqual({
      ok: false,
      issues: [{ field: "opening_hours_weekday_end", message: "Mo-Fr needs both begin and end" }],
    });
  });

  it("reports unreadable times", () => {
    expect(formatOpeningHours({ opening_hours_saturday_begin: "früh", opening_hours_saturday_end: "14:00" })).toEqual({
      ok: false,
      issues: [{ field: "opening_hours_saturday_begin", message: 'invalid time "früh"' }],
    });
  });

  it("has no value without any times", () => {
    expect(formatOpeningHours({})).toEqual({ ok: true });
  });
});

describe("fixAllDayRange", () => {
  it("rewrites every occurrence", () => {
    expect(fixAllDayRange("Mo-Fr 00:00-00:00; Sa 00:00-00:00")).toBe("Mo-Fr 00:00-24:00; Sa 00:00-24:00");
    expect(fixAllDayRange("Mo-Fr 08:00-18:00")).toBe("Mo-Fr 08:00-18:00");
  });
});
