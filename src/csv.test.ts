import { describe, expect, it } from "vitest";
import { parseCsvTable } from "./csv.js";

describe("parseCsvTable", () => {
  it("handles quoted commas, doubled quotes and CRLF", () => {
    expect(parseCsvTable('uid,name\n1,"Park, Ride"\r\n2,"Say ""hi"""\r\n')).toEqual({
      header: ["uid", "name"],
      rows: [
        ["1", "Park, Ride"],
        ["2", 'Say "hi"'],
      ],
    });
  });

  it("keeps newlines inside quoted fields", () => {
    expect(parseCsvTable('uid,desc\n1,"a\nb"\n').rows).toEqual([["1", "a\nb"]]);
  });

  it("ignores a UTF-8 byte order mark", () => {
    expect(parseCsvTable("\uFEFFuid,lat\n1,2")).toEqual({ header: ["uid", "lat"], rows: [["1", "2"]] });
  });

  it("keeps an empty last field after a trailing delimiter", () => {
    expect(parseCsvTable("uid,name\n1,").rows).toEqual([["1", ""]]);
    expect(parseCsvTable("uid,name\n1,\n").rows).toEqual([["1", ""]]);
  });

  it("reads an unterminated quoted field to the end", () => {
    expect(parseCsvTable('uid,name\n1,"open').rows).toEqual([["1", "open"]]);
  });

  it("returns an empty table for empty text", () => {
    expect(parseCsvTable("")).toEqual({ header: [], rows: [] });
  });
});
