import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENCODINGS,
  ingestOptionsFromEnv,
  parseDelimiterSetting,
  resolveIngestSettings,
} from "@/lib/ingest/config";
import { IngestConfigError } from "@/lib/ingest/errors";

describe("resolveIngestSettings", () => {
  it("applies defaults", () => {
    expect(resolveIngestSettings({})).toEqual({
      expectedCols: 106,
      mergeInto: null,
      delimiter: null,
      encoding: null,
      encodings: DEFAULT_ENCODINGS,
      sampleLines: 200,
    });
  });

  it("rejects a non-positive column count", () => {
    expect(() => resolveIngestSettings({ expectedCols: 0 })).toThrow(IngestConfigError);
    expect(() => resolveIngestSettings({ expectedCols: 2.5 })).toThrow(IngestConfigError);
  });

  it("rejects multi-character delimiters and empty encoding lists", () => {
    expect(() => resolveIngestSettings({ delimiter: "ab" })).toThrow(IngestConfigError);
    expect(() => resolveIngestSettings({ encodings: [] })).toThrow(IngestConfigError);
  });

  it("treats a blank merge column as unset", () => {
    expect(resolveIngestSettings({ mergeInto: "  " }).mergeInto).toBeNull();
  });
});

describe("ingestOptionsFromEnv", () => {
  it("reads INGEST_* variables", () => {
    const opts = ingestOptionsFromEnv({
      INGEST_EXPECTED_COLS: "12",
      INGEST_DELIMITER: "tab",
      INGEST_ENCODINGS: "utf-8, windows-1252",
      INGEST_MERGE_INTO: " notes ",
    });
    expect(opts).toEqual({
      expectedCols: 12,
      delimiter: "\t",
      encodings: ["utf-8", "windows-1252"],
      mergeInto: "notes",
    });
  });

  it("returns no options for an empty environment", () => {
    expect(ingestOptionsFromEnv({})).toEqual({});
  });

  it("names the offending variable", () => {
    try {
      ingestOptionsFromEnv({ INGEST_EXPECTED_COLS: "abc" });
      expect.unreachable("expected IngestConfigError");
    } catch (e) {
      expect(e).toBeInstanceOf(IngestConfigError);
      expect(e instanceof IngestConfigError && e.setting).toBe("INGEST_EXPECTED_COLS");
    }
  });
});

describe("parseDelimiterSetting", () => {
  it("accepts names and single characters", () => {
    expect(parseDelimiterSetting("pipe")).toBe("|");
    expect(parseDelimiterSetting("\\t")).toBe("\t");
    expect(parseDelimiterSetting(";")).toBe(";");
    expect(parseDelimiterSetting("\t")).toBe("\t");
  });

  it("rejects longer strings", () => {
    expect(() => parseDelimiterSetting("||")).toThrow(IngestConfigError);
  });
});
