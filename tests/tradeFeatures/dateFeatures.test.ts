import { describe, expect, it } from "vitest";
import { deriveDateFeatures, parseTradeDate } from "@/modules/tradeFeatures/dateFeatures";

const table = {
  header: ["id", "trade_dat"],
  rows: [
    ["1", "20240315"],
    ["2", "0"],
    ["3", "1970-01-01"],
    ["4", "2023-07-04T12:00:00"],
    ["5", "not a date"],
    ["6", "3/9/2022"],
    ["7", " N/A "],
  ],
};

describe("deriveDateFeatures", () => {
  it("cleans the column in place and appends features", () => {
    const out = deriveDateFeatures(table);
    expect(out.header).toEqual([
      "id",
      "trade_dat",
      "trade_dat_is_missing",
      "trade_dat_year",
      "trade_dat_month",
      "trade_dat_yyyymm",
      "trade_dat_period",
    ]);
    expect(out.rows).toEqual([
      ["1", "2024-03-15", "false", "2024", "3", "202403", "2024-03"],
      ["2", "", "true", "", "", "", ""],
      ["3", "", "true", "", "", "", ""],
      ["4", "2023-07-04", "false", "2023", "7", "202307", "2023-07"],
      ["5", "", "true", "", "", "", ""],
      ["6", "2022-03-09", "false", "2022", "3", "202203", "2022-03"],
      ["7", "", "true", "", "", "", ""],
    ]);
  });

  it("writes to a separate column when not overwriting", () => {
    const out = deriveDateFeatures(table, { overwrite: false });
    expect(out.header.slice(0, 4)).toEqual(["id", "trade_dat", "trade_dat_dt", "trade_dat_dt_is_missing"]);
    expect(out.rows[0].slice(0, 4)).toEqual(["1", "20240315", "2024-03-15", "false"]);
  });

  it("honors a custom cutoff", () => {
    const out = deriveDateFeatures(table, { minValidDate: "1960-01-01", outColumn: "clean", overwrite: false });
    expect(out.rows[2].slice(2, 4)).toEqual(["1970-01-01", "false"]);
  });

  it("rejects an unknown column or cutoff", () => {
    expect(() => deriveDateFeatures(table, { column: "nope" })).toThrow('column "nope" not found');
    expect(() => deriveDateFeatures(table, { minValidDate: "someday" })).toThrow("invalid minValidDate");
  });
});

describe("parseTradeDate", () => {
  it("parses compact dates and treats null-like tokens as missing", () => {
    expect(parseTradeDate("19991231")?.toFormat("yyyy-MM-dd")).toBe("1999-12-31");
    expect(parseTradeDate("none")).toBeNull();
    expect(parseTradeDate("20241399")).toBeNull();
  });

  it("parses SQL-style timestamps", () => {
    expect(parseTradeDate("2021-05-06 08:30:00")?.toFormat("yyyy-MM-dd")).toBe("2021-05-06");
  });
});
