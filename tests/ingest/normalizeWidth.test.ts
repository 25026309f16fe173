import { describe, expect, it } from "vitest";
import { fitRow, joinOverflow, normalizeWidth, resolveMergeTarget } from "@/lib/ingest/normalizeWidth";

describe("normalizeWidth", () => {
  it("merges overflow into the last column", () => {
    const { table, counts } = normalizeWidth([["h1", "h2", "h3"], ["a", "b", "c", "d"]], 3);
    expect(table.rows).toEqual([["a", "b", "c,d"]]);
    expect(counts).toEqual({ longRows: 1, shortRows: 0 });
  });

  it("pads short rows with empty strings", () => {
    const { table, counts } = normalizeWidth([["h1", "h2", "h3"], ["a"]], 3);
    expect(table.rows).toEqual([["a", "", ""]]);
    expect(counts).toEqual({ longRows: 0, shortRows: 1 });
  });

  it("drops trailing empty overflow fields before joining", () => {
    expect(fitRow(["a", "b", "c", "d", "", ""], 3, 2)).toEqual(["a", "b", "c,d"]);
  });

  it("merges into a named column and leaves the last column empty", () => {
    const { table, mergeTargetIndex } = normalizeWidth(
      [["id", "notes", "code"], ["1", "hello", "world", "X"]],
      3,
      "notes"
    );
    expect(mergeTargetIndex).toBe(1);
    expect(table.rows).toEqual([["1", "hello,world,X", ""]]);
  });

  it("falls back to the last column for an unknown merge name", () => {
    expect(resolveMergeTarget(["a", "b", "c"], 3, "missing")).toBe(2);
    expect(resolveMergeTarget(["a", "b", "c"], 3, null)).toBe(2);
  });

  it("pads the header with placeholders and truncates a long one", () => {
    expect(normalizeWidth([["a"]], 3).table.header).toEqual(["a", "__placeholder_0", "__placeholder_1"]);
    expect(normalizeWidth([["a", "b", "c", "d"]], 2).table.header).toEqual(["a", "b"]);
  });

  it("handles a single-column table", () => {
    expect(fitRow(["a", "b", ""], 1, 0)).toEqual(["a,b"]);
  });

  it("never drops or misshapes rows", () => {
    const body = [["1", "2", "3"], ["1", "2", "3", "4", "5"], ["1"], [""], ["1", "2"]];
    const { table, counts } = normalizeWidth([["a", "b", "c"], ...body], 3);
    expect(table.rows).toHaveLength(body.length);
    expect(table.rows.every((r) => r.length === 3)).toBe(true);
    expect(counts).toEqual({ longRows: 1, shortRows: 3 });
    expect(table.rows[1]).toEqual(["1", "2", "3,4,5"]);
  });

  it("is idempotent on an already normalized table", () => {
    const first = normalizeWidth([["a", "b"], ["1", "2", "3"], ["x"]], 2).table;
    const again = normalizeWidth([first.header, ...first.rows], 2);
    expect(again.table).toEqual(first);
    expect(again.counts).toEqual({ longRows: 0, shortRows: 0 });
  });

  it("produces an all-placeholder header for no rows", () => {
    expect(normalizeWidth([], 2).table).toEqual({ header: ["__placeholder_0", "__placeholder_1"], rows: [] });
  });
});

describe("joinOverflow", () => {
  it("keeps inner empty fields", () => {
    expect(joinOverflow(["a", "", "b", ""])).toBe("a,,b");
    expect(joinOverflow(["", ""])).toBe("");
  });
});
