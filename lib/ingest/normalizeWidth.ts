import { PLACEHOLDER_PREFIX } from "@/lib/ingest/config";
import type { Table, WidthCounts } from "@/lib/ingest/types";

export function normalizeHeader(header: readonly string[], expectedCols: number): string[] {
  if (header.length >= expectedCols) return header.slice(0, expectedCols);
  const missing = expectedCols - header.length;
  return [...header, ...Array.from({ length: missing }, (_, i) => `${PLACEHOLDER_PREFIX}${i}`)];
}

export function resolveMergeTarget(header: readonly string[], expectedCols: number, mergeInto?: string | null): number {
  if (mergeInto) {
    const idx = header.indexOf(mergeInto);
    if (idx !== -1) return idx;
  }
  return expectedCols - 1;
}

export function joinOverflow(fields: readonly string[]): string {
  let end = fields.length;
  while (end > 0 && fields[end - 1] === "") end--;
  return fields.slice(0, end).join(",");
}

export function fitRow(row: readonly string[], expectedCols: number, targetIndex: number): string[] {
  if (row.length === expectedCols) return [...row];
  if (row.length < expectedCols) return [...row, ...Array<string>(expectedCols - row.length).fill("")];

  const last = expectedCols - 1;
  const overflow = row.slice(last);
  const out = [...row.slice(0, last), ""];
  out[targetIndex] = targetIndex === last ? joinOverflow(overflow) : joinOverflow([out[targetIndex], ...overflow]);
  return out;
}

export function normalizeBody(
  body: readonly (readonly string[])[],
  expectedCols: number,
  targetIndex: number
): { rows: string[][]; counts: WidthCounts } {
  const counts: WidthCounts = { longRows: 0, shortRows: 0 };
  const rows = body.map((r) => {
    if (r.length > expectedCols) counts.longRows++;
    else if (r.length < expectedCols) counts.shortRows++;
    return fitRow(r, expectedCols, targetIndex);
  });
  return { rows, counts };
}

/** First row is the header. Rows are reshaped, never dropped. */
export function normalizeWidth(
  rows: readonly (readonly string[])[],
  expectedCols: number,
  mergeInto?: string | null
): { table: Table; counts: WidthCounts; mergeTargetIndex: number } {
  const [first = [], ...body] = rows;
  const header = normalizeHeader(first, expectedCols);
  const mergeTargetIndex = resolveMergeTarget(header, expectedCols, mergeInto);
  const normalized = normalizeBody(body, expectedCols, mergeTargetIndex);
  return {
    table: { header, rows: normalized.rows },
    counts: normalized.counts,
    mergeTargetIndex,
  };
}
