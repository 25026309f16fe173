import { DateTime } from "luxon";
import type { Table } from "@/lib/ingest/types";
import { columnIndex, setColumn } from "@/modules/tradeFeatures/table";

export const NULL_LIKE_DATE_TOKENS: ReadonlySet<string> = new Set(["0", "0.0", "na", "n/a", "nan", "none", ""]);

// Tried in order after ISO/SQL/RFC 2822/HTTP.
const FALLBACK_FORMATS = [
  "M/d/yyyy",
  "M/d/yyyy H:mm",
  "M/d/yyyy H:mm:ss",
  "M/d/yy",
  "yyyy/M/d",
  "d-MMM-yyyy",
  "d MMM yyyy",
  "MMM d, yyyy",
  "MMMM d, yyyy",
];

export type DateFeatureOptions = {
  column?: string;
  minValidDate?: string;
  overwrite?: boolean;
  outColumn?: string | null;
};

export function parseTradeDate(raw: string): DateTime | null {
  const s = raw.trim();
  if (NULL_LIKE_DATE_TOKENS.has(s.toLowerCase())) return null;

  const opts = { zone: "utc" };
  if (/^\d{8}$/.test(s)) {
    const dt = DateTime.fromFormat(s, "yyyyMMdd", opts);
    return dt.isValid ? dt : null;
  }

  const parsers = [
    () => DateTime.fromISO(s, opts),
    () => DateTime.fromSQL(s, opts),
    () => DateTime.fromRFC2822(s, opts),
    () => DateTime.fromHTTP(s, opts),
    ...FALLBACK_FORMATS.map((fmt) => () => DateTime.fromFormat(s, fmt, opts)),
  ];
  for (const p of parsers) {
    const dt = p();
    if (dt.isValid) return dt;
  }
  return null;
}

/**
 * Cleans a mixed-format trade date column and appends year/month features.
 * Output columns: `<dest>`, `<dest>_is_missing`, `<dest>_year`, `<dest>_month`,
 * `<dest>_yyyymm`, `<dest>_period`. Missing dates are empty strings.
 */
export function deriveDateFeatures(table: Table, options: DateFeatureOptions = {}): Table {
  const column = options.column ?? "trade_dat";
  const colIdx = columnIndex(table, column, "deriveDateFeatures");

  const minValidDate = options.minValidDate ?? "1990-01-01";
  const cutoff = DateTime.fromISO(minValidDate, { zone: "utc" });
  if (!cutoff.isValid) throw new Error(`deriveDateFeatures: invalid minValidDate "${minValidDate}"`);

  const overwrite = options.overwrite ?? true;
  const dest = overwrite ? column : (options.outColumn ?? `${column}_dt`);

  const dates = table.rows.map((r) => {
    const dt = parseTradeDate(r[colIdx] ?? "");
    return dt && dt.toMillis() >= cutoff.toMillis() ? dt : null;
  });

  let out = setColumn(table, dest, dates.map((d) => (d ? d.toFormat("yyyy-MM-dd") : "")));
  out = setColumn(out, `${dest}_is_missing`, dates.map((d) => String(d === null)));
  out = setColumn(out, `${dest}_year`, dates.map((d) => (d ? String(d.year) : "")));
  out = setColumn(out, `${dest}_month`, dates.map((d) => (d ? String(d.month) : "")));
  out = setColumn(out, `${dest}_yyyymm`, dates.map((d) => (d ? d.toFormat("yyyyMM") : "")));
  out = setColumn(out, `${dest}_period`, dates.map((d) => (d ? d.toFormat("yyyy-MM") : "")));
  return out;
}
