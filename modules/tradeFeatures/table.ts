import type { Table } from "@/lib/ingest/types";

/** Replaces the named column's values, or appends the column when the header lacks it. */
export function setColumn(table: Table, name: string, values: readonly string[]): Table {
  if (values.length !== table.rows.length) {
    throw new Error(`setColumn: ${values.length} values for ${table.rows.length} rows`);
  }
  const idx = table.header.indexOf(name);
  if (idx === -1) {
    return {
      header: [...table.header, name],
      rows: table.rows.map((r, i) => [...r, values[i]]),
    };
  }
  return {
    header: table.header,
    rows: table.rows.map((r, i) => r.map((v, j) => (j === idx ? values[i] : v))),
  };
}

export function columnIndex(table: Table, name: string, caller: string): number {
  const idx = table.header.indexOf(name);
  if (idx === -1) throw new Error(`${caller}: column "${name}" not found`);
  return idx;
}
