import type { Table } from "@/lib/ingest/types";
import { columnIndex } from "@/modules/tradeFeatures/table";

export type ClusterOptions = {
  idColumn?: string;
  relatedColumn?: string;
};

const compareIds = (a: string, b: string) => a.localeCompare(b, undefined, { numeric: true });

/**
 * Groups trades linked through the related-id column into connected components.
 * Components come back in order of first appearance, members sorted.
 */
export function clusterRelatedTrades(table: Table, options: ClusterOptions = {}): string[][] {
  const idIdx = columnIndex(table, options.idColumn ?? "TradeID", "clusterRelatedTrades");
  const relIdx = columnIndex(table, options.relatedColumn ?? "RelatedTradeID", "clusterRelatedTrades");

  const adj = new Map<string, Set<string>>();
  const addNode = (id: string) => {
    if (!adj.has(id)) adj.set(id, new Set());
  };

  for (const row of table.rows) {
    const id = (row[idIdx] ?? "").trim();
    if (id) addNode(id);
  }
  for (const row of table.rows) {
    const id = (row[idIdx] ?? "").trim();
    const related = (row[relIdx] ?? "").trim();
    if (!id || !related) continue;
    addNode(related);
    adj.get(id)?.add(related);
    adj.get(related)?.add(id);
  }

  const seen = new Set<string>();
  const clusters: string[][] = [];
  for (const start of adj.keys()) {
    if (seen.has(start)) continue;
    const comp: string[] = [];
    const queue = [start];
    seen.add(start);
    while (queue.length) {
      const v = queue.shift();
      if (v === undefined) break;
      comp.push(v);
      for (const w of adj.get(v) ?? []) {
        if (!seen.has(w)) {
          seen.add(w);
          queue.push(w);
        }
      }
    }
    clusters.push(comp.sort(compareIds));
  }
  return clusters;
}
