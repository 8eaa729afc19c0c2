import { CARD_KINDS, CARD_RARITIES } from "./constants.ts";
import { filterRecords, type RecordFilter } from "./search.ts";
import type { CardRecord } from "./types.ts";

export type CategoryCount = {
  label: string;
  quantity: number;
};

export type CollectionStatistics = {
  totalQuantity: number;
  uniqueEntries: number;
  altArtCount: number;
  byRarity: CategoryCount[];
  byColor: CategoryCount[];
  byKind: CategoryCount[];
};

function sumByField(records: CardRecord[], field: "rarity" | "color" | "kind"): Map<string, number> {
  const totals = new Map<string, number>();
  for (const record of records) {
    const label = record[field];
    if (label === null) continue;
    totals.set(label, (totals.get(label) ?? 0) + (record.quantity ?? 0));
  }
  return totals;
}

/** One entry per fixed label, in order, zero-filled. Labels outside the set are dropped. */
function alignTo(labels: readonly string[], totals: Map<string, number>): CategoryCount[] {
  return labels.map((label) => ({ label, quantity: totals.get(label) ?? 0 }));
}

/**
 * Totals and per-category quantities for the chart data. Category sums add
 * QTY, not rows; an unset QTY counts as 0.
 */
export function computeStatistics(records: CardRecord[], filter: RecordFilter = {}): CollectionStatistics {
  const selected = filterRecords(records, filter);

  let totalQuantity = 0;
  let altArtCount = 0;
  for (const record of selected) {
    totalQuantity += record.quantity ?? 0;
    if (record.altArt) altArtCount += 1;
  }

  const byColor = [...sumByField(selected, "color")]
    .map(([label, quantity]) => ({ label, quantity }))
    .sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));

  return {
    totalQuantity,
    uniqueEntries: selected.length,
    altArtCount,
    byRarity: alignTo(CARD_RARITIES, sumByField(selected, "rarity")),
    byColor,
    byKind: alignTo(CARD_KINDS, sumByField(selected, "kind")),
  };
}
