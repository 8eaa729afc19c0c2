import { TEXT_SEARCH_FIELDS } from "./constants.ts";
import type { CardRecord, IndexedRecord } from "./types.ts";

export type RecordFilter = {
  color?: string;
  rarity?: string;
  kind?: string;
  altArtOnly?: boolean;
};

/**
 * True when the lowercased query is a substring of any text field.
 * Unset fields never match.
 */
export function matchesQuery(record: CardRecord, query: string): boolean {
  const needle = query.toLowerCase();
  return TEXT_SEARCH_FIELDS.some((field) => {
    const value = record[field];
    return value !== null && value.toLowerCase().includes(needle);
  });
}

/**
 * Case-insensitive OR search across the text columns. Results keep their
 * positional index in the full table. The query is trimmed first; a blank
 * query returns every record.
 */
export function searchRecords(records: CardRecord[], query: string): IndexedRecord[] {
  const indexed = records.map((record, index) => ({ index, record }));
  const needle = query.trim();
  if (!needle) return indexed;
  return indexed.filter(({ record }) => matchesQuery(record, needle));
}

/** Exact-match filter used to narrow statistics. Omitted criteria match everything. */
export function filterRecords(records: CardRecord[], filter: RecordFilter): CardRecord[] {
  return records.filter((record) => {
    if (filter.color && record.color !== filter.color) return false;
    if (filter.rarity && record.rarity !== filter.rarity) return false;
    if (filter.kind && record.kind !== filter.kind) return false;
    if (filter.altArtOnly && !record.altArt) return false;
    return true;
  });
}
