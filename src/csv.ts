import { COLUMNS, FIELD_COLUMNS } from "./constants.ts";
import type { CardRecord } from "./types.ts";

// Characters that force a field into double quotes.
const NEEDS_QUOTES = /[",\r\n]/;

/**
 * Render one CSV field. Quoted only when it contains a comma, a quote or a
 * line break; embedded quotes are doubled (e.g. "Ezuri, ""The"" Leader").
 */
export function formatCsvField(value: string | number | boolean | null): string {
  if (value === null) return "";
  const text = String(value);
  if (!NEEDS_QUOTES.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Render records as comma-delimited text: header row first, one line per
 * record, LF line endings with a trailing newline.
 */
export function toCollectionCSV(records: CardRecord[]): string {
  const lines = [COLUMNS.map(formatCsvField).join(",")];
  for (const record of records) {
    lines.push(FIELD_COLUMNS.map(([field]) => formatCsvField(record[field])).join(","));
  }
  return `${lines.join("\n")}\n`;
}
