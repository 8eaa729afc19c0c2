import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { FIELD_COLUMNS } from "./constants.ts";
import { toCollectionCSV } from "./csv.ts";
import { CollectionError, describeCause } from "./errors.ts";
import type { CardRecord, StoreResult } from "./types.ts";

export type ExportFormat = "csv" | "json";

export const EXPORT_FORMATS = ["csv", "json"] as const satisfies readonly ExportFormat[];

/**
 * Render records as a JSON array of objects keyed by column name. Every
 * column is present; unset values are null.
 */
export function toCollectionJSON(records: CardRecord[]): string {
  const rows = records.map((record) =>
    Object.fromEntries(FIELD_COLUMNS.map(([field, column]) => [column, record[field]])),
  );
  return JSON.stringify(rows, null, 4);
}

export function renderExport(records: CardRecord[], format: ExportFormat): string {
  return format === "csv" ? toCollectionCSV(records) : toCollectionJSON(records);
}

/**
 * Write an export file. The format's extension is appended when the path
 * does not already end with it. Returns the path written.
 */
export function exportCollection(
  records: CardRecord[],
  filePath: string,
  format: ExportFormat,
): StoreResult<string> {
  const extension = `.${format}`;
  const target = filePath.toLowerCase().endsWith(extension) ? filePath : `${filePath}${extension}`;

  try {
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, renderExport(records, format), "utf8");
    return { ok: true, value: target };
  } catch (err) {
    return {
      ok: false,
      error: new CollectionError("ExportError", `Failed to export to ${format.toUpperCase()}: ${describeCause(err)}`, {
        cause: err,
      }),
    };
  }
}
