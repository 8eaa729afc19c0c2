import * as XLSX from "xlsx";
import { COLUMNS, FIELD_COLUMNS } from "./constants.ts";
import type { CardRecord, Column } from "./types.ts";

const SHEET_NAME = "Collection";
const TRUTHY_TEXT = new Set(["true", "yes", "y", "1"]);
const COLUMN_NAMES: ReadonlySet<string> = new Set(COLUMNS);

type CellValue = string | number | boolean | null;

function isColumn(name: string): name is Column {
  return COLUMN_NAMES.has(name);
}

/** Trimmed string form of a cell, or null when blank. */
function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text.length > 0 ? text : null;
}

function toQuantity(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const text = toText(value);
  if (text === null) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Blank and unrecognised cells read as false. */
function toFlag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return TRUTHY_TEXT.has(value.trim().toLowerCase());
  return false;
}

function rowToRecord(row: unknown[], positions: Map<Column, number>): CardRecord {
  const cell = (column: Column): unknown => {
    const position = positions.get(column);
    return position === undefined ? null : row[position];
  };

  return {
    quantity: toQuantity(cell("QTY")),
    cardNumber: toText(cell("Card Number")) ?? "",
    cardName: toText(cell("Card Name")) ?? "",
    crew: toText(cell("Crew")),
    color: toText(cell("Color")),
    foilOrNormal: toText(cell("Foil / Normal")),
    rarity: toText(cell("Rarity")),
    kind: toText(cell("Kind")),
    altArt: toFlag(cell("Alt Art")),
    specialPower: toText(cell("Special Power")),
    notes: toText(cell("Notes")),
  };
}

/**
 * Parse the collection spreadsheet into records.
 *
 * Reads the first sheet. Declared columns are located by header name, so
 * their order in the file does not matter; missing ones load as unset and
 * unknown ones are ignored. A completely empty sheet is an empty table.
 * Throws when the workbook cannot be read or its header row names none of
 * the declared columns.
 */
export function parseCollectionWorkbook(data: Buffer): CardRecord[] {
  const workbook = XLSX.read(data, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new Error("Workbook has no sheets");
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });

  const header = rows[0];
  if (!header) return [];

  const positions = new Map<Column, number>();
  header.forEach((value, position) => {
    const name = toText(value);
    if (name !== null && isColumn(name) && !positions.has(name)) {
      positions.set(name, position);
    }
  });

  if (positions.size === 0) {
    throw new Error(`Header row has none of the expected columns (${COLUMNS.join(", ")})`);
  }

  const records: CardRecord[] = [];
  for (const row of rows.slice(1)) {
    if (row.every((value) => toText(value) === null)) continue;
    records.push(rowToRecord(row, positions));
  }
  return records;
}

function recordToRow(record: CardRecord): CellValue[] {
  return FIELD_COLUMNS.map(([field]) => {
    const value = record[field];
    return value === "" ? null : value;
  });
}

/** Serialize records into an .xlsx workbook with one sheet and a header row. */
export function buildCollectionWorkbook(records: CardRecord[]): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([[...COLUMNS], ...records.map(recordToRow)]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
  const data: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return data;
}
