import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { CollectionError, describeCause } from "./errors.ts";
import { searchRecords } from "./search.ts";
import type { CardPatch, CardRecord, IndexedRecord, StoreResult } from "./types.ts";
import { checkRecordInvariants } from "./validate.ts";
import { buildCollectionWorkbook, parseCollectionWorkbook } from "./workbook.ts";

/**
 * The in-memory collection and the spreadsheet it mirrors.
 *
 * Records are kept in insertion order and addressed by position. Any insert
 * or delete invalidates previously obtained indices.
 *
 * Nothing here writes to disk on its own: callers decide when to call
 * saveStore. The file is not locked, so if another program edits it between
 * loadStore and saveStore the later save overwrites those edits.
 */
export type CardStore = {
  filePath: string;
  records: CardRecord[];
};

export type LoadOutcome = {
  records: CardRecord[];
  /** Set when the file existed but could not be read; the table starts empty. */
  warning: CollectionError | null;
};

function copyRecord(record: CardRecord): CardRecord {
  return { ...record };
}

type OptionalTextField = "crew" | "color" | "foilOrNormal" | "rarity" | "kind" | "specialPower" | "notes";

const OPTIONAL_TEXT_FIELDS: readonly OptionalTextField[] = [
  "crew",
  "color",
  "foilOrNormal",
  "rarity",
  "kind",
  "specialPower",
  "notes",
];

function cleanText(value: string | null): string | null {
  if (value === null) return null;
  const text = value.trim();
  return text.length > 0 ? text : null;
}

// Stored text is trimmed and blank text is unset, the same as the loader reads it.
function normalizeRecord(record: CardRecord): CardRecord {
  return {
    ...record,
    cardNumber: record.cardNumber.trim(),
    cardName: record.cardName.trim(),
    crew: cleanText(record.crew),
    color: cleanText(record.color),
    foilOrNormal: cleanText(record.foilOrNormal),
    rarity: cleanText(record.rarity),
    kind: cleanText(record.kind),
    specialPower: cleanText(record.specialPower),
    notes: cleanText(record.notes),
  };
}

function normalizePatch(patch: CardPatch): CardPatch {
  const normalized: CardPatch = { ...patch };
  if (patch.cardNumber !== undefined) normalized.cardNumber = patch.cardNumber.trim();
  if (patch.cardName !== undefined) normalized.cardName = patch.cardName.trim();
  for (const field of OPTIONAL_TEXT_FIELDS) {
    const value = patch[field];
    if (value !== undefined) normalized[field] = cleanText(value);
  }
  return normalized;
}

function inRange(store: CardStore, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < store.records.length;
}

function notFound(index: number): CollectionError {
  return new CollectionError("NotFoundError", `No card at index ${index}`);
}

export function createStore(filePath: string): CardStore {
  return { filePath, records: [] };
}

/**
 * Replace the table with the contents of the backing file. A missing file
 * gives an empty table; an unreadable one gives an empty table plus a
 * FileLoadError warning.
 */
export function loadStore(store: CardStore): LoadOutcome {
  if (!existsSync(store.filePath)) {
    store.records = [];
    return { records: [], warning: null };
  }

  try {
    store.records = parseCollectionWorkbook(readFileSync(store.filePath));
    return { records: store.records.map(copyRecord), warning: null };
  } catch (err) {
    store.records = [];
    return {
      records: [],
      warning: new CollectionError(
        "FileLoadError",
        `Could not load data from '${store.filePath}'. It might be corrupted or in an unexpected format: ${describeCause(err)}`,
        { cause: err },
      ),
    };
  }
}

/** Overwrite the backing file with the full table. Returns the row count written. */
export function saveStore(store: CardStore): StoreResult<number> {
  try {
    const data = buildCollectionWorkbook(store.records);
    mkdirSync(path.dirname(store.filePath), { recursive: true });
    writeFileSync(store.filePath, data);
    return { ok: true, value: store.records.length };
  } catch (err) {
    return {
      ok: false,
      error: new CollectionError(
        "FileSaveError",
        `Failed to save data to '${store.filePath}'. Check permissions or whether the file is open elsewhere: ${describeCause(err)}`,
        { cause: err },
      ),
    };
  }
}

/** Append a record. Returns the index it landed at. */
export function addRecord(store: CardStore, fields: CardRecord): StoreResult<number> {
  const record = normalizeRecord(fields);
  const violation = checkRecordInvariants(record);
  if (violation) {
    return { ok: false, error: new CollectionError("ValidationError", violation) };
  }

  store.records.push(record);
  return { ok: true, value: store.records.length - 1 };
}

/**
 * Replace the fields present in `changes` on the record at `index`.
 * Fields absent from `changes` keep their values; blank text clears a field.
 */
export function updateRecord(
  store: CardStore,
  index: number,
  changes: CardPatch,
): StoreResult<CardRecord> {
  const current = inRange(store, index) ? store.records[index] : undefined;
  if (!current) {
    return { ok: false, error: notFound(index) };
  }

  const patch = normalizePatch(changes);
  const violation = checkRecordInvariants(patch);
  if (violation) {
    return { ok: false, error: new CollectionError("ValidationError", violation) };
  }

  const updated: CardRecord = {
    quantity: patch.quantity !== undefined ? patch.quantity : current.quantity,
    cardNumber: patch.cardNumber ?? current.cardNumber,
    cardName: patch.cardName ?? current.cardName,
    crew: patch.crew !== undefined ? patch.crew : current.crew,
    color: patch.color !== undefined ? patch.color : current.color,
    foilOrNormal: patch.foilOrNormal !== undefined ? patch.foilOrNormal : current.foilOrNormal,
    rarity: patch.rarity !== undefined ? patch.rarity : current.rarity,
    kind: patch.kind !== undefined ? patch.kind : current.kind,
    altArt: patch.altArt ?? current.altArt,
    specialPower: patch.specialPower !== undefined ? patch.specialPower : current.specialPower,
    notes: patch.notes !== undefined ? patch.notes : current.notes,
  };
  store.records[index] = updated;
  return { ok: true, value: copyRecord(updated) };
}

/**
 * Remove every record whose current position is in `indices`. Invalid and
 * repeated indices are ignored. Removal runs from the highest index down so
 * earlier removals do not shift later ones. Returns the removed records in
 * table order.
 */
export function deleteRecords(store: CardStore, indices: Iterable<number>): StoreResult<CardRecord[]> {
  const targets = [...new Set(indices)]
    .filter((index) => inRange(store, index))
    .sort((a, b) => b - a);

  const removed: CardRecord[] = [];
  for (const index of targets) {
    removed.unshift(...store.records.splice(index, 1));
  }

  if (removed.length === 0) {
    return {
      ok: false,
      error: new CollectionError("NothingRemovedError", "None of the given indices matched a card"),
    };
  }
  return { ok: true, value: removed };
}

/**
 * Indices (ascending) of records whose card number and name both match,
 * ignoring case. Empty when either argument is empty.
 */
export function findByNaturalKey(store: CardStore, cardNumber: string, cardName: string): number[] {
  if (!cardNumber || !cardName) return [];

  const number = cardNumber.toLowerCase();
  const name = cardName.toLowerCase();
  const matches: number[] = [];
  store.records.forEach((record, index) => {
    if (record.cardNumber.toLowerCase() === number && record.cardName.toLowerCase() === name) {
      matches.push(index);
    }
  });
  return matches;
}

export function getByIndex(store: CardStore, index: number): StoreResult<CardRecord> {
  const record = inRange(store, index) ? store.records[index] : undefined;
  if (!record) {
    return { ok: false, error: notFound(index) };
  }
  return { ok: true, value: copyRecord(record) };
}

export function listRecords(store: CardStore): IndexedRecord[] {
  return searchStore(store, "");
}

export function searchStore(store: CardStore, query: string): IndexedRecord[] {
  return searchRecords(store.records, query).map(({ index, record }) => ({
    index,
    record: copyRecord(record),
  }));
}
