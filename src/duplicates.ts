import { addRecord, findByNaturalKey, getByIndex, updateRecord, type CardStore } from "./store.ts";
import type { CardRecord, StoreResult } from "./types.ts";

export type DuplicateOutcome = "merge_quantity" | "add_as_new" | "cancel";

export const DUPLICATE_OUTCOMES = ["merge_quantity", "add_as_new", "cancel"] as const satisfies readonly DuplicateOutcome[];

export type ConflictCheck =
  | { status: "no_conflict" }
  | {
      status: "conflict";
      /** First (lowest-index) record sharing the natural key. */
      existingIndex: number;
      /** Unset quantity on the existing record counts as 0. */
      existingQuantity: number;
      incomingQuantity: number;
      matchIndices: number[];
    };

export type ConflictDetected = Extract<ConflictCheck, { status: "conflict" }>;

export type Resolution =
  | { status: "merged"; index: number; record: CardRecord }
  | { status: "added_new"; index: number }
  | { status: "cancelled" };

export type AddAttempt = Resolution | { status: "added"; index: number } | ConflictDetected;

/**
 * Look for records sharing the incoming record's card number and name.
 * Only the first match is offered for merging.
 */
export function checkConflict(store: CardStore, record: CardRecord): ConflictCheck {
  const matchIndices = findByNaturalKey(store, record.cardNumber, record.cardName);
  const existingIndex = matchIndices[0];
  if (existingIndex === undefined) {
    return { status: "no_conflict" };
  }

  const existing = store.records[existingIndex];
  return {
    status: "conflict",
    existingIndex,
    existingQuantity: existing?.quantity ?? 0,
    incomingQuantity: record.quantity ?? 0,
    matchIndices,
  };
}

/**
 * Apply the caller's decision for a detected conflict. Exactly one outcome
 * is applied, or nothing when it fails.
 */
export function resolveConflict(
  store: CardStore,
  outcome: DuplicateOutcome,
  existingIndex: number,
  record: CardRecord,
): StoreResult<Resolution> {
  switch (outcome) {
    case "merge_quantity": {
      const existing = getByIndex(store, existingIndex);
      if (!existing.ok) return existing;

      const quantity = (existing.value.quantity ?? 0) + (record.quantity ?? 0);
      const updated = updateRecord(store, existingIndex, { quantity });
      if (!updated.ok) return updated;
      return { ok: true, value: { status: "merged", index: existingIndex, record: updated.value } };
    }
    case "add_as_new": {
      const added = addRecord(store, record);
      if (!added.ok) return added;
      return { ok: true, value: { status: "added_new", index: added.value } };
    }
    case "cancel":
      return { ok: true, value: { status: "cancelled" } };
  }
}

/**
 * One add attempt. Without a conflict the record is appended. With a
 * conflict and no outcome, the conflict is returned and the table is left
 * untouched so the caller can ask for a decision and try again.
 */
export function addCard(
  store: CardStore,
  record: CardRecord,
  outcome?: DuplicateOutcome,
): StoreResult<AddAttempt> {
  const conflict = checkConflict(store, record);

  if (conflict.status === "no_conflict") {
    const added = addRecord(store, record);
    if (!added.ok) return added;
    return { ok: true, value: { status: "added", index: added.value } };
  }

  if (outcome === undefined) {
    return { ok: true, value: conflict };
  }
  return resolveConflict(store, outcome, conflict.existingIndex, record);
}
