import type {
  CARD_COLORS,
  CARD_KINDS,
  CARD_RARITIES,
  COLUMNS,
  FOIL_OPTIONS,
} from "./constants.ts";
import type { CollectionError } from "./errors.ts";

export type CardColor = (typeof CARD_COLORS)[number];
export type FoilOption = (typeof FOIL_OPTIONS)[number];
export type CardKind = (typeof CARD_KINDS)[number];
export type CardRarity = (typeof CARD_RARITIES)[number];
export type Column = (typeof COLUMNS)[number];

/**
 * One row of the collection.
 *
 * Enumerated fields are typed as plain strings because rows loaded from a
 * hand-edited spreadsheet may carry values outside the fixed sets; input
 * coming through validation is always inside them.
 */
export type CardRecord = {
  /** Null only for a loaded row whose QTY cell was blank. */
  quantity: number | null;
  cardNumber: string;
  cardName: string;
  crew: string | null;
  color: string | null;
  foilOrNormal: string | null;
  rarity: string | null;
  kind: string | null;
  altArt: boolean;
  specialPower: string | null;
  notes: string | null;
};

export type CardField = keyof CardRecord;

/** Partial field set for a replace-by-index update. */
export type CardPatch = Partial<CardRecord>;

/** A record with its current positional index in the table. */
export type IndexedRecord = {
  index: number;
  record: CardRecord;
};

export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CollectionError };

export type Config = {
  collectionPath: string;
  port: number;
  http: boolean;
  autosave: boolean;
};
