import type { CardField, Column } from "./types.ts";

export const CARD_COLORS = [
  "Red",
  "Green",
  "Blue",
  "Black",
  "White",
  "Purple",
  "Yellow",
  "Mixed (Check Notes)",
] as const;

export const FOIL_OPTIONS = ["Normal", "Foil"] as const;

export const CARD_KINDS = ["Leader", "Character", "Event", "Stage", "Don Art"] as const;

/** Common, Uncommon, Rare, Super Rare, Leader, Secret, Promo. */
export const CARD_RARITIES = ["C", "UC", "R", "SR", "L", "SEC", "Promo"] as const;

export const DEFAULT_COLLECTION_FILE = "card_collection.xlsx";
export const DEFAULT_PORT = 3000;
export const LOG_PREFIX = "[card-ledger]";

/** Spreadsheet header, in the order columns are written. */
export const COLUMNS = [
  "QTY",
  "Card Number",
  "Card Name",
  "Crew",
  "Color",
  "Foil / Normal",
  "Rarity",
  "Kind",
  "Alt Art",
  "Special Power",
  "Notes",
] as const;

/** Record field behind each spreadsheet column, in column order. */
export const FIELD_COLUMNS = [
  ["quantity", "QTY"],
  ["cardNumber", "Card Number"],
  ["cardName", "Card Name"],
  ["crew", "Crew"],
  ["color", "Color"],
  ["foilOrNormal", "Foil / Normal"],
  ["rarity", "Rarity"],
  ["kind", "Kind"],
  ["altArt", "Alt Art"],
  ["specialPower", "Special Power"],
  ["notes", "Notes"],
] as const satisfies ReadonlyArray<readonly [CardField, Column]>;

/** Fields covered by text search. Quantity and Alt Art are not searched. */
export const TEXT_SEARCH_FIELDS = [
  "cardNumber",
  "cardName",
  "crew",
  "color",
  "foilOrNormal",
  "rarity",
  "kind",
  "specialPower",
  "notes",
] as const satisfies ReadonlyArray<CardField>;
