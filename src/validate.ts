import { z } from "zod";
import { CARD_COLORS, CARD_KINDS, CARD_RARITIES, FOIL_OPTIONS } from "./constants.ts";
import { CollectionError } from "./errors.ts";
import type { CardPatch, CardRecord, StoreResult } from "./types.ts";

/** Letters, digits, hyphen, digits (ST04-001, OP01-023). */
export const CARD_NUMBER_PATTERN = /^[A-Za-z]+\d+-\d+$/;

const MESSAGES = {
  cardNumberEmpty: "Card Number cannot be empty.",
  cardNumberFormat: "Invalid Card Number format (e.g., ST04-001, OP01-023).",
  cardNameEmpty: "Card Name cannot be empty.",
  quantityMin: "Quantity must be at least 1.",
  quantityWhole: "Quantity must be a whole number.",
} as const;

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

function optionalChoice(values: readonly string[], label: string) {
  return optionalText.refine((value) => value === null || values.includes(value), {
    message: `${label} must be one of: ${values.join(", ")}.`,
  });
}

// Key order decides which problem is reported first: number, name, quantity.
export const CardInputSchema = z.object({
  cardNumber: z
    .string({ required_error: MESSAGES.cardNumberEmpty })
    .trim()
    .min(1, MESSAGES.cardNumberEmpty)
    .regex(CARD_NUMBER_PATTERN, MESSAGES.cardNumberFormat),
  cardName: z
    .string({ required_error: MESSAGES.cardNameEmpty })
    .trim()
    .min(1, MESSAGES.cardNameEmpty),
  quantity: z
    .number({ invalid_type_error: MESSAGES.quantityWhole })
    .int(MESSAGES.quantityWhole)
    .min(1, MESSAGES.quantityMin)
    .default(1),
  crew: optionalText,
  color: optionalChoice(CARD_COLORS, "Color"),
  foilOrNormal: optionalChoice(FOIL_OPTIONS, "Foil / Normal"),
  rarity: optionalChoice(CARD_RARITIES, "Rarity"),
  kind: optionalChoice(CARD_KINDS, "Kind"),
  altArt: z.boolean().default(false),
  specialPower: optionalText,
  notes: optionalText,
});

export const CardPatchSchema = CardInputSchema.partial();

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid card data.";
  return issue.message;
}

/** Validate form-style input into a complete record ready for the store. */
export function validateCardInput(input: unknown): StoreResult<CardRecord> {
  const parsed = CardInputSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: new CollectionError("ValidationError", firstIssue(parsed.error)) };
  }

  const data = parsed.data;
  return {
    ok: true,
    value: {
      quantity: data.quantity,
      cardNumber: data.cardNumber,
      cardName: data.cardName,
      crew: data.crew,
      color: data.color,
      foilOrNormal: data.foilOrNormal,
      rarity: data.rarity,
      kind: data.kind,
      altArt: data.altArt,
      specialPower: data.specialPower,
      notes: data.notes,
    },
  };
}

/**
 * Validate a partial field set. Keys absent from the input stay absent from
 * the patch, so the update leaves those fields alone.
 */
export function validateCardPatch(input: unknown): StoreResult<CardPatch> {
  const parsed = CardPatchSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: new CollectionError("ValidationError", firstIssue(parsed.error)) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Re-check the invariants of the fields about to be written to the table.
 * Returns the first violation, or null when the fields are acceptable.
 */
export function checkRecordInvariants(fields: CardPatch): string | null {
  if (fields.cardNumber !== undefined) {
    if (fields.cardNumber.trim().length === 0) return MESSAGES.cardNumberEmpty;
    if (!CARD_NUMBER_PATTERN.test(fields.cardNumber)) return MESSAGES.cardNumberFormat;
  }
  if (fields.cardName !== undefined && fields.cardName.trim().length === 0) {
    return MESSAGES.cardNameEmpty;
  }
  if (fields.quantity !== undefined) {
    if (fields.quantity === null || !Number.isInteger(fields.quantity)) return MESSAGES.quantityWhole;
    if (fields.quantity < 1) return MESSAGES.quantityMin;
  }
  return null;
}
