import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CARD_COLORS, CARD_KINDS, CARD_RARITIES, FOIL_OPTIONS, LOG_PREFIX } from "./constants.ts";
import { addCard, DUPLICATE_OUTCOMES, type AddAttempt } from "./duplicates.ts";
import { type CollectionError, formatError } from "./errors.ts";
import { EXPORT_FORMATS, exportCollection } from "./export.ts";
import { computeStatistics } from "./stats.ts";
import {
  deleteRecords,
  getByIndex,
  listRecords,
  loadStore,
  saveStore,
  searchStore,
  updateRecord,
  type CardStore,
} from "./store.ts";
import type { CardRecord } from "./types.ts";
import { validateCardInput, validateCardPatch } from "./validate.ts";

export type ServerOptions = {
  /** Save the collection after every successful change. */
  autosave: boolean;
};

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(error: CollectionError): ToolResult {
  return { content: [{ type: "text", text: formatError(error) }], isError: true };
}

const CARD_FIELDS = {
  cardNumber: z.string().describe("Card number, letters then digits, a hyphen, digits (e.g. OP01-023, ST04-001)"),
  cardName: z.string().describe("Card name"),
  quantity: z.number().optional().describe("Copies owned, at least 1. Defaults to 1."),
  crew: z.string().optional().describe("Crew the character belongs to"),
  color: z.enum(CARD_COLORS).optional(),
  foilOrNormal: z.enum(FOIL_OPTIONS).optional(),
  rarity: z.enum(CARD_RARITIES).optional().describe("C, UC, R, SR, L (leader), SEC (secret) or Promo"),
  kind: z.enum(CARD_KINDS).optional(),
  altArt: z.boolean().optional().describe("Whether this copy is an alternate art printing"),
  specialPower: z.string().optional().describe("Card effect text"),
  notes: z.string().optional(),
};

// On update, "" or null clears an optional field.
const CARD_PATCH_FIELDS = {
  ...z.object(CARD_FIELDS).partial().shape,
  crew: z.string().nullable().optional(),
  color: z.enum(CARD_COLORS).or(z.literal("")).nullable().optional(),
  foilOrNormal: z.enum(FOIL_OPTIONS).or(z.literal("")).nullable().optional(),
  rarity: z.enum(CARD_RARITIES).or(z.literal("")).nullable().optional(),
  kind: z.enum(CARD_KINDS).or(z.literal("")).nullable().optional(),
  specialPower: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
};

function describeCard(record: CardRecord): string {
  return `"${record.cardName}" (${record.cardNumber})`;
}

function describeAttempt(attempt: AddAttempt, record: CardRecord): string {
  switch (attempt.status) {
    case "added":
      return `Added ${describeCard(record)} at index ${attempt.index}.`;
    case "conflict":
      return (
        `Duplicate found: ${describeCard(record)} already exists at index ${attempt.existingIndex} ` +
        `with quantity ${attempt.existingQuantity}. Incoming quantity: ${attempt.incomingQuantity}.\n` +
        "Nothing was changed. Call add_card again with onDuplicate set to " +
        "merge_quantity (add to the existing quantity), add_as_new (keep a separate entry) or cancel."
      );
    case "merged":
      return `Quantity for ${describeCard(record)} updated to ${attempt.record.quantity} at index ${attempt.index}.`;
    case "added_new":
      return `New entry for ${describeCard(record)} added at index ${attempt.index}.`;
    case "cancelled":
      return "Card addition cancelled.";
  }
}

/**
 * Create an MCP server with all collection tools registered.
 * Returns a new McpServer instance -- call this once per transport.
 * Every server created for the same store shares its table.
 */
export function createMcpServer(store: CardStore, options: ServerOptions): McpServer {
  const server = new McpServer({
    name: "card-ledger",
    version: "1.0.0",
  });

  // Returns a note to append to the tool result when the save failed.
  function persist(): string {
    if (!options.autosave) return "";
    const saved = saveStore(store);
    if (saved.ok) return "";
    console.error(`${LOG_PREFIX} ${formatError(saved.error)}`);
    return `\n\nWarning: the change is kept in memory but was not saved. ${saved.error.message}`;
  }

  server.registerTool(
    "list_cards",
    {
      title: "List Cards",
      description:
        "List cards in the collection, optionally filtered by a case-insensitive search " +
        "across card number, name, crew, color, foil/normal, rarity, kind, special power and notes. " +
        "Each result carries its current index; indices change after any add or delete.",
      inputSchema: {
        query: z.string().optional().describe("Text to search for. Omit to list everything."),
      },
    },
    async ({ query }) => {
      const needle = (query ?? "").trim();
      const results = needle ? searchStore(store, needle) : listRecords(store);
      if (results.length === 0) {
        return textResult(needle ? `No cards found matching "${needle}".` : "The collection is empty.");
      }
      return textResult(JSON.stringify(results, null, 2));
    },
  );

  server.registerTool(
    "get_card",
    {
      title: "Get Card",
      description: "Get every field of the card at a given index.",
      inputSchema: {
        index: z.number().int().describe("Current index of the card"),
      },
    },
    async ({ index }) => {
      const result = getByIndex(store, index);
      if (!result.ok) return errorResult(result.error);
      return textResult(JSON.stringify({ index, record: result.value }, null, 2));
    },
  );

  server.registerTool(
    "add_card",
    {
      title: "Add Card",
      description:
        "Add a card to the collection. If a card with the same number and name (ignoring case) " +
        "already exists, nothing is changed and both quantities are reported; call again with " +
        "onDuplicate to merge the quantities, add a separate entry, or cancel.",
      inputSchema: {
        ...CARD_FIELDS,
        onDuplicate: z
          .enum(DUPLICATE_OUTCOMES)
          .optional()
          .describe("What to do when the card already exists. Omit to be asked first."),
      },
    },
    async ({ onDuplicate, ...fields }) => {
      const validated = validateCardInput(fields);
      if (!validated.ok) return errorResult(validated.error);

      const record = validated.value;
      const attempt = addCard(store, record, onDuplicate);
      if (!attempt.ok) return errorResult(attempt.error);

      const changed = attempt.value.status !== "conflict" && attempt.value.status !== "cancelled";
      const note = changed ? persist() : "";
      return textResult(describeAttempt(attempt.value, record) + note);
    },
  );

  server.registerTool(
    "update_card",
    {
      title: "Update Card",
      description:
        "Replace fields of the card at a given index. Only the fields provided are changed; " +
        "pass an empty string or null to clear crew, color, foil/normal, rarity, kind, " +
        "special power or notes.",
      inputSchema: {
        index: z.number().int().describe("Current index of the card"),
        ...CARD_PATCH_FIELDS,
      },
    },
    async ({ index, ...fields }) => {
      const patch = validateCardPatch(fields);
      if (!patch.ok) return errorResult(patch.error);

      const updated = updateRecord(store, index, patch.value);
      if (!updated.ok) return errorResult(updated.error);

      const note = persist();
      return textResult(
        `Card at index ${index} updated.\n\n${JSON.stringify(updated.value, null, 2)}${note}`,
      );
    },
  );

  server.registerTool(
    "delete_cards",
    {
      title: "Delete Cards",
      description:
        "Delete the cards at the given indices in one step. Remaining cards are renumbered, " +
        "so list the collection again before using any other index.",
      inputSchema: {
        indices: z.array(z.number().int()).min(1).describe("Current indices of the cards to delete"),
      },
    },
    async ({ indices }) => {
      const removed = deleteRecords(store, indices);
      if (!removed.ok) return errorResult(removed.error);

      const note = persist();
      return textResult(`${removed.value.length} card(s) deleted.${note}`);
    },
  );

  server.registerTool(
    "collection_stats",
    {
      title: "Collection Statistics",
      description:
        "Totals for the collection (or the part matching a search query), with quantities " +
        "per rarity, color and kind suitable for charts. Optional filters narrow the cards counted.",
      inputSchema: {
        query: z.string().optional().describe("Search text applied before the filters"),
        color: z.enum(CARD_COLORS).optional(),
        rarity: z.enum(CARD_RARITIES).optional(),
        kind: z.enum(CARD_KINDS).optional(),
        altArtOnly: z.boolean().optional().describe("Count only alternate art cards"),
      },
    },
    async ({ query, ...filter }) => {
      const records = searchStore(store, query ?? "").map((entry) => entry.record);
      const statistics = computeStatistics(records, filter);
      return textResult(JSON.stringify(statistics, null, 2));
    },
  );

  server.registerTool(
    "export_collection",
    {
      title: "Export Collection",
      description:
        "Write the collection, or the cards matching a search query, to a CSV or JSON file. " +
        "The file extension is added when missing. Exports are not read back.",
      inputSchema: {
        path: z.string().min(1).describe("Destination file path"),
        format: z.enum(EXPORT_FORMATS),
        query: z.string().optional().describe("Export only cards matching this search"),
      },
    },
    async ({ path, format, query }) => {
      const records = searchStore(store, query ?? "").map((entry) => entry.record);
      const result = exportCollection(records, path, format);
      if (!result.ok) return errorResult(result.error);
      return textResult(`Collection exported to '${result.value}' (${records.length} cards).`);
    },
  );

  server.registerTool(
    "save_collection",
    {
      title: "Save Collection",
      description: "Write the collection to its spreadsheet file now.",
    },
    async () => {
      const saved = saveStore(store);
      if (!saved.ok) return errorResult(saved.error);
      return textResult(`Collection saved to '${store.filePath}' (${saved.value} cards).`);
    },
  );

  server.registerTool(
    "reload_collection",
    {
      title: "Reload Collection",
      description:
        "Discard in-memory changes and read the collection again from its spreadsheet file.",
    },
    async () => {
      const loaded = loadStore(store);
      const summary = `Collection reloaded from file. Total card entries: ${loaded.records.length}.`;
      if (loaded.warning) {
        return textResult(`${summary}\n\nWarning: ${loaded.warning.message}`);
      }
      return textResult(summary);
    },
  );

  return server;
}
