import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createMcpServer, type ServerOptions } from "./server.ts";
import { createStore, loadStore, type CardStore } from "./store.ts";

let dir: string;
let store: CardStore;
let client: Client;

async function connect(target: CardStore, options: ServerOptions): Promise<Client> {
  const server = createMcpServer(target, options);
  const connected = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), connected.connect(clientTransport)]);
  return connected;
}

/** Pull the first text block out of a tool result. */
function textOf(result: unknown): string {
  if (typeof result !== "object" || result === null || !("content" in result) || !Array.isArray(result.content)) {
    throw new Error("Tool result has no content");
  }
  const first: unknown = result.content[0];
  if (typeof first !== "object" || first === null || !("text" in first) || typeof first.text !== "string") {
    throw new Error("Tool result has no text block");
  }
  return first.text;
}

function isErrorResult(result: unknown): boolean {
  return typeof result === "object" && result !== null && "isError" in result && result.isError === true;
}

async function callTool(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  return client.callTool({ name, arguments: args });
}

beforeEach(async () => {
  dir = mkdtempSync(path.join(tmpdir(), "card-ledger-server-"));
  store = createStore(path.join(dir, "collection.xlsx"));
  client = await connect(store, { autosave: true });
});

afterEach(async () => {
  await client.close();
  rmSync(dir, { recursive: true, force: true });
});

describe("add_card", () => {
  test("asks before touching a duplicate, then merges on request", async () => {
    const first = await callTool("add_card", { cardNumber: "OP01-023", cardName: "Luffy", quantity: 2 });
    expect(textOf(first)).toBe('Added "Luffy" (OP01-023) at index 0.');

    const second = await callTool("add_card", { cardNumber: "op01-023", cardName: "luffy", quantity: 3 });
    expect(textOf(second).split("\n")[0]).toBe(
      'Duplicate found: "luffy" (op01-023) already exists at index 0 with quantity 2. Incoming quantity: 3.',
    );
    expect(store.records.map((c) => c.quantity)).toEqual([2]);

    const third = await callTool("add_card", {
      cardNumber: "op01-023",
      cardName: "luffy",
      quantity: 3,
      onDuplicate: "merge_quantity",
    });
    expect(textOf(third)).toBe('Quantity for "luffy" (op01-023) updated to 5 at index 0.');
    expect(store.records.map((c) => c.quantity)).toEqual([5]);

    // Autosave wrote the merge to disk
    const reloaded = loadStore(createStore(store.filePath));
    expect(reloaded.records.map((c) => c.quantity)).toEqual([5]);
  });

  test("keeps a separate entry with add_as_new", async () => {
    await callTool("add_card", { cardNumber: "OP01-023", cardName: "Luffy", quantity: 2 });
    const result = await callTool("add_card", {
      cardNumber: "OP01-023",
      cardName: "Luffy",
      quantity: 3,
      altArt: true,
      onDuplicate: "add_as_new",
    });
    expect(textOf(result)).toBe('New entry for "Luffy" (OP01-023) added at index 1.');
    expect(store.records.map((c) => [c.quantity, c.altArt])).toEqual([
      [2, false],
      [3, true],
    ]);
  });

  test("reports validation problems as tool errors", async () => {
    const result = await callTool("add_card", { cardNumber: "OP01023", cardName: "Luffy" });
    expect(isErrorResult(result)).toBe(true);
    expect(textOf(result)).toBe("ValidationError: Invalid Card Number format (e.g., ST04-001, OP01-023).");
    expect(store.records).toEqual([]);
  });

  test("keeps the change in memory when autosave fails", async () => {
    // A directory cannot be written as a file
    const blocked = createStore(dir);
    const blockedClient = await connect(blocked, { autosave: true });

    const result = await blockedClient.callTool({
      name: "add_card",
      arguments: { cardNumber: "ST04-001", cardName: "Kaido" },
    });
    const lines = textOf(result).split("\n");
    expect(lines[0]).toBe('Added "Kaido" (ST04-001) at index 0.');
    expect(lines[2]?.startsWith("Warning: the change is kept in memory but was not saved.")).toBe(true);
    expect(blocked.records.length).toBe(1);

    await blockedClient.close();
  });
});

describe("update_card and delete_cards", () => {
  beforeEach(async () => {
    await callTool("add_card", { cardNumber: "OP01-001", cardName: "Zoro", color: "Red" });
    await callTool("add_card", { cardNumber: "OP01-023", cardName: "Luffy", color: "Red" });
    await callTool("add_card", { cardNumber: "ST04-001", cardName: "Kaido", color: "Purple" });
  });

  test("update_card changes only the given fields", async () => {
    const result = await callTool("update_card", { index: 1, quantity: 4, notes: "Binder page 2" });
    expect(textOf(result).split("\n")[0]).toBe("Card at index 1 updated.");
    expect(store.records[1]).toMatchObject({ cardName: "Luffy", color: "Red", quantity: 4, notes: "Binder page 2" });
  });

  test("update_card clears a choice given an empty string or null", async () => {
    const blank = await callTool("update_card", { index: 0, color: "" });
    expect(isErrorResult(blank)).toBe(false);
    expect(store.records[0]).toMatchObject({ cardName: "Zoro", color: null });

    const cleared = await callTool("update_card", { index: 2, color: null });
    expect(isErrorResult(cleared)).toBe(false);
    expect(store.records[2]).toMatchObject({ cardName: "Kaido", color: null });

    const reloaded = loadStore(createStore(store.filePath));
    expect(reloaded.records.map((c) => c.color)).toEqual([null, "Red", null]);
  });

  test("update_card reports a missing index", async () => {
    const result = await callTool("update_card", { index: 9, quantity: 2 });
    expect(isErrorResult(result)).toBe(true);
    expect(textOf(result)).toBe("NotFoundError: No card at index 9");
  });

  test("delete_cards removes the rows and renumbers the rest", async () => {
    const result = await callTool("delete_cards", { indices: [0, 2] });
    expect(textOf(result)).toBe("2 card(s) deleted.");
    expect(store.records.map((c) => c.cardName)).toEqual(["Luffy"]);
  });

  test("delete_cards reports when nothing was removed", async () => {
    const result = await callTool("delete_cards", { indices: [7] });
    expect(isErrorResult(result)).toBe(true);
    expect(textOf(result)).toBe("NothingRemovedError: None of the given indices matched a card");
  });

  test("list_cards searches with positional indices", async () => {
    const result = await callTool("list_cards", { query: "purple" });
    const parsed: unknown = JSON.parse(textOf(result));
    expect(parsed).toMatchObject([{ index: 2, record: { cardName: "Kaido" } }]);
  });

  test("list_cards treats a blank query as the whole collection", async () => {
    const parsed: unknown = JSON.parse(textOf(await callTool("list_cards", { query: "   " })));
    expect(parsed).toMatchObject([{ index: 0 }, { index: 1 }, { index: 2 }]);
  });

  test("list_cards says when nothing matches", async () => {
    const result = await callTool("list_cards", { query: "Shanks" });
    expect(textOf(result)).toBe('No cards found matching "Shanks".');
  });

  test("collection_stats counts the searched cards", async () => {
    const result = await callTool("collection_stats", { query: "op01" });
    const parsed: unknown = JSON.parse(textOf(result));
    expect(parsed).toMatchObject({
      totalQuantity: 2,
      uniqueEntries: 2,
      byColor: [{ label: "Red", quantity: 2 }],
    });
  });
});
