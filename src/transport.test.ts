import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { afterEach, describe, expect, test } from "vitest";
import { createStore } from "./store.ts";
import { startHttpTransport } from "./transport.ts";

const opened: Server[] = [];

function listen(server: Server): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server has no TCP address"));
        return;
      }
      resolve(address);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

afterEach(async () => {
  await Promise.all(opened.splice(0).map(close));
});

describe("startHttpTransport", () => {
  test("rejects when the port is already taken", async () => {
    const blocker = createServer();
    opened.push(blocker);
    const { port } = await listen(blocker);

    const store = createStore("unused.xlsx");
    await expect(startHttpTransport(store, { autosave: false }, port)).rejects.toMatchObject({
      code: "EADDRINUSE",
    });
  });

  test("answers 404 outside /mcp", async () => {
    const store = createStore("unused.xlsx");
    const server = await startHttpTransport(store, { autosave: false }, 0);
    opened.push(server);

    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("Server has no TCP address");

    const response = await fetch(`http://127.0.0.1:${address.port}/other`);
    expect(response.status).toBe(404);
    expect(await response.text()).toBe("Not Found");
  });
});
