import { parseArgs } from "node:util";
import { DEFAULT_COLLECTION_FILE, DEFAULT_PORT, LOG_PREFIX } from "./src/constants.ts";
import { formatError } from "./src/errors.ts";
import { createStore, loadStore } from "./src/store.ts";
import { startHttpTransport, startStdioTransport } from "./src/transport.ts";
import type { Config } from "./src/types.ts";

const USAGE =
  "Usage: tsx index.ts [-f <collection.xlsx>] [--port <port>] [--no-http] [--manual-save]";

function parseConfig(): Config {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      file: { type: "string", short: "f" },
      port: { type: "string" },
      "no-http": { type: "boolean", default: false },
      "manual-save": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.error(USAGE);
    process.exit(0);
  }

  const portStr = values.port ?? process.env["PORT"] ?? String(DEFAULT_PORT);
  const port = parseInt(portStr, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    console.error(`Invalid port: ${portStr}`);
    console.error(USAGE);
    process.exit(1);
  }

  return {
    collectionPath: values.file ?? process.env["COLLECTION_FILE"] ?? DEFAULT_COLLECTION_FILE,
    port,
    http: !values["no-http"],
    autosave: !values["manual-save"],
  };
}

async function main() {
  const config = parseConfig();

  const store = createStore(config.collectionPath);
  const loaded = loadStore(store);
  if (loaded.warning) {
    console.error(`${LOG_PREFIX} Warning: ${formatError(loaded.warning)}`);
    console.error(`${LOG_PREFIX} A new empty collection was started. Check the file manually.`);
  } else if (loaded.records.length === 0) {
    console.error(`${LOG_PREFIX} Starting with an empty collection at ${config.collectionPath}`);
  } else {
    console.error(`${LOG_PREFIX} Loaded ${loaded.records.length} card entries from ${config.collectionPath}`);
  }

  const options = { autosave: config.autosave };
  if (config.http) {
    await startHttpTransport(store, options, config.port);
  }
  await startStdioTransport(store, options);
}

main().catch((err) => {
  console.error(`${LOG_PREFIX} Fatal error:`, err);
  process.exit(1);
});
