#!/usr/bin/env -S node --import tsx
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, DEFAULT_PORT } from "../server/config.js";

// Package root so the server can find its data files regardless of CWD
const __dirname = dirname(fileURLToPath(import.meta.url));
process.env.BOOK_CREATOR_PACKAGE_ROOT = process.env.BOOK_CREATOR_PACKAGE_ROOT || resolve(__dirname, "..");

const command = process.argv[2];

function printUsage(): void {
  console.log(`
Usage: book-creator [command]

Commands:
  (none)      Start the server in foreground (default)
  serve       Start the server in foreground
  check       Validate the configuration and page data, then exit
  help        Show this help message

Options:
  --port <n>  Override the default port (default: ${DEFAULT_PORT})

Environment:
  BOOK_CREATOR_CONFIG              Path to a JSON configuration file
  BOOK_CREATOR_REQUIRE_LOGIN       1/0: only registered users see the sidebar section
  BOOK_CREATOR_DISABLE_START_LINK  1/0: hide "Create a book" from the sidebar
  BOOK_CREATOR_SUGGESTIONS         1/0: offer page suggestions
`);
}

function applyPortOption(): void {
  const portIdx = process.argv.indexOf("--port");
  if (portIdx === -1) return;
  const rawPort = Number(process.argv[portIdx + 1]);
  if (!Number.isInteger(rawPort) || rawPort <= 0) {
    console.error(`Invalid port: ${process.argv[portIdx + 1] ?? "(missing)"}`);
    process.exit(1);
  }
  process.env.PORT = String(rawPort);
}

async function run(): Promise<void> {
  switch (command) {
    case "help":
    case "-h":
    case "--help":
      printUsage();
      break;

    case "check": {
      const { loadConfig } = await import("../server/config.js");
      const { PageStore } = await import("../server/page-store.js");
      const config = loadConfig();
      const pages = PageStore.fromFile();
      console.log(`Configuration OK: ${config.sidebarFormats.length} sidebar format(s), ${pages.all().length} pages`);
      break;
    }

    case undefined:
    case "serve":
    case "--port":
      applyPortOption();
      process.env.NODE_ENV = process.env.NODE_ENV || "production";
      await import("../server/index.js");
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

try {
  await run();
} catch (err: unknown) {
  if (err instanceof ConfigError) {
    console.error(`Invalid configuration: ${err.message}`);
    process.exit(1);
  }
  throw err;
}
