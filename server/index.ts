import { relative } from "node:path";
import { serve } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import { createApp } from "./app.js";
import { DEFAULT_PORT, loadConfig } from "./config.js";
import { MessageLookup } from "./messages.js";
import { PageStore } from "./page-store.js";
import { CLIENT_DIST_DIR, PACKAGE_ROOT } from "./paths.js";
import { SessionStore } from "./session-store.js";

const PRUNE_INTERVAL_MS = 60 * 60 * 1000;

const port = Number(process.env.PORT) || DEFAULT_PORT;
const config = loadConfig();
const pages = PageStore.fromFile();
const messages = MessageLookup.load(config.messages);
const sessions = new SessionStore();

console.log(`[server] Loaded ${pages.all().length} pages`);

const app = createApp({ config, pages, sessions, messages, startedAt: Date.now() });

// serveStatic resolves its root against the working directory
app.use("/static/collection/*", serveStatic({ root: relative(process.cwd(), PACKAGE_ROOT) }));
app.use(
  "/static/modules/*",
  serveStatic({
    root: relative(process.cwd(), CLIENT_DIST_DIR),
    rewriteRequestPath: (path) => path.replace(/^\/static\/modules/, ""),
  }),
);

const pruneTimer = setInterval(() => {
  const removed = sessions.prune();
  if (removed > 0) console.log(`[server] Pruned ${removed} expired session(s)`);
}, PRUNE_INTERVAL_MS);
pruneTimer.unref();

const server = serve({ fetch: app.fetch, port }, (info) => {
  console.log(`Server running on http://localhost:${info.port}`);
  console.log(`  Pages:  http://localhost:${info.port}${config.articlePath}/Main_Page`);
  console.log(`  Book:   http://localhost:${info.port}${config.articlePath}/Special:Book`);
});

function shutdown(signal: string): void {
  console.log(`[server] ${signal} received, shutting down`);
  clearInterval(pruneTimer);
  server.close();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
