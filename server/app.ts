import { Hono } from "hono";
import type { AppDeps } from "./app-context.js";
import { createRoutes } from "./routes.js";
import { sessionMiddleware, type AppEnv } from "./session-middleware.js";
import { NS_MAIN, Title } from "./title.js";
import { UrlBuilder } from "./urls.js";
import { createWikiRoutes } from "./wiki-routes.js";

const MAIN_PAGE = Title.makeTitle(NS_MAIN, "Main Page");

/**
 * The HTTP application without static assets, so tests can drive it through
 * `app.request()`.
 */
export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();
  const urls = new UrlBuilder(deps.config.articlePath);

  app.use("/api/*", sessionMiddleware(deps.sessions, deps.config.userHeader));
  app.use(`${deps.config.articlePath}/*`, sessionMiddleware(deps.sessions, deps.config.userHeader));

  app.route("/api", createRoutes(deps));
  app.route(deps.config.articlePath, createWikiRoutes(deps));

  app.get("/", (c) => c.redirect(MAIN_PAGE ? urls.localUrl(MAIN_PAGE) : urls.bookUrl(), 302));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    console.error(`[server] Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
