import { Hono } from "hono";
import { collectionFor, createRenderContext, type AppContext, type AppDeps } from "./app-context.js";
import { getBookCreatorBoxContent } from "./book-creator-box.js";
import { isRecord } from "./guards.js";
import { WikiRequest } from "./render-context.js";
import type { AppEnv } from "./session-middleware.js";
import { boxDeps } from "./site-notice.js";
import { namespaceName, NS_CATEGORY, NS_MAIN, Title } from "./title.js";

interface ArticleBody {
  title: Title;
  oldid: number;
}

/** Validate `{ namespace, title, oldid }`; null when the body is malformed */
function parseArticleBody(body: unknown): ArticleBody | null {
  if (!isRecord(body)) return null;
  const { namespace = NS_MAIN, title, oldid = 0 } = body;
  if (typeof namespace !== "number" || !Number.isInteger(namespace) || namespaceName(namespace) === null) return null;
  if (typeof title !== "string" || typeof oldid !== "number" || !Number.isInteger(oldid) || oldid < 0) return null;
  const parsed = Title.makeTitle(namespace, title);
  return parsed ? { title: parsed, oldid } : null;
}

export function createRoutes(deps: AppDeps) {
  const api = new Hono<AppEnv>();
  const { config, pages, messages } = deps;

  /** Box content for `title` after a change, with the new item count */
  function boxResponse(c: AppContext, title: Title, oldid = 0) {
    const ctx = createRenderContext(c, deps, pages.lookup(title), new WikiRequest());
    return c.json({
      html: getBookCreatorBoxContent(boxDeps(ctx), title, "none", oldid),
      count: ctx.collection.countArticles(),
    });
  }

  // ─── Collection ────────────────────────────────────────────────────

  api.get("/collection", (c) => {
    const collection = collectionFor(c, deps);
    return c.json({
      enabled: collection.isEnabled(),
      count: collection.countArticles(),
      timestamp: collection.timestamp,
      items: collection.articles(),
    });
  });

  api.post("/collection/add-article", async (c) => {
    const body = parseArticleBody(await c.req.json().catch(() => null));
    if (!body) return c.json({ error: "namespace, title and oldid are required" }, 400);

    const collection = collectionFor(c, deps);
    if (!collection.isEnabled()) return c.json({ error: messages.text("coll-not_enabled") }, 409);

    const { title } = body;
    const page = pages.get(title);
    if (!page) return c.json({ error: messages.text("coll-page_not_found", title.prefixedText) }, 404);
    if (!config.collectibleNamespaces.has(title.namespace)) {
      return c.json({ error: messages.text("coll-not_addable_namespace") }, 400);
    }
    const oldid = body.oldid === page.latestRevisionId ? 0 : body.oldid;
    const inBook = collection.findArticle(title.prefixedText, oldid) !== null;
    if (!inBook && collection.countArticles() >= config.maxArticles) {
      return c.json({ error: messages.text("coll-book_full", messages.text("coll-n_pages", config.maxArticles)) }, 400);
    }

    try {
      if (collection.addArticle(pages.lookup(title), oldid)) {
        console.log(`[routes] Added "${title.prefixedText}" (revision ${oldid || page.latestRevisionId})`);
      }
      return boxResponse(c, title, oldid);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      console.error(`[routes] Failed to add "${title.prefixedText}":`, msg);
      return c.json({ error: msg }, 500);
    }
  });

  api.post("/collection/remove-article", async (c) => {
    const body = parseArticleBody(await c.req.json().catch(() => null));
    if (!body) return c.json({ error: "namespace, title and oldid are required" }, 400);

    const collection = collectionFor(c, deps);
    if (!collection.isEnabled()) return c.json({ error: messages.text("coll-not_enabled") }, 409);

    const { title } = body;
    const page = pages.get(title);
    if (!page) return c.json({ error: messages.text("coll-page_not_found", title.prefixedText) }, 404);

    try {
      const oldid = body.oldid === page.latestRevisionId ? 0 : body.oldid;
      if (collection.removeArticle(title.prefixedText, oldid)) {
        console.log(`[routes] Removed "${title.prefixedText}"`);
      }
      return boxResponse(c, title, oldid);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      console.error(`[routes] Failed to remove "${title.prefixedText}":`, msg);
      return c.json({ error: msg }, 500);
    }
  });

  api.post("/collection/add-category", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const name = isRecord(body) ? body.title : undefined;
    const category = typeof name === "string" ? Title.makeTitle(NS_CATEGORY, name) : null;
    if (!category) return c.json({ error: "title is required" }, 400);

    const collection = collectionFor(c, deps);
    if (!collection.isEnabled()) return c.json({ error: messages.text("coll-not_enabled") }, 409);
    if (!pages.get(category)) {
      return c.json({ error: messages.text("coll-page_not_found", category.prefixedText) }, 404);
    }

    try {
      const members = pages
        .categoryMembers(category.text)
        .filter((member) => config.collectibleNamespaces.has(member.title.namespace))
        .map((member) => pages.lookup(member.title));
      const added = collection.addCategory(members, config.maxArticles);
      console.log(`[routes] Added ${added} of ${members.length} pages from "${category.prefixedText}"`);
      return boxResponse(c, category);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      console.error(`[routes] Failed to add "${category.prefixedText}":`, msg);
      return c.json({ error: msg }, 500);
    }
  });

  return api;
}
