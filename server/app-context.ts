import type { Context } from "hono";
import { CollectionSession } from "./collection-session.js";
import type { CollectionConfig } from "./config.js";
import type { MessageLookup } from "./messages.js";
import { OutputPage } from "./output-page.js";
import type { PageRef, PageStore } from "./page-store.js";
import { WikiRequest, type RenderContext } from "./render-context.js";
import type { AppEnv } from "./session-middleware.js";
import type { SessionStore } from "./session-store.js";
import { UrlBuilder } from "./urls.js";

/** Long-lived collaborators shared by every request */
export interface AppDeps {
  config: CollectionConfig;
  pages: PageStore;
  sessions: SessionStore;
  messages: MessageLookup;
  /** Server start, ms since epoch; bounds the freshness of every rendered page */
  startedAt: number;
  now?: () => number;
}

export type AppContext = Context<AppEnv>;

export function collectionFor(c: AppContext, deps: Pick<AppDeps, "now">): CollectionSession {
  return new CollectionSession(c.get("session"), deps.now);
}

export function createRenderContext(
  c: AppContext,
  deps: AppDeps,
  page: PageRef,
  request: WikiRequest,
  output = new OutputPage({ printable: request.getVal("printable") === "yes" }),
): RenderContext {
  return {
    page,
    request,
    user: c.get("user"),
    output,
    config: deps.config,
    collection: collectionFor(c, deps),
    messages: deps.messages,
    urls: new UrlBuilder(deps.config.articlePath),
  };
}
