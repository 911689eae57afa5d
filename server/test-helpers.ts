import { JSDOM } from "jsdom";
import { CollectionSession, type CollectionHolder } from "./collection-session.js";
import { DEFAULT_CONFIG, type CollectionConfig } from "./config.js";
import { MessageLookup } from "./messages.js";
import { OutputPage } from "./output-page.js";
import { PageStore, type WikiPage } from "./page-store.js";
import { WikiRequest, type RenderContext } from "./render-context.js";
import type { WikiUser } from "./session-middleware.js";
import { Title } from "./title.js";
import { UrlBuilder } from "./urls.js";

// Shared fixtures for server tests; not loaded by the server itself.

export const messages = MessageLookup.load();

export function title(text: string): Title {
  const parsed = Title.newFromText(text);
  if (!parsed) throw new Error(`Invalid test title: ${text}`);
  return parsed;
}

export function wikiPage(text: string, revision: number, categories: string[] = [], content = ""): WikiPage {
  return {
    title: title(text),
    latestRevisionId: revision,
    touched: Date.UTC(2024, 0, 1),
    content,
    categories,
  };
}

export function testPages(): PageStore {
  return new PageStore([
    wikiPage("Main Page", 12, [], "Welcome."),
    wikiPage("Sourdough bread", 48, ["Baking", "Bread"], "A slow bread."),
    wikiPage("Rye crackers", 21, ["Baking"], "Thin and crisp."),
    wikiPage("Focaccia", 33, ["Bread"], "Flat and oily."),
    wikiPage("Tomato soup", 7, ["Soups"], "Red."),
    wikiPage("Category:Baking", 3, [], "Things from the oven."),
    wikiPage("Category:Bread", 4, ["Baking"], "Loaves."),
    wikiPage("Help:Books", 5, [], "How to make books."),
    wikiPage("Template:Recipe", 9, [], "Recipe box."),
  ]);
}

export interface ContextOptions {
  title?: string;
  exists?: boolean;
  latest?: number;
  query?: Record<string, string>;
  printable?: boolean;
  config?: Partial<CollectionConfig>;
  user?: WikiUser;
  holder?: CollectionHolder;
  now?: () => number;
}

/** A render context for a single page view, with defaults for every part */
export function makeContext(options: ContextOptions = {}): RenderContext {
  const config: CollectionConfig = { ...DEFAULT_CONFIG, ...options.config };
  const exists = options.exists ?? true;
  return {
    page: {
      title: title(options.title ?? "Sourdough bread"),
      exists,
      latestRevisionId: exists ? (options.latest ?? 48) : 0,
    },
    request: new WikiRequest(options.query ?? {}),
    user: options.user ?? { name: null, isRegistered: false },
    output: new OutputPage({ printable: options.printable ?? false }),
    config,
    collection: new CollectionSession(options.holder ?? {}, options.now ?? (() => 1_700_000_000_000)),
    messages,
    urls: new UrlBuilder(config.articlePath),
  };
}

/** Parse an HTML fragment for querying */
export function parseHtml(html: string): DocumentFragment {
  return JSDOM.fragment(html);
}

export function parseDocument(html: string): Document {
  return new JSDOM(html).window.document;
}
