import type { CollectionConfig } from "./config.js";
import type { CollectionSession } from "./collection-session.js";
import type { MessageLookup } from "./messages.js";
import type { OutputPage } from "./output-page.js";
import type { PageRef } from "./page-store.js";
import type { WikiUser } from "./session-middleware.js";
import type { UrlBuilder } from "./urls.js";

/** Read access to the query string of the current request */
export class WikiRequest {
  private params: URLSearchParams;

  constructor(params: URLSearchParams | Record<string, string> = {}) {
    this.params = params instanceof URLSearchParams ? params : new URLSearchParams(params);
  }

  static fromUrl(url: string): WikiRequest {
    return new WikiRequest(new URL(url).searchParams);
  }

  getVal(name: string): string | null;
  getVal(name: string, fallback: string): string;
  getVal(name: string, fallback: string | null = null): string | null {
    return this.params.get(name) ?? fallback;
  }

  /** Integer value of a parameter; `fallback` when it is missing or not an integer */
  getInt(name: string, fallback = 0): number {
    const raw = this.params.get(name);
    if (raw === null || !/^-?\d+$/.test(raw.trim())) return fallback;
    return Number.parseInt(raw, 10);
  }
}

/**
 * Everything a renderer may look at while building the sidebar section or
 * the notice box. Built once per request by the route and passed down.
 */
export interface RenderContext {
  page: PageRef;
  request: WikiRequest;
  user: WikiUser;
  output: OutputPage;
  config: CollectionConfig;
  collection: CollectionSession;
  messages: MessageLookup;
  urls: UrlBuilder;
}
