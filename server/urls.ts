import { Title } from "./title.js";

export type QueryParams = Record<string, string | number | undefined>;

/** The management page every book link points at */
export const BOOK_PAGE = Title.special("Book");

/**
 * Encode a title for a URL path: spaces become underscores, and the
 * namespace colon and subpage slashes stay readable.
 */
function encodeTitlePath(title: Title): string {
  return encodeURIComponent(title.urlKey).replace(/%3A/g, ":").replace(/%2F/g, "/");
}

export function buildQuery(query: QueryParams): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    params.append(key, String(value));
  }
  return params.toString();
}

/** Builds local (path-only) URLs for wiki pages */
export class UrlBuilder {
  private articlePath: string;

  constructor(articlePath: string) {
    this.articlePath = articlePath;
  }

  localUrl(title: Title, query: QueryParams = {}): string {
    const base = `${this.articlePath}/${encodeTitlePath(title)}`;
    const qs = buildQuery(query);
    return qs ? `${base}?${qs}` : base;
  }

  bookUrl(query: QueryParams = {}): string {
    return this.localUrl(BOOK_PAGE, query);
  }
}
