import type { CollectionItem } from "./collection-session.js";
import type { CollectionConfig } from "./config.js";
import type { PageStore, WikiPage } from "./page-store.js";
import { Title } from "./title.js";

export interface Suggestion {
  page: WikiPage;
  /** Categories the page shares with the book */
  shared: string[];
}

const MAX_SUGGESTIONS = 20;

/**
 * Pages that share a category with the book's pages and are not in the book
 * yet, most shared categories first.
 */
export function suggestPages(
  items: readonly CollectionItem[],
  pages: PageStore,
  config: Pick<CollectionConfig, "collectibleNamespaces">,
  limit = MAX_SUGGESTIONS,
): Suggestion[] {
  const inBook = new Set(items.map((item) => item.title));
  const categories = new Set<string>();
  for (const item of items) {
    const title = Title.newFromText(item.title);
    const page = title ? pages.get(title) : null;
    for (const category of page?.categories ?? []) categories.add(category);
  }
  if (categories.size === 0) return [];

  const suggestions: Suggestion[] = [];
  for (const page of pages.all()) {
    if (inBook.has(page.title.prefixedText)) continue;
    if (!config.collectibleNamespaces.has(page.title.namespace)) continue;
    const shared = page.categories.filter((category) => categories.has(category));
    if (shared.length > 0) suggestions.push({ page, shared });
  }

  return suggestions
    .sort(
      (a, b) =>
        b.shared.length - a.shared.length || a.page.title.prefixedText.localeCompare(b.page.title.prefixedText),
    )
    .slice(0, limit);
}
