import { readFileSync } from "node:fs";
import { NS_CATEGORY, NS_SPECIAL, Title } from "./title.js";
import { PAGES_FILE } from "./paths.js";
import { isRecord } from "./guards.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface WikiPage {
  title: Title;
  latestRevisionId: number;
  /** Last change to the page, ms since epoch */
  touched: number;
  content: string;
  /** Category names (without the namespace prefix) */
  categories: string[];
}

/** What a renderer knows about the page being viewed */
export interface PageRef {
  title: Title;
  exists: boolean;
  /** 0 when the page does not exist */
  latestRevisionId: number;
}

interface PageFileEntry {
  title: string;
  revision: number;
  touched: string;
  content?: string;
  categories?: string[];
}

function isPageFileEntry(value: unknown): value is PageFileEntry {
  if (!isRecord(value)) return false;
  const entry = value;
  return (
    typeof entry.title === "string" &&
    typeof entry.revision === "number" &&
    typeof entry.touched === "string" &&
    (entry.content === undefined || typeof entry.content === "string") &&
    (entry.categories === undefined ||
      (Array.isArray(entry.categories) && entry.categories.every((c) => typeof c === "string")))
  );
}

// ─── Page store ──────────────────────────────────────────────────────────────

/** Read-only store of the wiki's current pages, keyed by prefixed title */
export class PageStore {
  private pages = new Map<string, WikiPage>();

  constructor(pages: WikiPage[] = []) {
    for (const page of pages) {
      this.pages.set(page.title.prefixedText, page);
    }
  }

  static fromFile(file = PAGES_FILE): PageStore {
    const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
    if (!Array.isArray(raw)) throw new Error(`${file} must contain an array of pages`);

    const pages: WikiPage[] = [];
    for (const entry of raw) {
      if (!isPageFileEntry(entry)) {
        console.warn(`[pages] Skipping malformed entry in ${file}:`, JSON.stringify(entry));
        continue;
      }
      const title = Title.newFromText(entry.title);
      const touched = Date.parse(entry.touched);
      if (!title || Number.isNaN(touched)) {
        console.warn(`[pages] Skipping entry with invalid title or timestamp: ${entry.title}`);
        continue;
      }
      pages.push({
        title,
        latestRevisionId: entry.revision,
        touched,
        content: entry.content ?? "",
        categories: entry.categories ?? [],
      });
    }
    return new PageStore(pages);
  }

  get(title: Title): WikiPage | null {
    return this.pages.get(title.prefixedText) ?? null;
  }

  /** Page reference for rendering; special pages never exist */
  lookup(title: Title): PageRef {
    const page = title.namespace === NS_SPECIAL ? null : this.get(title);
    return {
      title,
      exists: page !== null,
      latestRevisionId: page?.latestRevisionId ?? 0,
    };
  }

  /** Pages listed in `Category:<name>`, sorted by prefixed title */
  categoryMembers(name: string): WikiPage[] {
    const category = Title.makeTitle(NS_CATEGORY, name);
    if (!category) return [];
    return Array.from(this.pages.values())
      .filter((page) => page.categories.some((c) => Title.makeTitle(NS_CATEGORY, c)?.equals(category)))
      .sort((a, b) => a.title.prefixedText.localeCompare(b.title.prefixedText));
  }

  all(): WikiPage[] {
    return Array.from(this.pages.values());
  }
}
