import type { PageRef } from "./page-store.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CollectionItem {
  type: "article";
  namespace: number;
  /** Prefixed title */
  title: string;
  /** Revision the item pins */
  revision: number;
  /** Latest revision of the page when the item was added */
  latest: number;
  /** When the item was added, ms since epoch */
  timestamp: number;
  /** True when the item follows the latest revision rather than a pinned oldid */
  currentVersion: boolean;
}

export interface CollectionRecord {
  enabled: boolean;
  /** Last change to the book, ms since epoch */
  timestamp: number | null;
  title: string;
  subtitle: string;
  items: CollectionItem[];
}

/** The part of a session record the book lives in */
export interface CollectionHolder {
  collection?: CollectionRecord;
}

// ─── Collection session ──────────────────────────────────────────────────────

/**
 * The book of one browser session. Reads are safe on sessions that never
 * enabled the book creator; mutations create the collection on demand.
 */
export class CollectionSession {
  private holder: CollectionHolder;
  private now: () => number;

  constructor(holder: CollectionHolder, now: () => number = Date.now) {
    this.holder = holder;
    this.now = now;
  }

  private get record(): CollectionRecord {
    if (!this.holder.collection) {
      this.holder.collection = { enabled: false, timestamp: null, title: "", subtitle: "", items: [] };
    }
    return this.holder.collection;
  }

  private touch(): void {
    this.record.timestamp = this.now();
  }

  isEnabled(): boolean {
    return this.holder.collection?.enabled === true;
  }

  /** Last change to the book, or null when it was never touched */
  get timestamp(): number | null {
    return this.holder.collection?.timestamp ?? null;
  }

  enable(): void {
    this.record.enabled = true;
    this.touch();
  }

  /** Turn the book creator off; the items are kept for later */
  disable(): void {
    if (!this.holder.collection) return;
    this.holder.collection.enabled = false;
    this.touch();
  }

  articles(): readonly CollectionItem[] {
    return this.holder.collection?.items ?? [];
  }

  countArticles(): number {
    return this.articles().filter((item) => item.type === "article").length;
  }

  /**
   * Position of the article in the book, or null.
   * With an explicit `oldid` the pinned revision must match; without one the
   * item must follow the latest revision.
   */
  findArticle(title: string, oldid = 0): number | null {
    const items = this.articles();
    for (let index = 0; index < items.length; index++) {
      const item = items[index];
      if (item.type !== "article" || item.title !== title) continue;
      if (oldid) {
        if (item.revision === oldid) return index;
      } else if (item.revision === item.latest) {
        return index;
      }
    }
    return null;
  }

  /** Append a page; false when it is already in the book */
  addArticle(page: PageRef, oldid = 0): boolean {
    const title = page.title.prefixedText;
    if (this.findArticle(title, oldid) !== null) return false;

    this.record.items.push({
      type: "article",
      namespace: page.title.namespace,
      title,
      revision: oldid || page.latestRevisionId,
      latest: page.latestRevisionId,
      timestamp: this.now(),
      currentVersion: oldid === 0,
    });
    this.touch();
    return true;
  }

  removeArticle(title: string, oldid = 0): boolean {
    const index = this.findArticle(title, oldid);
    if (index === null) return false;
    this.record.items.splice(index, 1);
    this.touch();
    return true;
  }

  /**
   * Add every member page that is not in the book yet, stopping once the
   * book holds `limit` items. Returns how many pages were added.
   */
  addCategory(members: readonly PageRef[], limit: number): number {
    let added = 0;
    for (const member of members) {
      if (this.articles().length >= limit) break;
      if (this.addArticle(member)) added++;
    }
    return added;
  }

  /** Move an item to a new position */
  moveArticle(from: number, to: number): boolean {
    const items = this.holder.collection?.items;
    if (!items || from < 0 || from >= items.length || to < 0 || to >= items.length) return false;
    const [item] = items.splice(from, 1);
    items.splice(to, 0, item);
    this.touch();
    return true;
  }

  clear(): void {
    if (!this.holder.collection) return;
    this.holder.collection.items = [];
    this.touch();
  }
}
