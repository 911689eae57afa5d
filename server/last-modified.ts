import { createHash } from "node:crypto";
import type { CollectionSession } from "./collection-session.js";

/** Named timestamps (ms since epoch) that govern a page's freshness */
export type ModifiedTimes = Record<string, number>;

/** The book's contribution to cache freshness, or null when it has none */
export function contributeLastModified(collection: Pick<CollectionSession, "timestamp">): number | null {
  return collection.timestamp;
}

export function onOutputPageCheckLastModified(
  collection: Pick<CollectionSession, "timestamp">,
  modifiedTimes: ModifiedTimes,
): void {
  const timestamp = contributeLastModified(collection);
  if (timestamp !== null) {
    modifiedTimes.collection = timestamp;
  }
}

/** Who a page was rendered for, beyond its timestamps */
export interface RenderVariant {
  /** Stored session id, or null for a view without one */
  session: string | null;
  user: string | null;
}

export const ANONYMOUS: RenderVariant = { session: null, user: null };

export interface ConditionalHeaders {
  ifModifiedSince?: string | null;
  ifNoneMatch?: string | null;
}

export interface LastModifiedResult {
  /** Governing time, truncated to whole seconds as HTTP dates are */
  lastModified: number;
  /** Weak validator over the exact times and the variant */
  etag: string;
  notModified: boolean;
}

/** Weak entity tag for one rendering of a page */
export function entityTag(modifiedTimes: ModifiedTimes, variant: RenderVariant): string {
  const times = Object.entries(modifiedTimes).sort(([a], [b]) => a.localeCompare(b));
  const digest = createHash("sha256")
    .update(JSON.stringify([variant.session, variant.user, times]))
    .digest("hex")
    .slice(0, 20);
  return `W/"${digest}"`;
}

function stripWeak(tag: string): string {
  return tag.startsWith("W/") ? tag.slice(2) : tag;
}

/** Weak comparison of an If-None-Match list against one tag */
export function matchesEntityTag(ifNoneMatch: string, etag: string): boolean {
  if (ifNoneMatch.trim() === "*") return true;
  return ifNoneMatch.split(",").some((candidate) => stripWeak(candidate.trim()) === stripWeak(etag));
}

/**
 * Compute the governing last-modified time and whether the request's
 * validators make the response a 304.
 *
 * If-None-Match wins when present. A date alone only validates views that
 * depend on neither a session nor a user, and only when it is exactly the
 * governing time: a later date was sent for some other rendering.
 */
export function checkLastModified(
  modifiedTimes: ModifiedTimes,
  headers: ConditionalHeaders = {},
  variant: RenderVariant = ANONYMOUS,
): LastModifiedResult {
  const values = Object.values(modifiedTimes);
  const max = values.length > 0 ? Math.max(...values) : 0;
  const lastModified = Math.floor(max / 1000) * 1000;
  const etag = entityTag(modifiedTimes, variant);
  const result = { lastModified, etag, notModified: false };

  if (headers.ifNoneMatch) {
    return { ...result, notModified: matchesEntityTag(headers.ifNoneMatch, etag) };
  }
  if (!headers.ifModifiedSince || variant.session !== null || variant.user !== null) return result;

  const since = Date.parse(headers.ifModifiedSince);
  return { ...result, notModified: since === max };
}
