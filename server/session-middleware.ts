import type { MiddlewareHandler } from "hono";
import type { CollectionHolder, CollectionRecord } from "./collection-session.js";
import type { SessionRecord, SessionStore } from "./session-store.js";

export const COOKIE_NAME = "book_session";
export const COOKIE_MAX_AGE = 24 * 60 * 60; // 1 day in seconds

export interface WikiUser {
  name: string | null;
  isRegistered: boolean;
}

/**
 * The browser session of one request. Reads work without a stored record;
 * the first write to the book stores one and sets the cookie.
 */
export class RequestSession implements CollectionHolder {
  private record: SessionRecord | null;
  private persist: () => SessionRecord;

  constructor(record: SessionRecord | null, persist: () => SessionRecord) {
    this.record = record;
    this.persist = persist;
  }

  /** Stored session id, or null until something was written */
  get id(): string | null {
    return this.record?.id ?? null;
  }

  get collection(): CollectionRecord | undefined {
    return this.record?.collection;
  }

  set collection(value: CollectionRecord | undefined) {
    this.record ??= this.persist();
    this.record.collection = value;
  }
}

export type AppEnv = {
  Variables: {
    session: RequestSession;
    user: WikiUser;
  };
};

type RequestLike = { url: string; header: (name: string) => string | undefined };

/** Parse the session id from a Cookie header string */
export function parseSessionCookie(cookieHeader: string): string | null {
  for (const part of cookieHeader.split(";")) {
    const trimmed = part.trim();
    if (trimmed.startsWith(`${COOKIE_NAME}=`)) {
      return trimmed.slice(COOKIE_NAME.length + 1);
    }
  }
  return null;
}

function shouldUseSecureCookie(req: RequestLike): boolean {
  const forwardedProto = req.header("x-forwarded-proto")?.split(",")[0]?.trim().toLowerCase();
  if (forwardedProto) {
    return forwardedProto === "https";
  }
  try {
    return new URL(req.url).protocol === "https:";
  } catch {
    return false;
  }
}

/** Build a Set-Cookie header value for the session id */
export function sessionCookie(req: RequestLike, id: string): string {
  const secureAttr = shouldUseSecureCookie(req) ? "; Secure" : "";
  return `${COOKIE_NAME}=${id}; HttpOnly${secureAttr}; SameSite=Lax; Path=/; Max-Age=${COOKIE_MAX_AGE}`;
}

/**
 * Resolve the browser session and the user for every request. Requests
 * without a known session cookie get a transient session; it is stored and
 * the cookie set only when the book is first written.
 * The user name comes from a trusted header set by the authenticating front end.
 */
export function sessionMiddleware(store: SessionStore, userHeader: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = store.get(parseSessionCookie(c.req.header("cookie") || ""));
    c.set(
      "session",
      new RequestSession(existing, () => {
        const created = store.create();
        c.header("Set-Cookie", sessionCookie(c.req, created.id), { append: true });
        return created;
      }),
    );

    const name = c.req.header(userHeader)?.trim() || null;
    c.set("user", { name, isRegistered: name !== null });

    await next();
  };
}
